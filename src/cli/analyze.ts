/**
 * The analysis run behind the CLI: validate flags, read project metadata,
 * extract every file, then print or write the report.
 */

import { ConfigError } from '../errors/AnalysisError.js';
import { parseLineLocation } from '../config/options.js';
import { createLogger, isLogLevel, LOG_LEVELS, type LogLevel } from '../logging/Logger.js';
import { parseOutputFormat, renderConsoleReport, renderSummary, writeReport } from '../output/index.js';
import type { RunMetadata } from '../output/types.js';
import { readCargoMetadata } from '../project/CargoManifest.js';
import { assertProjectDirectory, ProjectAnalyzer } from '../project/ProjectAnalyzer.js';
import { renderProjectTree } from '../project/ProjectTree.js';
import type { AnalysisResults } from '../project/types.js';
import { RustBindingExtractor } from '../rust/RustBindingExtractor.js';

export interface AnalyzeCommandOptions {
  output?: string;
  format: string;
  sort?: boolean;
  tree?: boolean;
  link?: boolean;
  lineLocation: string;
  logLevel: string;
}

/**
 * Where report lines go; `console` in the binary, a buffer in tests
 */
export interface CliOutput {
  log(line: string): void;
}

export interface RunContext {
  out?: CliOutput;
  /** Clock for the report timestamp */
  now?: () => Date;
  grammarWasmPath?: string;
}

function parseLogLevel(value: string): LogLevel {
  if (isLogLevel(value)) return value;
  throw new ConfigError(`Invalid log level: ${value}`, { logLevel: value }, `Use one of: ${LOG_LEVELS.join(', ')}`);
}

/**
 * Run one analysis. Returns null when only the project tree was printed.
 *
 * @throws ConfigError for invalid flags or a missing project directory
 */
export async function runAnalysis(
  projectDir: string,
  options: AnalyzeCommandOptions,
  context: RunContext = {}
): Promise<AnalysisResults | null> {
  const out = context.out ?? console;
  const format = parseOutputFormat(options.format);
  const lineLocation = parseLineLocation(options.lineLocation);
  const logger = createLogger(parseLogLevel(options.logLevel));

  await assertProjectDirectory(projectDir);

  if (options.tree) {
    for (const line of await renderProjectTree(projectDir)) {
      out.log(line);
    }
    return null;
  }

  const datetime = (context.now ?? (() => new Date()))().toISOString();
  const manifest = await readCargoMetadata(projectDir, logger);
  const metadata: RunMetadata = { ...manifest, datetime };

  out.log(`Analysis run at: ${datetime}`);
  out.log(`Analyzing Rust project at: ${projectDir}`);
  out.log(`Project version: ${metadata.version}`);

  const extractor = new RustBindingExtractor({
    grammarWasmPath: context.grammarWasmPath,
    lineLocation,
    logger,
  });
  const analyzer = new ProjectAnalyzer(extractor, { sort: options.sort ?? false, logger });
  const results = await analyzer.analyze(projectDir);

  for (const line of renderSummary(results)) {
    out.log(line);
  }

  const renderOptions = { link: options.link ?? false };
  if (options.output) {
    await writeReport(options.output, format, results, metadata, renderOptions);
    out.log(`Results written to: ${options.output}`);
  } else {
    for (const line of renderConsoleReport(results, metadata, renderOptions)) {
      out.log(line);
    }
  }
  return results;
}
