import * as fs from 'fs/promises';
import { ConfigError } from '../errors/AnalysisError.js';
import type { AnalysisResults } from '../project/types.js';
import { renderCsv } from './CsvFormatter.js';
import { renderJson } from './JsonFormatter.js';
import { renderText } from './TextFormatter.js';
import { OUTPUT_FORMATS, type OutputFormat, type RenderOptions, type RunMetadata } from './types.js';

export { csvQuote, renderCsv } from './CsvFormatter.js';
export { buildJsonReport, renderJson } from './JsonFormatter.js';
export type { JsonReport } from './JsonFormatter.js';
export { formatBinding, formatDeclaration, renderText } from './TextFormatter.js';
export { renderConsoleReport, renderSummary } from './ConsoleReporter.js';
export { editorLink } from './links.js';
export { OUTPUT_FORMATS } from './types.js';
export type { OutputFormat, RenderOptions, RunMetadata } from './types.js';

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * @throws ConfigError for anything but json, csv or text
 */
export function parseOutputFormat(value: string): OutputFormat {
  if (isOutputFormat(value)) return value;
  throw new ConfigError(
    `Invalid output format: ${value}`,
    { format: value },
    `Use one of: ${OUTPUT_FORMATS.join(', ')}`
  );
}

export function renderResults(
  format: OutputFormat,
  results: AnalysisResults,
  metadata: RunMetadata,
  options: RenderOptions
): string {
  switch (format) {
    case 'json':
      return renderJson(results, metadata, options);
    case 'csv':
      return renderCsv(results, metadata, options);
    case 'text':
      return renderText(results, metadata, options);
  }
}

export async function writeReport(
  outputFile: string,
  format: OutputFormat,
  results: AnalysisResults,
  metadata: RunMetadata,
  options: RenderOptions
): Promise<void> {
  await fs.writeFile(outputFile, renderResults(format, results, metadata, options), 'utf8');
}
