/**
 * Project Analyzer
 *
 * Discovers source files, extracts each one, and merges the per-file
 * records in discovery order. Files are read and extracted in batches of
 * `concurrency`; merging happens after each batch, in file order.
 */

import * as fs from 'fs/promises';
import type { BindingExtractor } from '../base/BindingExtractor.js';
import type { BindingRecord, FileExtraction } from '../base/BindingTypes.js';
import {
  resolveAnalyzerOptions,
  type AnalyzerOptions,
  type ResolvedAnalyzerOptions,
} from '../config/options.js';
import { ConfigError, FileAccessError } from '../errors/AnalysisError.js';
import { compareNames, discoverSourceFiles } from './FileDiscovery.js';
import type { AnalysisResults } from './types.js';

type FileOutcome =
  | { kind: 'extracted'; extraction: FileExtraction }
  | { kind: 'unreadable'; error: FileAccessError };

/**
 * Stable sort by binding name; locations are left untouched
 */
export function sortBindingsByName(bindings: readonly BindingRecord[]): BindingRecord[] {
  return [...bindings].sort((a, b) => compareNames(a.name, b.name));
}

/**
 * @throws ConfigError when `projectDir` is missing or not a directory
 */
export async function assertProjectDirectory(projectDir: string): Promise<void> {
  let isDirectory = false;
  try {
    isDirectory = (await fs.stat(projectDir)).isDirectory();
  } catch (error) {
    throw new ConfigError(
      `Project directory not found: ${projectDir}`,
      { projectDir },
      'Pass the path of a directory containing Rust sources',
      error
    );
  }
  if (!isDirectory) {
    throw new ConfigError(
      `Not a directory: ${projectDir}`,
      { projectDir },
      'Pass the path of a directory containing Rust sources'
    );
  }
}

export class ProjectAnalyzer {
  private readonly options: ResolvedAnalyzerOptions;

  constructor(
    private readonly extractor: BindingExtractor,
    options: AnalyzerOptions = {}
  ) {
    this.options = resolveAnalyzerOptions(options);
  }

  async analyze(projectDir: string): Promise<AnalysisResults> {
    await assertProjectDirectory(projectDir);
    await this.extractor.initialize();

    const { logger } = this.options;
    const discovery = await discoverSourceFiles(projectDir, this.options);
    logger.debug('🔍 Discovered source files', { projectDir, count: discovery.files.length });

    const results: AnalysisResults = {
      mutable: [],
      immutable: [],
      declarations: [],
      fileErrors: [...discovery.errors],
      filesAnalyzed: 0,
      fallbackFiles: [],
    };

    const files = discovery.files.filter((file) => this.extractor.canHandle(file));
    for (let start = 0; start < files.length; start += this.options.concurrency) {
      const batch = files.slice(start, start + this.options.concurrency);
      const outcomes = await Promise.all(batch.map((file) => this.processFile(file)));

      for (const outcome of outcomes) {
        if (outcome.kind === 'unreadable') {
          logger.warn(`⚠️  ${outcome.error.message}`);
          results.fileErrors.push(outcome.error);
          continue;
        }
        const { extraction } = outcome;
        results.mutable.push(...extraction.mutable);
        results.immutable.push(...extraction.immutable);
        results.declarations.push(...extraction.declarations);
        results.filesAnalyzed++;
        if (extraction.path === 'heuristic') {
          results.fallbackFiles.push(extraction.filePath);
        }
      }
    }

    if (this.options.sort) {
      results.mutable = sortBindingsByName(results.mutable);
      results.immutable = sortBindingsByName(results.immutable);
    }

    logger.info('📊 Analysis complete', {
      files: results.filesAnalyzed,
      mutable: results.mutable.length,
      immutable: results.immutable.length,
      declarations: results.declarations.length,
      fallbackFiles: results.fallbackFiles.length,
      fileErrors: results.fileErrors.length,
    });
    return results;
  }

  private async processFile(filePath: string): Promise<FileOutcome> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      return { kind: 'unreadable', error: new FileAccessError(filePath, error) };
    }
    return { kind: 'extracted', extraction: await this.extractor.extractFile(filePath, content) };
  }
}
