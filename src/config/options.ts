/**
 * Extractor and analyzer options
 *
 * Callers pass partial options; `resolve*` merges them over the defaults
 * and throws {@link ConfigError} for values that cannot work.
 */

import { ConfigError } from '../errors/AnalysisError.js';
import { isLineLocationStrategy, type LineLocationStrategy } from '../extraction/LineLocator.js';
import { silentLogger, type Logger } from '../logging/Logger.js';

export interface ExtractorOptions {
  /** Grammar file to load instead of the one bundled with tree-sitter-rust */
  grammarWasmPath?: string;
  lineLocation?: LineLocationStrategy;
  logger?: Logger;
}

export interface ResolvedExtractorOptions {
  grammarWasmPath?: string;
  lineLocation: LineLocationStrategy;
  logger: Logger;
}

export interface AnalyzerOptions {
  extensions?: readonly string[];
  /** Directory names never descended into */
  excludeDirectories?: readonly string[];
  includeHidden?: boolean;
  /** Files read and extracted at the same time */
  concurrency?: number;
  /** Stable sort of both binding lists by name */
  sort?: boolean;
  logger?: Logger;
}

export type ResolvedAnalyzerOptions = Required<AnalyzerOptions>;

export const DEFAULT_ANALYZER_OPTIONS: Omit<ResolvedAnalyzerOptions, 'logger'> = {
  extensions: ['.rs'],
  excludeDirectories: ['target'],
  includeHidden: false,
  concurrency: 8,
  sort: false,
};

export function resolveExtractorOptions(options: ExtractorOptions = {}): ResolvedExtractorOptions {
  const lineLocation = options.lineLocation ?? 'span';
  if (!isLineLocationStrategy(lineLocation)) {
    throw new ConfigError(
      `Unknown line location strategy: ${String(lineLocation)}`,
      { lineLocation },
      'Use "span" or "text"'
    );
  }
  return {
    grammarWasmPath: options.grammarWasmPath,
    lineLocation,
    logger: options.logger ?? silentLogger,
  };
}

export function resolveAnalyzerOptions(options: AnalyzerOptions = {}): ResolvedAnalyzerOptions {
  const resolved: ResolvedAnalyzerOptions = {
    ...DEFAULT_ANALYZER_OPTIONS,
    ...stripUndefined(options),
    logger: options.logger ?? silentLogger,
  };

  if (!Number.isInteger(resolved.concurrency) || resolved.concurrency < 1) {
    throw new ConfigError(
      `Invalid concurrency: ${resolved.concurrency}`,
      { concurrency: resolved.concurrency },
      'Concurrency must be a positive integer'
    );
  }
  if (resolved.extensions.length === 0) {
    throw new ConfigError('No source file extensions configured', {}, 'Pass at least one extension, e.g. ".rs"');
  }
  return resolved;
}

function stripUndefined(options: AnalyzerOptions): AnalyzerOptions {
  const defined: AnalyzerOptions = {};
  if (options.extensions !== undefined) defined.extensions = options.extensions;
  if (options.excludeDirectories !== undefined) defined.excludeDirectories = options.excludeDirectories;
  if (options.includeHidden !== undefined) defined.includeHidden = options.includeHidden;
  if (options.concurrency !== undefined) defined.concurrency = options.concurrency;
  if (options.sort !== undefined) defined.sort = options.sort;
  return defined;
}

/**
 * Parse a user-supplied strategy name (CLI flag)
 */
export function parseLineLocation(value: string): LineLocationStrategy {
  if (isLineLocationStrategy(value)) return value;
  throw new ConfigError(`Unknown line location strategy: ${value}`, { lineLocation: value }, 'Use "span" or "text"');
}
