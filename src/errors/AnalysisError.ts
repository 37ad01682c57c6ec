/**
 * Error hierarchy for the analyzer
 *
 * - ConfigError: invalid options or output format (fatal)
 * - FileAccessError: a source file could not be read (error, per file)
 * - GrammarLoadError: the tree-sitter grammar could not be loaded (warning,
 *   extraction continues on the heuristic path)
 *
 * Source content never produces an error: unrecognized shapes are skipped.
 */

export type ErrorSeverity = 'fatal' | 'error' | 'warning';

export interface ErrorContext {
  filePath?: string;
  [key: string]: unknown;
}

export interface AnalysisErrorJSON {
  code: string;
  severity: ErrorSeverity;
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

export abstract class AnalysisError extends Error {
  abstract readonly code: string;
  abstract readonly severity: ErrorSeverity;
  readonly context: ErrorContext;
  readonly suggestion?: string;

  constructor(message: string, context: ErrorContext = {}, suggestion?: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.context = context;
    this.suggestion = suggestion;

    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): AnalysisErrorJSON {
    return {
      code: this.code,
      severity: this.severity,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
    };
  }
}

/**
 * Invalid configuration, e.g. an unknown output format
 */
export class ConfigError extends AnalysisError {
  readonly code = 'ERR_CONFIG';
  readonly severity = 'fatal' as const;
}

/**
 * A file that exists in the walk but cannot be read
 */
export class FileAccessError extends AnalysisError {
  readonly code = 'ERR_FILE_ACCESS';
  readonly severity = 'error' as const;

  constructor(filePath: string, cause: unknown) {
    super(
      `Cannot read ${filePath}: ${describeCause(cause)}`,
      { filePath },
      'Check file permissions; the file was skipped',
      cause
    );
  }
}

/**
 * The grammar .wasm could not be resolved or instantiated
 */
export class GrammarLoadError extends AnalysisError {
  readonly code = 'ERR_GRAMMAR_LOAD';
  readonly severity = 'warning' as const;

  constructor(language: string, cause: unknown) {
    super(
      `Failed to load ${language} grammar: ${describeCause(cause)}`,
      { language },
      'Install tree-sitter-rust or pass grammarWasmPath; files are scanned heuristically meanwhile',
      cause
    );
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
