/**
 * Types for WASM loader module
 */

/**
 * Options for loading a tree-sitter grammar
 */
export interface WasmLoaderOptions {
  /**
   * Explicit path to the grammar's .wasm file.
   * When omitted the file shipped in the grammar's npm package is used
   * (e.g. `tree-sitter-rust/tree-sitter-rust.wasm`).
   */
  grammarWasmPath?: string;
}

/**
 * Position of a node boundary (0-based row and column)
 */
export interface SyntaxPoint {
  row: number;
  column: number;
}

/**
 * The slice of the web-tree-sitter node API the extractors rely on.
 * Kept structural so tests and extractors never depend on the runtime class.
 */
export interface SyntaxNode {
  readonly type: string;
  readonly text: string;
  readonly isNamed: boolean;
  readonly hasError: boolean;
  readonly startPosition: SyntaxPoint;
  readonly endPosition: SyntaxPoint;
  readonly children: ReadonlyArray<SyntaxNode | null>;
  readonly namedChildren: ReadonlyArray<SyntaxNode | null>;
  childForFieldName(fieldName: string): SyntaxNode | null;
}

/**
 * A parsed tree whose memory must be released with `delete()`
 */
export interface SyntaxTree {
  readonly rootNode: SyntaxNode;
  delete(): void;
}

export interface LoadedParser {
  /** Parse source text; `null` when the parser gave up (timeout / cancellation) */
  parse(content: string): SyntaxTree | null;
  /** Grammar file the parser was built from */
  grammarPath: string;
}

export type SupportedLanguage = 'rust';
