/**
 * Binding and declaration records
 *
 * Records are created once per discovered occurrence during the per-file
 * extraction pass and never mutated afterwards.
 */

/**
 * Where a record was found (1-based line)
 */
export interface SourceLocation {
  readonly filePath: string;
  readonly line: number;
}

/**
 * One discovered variable binding
 */
export interface BindingRecord {
  /** Identifier text, never empty */
  readonly name: string;
  readonly isMutable: boolean;
  readonly location: SourceLocation;
  /** Source line containing the binding, or the `unknown` placeholder */
  readonly contextLine: string;
  /** How the binding arose (`for loop variable`, `destructured from Some`, ...) */
  readonly declarationKind: string;
  /** Descriptive label such as `vector of integer (i32)` */
  readonly inferredType: string;
  /** Coarse canonical type (`Vec<i32>`, `&str`, ...) */
  readonly basicType: string;
  /** Enclosing function name, empty at module scope */
  readonly scope: string;
}

/**
 * A binding before the enclosing scope is attached
 */
export type BindingDraft = Omit<BindingRecord, 'scope'>;

export type DeclarationType = 'function' | 'struct' | 'enum';

/**
 * One function / struct / enum declaration
 */
export interface DeclarationRecord {
  readonly name: string;
  readonly declarationType: DeclarationType;
  readonly location: SourceLocation;
}

/**
 * Which engine produced a file's records
 */
export type ExtractionPath = 'tree' | 'heuristic';

/**
 * Records extracted from a single file, in traversal order
 */
export interface FileExtraction {
  readonly filePath: string;
  readonly path: ExtractionPath;
  readonly mutable: readonly BindingRecord[];
  readonly immutable: readonly BindingRecord[];
  readonly declarations: readonly DeclarationRecord[];
  /** Why the tree path was not used (only set on the heuristic path) */
  readonly fallbackReason?: string;
}
