/**
 * Binding Extractor Interface
 *
 * Common interface for per-language extraction engines. The project
 * analyzer only talks to this seam, so a second language can be added
 * without touching discovery, merging or output.
 */

import type { FileExtraction } from './BindingTypes.js';

export interface BindingExtractor {
  /**
   * The language this extractor handles
   */
  readonly language: string;

  /**
   * File extensions this extractor can handle (e.g., ['.rs'])
   */
  readonly extensions: readonly string[];

  /**
   * Initialize the extractor (load grammar, etc.).
   * Must not throw when the grammar is unavailable; the extractor
   * then runs on its fallback path.
   */
  initialize(): Promise<void>;

  /**
   * Extract bindings and declarations from one file
   *
   * @param filePath - Path recorded in every record's location
   * @param content - File content as string
   */
  extractFile(filePath: string, content: string): Promise<FileExtraction>;

  /**
   * Check if this extractor can handle a given file
   */
  canHandle(filePath: string): boolean;
}

/**
 * Abstract base class providing common functionality
 */
export abstract class BaseBindingExtractor implements BindingExtractor {
  abstract readonly language: string;
  abstract readonly extensions: readonly string[];

  abstract initialize(): Promise<void>;
  abstract extractFile(filePath: string, content: string): Promise<FileExtraction>;

  /**
   * Default implementation checks file extension
   */
  canHandle(filePath: string): boolean {
    const dot = filePath.lastIndexOf('.');
    if (dot < 0) return false;
    return this.extensions.includes(filePath.substring(dot));
  }
}
