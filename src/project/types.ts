/**
 * Types for project-level analysis
 */

import type { BindingRecord, DeclarationRecord } from '../base/BindingTypes.js';
import type { FileAccessError } from '../errors/AnalysisError.js';

/**
 * `[package]` fields read from Cargo.toml
 */
export interface ProjectMetadata {
  projectName: string;
  version: string;
}

/**
 * Files found under a project root, in walk order
 */
export interface DiscoveryResult {
  files: string[];
  /** Directories that could not be listed */
  errors: FileAccessError[];
}

/**
 * Merged records of a whole project
 */
export interface AnalysisResults {
  mutable: BindingRecord[];
  immutable: BindingRecord[];
  declarations: DeclarationRecord[];
  fileErrors: FileAccessError[];
  filesAnalyzed: number;
  /** Files that went through the line scanner instead of the tree visitor */
  fallbackFiles: string[];
}
