/**
 * Types for result rendering
 */

export type OutputFormat = 'json' | 'csv' | 'text';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'csv', 'text'];

/**
 * Run metadata printed in every report header
 */
export interface RunMetadata {
  projectName: string;
  version: string;
  /** Supplied by the caller; formatters never read the clock */
  datetime: string;
}

export interface RenderOptions {
  /** Add a `vscode://file/...` link to every record */
  link: boolean;
  /** Base directory for turning relative record paths into absolute links */
  cwd?: string;
}
