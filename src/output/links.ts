import * as path from 'path';
import type { SourceLocation } from '../base/BindingTypes.js';

/**
 * `vscode://file/<absolute path>:<line>`, with forward slashes
 */
export function editorLink(location: SourceLocation, cwd: string = process.cwd()): string {
  const absolutePath = path.resolve(cwd, location.filePath).replace(/\\/g, '/');
  return `vscode://file/${absolutePath}:${location.line}`;
}
