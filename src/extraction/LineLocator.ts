/**
 * Line Locator
 *
 * Resolves the 1-based line of a syntax node. Two strategies:
 *
 * - `span`: the node's start row as reported by tree-sitter
 * - `text`: best-effort search of the node's text in the file's lines
 *   (exact first line, then containment, then a short prefix, then line 1).
 *   Not authoritative: repeated text resolves to its first occurrence.
 */

import type { SyntaxNode } from '../wasm/types.js';

export type LineLocationStrategy = 'span' | 'text';

export const LINE_LOCATION_STRATEGIES: readonly LineLocationStrategy[] = ['span', 'text'];

export interface LineLocator {
  readonly strategy: LineLocationStrategy;
  locate(node: SyntaxNode): number;
}

/** Characters of the first line kept for the prefix search */
const PREFIX_LENGTH = 10;

/**
 * Find the line of `tokenText` in `lines`; 1 when not found
 */
export function locateLine(lines: readonly string[], tokenText: string): number {
  const firstLine = tokenText.split('\n')[0].trim();
  if (firstLine.length === 0) return 1;

  const exact = lines.findIndex((line) => line.trim() === firstLine);
  if (exact >= 0) return exact + 1;

  const contained = lines.findIndex((line) => line.includes(firstLine));
  if (contained >= 0) return contained + 1;

  const prefix = firstLine.slice(0, PREFIX_LENGTH);
  const partial = lines.findIndex((line) => line.includes(prefix));
  return partial >= 0 ? partial + 1 : 1;
}

export class SpanLineLocator implements LineLocator {
  readonly strategy = 'span' as const;

  locate(node: SyntaxNode): number {
    return node.startPosition.row + 1;
  }
}

export class TextLineLocator implements LineLocator {
  readonly strategy = 'text' as const;

  constructor(private readonly lines: readonly string[]) {}

  locate(node: SyntaxNode): number {
    return locateLine(this.lines, node.text);
  }
}

export function createLineLocator(
  strategy: LineLocationStrategy,
  lines: readonly string[]
): LineLocator {
  return strategy === 'text' ? new TextLineLocator(lines) : new SpanLineLocator();
}

export function isLineLocationStrategy(value: string): value is LineLocationStrategy {
  return LINE_LOCATION_STRATEGIES.some((strategy) => strategy === value);
}
