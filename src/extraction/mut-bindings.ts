/**
 * Textual scan for `mut <name>[: Type]` occurrences
 *
 * Used by both extraction paths: the tree visitor for if-let / while-let
 * conditions and the line scanner for parameters and pattern lines.
 */

import { indexOfTopLevel } from '../type-inference/text-utils.js';

export interface MutBinding {
  readonly name: string;
  /** Type text after `name:`, up to the next top-level `,` or `)` */
  readonly annotation: string | null;
  /** Offset of the `mut` keyword in the scanned text */
  readonly index: number;
}

const MUT_BINDING = /\bmut\s+([A-Za-z_][A-Za-z0-9_]*)/g;

/** `&mut T`, `&'a mut T`, `*mut T` are types, `let mut` / `for mut` belong to other rules */
const NOT_A_BINDING = /(?:[&*]\s*|&\s*'[A-Za-z_][A-Za-z0-9_]*\s+|\b(?:let|for)\s+)$/;

function annotationAfter(text: string, offset: number): string | null {
  let i = offset;
  while (text[i] === ' ' || text[i] === '\t') i++;
  if (text[i] !== ':' || text[i + 1] === ':') return null;

  const end = indexOfTopLevel(text, ',)=;{|', i + 1);
  const annotation = text.slice(i + 1, end < 0 ? text.length : end).trim();
  return annotation.length > 0 ? annotation : null;
}

export function findMutBindings(text: string): MutBinding[] {
  const bindings: MutBinding[] = [];
  for (const match of text.matchAll(MUT_BINDING)) {
    const index = match.index ?? 0;
    const name = match[1];
    if (name === 'self' || NOT_A_BINDING.test(text.slice(0, index))) continue;
    bindings.push({
      name,
      annotation: annotationAfter(text, index + match[0].length),
      index,
    });
  }
  return bindings;
}
