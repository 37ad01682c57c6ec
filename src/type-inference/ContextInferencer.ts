/**
 * Context Inferencer
 *
 * Guesses a type label from a single source line when no tree is available.
 * Rules are tried in a fixed order and the first match wins; an unmatched
 * line yields `inferred from context`.
 */

import { INFERRED, INFERRED_FROM_CONTEXT } from './sentinels.js';
import { classifyTypeText } from './TypeClassifier.js';
import { bindingAnnotation, rightHandSide, skipPattern } from './text-utils.js';

const LET_KEYWORD = /\blet\s+(?:mut\s+)?/;
const FN_KEYWORD = /\bfn\b/;
const FOR_KEYWORD = /\bfor\b/;
const IN_KEYWORD = /\bin\b/;

/**
 * Element label for an iterator adapter found in the text, or null.
 * `.into_iter()` is checked before `.iter()`.
 */
function iteratorElementLabel(text: string): string | null {
  if (text.includes('.into_iter()')) return 'owned collection element';
  if (text.includes('.iter_mut()')) return 'mutable reference to collection element';
  if (text.includes('.iter()')) return 'reference to collection element';
  return null;
}

/**
 * Label derived from the shape of an assignment's right-hand side, or null
 * when the line has no assignment or the shape is not recognized.
 */
export function inferFromRightHandSide(line: string): string | null {
  const rhs = rightHandSide(line);
  if (rhs === null || rhs.length === 0) return null;

  if (rhs.startsWith('"')) return 'string';
  if (/^\d/.test(rhs)) return /^\d[\d_]*\.\d/.test(rhs) ? 'floating-point' : 'integer';
  if (rhs === 'true' || rhs === 'false') return 'boolean';
  if (rhs.startsWith("'") && rhs.length >= 3) return 'character';
  if (rhs.includes('Some(')) return 'value inside Option';
  if (rhs.includes('Ok(')) return 'success value';
  if (rhs.includes('Err(')) return 'error value';
  return iteratorElementLabel(rhs);
}

/**
 * `[a, b] = vec![..]` -> vector element, `[a, b] = [..]` -> array element
 */
function sliceDestructuringLabel(line: string, patternStart: number): string | null {
  if (line[patternStart] !== '[') return null;
  const rhs = rightHandSide(line, skipPattern(line, patternStart)) ?? '';
  if (!rhs.includes('vec!') && !rhs.includes('Vec::')) return 'array element';

  const hint = /<([^<>]+)>/.exec(rhs);
  return hint ? `vector element of ${classifyTypeText(hint[1])}` : 'vector element';
}

/**
 * Infer a type label from a raw source line
 */
export function inferFromContext(line: string): string {
  const letMatch = LET_KEYWORD.exec(line);

  if (letMatch) {
    const annotation = bindingAnnotation(line);
    if (annotation) return classifyTypeText(annotation);

    const slice = sliceDestructuringLabel(line, letMatch.index + letMatch[0].length);
    if (slice) return slice;

    const shape = inferFromRightHandSide(line);
    if (shape) return shape;
  }

  if (FN_KEYWORD.test(line) && line.includes('(')) return 'function parameter';

  if (FOR_KEYWORD.test(line) && IN_KEYWORD.test(line)) {
    if (line.includes('..')) return 'integer from range';
    return iteratorElementLabel(line) ?? 'iteration variable';
  }

  if (line.includes('let Some(')) return 'value inside Option';
  if (line.includes('let Ok(')) return 'success value from Result';
  if (line.includes('let Err(')) return 'error value from Result';

  return INFERRED_FROM_CONTEXT;
}

/**
 * Element label of a `for` line; `inferred from loop` when the line is not a loop header
 */
export function inferLoopElementFromLine(line: string): string {
  if (!FOR_KEYWORD.test(line) || !IN_KEYWORD.test(line)) return 'inferred from loop';
  const iterator = iteratorElementLabel(line);
  if (iterator) return iterator;
  return line.includes('..') ? 'integer (range)' : 'collection element';
}

/**
 * Label of a binding introduced inside a refutable pattern, given the pattern
 * text (tree path) or the whole line (fallback path)
 */
export function inferPatternMatchType(text: string): string {
  if (text.includes('Some(')) return 'optional value content';
  if (text.includes('Ok(')) return 'success result value';
  if (text.includes('Err(')) return 'error result value';
  if (text.trimStart().startsWith('&')) return 'reference value';
  return 'pattern matched value';
}

/**
 * Fallback variant of {@link inferPatternMatchType}: `if let P = rhs` lines
 * without a wrapper constructor get `part of <rhs label>`
 */
export function inferPatternMatchFromLine(line: string): string {
  const label = inferPatternMatchType(line);
  if (label !== 'pattern matched value') return label;

  if (/\bif\s+let\b/.test(line)) {
    const rhs = rightHandSide(line);
    if (rhs !== null) {
      const rhsLabel = inferFromRightHandSide(`let _ = ${rhs.replace(/\{\s*$/, '').trim()}`);
      return `part of ${rhsLabel ?? INFERRED}`;
    }
  }
  return label;
}
