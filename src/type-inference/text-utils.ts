/**
 * Small string helpers shared by the text-based inferencers and the line scanner
 */

const OPENERS = new Set(['<', '(', '[', '{']);
const CLOSERS = new Set(['>', ')', ']', '}']);

/**
 * Split on a separator that is not nested inside <>, (), [] or {}.
 * `->` is not treated as a closing angle bracket.
 */
export function splitTopLevel(text: string, separator: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = '';

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (OPENERS.has(ch)) {
      depth++;
    } else if (CLOSERS.has(ch) && !(ch === '>' && text[i - 1] === '-')) {
      depth = Math.max(0, depth - 1);
    } else if (ch === separator && depth === 0) {
      parts.push(current);
      current = '';
      continue;
    }
    current += ch;
  }
  parts.push(current);
  return parts;
}

/**
 * Index of the first `stop` character at nesting depth zero, or -1
 */
export function indexOfTopLevel(text: string, stops: string, from = 0): number {
  let depth = 0;
  for (let i = from; i < text.length; i++) {
    const ch = text[i];
    if (depth === 0 && stops.includes(ch)) return i;
    if (OPENERS.has(ch)) {
      depth++;
    } else if (CLOSERS.has(ch) && !(ch === '>' && text[i - 1] === '-')) {
      depth--;
    }
  }
  return -1;
}

/**
 * `std::collections::HashMap` -> `HashMap`
 */
export function lastPathSegment(path: string): string {
  const segments = path.split('::');
  return segments[segments.length - 1].trim();
}

/**
 * Leading run of alphanumeric / underscore characters
 */
export function readIdentifier(text: string, start = 0): string {
  const match = /^[A-Za-z0-9_]+/.exec(text.slice(start));
  return match ? match[0] : '';
}

/**
 * Index of the first assignment `=` (not `==`, `=>`, `<=`, `>=`, `!=`), or -1
 */
export function assignmentIndex(text: string, from = 0): number {
  for (let i = from; i < text.length; i++) {
    if (text[i] !== '=') continue;
    const prev = text[i - 1];
    const next = text[i + 1];
    if (prev === '=' || prev === '!' || prev === '<' || prev === '>') continue;
    if (next === '=' || next === '>') continue;
    return i;
  }
  return -1;
}

/**
 * Right-hand side of the first assignment, trimmed and without a trailing `;`
 */
export function rightHandSide(text: string, from = 0): string | null {
  const eq = assignmentIndex(text, from);
  if (eq < 0) return null;
  return text.slice(eq + 1).trim().replace(/;\s*$/, '').trim();
}

/**
 * Type text after a single `:` (not `::`) found between `from` and the first
 * assignment, ending at `;` or `=`. Null when absent or empty.
 */
export function typeAnnotation(text: string, from = 0): string | null {
  const eq = assignmentIndex(text, from);
  const limit = eq < 0 ? text.length : eq;

  for (let i = from; i < limit; i++) {
    if (text[i] !== ':' || text[i - 1] === ':' || text[i + 1] === ':') continue;
    const semicolon = text.indexOf(';', i + 1);
    const end = Math.min(limit, semicolon < 0 ? text.length : semicolon);
    const annotation = text.slice(i + 1, end).trim();
    return annotation.length > 0 ? annotation : null;
  }
  return null;
}

/**
 * Skip a pattern that starts at `start`: a bracketed group (nesting-aware) or
 * an identifier optionally followed by a bracketed group (`Some(x)`, `Point { .. }`).
 * Returns the index just past the pattern.
 */
export function skipPattern(text: string, start: number): number {
  let i = start;
  while (text[i] === ' ') i++;

  const ident = readIdentifier(text, i);
  i += ident.length;
  let j = i;
  while (text[j] === ' ') j++;

  const opener = text[j];
  if (opener === '(' || opener === '[' || opener === '{') {
    const close = indexOfTopLevel(text, opener === '(' ? ')' : opener === '[' ? ']' : '}', j + 1);
    return close < 0 ? text.length : close + 1;
  }
  return i;
}

/**
 * Remove a trailing `//` comment that is not inside a string literal
 */
export function stripLineComment(line: string): string {
  let inString = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (inString) {
      if (ch === '\\') i++;
      else if (ch === '"') inString = false;
    } else if (ch === '"') {
      inString = true;
    } else if (ch === '/' && line[i + 1] === '/') {
      return line.slice(0, i);
    }
  }
  return line;
}

/**
 * Annotation of the binding introduced by `let`, looked up after the
 * pattern so that struct-pattern fields (`Point { x: a }`) are not mistaken
 * for a type. Lines without `let` are searched from the start.
 */
export function bindingAnnotation(line: string): string | null {
  const letMatch = /\blet\s+(?:mut\s+)?/.exec(line);
  const from = letMatch ? skipPattern(line, letMatch.index + letMatch[0].length) : 0;
  return typeAnnotation(line, from);
}
