/**
 * Heuristic Line Scanner
 *
 * Text-only extraction used when a file has no usable syntax tree. Each
 * line is matched independently against the binding and declaration rules;
 * one line may contribute several records. Block comments, `//` comments
 * and blank lines are skipped.
 *
 * Destructuring patterns are cut at the first closing bracket, so nested
 * patterns are only partially understood.
 */

import type { BindingCollector } from '../base/BindingCollector.js';
import type { DeclarationType } from '../base/BindingTypes.js';
import {
  basicTypeFromContext,
  basicTypeFromTypeText,
  UNKNOWN_BASIC_TYPE,
} from '../type-inference/BasicTypeExtractor.js';
import {
  inferFromContext,
  inferFromRightHandSide,
  inferLoopElementFromLine,
  inferPatternMatchFromLine,
} from '../type-inference/ContextInferencer.js';
import { INFERRED } from '../type-inference/sentinels.js';
import { classifyTypeText } from '../type-inference/TypeClassifier.js';
import {
  indexOfTopLevel,
  readIdentifier,
  rightHandSide,
  stripLineComment,
  typeAnnotation,
} from '../type-inference/text-utils.js';
import { findMutBindings } from './mut-bindings.js';

/**
 * Name and labels extracted after a `let` keyword
 */
export interface ExtractedBinding {
  readonly name: string;
  /** True when the pattern itself spells `mut` (`let (mut a, b)`) */
  readonly mutable: boolean;
  readonly declarationKind: string;
  readonly inferredType: string;
}

const CLOSING_BRACKETS: Record<string, string> = { '(': ')', '[': ']', '{': '}' };
const DECLARATION_KEYWORDS: ReadonlyArray<[string, DeclarationType]> = [
  ['fn', 'function'],
  ['struct', 'struct'],
  ['enum', 'enum'],
];
const PATTERN_LINE = /\b(?:if\s+let|while\s+let|match)\b/;

/**
 * Kind label of a destructuring pattern from the right-hand side it binds
 */
export function destructuringKind(rhs: string, pattern: string): string {
  if (rhs.includes('vec!') || rhs.includes('Vec::')) return 'vector element';
  if (rhs.startsWith('[')) return 'array element';
  if (pattern.startsWith('Some(')) return 'optional value';
  if (pattern.startsWith('Ok(')) return 'success value';
  if (pattern.startsWith('Err(')) return 'error value';
  if (pattern.startsWith('(') || pattern.startsWith('{')) return 'tuple or struct field';
  return 'destructured value';
}

/**
 * First bound name of a pattern token such as `mut a`, `&x` or `x: a`
 */
function cleanPatternToken(token: string): { name: string; mutable: boolean } {
  let text = token.trim();
  const colon = text.indexOf(':');
  if (colon >= 0 && text[colon + 1] !== ':') text = text.slice(colon + 1).trim();

  let mutable = false;
  for (;;) {
    if (text.startsWith('&')) {
      text = text.slice(1).trimStart();
    } else if (/^ref\s/.test(text)) {
      text = text.slice(3).trimStart();
    } else if (/^mut\s/.test(text)) {
      mutable = true;
      text = text.slice(3).trimStart();
    } else {
      break;
    }
  }
  return { name: readIdentifier(text), mutable };
}

function destructure(
  line: string,
  rest: string,
  openerIndex: number,
  variant: string | null
): ExtractedBinding | null {
  const opener = rest[openerIndex];
  const closeIndex = rest.indexOf(CLOSING_BRACKETS[opener], openerIndex);
  const patternEnd = closeIndex < 0 ? rest.length : closeIndex + 1;
  const pattern = rest.slice(openerIndex, patternEnd);

  const token = pattern
    .split(/[()[\]{},]/)
    .map((part) => part.trim())
    .find((part) => part.length > 0 && part !== '_' && !part.startsWith('..'));
  if (!token) return null;

  const { name, mutable } = cleanPatternToken(token);
  if (name.length === 0 || name === '_') return null;

  const annotation = typeAnnotation(rest, patternEnd);
  if (annotation) {
    return { name, mutable, declarationKind: annotation, inferredType: classifyTypeText(annotation) };
  }

  const fullPattern = `${variant ?? ''}${pattern}`;
  if (variant) {
    const hint = destructuringKind('', fullPattern);
    return {
      name,
      mutable,
      declarationKind: `destructured from ${variant}`,
      inferredType: hint === 'destructured value' ? inferFromContext(line) : hint,
    };
  }

  const rhs = rightHandSide(rest, patternEnd);
  return {
    name,
    mutable,
    declarationKind: rhs === null ? 'complex pattern' : destructuringKind(rhs, fullPattern),
    inferredType: inferFromContext(line),
  };
}

/**
 * Extract the bound name and labels from `line`, starting right after `let `
 * / `let mut `. Returns null when no name can be found.
 */
export function extractNameAndKind(line: string, start: number): ExtractedBinding | null {
  const rest = line.slice(start).trimStart();
  if (rest.length === 0) return null;

  if (rest[0] in CLOSING_BRACKETS) return destructure(line, rest, 0, null);

  const name = readIdentifier(rest);
  if (name.length === 0 || name === '_') return null;

  const after = rest.slice(name.length);
  const next = after.trimStart()[0];
  if (after[0] === '(' || (next === '{' && /^[A-Z]/.test(name))) {
    return destructure(line, rest, rest.indexOf(after[0] === '(' ? '(' : '{', name.length), name);
  }

  const annotation = /^\s*:(?!:)/.test(after) ? typeAnnotation(after) : null;
  if (annotation) {
    return { name, mutable: false, declarationKind: annotation, inferredType: classifyTypeText(annotation) };
  }
  return {
    name,
    mutable: false,
    declarationKind: INFERRED,
    inferredType: inferFromRightHandSide(line) ?? INFERRED,
  };
}

/**
 * Name following a declaration keyword (`fn parse`, `pub struct Config`)
 */
export function declarationName(code: string, keyword: string): string | null {
  const match = new RegExp(`\\b${keyword}\\s+([A-Za-z_][A-Za-z0-9_]*)`).exec(code);
  return match ? match[1] : null;
}

/**
 * Brace balance of a line, ignoring string and char literals
 */
export function braceDelta(code: string): number {
  let delta = 0;
  for (let i = 0; i < code.length; i++) {
    const ch = code[i];
    if (ch === '"') {
      i++;
      while (i < code.length && code[i] !== '"') {
        if (code[i] === '\\') i++;
        i++;
      }
    } else if (ch === "'" && code[i + 2] === "'") {
      i += 2;
    } else if (ch === "'" && code[i + 1] === '\\') {
      const close = code.indexOf("'", i + 2);
      if (close > 0) i = close;
    } else if (ch === '{') {
      delta++;
    } else if (ch === '}') {
      delta--;
    }
  }
  return delta;
}

interface OpenFunction {
  readonly name: string;
  /** Brace depth before the function body opened */
  readonly depth: number;
}

export class HeuristicLineScanner {
  constructor(
    private readonly filePath: string,
    private readonly collector: BindingCollector
  ) {}

  scan(content: string): void {
    const lines = content.split(/\r?\n/);
    let inBlockComment = false;
    let depth = 0;
    let pendingFunction: string | null = null;
    const functions: OpenFunction[] = [];

    lines.forEach((rawLine, index) => {
      const trimmed = rawLine.trim();

      if (inBlockComment) {
        if (trimmed.includes('*/')) inBlockComment = false;
        return;
      }
      if (trimmed.length === 0 || trimmed.startsWith('//')) return;
      if (trimmed.includes('/*') && !trimmed.includes('*/')) {
        inBlockComment = true;
        return;
      }

      const code = stripLineComment(rawLine);
      const lineNumber = index + 1;
      const fnName = declarationName(code, 'fn');
      const opensBody = code.includes('{');

      const scope =
        fnName ?? pendingFunction ?? (functions.length > 0 ? functions[functions.length - 1].name : '');

      this.scanBindings(rawLine, code, lineNumber, scope, fnName !== null);
      this.scanDeclarations(code, lineNumber);

      if (fnName && opensBody) {
        functions.push({ name: fnName, depth });
        pendingFunction = null;
      } else if (fnName && !code.includes(';')) {
        pendingFunction = fnName;
      } else if (pendingFunction && opensBody) {
        functions.push({ name: pendingFunction, depth });
        pendingFunction = null;
      } else if (pendingFunction && code.includes(';')) {
        pendingFunction = null;
      }

      depth += braceDelta(code);
      while (functions.length > 0 && depth <= functions[functions.length - 1].depth) {
        functions.pop();
      }
    });
  }

  private addBinding(
    rawLine: string,
    line: number,
    scope: string,
    name: string,
    isMutable: boolean,
    declarationKind: string,
    inferredType: string,
    basicType: string
  ): void {
    this.collector.addBinding({
      name,
      isMutable,
      location: { filePath: this.filePath, line },
      contextLine: rawLine,
      declarationKind,
      inferredType,
      basicType,
      scope,
    });
  }

  private scanBindings(rawLine: string, code: string, line: number, scope: string, isFnLine: boolean): void {
    const letMatch = /\blet\s+(mut\s+)?/.exec(code);
    const conditional = letMatch !== null && /\b(?:if|while)\s*$/.test(code.slice(0, letMatch.index));
    if (letMatch && !conditional) {
      const extracted = extractNameAndKind(code, letMatch.index + letMatch[0].length);
      if (extracted) {
        this.addBinding(
          rawLine,
          line,
          scope,
          extracted.name,
          letMatch[1] !== undefined || extracted.mutable,
          extracted.declarationKind,
          extracted.inferredType,
          basicTypeFromContext(code)
        );
      }
    }

    const forMatch = /\bfor\s+mut\s+([A-Za-z_][A-Za-z0-9_]*)/.exec(code);
    if (forMatch) {
      this.addBinding(
        rawLine,
        line,
        scope,
        forMatch[1],
        true,
        'inferred from loop',
        inferLoopElementFromLine(code),
        basicTypeFromContext(code)
      );
    }

    if (isFnLine && code.includes('mut ')) {
      const open = code.indexOf('(', code.search(/\bfn\b/));
      if (open >= 0) {
        const close = indexOfTopLevel(code, ')', open + 1);
        const parameters = code.slice(open + 1, close < 0 ? code.length : close);
        for (const parameter of findMutBindings(parameters)) {
          this.addBinding(
            rawLine,
            line,
            scope,
            parameter.name,
            true,
            parameter.annotation ? `function parameter: ${parameter.annotation}` : 'inferred parameter',
            parameter.annotation ? classifyTypeText(parameter.annotation) : 'function parameter',
            parameter.annotation ? basicTypeFromTypeText(parameter.annotation) : UNKNOWN_BASIC_TYPE
          );
        }
      }
    }

    if (PATTERN_LINE.test(code) && code.includes('mut ')) {
      const inferredType = inferPatternMatchFromLine(code);
      for (const binding of findMutBindings(code)) {
        this.addBinding(
          rawLine,
          line,
          scope,
          binding.name,
          true,
          'pattern matched',
          inferredType,
          basicTypeFromContext(code)
        );
      }
    }
  }

  private scanDeclarations(code: string, line: number): void {
    for (const [keyword, declarationType] of DECLARATION_KEYWORDS) {
      const name = declarationName(code, keyword);
      if (name) {
        this.collector.addDeclaration({
          name,
          declarationType,
          location: { filePath: this.filePath, line },
        });
      }
    }
  }
}
