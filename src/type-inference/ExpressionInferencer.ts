/**
 * Expression-type inferencer for tree-sitter expression nodes
 */

import type { SyntaxNode } from '../wasm/types.js';
import { constructorTypeName, methodCallName } from './BasicTypeExtractor.js';

const ARITHMETIC_OPERATORS = new Set(['+', '-', '*', '/', '%']);
const BOOLEAN_OPERATORS = new Set(['&&', '||', '==', '!=', '<', '<=', '>', '>=']);
const BITWISE_OPERATORS = new Set(['&', '|', '^', '<<', '>>']);

const INTEGER_SUFFIX = /(i8|i16|i32|i64|i128|isize|u8|u16|u32|u64|u128|usize)$/;

const CONSTRUCTOR_LABELS: Record<string, string> = {
  Vec: 'vector',
  String: 'string',
  HashMap: 'hash map',
  BTreeMap: 'tree map',
};

const METHOD_LABELS: Record<string, string> = {
  iter: 'iterator',
  iter_mut: 'mutable iterator',
  into_iter: 'owned iterator',
  collect: 'collection',
  map: 'mapped iterator',
  filter: 'filtered iterator',
  unwrap: 'unwrapped value',
  expect: 'unwrapped value',
  clone: 'cloned value',
  to_string: 'string',
};

function integerLiteralLabel(text: string): string {
  const suffix = INTEGER_SUFFIX.exec(text);
  if (!suffix) return 'integer';
  return suffix[1].startsWith('u') ? `unsigned integer (${suffix[1]})` : `integer (${suffix[1]})`;
}

function floatLiteralLabel(text: string): string {
  const suffix = /(f32|f64)$/.exec(text);
  return suffix ? `floating-point (${suffix[1]})` : 'floating-point';
}

function binaryOperatorLabel(node: SyntaxNode): string {
  const operator = node.childForFieldName('operator')?.text ?? '';
  if (ARITHMETIC_OPERATORS.has(operator)) return 'numeric';
  if (BOOLEAN_OPERATORS.has(operator)) return 'boolean';
  if (BITWISE_OPERATORS.has(operator)) return 'integer';
  return 'expression result';
}

function callLabel(node: SyntaxNode): string {
  const typeName = constructorTypeName(node);
  if (typeName) {
    const base = typeName.split('::').pop() ?? typeName;
    return CONSTRUCTOR_LABELS[base] ?? `${typeName} instance`;
  }
  const method = methodCallName(node);
  if (method === null) return 'function result';
  return METHOD_LABELS[method] ?? 'method result';
}

/**
 * Descriptive label of an initializer expression
 */
export function inferExpressionType(node: SyntaxNode): string {
  switch (node.type) {
    case 'string_literal':
    case 'raw_string_literal':
      return node.text.startsWith('b') ? 'byte string' : 'string';
    case 'char_literal':
      return node.text.startsWith('b') ? 'byte' : 'character';
    case 'integer_literal':
      return integerLiteralLabel(node.text);
    case 'float_literal':
      return floatLiteralLabel(node.text);
    case 'boolean_literal':
      return 'boolean';
    case 'array_expression':
      return 'array';
    case 'call_expression':
      return callLabel(node);
    case 'struct_expression':
      return node.childForFieldName('name')?.text ?? 'expression result';
    case 'reference_expression':
      return node.children.some((child) => child?.type === 'mutable_specifier')
        ? 'mutable reference'
        : 'reference';
    case 'binary_expression':
      return binaryOperatorLabel(node);
    case 'match_expression':
      return 'match result';
    case 'if_expression':
      return 'conditional result';

    case 'macro_invocation': {
      const name = node.childForFieldName('macro')?.text;
      if (name === 'vec') return 'vector';
      if (name === 'format') return 'string';
      return 'expression result';
    }

    case 'unary_expression': {
      const operand = node.namedChildren.find((child) => child !== null);
      const negated = node.children[0]?.text === '-';
      if (negated && operand && (operand.type === 'integer_literal' || operand.type === 'float_literal')) {
        return inferExpressionType(operand);
      }
      return 'expression result';
    }

    default:
      return 'expression result';
  }
}

/**
 * Element label of the value a `for` loop iterates over
 */
export function inferLoopElementType(iterable: SyntaxNode): string {
  if (iterable.type === 'range_expression') return 'integer (range)';
  switch (methodCallName(iterable)) {
    case 'iter':
      return 'reference to collection element';
    case 'iter_mut':
      return 'mutable reference to collection element';
    case 'into_iter':
      return 'owned collection element';
    default:
      return 'collection element';
  }
}
