/**
 * Basic type axis
 *
 * Coarse canonical type strings used for grouping (`Vec<i32>`, `&mut str`,
 * `Box(Node)`), derived from a type node, from type text, from an
 * initializer expression, or from a raw source line.
 */

import type { SyntaxNode } from '../wasm/types.js';
import { UNKNOWN } from './sentinels.js';
import {
  bindingAnnotation,
  indexOfTopLevel,
  lastPathSegment,
  rightHandSide,
  splitTopLevel,
} from './text-utils.js';

export const UNKNOWN_BASIC_TYPE = 'Unknown';
export const UNKNOWN_EXPRESSION = 'Unknown expression';

const WRAPPER_TYPES = new Set(['Box', 'Rc', 'Arc', 'Cell', 'RefCell', 'Mutex', 'RwLock']);
const PATH_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(::[A-Za-z_][A-Za-z0-9_]*)*$/;

function genericBasicType(base: string, args: readonly string[]): string {
  switch (base) {
    case 'Option':
    case 'Vec':
      return `${base}<${args[0] ?? 'T'}>`;
    case 'Result':
      return `Result<${args[0] ?? 'T'}, ${args[1] ?? 'E'}>`;
    case 'HashMap':
      return `HashMap<${args[0] ?? 'K'}, ${args[1] ?? 'V'}>`;
    default:
      return WRAPPER_TYPES.has(base) ? `${base}(${args[0] ?? 'T'})` : base;
  }
}

/**
 * Basic type of raw type text such as `Option<Vec<u8>>`
 */
export function basicTypeFromTypeText(raw: string): string {
  const typeText = raw.trim();
  if (typeText.length === 0) return UNKNOWN_BASIC_TYPE;

  if (typeText.startsWith('&')) {
    let inner = typeText.slice(1).trimStart().replace(/^'[A-Za-z_][A-Za-z0-9_]*\s+/, '');
    const mutable = /^mut\s/.test(inner);
    if (mutable) inner = inner.slice(3);
    return `&${mutable ? 'mut ' : ''}${basicTypeFromTypeText(inner)}`;
  }

  const pointer = /^\*\s*(const|mut)\s+/.exec(typeText);
  if (pointer) {
    return `*${pointer[1]} ${basicTypeFromTypeText(typeText.slice(pointer[0].length))}`;
  }

  if (typeText === '!') return 'never';

  const genericStart = typeText.indexOf('<');
  if (genericStart > 0 && typeText.endsWith('>')) {
    const base = lastPathSegment(typeText.slice(0, genericStart));
    const args = splitTopLevel(typeText.slice(genericStart + 1, -1), ',')
      .map((arg) => arg.trim())
      .filter((arg) => arg.length > 0 && !arg.startsWith("'"));
    return genericBasicType(base, args.map(basicTypeFromTypeText));
  }

  if (typeText.startsWith('[') && typeText.endsWith(']')) {
    const inner = typeText.slice(1, -1);
    const semicolon = indexOfTopLevel(inner, ';');
    if (semicolon >= 0) {
      const element = basicTypeFromTypeText(inner.slice(0, semicolon));
      return `[${element}; ${inner.slice(semicolon + 1).trim()}]`;
    }
    return `[${basicTypeFromTypeText(inner)}]`;
  }

  if (typeText.startsWith('(') && typeText.endsWith(')')) {
    const elements = splitTopLevel(typeText.slice(1, -1), ',')
      .map((part) => part.trim())
      .filter((part) => part.length > 0);
    if (elements.length === 0) return '()';
    return `(${elements.map(basicTypeFromTypeText).join(', ')})`;
  }

  if (PATH_PATTERN.test(typeText)) return lastPathSegment(typeText);
  return UNKNOWN_BASIC_TYPE;
}

/**
 * Basic type of a tree-sitter type node
 */
export function basicTypeFromTypeNode(node: SyntaxNode): string {
  switch (node.type) {
    case 'primitive_type':
    case 'type_identifier':
      return node.text;

    case 'scoped_type_identifier': {
      const name = node.childForFieldName('name');
      return name ? name.text : lastPathSegment(node.text);
    }

    case 'generic_type': {
      const baseNode = node.childForFieldName('type');
      const base = baseNode ? lastPathSegment(baseNode.text) : UNKNOWN_BASIC_TYPE;
      const list = node.childForFieldName('type_arguments');
      const args = (list ? list.namedChildren : [])
        .filter((child): child is SyntaxNode => child !== null)
        .filter((child) => child.type !== 'lifetime' && !child.type.endsWith('comment'))
        .map(basicTypeFromTypeNode);
      return genericBasicType(base, args);
    }

    case 'reference_type': {
      const inner = node.childForFieldName('type');
      const mutable = node.children.some((child) => child?.type === 'mutable_specifier');
      return `&${mutable ? 'mut ' : ''}${inner ? basicTypeFromTypeNode(inner) : UNKNOWN_BASIC_TYPE}`;
    }

    case 'pointer_type': {
      const inner = node.childForFieldName('type');
      const mutable = node.children.some((child) => child?.type === 'mutable_specifier');
      return `*${mutable ? 'mut' : 'const'} ${inner ? basicTypeFromTypeNode(inner) : UNKNOWN_BASIC_TYPE}`;
    }

    case 'array_type': {
      const element = node.childForFieldName('element');
      const length = node.childForFieldName('length');
      const elementType = element ? basicTypeFromTypeNode(element) : UNKNOWN_BASIC_TYPE;
      return length ? `[${elementType}; ${length.text}]` : `[${elementType}]`;
    }

    case 'tuple_type': {
      const elements = node.namedChildren
        .filter((child): child is SyntaxNode => child !== null)
        .map(basicTypeFromTypeNode);
      return elements.length === 0 ? '()' : `(${elements.join(', ')})`;
    }

    case 'unit_type':
      return '()';

    case 'never_type':
      return 'never';

    default:
      return UNKNOWN_BASIC_TYPE;
  }
}

/**
 * Name of the method in a call like `items.iter()` or `xs.collect::<Vec<_>>()`
 */
export function methodCallName(node: SyntaxNode): string | null {
  if (node.type !== 'call_expression') return null;
  let callee = node.childForFieldName('function');
  if (callee?.type === 'generic_function') {
    callee = callee.childForFieldName('function');
  }
  if (callee?.type !== 'field_expression') return null;
  const field = callee.childForFieldName('field');
  return field ? field.text : null;
}

/**
 * Type name of a `Type::new(..)` call, turbofish removed (`Vec::<u8>::new` -> `Vec`)
 */
export function constructorTypeName(node: SyntaxNode): string | null {
  if (node.type !== 'call_expression') return null;
  const callee = node.childForFieldName('function');
  if (!callee || !callee.text.endsWith('::new')) return null;
  const typeName = callee.text.slice(0, -'::new'.length).replace(/::<.*>$/s, '').trim();
  return typeName.length > 0 ? typeName : null;
}

function integerSuffixBasicType(literal: string): string {
  return /u(8|16|32|64|128|size)$/.test(literal) ? 'unsigned integer' : 'integer';
}

/**
 * Basic type of an initializer expression
 */
export function basicTypeFromExpression(node: SyntaxNode): string {
  switch (node.type) {
    case 'string_literal':
    case 'raw_string_literal':
      return node.text.startsWith('b') ? 'Vec<u8>' : 'String';
    case 'char_literal':
      return node.text.startsWith('b') ? 'u8' : 'char';
    case 'integer_literal':
      return integerSuffixBasicType(node.text);
    case 'float_literal':
      return 'f64';
    case 'boolean_literal':
      return 'bool';
    case 'array_expression':
      return 'Array';

    case 'call_expression': {
      const typeName = constructorTypeName(node);
      if (typeName) return `Instance of ${typeName}`;
      switch (methodCallName(node)) {
        case null:
          return 'Function call result';
        case 'iter':
          return 'Iterator';
        case 'iter_mut':
          return 'Mutable Iterator';
        case 'into_iter':
          return 'Owned Iterator';
        case 'collect':
          return 'Collection';
        default:
          return 'Method call result';
      }
    }

    case 'struct_expression':
      return 'Struct instance';
    case 'reference_expression':
      return node.children.some((child) => child?.type === 'mutable_specifier')
        ? 'Mutable reference'
        : 'Reference';
    case 'binary_expression':
      return 'Binary expression result';
    case 'match_expression':
      return 'Match result';
    case 'if_expression':
      return 'Conditional result';
    default:
      return UNKNOWN_EXPRESSION;
  }
}

/**
 * Basic type guessed from a raw source line
 */
export function basicTypeFromContext(line: string): string {
  const annotation = bindingAnnotation(line);
  if (annotation) return annotation;

  const rhs = rightHandSide(line);
  if (rhs === null) return UNKNOWN;

  if (rhs.startsWith('"')) return 'String';
  if (rhs === 'true' || rhs === 'false') return 'bool';
  if (/^\d/.test(rhs)) return /^\d[\d_]*\.\d/.test(rhs) ? 'f64' : 'i32';
  if (rhs.startsWith("'") && rhs.length >= 3) return 'char';
  if (rhs.includes('vec!') || rhs.includes('Vec::')) return 'Vec<T>';
  if (rhs.includes('Some(')) return 'Option<T>';
  return UNKNOWN;
}
