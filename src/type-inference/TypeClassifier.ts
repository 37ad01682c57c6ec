/**
 * Type Classifier
 *
 * Maps a type, given as raw text or as a tree-sitter type node, to a
 * human-readable label:
 *
 *   &mut Vec<i32>          -> mutable reference to vector of integer (i32)
 *   HashMap<String, bool>  -> map from owned string to boolean
 *   [u8; 4]                -> array of unsigned integer (u8) with size 4
 *
 * Unrecognized types are returned unchanged. Classification never fails.
 */

import type { SyntaxNode } from '../wasm/types.js';
import { INFERRED } from './sentinels.js';
import { indexOfTopLevel, lastPathSegment, splitTopLevel } from './text-utils.js';

const SIGNED_INTEGERS = new Set(['i8', 'i16', 'i32', 'i64', 'i128', 'isize']);
const UNSIGNED_INTEGERS = new Set(['u8', 'u16', 'u32', 'u64', 'u128', 'usize']);
const FLOATS = new Set(['f32', 'f64']);

const MAP_TYPES = new Set(['HashMap', 'BTreeMap']);
const SET_TYPES = new Set(['HashSet', 'BTreeSet']);

/** Node kinds that can appear in a type argument list without being a type */
const NON_TYPE_ARGUMENTS = new Set(['lifetime', 'line_comment', 'block_comment', 'type_binding']);

/**
 * Label for a primitive or well-known scalar type, or the name unchanged
 */
export function primitiveLabel(name: string): string {
  if (SIGNED_INTEGERS.has(name)) return `integer (${name})`;
  if (UNSIGNED_INTEGERS.has(name)) return `unsigned integer (${name})`;
  if (FLOATS.has(name)) return `floating-point (${name})`;
  switch (name) {
    case 'bool':
      return 'boolean';
    case 'char':
      return 'character';
    case 'String':
      return 'owned string';
    case 'str':
      return 'string slice';
    default:
      return name;
  }
}

/**
 * Label for a generic instantiation whose arguments are already classified.
 * Returns null for generics without a dedicated label.
 */
export function genericLabel(base: string, args: readonly string[]): string | null {
  if (base === 'Vec' && args.length >= 1) return `vector of ${args[0]}`;
  if (base === 'Option' && args.length >= 1) return `optional ${args[0]}`;
  if (base === 'Result') {
    if (args.length >= 2) return `result with Ok(${args[0]}) or Err(${args[1]})`;
    if (args.length === 1) return `result of ${args[0]}`;
  }
  if (MAP_TYPES.has(base)) {
    return args.length >= 2 ? `map from ${args[0]} to ${args[1]}` : 'map';
  }
  if (SET_TYPES.has(base) && args.length >= 1) return `set of ${args[0]}`;
  return null;
}

function stripLifetime(text: string): string {
  const match = /^'[A-Za-z_][A-Za-z0-9_]*\s+/.exec(text);
  return match ? text.slice(match[0].length) : text;
}

/**
 * Classify raw type text such as `Option<&str>`
 */
export function classifyTypeText(raw: string): string {
  const typeText = raw.trim();
  if (typeText.length === 0 || typeText === INFERRED) return INFERRED;

  if (typeText.startsWith('&')) {
    let inner = stripLifetime(typeText.slice(1).trimStart());
    const mutable = /^mut\s/.test(inner);
    if (mutable) inner = inner.slice(3);
    const prefix = mutable ? 'mutable reference to' : 'reference to';
    return `${prefix} ${classifyTypeText(inner)}`;
  }

  const genericStart = typeText.indexOf('<');
  if (genericStart > 0 && typeText.endsWith('>')) {
    const base = lastPathSegment(typeText.slice(0, genericStart));
    const args = splitTopLevel(typeText.slice(genericStart + 1, -1), ',')
      .map((arg) => arg.trim())
      .filter((arg) => arg.length > 0 && !arg.startsWith("'"));
    return genericLabel(base, args.map(classifyTypeText)) ?? typeText;
  }

  if (typeText.startsWith('[') && typeText.endsWith(']')) {
    const inner = typeText.slice(1, -1);
    const semicolon = indexOfTopLevel(inner, ';');
    if (semicolon >= 0) {
      const element = classifyTypeText(inner.slice(0, semicolon));
      return `array of ${element} with size ${inner.slice(semicolon + 1).trim()}`;
    }
    return `slice of ${classifyTypeText(inner)}`;
  }

  if (typeText.startsWith('(') && typeText.endsWith(')')) {
    const elements = splitTopLevel(typeText.slice(1, -1), ',')
      .map((part) => part.trim())
      .filter((part) => part.length > 0);
    if (elements.length === 0) return 'unit type ()';
    return `tuple of (${elements.map(classifyTypeText).join(', ')})`;
  }

  return primitiveLabel(typeText);
}

function typeArguments(node: SyntaxNode): SyntaxNode[] {
  const list = node.childForFieldName('type_arguments');
  if (!list) return [];
  return list.namedChildren.filter(
    (child): child is SyntaxNode => child !== null && !NON_TYPE_ARGUMENTS.has(child.type)
  );
}

function hasMutableSpecifier(node: SyntaxNode): boolean {
  return node.children.some((child) => child?.type === 'mutable_specifier');
}

/**
 * Classify a tree-sitter type node. Shapes without structural handling
 * go through the text classifier.
 */
export function classifyTypeNode(node: SyntaxNode): string {
  switch (node.type) {
    case 'primitive_type':
    case 'type_identifier':
      return primitiveLabel(node.text);

    case 'reference_type': {
      const inner = node.childForFieldName('type');
      const prefix = hasMutableSpecifier(node) ? 'mutable reference to' : 'reference to';
      return `${prefix} ${inner ? classifyTypeNode(inner) : INFERRED}`;
    }

    case 'generic_type': {
      const baseNode = node.childForFieldName('type');
      const base = baseNode ? lastPathSegment(baseNode.text) : '';
      const label = genericLabel(base, typeArguments(node).map(classifyTypeNode));
      return label ?? node.text;
    }

    case 'array_type': {
      const element = node.childForFieldName('element');
      const length = node.childForFieldName('length');
      const elementLabel = element ? classifyTypeNode(element) : INFERRED;
      return length
        ? `array of ${elementLabel} with size ${length.text}`
        : `slice of ${elementLabel}`;
    }

    case 'unit_type':
      return 'unit type ()';

    case 'tuple_type': {
      const elements = node.namedChildren.filter(
        (child): child is SyntaxNode => child !== null && !NON_TYPE_ARGUMENTS.has(child.type)
      );
      if (elements.length === 0) return 'unit type ()';
      return `tuple of (${elements.map(classifyTypeNode).join(', ')})`;
    }

    default:
      return classifyTypeText(node.text);
  }
}
