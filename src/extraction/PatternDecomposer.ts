/**
 * Pattern Decomposer
 *
 * Splits a binding pattern into one draft record per bound identifier.
 * A declared type, when present, is carried down positionally through
 * tuple patterns and unwrapped through reference patterns.
 *
 * Or-patterns only bind their first alternative. Pattern kinds without
 * a rule below produce no records.
 */

import type { BindingDraft, SourceLocation } from '../base/BindingTypes.js';
import type { SyntaxNode } from '../wasm/types.js';
import { basicTypeFromContext, basicTypeFromTypeNode } from '../type-inference/BasicTypeExtractor.js';
import { inferFromContext } from '../type-inference/ContextInferencer.js';
import { classifyTypeNode } from '../type-inference/TypeClassifier.js';
import { lastPathSegment } from '../type-inference/text-utils.js';

/**
 * Where the pattern sits in the file
 */
export interface PatternSite {
  readonly location: SourceLocation;
  readonly contextLine: string;
}

interface BoundIdentifier {
  name: string;
  mutable: boolean;
}

const WRAPPER_HINTS: Record<string, string> = {
  Some: 'optional value',
  Ok: 'success value',
  Err: 'error value',
};

const SKIPPED_CHILDREN = new Set(['line_comment', 'block_comment']);

function patternChildren(node: SyntaxNode): SyntaxNode[] {
  return node.namedChildren.filter(
    (child): child is SyntaxNode => child !== null && !SKIPPED_CHILDREN.has(child.type)
  );
}

function hasMutableSpecifier(node: SyntaxNode): boolean {
  return node.children.some((child) => child?.type === 'mutable_specifier');
}

/**
 * Identifier bound by `x`, `mut x`, `ref x` or `ref mut x`; null for anything else
 */
export function boundIdentifier(node: SyntaxNode): BoundIdentifier | null {
  switch (node.type) {
    case 'identifier':
      return { name: node.text, mutable: false };
    case 'mut_pattern': {
      const inner = patternChildren(node).find((child) => child.type !== 'mutable_specifier');
      const bound = inner ? boundIdentifier(inner) : null;
      return bound ? { name: bound.name, mutable: true } : null;
    }
    case 'ref_pattern': {
      const inner = patternChildren(node)[0];
      return inner ? boundIdentifier(inner) : null;
    }
    default:
      return null;
  }
}

/**
 * Decompose `pattern` into draft records
 *
 * @param declaredType - Type annotation that applies to the whole pattern
 * @param inheritedMutable - Mutability imposed from outside (`let mut`, `&mut` patterns)
 */
export function decomposePattern(
  pattern: SyntaxNode,
  declaredType: SyntaxNode | null,
  site: PatternSite,
  inheritedMutable = false
): BindingDraft[] {
  const drafts: BindingDraft[] = [];

  const emit = (
    name: string,
    isMutable: boolean,
    declarationKind: string,
    inferredType: string,
    basicType: string
  ): void => {
    if (name.length === 0) return;
    drafts.push({
      name,
      isMutable,
      location: site.location,
      contextLine: site.contextLine,
      declarationKind,
      inferredType,
      basicType,
    });
  };

  const contextType = (): string => inferFromContext(site.contextLine);
  const contextBasicType = (): string => basicTypeFromContext(site.contextLine);

  const walk = (node: SyntaxNode, typeNode: SyntaxNode | null, mutable: boolean): void => {
    switch (node.type) {
      case 'identifier':
      case 'mut_pattern':
      case 'ref_pattern': {
        const bound = boundIdentifier(node);
        if (!bound) return;
        if (typeNode) {
          emit(
            bound.name,
            bound.mutable || mutable,
            'explicitly typed pattern',
            classifyTypeNode(typeNode),
            basicTypeFromTypeNode(typeNode)
          );
        } else {
          emit(bound.name, bound.mutable || mutable, 'pattern match', contextType(), contextBasicType());
        }
        return;
      }

      case 'captured_pattern': {
        // `name @ subpattern` binds `name` only
        const first = patternChildren(node)[0];
        if (first) walk(first, typeNode, mutable);
        return;
      }

      case 'tuple_pattern': {
        const components = typeNode?.type === 'tuple_type' ? patternChildren(typeNode) : [];
        patternChildren(node).forEach((element, index) => {
          walk(element, components[index] ?? null, mutable);
        });
        return;
      }

      case 'tuple_struct_pattern': {
        // first named child is the variant path
        const [variantNode, ...elements] = patternChildren(node);
        const variant = variantNode ? lastPathSegment(variantNode.text) : '';
        const hint: string | undefined = WRAPPER_HINTS[variant];
        for (const element of elements) {
          const bound = boundIdentifier(element);
          if (bound) {
            emit(
              bound.name,
              bound.mutable || mutable,
              `destructured from ${variant}`,
              hint ?? contextType(),
              contextBasicType()
            );
          } else {
            walk(element, null, mutable);
          }
        }
        return;
      }

      case 'struct_pattern': {
        const [structNode, ...fields] = patternChildren(node);
        const structName = structNode ? lastPathSegment(structNode.text) : '';
        for (const field of fields) {
          if (field.type !== 'field_pattern') continue;
          const fieldName = field.childForFieldName('name')?.text ?? '';
          const subpattern = field.childForFieldName('pattern');

          const bound: BoundIdentifier | null = subpattern
            ? boundIdentifier(subpattern)
            : { name: fieldName, mutable: hasMutableSpecifier(field) };

          if (bound) {
            emit(
              bound.name,
              bound.mutable || mutable,
              `destructured from struct ${structName}`,
              `field '${fieldName}' of ${structName}`,
              contextBasicType()
            );
          } else if (subpattern) {
            walk(subpattern, null, mutable);
          }
        }
        return;
      }

      case 'reference_pattern': {
        const refMutable = hasMutableSpecifier(node);
        const inner = patternChildren(node).find((child) => child.type !== 'mutable_specifier');
        if (!inner) return;
        const innerType = typeNode?.type === 'reference_type' ? typeNode.childForFieldName('type') : null;

        const bound = boundIdentifier(inner);
        if (bound) {
          const prefix = refMutable ? 'mutable reference to' : 'reference to';
          const base = innerType ? classifyTypeNode(innerType) : contextType();
          emit(
            bound.name,
            bound.mutable || refMutable || mutable,
            'reference pattern',
            `${prefix} ${base}`,
            typeNode ? basicTypeFromTypeNode(typeNode) : contextBasicType()
          );
        } else {
          walk(inner, innerType, mutable || refMutable);
        }
        return;
      }

      case 'slice_pattern': {
        for (const element of patternChildren(node)) {
          if (element.type === 'remaining_field_pattern') continue;

          const parts = element.type === 'captured_pattern' ? patternChildren(element) : [];
          if (parts.length === 2 && parts[1].type === 'remaining_field_pattern') {
            const rest = boundIdentifier(parts[0]);
            if (rest) {
              emit(rest.name, rest.mutable || mutable, 'slice pattern', 'remaining slice elements', contextBasicType());
            }
            continue;
          }

          const bound = boundIdentifier(element);
          if (bound) {
            emit(bound.name, bound.mutable || mutable, 'slice pattern', 'slice element', contextBasicType());
          } else {
            walk(element, null, mutable);
          }
        }
        return;
      }

      case 'or_pattern': {
        const first = patternChildren(node)[0];
        if (first) walk(first, typeNode, mutable);
        return;
      }

      case 'parameter': {
        const inner = node.childForFieldName('pattern');
        if (inner) walk(inner, node.childForFieldName('type'), mutable);
        return;
      }

      default:
        return;
    }
  };

  walk(pattern, declaredType, inheritedMutable);
  return drafts;
}
