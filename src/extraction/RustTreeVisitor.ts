/**
 * Rust Tree Visitor
 *
 * Walks a tree-sitter-rust syntax tree and emits binding and declaration
 * records into a {@link BindingCollector}. Every node is classified into a
 * {@link VisitTarget} and dispatched through one switch; the enclosing
 * function name travels down the recursion as `scope`.
 */

import type { BindingCollector } from '../base/BindingCollector.js';
import type { BindingDraft, DeclarationType } from '../base/BindingTypes.js';
import type { SyntaxNode } from '../wasm/types.js';
import {
  basicTypeFromContext,
  basicTypeFromExpression,
  basicTypeFromTypeNode,
} from '../type-inference/BasicTypeExtractor.js';
import { inferPatternMatchType } from '../type-inference/ContextInferencer.js';
import { inferExpressionType, inferLoopElementType } from '../type-inference/ExpressionInferencer.js';
import { INFERRED, UNKNOWN } from '../type-inference/sentinels.js';
import { classifyTypeNode } from '../type-inference/TypeClassifier.js';
import type { LineLocator } from './LineLocator.js';
import { boundIdentifier, decomposePattern, type PatternSite } from './PatternDecomposer.js';
import { findMutBindings } from './mut-bindings.js';

export type VisitTarget =
  | { kind: 'let'; node: SyntaxNode }
  | { kind: 'fnArgs'; node: SyntaxNode }
  | { kind: 'forLoop'; node: SyntaxNode }
  | { kind: 'ifLet'; node: SyntaxNode; keyword: 'if' | 'while' }
  | { kind: 'fnItem'; node: SyntaxNode }
  | { kind: 'structItem'; node: SyntaxNode }
  | { kind: 'enumItem'; node: SyntaxNode }
  | { kind: 'other'; node: SyntaxNode };

export function classifyNode(node: SyntaxNode): VisitTarget {
  switch (node.type) {
    case 'let_declaration':
      return { kind: 'let', node };
    case 'parameters':
      return { kind: 'fnArgs', node };
    case 'for_expression':
      return { kind: 'forLoop', node };
    case 'if_expression':
    case 'if_let_expression':
      return { kind: 'ifLet', node, keyword: 'if' };
    case 'while_expression':
    case 'while_let_expression':
      return { kind: 'ifLet', node, keyword: 'while' };
    case 'function_item':
      return { kind: 'fnItem', node };
    case 'struct_item':
      return { kind: 'structItem', node };
    case 'enum_item':
      return { kind: 'enumItem', node };
    default:
      return { kind: 'other', node };
  }
}

function hasMutableSpecifier(node: SyntaxNode): boolean {
  return node.children.some((child) => child?.type === 'mutable_specifier');
}

/**
 * `let` conditions of an if / while expression; the legacy `if_let_expression`
 * shape carries pattern and value on the node itself
 */
function letConditions(node: SyntaxNode): SyntaxNode[] {
  if (node.type === 'if_let_expression' || node.type === 'while_let_expression') return [node];
  const condition = node.childForFieldName('condition');
  if (!condition) return [];
  if (condition.type === 'let_condition') return [condition];
  if (condition.type === 'let_chain') {
    return condition.namedChildren.filter(
      (child): child is SyntaxNode => child !== null && child.type === 'let_condition'
    );
  }
  return [];
}

export class RustTreeVisitor {
  constructor(
    private readonly filePath: string,
    private readonly lines: readonly string[],
    private readonly locator: LineLocator,
    private readonly collector: BindingCollector
  ) {}

  visit(root: SyntaxNode): void {
    this.visitNode(root, '');
  }

  private visitNode(node: SyntaxNode, scope: string): void {
    const target = classifyNode(node);
    let childScope = scope;

    switch (target.kind) {
      case 'let':
        this.visitLet(target.node, scope);
        break;
      case 'fnArgs':
        this.visitParameters(target.node, scope);
        break;
      case 'forLoop':
        this.visitForLoop(target.node, scope);
        break;
      case 'ifLet':
        this.visitConditionalLet(target.node, target.keyword, scope);
        break;
      case 'fnItem':
        childScope = this.declare(target.node, 'function') ?? scope;
        break;
      case 'structItem':
        this.declare(target.node, 'struct');
        break;
      case 'enumItem':
        this.declare(target.node, 'enum');
        break;
      case 'other':
        break;
    }

    for (const child of node.namedChildren) {
      if (child) this.visitNode(child, childScope);
    }
  }

  private site(node: SyntaxNode): PatternSite {
    const line = this.locator.locate(node);
    return {
      location: { filePath: this.filePath, line },
      contextLine: this.lines[line - 1] ?? UNKNOWN,
    };
  }

  private add(draft: BindingDraft, scope: string): void {
    this.collector.addBinding({ ...draft, scope });
  }

  private declare(node: SyntaxNode, declarationType: DeclarationType): string | null {
    const name = node.childForFieldName('name')?.text;
    if (!name) return null;
    this.collector.addDeclaration({
      name,
      declarationType,
      location: this.site(node).location,
    });
    return name;
  }

  private visitLet(node: SyntaxNode, scope: string): void {
    const pattern = node.childForFieldName('pattern');
    if (!pattern) return;

    const site = this.site(node);
    const declaredType = node.childForFieldName('type');
    const mutable = hasMutableSpecifier(node);

    if (pattern.type === 'identifier' && !declaredType) {
      const value = node.childForFieldName('value');
      this.add(
        {
          name: pattern.text,
          isMutable: mutable,
          location: site.location,
          contextLine: site.contextLine,
          declarationKind: 'inferred from initialization',
          inferredType: value ? inferExpressionType(value) : INFERRED,
          basicType: value ? basicTypeFromExpression(value) : basicTypeFromContext(site.contextLine),
        },
        scope
      );
      return;
    }

    for (const draft of decomposePattern(pattern, declaredType, site, mutable)) {
      this.add(draft, scope);
    }
  }

  /**
   * Only mutable identifier parameters are recorded
   */
  private visitParameters(node: SyntaxNode, scope: string): void {
    for (const parameter of node.namedChildren) {
      if (parameter?.type !== 'parameter') continue;

      const pattern = parameter.childForFieldName('pattern');
      const typeNode = parameter.childForFieldName('type');
      const bound = pattern ? boundIdentifier(pattern) : null;
      if (!bound || !typeNode) continue;
      if (!bound.mutable && !hasMutableSpecifier(parameter)) continue;

      const site = this.site(parameter);
      this.add(
        {
          name: bound.name,
          isMutable: true,
          location: site.location,
          contextLine: site.contextLine,
          declarationKind: `function parameter: ${typeNode.text}`,
          inferredType: classifyTypeNode(typeNode),
          basicType: basicTypeFromTypeNode(typeNode),
        },
        scope
      );
    }
  }

  private visitForLoop(node: SyntaxNode, scope: string): void {
    const pattern = node.childForFieldName('pattern');
    const iterable = node.childForFieldName('value');
    if (!pattern) return;

    const site = this.site(pattern);
    const bound = boundIdentifier(pattern);
    if (!bound) {
      for (const draft of decomposePattern(pattern, null, site)) {
        this.add(draft, scope);
      }
      return;
    }

    this.add(
      {
        name: bound.name,
        isMutable: bound.mutable,
        location: site.location,
        contextLine: site.contextLine,
        declarationKind: 'for loop variable',
        inferredType: iterable ? inferLoopElementType(iterable) : 'collection element',
        basicType: iterable ? basicTypeFromExpression(iterable) : UNKNOWN,
      },
      scope
    );
  }

  /**
   * Text-level scan of each `let` condition for `mut <name>`
   */
  private visitConditionalLet(node: SyntaxNode, keyword: 'if' | 'while', scope: string): void {
    for (const condition of letConditions(node)) {
      const pattern = condition.childForFieldName('pattern');
      if (!pattern) continue;

      const site = this.site(condition);
      const inferredType = inferPatternMatchType(pattern.text);
      for (const binding of findMutBindings(pattern.text)) {
        this.add(
          {
            name: binding.name,
            isMutable: true,
            location: site.location,
            contextLine: site.contextLine,
            declarationKind: `${keyword}-let pattern`,
            inferredType,
            basicType: basicTypeFromContext(site.contextLine),
          },
          scope
        );
      }
    }
  }
}
