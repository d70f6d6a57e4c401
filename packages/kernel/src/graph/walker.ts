/**
 * Strata Kernel: Template Walker
 *
 * Visits scheduled nodes in order and, within each node, every expression
 * in post-order (children before parents), then the node itself. Outputs
 * come last, after every node. The type checker is built on this walk;
 * anything else that needs "each expression once, dependencies first" can
 * reuse it.
 */

import type { Entry, Expr } from '@strata/template';
import { childExprs } from '@strata/template';
import { optionExprs } from './dependencies.js';
import type {
  ConfigNode,
  GraphNode,
  MissingNode,
  ResourceNode,
  StackConfigNode,
  VariableNode,
} from './scheduler.js';

export interface TemplateVisitor {
  /** Called once per expression, after all of its children. */
  visitExpr?(expr: Expr, owner: GraphNode | Entry<Expr>): void;
  visitConfig?(node: ConfigNode): void;
  visitStackConfig?(node: StackConfigNode): void;
  visitVariable?(node: VariableNode): void;
  visitResource?(node: ResourceNode): void;
  visitMissing?(node: MissingNode): void;
  visitOutput?(output: Entry<Expr>): void;
}

/** Walk `nodes` in the given order, then `outputs`. */
export function walkTemplate(
  nodes: ReadonlyArray<GraphNode>,
  outputs: ReadonlyArray<Entry<Expr>>,
  visitor: TemplateVisitor,
): void {
  for (const node of nodes) {
    for (const expr of nodeExprs(node)) walkExpr(expr, node, visitor);
    switch (node.kind) {
      case 'config':
        visitor.visitConfig?.(node);
        break;
      case 'stackConfig':
        visitor.visitStackConfig?.(node);
        break;
      case 'variable':
        visitor.visitVariable?.(node);
        break;
      case 'resource':
        visitor.visitResource?.(node);
        break;
      case 'missing':
        visitor.visitMissing?.(node);
        break;
    }
  }
  for (const output of outputs) {
    walkExpr(output.value, output, visitor);
    visitor.visitOutput?.(output);
  }
}

/** Post-order walk of a single expression tree. */
export function walkExpr(
  expr: Expr,
  owner: GraphNode | Entry<Expr>,
  visitor: TemplateVisitor,
): void {
  for (const child of childExprs(expr)) walkExpr(child, owner, visitor);
  visitor.visitExpr?.(expr, owner);
}

/** Top-level expressions a node owns, in source order. */
function nodeExprs(node: GraphNode): Expr[] {
  switch (node.kind) {
    case 'config':
      return node.decl.default !== undefined ? [node.decl.default] : [];
    case 'variable':
      return [node.value];
    case 'resource': {
      const { decl } = node;
      const out: Expr[] = decl.properties.map((p) => p.value);
      out.push(...optionExprs(decl.options));
      if (decl.get !== undefined) {
        out.push(decl.get.id, ...decl.get.state.map((s) => s.value));
      }
      return out;
    }
    case 'stackConfig':
    case 'missing':
      return [];
  }
}
