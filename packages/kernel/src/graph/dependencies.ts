/**
 * Strata Kernel: Dependency Extraction
 *
 * A declaration depends on every name its expressions reference. The
 * extractor walks an expression tree and records the root name of every
 * property access it finds, in source order, as a StringExpr carrying the
 * range of the referencing expression so cycle and missing-name
 * diagnostics point at the reference rather than the declaration.
 */

import type {
  Expr,
  PropertyAccess,
  ResourceDecl,
  ResourceOptionsDecl,
  StringExpr,
} from '@strata/template';
import { RESOURCE_OPTION_NAMES, childExprs, rootName } from '@strata/template';

/** Append the names referenced anywhere inside `expr` to `out`. */
export function collectDependencies(expr: Expr | undefined, out: StringExpr[]): void {
  if (expr === undefined) return;
  switch (expr.kind) {
    case 'symbol':
      out.push(reference(expr.property, expr));
      return;
    case 'interpolate':
      for (const part of expr.parts) {
        if (part.value !== undefined) out.push(reference(part.value, expr));
      }
      return;
    default:
      for (const child of childExprs(expr)) collectDependencies(child, out);
  }
}

export function expressionDependencies(expr: Expr | undefined): StringExpr[] {
  const out: StringExpr[] = [];
  collectDependencies(expr, out);
  return out;
}

/**
 * Names a resource depends on: its properties, every option (explicit
 * edges such as `dependsOn` and `parent` included) and its `get` block.
 */
export function resourceDependencies(resource: ResourceDecl): StringExpr[] {
  const out: StringExpr[] = [];
  for (const property of resource.properties) collectDependencies(property.value, out);
  for (const option of optionExprs(resource.options)) collectDependencies(option, out);
  if (resource.get !== undefined) {
    collectDependencies(resource.get.id, out);
    for (const state of resource.get.state) collectDependencies(state.value, out);
  }
  return out;
}

/** Every expression held by a resource's options, in declaration order. */
export function optionExprs(options: ResourceOptionsDecl): Expr[] {
  const out: Expr[] = [];
  for (const name of RESOURCE_OPTION_NAMES) {
    if (name === 'customTimeouts') {
      const timeouts = options.customTimeouts;
      if (timeouts === undefined) continue;
      for (const t of [timeouts.create, timeouts.update, timeouts.delete]) {
        if (t !== undefined) out.push(t);
      }
      continue;
    }
    const value = options[name];
    if (value !== undefined) out.push(value);
  }
  return out;
}

function reference(access: PropertyAccess, at: Expr): StringExpr {
  const name = rootName(access);
  return at.range === undefined
    ? { kind: 'string', value: name }
    : { kind: 'string', value: name, range: at.range };
}
