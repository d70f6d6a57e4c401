/**
 * Strata Kernel: Assignability
 *
 * Decides whether a value of one type may be used where another is
 * expected. Success is `undefined`; failure is a NotAssignable chain that
 * explains the mismatch down to the offending property.
 *
 * Rules, applied after stripping optional and input wrappers:
 *
 *   invalid on either side      always assignable (already reported)
 *   Union as source             every branch must be assignable
 *   Union as destination        any one branch suffices
 *   token as either side        acts as its underlying type (default any)
 *   any as destination          accepts everything
 *   number / integer            accept each other
 *   string                      also accepts number, integer, boolean, resources
 *   asset                       also accepts archive
 *   List / Map                  element-wise; Map also accepts an object
 *   resource                    exact token, or any resource for an empty token
 *   enum                        element type, then literal values
 *   object                      structural: required present, no extras
 *
 * Anything else is an internal error: a gap in the checker, not a mistake
 * in the template.
 */

import type { Expr, ObjectProperty } from '@strata/template';
import { NonExistentFieldFormatter } from '@strata/template';
import {
  AnyType,
  displayType,
  findProperty,
  isPrimitive,
  isRequired,
  unwrapType,
} from '../schema/types.js';
import type { EnumType, ObjectType, PrimitiveType, Type } from '../schema/types.js';
import { NotAssignable } from './not-assignable.js';

/** `type 'string'` for primitives, `'aws:s3:Bucket'` for everything else. */
export function dispType(t: Type): string {
  const prefix = isPrimitive(unwrapType(t)) ? 'type ' : '';
  return `${prefix}'${displayType(t)}'`;
}

export type TypeLookup = (expr: Expr) => Type | undefined;

export class Assignability {
  /**
   * @param typeOf - Types already assigned to expressions. Used to point
   *   failures inside object literals at the entry that caused them.
   */
  constructor(private readonly typeOf: TypeLookup = () => undefined) {}

  /**
   * Check that a value of type `from`, produced by `fromExpr` when known,
   * may be assigned to `to`.
   */
  check(fromExpr: Expr | undefined, from: Type, to: Type): NotAssignable | undefined {
    const f = unwrapType(from);
    const t = unwrapType(to);
    if (f.kind === 'invalid' || t.kind === 'invalid') return undefined;

    const fail = new NotAssignable({
      reason: `Cannot assign ${dispType(from)} to ${dispType(to)}`,
      ...(fromExpr?.range !== undefined ? { range: fromExpr.range } : {}),
    });

    if (f.kind === 'union') {
      const failures = collect(f.elements.map((e) => this.check(fromExpr, e, t)));
      return failures.length === 0 ? undefined : fail.withBecause(...failures);
    }
    if (f.kind === 'token') {
      const inner = this.check(fromExpr, f.underlying ?? AnyType, t);
      return inner?.withReason(
        `. '${displayType(f)}' is a Token Type. Token types act like their underlying type`,
      );
    }
    if (f.kind === 'primitive' && f.name === 'any') return undefined;

    switch (t.kind) {
      case 'primitive':
        return primitiveAccepts(t, f) ? undefined : fail;
      case 'union': {
        const failures: NotAssignable[] = [];
        for (const branch of t.elements) {
          const result = this.check(fromExpr, f, branch);
          if (result === undefined) return undefined;
          failures.push(result);
        }
        return fail.withBecause(...failures);
      }
      case 'array': {
        if (f.kind !== 'array') return fail;
        const inner = this.check(undefined, f.element, t.element);
        return inner === undefined ? undefined : fail.withBecause(inner);
      }
      case 'map':
        if (f.kind === 'map') {
          const inner = this.check(undefined, f.element, t.element);
          return inner === undefined ? undefined : fail.withBecause(inner);
        }
        if (f.kind === 'object') {
          const failures: NotAssignable[] = [];
          for (const p of f.properties) {
            const entry = entryFor(fromExpr, p.name);
            const inner = this.check(entry?.value, p.type, t.element);
            if (inner !== undefined) failures.push(inner.withProperty(p.name));
          }
          return failures.length === 0 ? undefined : fail.withBecause(...failures);
        }
        return fail;
      case 'resource':
        if (f.kind === 'resource' && (t.token === '' || f.token === t.token)) return undefined;
        return fail;
      case 'enum':
        return this.checkEnum(fromExpr, f, t, fail);
      case 'object':
        return this.checkObject(fromExpr, f, t, to, fail);
      case 'token':
        return this.check(fromExpr, from, t.underlying ?? AnyType);
      default:
        return new NotAssignable({ reason: 'Unknown type', internal: true }).withRange(
          fromExpr?.range,
        );
    }
  }

  private checkEnum(
    fromExpr: Expr | undefined,
    from: Type,
    to: EnumType,
    fail: NotAssignable,
  ): NotAssignable | undefined {
    const element = this.check(fromExpr, from, to.element);
    if (element !== undefined) return fail.withBecause(element);
    if (
      fromExpr === undefined ||
      (fromExpr.kind !== 'string' && fromExpr.kind !== 'number' && fromExpr.kind !== 'boolean')
    ) {
      return undefined;
    }

    const literal = fromExpr.value;
    const mismatched = to.values.find((v) => typeof v.value !== typeof literal);
    if (mismatched !== undefined) {
      return fail.withBecause(
        new NotAssignable({
          reason: `schema enum value was type ${typeof mismatched.value} but a ${typeof literal} was expected`,
          internal: true,
        }),
      );
    }
    if (to.values.some((v) => v.value === literal)) return undefined;

    const allowed = to.values.map((v) => {
      const rendered = typeof v.value === 'string' ? `"${v.value}"` : String(v.value);
      return v.name !== undefined && v.name !== String(v.value) ? `${v.name} (${rendered})` : rendered;
    });
    return fail.withBecause(
      new NotAssignable({ reason: `Allowed values are ${allowed.join(', ')}` }).withRange(
        fromExpr.range,
      ),
    );
  }

  private checkObject(
    fromExpr: Expr | undefined,
    from: Type,
    to: ObjectType,
    declaredTo: Type,
    fail: NotAssignable,
  ): NotAssignable | undefined {
    const failures: NotAssignable[] = [];

    if (from.kind === 'map') {
      for (const p of to.properties) {
        const inner = this.check(undefined, from.element, p.type);
        if (inner !== undefined) failures.push(inner.withProperty(p.name).withRange(fromExpr?.range));
      }
    } else if (from.kind === 'object') {
      for (const p of to.properties) {
        const source = findProperty(from.properties, p.name);
        if (source === undefined) {
          if (isRequired(p)) {
            failures.push(
              new NotAssignable({
                reason: `Missing required property '${p.name}'`,
                summary: `Missing required property '${p.name}'`,
              }).withRange(fromExpr?.range),
            );
          }
          continue;
        }
        const entry = entryFor(fromExpr, p.name);
        const sourceType = entry !== undefined ? this.typeOf(entry.value) ?? source.type : source.type;
        const inner = this.check(entry?.value, sourceType, p.type);
        if (inner !== undefined) {
          failures.push(inner.withProperty(p.name).withRange(entry?.value.range ?? fromExpr?.range));
        }
      }

      const formatter = new NonExistentFieldFormatter({
        parentLabel: dispType(declaredTo),
        fields: to.properties.map((p) => p.name),
        maxElements: 5,
        fieldsAreProperties: true,
      });
      for (const p of from.properties) {
        if (findProperty(to.properties, p.name) !== undefined) continue;
        const { summary, detail } = formatter.messageWithDetail(p.name, `Property ${p.name}`);
        const entry = entryFor(fromExpr, p.name);
        failures.push(
          new NotAssignable({ reason: detail, summary }).withRange(entry?.key.range ?? fromExpr?.range),
        );
      }
    } else {
      return fail;
    }

    if (failures.length === 0) return undefined;
    const chain = fail.withBecause(...failures);
    return failures.length > 1 ? chain.asTransitory() : chain;
  }
}

function primitiveAccepts(to: PrimitiveType, from: Type): boolean {
  if (to.name === 'any') return true;
  if (from.kind === 'enum') return primitiveAccepts(to, unwrapType(from.element));
  if (to.name === 'string' && from.kind === 'resource') return true;
  if (from.kind !== 'primitive') return false;
  if (from.name === to.name) return true;
  switch (to.name) {
    case 'number':
    case 'integer':
      return from.name === 'number' || from.name === 'integer';
    case 'string':
      return from.name === 'number' || from.name === 'integer' || from.name === 'boolean';
    case 'asset':
      return from.name === 'archive';
    default:
      return false;
  }
}

function entryFor(expr: Expr | undefined, name: string): ObjectProperty | undefined {
  if (expr?.kind !== 'object') return undefined;
  return expr.entries.find((e) => e.key.kind === 'string' && e.key.value === name);
}

function collect(results: ReadonlyArray<NotAssignable | undefined>): NotAssignable[] {
  return results.filter((r): r is NotAssignable => r !== undefined);
}
