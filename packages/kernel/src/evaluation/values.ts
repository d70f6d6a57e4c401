/**
 * Strata Kernel: Runtime Values
 *
 * What expressions evaluate to. Lists and maps are plain arrays and
 * records; resources, assets and archives are class instances so they can
 * be told apart from maps with `instanceof`.
 */

import type { ResourceSchema } from '../schema/types.js';
import { Deferred } from './deferred.js';

export type Value =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<Value>
  | ValueMap
  | ResourceHandle
  | AssetValue
  | ArchiveValue
  | Deferred<Value>;

export interface ValueMap {
  readonly [key: string]: Value;
}

export type ResourceKind = 'custom' | 'component' | 'provider';

/** A registered (or read) resource. Outputs arrive later through the engine. */
export class ResourceHandle {
  constructor(
    readonly name: string,
    readonly token: string,
    readonly kind: ResourceKind,
    readonly urn: Deferred<string>,
    /** Absent for component resources, which have no id. */
    readonly id: Deferred<string> | undefined,
    readonly outputs: Deferred<ValueMap>,
    readonly schema?: ResourceSchema,
  ) {}

  /** A single output property; null when the resource does not report it. */
  output(name: string): Deferred<Value> {
    return this.outputs.apply((outputs): Value => ownValue(outputs, name) ?? null);
  }
}

export type AssetSource = 'string' | 'file' | 'remote';

export class AssetValue {
  constructor(
    readonly source: AssetSource,
    /** The text for string assets, otherwise the path or URI. */
    readonly value: string,
  ) {}
}

export type ArchiveSource = 'file' | 'remote' | 'assets';

export class ArchiveValue {
  constructor(
    readonly source: ArchiveSource,
    readonly path: string,
    /** Entries of an `assets` archive, in ascending path order. */
    readonly assets: ReadonlyArray<readonly [string, AssetValue | ArchiveValue]> = [],
  ) {}
}

/** A property the map itself holds; inherited names such as `constructor` are not properties. */
export function ownValue(map: ValueMap, key: string): Value | undefined {
  return Object.hasOwn(map, key) ? map[key] : undefined;
}

/** Set a property as data, so keys like `__proto__` are stored rather than interpreted. */
export function setValue(map: Record<string, Value>, key: string, value: Value): void {
  Object.defineProperty(map, key, { value, enumerable: true, writable: true, configurable: true });
}

export function isList(value: Value): value is ReadonlyArray<Value> {
  return Array.isArray(value);
}

export function isValueMap(value: Value): value is ValueMap {
  return (
    value !== null &&
    typeof value === 'object' &&
    !isList(value) &&
    !(value instanceof ResourceHandle) &&
    !(value instanceof AssetValue) &&
    !(value instanceof ArchiveValue) &&
    !(value instanceof Deferred)
  );
}

/** How a value's kind reads in an error message. */
export function typeString(value: Value): string {
  if (value === null) return 'nil';
  if (typeof value === 'boolean') return 'a boolean';
  if (typeof value === 'number') return Number.isInteger(value) ? 'an integer' : 'a number';
  if (typeof value === 'string') return 'a string';
  if (isList(value)) return 'a list';
  if (value instanceof ResourceHandle) return 'a resource';
  if (value instanceof AssetValue) return 'an asset';
  if (value instanceof ArchiveValue) return 'an archive';
  if (value instanceof Deferred) return 'a deferred value';
  return 'an object';
}

export function toDeferred(value: Value): Deferred<Value> {
  return value instanceof Deferred ? value : Deferred.known(value);
}

/**
 * Wait for every Deferred nested anywhere inside `value`. Returns a plain
 * value when nothing is deferred. With `handles: 'urn'` resource handles
 * are replaced by their URNs, for contexts that need plain data.
 */
export function resolveDeep(value: Value, handles: 'keep' | 'urn' = 'keep'): Value {
  if (value instanceof Deferred) return value.apply((v) => resolveDeep(v, handles));
  if (value instanceof ResourceHandle) return handles === 'urn' ? value.urn : value;
  if (isList(value)) {
    const items = value.map((v) => resolveDeep(v, handles));
    if (!items.some((v) => v instanceof Deferred)) return items;
    return Deferred.all(items.map(toDeferred)).apply((resolved): Value => resolved);
  }
  if (isValueMap(value)) {
    const keys = Object.keys(value);
    const items = keys.map((k) => resolveDeep(value[k] ?? null, handles));
    const build = (resolved: ReadonlyArray<Value>): ValueMap =>
      Object.fromEntries(keys.map((k, i) => [k, resolved[i] ?? null]));
    if (!items.some((v) => v instanceof Deferred)) return build(items);
    return Deferred.all(items.map(toDeferred)).apply((resolved): Value => build(resolved));
  }
  return value;
}
