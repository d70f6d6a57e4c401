/**
 * Strata Kernel: Type Algebra
 *
 * Immutable type values shared by the package schemas, the type checker
 * and the diagnostics it produces. A Type is a closed tagged union on
 * `kind`; primitives are singletons so they compare by identity, every
 * other kind compares structurally through `typesEqual`.
 *
 * Property optionality is not a flag: a property whose type is wrapped in
 * `optional` may be omitted, every other property is required.
 */

// ---------------------------------------------------------------------------
// Type Values
// ---------------------------------------------------------------------------

export type PrimitiveName = 'string' | 'number' | 'integer' | 'boolean' | 'asset' | 'archive' | 'any';

export interface PrimitiveType {
  readonly kind: 'primitive';
  readonly name: PrimitiveName;
}

/** Sentinel for "already reported"; assignability into or out of it always succeeds. */
export interface InvalidType {
  readonly kind: 'invalid';
}

export interface UnionType {
  readonly kind: 'union';
  readonly elements: ReadonlyArray<Type>;
}

export interface ArrayType {
  readonly kind: 'array';
  readonly element: Type;
}

export interface MapType {
  readonly kind: 'map';
  readonly element: Type;
}

export interface PropertyType {
  readonly name: string;
  readonly type: Type;
}

export interface ObjectType {
  readonly kind: 'object';
  /** Empty, or prefixed with ADHOC_OBJECT_TOKEN, for objects synthesized from literals. */
  readonly token: string;
  readonly properties: ReadonlyArray<PropertyType>;
}

export interface ResourceType {
  readonly kind: 'resource';
  readonly token: string;
  /** Absent for a destination that only names the token. */
  readonly resource?: ResourceSchema;
}

export interface EnumMember {
  readonly name?: string;
  readonly value: string | number | boolean;
}

export interface EnumType {
  readonly kind: 'enum';
  readonly token: string;
  readonly element: Type;
  readonly values: ReadonlyArray<EnumMember>;
}

export interface TokenType {
  readonly kind: 'token';
  readonly token: string;
  readonly underlying?: Type;
}

export interface OptionalType {
  readonly kind: 'optional';
  readonly element: Type;
}

/** A destination that also takes a deferred value of `element`. */
export interface InputType {
  readonly kind: 'input';
  readonly element: Type;
}

export type Type =
  | PrimitiveType
  | InvalidType
  | UnionType
  | ArrayType
  | MapType
  | ObjectType
  | ResourceType
  | EnumType
  | TokenType
  | OptionalType
  | InputType;

export type TypeKind = Type['kind'];

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export interface ResourceSchema {
  readonly token: string;
  readonly isComponent: boolean;
  readonly isProvider: boolean;
  readonly inputProperties: ReadonlyArray<PropertyType>;
  /** Output properties, readable through property access. */
  readonly properties: ReadonlyArray<PropertyType>;
  /** Values the package fixes for every instance, merged into the inputs on registration. */
  readonly constantProperties: Readonly<Record<string, string | number | boolean>>;
}

export interface FunctionSchema {
  readonly token: string;
  readonly inputs?: ObjectType;
  readonly outputs?: ObjectType;
  /** A non-object return type; set only when `outputs` is absent. */
  readonly returnType?: Type;
}

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

export const StringType: PrimitiveType = { kind: 'primitive', name: 'string' };
export const NumberType: PrimitiveType = { kind: 'primitive', name: 'number' };
export const IntType: PrimitiveType = { kind: 'primitive', name: 'integer' };
export const BoolType: PrimitiveType = { kind: 'primitive', name: 'boolean' };
export const AssetType: PrimitiveType = { kind: 'primitive', name: 'asset' };
export const ArchiveType: PrimitiveType = { kind: 'primitive', name: 'archive' };
export const AnyType: PrimitiveType = { kind: 'primitive', name: 'any' };
export const Invalid: InvalidType = { kind: 'invalid' };

/** Token prefix of object types synthesized from object literals. */
export const ADHOC_OBJECT_TOKEN = 'strata:adhoc:';

/** Type of the reserved `strata` environment object. */
export const ENVIRONMENT_OBJECT_TYPE: ObjectType = {
  kind: 'object',
  token: 'strata:builtin:strata',
  properties: ['cwd', 'project', 'stack', 'organization', 'rootDirectory'].map((name) => ({
    name,
    type: StringType,
  })),
};

const PRIMITIVES: ReadonlyMap<PrimitiveName, PrimitiveType> = new Map(
  [StringType, NumberType, IntType, BoolType, AssetType, ArchiveType, AnyType].map((t) => [t.name, t]),
);

export function primitive(name: PrimitiveName): PrimitiveType {
  return PRIMITIVES.get(name) ?? AnyType;
}

export function arrayOf(element: Type): ArrayType {
  return { kind: 'array', element };
}

export function mapOf(element: Type): MapType {
  return { kind: 'map', element };
}

export function optional(element: Type): Type {
  return element.kind === 'optional' ? element : { kind: 'optional', element };
}

export function input(element: Type): InputType {
  return { kind: 'input', element };
}

export function objectType(token: string, properties: ReadonlyArray<PropertyType>): ObjectType {
  return { kind: 'object', token, properties };
}

export function resourceType(token: string, resource?: ResourceSchema): ResourceType {
  return resource === undefined ? { kind: 'resource', token } : { kind: 'resource', token, resource };
}

/**
 * A union of the given alternatives with duplicates removed. Collapses to
 * the single element when only one remains and to Invalid when none do.
 */
export function unionOf(elements: ReadonlyArray<Type>): Type {
  const set = new OrderedTypeSet();
  for (const e of elements) {
    if (e.kind === 'union') e.elements.forEach((inner) => set.add(inner));
    else set.add(e);
  }
  const values = set.values();
  if (values.length === 0) return Invalid;
  if (values.length === 1 && values[0] !== undefined) return values[0];
  return { kind: 'union', elements: values };
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

/** Strip every optional and input wrapper. */
export function unwrapType(t: Type): Type {
  let current = t;
  while (current.kind === 'optional' || current.kind === 'input') current = current.element;
  return current;
}

export function isPrimitive(t: Type): t is PrimitiveType {
  return t.kind === 'primitive';
}

export function isRequired(property: PropertyType): boolean {
  return property.type.kind !== 'optional';
}

export function findProperty(
  properties: ReadonlyArray<PropertyType>,
  name: string,
): PropertyType | undefined {
  return properties.find((p) => p.name === name);
}

/** Make every property of a list optional, e.g. resource state read by `get`. */
export function optionalProperties(properties: ReadonlyArray<PropertyType>): PropertyType[] {
  return properties.map((p) => ({ name: p.name, type: optional(p.type) }));
}

export function isAdhocObject(t: ObjectType): boolean {
  return t.token === '' || t.token.startsWith(ADHOC_OBJECT_TOKEN);
}

/** Structural equality; adhoc objects compare by their properties. */
export function typesEqual(a: Type, b: Type): boolean {
  if (a === b) return true;
  switch (a.kind) {
    case 'primitive':
      return b.kind === 'primitive' && a.name === b.name;
    case 'invalid':
      return b.kind === 'invalid';
    case 'array':
    case 'map':
    case 'optional':
    case 'input':
      return b.kind === a.kind && typesEqual(a.element, b.element);
    case 'union':
      return (
        b.kind === 'union' &&
        a.elements.length === b.elements.length &&
        a.elements.every((e, i) => {
          const other = b.elements[i];
          return other !== undefined && typesEqual(e, other);
        })
      );
    case 'object':
      if (b.kind !== 'object') return false;
      if (!isAdhocObject(a) || !isAdhocObject(b)) return a.token === b.token;
      return (
        a.properties.length === b.properties.length &&
        a.properties.every((p, i) => {
          const other = b.properties[i];
          return other !== undefined && other.name === p.name && typesEqual(p.type, other.type);
        })
      );
    case 'resource':
    case 'enum':
      return b.kind === a.kind && a.token === b.token;
    case 'token':
      return b.kind === 'token' && a.token === b.token;
  }
}

/** Insertion-ordered set of types, deduplicated by `typesEqual`. */
export class OrderedTypeSet {
  private readonly order: Type[] = [];

  add(t: Type): boolean {
    if (this.order.some((existing) => typesEqual(existing, t))) return false;
    this.order.push(t);
    return true;
  }

  values(): Type[] {
    return [...this.order];
  }

  get size(): number {
    return this.order.length;
  }
}

// ---------------------------------------------------------------------------
// Display
// ---------------------------------------------------------------------------

/**
 * Render a type the way diagnostics show it: `string`, `List<integer>`,
 * `Map<any>`, `Union<string, number>`, `{a: string}` for adhoc objects,
 * the token for named objects and resources (`Resource` when the token is
 * empty) and `tok<type = string>` for token types.
 * A top-level optional type gets a `?` suffix.
 */
export function displayType(t: Type): string {
  const suffix = t.kind === 'optional' ? '?' : '';
  const inner = unwrapType(t);
  return displayUnwrapped(inner) + suffix;
}

function displayUnwrapped(t: Type): string {
  switch (t.kind) {
    case 'primitive':
      return t.name;
    case 'invalid':
      return 'invalid';
    case 'object':
      if (isAdhocObject(t)) {
        return `{${t.properties.map((p) => `${p.name}: ${displayType(p.type)}`).join(', ')}}`;
      }
      return t.token;
    case 'array':
      return `List<${displayType(t.element)}>`;
    case 'map':
      return `Map<${displayType(t.element)}>`;
    case 'union':
      return `Union<${t.elements.map(displayType).join(', ')}>`;
    case 'token':
      return `${t.token}<type = ${displayType(t.underlying ?? AnyType)}>`;
    case 'resource':
      return t.token === '' ? 'Resource' : t.token;
    case 'enum':
      return t.token;
    case 'optional':
    case 'input':
      return displayType(t.element);
  }
}
