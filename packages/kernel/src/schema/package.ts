/**
 * Strata Kernel: Package Schemas
 *
 * A package describes the resources and functions one provider offers.
 * It arrives as a JSON-shaped PackageSpec (from disk, from a test fixture,
 * from wherever the host finds it) and is bound once into a PackageSchema
 * whose property types are Type values the checker can work with.
 *
 * Binding resolves `$ref`s:
 *   #/types/<token>      object or enum type declared in the same package
 *   #/resources/<token>  a resource of the same package
 *   #/asset, #/archive, #/any
 *
 * Object types may refer to themselves; the binder memoizes each token
 * before filling in its properties so recursion terminates.
 */

import {
  AnyType,
  ArchiveType,
  AssetType,
  BoolType,
  IntType,
  NumberType,
  StringType,
  arrayOf,
  mapOf,
  optional,
  unionOf,
} from './types.js';
import type {
  EnumMember,
  FunctionSchema,
  ObjectType,
  PropertyType,
  ResourceSchema,
  Type,
} from './types.js';

// ---------------------------------------------------------------------------
// Spec Shapes
// ---------------------------------------------------------------------------

export type PrimitiveSpecName = 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';

export interface PropertySpec {
  readonly type?: PrimitiveSpecName;
  readonly items?: PropertySpec;
  readonly additionalProperties?: PropertySpec;
  readonly $ref?: string;
  readonly oneOf?: ReadonlyArray<PropertySpec>;
  readonly const?: string | number | boolean;
  readonly description?: string;
}

export interface ObjectSpec {
  readonly properties?: Readonly<Record<string, PropertySpec>>;
  readonly required?: ReadonlyArray<string>;
}

export interface EnumValueSpec {
  readonly name?: string;
  readonly value: string | number | boolean;
}

export interface ComplexTypeSpec extends ObjectSpec {
  readonly type: PrimitiveSpecName;
  readonly enum?: ReadonlyArray<EnumValueSpec>;
  readonly description?: string;
}

export interface ResourceSpec extends ObjectSpec {
  readonly inputProperties?: Readonly<Record<string, PropertySpec>>;
  readonly requiredInputs?: ReadonlyArray<string>;
  readonly isComponent?: boolean;
  readonly description?: string;
}

export interface FunctionSpec {
  readonly inputs?: ObjectSpec;
  readonly outputs?: ObjectSpec;
  /** A plain return type, for functions that do not return an object. */
  readonly returnType?: PropertySpec;
  readonly description?: string;
}

export interface PackageSpec {
  readonly name: string;
  readonly version?: string;
  readonly resources?: Readonly<Record<string, ResourceSpec>>;
  readonly functions?: Readonly<Record<string, FunctionSpec>>;
  readonly types?: Readonly<Record<string, ComplexTypeSpec>>;
  readonly provider?: ResourceSpec;
}

// ---------------------------------------------------------------------------
// Bound Package
// ---------------------------------------------------------------------------

export interface PackageSchema {
  readonly name: string;
  readonly version?: string;
  readonly provider: ResourceSchema;
  readonly resources: ReadonlyMap<string, ResourceSchema>;
  readonly functions: ReadonlyMap<string, FunctionSchema>;
}

export type BindResult =
  | { readonly ok: true; readonly pkg: PackageSchema }
  | { readonly ok: false; readonly error: string };

/** Token of the provider resource for a package. */
export function providerToken(pkg: string): string {
  return `strata:providers:${pkg}`;
}

/** Bind a package spec, resolving every `$ref` against the spec itself. */
export function bindPackage(spec: PackageSpec): BindResult {
  const binder = new Binder(spec);
  try {
    const resources = new Map<string, ResourceSchema>();
    for (const token of Object.keys(spec.resources ?? {})) {
      resources.set(token, binder.resource(token));
    }
    const functions = new Map<string, FunctionSchema>();
    for (const [token, fn] of Object.entries(spec.functions ?? {})) {
      functions.set(token, binder.function(token, fn));
    }
    const provider = binder.provider();
    return {
      ok: true,
      pkg: {
        name: spec.name,
        ...(spec.version !== undefined ? { version: spec.version } : {}),
        provider,
        resources,
        functions,
      },
    };
  } catch (err: unknown) {
    if (err instanceof BindError) return { ok: false, error: err.message };
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Binder
// ---------------------------------------------------------------------------

class BindError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BindError';
  }
}

interface MutableResourceSchema extends ResourceSchema {
  readonly inputProperties: PropertyType[];
  readonly properties: PropertyType[];
  readonly constantProperties: Record<string, string | number | boolean>;
}

class Binder {
  private readonly types = new Map<string, Type>();
  private readonly resources = new Map<string, MutableResourceSchema>();

  constructor(private readonly spec: PackageSpec) {}

  provider(): ResourceSchema {
    const token = providerToken(this.spec.name);
    const spec = this.spec.provider ?? {};
    const schema = this.newResource(token, spec, true);
    this.fillResource(schema, spec);
    return schema;
  }

  resource(token: string): ResourceSchema {
    const existing = this.resources.get(token);
    if (existing !== undefined) return existing;
    const spec = this.spec.resources?.[token];
    if (spec === undefined) throw new BindError(`unknown resource reference "#/resources/${token}"`);
    const schema = this.newResource(token, spec, false);
    this.resources.set(token, schema);
    this.fillResource(schema, spec);
    return schema;
  }

  function(token: string, spec: FunctionSpec): FunctionSchema {
    const inputs =
      spec.inputs !== undefined ? this.object(`${token}Args`, spec.inputs) : undefined;
    const outputs =
      spec.outputs !== undefined ? this.object(`${token}Result`, spec.outputs) : undefined;
    const returnType =
      outputs === undefined && spec.returnType !== undefined
        ? this.property(spec.returnType)
        : undefined;
    return {
      token,
      ...(inputs !== undefined ? { inputs } : {}),
      ...(outputs !== undefined ? { outputs } : {}),
      ...(returnType !== undefined ? { returnType } : {}),
    };
  }

  private newResource(token: string, spec: ResourceSpec, isProvider: boolean): MutableResourceSchema {
    return {
      token,
      isComponent: spec.isComponent === true,
      isProvider,
      inputProperties: [],
      properties: [],
      constantProperties: {},
    };
  }

  private fillResource(schema: MutableResourceSchema, spec: ResourceSpec): void {
    schema.inputProperties.push(...this.properties(spec.inputProperties, spec.requiredInputs));
    schema.properties.push(...this.properties(spec.properties, spec.required));
    for (const [name, prop] of Object.entries(spec.inputProperties ?? {})) {
      if (prop.const !== undefined) schema.constantProperties[name] = prop.const;
    }
  }

  private object(token: string, spec: ObjectSpec): ObjectType {
    return { kind: 'object', token, properties: this.properties(spec.properties, spec.required) };
  }

  private properties(
    props: Readonly<Record<string, PropertySpec>> | undefined,
    required: ReadonlyArray<string> | undefined,
  ): PropertyType[] {
    const requiredSet = new Set(required ?? []);
    return Object.entries(props ?? {}).map(([name, prop]) => {
      const type = this.property(prop);
      return { name, type: requiredSet.has(name) ? type : optional(type) };
    });
  }

  private property(spec: PropertySpec): Type {
    if (spec.$ref !== undefined) return this.ref(spec.$ref);
    if (spec.oneOf !== undefined) return unionOf(spec.oneOf.map((s) => this.property(s)));
    switch (spec.type) {
      case 'string':
        return StringType;
      case 'number':
        return NumberType;
      case 'integer':
        return IntType;
      case 'boolean':
        return BoolType;
      case 'array':
        return arrayOf(spec.items !== undefined ? this.property(spec.items) : AnyType);
      case 'object':
        return mapOf(
          spec.additionalProperties !== undefined ? this.property(spec.additionalProperties) : AnyType,
        );
      case undefined:
        return AnyType;
    }
  }

  private ref(ref: string): Type {
    switch (ref) {
      case '#/asset':
        return AssetType;
      case '#/archive':
        return ArchiveType;
      case '#/any':
        return AnyType;
    }
    if (ref.startsWith('#/types/')) return this.namedType(ref.slice('#/types/'.length));
    if (ref.startsWith('#/resources/')) {
      const token = ref.slice('#/resources/'.length);
      return { kind: 'resource', token, resource: this.resource(token) };
    }
    throw new BindError(`unsupported type reference "${ref}"`);
  }

  private namedType(token: string): Type {
    const existing = this.types.get(token);
    if (existing !== undefined) return existing;
    const spec = this.spec.types?.[token];
    if (spec === undefined) throw new BindError(`unknown type reference "#/types/${token}"`);

    if (spec.enum !== undefined) {
      const values: EnumMember[] = spec.enum.map((e) =>
        e.name !== undefined ? { name: e.name, value: e.value } : { value: e.value },
      );
      const enumType: Type = {
        kind: 'enum',
        token,
        element: this.property({ type: spec.type }),
        values,
      };
      this.types.set(token, enumType);
      return enumType;
    }

    // Registered before its properties are bound so self references resolve.
    const properties: PropertyType[] = [];
    const obj: ObjectType = { kind: 'object', token, properties };
    this.types.set(token, obj);
    properties.push(...this.properties(spec.properties, spec.required));
    return obj;
  }
}
