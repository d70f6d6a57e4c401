/**
 * Strata Kernel: Type Checker
 *
 * Assigns a type to every expression and every declared name, in the
 * scheduler's order, and reports every value that cannot be assigned to
 * the type its destination declares.
 *
 * The checker is a TemplateVisitor: expressions are typed post-order, so
 * by the time a declaration is visited all of its expressions have types.
 * A failure types the offending expression as Invalid, which every later
 * check accepts silently, so one mistake is reported once.
 *
 * The resulting Typing is write-once: populated during the walk and only
 * read afterwards.
 */

import type {
  Entry,
  Expr,
  InvokeExpr,
  PropertyAccess,
  PropertyAccessor,
  ResourceDecl,
  ResourceOptionsDecl,
  SourceRange,
  Template,
} from '@strata/template';
import {
  Diagnostics,
  NonExistentFieldFormatter,
  assertNever,
  objectExpr,
  orList,
  rootName,
} from '@strata/template';
import type { ConfigValue } from '../config/config-types.js';
import {
  CONFIG_TYPE_NAMES,
  configValueType,
  isConfigTypeCompatible,
  parseConfigType,
} from '../config/config-types.js';
import { ENVIRONMENT_NAME } from '../graph/scheduler.js';
import type {
  ConfigNode,
  GraphNode,
  MissingNode,
  ResourceNode,
  StackConfigEntry,
  StackConfigNode,
  VariableNode,
} from '../graph/scheduler.js';
import type { TemplateVisitor } from '../graph/walker.js';
import { walkTemplate } from '../graph/walker.js';
import type { PackageLoader } from '../schema/loader.js';
import { resolveFunction, resolveResource } from '../schema/loader.js';
import {
  ADHOC_OBJECT_TOKEN,
  AnyType,
  ArchiveType,
  AssetType,
  BoolType,
  ENVIRONMENT_OBJECT_TYPE,
  IntType,
  Invalid,
  NumberType,
  StringType,
  arrayOf,
  displayType,
  findProperty,
  input,
  mapOf,
  objectType,
  optional,
  optionalProperties,
  resourceType,
  unionOf,
  unwrapType,
} from '../schema/types.js';
import type { FunctionSchema, PropertyType, ResourceSchema, Type } from '../schema/types.js';
import { Assignability } from './assignable.js';
import { NotAssignable } from './not-assignable.js';

// ---------------------------------------------------------------------------
// Public Contract
// ---------------------------------------------------------------------------

/** Read-only view of the types assigned during a check. */
export interface Typing {
  typeResource(name: string): Type | undefined;
  typeVariable(name: string): Type | undefined;
  typeConfig(name: string): Type | undefined;
  typeOutput(name: string): Type | undefined;
  /** Only defined for expressions the checker visited. */
  typeExpr(expr: Expr): Type | undefined;
  resourceSchema(name: string): ResourceSchema | undefined;
  functionSchema(expr: InvokeExpr): FunctionSchema | undefined;
  /** The output name an invoke's `return` selects, spelled as the schema spells it. */
  invokeReturn(expr: InvokeExpr): string | undefined;
}

export interface TypeCheckOptions {
  /** Stack values for config keys, checked against declared types. */
  readonly stackConfig?: ReadonlyArray<StackConfigEntry>;
  /** The running project; `<project>:name` references resolve to `name`. */
  readonly project?: string;
}

export interface TypeCheckResult {
  readonly typing: Typing;
  readonly diagnostics: Diagnostics;
}

/** Type `nodes` (as ordered by the scheduler) and then the template's outputs. */
export function typeCheck(
  template: Template,
  nodes: ReadonlyArray<GraphNode>,
  loader: PackageLoader,
  options: TypeCheckOptions = {},
): TypeCheckResult {
  const checker = new TypeChecker(loader, options);
  walkTemplate(nodes, template.outputs, checker);
  return { typing: checker, diagnostics: checker.diagnostics };
}

// ---------------------------------------------------------------------------
// Option Types
// ---------------------------------------------------------------------------

const AnyResource = resourceType('');
const StringList = arrayOf(StringType);
const ResourceList = arrayOf(AnyResource);

const OPTION_TYPES: Readonly<Record<Exclude<keyof ResourceOptionsDecl, 'aliases' | 'customTimeouts'>, Type>> = {
  additionalSecretOutputs: StringList,
  deleteBeforeReplace: BoolType,
  dependsOn: ResourceList,
  ignoreChanges: StringList,
  import: StringType,
  parent: AnyResource,
  protect: BoolType,
  provider: AnyResource,
  providers: unionOf([ResourceList, mapOf(AnyResource)]),
  version: StringType,
  pluginDownloadURL: StringType,
  replaceOnChanges: StringList,
  retainOnDelete: BoolType,
  deletedWith: AnyResource,
  replaceWith: ResourceList,
  hideDiffs: StringList,
};

const ALIAS_FIELDS = ['name', 'type', 'stack', 'project', 'parentUrn', 'noParent'];

const SEMVER = /^v?\d+\.\d+\.\d+(-[0-9A-Za-z.-]+)?(\+[0-9A-Za-z.-]+)?$/;

// ---------------------------------------------------------------------------
// Checker
// ---------------------------------------------------------------------------

type AccessResult =
  | { readonly ok: true; readonly type: Type }
  | { readonly ok: false; readonly summary: string; readonly detail?: string };

export class TypeChecker implements TemplateVisitor, Typing {
  readonly diagnostics = new Diagnostics();

  private readonly exprs = new Map<Expr, Type>();
  private readonly resources = new Map<string, Type>();
  private readonly schemas = new Map<string, ResourceSchema>();
  private readonly configs = new Map<string, Type>();
  private readonly variables = new Map<string, Type>();
  private readonly outputs = new Map<string, Type>();
  private readonly functions = new Map<InvokeExpr, FunctionSchema>();
  private readonly returns = new Map<InvokeExpr, string>();
  private readonly missing = new Set<string>();
  private readonly stackConfig: ReadonlyMap<string, ConfigValue>;
  private readonly project: string | undefined;
  private readonly assignability: Assignability;

  constructor(
    private readonly loader: PackageLoader,
    options: TypeCheckOptions = {},
  ) {
    this.stackConfig = new Map((options.stackConfig ?? []).map((e) => [e.key, e.value]));
    this.project = options.project;
    this.assignability = new Assignability((expr) => this.exprs.get(expr));
  }

  // -- Typing ---------------------------------------------------------------

  typeResource(name: string): Type | undefined {
    return this.resources.get(name);
  }

  typeVariable(name: string): Type | undefined {
    return this.variables.get(name);
  }

  typeConfig(name: string): Type | undefined {
    return this.configs.get(name);
  }

  typeOutput(name: string): Type | undefined {
    return this.outputs.get(name);
  }

  typeExpr(expr: Expr): Type | undefined {
    return this.exprs.get(expr);
  }

  resourceSchema(name: string): ResourceSchema | undefined {
    return this.schemas.get(name);
  }

  functionSchema(expr: InvokeExpr): FunctionSchema | undefined {
    return this.functions.get(expr);
  }

  invokeReturn(expr: InvokeExpr): string | undefined {
    return this.returns.get(expr);
  }

  // -- Declarations ---------------------------------------------------------

  visitExpr(expr: Expr): void {
    this.exprs.set(expr, this.typeOf(expr));
  }

  visitConfig(node: ConfigNode): void {
    const { key, decl } = node;
    let declared: Type | undefined;
    if (decl.type !== undefined) {
      declared = parseConfigType(decl.type.value);
      if (declared === undefined) {
        this.diagnostics.error(
          decl.type.range,
          `unknown config type '${decl.type.value}'`,
          `Valid config types are ${orList(CONFIG_TYPE_NAMES)}`,
        );
        this.configs.set(key.value, Invalid);
        return;
      }
    }

    let type = declared;
    if (decl.default !== undefined) {
      if (declared !== undefined) this.assertAssignable(decl.default, declared);
      type ??= this.exprs.get(decl.default) ?? Invalid;
    }
    if (type === undefined) {
      this.diagnostics.error(
        key.range,
        `unable to infer the type of config ${key.value}`,
        "Either 'type' or 'default' is required.",
      );
      this.configs.set(key.value, Invalid);
      return;
    }

    const stackValue = this.stackConfig.get(key.value);
    if (stackValue !== undefined) {
      const stackType = configValueType(stackValue);
      if (stackType.ok && !isConfigTypeCompatible(type, stackType.type, stackValue)) {
        this.diagnostics.error(
          key.range,
          `config key "${key.value}" cannot have conflicting types ${displayType(type)}, ${displayType(stackType.type)}`,
        );
      }
    }

    this.configs.set(key.value, input(decl.default !== undefined ? optional(type) : type));
  }

  visitStackConfig(node: StackConfigNode): void {
    const type = configValueType(node.value);
    this.configs.set(node.key.value, input(type.ok ? type.type : AnyType));
  }

  visitVariable(node: VariableNode): void {
    this.variables.set(node.key.value, this.exprs.get(node.value) ?? Invalid);
  }

  visitMissing(node: MissingNode): void {
    this.missing.add(node.key.value);
    this.diagnostics.error(
      node.key.range,
      `resource, variable, or config value "${node.key.value}" not found`,
    );
  }

  visitOutput(output: Entry<Expr>): void {
    this.outputs.set(output.key.value, this.exprs.get(output.value) ?? Invalid);
  }

  visitResource(node: ResourceNode): void {
    const { key, decl } = node;
    this.checkResourceOptions(decl);

    const versionExpr = decl.options.version;
    let version: string | undefined;
    if (versionExpr?.kind === 'string' && versionExpr.value !== '') {
      if (!SEMVER.test(versionExpr.value)) {
        this.diagnostics.error(
          versionExpr.range,
          `unable to parse resource ${key.value} provider version: "${versionExpr.value}" is not a valid semantic version`,
        );
        this.resources.set(key.value, Invalid);
        return;
      }
      version = versionExpr.value;
    }

    const resolved = resolveResource(this.loader, decl.type.value, version);
    if (!resolved.ok) {
      this.diagnostics.error(
        decl.type.range,
        `error resolving type of resource ${key.value}: ${resolved.error}`,
      );
      this.resources.set(key.value, Invalid);
      return;
    }
    const schema = resolved.value;
    this.schemas.set(key.value, schema);
    this.resources.set(key.value, resourceType(schema.token, schema));

    if (decl.get !== undefined && decl.hasProperties) {
      this.diagnostics.error(key.range, 'Resource fields properties and get are mutually exclusive');
      return;
    }

    if (decl.get !== undefined) {
      this.assertAssignable(decl.get.id, StringType);
      this.checkEntries(
        key.value,
        decl.get.state,
        decl.get.range,
        objectType(schema.token, optionalProperties(schema.properties)),
      );
      return;
    }
    this.checkEntries(
      key.value,
      decl.properties,
      decl.range,
      objectType(schema.token, schema.inputProperties),
    );
  }

  /** Check a block of named values as one object literal against `to`. */
  private checkEntries(
    resource: string,
    entries: ReadonlyArray<Entry<Expr>>,
    range: SourceRange | undefined,
    to: Type,
  ): void {
    const properties: PropertyType[] = [];
    for (const { key, value } of entries) {
      const type = this.exprs.get(value);
      if (type === undefined) {
        this.diagnostics.warning(
          value.range,
          `internal error: unable to discover type of ${resource}.${key.value}`,
        );
        continue;
      }
      properties.push({ name: key.value, type });
    }
    const literal = objectExpr(
      entries.map((e) => ({ key: e.key, value: e.value })),
      range,
    );
    const from = objectType(adhocToken(properties.map((p) => p.name)), properties);
    this.report(this.assignability.check(literal, from, to), from, to, range);
  }

  private checkResourceOptions(decl: ResourceDecl): void {
    const { options } = decl;
    for (const [name, type] of Object.entries(OPTION_TYPES)) {
      const expr = optionExpr(options, name);
      if (expr !== undefined) this.assertAssignable(expr, type);
    }
    const timeouts = options.customTimeouts;
    if (timeouts !== undefined) {
      for (const t of [timeouts.create, timeouts.update, timeouts.delete]) {
        if (t !== undefined) this.assertAssignable(t, StringType);
      }
    }
    if (options.aliases !== undefined) this.checkAliases(options.aliases);
  }

  private checkAliases(aliases: Expr): void {
    if (aliases.kind !== 'list') {
      const type = unwrapType(this.exprs.get(aliases) ?? Invalid);
      if (type.kind !== 'array' && type.kind !== 'invalid' && type !== AnyType) {
        this.diagnostics.error(aliases.range, 'aliases must be a list');
      }
      return;
    }
    aliases.elements.forEach((alias, i) => {
      if (alias.kind !== 'object') {
        if (this.assignability.check(alias, this.exprs.get(alias) ?? Invalid, StringType) !== undefined) {
          this.diagnostics.error(alias.range, `aliases[${i}] must be a string or object`);
        }
        return;
      }
      const formatter = new NonExistentFieldFormatter({
        parentLabel: 'alias',
        fields: ALIAS_FIELDS,
        maxElements: 5,
      });
      for (const { key, value } of alias.entries) {
        if (key.kind !== 'string') {
          this.diagnostics.error(key.range, 'alias object keys must be strings');
          continue;
        }
        if (!ALIAS_FIELDS.includes(key.value)) {
          const { summary, detail } = formatter.messageWithDetail(key.value, `Field ${key.value}`);
          this.diagnostics.error(key.range, summary, detail);
          continue;
        }
        const expected = key.value === 'noParent' ? BoolType : StringType;
        if (this.assignability.check(value, this.exprs.get(value) ?? Invalid, expected) !== undefined) {
          this.diagnostics.error(
            value.range,
            key.value === 'noParent'
              ? "alias field 'noParent' must be a boolean"
              : `alias field '${key.value}' must be a string`,
          );
        }
      }
    });
  }

  // -- Expressions ----------------------------------------------------------

  private typeOf(expr: Expr): Type {
    switch (expr.kind) {
      case 'null':
        return Invalid;
      case 'boolean':
        return BoolType;
      case 'number':
        return NumberType;
      case 'string':
        return StringType;
      case 'interpolate':
        for (const part of expr.parts) {
          if (part.value !== undefined) this.typeAccess(part.value, expr.range);
        }
        return StringType;
      case 'symbol':
        return this.typeAccess(expr.property, expr.range);
      case 'list': {
        if (expr.elements.length === 0) return Invalid;
        return arrayOf(unionOf(expr.elements.map((e) => this.exprs.get(e) ?? Invalid)));
      }
      case 'object': {
        const properties: PropertyType[] = [];
        for (const { key, value } of expr.entries) {
          if (key.kind !== 'string') return Invalid;
          properties.push({ name: key.value, type: this.exprs.get(value) ?? Invalid });
        }
        return objectType(adhocToken(properties.map((p) => p.name)), properties);
      }
      case 'invoke':
        return this.typeInvoke(expr);
      case 'join':
        this.assertAssignable(expr.delimiter, StringType);
        this.assertAssignable(expr.values, arrayOf(StringType));
        return StringType;
      case 'split':
        this.assertAssignable(expr.delimiter, StringType);
        this.assertAssignable(expr.source, StringType);
        return arrayOf(StringType);
      case 'select': {
        this.assertAssignable(expr.index, IntType);
        this.assertAssignable(expr.values, arrayOf(AnyType));
        const values = unwrapType(this.exprs.get(expr.values) ?? Invalid);
        if (values.kind === 'array') return values.element;
        return values === AnyType ? AnyType : Invalid;
      }
      case 'toJSON':
        return StringType;
      case 'toBase64':
      case 'fromBase64':
      case 'readFile':
        this.assertAssignable(expr.value, StringType);
        return StringType;
      case 'rfc3339ToUnix':
        this.assertAssignable(expr.value, StringType);
        return IntType;
      case 'secret':
        return this.exprs.get(expr.value) ?? Invalid;
      case 'stringAsset':
      case 'fileAsset':
      case 'remoteAsset':
        this.assertAssignable(expr.source, StringType);
        return AssetType;
      case 'fileArchive':
      case 'remoteArchive':
        this.assertAssignable(expr.source, StringType);
        return ArchiveType;
      case 'assetArchive':
        return ArchiveType;
      case 'stackReference':
        this.assertAssignable(expr.propertyName, StringType);
        return AnyType;
      default:
        return assertNever(expr);
    }
  }

  private typeInvoke(expr: InvokeExpr): Type {
    const token = expr.token.value;
    const resolved = resolveFunction(this.loader, token, expr.options.version?.value);
    if (!resolved.ok) {
      this.diagnostics.error(expr.range, resolved.error);
      return Invalid;
    }
    const fn = resolved.value;
    this.functions.set(expr, fn);

    const inputs = fn.inputs?.properties ?? [];
    const formatter = new NonExistentFieldFormatter({
      parentLabel: `Invoke ${token}`,
      fields: inputs.map((p) => p.name),
      maxElements: 5,
    });
    for (const { key, value } of expr.args?.entries ?? []) {
      if (key.kind !== 'string') continue;
      const property = findProperty(inputs, key.value);
      if (property === undefined) {
        const { summary, detail } = formatter.messageWithDetail(key.value, key.value);
        this.diagnostics.warning(key.range, summary, detail);
        continue;
      }
      this.assertAssignable(value, property.type);
    }

    const ret = expr.return;
    if (ret === undefined) return fn.outputs ?? fn.returnType ?? AnyType;
    if (fn.outputs === undefined) {
      this.diagnostics.error(
        ret.range,
        'fn::invoke has a non-object return value',
        `cannot specify property '${ret.value}' for function ${token}`,
      );
      return Invalid;
    }
    const wanted = ret.value.toLowerCase();
    const output = fn.outputs.properties.find((p) => p.name.toLowerCase() === wanted);
    if (output === undefined) {
      const { summary, detail } = new NonExistentFieldFormatter({
        parentLabel: token,
        fields: fn.outputs.properties.map((p) => p.name),
        maxElements: 5,
        fieldsAreProperties: true,
      }).messageWithDetail(ret.value, ret.value);
      this.diagnostics.error(ret.range, summary, detail);
      return Invalid;
    }
    this.returns.set(expr, output.name);
    return output.type;
  }

  // -- Property Access ------------------------------------------------------

  private typeAccess(access: PropertyAccess, range: SourceRange | undefined): Type {
    const name = rootName(access);
    const root = this.lookupRoot(name);
    if (root === undefined) {
      this.diagnostics.error(range, `resource, variable, or config value "${name}" not found`);
      return Invalid;
    }
    const result = this.accessChain(root, access.accessors.slice(1), name);
    if (!result.ok) {
      this.diagnostics.error(range, result.summary, result.detail);
      return Invalid;
    }
    return result.type;
  }

  private lookupRoot(name: string): Type | undefined {
    if (name === ENVIRONMENT_NAME) return ENVIRONMENT_OBJECT_TYPE;
    if (this.missing.has(name)) return Invalid;
    const found = this.resources.get(name) ?? this.configs.get(name) ?? this.variables.get(name);
    if (found !== undefined) return found;
    const project = this.project;
    if (project === undefined || project === '' || !name.startsWith(`${project}:`)) return undefined;
    return this.lookupRoot(name.slice(project.length + 1));
  }

  private accessChain(
    receiver: Type,
    accessors: ReadonlyArray<PropertyAccessor>,
    runningName: string,
  ): AccessResult {
    const [accessor, ...rest] = accessors;
    if (accessor === undefined) return { ok: true, type: receiver };

    const t = unwrapType(receiver);
    if (t.kind === 'invalid') return { ok: true, type: Invalid };
    if (t.kind === 'union') {
      const types: Type[] = [];
      const failures: NotAssignable[] = [];
      for (const branch of t.elements) {
        const result = this.accessChain(branch, accessors, runningName);
        if (result.ok) {
          types.push(result.type);
        } else {
          const reason = result.detail !== undefined ? `${result.summary} ${result.detail}` : result.summary;
          failures.push(new NotAssignable({ reason }));
        }
      }
      if (types.length > 0) return { ok: true, type: unionOf(types) };
      const op = accessor.kind === 'name' ? 'access' : 'index';
      return {
        ok: false,
        summary: `Cannot ${op} into ${runningName} of type ${displayType(t)}`,
        detail: new NotAssignable({
          reason: `'${runningName}' could be a type that does not support ${op}ing`,
          because: failures,
        }).toString(),
      };
    }

    const step = accessStep(t, accessor, runningName);
    if (!step.ok) return step;
    return this.accessChain(step.type, rest, runningName + accessorSuffix(accessor));
  }

  // -- Reporting ------------------------------------------------------------

  /** Check the type already assigned to `expr` against `to`, reporting failures. */
  private assertAssignable(expr: Expr, to: Type): void {
    const from = this.exprs.get(expr);
    if (from === undefined) {
      this.diagnostics.warning(
        expr.range,
        'internal error: unable to discover type',
        `expected type '${displayType(to)}'`,
      );
      return;
    }
    this.report(this.assignability.check(expr, from, to), from, to, expr.range);
  }

  /** One diagnostic per leading failure of the chain. */
  private report(
    fail: NotAssignable | undefined,
    from: Type,
    to: Type,
    fallback: SourceRange | undefined,
  ): void {
    if (fail === undefined) return;
    for (const leader of fail.leaders()) {
      const detail = leader.toString();
      let summary = leader.summary();
      if (summary === '') {
        summary =
          leader === fail
            ? `${displayType(to)} is not assignable from ${displayType(from)}`
            : firstLine(detail);
      }
      const range = leader.range() ?? fallback;
      if (leader.isInternal()) {
        this.diagnostics.warning(range, `internal error: ${summary}`, detail);
      } else {
        this.diagnostics.error(range, summary, detail === summary ? undefined : detail);
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function adhocToken(names: ReadonlyArray<string>): string {
  return ADHOC_OBJECT_TOKEN + names.join('•');
}

function optionExpr(options: ResourceOptionsDecl, name: string): Expr | undefined {
  switch (name) {
    case 'additionalSecretOutputs':
    case 'deleteBeforeReplace':
    case 'dependsOn':
    case 'ignoreChanges':
    case 'import':
    case 'parent':
    case 'protect':
    case 'provider':
    case 'providers':
    case 'version':
    case 'pluginDownloadURL':
    case 'replaceOnChanges':
    case 'retainOnDelete':
    case 'deletedWith':
    case 'replaceWith':
    case 'hideDiffs':
      return options[name];
    default:
      return undefined;
  }
}

function firstLine(s: string): string {
  const newline = s.indexOf('\n');
  return (newline === -1 ? s : s.slice(0, newline)).trim();
}

function accessorSuffix(accessor: PropertyAccessor): string {
  if (accessor.kind === 'name') return `.${accessor.name}`;
  return typeof accessor.index === 'number' ? `[${accessor.index}]` : `["${accessor.index}"]`;
}

/** Resolve one accessor against a non-union receiver. */
function accessStep(receiver: Type, accessor: PropertyAccessor, runningName: string): AccessResult {
  const shown = displayType(receiver);
  if (receiver === AnyType) return { ok: true, type: AnyType };

  if (accessor.kind === 'name' || typeof accessor.index === 'string') {
    const name = accessor.kind === 'name' ? accessor.name : String(accessor.index);
    if (accessor.kind === 'subscript' && receiver.kind === 'array') {
      return {
        ok: false,
        summary: `Cannot index via string into '${runningName}' (type ${shown})`,
        detail: 'Index via string is only allowed on Maps',
      };
    }
    switch (receiver.kind) {
      case 'map':
        return { ok: true, type: receiver.element };
      case 'object':
        return namedProperty(receiver.properties, name, runningName);
      case 'resource': {
        const schema = receiver.resource;
        if (schema === undefined) return { ok: true, type: AnyType };
        const properties: PropertyType[] = [...schema.properties];
        if (!schema.isComponent) properties.push({ name: 'id', type: StringType });
        properties.push({ name: 'urn', type: StringType });
        return namedProperty(properties, name, runningName);
      }
      default:
        if (accessor.kind === 'subscript') break;
        return {
          ok: false,
          summary: `cannot access a property on '${runningName}' (type ${shown})`,
          detail: 'Property access is only allowed on Resources and Objects',
        };
    }
  } else {
    switch (receiver.kind) {
      case 'array':
        return { ok: true, type: receiver.element };
      case 'map':
        return {
          ok: false,
          summary: `Cannot index via number into '${runningName}' (type ${shown})`,
          detail: 'Index via number is only allowed on Arrays',
        };
      default:
        break;
    }
  }
  return {
    ok: false,
    summary: `Cannot index into '${runningName}' (type ${shown})`,
    detail: 'Index property access is only allowed on Maps and Lists',
  };
}

function namedProperty(
  properties: ReadonlyArray<PropertyType>,
  name: string,
  runningName: string,
): AccessResult {
  const property = findProperty(properties, name);
  if (property !== undefined) return { ok: true, type: property.type };
  const { summary, detail } = new NonExistentFieldFormatter({
    parentLabel: runningName,
    fields: properties.map((p) => p.name),
    maxElements: 5,
    fieldsAreProperties: true,
  }).messageWithDetail(name, name);
  return { ok: false, summary, detail };
}

/** Exposed for the evaluator's own `return` check before calling out. */
export function findOutput(fn: FunctionSchema, name: string): string | undefined {
  const wanted = name.toLowerCase();
  return fn.outputs?.properties.find((p) => p.name.toLowerCase() === wanted)?.name;
}
