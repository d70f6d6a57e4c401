/**
 * Strata Kernel: Evaluator
 *
 * Walks the scheduled nodes and reduces every expression to a Value,
 * calling the engine to register resources and invoke functions along the
 * way.
 *
 * Operators that may receive a Deferred operand are lifted: with concrete
 * operands they run immediately; otherwise the body becomes a continuation
 * on all deferred operands and a new Deferred is returned in its place.
 * Failures are reported as diagnostics, never thrown. A failure inside a
 * continuation is also written to the engine's log, because the caller has
 * already moved on by the time it happens. Deferred values from the engine
 * are tracked so that their failures are reported once, by the call that
 * produced them; values derived from them fail without a second report.
 *
 * Evaluation of one node stops at its first failure; other nodes still run.
 */

import type {
  AssetArchiveExpr,
  Entry,
  Expr,
  InvokeExpr,
  ObjectExpr,
  ObjectProperty,
  PropertyAccess,
  PropertyAccessor,
  ResourceDecl,
  SourceRange,
  StackReferenceExpr,
} from '@strata/template';
import { Diagnostics, NonExistentFieldFormatter, assertNever, rootName } from '@strata/template';
import type { ConfigValue } from '../config/config-types.js';
import { convertConfigValue, parseConfigType } from '../config/config-types.js';
import { ENVIRONMENT_NAME } from '../graph/scheduler.js';
import type { ConfigNode, GraphNode, ResourceNode } from '../graph/scheduler.js';
import type { PackageLoader } from '../schema/loader.js';
import { isProviderToken, packageNameOf, resolveFunction, resolveResource } from '../schema/loader.js';
import { displayType } from '../schema/types.js';
import type { FunctionSchema, ResourceSchema } from '../schema/types.js';
import type { Typing } from '../typing/checker.js';
import { findOutput } from '../typing/checker.js';
import { Deferred } from './deferred.js';
import type { Resolution } from './deferred.js';
import type {
  AliasSpec,
  CustomTimeouts,
  Engine,
  EvaluationContext,
  FileReader,
  InvokeOptions,
  RegisteredResource,
  ResourceOptions,
} from './engine.js';
import { STACK_REFERENCE_TOKEN } from './engine.js';
import {
  ArchiveValue,
  AssetValue,
  ResourceHandle,
  isList,
  isValueMap,
  ownValue,
  resolveDeep,
  setValue,
  toDeferred,
  typeString,
} from './values.js';
import type { ResourceKind, Value, ValueMap } from './values.js';

export type Evaluated = { readonly ok: true; readonly value: Value } | { readonly ok: false };

const FAILED: Evaluated = { ok: false };

function ok(value: Value): Evaluated {
  return { ok: true, value };
}

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

export interface EvaluatorOptions {
  readonly engine: Engine;
  readonly loader: PackageLoader;
  readonly context: EvaluationContext;
  /** Types and schemas from a prior check, reused instead of resolving again. */
  readonly typing?: Typing;
  readonly fileReader?: FileReader;
  /** Raw stack configuration keyed by config name, without project prefix. */
  readonly config?: ReadonlyMap<string, ConfigValue>;
}

const RFC3339 = /^\d{4}-\d{2}-\d{2}[Tt]\d{2}:\d{2}:\d{2}(\.\d+)?([Zz]|[+-]\d{2}:\d{2})$/;
const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

export class Evaluator {
  readonly diagnostics = new Diagnostics();

  private readonly engine: Engine;
  private readonly loader: PackageLoader;
  private readonly typing: Typing | undefined;
  private readonly fileReader: FileReader | undefined;
  private readonly config: ReadonlyMap<string, ConfigValue>;
  private readonly environment: ValueMap;
  private readonly project: string;

  private readonly resources = new Map<string, ResourceHandle>();
  private readonly configs = new Map<string, Value>();
  private readonly variables = new Map<string, Value>();
  private readonly defaultProviders = new Map<string, ResourceHandle>();
  private readonly stackReferences = new Map<string, ResourceHandle>();
  /** Declarations whose evaluation failed; their errors are already reported. */
  private readonly failedNodes = new Set<string>();
  private readonly pending: Promise<unknown>[] = [];
  private continuationDepth = 0;

  constructor(options: EvaluatorOptions) {
    this.engine = options.engine;
    this.loader = options.loader;
    this.typing = options.typing;
    this.fileReader = options.fileReader;
    this.config = options.config ?? new Map();
    const { cwd, project, stack, organization, rootDirectory } = options.context;
    this.environment = { cwd, project, stack, organization, rootDirectory };
    this.project = project;
  }

  // ---------------------------------------------------------------------------
  // Nodes
  // ---------------------------------------------------------------------------

  /** Evaluate every node in order. False when any node failed. */
  evaluateNodes(nodes: ReadonlyArray<GraphNode>): boolean {
    let overallOk = true;
    for (const node of nodes) {
      if (!this.evaluateNode(node)) overallOk = false;
    }
    return overallOk;
  }

  evaluateNode(node: GraphNode): boolean {
    const evaluated = this.evaluateDeclaration(node);
    if (!evaluated) this.failedNodes.add(node.key.value);
    return evaluated;
  }

  private evaluateDeclaration(node: GraphNode): boolean {
    switch (node.kind) {
      case 'config':
        return this.evaluateConfig(node);
      case 'stackConfig':
        this.configs.set(node.key.value, node.value);
        return true;
      case 'variable': {
        const result = this.evaluateExpr(node.value);
        if (!result.ok) return false;
        this.variables.set(node.key.value, result.value);
        return true;
      }
      case 'resource':
        return this.registerResource(node);
      case 'missing':
        this.fail(node.key.range, `resource, variable, or config value "${node.key.value}" not found`);
        return false;
    }
  }

  /** Evaluate the template's outputs after every node has run. */
  evaluateOutputs(outputs: ReadonlyArray<Entry<Expr>>): { ok: boolean; values: ValueMap } {
    let overallOk = true;
    const values: Record<string, Value> = {};
    for (const { key, value } of outputs) {
      const result = this.evaluateExpr(value);
      if (!result.ok) {
        overallOk = false;
        continue;
      }
      setValue(values, key.value, result.value);
    }
    return { ok: overallOk, values };
  }

  /** Resolves once every continuation started so far, and any they started, has run. */
  async settled(): Promise<void> {
    while (this.pending.length > 0) {
      const batch = this.pending.splice(0);
      await Promise.all(batch);
    }
  }

  resource(name: string): ResourceHandle | undefined {
    return this.resources.get(name);
  }

  private evaluateConfig(node: ConfigNode): boolean {
    const { key, decl } = node;
    const name = key.value;
    const raw = this.config.get(name);
    let value: Value;
    if (raw === undefined) {
      if (decl.default === undefined) {
        this.fail(key.range, `missing required configuration variable '${name}'`);
        return false;
      }
      const result = this.evaluateExpr(decl.default);
      if (!result.ok) return false;
      value = result.value;
    } else {
      const type = decl.type !== undefined ? parseConfigType(decl.type.value) : this.typing?.typeConfig(name);
      if (type === undefined) {
        value = raw;
      } else {
        const converted = convertConfigValue(raw, type);
        if (!converted.ok) {
          this.fail(key.range, `configuration value for '${name}' is not a valid ${displayType(type)}`);
          return false;
        }
        value = converted.value;
      }
    }
    if (decl.secret?.value === true) value = toDeferred(value).asSecret();
    this.configs.set(name, value);
    return true;
  }

  // ---------------------------------------------------------------------------
  // Resources
  // ---------------------------------------------------------------------------

  private registerResource(node: ResourceNode): boolean {
    const { key, decl } = node;
    const name = key.value;
    const schema = this.resolveResourceSchema(name, decl);
    if (schema === undefined) return false;

    let overallOk = true;
    const properties: Record<string, Value> = {};
    for (const entry of decl.properties) {
      const result = this.evaluateExpr(entry.value);
      if (!result.ok) {
        overallOk = false;
        continue;
      }
      setValue(properties, entry.key.value, result.value);
    }

    const options = this.evaluateOptions(decl);
    if (options === undefined) overallOk = false;

    let id: Value | undefined;
    const state: Record<string, Value> = {};
    if (decl.get !== undefined) {
      const result = this.evaluateExpr(decl.get.id);
      if (result.ok) id = result.value;
      else overallOk = false;
      for (const entry of decl.get.state) {
        const s = this.evaluateExpr(entry.value);
        if (!s.ok) {
          overallOk = false;
          continue;
        }
        setValue(state, entry.key.value, s.value);
      }
    }
    if (!overallOk || options === undefined) return false;

    const finalOptions: Mutable<ResourceOptions> = { ...options };
    const pkg = packageNameOf(decl.type.value);
    const defaultProvider = this.defaultProviders.get(pkg);
    if (finalOptions.provider === undefined && defaultProvider !== undefined && node.defaultProviderFor === undefined) {
      finalOptions.provider = defaultProvider;
    }

    for (const [k, v] of Object.entries(schema.constantProperties)) setValue(properties, k, v);

    const kind: ResourceKind = isProviderToken(schema.token)
      ? 'provider'
      : schema.isComponent
        ? 'component'
        : 'custom';
    const request = {
      token: schema.token,
      name,
      custom: kind !== 'component',
      properties,
      options: finalOptions,
    };
    const registered: RegisteredResource =
      id !== undefined
        ? this.engine.readResource({ ...request, properties: state, id })
        : this.engine.registerResource(request);

    const report = this.reportOnce(key.range, `failed to register resource ${name}`);
    const handle = new ResourceHandle(
      name,
      schema.token,
      kind,
      this.track(registered.urn, report),
      kind === 'component' || registered.id === undefined ? undefined : this.track(registered.id, report),
      this.track(registered.outputs, report),
      schema,
    );
    this.resources.set(name, handle);
    if (node.defaultProviderFor !== undefined) this.defaultProviders.set(node.defaultProviderFor, handle);
    return true;
  }

  private resolveResourceSchema(name: string, decl: ResourceDecl): ResourceSchema | undefined {
    const known = this.typing?.resourceSchema(name);
    if (known !== undefined) return known;
    const version = decl.options.version?.kind === 'string' ? decl.options.version.value : undefined;
    const resolved = resolveResource(this.loader, decl.type.value, version === '' ? undefined : version);
    if (!resolved.ok) {
      this.fail(decl.type.range, `error resolving type of resource ${name}: ${resolved.error}`);
      return undefined;
    }
    return resolved.value;
  }

  /**
   * Options are structural: the engine needs them at registration time, so
   * every one must evaluate to a concrete value.
   */
  private evaluateOptions(decl: ResourceDecl): ResourceOptions | undefined {
    const opts = decl.options;
    const out: Mutable<ResourceOptions> = {};
    let overallOk = true;
    const check = <T>(value: T | undefined | false): T | undefined => {
      if (value === false) overallOk = false;
      return value === false ? undefined : value;
    };

    out.parent = check(this.optionResource('parent', opts.parent));
    const provider = check(this.optionResource('provider', opts.provider));
    if (provider !== undefined && provider.kind !== 'provider') {
      this.fail(opts.provider?.range, `resource passed as Provider was not a provider resource '${provider.name}'`);
      overallOk = false;
    }
    out.provider = provider;
    out.providers = check(this.optionResourceCollection('providers', opts.providers));
    out.dependsOn = check(this.optionResourceList('dependsOn', opts.dependsOn));
    out.deletedWith = check(this.optionResource('deletedWith', opts.deletedWith));
    out.replaceWith = check(this.optionResourceList('replaceWith', opts.replaceWith));
    out.protect = check(this.optionBool('protect', opts.protect));
    out.deleteBeforeReplace = check(this.optionBool('deleteBeforeReplace', opts.deleteBeforeReplace));
    out.retainOnDelete = check(this.optionBool('retainOnDelete', opts.retainOnDelete));
    out.import = check(this.optionString('import', opts.import));
    out.version = check(this.optionString('version', opts.version));
    out.pluginDownloadURL = check(this.optionString('pluginDownloadURL', opts.pluginDownloadURL));
    out.additionalSecretOutputs = check(this.optionStrings('additionalSecretOutputs', opts.additionalSecretOutputs));
    out.ignoreChanges = check(this.optionStrings('ignoreChanges', opts.ignoreChanges));
    out.replaceOnChanges = check(this.optionStrings('replaceOnChanges', opts.replaceOnChanges));
    out.hideDiffs = check(this.optionStrings('hideDiffs', opts.hideDiffs));
    out.aliases = check(this.optionAliases(opts.aliases));

    if (opts.customTimeouts !== undefined) {
      const timeouts: Mutable<CustomTimeouts> = {};
      timeouts.create = check(this.optionString('customTimeouts.create', opts.customTimeouts.create));
      timeouts.update = check(this.optionString('customTimeouts.update', opts.customTimeouts.update));
      timeouts.delete = check(this.optionString('customTimeouts.delete', opts.customTimeouts.delete));
      out.customTimeouts = timeouts;
    }
    return overallOk ? out : undefined;
  }

  /** The concrete value of an option, undefined when absent, false on failure. */
  private optionValue(name: string, expr: Expr | undefined): Value | undefined | false {
    if (expr === undefined) return undefined;
    const result = this.evaluateExpr(expr);
    if (!result.ok) return false;
    if (result.value instanceof Deferred) {
      this.fail(expr.range, `${name} must be known when the resource is registered, not a deferred value`);
      return false;
    }
    return result.value;
  }

  private optionResource(name: string, expr: Expr | undefined): ResourceHandle | undefined | false {
    const value = this.optionValue(name, expr);
    if (value === undefined || value === false) return value;
    if (!(value instanceof ResourceHandle)) {
      this.fail(expr?.range, `${name} must be a resource, not ${typeString(value)}`);
      return false;
    }
    return value;
  }

  private optionResourceList(name: string, expr: Expr | undefined): ResourceHandle[] | undefined | false {
    const value = this.optionValue(name, expr);
    if (value === undefined || value === false) return value;
    if (!isList(value)) {
      this.fail(expr?.range, `${name} must be a list of resources, not ${typeString(value)}`);
      return false;
    }
    return this.handles(name, expr, value);
  }

  private optionResourceCollection(name: string, expr: Expr | undefined): ResourceHandle[] | undefined | false {
    const value = this.optionValue(name, expr);
    if (value === undefined || value === false) return value;
    if (isList(value)) return this.handles(name, expr, value);
    if (isValueMap(value)) return this.handles(name, expr, Object.values(value));
    this.fail(expr?.range, `${name} must be a list or map of resources, not ${typeString(value)}`);
    return false;
  }

  private handles(name: string, expr: Expr | undefined, items: ReadonlyArray<Value>): ResourceHandle[] | false {
    const out: ResourceHandle[] = [];
    for (const [i, item] of items.entries()) {
      if (!(item instanceof ResourceHandle)) {
        this.fail(expr?.range, `${name}[${i}] must be a resource, not ${typeString(item)}`);
        return false;
      }
      out.push(item);
    }
    return out;
  }

  private optionBool(name: string, expr: Expr | undefined): boolean | undefined | false {
    const value = this.optionValue(name, expr);
    if (value === undefined || value === false) return value;
    if (typeof value !== 'boolean') {
      this.fail(expr?.range, `${name} must be a boolean, not ${typeString(value)}`);
      return false;
    }
    return value;
  }

  private optionString(name: string, expr: Expr | undefined): string | undefined | false {
    const value = this.optionValue(name, expr);
    if (value === undefined || value === false) return value;
    if (typeof value !== 'string') {
      this.fail(expr?.range, `${name} must be a string, not ${typeString(value)}`);
      return false;
    }
    return value;
  }

  private optionStrings(name: string, expr: Expr | undefined): string[] | undefined | false {
    const value = this.optionValue(name, expr);
    if (value === undefined || value === false) return value;
    if (!isList(value) || !value.every((v): v is string => typeof v === 'string')) {
      this.fail(expr?.range, `${name} must be a list of strings`);
      return false;
    }
    return [...value];
  }

  private optionAliases(expr: Expr | undefined): AliasSpec[] | undefined | false {
    const value = this.optionValue('aliases', expr);
    if (value === undefined || value === false) return value;
    if (!isList(value)) {
      this.fail(expr?.range, 'aliases must be a list');
      return false;
    }
    const out: AliasSpec[] = [];
    for (const [i, item] of value.entries()) {
      if (typeof item === 'string') {
        out.push(item);
        continue;
      }
      if (!isValueMap(item)) {
        this.fail(expr?.range, `aliases[${i}] must be a string or object`);
        return false;
      }
      const { noParent, ...fields } = item;
      const alias: Record<string, string | boolean> = {};
      for (const [field, v] of Object.entries(fields)) {
        if (typeof v !== 'string') {
          this.fail(expr?.range, `alias field '${field}' must be a string`);
          return false;
        }
        alias[field] = v;
      }
      if (noParent !== undefined) {
        if (typeof noParent !== 'boolean') {
          this.fail(expr?.range, "alias field 'noParent' must be a boolean");
          return false;
        }
        alias['noParent'] = noParent;
      }
      out.push(alias);
    }
    return out;
  }

  // ---------------------------------------------------------------------------
  // Expressions
  // ---------------------------------------------------------------------------

  evaluateExpr(expr: Expr): Evaluated {
    switch (expr.kind) {
      case 'null':
        return ok(null);
      case 'boolean':
      case 'number':
      case 'string':
        return ok(expr.value);
      case 'interpolate':
        return this.evaluateInterpolate(expr.parts, expr);
      case 'symbol':
        return this.evaluatePropertyAccess(expr, expr.property);
      case 'list':
        return this.evaluateList(expr.elements);
      case 'object':
        return this.evaluateObject(expr, 0, {});
      case 'invoke':
        return this.evaluateInvoke(expr);
      case 'join':
        return this.evaluateJoin(expr.delimiter, expr.values);
      case 'split':
        return this.evaluateSplit(expr.delimiter, expr.source);
      case 'select':
        return this.evaluateSelect(expr.index, expr.values);
      case 'toJSON':
        return this.evaluateToJSON(expr.value);
      case 'toBase64':
        return this.unaryString(expr.value, 'fn::toBase64', (s) => ok(Buffer.from(s, 'utf8').toString('base64')));
      case 'fromBase64':
        return this.unaryString(expr.value, 'fn::fromBase64', (s) => this.decodeBase64(expr.value, s));
      case 'secret': {
        const result = this.evaluateExpr(expr.value);
        return result.ok ? ok(toDeferred(result.value).asSecret()) : FAILED;
      }
      case 'readFile':
        return this.unaryString(expr.value, 'fn::readFile', (path) => this.readFile(expr.value, path));
      case 'rfc3339ToUnix':
        return this.unaryString(expr.value, 'fn::rfc3339ToUnix', (s) => {
          const ms = RFC3339.test(s) ? Date.parse(s) : Number.NaN;
          if (Number.isNaN(ms)) return this.fail(expr.value.range, `failed to parse RFC3339 timestamp "${s}"`);
          return ok(Math.floor(ms / 1000));
        });
      case 'stringAsset':
        return this.unaryString(expr.source, 'fn::stringAsset', (s) => ok(new AssetValue('string', s)));
      case 'fileAsset':
        return this.unaryString(expr.source, 'fn::fileAsset', (s) => ok(new AssetValue('file', s)));
      case 'remoteAsset':
        return this.unaryString(expr.source, 'fn::remoteAsset', (s) => ok(new AssetValue('remote', s)));
      case 'fileArchive':
        return this.unaryString(expr.source, 'fn::fileArchive', (s) => ok(new ArchiveValue('file', s)));
      case 'remoteArchive':
        return this.unaryString(expr.source, 'fn::remoteArchive', (s) => ok(new ArchiveValue('remote', s)));
      case 'assetArchive':
        return this.evaluateAssetArchive(expr);
      case 'stackReference':
        return this.evaluateStackReference(expr);
      default:
        return assertNever(expr);
    }
  }

  private evaluateList(elements: ReadonlyArray<Expr>): Evaluated {
    const values: Value[] = [];
    let overallOk = true;
    for (const element of elements) {
      const result = this.evaluateExpr(element);
      if (!result.ok) overallOk = false;
      else values.push(result.value);
    }
    return overallOk ? ok(values) : FAILED;
  }

  /**
   * Entries are evaluated in order. A deferred key suspends the rest of the
   * object until it resolves, so later entries never run ahead of it.
   */
  private evaluateObject(expr: ObjectExpr, start: number, acc: Record<string, Value>): Evaluated {
    for (let i = start; i < expr.entries.length; i++) {
      const entry = expr.entries[i];
      if (entry === undefined) continue;
      const key = this.evaluateExpr(entry.key);
      if (!key.ok) return FAILED;
      if (key.value instanceof Deferred) {
        const next = i + 1;
        return ok(
          this.continueWith(key.value, (k) =>
            this.addEntry(entry, acc, k) ? this.evaluateObject(expr, next, acc) : FAILED,
          ),
        );
      }
      if (!this.addEntry(entry, acc, key.value)) return FAILED;
    }
    return ok(acc);
  }

  private addEntry(entry: ObjectProperty, acc: Record<string, Value>, key: Value): boolean {
    if (typeof key !== 'string') {
      this.fail(entry.key.range, `object key must evaluate to a string, not ${typeString(key)}`);
      return false;
    }
    const value = this.evaluateExpr(entry.value);
    if (!value.ok) return false;
    setValue(acc, key, value.value);
    return true;
  }

  private evaluateInterpolate(
    parts: ReadonlyArray<{ readonly text: string; readonly value?: PropertyAccess }>,
    expr: Expr,
  ): Evaluated {
    const values: Value[] = [];
    for (const part of parts) {
      if (part.value === undefined) continue;
      const result = this.evaluatePropertyAccess(expr, part.value);
      if (!result.ok) return FAILED;
      values.push(resolveDeep(result.value, 'urn'));
    }
    return this.lift(values, (resolved) => {
      let out = '';
      let i = 0;
      for (const part of parts) {
        out += part.text;
        if (part.value !== undefined) out += formatInterpolated(resolved[i++] ?? null);
      }
      return ok(out);
    });
  }

  // ---------------------------------------------------------------------------
  // Property Access
  // ---------------------------------------------------------------------------

  private evaluatePropertyAccess(expr: Expr, access: PropertyAccess): Evaluated {
    const written = rootName(access);
    const name = this.localName(written);
    const root = this.lookupRoot(name);
    if (root === undefined) {
      if (this.failedNodes.has(name)) return FAILED;
      return this.fail(expr.range, `resource, variable, or config value "${written}" not found`);
    }
    return this.evaluateAccess(expr, root, access.accessors.slice(1));
  }

  /** Resources first, then config, then variables, then the environment object. */
  private lookupRoot(name: string): Value | undefined {
    const resource = this.resources.get(name);
    if (resource !== undefined) return resource;
    const config = this.configs.get(name);
    if (config !== undefined) return config;
    const variable = this.variables.get(name);
    if (variable !== undefined) return variable;
    return name === ENVIRONMENT_NAME ? this.environment : undefined;
  }

  /** `<project>:name` names `name` when the running project is `<project>` and nothing is declared as written. */
  private localName(name: string): string {
    const prefix = `${this.project}:`;
    if (this.project === '' || !name.startsWith(prefix)) return name;
    if (this.lookupRoot(name) !== undefined || this.failedNodes.has(name)) return name;
    return name.slice(prefix.length);
  }

  private evaluateAccess(expr: Expr, start: Value, accessors: ReadonlyArray<PropertyAccessor>): Evaluated {
    let receiver = start;
    for (let i = 0; i < accessors.length; i++) {
      const accessor = accessors[i];
      if (accessor === undefined) break;
      if (receiver instanceof Deferred) {
        const rest = accessors.slice(i);
        return ok(this.continueWith(receiver, (v) => this.evaluateAccess(expr, v, rest)));
      }

      const key = accessor.kind === 'name' ? accessor.name : accessor.index;
      if (receiver instanceof ResourceHandle) {
        if (typeof key !== 'string') {
          return this.fail(expr.range, 'cannot access an object property using an integer index');
        }
        if (key === 'urn') receiver = receiver.urn;
        else if (key === 'id') receiver = receiver.id ?? null;
        else {
          const resourceName = receiver.name;
          receiver = this.track(
            this.engine.getOutput(receiver, key),
            this.reportOnce(expr.range, `failed to read output "${key}" of resource ${resourceName}`),
          );
        }
      } else if (isList(receiver)) {
        if (typeof key !== 'number') {
          return this.fail(expr.range, 'cannot access a list element using a property name');
        }
        if (key < 0 || key >= receiver.length) {
          return this.fail(expr.range, `list index ${key} out-of-bounds for list of length ${receiver.length}`);
        }
        receiver = receiver[key] ?? null;
      } else if (isValueMap(receiver)) {
        if (typeof key !== 'string') {
          return this.fail(expr.range, 'cannot access an object property using an integer index');
        }
        receiver = ownValue(receiver, key) ?? null;
      } else {
        return this.fail(expr.range, `receiver must be a list or object, not ${typeString(receiver)}`);
      }
    }
    return ok(receiver);
  }

  // ---------------------------------------------------------------------------
  // Builtins
  // ---------------------------------------------------------------------------

  private evaluateInvoke(expr: InvokeExpr): Evaluated {
    const token = expr.token.value;
    const fn = this.resolveFunctionSchema(expr);
    if (fn === undefined) return FAILED;

    let returnKey: string | undefined;
    if (expr.return !== undefined) {
      returnKey = this.typing?.invokeReturn(expr) ?? findOutput(fn, expr.return.value);
      if (returnKey === undefined) {
        const { summary, detail } = new NonExistentFieldFormatter({
          parentLabel: token,
          fields: fn.outputs?.properties.map((p) => p.name) ?? [],
          maxElements: 5,
          fieldsAreProperties: true,
        }).messageWithDetail(expr.return.value, expr.return.value);
        return this.fail(expr.return.range, summary, detail);
      }
    }

    const args = expr.args !== undefined ? this.evaluateExpr(expr.args) : ok({});
    if (!args.ok) return FAILED;

    const options: Mutable<InvokeOptions> = {};
    let overallOk = true;
    const parent = this.optionResource('parent', expr.options.parent);
    const provider = this.optionResource('provider', expr.options.provider);
    const dependsOn = this.optionResourceList('dependsOn', expr.options.dependsOn);
    if (parent === false || provider === false || dependsOn === false) overallOk = false;
    if (parent) options.parent = parent;
    if (provider) options.provider = provider;
    if (dependsOn) options.dependsOn = dependsOn;
    if (expr.options.version !== undefined) options.version = expr.options.version.value;
    if (expr.options.pluginDownloadURL !== undefined) {
      options.pluginDownloadURL = expr.options.pluginDownloadURL.value;
    }
    if (!overallOk) return FAILED;

    return this.lift([args.value], ([a]) => {
      if (a === undefined || !isValueMap(a)) {
        return this.fail(expr.args?.range ?? expr.range, `arguments to fn::invoke must be an object, not ${typeString(a ?? null)}`);
      }
      const result = this.track(
        this.engine.invoke(fn.token, a, options),
        this.reportOnce(expr.range, `fn::invoke of ${fn.token} failed`),
      );
      if (returnKey === undefined) return ok(result);
      const selected = returnKey;
      return ok(result.apply((outputs): Value => ownValue(outputs, selected) ?? null));
    });
  }

  private resolveFunctionSchema(expr: InvokeExpr): FunctionSchema | undefined {
    const known = this.typing?.functionSchema(expr);
    if (known !== undefined) return known;
    const resolved = resolveFunction(this.loader, expr.token.value, expr.options.version?.value);
    if (!resolved.ok) {
      this.fail(expr.range, resolved.error);
      return undefined;
    }
    return resolved.value;
  }

  private evaluateJoin(delimiterExpr: Expr, valuesExpr: Expr): Evaluated {
    const delimiter = this.evaluateExpr(delimiterExpr);
    const values = this.evaluateExpr(valuesExpr);
    if (!delimiter.ok || !values.ok) return FAILED;
    return this.lift([delimiter.value, values.value], ([d, list]) => {
      if (typeof d !== 'string') {
        return this.fail(delimiterExpr.range, `the delimiter of fn::join must be a string, not ${typeString(d ?? null)}`);
      }
      if (list === undefined || !isList(list)) {
        return this.fail(valuesExpr.range, `the values of fn::join must be a list, not ${typeString(list ?? null)}`);
      }
      return this.lift(list, (items) => {
        const parts: string[] = [];
        for (const [i, item] of items.entries()) {
          if (typeof item !== 'string') {
            return this.fail(
              valuesExpr.range,
              `expected element ${i} of fn::join to produce a string, got ${typeString(item)}`,
            );
          }
          parts.push(item);
        }
        return ok(parts.join(d));
      });
    });
  }

  private evaluateSplit(delimiterExpr: Expr, sourceExpr: Expr): Evaluated {
    const delimiter = this.evaluateExpr(delimiterExpr);
    const source = this.evaluateExpr(sourceExpr);
    if (!delimiter.ok || !source.ok) return FAILED;
    return this.lift([delimiter.value, source.value], ([d, s]) => {
      if (typeof d !== 'string') {
        return this.fail(delimiterExpr.range, `the delimiter of fn::split must be a string, not ${typeString(d ?? null)}`);
      }
      if (typeof s !== 'string') {
        return this.fail(sourceExpr.range, `the source of fn::split must be a string, not ${typeString(s ?? null)}`);
      }
      return ok(s.split(d));
    });
  }

  /**
   * The list is evaluated up front; only indexing into it waits for a
   * deferred index.
   */
  private evaluateSelect(indexExpr: Expr, valuesExpr: Expr): Evaluated {
    const index = this.evaluateExpr(indexExpr);
    const values = this.evaluateExpr(valuesExpr);
    if (!index.ok || !values.ok) return FAILED;
    return this.lift([index.value], ([i]) => {
      if (typeof i !== 'number') {
        return this.fail(indexExpr.range, `index must be a number, not ${typeString(i ?? null)}`);
      }
      if (!Number.isInteger(i) || i < 0) {
        return this.fail(indexExpr.range, `index must be a positive integral, not ${i}`);
      }
      return this.lift([values.value], ([list]) => {
        if (list === undefined || !isList(list)) {
          return this.fail(valuesExpr.range, `the values of fn::select must be a list, not ${typeString(list ?? null)}`);
        }
        if (i >= list.length) {
          return this.fail(indexExpr.range, `list index ${i} out-of-bounds for list of length ${list.length}`);
        }
        return ok(list[i] ?? null);
      });
    });
  }

  private evaluateToJSON(valueExpr: Expr): Evaluated {
    const result = this.evaluateExpr(valueExpr);
    if (!result.ok) return FAILED;
    return this.lift([resolveDeep(result.value, 'urn')], ([v]) => ok(JSON.stringify(v ?? null)));
  }

  private decodeBase64(at: Expr, s: string): Evaluated {
    if (s.length % 4 !== 0 || !BASE64.test(s)) {
      return this.fail(at.range, `fn::fromBase64 unable to decode "${s}": not valid base64`);
    }
    try {
      return ok(new TextDecoder('utf-8', { fatal: true }).decode(Buffer.from(s, 'base64')));
    } catch (err: unknown) {
      if (err instanceof TypeError) {
        return this.fail(at.range, 'fn::fromBase64 output is not a valid UTF-8 string');
      }
      throw err;
    }
  }

  private readFile(at: Expr, path: string): Evaluated {
    const reader = this.fileReader;
    if (reader === undefined) return this.fail(at.range, 'fn::readFile is not available: no file reader configured');
    const content = Deferred.fromPromise(reader.readFile(path));
    return ok(this.track(content, this.reportOnce(at.range, `failed to read file "${path}"`)));
  }

  /** Entries are evaluated in ascending path order, whatever order the source uses. */
  private evaluateAssetArchive(expr: AssetArchiveExpr): Evaluated {
    const entries = [...expr.entries].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
    const values: Value[] = [];
    let overallOk = true;
    for (const entry of entries) {
      const result = this.evaluateExpr(entry.value);
      if (!result.ok) overallOk = false;
      else values.push(result.value);
    }
    if (!overallOk) return FAILED;
    return this.lift(values, (resolved) => {
      const assets: Array<readonly [string, AssetValue | ArchiveValue]> = [];
      for (const [i, entry] of entries.entries()) {
        const v = resolved[i] ?? null;
        if (!(v instanceof AssetValue) && !(v instanceof ArchiveValue)) {
          return this.fail(entry.value.range, `asset archive entry "${entry.path}" must be an asset or archive, not ${typeString(v)}`);
        }
        assets.push([entry.path, v]);
      }
      return ok(new ArchiveValue('assets', '', assets));
    });
  }

  /** One stack reference resource per distinct stack name. */
  private evaluateStackReference(expr: StackReferenceExpr): Evaluated {
    const stackName = expr.stackName.value;
    let ref = this.stackReferences.get(stackName);
    if (ref === undefined) {
      const registered = this.engine.registerResource({
        token: STACK_REFERENCE_TOKEN,
        name: stackName,
        custom: true,
        properties: { name: stackName },
        options: {},
      });
      const report = this.reportOnce(expr.stackName.range, `failed to reference stack "${stackName}"`);
      ref = new ResourceHandle(
        stackName,
        STACK_REFERENCE_TOKEN,
        'custom',
        this.track(registered.urn, report),
        registered.id === undefined ? undefined : this.track(registered.id, report),
        this.track(registered.outputs, report),
      );
      this.stackReferences.set(stackName, ref);
    }
    const handle = ref;
    const property = this.evaluateExpr(expr.propertyName);
    if (!property.ok) return FAILED;
    return this.lift([property.value], ([name]) => {
      if (typeof name !== 'string') {
        return this.fail(
          expr.propertyName.range,
          `expected property name argument to fn::stackReference to be a string, got ${typeString(name ?? null)}`,
        );
      }
      return ok(
        this.track(
          this.engine.getOutput(handle, name),
          this.reportOnce(expr.range, `failed to read output "${name}" of stack "${stackName}"`),
        ),
      );
    });
  }

  private unaryString(arg: Expr, builtin: string, fn: (s: string) => Evaluated): Evaluated {
    const result = this.evaluateExpr(arg);
    if (!result.ok) return FAILED;
    return this.lift([result.value], ([v]) => {
      if (typeof v !== 'string') {
        return this.fail(arg.range, `the argument to ${builtin} must be a string, not ${typeString(v ?? null)}`);
      }
      return fn(v);
    });
  }

  // ---------------------------------------------------------------------------
  // Lifting
  // ---------------------------------------------------------------------------

  /** Run `fn` now when no argument is deferred, otherwise once all of them resolve. */
  private lift(args: ReadonlyArray<Value>, fn: (args: ReadonlyArray<Value>) => Evaluated): Evaluated {
    if (!args.some((a) => a instanceof Deferred)) return fn(args);
    return ok(this.continueWith(Deferred.all(args.map(toDeferred)), fn));
  }

  private continueWith<T>(deferred: Deferred<T>, fn: (value: T) => Evaluated): Deferred<Value> {
    const next = deferred.apply((value): Value => {
      this.continuationDepth++;
      try {
        const result = fn(value);
        return result.ok ? result.value : Deferred.failed<Value>();
      } finally {
        this.continuationDepth--;
      }
    });
    return this.track(next, (message) => this.reportUnexpected(message));
  }

  /**
   * Watch a Deferred whose failure nobody has reported yet: an engine
   * answer, a file read, a continuation. The first error it settles with
   * goes to `report`; the Deferred handed back fails without an error, so
   * later continuations skip it quietly.
   */
  private track<T>(deferred: Deferred<T>, report: (message: string) => void): Deferred<T> {
    const tracked = Deferred.fromResolution(
      deferred.resolution().then((r): Resolution<T> => {
        if (r.state !== 'failed' || r.error === undefined) return r;
        report(r.error instanceof Error ? r.error.message : String(r.error));
        return { state: 'failed' };
      }),
    );
    this.pending.push(tracked.resolution());
    return tracked;
  }

  /** Reports the first failure as `summary` with the cause as detail; later ones are dropped. */
  private reportOnce(range: SourceRange | undefined, summary: string): (message: string) => void {
    let reported = false;
    return (message) => {
      if (reported) return;
      reported = true;
      this.inContinuation(() => this.fail(range, summary, message));
    };
  }

  /** A continuation threw: a defect in evaluation rather than in the template. */
  private reportUnexpected(message: string): void {
    this.inContinuation(() => this.fail(undefined, 'unexpected failure during evaluation', message));
  }

  private inContinuation(fn: () => void): void {
    this.continuationDepth++;
    try {
      fn();
    } finally {
      this.continuationDepth--;
    }
  }

  /** Record an error; inside a continuation, also tell the engine. */
  private fail(range: SourceRange | undefined, summary: string, detail?: string): Evaluated {
    this.diagnostics.error(range, summary, detail);
    if (this.continuationDepth > 0) {
      this.engine.log.error(formatLogLine(range, detail === undefined ? summary : `${summary}: ${detail}`));
    }
    return FAILED;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function formatInterpolated(value: Value): string {
  if (value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

function formatLogLine(range: SourceRange | undefined, summary: string): string {
  if (range === undefined) return summary;
  return `${range.filename}:${range.start.line}:${range.start.column}: ${summary}`;
}
