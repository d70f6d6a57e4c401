/**
 * Strata Runtime Host: In-Memory Engine
 *
 * Implements the Engine contract from @strata/kernel without a deployment
 * backend. It backs preview runs and the tests.
 *
 *   - registrations and reads are recorded in call order
 *   - a resource's outputs are its input properties, plus `urn` and `id`
 *     and anything `computeOutputs` adds
 *   - during a preview `id` and computed outputs are unknown; inputs stay known
 *   - invokes are answered by registered function handlers
 *   - stack references answer from the `stacks` map
 *   - engine log calls are captured in `logs`
 */

import {
  Deferred,
  STACK_REFERENCE_TOKEN,
  isValueMap,
  ownValue,
  resolveDeep,
  setValue,
  toDeferred,
} from '@strata/kernel';
import type {
  Engine,
  EngineLog,
  InvokeOptions,
  ReadResourceRequest,
  RegisterResourceRequest,
  RegisteredResource,
  ResourceHandle,
  Resolution,
  Value,
  ValueMap,
} from '@strata/kernel';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type FunctionHandler = (args: ValueMap) => ValueMap | Promise<ValueMap>;

export type EngineLogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface EngineLogRecord {
  readonly level: EngineLogLevel;
  readonly message: string;
}

export interface EngineCall {
  readonly kind: 'register' | 'read';
  readonly request: RegisterResourceRequest;
}

export interface MemoryEngineOptions {
  readonly project?: string;
  readonly stack?: string;
  readonly preview?: boolean;
  /** Function handlers keyed by canonical token, e.g. `aws:index:getRegion`. */
  readonly functions?: Readonly<Record<string, FunctionHandler>>;
  /** Outputs of other stacks, keyed by stack name. */
  readonly stacks?: Readonly<Record<string, ValueMap>>;
  /** Provider-computed outputs, merged over a resource's inputs. */
  readonly computeOutputs?: (request: RegisterResourceRequest) => ValueMap;
  /** Receives every engine log record as it is captured. */
  readonly onLog?: (record: EngineLogRecord) => void;
}

// ---------------------------------------------------------------------------
// MemoryEngine
// ---------------------------------------------------------------------------

export class MemoryEngine implements Engine {
  readonly preview: boolean;
  readonly calls: EngineCall[] = [];
  readonly invokes: { readonly token: string; readonly args: ValueMap; readonly options: InvokeOptions }[] = [];
  readonly logs: EngineLogRecord[] = [];
  readonly log: EngineLog;

  private published: ValueMap | undefined;
  private readonly project: string;
  private readonly stack: string;

  constructor(private readonly options: MemoryEngineOptions = {}) {
    this.preview = options.preview ?? false;
    this.project = options.project ?? 'project';
    this.stack = options.stack ?? 'dev';
    this.log = {
      error: (message) => this.capture('error', message),
      warn: (message) => this.capture('warn', message),
      info: (message) => this.capture('info', message),
      debug: (message) => this.capture('debug', message),
    };
  }

  /** Requests in the order they were made, registrations and reads alike. */
  get registrations(): ReadonlyArray<RegisterResourceRequest> {
    return this.calls.map((c) => c.request);
  }

  urnOf(token: string, name: string): string {
    return `urn:strata:${this.stack}::${this.project}::${token}::${name}`;
  }

  registerResource(request: RegisterResourceRequest): RegisteredResource {
    this.calls.push({ kind: 'register', request });
    const id = request.custom ? this.idFor(request.name) : undefined;
    return this.respond(request, request.properties, id);
  }

  readResource(request: ReadResourceRequest): RegisteredResource {
    this.calls.push({ kind: 'read', request });
    const id = toDeferred(request.id).apply((v): string => (typeof v === 'string' ? v : JSON.stringify(v)));
    return this.respond(request, request.properties, id);
  }

  invoke(token: string, args: ValueMap, options: InvokeOptions): Deferred<ValueMap> {
    this.invokes.push({ token, args, options });
    const functions = this.options.functions ?? {};
    const handler = Object.hasOwn(functions, token) ? functions[token] : undefined;
    if (handler === undefined) {
      return Deferred.failed<ValueMap>(new Error(`no handler registered for function "${token}"`));
    }
    return toDeferred(resolveDeep(args, 'urn')).apply<ValueMap>((resolved) => {
      if (!isValueMap(resolved)) throw new Error(`arguments to "${token}" did not resolve to an object`);
      return Deferred.fromPromise(Promise.resolve(handler(resolved)));
    });
  }

  getOutput(resource: ResourceHandle, key: string): Deferred<Value> {
    if (resource.token !== STACK_REFERENCE_TOKEN) return resource.output(key);
    const stacks = this.options.stacks ?? {};
    const outputs = Object.hasOwn(stacks, resource.name) ? stacks[resource.name] : undefined;
    if (outputs === undefined) return Deferred.failed<Value>(new Error(`unknown stack "${resource.name}"`));
    return Deferred.known(ownValue(outputs, key) ?? null);
  }

  registerOutputs(outputs: ValueMap): void {
    this.published = outputs;
  }

  /** The published stack outputs with every deferred value settled. */
  async outputs(): Promise<Resolution<Value> | undefined> {
    if (this.published === undefined) return undefined;
    return toDeferred(resolveDeep(this.published, 'urn')).resolution();
  }

  private idFor(name: string): Deferred<string> {
    return this.preview ? Deferred.unknown<string>() : Deferred.known(`${name}-id`);
  }

  private respond(
    request: RegisterResourceRequest,
    inputs: ValueMap,
    id: Deferred<string> | undefined,
  ): RegisteredResource {
    const urn = Deferred.known(this.urnOf(request.token, request.name));
    const computed: ValueMap = this.options.computeOutputs?.(request) ?? {};
    const outputs: ValueMap = {
      ...inputs,
      ...(this.preview ? unknownValues(computed) : computed),
      urn,
      ...(id !== undefined ? { id } : {}),
    };
    const secret = request.options.additionalSecretOutputs ?? [];
    return {
      urn,
      ...(id !== undefined ? { id } : {}),
      outputs: Deferred.known(secret.length === 0 ? outputs : markSecret(outputs, secret)),
    };
  }

  private capture(level: EngineLogLevel, message: string): void {
    const record = { level, message };
    this.logs.push(record);
    this.options.onLog?.(record);
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Computed outputs are not known until the resource exists. */
function unknownValues(values: ValueMap): ValueMap {
  return Object.fromEntries(Object.keys(values).map((k) => [k, Deferred.unknown<Value>()]));
}

function markSecret(outputs: ValueMap, names: ReadonlyArray<string>): ValueMap {
  const marked: Record<string, Value> = { ...outputs };
  for (const name of names) {
    const value = ownValue(outputs, name);
    if (value !== undefined) setValue(marked, name, toDeferred(value).asSecret());
  }
  return marked;
}
