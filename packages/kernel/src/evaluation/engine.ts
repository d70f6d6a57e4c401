/**
 * Strata Kernel: Orchestration Engine Contract
 *
 * The evaluator never creates infrastructure itself. It asks an Engine to
 * register resources, read existing ones, call provider functions and
 * publish outputs. Results come back as Deferred values the engine settles
 * when the remote side answers.
 *
 * runtime-host supplies an in-memory implementation; a real deployment
 * engine adapter implements the same interface.
 */

import type { Deferred } from './deferred.js';
import type { ResourceHandle, Value, ValueMap } from './values.js';

export interface Alias {
  readonly name?: string;
  readonly type?: string;
  readonly stack?: string;
  readonly project?: string;
  readonly parentUrn?: string;
  readonly noParent?: boolean;
}

/** An alias is either a full URN or a set of fields overriding the current one. */
export type AliasSpec = string | Alias;

export interface CustomTimeouts {
  readonly create?: string;
  readonly update?: string;
  readonly delete?: string;
}

export interface ResourceOptions {
  readonly additionalSecretOutputs?: ReadonlyArray<string>;
  readonly aliases?: ReadonlyArray<AliasSpec>;
  readonly customTimeouts?: CustomTimeouts;
  readonly deleteBeforeReplace?: boolean;
  readonly dependsOn?: ReadonlyArray<ResourceHandle>;
  readonly ignoreChanges?: ReadonlyArray<string>;
  readonly import?: string;
  readonly parent?: ResourceHandle;
  readonly protect?: boolean;
  readonly provider?: ResourceHandle;
  readonly providers?: ReadonlyArray<ResourceHandle>;
  readonly version?: string;
  readonly pluginDownloadURL?: string;
  readonly replaceOnChanges?: ReadonlyArray<string>;
  readonly retainOnDelete?: boolean;
  readonly deletedWith?: ResourceHandle;
  readonly replaceWith?: ReadonlyArray<ResourceHandle>;
  readonly hideDiffs?: ReadonlyArray<string>;
}

export interface RegisterResourceRequest {
  readonly token: string;
  readonly name: string;
  /** Custom resources are managed by a provider; components only group children. */
  readonly custom: boolean;
  readonly properties: ValueMap;
  readonly options: ResourceOptions;
}

export interface ReadResourceRequest extends RegisterResourceRequest {
  readonly id: Value;
}

export interface RegisteredResource {
  readonly urn: Deferred<string>;
  readonly id?: Deferred<string>;
  readonly outputs: Deferred<ValueMap>;
}

export interface InvokeOptions {
  readonly parent?: ResourceHandle;
  readonly provider?: ResourceHandle;
  readonly dependsOn?: ReadonlyArray<ResourceHandle>;
  readonly version?: string;
  readonly pluginDownloadURL?: string;
}

/** The engine's own log channel, separate from template diagnostics. */
export interface EngineLog {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

export interface Engine {
  /** True when resources are planned but not created; outputs may be unknown. */
  readonly preview: boolean;
  readonly log: EngineLog;

  registerResource(request: RegisterResourceRequest): RegisteredResource;
  readResource(request: ReadResourceRequest): RegisteredResource;
  invoke(token: string, args: ValueMap, options: InvokeOptions): Deferred<ValueMap>;
  /** A single output of a resource, e.g. of a stack reference. */
  getOutput(resource: ResourceHandle, key: string): Deferred<Value>;
  registerOutputs(outputs: ValueMap): void;
}

/** Reads files named by `readFile`, relative to the project root. */
export interface FileReader {
  readFile(path: string): Promise<string>;
}

/** Values of the reserved `strata` object. */
export interface EvaluationContext {
  readonly cwd: string;
  readonly project: string;
  readonly stack: string;
  readonly organization: string;
  readonly rootDirectory: string;
}

/** Token of the resource that backs `fn::stackReference`. */
export const STACK_REFERENCE_TOKEN = 'strata:strata:StackReference';
