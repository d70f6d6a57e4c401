/**
 * Strata Kernel: Test Stand-ins
 *
 * An orchestration engine that records every call and answers in process,
 * plus the package schema the kernel tests resolve against.
 */

import { Deferred, InMemoryPackageLoader, bindPackage, ownValue } from '../src/index.js';
import type {
  Engine,
  EvaluationContext,
  InvokeOptions,
  PackageSpec,
  ReadResourceRequest,
  RegisterResourceRequest,
  RegisteredResource,
  ResourceHandle,
  Value,
  ValueMap,
} from '../src/index.js';

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export interface InvokeCall {
  readonly token: string;
  readonly args: ValueMap;
  readonly options: InvokeOptions;
}

export class FakeEngine implements Engine {
  preview = false;
  readonly registrations: RegisterResourceRequest[] = [];
  readonly reads: ReadResourceRequest[] = [];
  readonly invokes: InvokeCall[] = [];
  readonly logged: string[] = [];
  published: ValueMap | undefined;

  /** Extra outputs per resource name, merged over its inputs. */
  readonly outputOverrides = new Map<string, ValueMap>();
  /** Resource names whose outputs stay unknown. */
  readonly unknownOutputs = new Set<string>();
  readonly invokeResults = new Map<string, ValueMap>();
  readonly stackOutputs = new Map<string, ValueMap>();
  /** Function tokens whose invocation fails with the given message. */
  readonly failingInvokes = new Map<string, string>();
  /** Resource names whose output reads fail with the given message. */
  readonly failingOutputs = new Map<string, string>();

  readonly log = {
    error: (m: string): void => void this.logged.push(`error: ${m}`),
    warn: (m: string): void => void this.logged.push(`warn: ${m}`),
    info: (m: string): void => void this.logged.push(`info: ${m}`),
    debug: (m: string): void => void this.logged.push(`debug: ${m}`),
  };

  registerResource(request: RegisterResourceRequest): RegisteredResource {
    this.registrations.push(request);
    return this.respond(request);
  }

  readResource(request: ReadResourceRequest): RegisteredResource {
    this.reads.push(request);
    return this.respond(request);
  }

  invoke(token: string, args: ValueMap, options: InvokeOptions): Deferred<ValueMap> {
    this.invokes.push({ token, args, options });
    const failure = this.failingInvokes.get(token);
    if (failure !== undefined) return Deferred.failed<ValueMap>(new Error(failure));
    return Deferred.known(this.invokeResults.get(token) ?? {});
  }

  getOutput(resource: ResourceHandle, key: string): Deferred<Value> {
    const failure = this.failingOutputs.get(resource.name);
    if (failure !== undefined) return Deferred.failed<Value>(new Error(failure));
    const stack = this.stackOutputs.get(resource.name);
    if (stack !== undefined) return Deferred.known(ownValue(stack, key) ?? null);
    return resource.output(key);
  }

  registerOutputs(outputs: ValueMap): void {
    this.published = outputs;
  }

  private respond(request: RegisterResourceRequest): RegisteredResource {
    const urn = `urn:test::${request.token}::${request.name}`;
    const outputs: Deferred<ValueMap> = this.unknownOutputs.has(request.name)
      ? Deferred.unknown<ValueMap>()
      : Deferred.known({ ...request.properties, ...this.outputOverrides.get(request.name) });
    return {
      urn: Deferred.known(urn),
      ...(request.custom ? { id: Deferred.known(`${request.name}-id`) } : {}),
      outputs,
    };
  }
}

// ---------------------------------------------------------------------------
// Package
// ---------------------------------------------------------------------------

export const TEST_PACKAGE: PackageSpec = {
  name: 'test',
  version: '1.0.0',
  provider: {
    inputProperties: { region: { type: 'string' } },
  },
  resources: {
    'test:index:Bucket': {
      inputProperties: {
        name: { type: 'string' },
        size: { type: 'integer' },
        versioned: { type: 'boolean' },
        tags: { type: 'object', additionalProperties: { type: 'string' } },
        acl: { $ref: '#/types/test:index:Acl' },
      },
      properties: {
        name: { type: 'string' },
        arn: { type: 'string' },
        size: { type: 'integer' },
      },
      required: ['arn'],
    },
    'test:index:Object': {
      inputProperties: {
        bucket: { $ref: '#/resources/test:index:Bucket' },
        key: { type: 'string' },
        source: { $ref: '#/asset' },
      },
      requiredInputs: ['bucket', 'key'],
      properties: { key: { type: 'string' } },
    },
    'test:index:Group': {
      isComponent: true,
      inputProperties: { members: { type: 'array', items: { type: 'string' } } },
    },
    'test:index:Fixed': {
      inputProperties: {
        kind: { type: 'string', const: 'fixed' },
        label: { type: 'string' },
      },
    },
  },
  functions: {
    'test:index:getRegion': {
      inputs: { properties: { zone: { type: 'string' } }, required: ['zone'] },
      outputs: {
        properties: {
          name: { type: 'string' },
          zones: { type: 'array', items: { type: 'string' } },
        },
        required: ['name'],
      },
    },
    'test:index:getToken': {
      returnType: { type: 'string' },
    },
  },
  types: {
    'test:index:Acl': {
      type: 'string',
      enum: [{ value: 'private' }, { name: 'PublicRead', value: 'public-read' }],
    },
  },
};

export function testLoader(): InMemoryPackageLoader {
  const bound = bindPackage(TEST_PACKAGE);
  if (!bound.ok) throw new Error(bound.error);
  return new InMemoryPackageLoader([bound.pkg]);
}

export const TEST_CONTEXT: EvaluationContext = {
  cwd: '/work/app',
  project: 'demo',
  stack: 'dev',
  organization: 'acme',
  rootDirectory: '/work/app',
};
