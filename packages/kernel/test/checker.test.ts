/**
 * Strata Kernel: Type Checker Tests
 *
 * check/resources: properties checked against the schema's inputs
 * check/options: resource options checked against their fixed types
 * check/config: declared types, defaults and stack values agree
 * check/access: property access typed through resources, objects, lists and unions
 * check/builtins: builtin results carry their documented types
 * check/invoke: arguments, return projection and unknown functions
 */

import { describe, it, expect } from 'vitest';
import { Severity, loadTemplate } from '@strata/template';
import type { Diagnostic } from '@strata/template';
import { IntType, NumberType, StringType, scheduleTemplate, typeCheck } from '../src/index.js';
import type { StackConfigEntry, TypeCheckResult } from '../src/index.js';
import { testLoader } from './fake-engine.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function check(lines: string[], stackConfig: StackConfigEntry[] = []): TypeCheckResult {
  const loaded = loadTemplate('main.yaml', lines.join('\n') + '\n');
  expect(loaded.diagnostics.errors()).toEqual([]);
  const scheduled = scheduleTemplate(loaded.template, { stackConfig });
  expect(scheduled.ok).toBe(true);
  return typeCheck(loaded.template, scheduled.nodes, testLoader(), { stackConfig });
}

function errors(result: TypeCheckResult): string[] {
  return [...result.diagnostics].filter((d) => d.severity === Severity.Error).map((d) => d.summary);
}

function only(result: TypeCheckResult): Diagnostic {
  const all = result.diagnostics.toArray();
  expect(all.length).toBe(1);
  const [first] = all;
  if (first === undefined) throw new Error('expected one diagnostic');
  return first;
}

// ---------------------------------------------------------------------------
// Resources
// ---------------------------------------------------------------------------

describe('typeCheck resources', () => {
  it('accepts properties that match the schema', () => {
    const result = check([
      'resources:',
      '  bucket:',
      '    type: test:Bucket',
      '    properties:',
      '      name: logs',
      '      size: 3',
      '      acl: private',
    ]);
    expect(result.diagnostics.length).toBe(0);
    expect(result.typing.typeResource('bucket')).toMatchObject({ kind: 'resource', token: 'test:index:Bucket' });
    expect(result.typing.resourceSchema('bucket')?.token).toBe('test:index:Bucket');
  });

  it('explains a property of the wrong type', () => {
    const result = check([
      'resources:',
      '  bucket:',
      '    type: test:Bucket',
      '    properties:',
      '      size: [ 1 ]',
    ]);
    const diag = only(result);
    expect(diag.summary).toBe('test:index:Bucket is not assignable from {size: List<number>}');
    expect(diag.detail).toBe(
      [
        "Cannot assign '{size: List<number>}' to 'test:index:Bucket':",
        "  size: Cannot assign 'List<number>' to type 'integer?'",
      ].join('\n'),
    );
  });

  it('reports a missing required property', () => {
    const result = check([
      'resources:',
      '  bucket:',
      '    type: test:Bucket',
      '  object:',
      '    type: test:Object',
      '    properties:',
      '      bucket: ${bucket}',
    ]);
    expect(errors(result)).toEqual(["Missing required property 'key'"]);
  });

  it('reports a property the resource does not have', () => {
    const result = check(['resources:', '  bucket:', '    type: test:Bucket', '    properties:', '      sise: 3']);
    expect(errors(result)).toEqual(["Property sise does not exist on 'test:index:Bucket'."]);
  });

  it('reports an unknown resource type', () => {
    const result = check(['resources:', '  q:', '    type: test:index:Queue']);
    expect(errors(result)).toEqual([
      'error resolving type of resource q: unable to find resource type "test:index:Queue" in resource provider "test"',
    ]);
    expect(result.typing.typeResource('q')).toEqual({ kind: 'invalid' });
  });

  it('checks read state against optional outputs', () => {
    const result = check([
      'resources:',
      '  existing:',
      '    type: test:Bucket',
      '    get:',
      '      id: bucket-1',
      '      state:',
      '        arn: arn:test:bucket-1',
    ]);
    expect(result.diagnostics.length).toBe(0);
  });

  it('rejects properties and get together', () => {
    const result = check([
      'resources:',
      '  b:',
      '    type: test:Bucket',
      '    properties:',
      '      name: x',
      '    get:',
      '      id: b-1',
    ]);
    expect(errors(result)).toEqual(['Resource fields properties and get are mutually exclusive']);
  });
});

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

describe('typeCheck resource options', () => {
  it('checks boolean options', () => {
    const result = check([
      'resources:',
      '  b:',
      '    type: test:Bucket',
      '    options:',
      '      protect: yes-please',
    ]);
    expect(errors(result)).toEqual(['boolean is not assignable from string']);
  });

  it('accepts any resource where a resource is expected', () => {
    const result = check([
      'resources:',
      '  a:',
      '    type: test:Bucket',
      '  b:',
      '    type: test:Bucket',
      '    options:',
      '      dependsOn: [ "${a}" ]',
      '      parent: ${a}',
    ]);
    expect(result.diagnostics.length).toBe(0);
  });

  it('rejects a version that is not semantic', () => {
    const result = check(['resources:', '  b:', '    type: test:Bucket', '    options:', '      version: latest']);
    expect(errors(result)).toEqual([
      'unable to parse resource b provider version: "latest" is not a valid semantic version',
    ]);
  });

  it('names an unknown alias field', () => {
    const result = check([
      'resources:',
      '  b:',
      '    type: test:Bucket',
      '    options:',
      '      aliases:',
      '        - nmae: old',
    ]);
    expect(errors(result)).toEqual(['Field nmae does not exist on alias.']);
  });
});

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

describe('typeCheck config', () => {
  it('checks a default against the declared type', () => {
    const result = check(['config:', '  count:', '    type: Int', '    default: hello']);
    const diag = only(result);
    expect(diag.summary).toBe('integer is not assignable from string');
    expect(diag.detail).toBe("Cannot assign type 'string' to type 'integer'");
  });

  it('types a config with a default as an optional input', () => {
    const result = check(['config:', '  count:', '    type: Int', '    default: 3']);
    expect(result.typing.typeConfig('count')).toEqual({
      kind: 'input',
      element: { kind: 'optional', element: IntType },
    });
  });

  it('rejects an unknown config type', () => {
    const result = check(['config:', '  ratio:', '    type: Float']);
    expect(errors(result)).toEqual(["unknown config type 'Float'"]);
    expect(only(result).detail).toBe('Valid config types are String, Number, Int, Boolean or List<T>');
  });

  it('rejects a stack value that conflicts with the declared type', () => {
    const result = check(['config:', '  size:', '    type: Int'], [{ key: 'size', value: true }]);
    expect(errors(result)).toEqual(['config key "size" cannot have conflicting types integer, boolean']);
  });

  it('types undeclared stack configuration from its value', () => {
    const result = check(['variables:', '  r: ${region}'], [{ key: 'region', value: 'north' }]);
    expect(result.diagnostics.length).toBe(0);
    expect(result.typing.typeConfig('region')).toEqual({ kind: 'input', element: StringType });
    expect(result.typing.typeVariable('r')).toEqual({ kind: 'input', element: StringType });
  });
});

// ---------------------------------------------------------------------------
// Property Access
// ---------------------------------------------------------------------------

describe('typeCheck property access', () => {
  it('types resource outputs, ids and urns', () => {
    const result = check([
      'resources:',
      '  bucket:',
      '    type: test:Bucket',
      'variables:',
      '  arn: ${bucket.arn}',
      '  id: ${bucket.id}',
      '  urn: ${bucket.urn}',
    ]);
    expect(result.diagnostics.length).toBe(0);
    expect(result.typing.typeVariable('arn')).toBe(StringType);
    expect(result.typing.typeVariable('id')).toBe(StringType);
  });

  it('names a missing resource property', () => {
    const result = check(['resources:', '  bucket:', '    type: test:Bucket', 'variables:', '  x: ${bucket.nope}']);
    expect(errors(result)).toEqual(['nope does not exist on bucket.']);
  });

  it('names a missing environment property', () => {
    const result = check(['variables:', '  x: ${strata.nope}']);
    expect(errors(result)).toEqual(['nope does not exist on strata.']);
  });

  it('types environment properties as strings', () => {
    const result = check(['variables:', '  x: ${strata.project}']);
    expect(result.typing.typeVariable('x')).toBe(StringType);
  });

  it('rejects a numeric index into an object', () => {
    const result = check(['variables:', '  tags:', '    a: b', '  first: ${tags[0]}']);
    expect(errors(result)).toEqual(["Cannot index into 'tags' (type {a: string})"]);
  });

  it('accepts access into a union when one alternative supports it', () => {
    const result = check(['variables:', '  items: [ { a: x }, hello ]', '  first: ${items[0].a}']);
    expect(result.diagnostics.length).toBe(0);
    expect(result.typing.typeVariable('first')).toBe(StringType);
  });

  it('rejects access into a union when no alternative supports it', () => {
    const result = check(['variables:', '  items: [ hello, true ]', '  first: ${items[0].a}']);
    const diag = only(result);
    expect(diag.summary).toBe('Cannot access into items[0] of type Union<string, boolean>');
    expect(diag.detail).toBe(
      [
        "'items[0]' could be a type that does not support accessing:",
        "  cannot access a property on 'items[0]' (type string) Property access is only allowed on Resources and Objects",
        "  cannot access a property on 'items[0]' (type boolean) Property access is only allowed on Resources and Objects",
      ].join('\n'),
    );
  });

  it('resolves a name qualified by the running project', () => {
    const loaded = loadTemplate('main.yaml', ['variables:', '  size: 3', '  copy: ${demo:size}', ''].join('\n'));
    const scheduled = scheduleTemplate(loaded.template, { project: 'demo' });
    const result = typeCheck(loaded.template, scheduled.nodes, testLoader(), { project: 'demo' });
    expect(result.diagnostics.length).toBe(0);
    expect(result.typing.typeVariable('copy')).toBe(NumberType);
  });

  it('reports a missing name once', () => {
    const result = check(['variables:', '  x: ${nobody}']);
    expect(errors(result)).toEqual(['resource, variable, or config value "nobody" not found']);
  });
});

// ---------------------------------------------------------------------------
// Builtins
// ---------------------------------------------------------------------------

describe('typeCheck builtins', () => {
  it('types select as the element type', () => {
    const result = check(['variables:', '  picked:', '    fn::select:', '      - 1', '      - [ a, b ]']);
    expect(result.diagnostics.length).toBe(0);
    expect(result.typing.typeVariable('picked')).toBe(StringType);
  });

  it('types rfc3339ToUnix as an integer', () => {
    const result = check(['variables:', '  at:', '    fn::rfc3339ToUnix: "2024-01-02T03:04:05Z"']);
    expect(result.typing.typeVariable('at')).toBe(IntType);
  });

  it('requires a string delimiter for join', () => {
    const result = check(['variables:', '  joined:', '    fn::join:', '      - [ 1 ]', '      - [ a, b ]']);
    expect(errors(result)).toEqual(['string is not assignable from List<number>']);
  });
});

// ---------------------------------------------------------------------------
// Invoke
// ---------------------------------------------------------------------------

describe('typeCheck invoke', () => {
  function invoke(fields: string[]): TypeCheckResult {
    return check(['variables:', '  result:', '    fn::invoke:', ...fields.map((f) => `      ${f}`)]);
  }

  it('types the projected return value', () => {
    const result = invoke(['function: test:getRegion', 'arguments:', '  zone: z1', 'return: name']);
    expect(result.diagnostics.length).toBe(0);
    expect(result.typing.typeVariable('result')).toBe(StringType);
  });

  it('types the whole result without a return', () => {
    const result = invoke(['function: test:getRegion', 'arguments:', '  zone: z1']);
    expect(result.typing.typeVariable('result')).toMatchObject({
      kind: 'object',
      token: 'test:index:getRegionResult',
    });
  });

  it('warns about an argument the function does not take', () => {
    const result = invoke(['function: test:getRegion', 'arguments:', '  colour: red']);
    const diag = only(result);
    expect(diag.severity).toBe(Severity.Warning);
    expect(diag.summary).toBe('colour does not exist on Invoke test:getRegion.');
  });

  it('rejects a return name the function does not produce', () => {
    const result = invoke(['function: test:getRegion', 'return: nope']);
    expect(errors(result)).toEqual(['nope does not exist on test:getRegion.']);
  });

  it('rejects a return on a function with a non-object result', () => {
    const result = invoke(['function: test:getToken', 'return: value']);
    expect(errors(result)).toEqual(['fn::invoke has a non-object return value']);
  });

  it('reports an unknown function', () => {
    const result = invoke(['function: test:index:getZone']);
    expect(errors(result)).toEqual(['unable to find function "test:index:getZone" in resource provider "test"']);
  });
});
