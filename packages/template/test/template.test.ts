/**
 * Strata Template: Parser and Decoder Tests
 *
 * Source text in, declarations and diagnostics out. Builtins are checked
 * for their argument shapes; records for field matching and warnings.
 */

import { describe, it, expect } from 'vitest';
import { Severity, loadTemplate, parseExpr } from '../src/index.js';
import type { Expr } from '../src/index.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const BUCKET_TEMPLATE = [
  'name: sample',
  'config:',
  '  prefix:',
  '    type: String',
  '    default: app',
  'variables:',
  '  tags:',
  '    team: storage',
  'resources:',
  '  bucket:',
  '    type: test:Bucket',
  '    properties:',
  '      name: ${prefix}-bucket',
  '      tags: ${tags}',
  '    options:',
  '      protect: true',
  '      customTimeouts:',
  '        create: 5m',
  'outputs:',
  '  bucketName: ${bucket.name}',
  '',
].join('\n');

function exprOf(source: string): Expr | undefined {
  return parseExpr(source).expr;
}

function summaries(source: string): string[] {
  return [...parseExpr(source).diagnostics].map((d) => d.summary);
}

// ---------------------------------------------------------------------------
// Declarations
// ---------------------------------------------------------------------------

describe('loadTemplate', () => {
  it('decodes every section in declaration order', () => {
    const { template, diagnostics } = loadTemplate('main.yaml', BUCKET_TEMPLATE);
    expect(diagnostics.length).toBe(0);
    expect(template.name?.value).toBe('sample');
    expect(template.config.map((c) => c.key.value)).toEqual(['prefix']);
    expect(template.config[0]?.value.type?.value).toBe('String');
    expect(template.variables.map((v) => v.key.value)).toEqual(['tags']);
    expect(template.resources.map((r) => r.key.value)).toEqual(['bucket']);
    expect(template.outputs.map((o) => o.key.value)).toEqual(['bucketName']);

    const bucket = template.resources[0]?.value;
    expect(bucket?.type.value).toBe('test:Bucket');
    expect(bucket?.hasProperties).toBe(true);
    expect(bucket?.properties.map((p) => [p.key.value, p.value.kind])).toEqual([
      ['name', 'interpolate'],
      ['tags', 'symbol'],
    ]);
    expect(bucket?.options.protect?.kind).toBe('boolean');
    expect(bucket?.options.customTimeouts?.create).toMatchObject({ kind: 'string', value: '5m' });
  });

  it('records 1-based source positions', () => {
    const { template } = loadTemplate('main.yaml', BUCKET_TEMPLATE);
    const type = template.resources[0]?.value.type;
    expect(type?.range?.filename).toBe('main.yaml');
    expect(type?.range?.start.line).toBe(11);
    expect(type?.range?.start.column).toBe(11);
  });

  it('treats a bare config value as its default', () => {
    const { template } = loadTemplate('main.yaml', 'config:\n  size: 3\n');
    expect(template.config[0]?.value.default).toMatchObject({ kind: 'number', value: 3 });
    expect(template.config[0]?.value.type).toBeUndefined();
  });

  it('warns about unknown and miscapitalized fields', () => {
    const source = 'resources:\n  a:\n    Type: test:A\n    propertes: {}\n';
    const { template, diagnostics } = loadTemplate('main.yaml', source);
    expect(template.resources[0]?.value.type.value).toBe('test:A');
    expect([...diagnostics].map((d) => [d.severity, d.summary])).toEqual([
      [Severity.Warning, "'Type' looks like a miscapitalization of 'type'"],
      [Severity.Warning, "Object 'resource' has no field named 'propertes'"],
    ]);
  });

  it('requires a resource type', () => {
    const { diagnostics } = loadTemplate('main.yaml', 'resources:\n  a:\n    properties: {}\n');
    expect(diagnostics.errors().map((d) => d.summary)).toEqual([
      "resource a is missing required field 'type'",
    ]);
  });

  it('reports YAML syntax errors', () => {
    const { diagnostics } = loadTemplate('main.yaml', 'resources: [a\n');
    expect(diagnostics.hasErrors()).toBe(true);
  });

  it('reports an empty document', () => {
    const { diagnostics } = loadTemplate('empty.yaml', '');
    expect(diagnostics.errors().map((d) => d.summary)).toEqual(['empty.yaml is empty']);
  });

  it('accepts JSON source', () => {
    const { template, diagnostics } = loadTemplate(
      'main.json',
      '{"resources": {"a": {"type": "test:A", "properties": {"size": 2}}}}',
    );
    expect(diagnostics.length).toBe(0);
    expect(template.resources[0]?.value.properties[0]?.value).toMatchObject({ kind: 'number', value: 2 });
  });
});

// ---------------------------------------------------------------------------
// Builtins
// ---------------------------------------------------------------------------

describe('builtin parsing', () => {
  it('parses fn::join into delimiter and values', () => {
    const expr = exprOf('fn::join: [",", [a, b]]');
    expect(expr?.kind).toBe('join');
    if (expr?.kind !== 'join') return;
    expect(expr.delimiter).toMatchObject({ kind: 'string', value: ',' });
    expect(expr.values.kind).toBe('list');
  });

  it('warns about builtin casing but still parses', () => {
    expect(exprOf('fn::Select: [0, [a]]')?.kind).toBe('select');
    expect(summaries('fn::Select: [0, [a]]')).toEqual([
      "'fn::Select' looks like a miscapitalization of 'fn::select'",
    ]);
  });

  it('rejects a select that is not a two-valued list', () => {
    expect(summaries('fn::select: [1]')).toEqual(['the argument to fn::select must be a two-valued list']);
    expect(exprOf('fn::select: [1]')?.kind).toBe('object');
  });

  it('parses fn::invoke with options and return', () => {
    const source = [
      'fn::invoke:',
      '  function: test:getThing',
      '  arguments:',
      '    id: abc',
      '  options:',
      '    provider: ${prov}',
      '    version: 1.2.3',
      '  return: value',
    ].join('\n');
    const expr = exprOf(source);
    expect(expr?.kind).toBe('invoke');
    if (expr?.kind !== 'invoke') return;
    expect(expr.token.value).toBe('test:getThing');
    expect(expr.args?.entries).toHaveLength(1);
    expect(expr.options.provider?.kind).toBe('symbol');
    expect(expr.options.version?.value).toBe('1.2.3');
    expect(expr.return?.value).toBe('value');
  });

  it('reports a missing function name', () => {
    expect(summaries('fn::invoke:\n  arguments: {}\n')).toEqual(["missing function name ('function')"]);
  });

  it('expands the fn::<pkg>:<fn> shorthand into an invoke', () => {
    const expr = exprOf('fn::test:index:getThing:\n  id: abc\n');
    expect(expr?.kind).toBe('invoke');
    if (expr?.kind !== 'invoke') return;
    expect(expr.token.value).toBe('test:index:getThing');
    expect(expr.args?.entries[0]?.key).toMatchObject({ value: 'id' });
  });

  it('warns about unknown fn:: keys and keeps them as objects', () => {
    expect(exprOf('fn::nothing: 1')?.kind).toBe('object');
    expect(summaries('fn::nothing: 1')).toEqual(["'fn::' is a reserved prefix"]);
  });

  it('treats keys named after object prototype members as plain keys', () => {
    expect(exprOf('constructor: hello')?.kind).toBe('object');
    expect(summaries('constructor: hello')).toEqual([]);

    const expr = exprOf('{ __proto__: { a: 1 }, b: 2 }');
    expect(summaries('{ __proto__: { a: 1 }, b: 2 }')).toEqual([]);
    expect(expr?.kind).toBe('object');
    if (expr?.kind !== 'object') return;
    expect(expr.entries.map((e) => e.key)).toMatchObject([{ value: '__proto__' }, { value: 'b' }]);
  });

  it('requires assets to have their own object', () => {
    expect(exprOf('fn::fileAsset: ./a.txt')).toMatchObject({ kind: 'fileAsset', source: { value: './a.txt' } });
    expect(summaries('fn::fileAsset: ./a.txt\nother: 1\n')).toEqual(['fn::fileAsset must have its own object']);
  });

  it('collects asset archive entries and rejects non-asset values', () => {
    const ok = exprOf('fn::assetArchive:\n  b.txt:\n    fn::stringAsset: hi\n  a:\n    fn::fileArchive: ./dir\n');
    expect(ok?.kind).toBe('assetArchive');
    if (ok?.kind !== 'assetArchive') return;
    expect(ok.entries.map((e) => [e.path, e.value.kind])).toEqual([
      ['b.txt', 'stringAsset'],
      ['a', 'fileArchive'],
    ]);

    expect(summaries('fn::assetArchive:\n  a.txt: plain\n')).toEqual([
      'value must be an asset or an archive, not a string',
    ]);
  });

  it('warns that fn::stackReference is deprecated', () => {
    const expr = exprOf('fn::stackReference: [org/proj/dev, url]');
    expect(expr?.kind).toBe('stackReference');
    expect(summaries('fn::stackReference: [org/proj/dev, url]')).toEqual([
      "'fn::stackReference' is deprecated; please use 'strata:strata:StackReference' instead",
    ]);
  });
});
