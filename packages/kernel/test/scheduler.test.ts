/**
 * Strata Kernel: Scheduler Tests
 *
 * schedule/order: dependencies come first; the order is stable across runs
 * schedule/cycle: a cycle is reported exactly once and its nodes are dropped
 * schedule/names: one namespace across config, resources and variables
 * schedule/missing: tolerant mode schedules a placeholder; strict mode reports
 * schedule/default-provider: resources wait for their package's default provider
 * schedule/walk: expressions are visited children first, outputs last
 */

import { describe, it, expect } from 'vitest';
import { Severity, loadTemplate } from '@strata/template';
import type { Expr, Template } from '@strata/template';
import { scheduleTemplate, walkTemplate } from '../src/index.js';
import type { GraphNode, GraphOptions, ScheduleResult } from '../src/index.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function template(lines: string[]): Template {
  const loaded = loadTemplate('main.yaml', lines.join('\n') + '\n');
  expect([...loaded.diagnostics].filter((d) => d.severity === Severity.Error)).toEqual([]);
  return loaded.template;
}

function keys(nodes: ReadonlyArray<GraphNode>): string[] {
  return nodes.map((n) => n.key.value);
}

function summaries(result: ScheduleResult): string[] {
  return [...result.diagnostics].map((d) => d.summary);
}

function schedule(lines: string[], options?: GraphOptions): ScheduleResult {
  return scheduleTemplate(template(lines), options);
}

// ---------------------------------------------------------------------------
// Ordering
// ---------------------------------------------------------------------------

describe('scheduleTemplate ordering', () => {
  it('puts a referenced resource before the resource that reads it', () => {
    const result = schedule([
      'resources:',
      '  A:',
      '    type: test:Bucket',
      '    properties:',
      '      name: ${B.bar}',
      '  B:',
      '    type: test:Bucket',
    ]);
    expect(result.ok).toBe(true);
    expect(keys(result.nodes)).toEqual(['B', 'A']);
  });

  it('emits config first, then the rest in dependency order', () => {
    const result = schedule([
      'config:',
      '  prefix:',
      '    default: app',
      'variables:',
      '  bucketName: ${prefix}-${bucket.id}',
      'resources:',
      '  bucket:',
      '    type: test:Bucket',
      '  object:',
      '    type: test:Object',
      '    properties:',
      '      key: ${bucketName}',
    ]);
    expect(keys(result.nodes)).toEqual(['prefix', 'bucket', 'bucketName', 'object']);
  });

  it('produces the same order every time', () => {
    const lines = [
      'resources:',
      '  c:',
      '    type: test:Bucket',
      '    options:',
      '      dependsOn: [ "${a}", "${b}" ]',
      '  b:',
      '    type: test:Bucket',
      '  a:',
      '    type: test:Bucket',
    ];
    const first = keys(schedule(lines).nodes);
    expect(first).toEqual(['a', 'b', 'c']);
    expect(keys(schedule(lines).nodes)).toEqual(first);
  });

  it('treats the environment object as always available', () => {
    const result = schedule(['variables:', '  where: ${strata.stack}']);
    expect(result.ok).toBe(true);
    expect(keys(result.nodes)).toEqual(['where']);
  });

  it('resolves references carrying the project prefix', () => {
    const result = schedule(
      ['config:', '  size:', '    default: 3', 'variables:', '  doubled: ${demo:size}'],
      { project: 'demo' },
    );
    expect(result.ok).toBe(true);
    expect(keys(result.nodes)).toEqual(['size', 'doubled']);
  });

  it('schedules undeclared stack configuration with the declared config', () => {
    const result = schedule(['variables:', '  r: ${region}'], {
      stackConfig: [{ key: 'region', value: 'north' }],
    });
    expect(result.nodes.map((n) => n.kind)).toEqual(['stackConfig', 'variable']);
  });
});

// ---------------------------------------------------------------------------
// Cycles
// ---------------------------------------------------------------------------

describe('scheduleTemplate cycles', () => {
  it('reports a two-resource cycle exactly once', () => {
    const result = schedule([
      'resources:',
      '  A:',
      '    type: test:Bucket',
      '    properties:',
      '      name: ${B.name}',
      '  B:',
      '    type: test:Bucket',
      '    properties:',
      '      name: ${A.name}',
      '  C:',
      '    type: test:Bucket',
    ]);
    expect(result.ok).toBe(false);
    expect(summaries(result)).toEqual(["circular dependency of resource 'A' transitively on itself"]);
    expect(keys(result.nodes)).toEqual(['C']);
  });

  it('reports a self reference', () => {
    const result = schedule(['variables:', '  loop: ${loop}']);
    expect(summaries(result)).toEqual(["circular dependency of variable 'loop' transitively on itself"]);
  });

  it('points the diagnostic at the reference that closes the cycle', () => {
    const result = schedule([
      'resources:',
      '  A:',
      '    type: test:Bucket',
      '    properties:',
      '      name: ${B.name}',
      '  B:',
      '    type: test:Bucket',
      '    properties:',
      '      name: ${A.name}',
    ]);
    const [diag] = [...result.diagnostics];
    expect(diag?.range?.start.line).toBe(9);
  });
});

// ---------------------------------------------------------------------------
// Names
// ---------------------------------------------------------------------------

describe('scheduleTemplate names', () => {
  it('rejects a variable named like a resource', () => {
    const result = schedule(['resources:', '  shared:', '    type: test:Bucket', 'variables:', '  shared: 1']);
    expect(result.ok).toBe(false);
    expect(summaries(result)).toEqual(['variable shared cannot have the same name as resource shared']);
  });

  it('rejects the reserved environment name', () => {
    const result = schedule(['variables:', '  strata: 1']);
    expect(summaries(result)).toEqual(['variable strata uses the reserved name strata']);
  });

  it('lets a declaration shadow stack configuration', () => {
    const result = schedule(['config:', '  region:', '    default: south'], {
      stackConfig: [{ key: 'region', value: 'north' }],
    });
    expect(result.ok).toBe(true);
    expect(result.nodes.map((n) => n.kind)).toEqual(['config']);
  });
});

// ---------------------------------------------------------------------------
// Missing Names
// ---------------------------------------------------------------------------

describe('scheduleTemplate missing names', () => {
  const lines = ['variables:', '  greeting: hello ${nobody}'];

  it('schedules a placeholder by default', () => {
    const result = schedule(lines);
    expect(result.ok).toBe(true);
    expect(result.nodes.map((n) => [n.kind, n.key.value])).toEqual([
      ['missing', 'nobody'],
      ['variable', 'greeting'],
    ]);
  });

  it('reports the name in strict mode and drops the dependent', () => {
    const result = schedule(lines, { strictSymbols: true });
    expect(result.ok).toBe(false);
    expect(summaries(result)).toEqual(['resource, variable, or config value "nobody" not found']);
    expect(result.nodes).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// Default Providers
// ---------------------------------------------------------------------------

describe('scheduleTemplate default providers', () => {
  it('orders the default provider before every resource of its package', () => {
    const result = schedule([
      'resources:',
      '  bucket:',
      '    type: test:Bucket',
      '  other:',
      '    type: other:Thing',
      '  prov:',
      '    type: strata:providers:test',
      '    defaultProvider: true',
    ]);
    expect(result.ok).toBe(true);
    expect(keys(result.nodes)).toEqual(['prov', 'bucket', 'other']);
    const prov = result.nodes[0];
    expect(prov?.kind === 'resource' && prov.defaultProviderFor).toBe('test');
  });

  it('does not wait on the default provider when a provider is explicit', () => {
    const result = schedule([
      'resources:',
      '  bucket:',
      '    type: test:Bucket',
      '    options:',
      '      provider: ${explicit}',
      '  explicit:',
      '    type: strata:providers:test',
      '  prov:',
      '    type: strata:providers:test',
      '    defaultProvider: true',
    ]);
    expect(keys(result.nodes)).toEqual(['explicit', 'bucket', 'prov']);
  });

  it('rejects defaultProvider on an ordinary resource', () => {
    const result = schedule(['resources:', '  b:', '    type: test:Bucket', '    defaultProvider: true']);
    expect(summaries(result)).toEqual([
      'resource b sets defaultProvider but test:Bucket is not a provider type',
    ]);
  });

  it('rejects a second default provider for one package', () => {
    const result = schedule([
      'resources:',
      '  p1:',
      '    type: strata:providers:test',
      '    defaultProvider: true',
      '  p2:',
      '    type: strata:providers:test',
      '    defaultProvider: true',
    ]);
    expect(summaries(result)).toEqual([
      'resource p2 cannot be the default provider for test: resource p1 already is',
    ]);
  });
});

// ---------------------------------------------------------------------------
// Walker
// ---------------------------------------------------------------------------

describe('walkTemplate', () => {
  it('visits children before parents and outputs last', () => {
    const t = template([
      'variables:',
      '  pair:',
      '    - ${strata.stack}',
      '    - fn::toJSON:',
      '        - 1',
      'outputs:',
      '  out: ${pair}',
    ]);
    const scheduled = scheduleTemplate(t);
    const seen: string[] = [];
    walkTemplate(scheduled.nodes, t.outputs, {
      visitExpr: (expr: Expr) => void seen.push(expr.kind),
      visitVariable: (node) => void seen.push(`variable ${node.key.value}`),
      visitOutput: (output) => void seen.push(`output ${output.key.value}`),
    });
    expect(seen).toEqual([
      'symbol',
      'number',
      'list',
      'toJSON',
      'list',
      'variable pair',
      'symbol',
      'output out',
    ]);
  });
});
