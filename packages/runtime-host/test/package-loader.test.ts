/**
 * Strata Runtime Host: Package Schema Loading Tests
 *
 *   PKG-U1: a valid package file is validated, bound and resolvable
 *   PKG-U2: zod issues are reported with their path
 *   PKG-U3: a file whose package name differs is refused
 *   PKG-U4: a dangling $ref surfaces the binder's error
 *   PKG-U5: versioned files are preferred, the plain file is the fallback
 *   PKG-U6: results are cached, failures included
 */

import { describe, it, expect } from 'vitest';
import { mkdtempSync, unlinkSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { fileURLToPath } from 'node:url';
import { resolveFunction, resolveResource } from '@strata/kernel';
import { FilePackageLoader, parsePackage } from '../src/schema/file-package-loader.js';

const fixturePackages = fileURLToPath(new URL('./fixtures/packages', import.meta.url));

function packageDir(files: Record<string, unknown>): string {
  const dir = mkdtempSync(join(tmpdir(), 'strata-pkg-'));
  for (const [name, content] of Object.entries(files)) {
    writeFileSync(join(dir, name), JSON.stringify(content), 'utf-8');
  }
  return dir;
}

// ---------------------------------------------------------------------------
// parsePackage
// ---------------------------------------------------------------------------

describe('parsePackage', () => {
  it('PKG-U2: reports a missing package name', () => {
    expect(parsePackage('test', '{}')).toEqual({
      ok: false,
      error: 'invalid package schema "test": name: Required',
    });
  });

  it('PKG-U2: reports the path of a nested issue', () => {
    const result = parsePackage('test', JSON.stringify({ name: 'test', resources: { 'test:index:A': { isComponent: 'yes' } } }));
    expect(result).toEqual({
      ok: false,
      error: 'invalid package schema "test": resources.test:index:A.isComponent: Expected boolean, received string',
    });
  });

  it('PKG-U2: reports text that is not JSON', () => {
    const result = parsePackage('test', '{ name');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toMatch(/^invalid package schema "test": /);
  });

  it('PKG-U3: refuses a file declaring another package', () => {
    expect(parsePackage('test', JSON.stringify({ name: 'other' }))).toEqual({
      ok: false,
      error: 'invalid package schema "test": declares package name "other"',
    });
  });

  it('PKG-U4: surfaces a dangling resource reference', () => {
    const spec = {
      name: 'test',
      resources: {
        'test:index:A': { inputProperties: { b: { $ref: '#/resources/test:index:Missing' } } },
      },
    };
    expect(parsePackage('test', JSON.stringify(spec))).toEqual({
      ok: false,
      error: 'invalid package schema "test": unknown resource reference "#/resources/test:index:Missing"',
    });
  });
});

// ---------------------------------------------------------------------------
// FilePackageLoader
// ---------------------------------------------------------------------------

describe('FilePackageLoader', () => {
  it('PKG-U1: loads a package whose resources and functions resolve', () => {
    const loader = new FilePackageLoader(fixturePackages);
    const loaded = loader.loadPackage('test');
    expect(loaded.ok).toBe(true);
    if (!loaded.ok) return;
    expect(loaded.pkg.name).toBe('test');
    expect(loaded.pkg.version).toBe('1.0.0');

    const bucket = resolveResource(loader, 'test:Bucket');
    expect(bucket.ok && bucket.value.token).toBe('test:index:Bucket');
    const fn = resolveFunction(loader, 'test:getRegion');
    expect(fn.ok && fn.value.token).toBe('test:index:getRegion');
  });

  it('PKG-U2: reports the broken fixture package', () => {
    const loaded = new FilePackageLoader(fixturePackages).loadPackage('broken');
    expect(loaded.ok).toBe(false);
    if (loaded.ok) return;
    expect(loaded.error).toBe(
      'invalid package schema "broken": resources.broken:index:Thing.inputProperties.ratio.type: ' +
        "Invalid enum value. Expected 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object', received 'float'",
    );
  });

  it('PKG-U5: prefers <name>-<version>.json and falls back to <name>.json', () => {
    const dir = packageDir({
      'test.json': { name: 'test', version: '1.0.0' },
      'test-2.0.0.json': { name: 'test', version: '2.0.0' },
    });
    const loader = new FilePackageLoader(dir);
    const v2 = loader.loadPackage('test', '2.0.0');
    const v3 = loader.loadPackage('test', '3.0.0');
    expect(v2.ok && v2.pkg.version).toBe('2.0.0');
    expect(v3.ok && v3.pkg.version).toBe('1.0.0');
  });

  it('PKG-U5: reports a package with no file', () => {
    const loader = new FilePackageLoader(packageDir({}));
    expect(loader.loadPackage('nope')).toEqual({ ok: false, error: 'resource provider "nope" not found' });
    expect(loader.loadPackage('nope', '1.2.3')).toEqual({
      ok: false,
      error: 'resource provider "nope" at version 1.2.3 not found',
    });
  });

  it('PKG-U6: answers from the cache after the first load', () => {
    const dir = packageDir({ 'test.json': { name: 'test' } });
    const loader = new FilePackageLoader(dir);
    const first = loader.loadPackage('test');
    unlinkSync(join(dir, 'test.json'));
    expect(loader.loadPackage('test')).toBe(first);
  });
});
