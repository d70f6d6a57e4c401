/**
 * Strata Runtime Host: File Package Loader
 *
 * Implements PackageLoader from @strata/kernel over a directory of JSON
 * package schema files:
 *
 *   <dir>/<name>-<version>.json   tried first when a version is requested
 *   <dir>/<name>.json             otherwise, or as the fallback
 *
 * Each file is validated with zod, bound with bindPackage() and cached by
 * name and version. Failures are cached too, so a broken file is reported
 * with the same message every time it is asked for.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { bindPackage } from '@strata/kernel';
import type { LoadPackageResult, PackageLoader } from '@strata/kernel';
import { errorMessage, isNodeError } from '../io/node-error.js';
import { formatIssues, packageSpecSchema } from './package-spec-schema.js';

export class FilePackageLoader implements PackageLoader {
  private readonly cache = new Map<string, LoadPackageResult>();

  constructor(private readonly dir: string) {}

  loadPackage(name: string, version?: string): LoadPackageResult {
    const key = version === undefined ? name : `${name}@${version}`;
    const cached = this.cache.get(key);
    if (cached !== undefined) return cached;
    const result = this.load(name, version);
    this.cache.set(key, result);
    return result;
  }

  private load(name: string, version: string | undefined): LoadPackageResult {
    const candidates = version === undefined ? [`${name}.json`] : [`${name}-${version}.json`, `${name}.json`];
    for (const file of candidates) {
      const text = readIfExists(join(this.dir, file));
      if (text !== undefined) return parsePackage(name, text);
    }
    const at = version === undefined ? '' : ` at version ${version}`;
    return { ok: false, error: `resource provider "${name}"${at} not found` };
  }
}

/** Validate and bind the text of one package schema file. */
export function parsePackage(name: string, text: string): LoadPackageResult {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err: unknown) {
    if (err instanceof SyntaxError) {
      return { ok: false, error: `invalid package schema "${name}": ${err.message}` };
    }
    throw err;
  }

  const parsed = packageSpecSchema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, error: `invalid package schema "${name}": ${formatIssues(parsed.error.issues)}` };
  }
  if (parsed.data.name !== name) {
    return {
      ok: false,
      error: `invalid package schema "${name}": declares package name "${parsed.data.name}"`,
    };
  }

  const bound = bindPackage(parsed.data);
  if (!bound.ok) return { ok: false, error: `invalid package schema "${name}": ${bound.error}` };
  return bound;
}

function readIfExists(path: string): string | undefined {
  try {
    return readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) return undefined;
    throw new Error(`failed to read package schema ${path}: ${errorMessage(err)}`, { cause: err });
  }
}
