/**
 * Strata Kernel: Package Loading and Token Resolution
 *
 * The kernel never finds packages itself: a PackageLoader is injected.
 * InMemoryPackageLoader serves pre-bound packages (tests, embedded use);
 * runtime-host provides a loader that reads schema files from disk.
 *
 * Resource and function tokens are resolved leniently. For a written
 * token the lookup order is:
 *
 *   1. the token exactly as written
 *   2. `pkg:name`      → `pkg:index:name`
 *   3. `pkg:mod:Name`  → `pkg:mod/name:Name` (module segment camel-cased)
 *
 * `strata:providers:<pkg>` always resolves to the package's provider.
 */

import type { Template } from '@strata/template';
import { Diagnostics } from '@strata/template';
import type { PackageSchema } from './package.js';
import type { FunctionSchema, ResourceSchema } from './types.js';

// ---------------------------------------------------------------------------
// Loader Contract
// ---------------------------------------------------------------------------

export type LoadPackageResult =
  | { readonly ok: true; readonly pkg: PackageSchema }
  | { readonly ok: false; readonly error: string };

export interface PackageLoader {
  /**
   * Load a package by name. When `version` is given the loader should
   * return that version; loaders holding a single version may ignore it.
   */
  loadPackage(name: string, version?: string): LoadPackageResult;
}

/** Serves packages that were bound ahead of time. */
export class InMemoryPackageLoader implements PackageLoader {
  private readonly packages = new Map<string, PackageSchema[]>();

  constructor(packages: Iterable<PackageSchema> = []) {
    for (const pkg of packages) this.add(pkg);
  }

  add(pkg: PackageSchema): void {
    const versions = this.packages.get(pkg.name) ?? [];
    versions.push(pkg);
    this.packages.set(pkg.name, versions);
  }

  loadPackage(name: string, version?: string): LoadPackageResult {
    const versions = this.packages.get(name) ?? [];
    const pkg =
      version === undefined
        ? versions[0]
        : versions.find((p) => p.version === version) ?? versions.find((p) => p.version === undefined);
    if (pkg === undefined) {
      const at = version === undefined ? '' : ` at version ${version}`;
      return { ok: false, error: `resource provider "${name}"${at} not found` };
    }
    return { ok: true, pkg };
  }
}

// ---------------------------------------------------------------------------
// Token Resolution
// ---------------------------------------------------------------------------

export type ResolveResult<T> =
  | { readonly ok: true; readonly pkg: PackageSchema; readonly value: T }
  | { readonly ok: false; readonly error: string };

const PROVIDER_PREFIX = 'strata:providers:';

/** The package a type token belongs to. Provider tokens name it last. */
export function packageNameOf(token: string): string {
  const parts = token.split(':');
  if (parts.length === 3 && token.startsWith(PROVIDER_PREFIX)) return parts[2] ?? '';
  return parts[0] ?? '';
}

export function isProviderToken(token: string): boolean {
  return token.startsWith(PROVIDER_PREFIX) && token.split(':').length === 3;
}

export function resolveResource(
  loader: PackageLoader,
  token: string,
  version?: string,
): ResolveResult<ResourceSchema> {
  const loaded = loadFor(loader, token, version);
  if (!loaded.ok) return loaded;
  const { pkg } = loaded;

  if (isProviderToken(token) && packageNameOf(token) === pkg.name) {
    return { ok: true, pkg, value: pkg.provider };
  }
  for (const candidate of candidateTokens(token)) {
    const resource = pkg.resources.get(candidate);
    if (resource !== undefined) return { ok: true, pkg, value: resource };
  }
  return {
    ok: false,
    error: `unable to find resource type "${token}" in resource provider "${pkg.name}"`,
  };
}

export function resolveFunction(
  loader: PackageLoader,
  token: string,
  version?: string,
): ResolveResult<FunctionSchema> {
  const loaded = loadFor(loader, token, version);
  if (!loaded.ok) return loaded;
  const { pkg } = loaded;

  for (const candidate of candidateTokens(token)) {
    const fn = pkg.functions.get(candidate);
    if (fn !== undefined) return { ok: true, pkg, value: fn };
  }
  return {
    ok: false,
    error: `unable to find function "${token}" in resource provider "${pkg.name}"`,
  };
}

function loadFor(
  loader: PackageLoader,
  token: string,
  version: string | undefined,
): { ok: true; pkg: PackageSchema } | { ok: false; error: string } {
  const parts = token.split(':');
  if (parts.length < 2 || parts.length > 3) {
    return { ok: false, error: `invalid type token "${token}"` };
  }
  const name = packageNameOf(token);
  const loaded = loader.loadPackage(name, version);
  if (!loaded.ok) return { ok: false, error: `resource provider "${name}" not found` };
  return loaded;
}

/** Spellings a written token may stand for, in lookup order. */
export function candidateTokens(token: string): string[] {
  const candidates = [token];
  let parts = token.split(':');
  if (parts.length === 2) {
    const [pkg = '', name = ''] = parts;
    candidates.push(`${pkg}:index:${name}`);
    parts = [pkg, 'index', name];
  }
  if (parts.length === 3) {
    const [pkg = '', mod = '', name = ''] = parts;
    candidates.push(`${pkg}:${mod}/${lowerCamel(name)}:${name}`);
  }
  return candidates;
}

function lowerCamel(name: string): string {
  return name.charAt(0).toLowerCase() + name.slice(1);
}

// ---------------------------------------------------------------------------
// Referenced Packages
// ---------------------------------------------------------------------------

export interface PackageReference {
  readonly name: string;
  readonly version?: string;
  readonly pluginDownloadURL?: string;
}

export interface ReferencedPackages {
  readonly packages: ReadonlyArray<PackageReference>;
  readonly diagnostics: Diagnostics;
}

/**
 * The packages a template's resources use, in first-use order, with the
 * version and download URL pinned by any resource's options. Two different
 * pins for one package are reported against the later resource.
 */
export function referencedPackages(template: Template): ReferencedPackages {
  const diagnostics = new Diagnostics();
  const entries = new Map<string, { version?: string; pluginDownloadURL?: string }>();

  for (const { value: resource } of template.resources) {
    const name = packageNameOf(resource.type.value);
    const versionExpr = resource.options.version;
    const urlExpr = resource.options.pluginDownloadURL;
    const version = versionExpr?.kind === 'string' ? versionExpr.value : undefined;
    const url = urlExpr?.kind === 'string' ? urlExpr.value : undefined;

    const entry = entries.get(name);
    if (entry === undefined) {
      entries.set(name, {
        ...(version !== undefined && version !== '' ? { version } : {}),
        ...(url !== undefined && url !== '' ? { pluginDownloadURL: url } : {}),
      });
      continue;
    }
    if (version !== undefined && version !== '' && entry.version !== version) {
      if (entry.version === undefined) {
        entry.version = version;
      } else {
        diagnostics.error(
          versionExpr?.range,
          `Provider ${name} already declared with a conflicting version: ${entry.version}`,
        );
      }
    }
    if (url !== undefined && url !== '' && entry.pluginDownloadURL !== url) {
      if (entry.pluginDownloadURL === undefined) {
        entry.pluginDownloadURL = url;
      } else {
        diagnostics.error(
          urlExpr?.range,
          `Provider ${name} already declared with a conflicting plugin download URL: ${entry.pluginDownloadURL}`,
        );
      }
    }
  }

  const packages = [...entries].map(([name, e]) => ({ name, ...e }));
  return { packages, diagnostics };
}
