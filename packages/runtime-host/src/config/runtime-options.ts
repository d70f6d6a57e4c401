/**
 * Strata Runtime Host: Runtime Option Resolution
 *
 * Each option resolves with the following precedence:
 *
 *   1. Explicit value (e.g. passed by an embedding program)
 *   2. Environment variable
 *   3. Default
 *
 *   option          variable                default
 *   project         STRATA_PROJECT          basename of rootDirectory
 *   stack           STRATA_STACK            dev
 *   organization    STRATA_ORGANIZATION     organization
 *   rootDirectory   STRATA_ROOT_DIRECTORY   the working directory
 *   strictSymbols   STRATA_STRICT_SYMBOLS   false
 *   preview         STRATA_PREVIEW          false
 *
 * Boolean variables are true for `true` or `1` (case-insensitive).
 */

import { basename, resolve } from 'node:path';
import type { EvaluationContext } from '@strata/kernel';

export interface RuntimeOptions {
  readonly project: string;
  readonly stack: string;
  readonly organization: string;
  readonly rootDirectory: string;
  readonly cwd: string;
  readonly strictSymbols: boolean;
  readonly preview: boolean;
}

export type ExplicitRuntimeOptions = {
  readonly [K in keyof RuntimeOptions]?: RuntimeOptions[K] | undefined;
};

export type Environment = Readonly<Record<string, string | undefined>>;

export function resolveRuntimeOptions(
  explicit: ExplicitRuntimeOptions = {},
  env: Environment = process.env,
  cwd: string = process.cwd(),
): RuntimeOptions {
  const workingDirectory = explicit.cwd ?? cwd;
  const rootDirectory = resolve(
    workingDirectory,
    pick(explicit.rootDirectory, env['STRATA_ROOT_DIRECTORY']) ?? workingDirectory,
  );
  return {
    project: pick(explicit.project, env['STRATA_PROJECT']) ?? basename(rootDirectory),
    stack: pick(explicit.stack, env['STRATA_STACK']) ?? 'dev',
    organization: pick(explicit.organization, env['STRATA_ORGANIZATION']) ?? 'organization',
    rootDirectory,
    cwd: workingDirectory,
    strictSymbols: explicit.strictSymbols ?? flag(env['STRATA_STRICT_SYMBOLS']),
    preview: explicit.preview ?? flag(env['STRATA_PREVIEW']),
  };
}

/** The values of the template's reserved `strata` object. */
export function toEvaluationContext(options: RuntimeOptions): EvaluationContext {
  return {
    cwd: options.cwd,
    project: options.project,
    stack: options.stack,
    organization: options.organization,
    rootDirectory: options.rootDirectory,
  };
}

/** First non-empty string. */
function pick(...values: ReadonlyArray<string | undefined>): string | undefined {
  return values.find((v): v is string => v !== undefined && v !== '');
}

function flag(value: string | undefined): boolean {
  const v = value?.trim().toLowerCase();
  return v === 'true' || v === '1';
}
