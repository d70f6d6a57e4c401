/**
 * Strata Runtime Host: Stack Configuration Files
 *
 * A stack file is YAML with a `config:` map:
 *
 *   config:
 *     demo:size: 3
 *     region: north
 *     zones: [ a, b ]
 *
 * Values must be strings, finite numbers, booleans or lists of those.
 * Keys may carry the `<project>:` namespace; runTemplate strips it.
 */

import { readFileSync } from 'node:fs';
import { parse } from 'yaml';
import { z } from 'zod';
import type { ConfigValue, StackConfigEntry } from '@strata/kernel';
import { errorMessage, isNodeError } from '../io/node-error.js';
import { formatIssues } from '../schema/package-spec-schema.js';

export type StackConfigResult =
  | { readonly ok: true; readonly entries: ReadonlyArray<StackConfigEntry> }
  | { readonly ok: false; readonly error: string };

const configValueSchema: z.ZodType<ConfigValue> = z.lazy(() =>
  z.union([z.string(), z.number().finite(), z.boolean(), z.array(configValueSchema)]),
);

const stackFileSchema = z.object({
  config: z.record(z.string(), configValueSchema).nullish(),
});

/** Parse the text of a stack file. An empty file has no configuration. */
export function loadStackConfig(text: string, filename = 'stack.yaml'): StackConfigResult {
  let document: unknown;
  try {
    document = parse(text);
  } catch (err: unknown) {
    return { ok: false, error: `${filename}: ${errorMessage(err)}` };
  }
  if (document === null || document === undefined) return { ok: true, entries: [] };

  const parsed = stackFileSchema.safeParse(document);
  if (!parsed.success) return { ok: false, error: `${filename}: ${formatIssues(parsed.error.issues)}` };
  const entries = Object.entries(parsed.data.config ?? {}).map(([key, value]) => ({ key, value }));
  return { ok: true, entries };
}

/** Read and parse a stack file. A missing file has no configuration. */
export function readStackConfig(path: string): StackConfigResult {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) return { ok: true, entries: [] };
    throw err;
  }
  return loadStackConfig(text, path);
}
