/**
 * Strata Runtime Host: Local Host Assembly
 *
 * Wires the concrete implementations in this package into the RunHost
 * the kernel's runTemplate() takes: file-backed packages, a file reader
 * rooted at the project, diagnostics persisted under the state directory,
 * and (unless one is supplied) an in-memory engine.
 */

import { join } from 'node:path';
import { DiagnosticLogger } from '@strata/kernel';
import type { Engine, RunHost, StackConfigEntry } from '@strata/kernel';
import type { RuntimeOptions } from './config/runtime-options.js';
import { toEvaluationContext } from './config/runtime-options.js';
import { MemoryEngine } from './engine/memory-engine.js';
import { NodeFileReader } from './files/node-file-reader.js';
import { FileLogSink } from './logging/file-log-sink.js';
import { ulid } from './logging/ulid.js';
import { FilePackageLoader } from './schema/file-package-loader.js';
import type { StateIO } from './state/state-io.js';
import { FileStateIO } from './state/state-io.js';

export interface LocalHostOptions {
  readonly options: RuntimeOptions;
  /** Directory of package schema files. Default: `<rootDirectory>/packages`. */
  readonly packagesDir?: string;
  /** Where diagnostics are logged. Default: files under `<rootDirectory>/.strata`. */
  readonly stateIO?: StateIO;
  readonly engine?: Engine;
  readonly config?: ReadonlyArray<StackConfigEntry>;
  readonly runId?: string;
}

export function createLocalHost(host: LocalHostOptions): RunHost {
  const { options } = host;
  const stateIO = host.stateIO ?? new FileStateIO(join(options.rootDirectory, '.strata'));
  return {
    engine:
      host.engine ??
      new MemoryEngine({ project: options.project, stack: options.stack, preview: options.preview }),
    loader: new FilePackageLoader(host.packagesDir ?? join(options.rootDirectory, 'packages')),
    context: toEvaluationContext(options),
    fileReader: new NodeFileReader(options.rootDirectory),
    config: host.config ?? [],
    strictSymbols: options.strictSymbols,
    logger: new DiagnosticLogger(new FileLogSink(stateIO)),
    runId: host.runId ?? ulid(),
  };
}
