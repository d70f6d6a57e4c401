/**
 * @strata/runtime-host
 *
 * Strata runtime host: the side-effectful implementations of the kernel's
 * interfaces. Depends on @strata/kernel (interfaces); implements them over
 * the file system, the environment and the terminal.
 *
 * No kernel code imports from this package.
 */

// Host assembly
export type { LocalHostOptions } from './host.js';
export { createLocalHost } from './host.js';

// Configuration
export type {
  Environment,
  ExplicitRuntimeOptions,
  RuntimeOptions,
} from './config/runtime-options.js';
export { resolveRuntimeOptions, toEvaluationContext } from './config/runtime-options.js';
export type { StackConfigResult } from './config/stack-config.js';
export { loadStackConfig, readStackConfig } from './config/stack-config.js';

// Package schemas
export { FilePackageLoader, parsePackage } from './schema/file-package-loader.js';
export { formatIssues, packageSpecSchema, propertySpecSchema } from './schema/package-spec-schema.js';

// Engine and files
export type {
  EngineCall,
  EngineLogLevel,
  EngineLogRecord,
  FunctionHandler,
  MemoryEngineOptions,
} from './engine/memory-engine.js';
export { MemoryEngine } from './engine/memory-engine.js';
export type { NodeFileReaderOptions } from './files/node-file-reader.js';
export { NodeFileReader } from './files/node-file-reader.js';

// Logging
export { DIAGNOSTICS_LOG, FileLogSink } from './logging/file-log-sink.js';
export type { LogReadResult, LogReadStats, StoredDiagnostic } from './logging/log-reader.js';
export { readDiagnosticLog } from './logging/log-reader.js';
export { ulid, ulidTime } from './logging/ulid.js';

// StateIO
export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO } from './state/state-io.js';

// Printer
export type { FormatOptions } from './printer/format-diagnostic.js';
export { formatDiagnostic, formatDiagnostics } from './printer/format-diagnostic.js';
