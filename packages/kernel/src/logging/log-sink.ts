/**
 * Strata Kernel: Log Sink Interface
 *
 * Defines the injection point for diagnostic log persistence.
 *
 * The kernel owns the contract (this interface) and the DiagnosticLogger
 * class. Concrete implementations live in the runtime host layer and are
 * injected at construction time; the kernel never writes to disk directly.
 */

import type { Severity } from '@strata/template';

/** The phase of a run that produced a diagnostic. */
export type RunPhase = 'schedule' | 'typecheck' | 'evaluate';

/** One persisted diagnostic. Flat, so it serializes as a single JSON line. */
export interface DiagnosticLogEntry {
  readonly run_id: string;
  readonly phase: RunPhase;
  readonly severity: Severity;
  readonly summary: string;
  readonly detail?: string;
  readonly file?: string;
  readonly line?: number;
  readonly column?: number;
  /** ISO 8601 */
  readonly timestamp: string;
}

/**
 * A sink that receives and persists diagnostic log entries.
 * Implementations must not silently discard entries.
 */
export interface LogSink {
  append(entry: DiagnosticLogEntry): void;
}
