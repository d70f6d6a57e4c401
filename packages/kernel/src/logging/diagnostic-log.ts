/**
 * Strata Kernel: Diagnostic Logger
 *
 * Forwards every diagnostic a run produces to an injected LogSink, tagged
 * with the run id and the phase that produced it.
 *
 * If no sink is injected (e.g., in tests), record() is a no-op.
 */

import type { Diagnostic } from '@strata/template';
import type { DiagnosticLogEntry, LogSink, RunPhase } from './log-sink.js';

export class DiagnosticLogger {
  constructor(
    private readonly sink?: LogSink,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /** Record each diagnostic of one phase, in the order given. */
  record(runId: string, phase: RunPhase, diagnostics: Iterable<Diagnostic>): void {
    if (this.sink === undefined) return;
    for (const d of diagnostics) this.sink.append(toEntry(runId, phase, d, this.clock()));
  }
}

export function toEntry(runId: string, phase: RunPhase, d: Diagnostic, at: Date): DiagnosticLogEntry {
  return {
    run_id: runId,
    phase,
    severity: d.severity,
    summary: d.summary,
    ...(d.detail !== undefined ? { detail: d.detail } : {}),
    ...(d.range !== undefined
      ? { file: d.range.filename, line: d.range.start.line, column: d.range.start.column }
      : {}),
    timestamp: at.toISOString(),
  };
}
