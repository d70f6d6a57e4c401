/**
 * Strata Runtime Host: File-backed Diagnostic Log Sink
 *
 * Implements the LogSink interface from @strata/kernel by appending one JSON
 * line per diagnostic to `logs/diagnostics.jsonl` through the injected
 * StateIO. Each line carries a ULID `event_id` so a log copied between
 * machines can be merged and deduplicated on read.
 *
 * The write completes before append() returns.
 */

import type { DiagnosticLogEntry, LogSink } from '@strata/kernel';
import type { StateIO } from '../state/state-io.js';
import { ulid } from './ulid.js';

export const DIAGNOSTICS_LOG = 'diagnostics.jsonl';

export class FileLogSink implements LogSink {
  constructor(
    private readonly stateIO: StateIO,
    private readonly nextId: () => string = () => ulid(),
  ) {}

  append(entry: DiagnosticLogEntry): void {
    this.stateIO.appendLine(DIAGNOSTICS_LOG, JSON.stringify({ event_id: this.nextId(), ...entry }));
  }
}
