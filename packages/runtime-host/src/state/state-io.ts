/**
 * Strata Runtime Host: StateIO Interface
 *
 * A directory-scoped, injectable I/O abstraction for append-only JSONL logs.
 *
 * Two implementations are provided:
 *   - FileStateIO: durable file I/O under a specific state directory
 *   - MemoryStateIO: in-memory I/O for tests and embedded (non-persistent) use
 *
 * Log sinks and readers take a StateIO rather than a path, so two runs
 * pointed at different directories never see each other's logs.
 */

import { appendFileSync, mkdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { isNodeError } from '../io/node-error.js';

// ---------------------------------------------------------------------------
// StateIO Interface
// ---------------------------------------------------------------------------

/**
 * Invariants:
 * - appendLine and readLogRaw address the `logs/` subdirectory
 * - Files from one StateIO instance cannot be accessed from another
 */
export interface StateIO {
  /**
   * Append a line to a log file, creating the logs subdirectory on demand.
   * A newline is written after the line content.
   */
  appendLine(logfilename: string, line: string): void;

  /** Raw text of a log file; an empty string if it does not exist. */
  readLogRaw(logfilename: string): string;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * Appends log lines to `<stateDir>/logs/<logfilename>`.
 *
 * Synchronous, so an entry is on disk before the run moves on.
 * ENOENT on read is recoverable; other I/O errors are rethrown.
 */
export class FileStateIO implements StateIO {
  constructor(private readonly stateDir: string) {}

  appendLine(logfilename: string, line: string): void {
    const logsDir = join(this.stateDir, 'logs');
    mkdirSync(logsDir, { recursive: true });
    appendFileSync(join(logsDir, logfilename), line + '\n', 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    try {
      return readFileSync(join(this.stateDir, 'logs', logfilename), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) return '';
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

/** Keeps log lines in a Map. Instances are fully isolated from each other. */
export class MemoryStateIO implements StateIO {
  private readonly logs: Map<string, string[]> = new Map();

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /** Lines appended so far. Not part of StateIO; tests read output through it. */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    if (lines.length === 0) return '';
    // Same shape FileStateIO produces: 'a\nb\n'
    return lines.join('\n') + '\n';
  }
}
