/**
 * Strata Runtime Host: Diagnostic Log Reader
 *
 * Reads `diagnostics.jsonl` content with dedupe-on-read:
 *
 *   - every line is validated against the stored entry schema; lines that
 *     are not JSON or do not match are dropped and counted in parseErrors
 *   - entries are deduplicated by event_id, first seen wins
 *   - content not ending in '\n' has a partial trailing line, which is
 *     dropped and flagged
 *   - output is sorted by (timestamp, event_id)
 *
 * No I/O here. Callers obtain raw content via StateIO.readLogRaw().
 */

import { z } from 'zod';
import { Severity } from '@strata/template';
import type { DiagnosticLogEntry } from '@strata/kernel';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface StoredDiagnostic extends DiagnosticLogEntry {
  readonly event_id: string;
}

export interface LogReadStats {
  /** Non-empty lines processed, before filtering. */
  readonly totalLines: number;
  /** Entries kept after deduplication. */
  readonly parsedEntries: number;
  readonly duplicates: number;
  readonly parseErrors: number;
  readonly partialTrailingLine: boolean;
}

export interface LogReadResult {
  readonly entries: ReadonlyArray<StoredDiagnostic>;
  readonly stats: LogReadStats;
}

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const storedDiagnosticSchema = z.object({
  event_id: z.string().min(1),
  run_id: z.string(),
  phase: z.enum(['schedule', 'typecheck', 'evaluate']),
  severity: z.nativeEnum(Severity),
  summary: z.string(),
  detail: z.string().optional(),
  file: z.string().optional(),
  line: z.number().int().optional(),
  column: z.number().int().optional(),
  timestamp: z.string(),
});

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export function readDiagnosticLog(rawContent: string): LogReadResult {
  const partialTrailingLine = rawContent.length > 0 && !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  const lines = (partialTrailingLine ? rawLines.slice(0, -1) : rawLines).filter((l) => l.length > 0);

  const seen = new Set<string>();
  const entries: StoredDiagnostic[] = [];
  let duplicates = 0;
  let parseErrors = 0;

  for (const line of lines) {
    const entry = parseLine(line);
    if (entry === undefined) {
      parseErrors++;
    } else if (seen.has(entry.event_id)) {
      duplicates++;
    } else {
      seen.add(entry.event_id);
      entries.push(entry);
    }
  }

  entries.sort((a, b) => compare(a.timestamp, b.timestamp) || compare(a.event_id, b.event_id));

  return {
    entries,
    stats: {
      totalLines: lines.length,
      parsedEntries: entries.length,
      duplicates,
      parseErrors,
      partialTrailingLine,
    },
  };
}

function parseLine(line: string): StoredDiagnostic | undefined {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch {
    return undefined;
  }
  const parsed = storedDiagnosticSchema.safeParse(json);
  return parsed.success ? parsed.data : undefined;
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
