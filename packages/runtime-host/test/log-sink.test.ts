/**
 * Strata Runtime Host: FileLogSink and Log Reader Tests
 *
 *   LOG-U1: diagnostics.jsonl line carries a 26-char ULID event_id and the entry fields
 *   LOG-U2: two appended entries have distinct event_ids
 *   LOG-U3: a run through DiagnosticLogger lands in the sink
 *   LOGR-U1: malformed lines and lines failing the entry schema are counted, not returned
 *   LOGR-U2: duplicate event_ids are dropped, first seen wins
 *   LOGR-U3: a partial trailing line is dropped and flagged
 *   LOGR-U4: entries are sorted by timestamp, then event_id
 *   LOGR-U5: empty input yields an empty result
 *
 * Isolation: uses MemoryStateIO, no filesystem I/O.
 */

import { describe, it, expect } from 'vitest';
import { Severity } from '@strata/template';
import { DiagnosticLogger } from '@strata/kernel';
import type { DiagnosticLogEntry } from '@strata/kernel';
import { DIAGNOSTICS_LOG, FileLogSink } from '../src/logging/file-log-sink.js';
import { readDiagnosticLog } from '../src/logging/log-reader.js';
import { MemoryStateIO } from '../src/state/state-io.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function makeEntry(overrides: Partial<DiagnosticLogEntry> = {}): DiagnosticLogEntry {
  return {
    run_id: 'run-1',
    phase: 'typecheck',
    severity: Severity.Error,
    summary: 'integer is not assignable from string',
    file: 'main.yaml',
    line: 4,
    column: 12,
    timestamp: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

function line(eventId: string, timestamp: string): string {
  return JSON.stringify({ event_id: eventId, ...makeEntry({ timestamp }) });
}

// ---------------------------------------------------------------------------
// FileLogSink
// ---------------------------------------------------------------------------

describe('FileLogSink', () => {
  it('LOG-U1: writes the entry with a 26-char uppercase ULID event_id', () => {
    const stateIO = new MemoryStateIO();
    new FileLogSink(stateIO).append(makeEntry());

    const lines = stateIO.readLines(DIAGNOSTICS_LOG);
    expect(lines).toHaveLength(1);
    const parsed: unknown = JSON.parse(lines[0] ?? '');
    expect(parsed).toMatchObject(makeEntry());
    expect(parsed).toHaveProperty('event_id', expect.stringMatching(/^[0-9A-HJKMNP-TV-Z]{26}$/));
  });

  it('LOG-U1: writes event_id first, then the entry fields in order', () => {
    const stateIO = new MemoryStateIO();
    new FileLogSink(stateIO, () => 'EVENT-1').append(makeEntry({ detail: 'more' }));

    expect(stateIO.readLines(DIAGNOSTICS_LOG)).toEqual([
      '{"event_id":"EVENT-1","run_id":"run-1","phase":"typecheck","severity":"error",' +
        '"summary":"integer is not assignable from string","file":"main.yaml","line":4,"column":12,' +
        '"timestamp":"2026-01-01T00:00:00.000Z","detail":"more"}',
    ]);
  });

  it('LOG-U2: two appended entries have distinct event_ids', () => {
    const stateIO = new MemoryStateIO();
    const sink = new FileLogSink(stateIO);
    sink.append(makeEntry());
    sink.append(makeEntry());

    const [first, second] = readDiagnosticLog(stateIO.readLogRaw(DIAGNOSTICS_LOG)).entries;
    expect(first?.event_id).toBeDefined();
    expect(first?.event_id).not.toBe(second?.event_id);
  });

  it('LOG-U3: receives every diagnostic recorded by a DiagnosticLogger', () => {
    const stateIO = new MemoryStateIO();
    let n = 0;
    const logger = new DiagnosticLogger(
      new FileLogSink(stateIO, () => `E${++n}`),
      () => new Date('2026-02-03T04:05:06Z'),
    );
    logger.record('run-7', 'evaluate', [
      { severity: Severity.Error, summary: 'first' },
      { severity: Severity.Warning, summary: 'second', detail: 'why' },
    ]);

    const { entries } = readDiagnosticLog(stateIO.readLogRaw(DIAGNOSTICS_LOG));
    expect(entries).toEqual([
      {
        event_id: 'E1',
        run_id: 'run-7',
        phase: 'evaluate',
        severity: Severity.Error,
        summary: 'first',
        timestamp: '2026-02-03T04:05:06.000Z',
      },
      {
        event_id: 'E2',
        run_id: 'run-7',
        phase: 'evaluate',
        severity: Severity.Warning,
        summary: 'second',
        detail: 'why',
        timestamp: '2026-02-03T04:05:06.000Z',
      },
    ]);
  });
});

// ---------------------------------------------------------------------------
// readDiagnosticLog
// ---------------------------------------------------------------------------

describe('readDiagnosticLog', () => {
  it('LOGR-U1: counts lines that are not JSON or do not match the entry schema', () => {
    const raw = [
      line('A', '2026-01-01T00:00:00.000Z'),
      'not json',
      JSON.stringify({ event_id: 'B', summary: 'no phase' }),
      JSON.stringify({ ...makeEntry(), event_id: 'C', severity: 'fatal' }),
    ].join('\n') + '\n';

    const result = readDiagnosticLog(raw);
    expect(result.entries.map((e) => e.event_id)).toEqual(['A']);
    expect(result.stats).toEqual({
      totalLines: 4,
      parsedEntries: 1,
      duplicates: 0,
      parseErrors: 3,
      partialTrailingLine: false,
    });
  });

  it('LOGR-U2: keeps the first of two entries with one event_id', () => {
    const raw =
      JSON.stringify({ event_id: 'A', ...makeEntry({ summary: 'kept' }) }) +
      '\n' +
      JSON.stringify({ event_id: 'A', ...makeEntry({ summary: 'dropped' }) }) +
      '\n';

    const result = readDiagnosticLog(raw);
    expect(result.entries.map((e) => e.summary)).toEqual(['kept']);
    expect(result.stats.duplicates).toBe(1);
  });

  it('LOGR-U3: drops and flags a partial trailing line', () => {
    const raw = line('A', '2026-01-01T00:00:00.000Z') + '\n' + '{"event_id":"B","run';

    const result = readDiagnosticLog(raw);
    expect(result.entries.map((e) => e.event_id)).toEqual(['A']);
    expect(result.stats.partialTrailingLine).toBe(true);
    expect(result.stats.parseErrors).toBe(0);
  });

  it('LOGR-U4: sorts by timestamp, then event_id', () => {
    const raw =
      [
        line('C', '2026-01-01T00:00:02.000Z'),
        line('B', '2026-01-01T00:00:01.000Z'),
        line('A', '2026-01-01T00:00:02.000Z'),
      ].join('\n') + '\n';

    expect(readDiagnosticLog(raw).entries.map((e) => e.event_id)).toEqual(['B', 'A', 'C']);
  });

  it('LOGR-U5: returns nothing for empty input', () => {
    expect(readDiagnosticLog('')).toEqual({
      entries: [],
      stats: { totalLines: 0, parsedEntries: 0, duplicates: 0, parseErrors: 0, partialTrailingLine: false },
    });
  });
});
