/**
 * Rigger Runtime Host — Journal Reader
 *
 * Pure function for reading a run journal (`run.jsonl`) given its raw text.
 *
 * Guarantees:
 *   - valid entries are parsed; malformed lines are dropped and counted
 *   - entries are deduplicated by event_id; first seen wins
 *   - content not ending with '\n' has a partial trailing line, which is
 *     dropped and flagged
 *   - output is sorted by (timestamp asc, event_id asc)
 *
 * No I/O. Callers obtain the raw content via StateIO.readLogRaw().
 */

import type { JournalKind } from './file-log-sink.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface JournalEvent {
  /** 26-character ULID, the deduplication key. */
  readonly event_id: string;
  /** ISO 8601. */
  readonly timestamp: string;
  readonly node: string;
  readonly user: string;
  /** Trigger reference running when the entry was written. */
  readonly task: string | null;
  readonly kind: JournalKind;
  readonly text: string;
}

export interface JournalReadStats {
  /** Non-empty lines processed. */
  readonly totalLines: number;
  /** Entries in the output, after deduplication. */
  readonly parsedEvents: number;
  readonly duplicates: number;
  /** Lines that were not JSON or not a journal entry. */
  readonly parseErrors: number;
  readonly partialTrailingLine: boolean;
}

export interface JournalReadResult {
  readonly events: ReadonlyArray<JournalEvent>;
  readonly stats: JournalReadStats;
}

const JOURNAL_KINDS: ReadonlySet<string> = new Set<JournalKind>([
  'log',
  'local',
  'remote',
  'stdout',
  'stderr',
  'mock',
]);

function isJournalKind(value: unknown): value is JournalKind {
  return typeof value === 'string' && JOURNAL_KINDS.has(value);
}

function toJournalEvent(value: unknown): JournalEvent | undefined {
  if (typeof value !== 'object' || value === null) return undefined;
  const eventId: unknown = Reflect.get(value, 'event_id');
  const timestamp: unknown = Reflect.get(value, 'timestamp');
  const node: unknown = Reflect.get(value, 'node');
  const user: unknown = Reflect.get(value, 'user');
  const task: unknown = Reflect.get(value, 'task');
  const kind: unknown = Reflect.get(value, 'kind');
  const text: unknown = Reflect.get(value, 'text');
  if (
    typeof eventId !== 'string' ||
    typeof timestamp !== 'string' ||
    typeof node !== 'string' ||
    typeof user !== 'string' ||
    (task !== null && typeof task !== 'string') ||
    !isJournalKind(kind) ||
    typeof text !== 'string'
  ) {
    return undefined;
  }
  return { event_id: eventId, timestamp, node, user, task, kind, text };
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export function readJournal(rawContent: string): JournalReadResult {
  const partialTrailingLine = rawContent.length > 0 && !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  const lineList = (partialTrailingLine ? rawLines.slice(0, -1) : rawLines).filter(
    (line) => line.length > 0,
  );

  let duplicates = 0;
  let parseErrors = 0;
  const seen = new Set<string>();
  const events: JournalEvent[] = [];

  for (const line of lineList) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      parseErrors++;
      continue;
    }

    const event = toJournalEvent(parsed);
    if (event === undefined) {
      parseErrors++;
      continue;
    }

    if (seen.has(event.event_id)) {
      duplicates++;
    } else {
      seen.add(event.event_id);
      events.push(event);
    }
  }

  events.sort((a, b) => {
    if (a.timestamp < b.timestamp) return -1;
    if (a.timestamp > b.timestamp) return 1;
    if (a.event_id < b.event_id) return -1;
    if (a.event_id > b.event_id) return 1;
    return 0;
  });

  return {
    events,
    stats: {
      totalLines: lineList.length,
      parsedEvents: events.length,
      duplicates,
      parseErrors,
      partialTrailingLine,
    },
  };
}
