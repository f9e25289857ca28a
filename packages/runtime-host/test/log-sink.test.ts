/**
 * Rigger Runtime Host — Log Sink Tests
 *
 *   LOG-1: FileLogSink writes one JSONL entry per call with a ULID event_id
 *   LOG-2: FileLogSink records the task and drops empty output captures
 *   LOG-3: FileLogSink clones attribute entries to the new node
 *   LOG-4: ConsoleLogSink prefixes node, user and task
 *   LOG-5: TeeLogSink fans out and restores tasks on every sink
 *   LOG-6: ulid() encodes the timestamp first and is monotonic per millisecond
 *
 * Isolation: MemoryStateIO and an in-memory line writer; no filesystem I/O.
 */

import { describe, it, expect } from 'vitest';
import { Chalk } from 'chalk';
import type { TargetNode } from '@rigger/kernel';
import { FileLogSink, JOURNAL_FILE } from '../src/logging/file-log-sink.js';
import { ConsoleLogSink, consoleTheme } from '../src/logging/console-log-sink.js';
import { TeeLogSink } from '../src/logging/tee-log-sink.js';
import { ulid, ulidTime } from '../src/logging/ulid.js';
import { readJournal } from '../src/logging/log-reader.js';
import { MemoryStateIO } from '../src/state/state-io.js';
import { LocalNode } from '../src/node/local-node.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const FIXED = new Date('2026-01-01T00:00:00.000Z');
const WEB1 = { name: 'web1', user: 'deploy' };

function parsedLines(stateIO: MemoryStateIO): unknown[] {
  return stateIO.readLines(JOURNAL_FILE).map((line): unknown => JSON.parse(line));
}

function plainConsole(lines: string[], node = WEB1): ConsoleLogSink {
  return new ConsoleLogSink(node, {
    write: (line) => { lines.push(line); },
    theme: consoleTheme(new Chalk({ level: 0 })),
  });
}

// ---------------------------------------------------------------------------
// LOG-1 / LOG-2 / LOG-3
// ---------------------------------------------------------------------------

describe('LOG-1: journal entries', () => {
  it('writes event_id, timestamp, node, user, task, kind and text', () => {
    const stateIO = new MemoryStateIO();
    new FileLogSink(stateIO, WEB1, () => FIXED).remote('uptime');

    const [entry] = parsedLines(stateIO);
    expect(entry).toEqual({
      event_id: expect.stringMatching(/^[0-9A-HJKMNP-TV-Z]{26}$/),
      timestamp: '2026-01-01T00:00:00.000Z',
      node: 'web1',
      user: 'deploy',
      task: null,
      kind: 'remote',
      text: 'uptime',
    });
  });

  it('gives two entries distinct event_ids', () => {
    const stateIO = new MemoryStateIO();
    const sink = new FileLogSink(stateIO, WEB1, () => FIXED);
    sink.log('one');
    sink.log('two');
    const ids = stateIO.readLines(JOURNAL_FILE).map((line) => readJournal(line + '\n').events[0]?.event_id);
    expect(ids[0]).toHaveLength(26);
    expect(ids[0]).not.toBe(ids[1]);
  });
});

describe('LOG-2: tasks and output', () => {
  it('records the current task and answers the previous one', () => {
    const stateIO = new MemoryStateIO();
    const sink = new FileLogSink(stateIO, WEB1, () => FIXED);

    expect(sink.setTask('apply:web')).toBeUndefined();
    sink.mockExecute('sudo reboot');
    expect(sink.setTask(undefined)).toBe('apply:web');

    expect(parsedLines(stateIO)).toEqual([
      expect.objectContaining({ task: 'apply:web', kind: 'mock', text: 'sudo reboot' }),
    ]);
  });

  it('does not journal empty stdout or stderr', () => {
    const stateIO = new MemoryStateIO();
    const sink = new FileLogSink(stateIO, WEB1, () => FIXED);
    sink.stdout('');
    sink.stderr('');
    sink.stdout('ok\n');
    expect(parsedLines(stateIO)).toEqual([expect.objectContaining({ kind: 'stdout', text: 'ok\n' })]);
  });
});

describe('LOG-3: clones', () => {
  it('writes to the same journal under the new node identity', () => {
    const stateIO = new MemoryStateIO();
    const sink = new FileLogSink(stateIO, WEB1, () => FIXED);
    sink.setTask('apply:web');
    const root: TargetNode = new LocalNode({ name: 'web1', user: 'root' });
    sink.cloneForNode(root).remote('whoami');

    expect(parsedLines(stateIO)).toEqual([
      expect.objectContaining({ node: 'web1', user: 'root', task: 'apply:web', text: 'whoami' }),
    ]);
  });
});

// ---------------------------------------------------------------------------
// LOG-4 / LOG-5
// ---------------------------------------------------------------------------

describe('LOG-4: console output', () => {
  it('formats each kind of entry', () => {
    const lines: string[] = [];
    const sink = plainConsole(lines);

    sink.log('starting');
    sink.setTask('apply:nginx');
    sink.remote('sudo apt-get install -y nginx');
    sink.stdout('Reading package lists...\n\nDone\n');
    sink.stderr('warning: slow mirror\n');
    sink.local('git rev-parse HEAD');
    sink.setTask(undefined);
    sink.mockExecute('MKDIR: /srv/www');

    expect(lines).toEqual([
      '[web1] deploy starting',
      '[web1] deploy apply:nginx $ sudo apt-get install -y nginx',
      '[web1] deploy apply:nginx   Reading package lists...',
      '[web1] deploy apply:nginx   Done',
      '[web1] deploy apply:nginx ! warning: slow mirror',
      '[web1] deploy apply:nginx local$ git rev-parse HEAD',
      '[web1] deploy (dry-run) MKDIR: /srv/www',
    ]);
  });

  it('clones share the writer and carry the task', () => {
    const lines: string[] = [];
    const sink = plainConsole(lines);
    sink.setTask('apply:web');
    sink.cloneForNode(new LocalNode({ name: 'web1', user: 'root' })).remote('id');
    expect(lines).toEqual(['[web1] root apply:web $ id']);
  });
});

describe('LOG-5: tee', () => {
  it('writes to every sink and sets the task on each', () => {
    const lines: string[] = [];
    const stateIO = new MemoryStateIO();
    const tee = new TeeLogSink(plainConsole(lines), new FileLogSink(stateIO, WEB1, () => FIXED));

    expect(tee.setTask('validate:web')).toBeUndefined();
    tee.log('checking');
    expect(tee.setTask(undefined)).toBe('validate:web');

    expect(lines).toEqual(['[web1] deploy validate:web checking']);
    expect(parsedLines(stateIO)).toEqual([
      expect.objectContaining({ task: 'validate:web', kind: 'log', text: 'checking' }),
    ]);
  });
});

// ---------------------------------------------------------------------------
// LOG-6
// ---------------------------------------------------------------------------

describe('LOG-6: ulid', () => {
  it('is 26 Crockford characters', () => {
    expect(ulid()).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
  });

  it('round-trips the timestamp', () => {
    expect(ulidTime(ulid(FIXED.getTime()))).toBe(FIXED.getTime());
  });

  it('sorts by time', () => {
    expect(ulid(1_000) < ulid(2_000)).toBe(true);
  });

  it('sorts in generation order within one millisecond', () => {
    const first = ulid(5_000);
    const second = ulid(5_000);
    expect(first < second).toBe(true);
    expect(first.slice(0, 10)).toBe(second.slice(0, 10));
  });

  it('rejects malformed ids', () => {
    expect(ulidTime('short')).toBeUndefined();
    expect(ulidTime('U'.repeat(26))).toBeUndefined();
  });
});
