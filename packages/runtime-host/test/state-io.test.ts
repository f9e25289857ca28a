/**
 * Rigger Runtime Host — StateIO Contract Tests
 *
 *   SIO-1: MemoryStateIO returns '' for a journal that has never been written
 *   SIO-2: MemoryStateIO returns lines joined with '\n' and a terminal newline
 *   SIO-3: FileStateIO returns '' when the directory or file does not exist
 *   SIO-4: FileStateIO appends and reads back exactly what MemoryStateIO would
 *
 * Isolation: MemoryStateIO tests have no I/O. FileStateIO tests use temp dirs.
 */

import { describe, it, expect } from 'vitest';
import { mkdtempSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { MemoryStateIO, FileStateIO } from '../src/state/state-io.js';

describe('SIO-1: MemoryStateIO, never written', () => {
  it('returns an empty string for a file nothing was appended to', () => {
    const stateIO = new MemoryStateIO();
    stateIO.appendLine('other.jsonl', 'some line');
    expect(stateIO.readLogRaw('run.jsonl')).toBe('');
    expect(stateIO.readLines('run.jsonl')).toEqual([]);
  });
});

describe('SIO-2: MemoryStateIO, populated', () => {
  it('returns lines joined with newlines and a terminal newline', () => {
    const stateIO = new MemoryStateIO();
    stateIO.appendLine('run.jsonl', '{"event_id":"A"}');
    stateIO.appendLine('run.jsonl', '{"event_id":"B"}');
    expect(stateIO.readLogRaw('run.jsonl')).toBe('{"event_id":"A"}\n{"event_id":"B"}\n');
    expect(stateIO.readLines('run.jsonl')).toEqual(['{"event_id":"A"}', '{"event_id":"B"}']);
  });
});

describe('SIO-3: FileStateIO, missing file', () => {
  it('returns an empty string when the journal directory does not exist', () => {
    const root = mkdtempSync(join(tmpdir(), 'rigger-sio-3-'));
    const stateIO = new FileStateIO(join(root, 'not-created'));
    expect(stateIO.readLogRaw('run.jsonl')).toBe('');
  });
});

describe('SIO-4: FileStateIO, appended journal', () => {
  it('creates the directory on first append and writes one line per call', () => {
    const root = mkdtempSync(join(tmpdir(), 'rigger-sio-4-'));
    const dir = join(root, 'journal');
    const stateIO = new FileStateIO(dir);
    stateIO.appendLine('run.jsonl', '{"event_id":"A"}');
    stateIO.appendLine('run.jsonl', '{"event_id":"B"}');

    expect(readFileSync(join(dir, 'run.jsonl'), 'utf-8')).toBe('{"event_id":"A"}\n{"event_id":"B"}\n');
  });

  it('produces the same raw content as MemoryStateIO for the same appends', () => {
    const fileIO = new FileStateIO(mkdtempSync(join(tmpdir(), 'rigger-sio-4b-')));
    const memIO = new MemoryStateIO();
    for (const line of ['{"v":1}', '{"v":2}', '{"v":3}']) {
      fileIO.appendLine('run.jsonl', line);
      memIO.appendLine('run.jsonl', line);
    }
    expect(fileIO.readLogRaw('run.jsonl')).toBe(memIO.readLogRaw('run.jsonl'));
  });
});
