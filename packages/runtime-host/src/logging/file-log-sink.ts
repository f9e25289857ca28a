/**
 * Rigger Runtime Host — File-backed Journal Sink
 *
 * Implements the LogSink interface from @rigger/kernel by appending one JSONL
 * entry per call to `run.jsonl` in the journal directory, via the injected
 * StateIO.
 *
 * Entry shape:
 *   { event_id, timestamp, node, user, task, kind, text }
 *
 * `event_id` is a ULID, `task` the trigger reference being executed (null at
 * the top level), `kind` one of log | local | remote | stdout | stderr | mock.
 * Empty stdout/stderr captures are not journalled.
 *
 * This sink is synchronous: the write completes before the call returns, so
 * the entry describing a command is durable before the command runs.
 */

import type { LogSink, TargetNode } from '@rigger/kernel';
import type { StateIO } from '../state/state-io.js';
import { ulid } from './ulid.js';

export const JOURNAL_FILE = 'run.jsonl';

export type JournalKind = 'log' | 'local' | 'remote' | 'stdout' | 'stderr' | 'mock';

export interface JournalIdentity {
  readonly name: string;
  readonly user: string;
}

export class FileLogSink implements LogSink {
  private task: string | undefined;

  constructor(
    private readonly stateIO: StateIO,
    private readonly node: JournalIdentity,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  private append(kind: JournalKind, text: string): void {
    const now = this.clock();
    const line = JSON.stringify({
      event_id: ulid(now.getTime()),
      timestamp: now.toISOString(),
      node: this.node.name,
      user: this.node.user,
      task: this.task ?? null,
      kind,
      text,
    });
    this.stateIO.appendLine(JOURNAL_FILE, line);
  }

  log(message: string): void {
    this.append('log', message);
  }

  local(command: string): void {
    this.append('local', command);
  }

  remote(command: string): void {
    this.append('remote', command);
  }

  stdout(text: string): void {
    if (text !== '') this.append('stdout', text);
  }

  stderr(text: string): void {
    if (text !== '') this.append('stderr', text);
  }

  mockExecute(description: string): void {
    this.append('mock', description);
  }

  setTask(name: string | undefined): string | undefined {
    const previous = this.task;
    this.task = name;
    return previous;
  }

  /** Same journal, entries attributed to `node`; the current task carries over. */
  cloneForNode(node: TargetNode): FileLogSink {
    const clone = new FileLogSink(this.stateIO, node, this.clock);
    clone.task = this.task;
    return clone;
  }
}
