/**
 * Rigger Runtime Host — Tee Log Sink
 *
 * Fans every call out to several sinks, in order. The CLI uses it to write
 * the console and the journal from one context.
 */

import type { LogSink, TargetNode } from '@rigger/kernel';

export class TeeLogSink implements LogSink {
  private readonly sinks: ReadonlyArray<LogSink>;

  constructor(...sinks: LogSink[]) {
    this.sinks = sinks;
  }

  log(message: string): void {
    for (const sink of this.sinks) sink.log(message);
  }

  local(command: string): void {
    for (const sink of this.sinks) sink.local(command);
  }

  remote(command: string): void {
    for (const sink of this.sinks) sink.remote(command);
  }

  stdout(text: string): void {
    for (const sink of this.sinks) sink.stdout(text);
  }

  stderr(text: string): void {
    for (const sink of this.sinks) sink.stderr(text);
  }

  mockExecute(description: string): void {
    for (const sink of this.sinks) sink.mockExecute(description);
  }

  /** Sets the task on every sink; answers the previous task of the first. */
  setTask(name: string | undefined): string | undefined {
    let previous: string | undefined;
    this.sinks.forEach((sink, i) => {
      const before = sink.setTask(name);
      if (i === 0) previous = before;
    });
    return previous;
  }

  cloneForNode(node: TargetNode): TeeLogSink {
    return new TeeLogSink(...this.sinks.map((sink) => sink.cloneForNode(node)));
  }
}
