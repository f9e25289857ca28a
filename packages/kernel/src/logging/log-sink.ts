/**
 * Rigger Kernel — Log Sink Interface
 *
 * The kernel owns the contract; concrete sinks (console, JSONL journal)
 * live in the runtime host and are injected when a context is built.
 * The kernel never writes output on its own.
 *
 * Every context primitive reports through the sink: the command text before
 * it runs and captured output after. Mock contexts report intended effects
 * through mockExecute() instead of performing them.
 */

import type { TargetNode } from '../types/node.js';

export interface LogSink {
  /** Free-form message from an action body or the runner. */
  log(message: string): void;
  /** A command about to run on the controlling machine. */
  local(command: string): void;
  /** A command about to run on the target node. */
  remote(command: string): void;
  stdout(text: string): void;
  stderr(text: string): void;
  /** An effect a mock context would have performed. */
  mockExecute(description: string): void;
  /**
   * Set the diagnostic task name (the trigger reference being executed) and
   * answer the previous one so the caller can restore it.
   */
  setTask(name: string | undefined): string | undefined;
  /** A sink for a forked context bound to another node handle. */
  cloneForNode(node: TargetNode): LogSink;
}
