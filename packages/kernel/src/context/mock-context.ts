/**
 * Rigger Kernel — Mock Execution Context
 *
 * Drop-in replacement for ExecutionContext used for dry runs and for testing
 * action bodies without a live target. Trigger resolution, config merging,
 * routing and node queries behave exactly as in the real context; every
 * primitive that would change the node logs its intended effect through
 * LogSink.mockExecute() and does nothing else.
 *
 * Controller-side work (runLocal, local file handles, template rendering)
 * is not node-effecting and is left untouched.
 */

import type { RunOptions } from '../types/node.js';
import { describeEffect } from './effects.js';
import { ExecutionContext, type ExecutionContextInit } from './execution-context.js';

export class MockExecutionContext extends ExecutionContext {
  protected override fork(init: ExecutionContextInit): ExecutionContext {
    return new MockExecutionContext(init);
  }

  override run(command: string, _options?: RunOptions): Promise<string> {
    this.sink.mockExecute(command);
    return Promise.resolve('');
  }

  override sudo(command: string, _options?: RunOptions): Promise<string> {
    this.sink.mockExecute(describeEffect.sudo(command));
    return Promise.resolve('');
  }

  override upload(from: string, to: string): Promise<void> {
    this.sink.mockExecute(describeEffect.upload(from, to));
    return Promise.resolve();
  }

  override download(from: string, to: string): Promise<void> {
    this.sink.mockExecute(describeEffect.download(from, to));
    return Promise.resolve();
  }

  override mkdir(path: string): Promise<void> {
    this.sink.mockExecute(describeEffect.mkdir(path));
    return Promise.resolve();
  }

  override remove(path: string): Promise<void> {
    this.sink.mockExecute(describeEffect.remove(path));
    return Promise.resolve();
  }

  override copy(from: string, to: string): Promise<void> {
    this.sink.mockExecute(describeEffect.copy(from, to));
    return Promise.resolve();
  }

  override move(from: string, to: string): Promise<void> {
    this.sink.mockExecute(describeEffect.move(from, to));
    return Promise.resolve();
  }

  override setPermissions(path: string, mask: number): Promise<void> {
    this.sink.mockExecute(describeEffect.setPermissions(path, mask));
    return Promise.resolve();
  }

  override setOwner(path: string, user: string | undefined, group?: string): Promise<void> {
    this.sink.mockExecute(describeEffect.setOwner(path, user, group));
    return Promise.resolve();
  }
}
