/**
 * Rigger Kernel — Capability Router
 *
 * The router is the only surface an action body sees. It exposes a fixed
 * vocabulary of operations and nothing else of the execution context.
 *
 * Resolution rule (two tiers):
 *   1. A name in OPERATIONS is dispatched to that operation.
 *   2. Any other name is a configuration field read: field(name) answers the
 *      value or throws ConfigLookupError when the field is absent.
 *
 * Typed callers use the methods directly; invoke(name, ...args) applies the
 * rule to a name known only at run time (scripted callers, the CLI).
 */

import type { Config, ConfigValue } from '../config/config.js';
import { ConfigLookupError } from '../errors.js';
import type { LocalFile, RemoteFile } from '../files/file-handle.js';
import type { Template, TemplateOptions } from '../files/template.js';
import type { LogSink } from '../logging/log-sink.js';
import type { RunOptions, TargetNode } from '../types/node.js';
import type { ExecutionContext } from './execution-context.js';

/** A body run by `as()` or `inDir()`. Receives the router like an action body. */
export type ScopedBody<T> = (this: ActionScope, scope: ActionScope) => T | PromiseLike<T>;

export interface ActionScope {
  readonly node: TargetNode;
  readonly config: Config;
  as<T>(user: string | null | undefined, body: ScopedBody<T>): Promise<T>;
  inDir<T>(path: string, body: ScopedBody<T>): Promise<T>;
  runLocal(command: string): Promise<void>;
  run(command: string, options?: RunOptions): Promise<string>;
  sudo(command: string, options?: RunOptions): Promise<string>;
  env(name: string): Promise<string | undefined>;
  /** Log `message` when given; always answers the bound sink. */
  log(message?: string): LogSink;
  upload(from: string, to: string): Promise<void>;
  download(from: string, to: string): Promise<void>;
  mkdir(path: string): Promise<void>;
  remove(path: string): Promise<void>;
  local(path: string): LocalFile;
  remote(path: string): RemoteFile;
  template(path: string, options?: TemplateOptions): Template;
  trigger(reference: string, ...args: unknown[]): Promise<unknown>;
  binaryExists(name: string): Promise<boolean>;

  /** Second tier: a required configuration field. */
  field(name: string): ConfigValue;
  /** Second tier without the failure: `undefined` when absent. */
  lookup(name: string): ConfigValue | undefined;
  /** Apply the two-tier rule to a run-time name. */
  invoke(name: string, ...args: unknown[]): unknown;
}

/** The fixed vocabulary, in resolution order of tier 1. */
export const OPERATIONS = [
  'node',
  'config',
  'as',
  'inDir',
  'runLocal',
  'run',
  'sudo',
  'env',
  'log',
  'upload',
  'download',
  'mkdir',
  'remove',
  'local',
  'remote',
  'template',
  'trigger',
  'binaryExists',
] as const satisfies ReadonlyArray<keyof ActionScope>;

export type OperationName = (typeof OPERATIONS)[number];

const OPERATION_SET: ReadonlySet<string> = new Set(OPERATIONS);

export function isOperationName(name: string): name is OperationName {
  return OPERATION_SET.has(name);
}

// ---------------------------------------------------------------------------
// CapabilityRouter
// ---------------------------------------------------------------------------

export class CapabilityRouter implements ActionScope {
  constructor(private readonly context: ExecutionContext) {}

  get node(): TargetNode {
    return this.context.node;
  }

  get config(): Config {
    return this.context.config;
  }

  as<T>(user: string | null | undefined, body: ScopedBody<T>): Promise<T> {
    return this.context.as(user, body);
  }

  inDir<T>(path: string, body: ScopedBody<T>): Promise<T> {
    return this.context.inDir(path, body);
  }

  runLocal(command: string): Promise<void> {
    return this.context.runLocal(command);
  }

  run(command: string, options?: RunOptions): Promise<string> {
    return this.context.run(command, options);
  }

  sudo(command: string, options?: RunOptions): Promise<string> {
    return this.context.sudo(command, options);
  }

  env(name: string): Promise<string | undefined> {
    return this.context.env(name);
  }

  log(message?: string): LogSink {
    return this.context.log(message);
  }

  upload(from: string, to: string): Promise<void> {
    return this.context.upload(from, to);
  }

  download(from: string, to: string): Promise<void> {
    return this.context.download(from, to);
  }

  mkdir(path: string): Promise<void> {
    return this.context.mkdir(path);
  }

  remove(path: string): Promise<void> {
    return this.context.remove(path);
  }

  local(path: string): LocalFile {
    return this.context.local(path);
  }

  remote(path: string): RemoteFile {
    return this.context.remote(path);
  }

  template(path: string, options?: TemplateOptions): Template {
    return this.context.template(path, options);
  }

  trigger(reference: string, ...args: unknown[]): Promise<unknown> {
    return this.context.trigger(reference, ...args);
  }

  binaryExists(name: string): Promise<boolean> {
    return this.context.binaryExists(name);
  }

  field(name: string): ConfigValue {
    const value = this.context.config.get(name);
    if (value === undefined) {
      throw new ConfigLookupError(name);
    }
    return value;
  }

  lookup(name: string): ConfigValue | undefined {
    return this.context.config.get(name);
  }

  invoke(name: string, ...args: unknown[]): unknown {
    if (isOperationName(name)) {
      const member: unknown = this[name];
      return typeof member === 'function' ? Reflect.apply(member, this, args) : member;
    }
    return this.field(name);
  }
}
