/**
 * Rigger Kernel — Execution Context
 *
 * An ExecutionContext binds one node handle (and therefore one user), one
 * Config snapshot, one LogSink and the shared PackageIndex for a single
 * invocation chain. Action bodies never see the context itself: they run
 * against a CapabilityRouter created per call.
 *
 * Active package:
 *   The context keeps an explicit frame stack. trigger() pushes a frame for
 *   the target package and pops it in a finally block, so the active package
 *   (top of stack) seen by a caller after a nested trigger returns or throws
 *   is always the one it saw before. The diagnostic task name on the sink is
 *   restored the same way.
 *
 * Contexts are never shared between node runs. Forks created by as() share
 * Index and Config by reference and own a new node handle and log.
 */

import type { LocalHost, TemplateEngine } from '../adapters/index.js';
import { Config } from '../config/config.js';
import { MissingActionError } from '../errors.js';
import { LocalFile, RemoteFile } from '../files/file-handle.js';
import { Template, type TemplateOptions } from '../files/template.js';
import type { LogSink } from '../logging/log-sink.js';
import type { FileStat, RunOptions, TargetNode } from '../types/node.js';
import type { ActionBody, Package, PackageIndex } from '../types/package.js';
import { describeEffect } from './effects.js';
import { parseActionReference } from './reference.js';
import { CapabilityRouter, type ScopedBody } from './router.js';

export interface ExecutionContextInit {
  readonly node: TargetNode;
  readonly log: LogSink;
  readonly index: PackageIndex;
  readonly host: LocalHost;
  readonly templates: TemplateEngine;
  /**
   * Shared by reference with every fork. Defaults to a snapshot of the
   * node's own configuration.
   */
  readonly config?: Config | undefined;
  /** Package in effect before any trigger, e.g. inherited by a fork. */
  readonly activePackage?: Package | undefined;
}

interface Frame {
  readonly pkg: Package;
  readonly reference: string;
}

export class ExecutionContext {
  readonly node: TargetNode;
  readonly config: Config;
  readonly index: PackageIndex;
  readonly host: LocalHost;
  readonly templates: TemplateEngine;
  protected readonly sink: LogSink;
  private readonly basePackage: Package | undefined;
  private readonly frames: Frame[] = [];

  constructor(init: ExecutionContextInit) {
    this.node = init.node;
    this.sink = init.log;
    this.node.logTo(this.sink);
    this.config = init.config ?? Config.from(init.node.config);
    this.index = init.index;
    this.host = init.host;
    this.templates = init.templates;
    this.basePackage = init.activePackage;
  }

  /** Top of the frame stack, or the base package when no trigger is running. */
  get activePackage(): Package | undefined {
    const top = this.frames[this.frames.length - 1];
    return top !== undefined ? top.pkg : this.basePackage;
  }

  /** References currently executing, outermost first. */
  get callStack(): ReadonlyArray<string> {
    return this.frames.map((frame) => frame.reference);
  }

  // -------------------------------------------------------------------------
  // Body execution
  // -------------------------------------------------------------------------

  /**
   * Run an action body against a fresh router. With no extra arguments the
   * body receives only the router; otherwise the arguments follow it.
   */
  async exec(body: ActionBody, ...args: unknown[]): Promise<unknown> {
    const router = new CapabilityRouter(this);
    return await body.call(router, router, ...args);
  }

  private async execScoped<T>(body: ScopedBody<T>): Promise<T> {
    const router = new CapabilityRouter(this);
    return await body.call(router, router);
  }

  // -------------------------------------------------------------------------
  // Trigger resolution
  // -------------------------------------------------------------------------

  /**
   * Resolve `reference` and execute the action it names.
   *
   * The target package's defaults are merged (fill-missing) into the config
   * before the body runs; the frame and task name are restored whether the
   * body returns or throws.
   *
   * @throws {MissingActionError} if the package or the action is absent
   */
  async trigger(reference: string, ...args: unknown[]): Promise<unknown> {
    const { actionName, packageName } = parseActionReference(reference);
    const pkg = packageName !== undefined ? this.index.get(packageName) : this.activePackage;
    const action = pkg?.action(actionName);
    if (pkg === undefined || action === undefined) {
      throw new MissingActionError(reference);
    }

    this.config.mergeMissing(pkg.config);

    const previousTask = this.sink.setTask(reference);
    this.frames.push({ pkg, reference });
    try {
      return await this.exec(action, ...args);
    } finally {
      this.frames.pop();
      this.sink.setTask(previousTask);
    }
  }

  // -------------------------------------------------------------------------
  // User and directory scoping
  // -------------------------------------------------------------------------

  /**
   * The context to use for `user`: this one when `user` is absent or already
   * the node's user, otherwise a fork bound to `node.forUser(user)`.
   */
  forUser(user: string | null | undefined): ExecutionContext {
    if (user === null || user === undefined || user === this.node.user) {
      return this;
    }
    const node = this.node.forUser(user);
    return this.fork({
      node,
      log: this.sink.cloneForNode(node),
      index: this.index,
      host: this.host,
      templates: this.templates,
      config: this.config,
      activePackage: this.activePackage,
    });
  }

  /** Construct a fork of the same kind as this context. */
  protected fork(init: ExecutionContextInit): ExecutionContext {
    return new ExecutionContext(init);
  }

  as<T>(user: string | null | undefined, body: ScopedBody<T>): Promise<T> {
    return this.forUser(user).execScoped(body);
  }

  async inDir<T>(path: string, body: ScopedBody<T>): Promise<T> {
    this.sink.log(`CD: ${path}`);
    const previous = this.node.helper.setCwd(path);
    try {
      return await this.execScoped(body);
    } finally {
      this.node.helper.setCwd(previous);
    }
  }

  // -------------------------------------------------------------------------
  // Commands
  // -------------------------------------------------------------------------

  /** Diagnostic command on the controlling machine. Never fails on exit code. */
  async runLocal(command: string): Promise<void> {
    this.sink.local(command);
    const result = await this.host.exec(command);
    this.sink.stdout(result.stdout);
    this.sink.stderr(result.stderr);
  }

  async run(command: string, options?: RunOptions): Promise<string> {
    this.sink.remote(command);
    const output = await this.node.run(command, options);
    this.sink.stdout(output);
    return output;
  }

  async sudo(command: string, options?: RunOptions): Promise<string> {
    this.sink.remote(describeEffect.sudo(command));
    const output = await this.node.sudo(command, options);
    this.sink.stdout(output);
    return output;
  }

  // -------------------------------------------------------------------------
  // File primitives
  // -------------------------------------------------------------------------

  upload(from: string, to: string): Promise<void> {
    this.sink.log(describeEffect.upload(from, to));
    return this.node.upload(from, to);
  }

  download(from: string, to: string): Promise<void> {
    this.sink.log(describeEffect.download(from, to));
    return this.node.download(from, to);
  }

  mkdir(path: string): Promise<void> {
    this.sink.log(describeEffect.mkdir(path));
    return this.node.mkdir(path);
  }

  remove(path: string): Promise<void> {
    this.sink.log(describeEffect.remove(path));
    return this.node.delete(path);
  }

  copy(from: string, to: string): Promise<void> {
    this.sink.log(describeEffect.copy(from, to));
    return this.node.copy(from, to);
  }

  move(from: string, to: string): Promise<void> {
    this.sink.log(describeEffect.move(from, to));
    return this.node.move(from, to);
  }

  setPermissions(path: string, mask: number): Promise<void> {
    this.sink.log(describeEffect.setPermissions(path, mask));
    return this.node.setPermissions(path, mask);
  }

  setOwner(path: string, user: string | undefined, group?: string): Promise<void> {
    this.sink.log(describeEffect.setOwner(path, user, group));
    return this.node.setOwner(path, user, group);
  }

  local(path: string): LocalFile {
    return new LocalFile(this, path);
  }

  remote(path: string): RemoteFile {
    return new RemoteFile(this, path);
  }

  template(path: string, options?: TemplateOptions): Template {
    return new Template(this, path, options);
  }

  // -------------------------------------------------------------------------
  // Node queries
  // -------------------------------------------------------------------------

  env(name: string): Promise<string | undefined> {
    this.sink.log(`ENV: ${name}`);
    return this.node.env(name);
  }

  binaryExists(name: string): Promise<boolean> {
    this.sink.log(`BINARY_EXISTS: ${name}`);
    return this.node.binaryExists(name);
  }

  stat(path: string): Promise<FileStat | undefined> {
    this.sink.log(`STAT: ${path}`);
    return this.node.stat(path);
  }

  checksum(path: string): Promise<string | undefined> {
    this.sink.log(`CHECKSUM: ${path}`);
    return this.node.checksum(path);
  }

  log(message?: string): LogSink {
    if (message !== undefined) {
      this.sink.log(message);
    }
    return this.sink;
  }
}
