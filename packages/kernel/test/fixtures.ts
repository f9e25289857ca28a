/**
 * Rigger Kernel — Test Fixtures
 *
 * In-process stand-ins for the collaborators the kernel is built against.
 * Nothing here touches the filesystem, spawns a process or opens a socket.
 *
 *   FakeNode          — TargetNode that records every call in order
 *   RecordingLogSink  — LogSink that keeps every entry with its task name
 *   MemoryLocalHost   — LocalHost over an in-memory file map
 *   MustacheEngine    — TemplateEngine replacing `{{ dotted.path }}`
 */

import { createHash } from 'node:crypto';
import type {
  CommandResult,
  LocalHost,
  TemplateEngine,
} from '../src/adapters/index.js';
import type { ConfigInput } from '../src/config/config.js';
import {
  ExecutionContext,
  type ExecutionContextInit,
} from '../src/context/execution-context.js';
import { MockExecutionContext } from '../src/context/mock-context.js';
import type { LogSink } from '../src/logging/log-sink.js';
import type { PackageIndex } from '../src/types/package.js';
import type { FileStat, NodeHelper, RunOptions, TargetNode } from '../src/types/node.js';

export function sha1(text: string): string {
  return createHash('sha1').update(text).digest('hex');
}

// ---------------------------------------------------------------------------
// FakeNode
// ---------------------------------------------------------------------------

export class FakeHelper implements NodeHelper {
  cwd: string | undefined;

  setCwd(path: string | undefined): string | undefined {
    const previous = this.cwd;
    this.cwd = path;
    return previous;
  }
}

export interface FakeNodeState {
  /** Every call, in order, shared with nodes created by forUser(). */
  readonly calls: string[];
  /** Output answered by run/sudo, keyed by command. */
  readonly outputs: Map<string, string>;
  /** Commands that reject with an Error. */
  readonly failing: Set<string>;
  readonly stats: Map<string, FileStat>;
  readonly checksums: Map<string, string>;
  readonly envs: Map<string, string>;
  readonly binaries: Set<string>;
}

export class FakeNode implements TargetNode {
  readonly helper = new FakeHelper();
  sink: LogSink | undefined;

  constructor(
    readonly name = 'test-node',
    readonly user = 'deploy',
    readonly config: ConfigInput = {},
    readonly state: FakeNodeState = {
      calls: [],
      outputs: new Map(),
      failing: new Set(),
      stats: new Map(),
      checksums: new Map(),
      envs: new Map(),
      binaries: new Set(),
    },
  ) {}

  get calls(): string[] {
    return this.state.calls;
  }

  logTo(sink: LogSink): void {
    this.sink = sink;
  }

  private command(kind: 'run' | 'sudo', command: string, _options?: RunOptions): Promise<string> {
    this.state.calls.push(`${kind}: ${command}`);
    if (this.state.failing.has(command)) {
      return Promise.reject(new Error(`command failed: ${command}`));
    }
    return Promise.resolve(this.state.outputs.get(command) ?? '');
  }

  run(command: string, options?: RunOptions): Promise<string> {
    return this.command('run', command, options);
  }

  sudo(command: string, options?: RunOptions): Promise<string> {
    return this.command('sudo', command, options);
  }

  private record(entry: string): Promise<void> {
    this.state.calls.push(entry);
    return Promise.resolve();
  }

  upload(from: string, to: string): Promise<void> {
    return this.record(`upload: ${from} => ${to}`);
  }

  download(from: string, to: string): Promise<void> {
    return this.record(`download: ${from} => ${to}`);
  }

  mkdir(path: string): Promise<void> {
    return this.record(`mkdir: ${path}`);
  }

  delete(path: string): Promise<void> {
    return this.record(`delete: ${path}`);
  }

  copy(from: string, to: string): Promise<void> {
    return this.record(`copy: ${from} => ${to}`);
  }

  move(from: string, to: string): Promise<void> {
    return this.record(`move: ${from} => ${to}`);
  }

  setPermissions(path: string, mask: number): Promise<void> {
    return this.record(`setPermissions: ${path} ${mask.toString(8)}`);
  }

  setOwner(path: string, user: string | undefined, group?: string): Promise<void> {
    return this.record(`setOwner: ${path} ${user ?? ''}:${group ?? ''}`);
  }

  env(name: string): Promise<string | undefined> {
    return Promise.resolve(this.state.envs.get(name));
  }

  binaryExists(name: string): Promise<boolean> {
    return Promise.resolve(this.state.binaries.has(name));
  }

  stat(path: string): Promise<FileStat | undefined> {
    return Promise.resolve(this.state.stats.get(path));
  }

  checksum(path: string): Promise<string | undefined> {
    return Promise.resolve(this.state.checksums.get(path));
  }

  forUser(user: string): FakeNode {
    this.state.calls.push(`forUser: ${user}`);
    return new FakeNode(this.name, user, this.config, this.state);
  }
}

// ---------------------------------------------------------------------------
// RecordingLogSink
// ---------------------------------------------------------------------------

export type LogKind = 'log' | 'local' | 'remote' | 'stdout' | 'stderr' | 'mock';

export interface LogEntry {
  readonly kind: LogKind;
  readonly text: string;
  readonly task: string | undefined;
}

export class RecordingLogSink implements LogSink {
  readonly entries: LogEntry[] = [];
  readonly clones: RecordingLogSink[] = [];
  task: string | undefined;

  constructor(readonly nodeName = 'test-node') {}

  private push(kind: LogKind, text: string): void {
    this.entries.push({ kind, text, task: this.task });
  }

  /** Entries of one kind, text only. */
  texts(kind: LogKind): string[] {
    return this.entries.filter((entry) => entry.kind === kind).map((entry) => entry.text);
  }

  log(message: string): void {
    this.push('log', message);
  }

  local(command: string): void {
    this.push('local', command);
  }

  remote(command: string): void {
    this.push('remote', command);
  }

  stdout(text: string): void {
    this.push('stdout', text);
  }

  stderr(text: string): void {
    this.push('stderr', text);
  }

  mockExecute(description: string): void {
    this.push('mock', description);
  }

  setTask(name: string | undefined): string | undefined {
    const previous = this.task;
    this.task = name;
    return previous;
  }

  cloneForNode(node: TargetNode): RecordingLogSink {
    const clone = new RecordingLogSink(node.name);
    clone.task = this.task;
    this.clones.push(clone);
    return clone;
  }
}

// ---------------------------------------------------------------------------
// MemoryLocalHost
// ---------------------------------------------------------------------------

export class MemoryLocalHost implements LocalHost {
  readonly files: Map<string, Uint8Array> = new Map();
  readonly stats: Map<string, FileStat> = new Map();
  readonly results: Map<string, CommandResult> = new Map();
  readonly executed: string[] = [];

  constructor(readonly tmpDir = '/tmp') {}

  put(path: string, text: string): this {
    this.files.set(path, new TextEncoder().encode(text));
    return this;
  }

  text(path: string): string | undefined {
    const bytes = this.files.get(path);
    return bytes === undefined ? undefined : new TextDecoder().decode(bytes);
  }

  exec(command: string): Promise<CommandResult> {
    this.executed.push(command);
    return Promise.resolve(this.results.get(command) ?? { exitCode: 0, stdout: '', stderr: '' });
  }

  readFile(path: string): Promise<Uint8Array> {
    const bytes = this.files.get(path);
    if (bytes === undefined) {
      return Promise.reject(new Error(`ENOENT: ${path}`));
    }
    return Promise.resolve(bytes);
  }

  exists(path: string): Promise<boolean> {
    return Promise.resolve(this.files.has(path));
  }

  stat(path: string): Promise<FileStat | undefined> {
    return Promise.resolve(this.stats.get(path));
  }

  writeTempFile(name: string, content: Uint8Array): Promise<string> {
    const path = `${this.tmpDir}/${name}`;
    this.files.set(path, content);
    return Promise.resolve(path);
  }

  async copyFile(from: string, to: string): Promise<void> {
    this.files.set(to, await this.readFile(from));
  }

  remove(path: string): Promise<void> {
    this.files.delete(path);
    return Promise.resolve();
  }
}

// ---------------------------------------------------------------------------
// MustacheEngine
// ---------------------------------------------------------------------------

export class MustacheEngine implements TemplateEngine {
  render(source: string, variables: Readonly<Record<string, unknown>>): string {
    return source.replace(/\{\{\s*([\w.]+)\s*\}\}/g, (_match, path: string) => {
      let current: unknown = variables;
      for (const segment of path.split('.')) {
        if (typeof current !== 'object' || current === null) return '';
        current = Reflect.get(current, segment);
      }
      return current === undefined ? '' : String(current);
    });
  }
}

// ---------------------------------------------------------------------------
// Context builders
// ---------------------------------------------------------------------------

export interface Harness {
  readonly node: FakeNode;
  readonly sink: RecordingLogSink;
  readonly host: MemoryLocalHost;
}

export function harness(nodeConfig: ConfigInput = {}): Harness {
  return {
    node: new FakeNode('test-node', 'deploy', nodeConfig),
    sink: new RecordingLogSink(),
    host: new MemoryLocalHost(),
  };
}

function init(h: Harness, index: PackageIndex): ExecutionContextInit {
  return {
    node: h.node,
    log: h.sink,
    index,
    host: h.host,
    templates: new MustacheEngine(),
  };
}

export function makeContext(h: Harness, index: PackageIndex): ExecutionContext {
  return new ExecutionContext(init(h, index));
}

export function makeMockContext(h: Harness, index: PackageIndex): MockExecutionContext {
  return new MockExecutionContext(init(h, index));
}
