/**
 * Rigger Kernel — Target Node Contract
 *
 * A TargetNode is the handle to the machine being provisioned. The kernel
 * only consumes this contract; transports (SSH, local shell, containers)
 * implement it outside the kernel and are injected into the execution context.
 *
 * The context holds a reference to its node and never manages the node's
 * lifecycle. Errors thrown by a node are passed through untouched: the kernel
 * applies no retry policy.
 */

import type { ConfigInput } from '../config/config.js';
import type { LogSink } from '../logging/log-sink.js';

/** Options forwarded verbatim to the transport for a single command. */
export interface RunOptions {
  readonly env?: Readonly<Record<string, string>> | undefined;
  /** Transport-level timeout. The kernel itself never times out. */
  readonly timeoutMs?: number | undefined;
}

/** Ownership and permission bits of a file. */
export interface FileStat {
  /** Permission bits, e.g. 0o644. */
  readonly permissions: number;
  readonly user: string;
  readonly group: string;
}

/** Working-directory helper of a node. */
export interface NodeHelper {
  /**
   * Set the working directory for subsequent commands and answer the one
   * that was in effect before. `undefined` means the transport default.
   */
  setCwd(path: string | undefined): string | undefined;
}

export interface TargetNode {
  /** Display name used in logs. */
  readonly name: string;
  /** The account commands run as. */
  readonly user: string;
  /** Configuration snapshot attached to the node (inventory values). */
  readonly config: ConfigInput;
  readonly helper: NodeHelper;

  /** Attach the sink the transport reports its own traffic to. */
  logTo(sink: LogSink): void;

  run(command: string, options?: RunOptions): Promise<string>;
  sudo(command: string, options?: RunOptions): Promise<string>;

  upload(from: string, to: string): Promise<void>;
  download(from: string, to: string): Promise<void>;
  mkdir(path: string): Promise<void>;
  delete(path: string): Promise<void>;
  copy(from: string, to: string): Promise<void>;
  move(from: string, to: string): Promise<void>;
  setPermissions(path: string, mask: number): Promise<void>;
  /** Either `user` or `group` may be omitted, not both. */
  setOwner(path: string, user: string | undefined, group?: string): Promise<void>;

  env(name: string): Promise<string | undefined>;
  binaryExists(name: string): Promise<boolean>;
  /** `undefined` when the path does not exist. */
  stat(path: string): Promise<FileStat | undefined>;
  /** Hex SHA-1 of the file content, `undefined` when the path does not exist. */
  checksum(path: string): Promise<string | undefined>;

  /** A handle to the same machine acting as another account. */
  forUser(user: string): TargetNode;
}
