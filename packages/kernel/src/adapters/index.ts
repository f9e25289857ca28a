/**
 * Rigger Kernel — Controller-side Adapter Interfaces
 *
 * The target machine is reached through a TargetNode. Everything that
 * happens on the controlling machine (local commands, reading payload files,
 * writing rendered templates) flows through the adapters declared here.
 *
 * No implementations are provided here. Adapters are injected, not
 * constructed; concrete implementations live in @rigger/runtime-host.
 */

import type { FileStat } from '../types/node.js';

// ---------------------------------------------------------------------------
// LocalHost
// ---------------------------------------------------------------------------

export interface CommandResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

/**
 * The controlling machine.
 *
 * exec() resolves for any exit code; it rejects only when the command could
 * not be started at all.
 */
export interface LocalHost {
  exec(command: string): Promise<CommandResult>;
  readFile(path: string): Promise<Uint8Array>;
  exists(path: string): Promise<boolean>;
  /** `undefined` when the path does not exist. */
  stat(path: string): Promise<FileStat | undefined>;
  /**
   * Write `content` to a file named `name` in the host's temp directory and
   * answer its absolute path. Writing the same name twice overwrites.
   */
  writeTempFile(name: string, content: Uint8Array): Promise<string>;
  copyFile(from: string, to: string): Promise<void>;
  remove(path: string): Promise<void>;
}

// ---------------------------------------------------------------------------
// TemplateEngine
// ---------------------------------------------------------------------------

/**
 * Substitution engine behind Template. The syntax is entirely the engine's
 * concern; the kernel only supplies the source text and the variables.
 */
export interface TemplateEngine {
  render(source: string, variables: Readonly<Record<string, unknown>>): string;
}
