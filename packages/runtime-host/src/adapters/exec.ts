/**
 * Rigger Runtime Host — Subprocess Execution
 *
 * The single place in the project that spawns processes. LocalNode and
 * NodeLocalHost both run their commands through spawnProcess().
 *
 * spawnProcess() resolves for every exit status and rejects only when the
 * process could not be started. Callers decide whether a non-zero status is
 * a failure (LocalNode) or merely output to report (NodeLocalHost.exec).
 */

import { spawn } from 'node:child_process';
import type { CommandResult } from '@rigger/kernel';

export interface SpawnOptions {
  readonly cwd?: string | undefined;
  /** Merged over the parent environment. */
  readonly env?: Readonly<Record<string, string>> | undefined;
  readonly timeoutMs?: number | undefined;
}

/**
 * Spawn `command` with `args` (no shell) and collect stdout and stderr.
 *
 * A process killed by a signal or by the timeout reports exit code 1.
 */
export function spawnProcess(
  command: string,
  args: ReadonlyArray<string>,
  options: SpawnOptions = {},
): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, [...args], {
      cwd: options.cwd,
      env: options.env !== undefined ? { ...process.env, ...options.env } : process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
      ...(options.timeoutMs !== undefined ? { timeout: options.timeoutMs } : {}),
    });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];

    child.stdout.on('data', (chunk: Buffer) => { stdoutChunks.push(chunk); });
    child.stderr.on('data', (chunk: Buffer) => { stderrChunks.push(chunk); });

    child.on('close', (exitCode: number | null) => {
      resolve({
        exitCode: exitCode ?? 1,
        stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
        stderr: Buffer.concat(stderrChunks).toString('utf-8'),
      });
    });

    child.on('error', (err: Error) => { reject(err); });
  });
}

/** Run a command line through `sh -c`. */
export function spawnShell(commandLine: string, options: SpawnOptions = {}): Promise<CommandResult> {
  return spawnProcess('sh', ['-c', commandLine], options);
}
