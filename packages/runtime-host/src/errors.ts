/**
 * Rigger Runtime Host — Error Types
 */

/**
 * A command on a node exited with a non-zero status.
 *
 * Carries everything the command produced so the CLI can show it. The kernel
 * passes this through untouched; nothing retries.
 */
export class CommandFailedError extends Error {
  constructor(
    readonly command: string,
    readonly exitCode: number,
    readonly stdout: string,
    readonly stderr: string,
  ) {
    const detail = stderr.trim();
    super(
      `Command failed with exit code ${exitCode}: ${command}` + (detail === '' ? '' : `\n${detail}`),
    );
    this.name = 'CommandFailedError';
  }
}
