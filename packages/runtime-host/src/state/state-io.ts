/**
 * Rigger Runtime Host — StateIO Interface
 *
 * An injectable I/O abstraction for append-only JSONL files, bound to one
 * journal directory. FileLogSink writes through it; the `rigger log` command
 * reads through it.
 *
 * Two implementations are provided:
 *   - FileStateIO   — durable file I/O under a journal directory
 *   - MemoryStateIO — in-memory I/O for tests and embedded (non-persistent) use
 */

import { appendFileSync, mkdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { isNodeError } from '../adapters/fs.js';

// ---------------------------------------------------------------------------
// StateIO Interface
// ---------------------------------------------------------------------------

/**
 * Append-only line storage addressed by bare file names.
 *
 * Invariants:
 * - Callers never construct absolute paths; the implementation resolves names
 *   inside its own directory
 * - Files from one StateIO instance cannot be reached from another
 */
export interface StateIO {
  /**
   * Append a line to a log file, creating the directory on demand.
   * A newline character is appended after the line content.
   *
   * @param logfilename - Filename within the journal directory (e.g. 'run.jsonl')
   * @param line - Line content to append (without trailing newline)
   */
  appendLine(logfilename: string, line: string): void;

  /**
   * Return the raw text content of a log file, or an empty string if the
   * file does not exist.
   */
  readLogRaw(logfilename: string): string;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * Durable StateIO for a journal directory: lines go to `<dir>/<logfilename>`.
 *
 * Synchronous I/O: an entry is on disk before the logged operation proceeds,
 * so a crashed run still leaves a journal up to the failing step.
 * ENOENT on read is recoverable (empty content); other I/O errors are rethrown.
 */
export class FileStateIO implements StateIO {
  constructor(private readonly dir: string) {}

  appendLine(logfilename: string, line: string): void {
    mkdirSync(this.dir, { recursive: true });
    appendFileSync(join(this.dir, logfilename), line + '\n', 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    try {
      return readFileSync(join(this.dir, logfilename), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return '';
      }
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

/**
 * In-memory StateIO. Multiple instances are completely isolated from each
 * other, matching FileStateIO instances in separate directories.
 */
export class MemoryStateIO implements StateIO {
  private readonly logs: Map<string, string[]> = new Map();

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /**
   * Return all lines appended to a log file.
   *
   * Specific to MemoryStateIO, not part of the StateIO interface. Use it in
   * tests to inspect journal output without touching the file system.
   */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    if (lines.length === 0) return '';
    // Match FileStateIO: each appendLine call adds 'line\n'
    return lines.join('\n') + '\n';
  }
}
