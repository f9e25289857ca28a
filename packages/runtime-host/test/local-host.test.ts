/**
 * Rigger Runtime Host — Controller-side LocalHost Tests
 *
 *   HOST-1: exec() reports every exit status and captures both streams
 *   HOST-2: writeTempFile() writes inside the temp dir only
 *   HOST-3: readFile/exists/stat/copyFile/remove operate on real paths
 *
 * Isolation: each test works in its own mkdtemp directory.
 */

import { describe, it, expect } from 'vitest';
import { mkdtempSync, realpathSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { NodeLocalHost } from '../src/adapters/local-host.js';

function tempDir(label: string): string {
  return realpathSync(mkdtempSync(join(tmpdir(), `rigger-${label}-`)));
}

const decode = (bytes: Uint8Array): string => new TextDecoder('utf-8').decode(bytes);

describe('HOST-1: exec', () => {
  it('resolves with a non-zero exit code instead of rejecting', async () => {
    const host = new NodeLocalHost();
    const result = await host.exec('echo hi; echo err >&2; exit 2');
    expect(result).toEqual({ exitCode: 2, stdout: 'hi\n', stderr: 'err\n' });
  });

  it('runs in the configured working directory', async () => {
    const dir = tempDir('host-1');
    const result = await new NodeLocalHost({ cwd: dir }).exec('pwd');
    expect(result.stdout).toBe(`${dir}\n`);
  });
});

describe('HOST-2: temp files', () => {
  it('writes under the temp dir and answers the absolute path', async () => {
    const dir = tempDir('host-2');
    const host = new NodeLocalHost({ tempDir: join(dir, 'tpl') });
    const path = await host.writeTempFile('rigger-tpl-abc', new TextEncoder().encode('rendered'));

    expect(path).toBe(join(dir, 'tpl', 'rigger-tpl-abc'));
    expect(decode(await host.readFile(path))).toBe('rendered');
  });

  it('drops directory parts of the name', async () => {
    const dir = tempDir('host-2b');
    const host = new NodeLocalHost({ tempDir: dir });
    const path = await host.writeTempFile('../escape.txt', new TextEncoder().encode('x'));
    expect(path).toBe(join(dir, 'escape.txt'));
  });
});

describe('HOST-3: file operations', () => {
  it('copies into a new directory and removes the copy', async () => {
    const dir = tempDir('host-3');
    const source = join(dir, 'nginx.conf');
    writeFileSync(source, 'worker_processes 2;\n');
    const host = new NodeLocalHost();

    const target = join(dir, 'staged', 'nginx.conf');
    await host.copyFile(source, target);
    expect(await host.exists(target)).toBe(true);
    expect(decode(await host.readFile(target))).toBe('worker_processes 2;\n');

    await host.remove(target);
    expect(await host.exists(target)).toBe(false);
  });

  it('removing a missing file is not an error', async () => {
    const dir = tempDir('host-3b');
    await expect(new NodeLocalHost().remove(join(dir, 'absent'))).resolves.toBeUndefined();
  });

  it('stat answers undefined for a missing path', async () => {
    const dir = tempDir('host-3c');
    expect(await new NodeLocalHost().stat(join(dir, 'absent'))).toBeUndefined();
  });

  it('rejects paths with null bytes', async () => {
    await expect(new NodeLocalHost().exists('/tmp/a\0b')).rejects.toThrow('null byte detected');
  });
});
