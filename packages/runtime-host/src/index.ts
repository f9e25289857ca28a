/**
 * @rigger/runtime-host
 *
 * Rigger runtime host — side-effectful implementations of the kernel's
 * collaborator interfaces. Depends on @rigger/kernel (interfaces); implements
 * them with Node.js built-ins, lodash and chalk.
 *
 * The kernel package defines interfaces; this package provides implementations.
 * No kernel code imports from this package.
 */

export { CommandFailedError } from './errors.js';

// Processes and files
export type { SpawnOptions } from './adapters/exec.js';
export { spawnProcess, spawnShell } from './adapters/exec.js';
export { parseStatOutput } from './adapters/fs.js';
export type { NodeLocalHostOptions } from './adapters/local-host.js';
export { NodeLocalHost } from './adapters/local-host.js';

// Target nodes
export type { LocalNodeOptions } from './node/local-node.js';
export { LocalNode, LocalNodeHelper } from './node/local-node.js';

// Templates
export { LodashTemplateEngine } from './templates/lodash-engine.js';

// Logging
export type { ConsoleLogSinkOptions, ConsoleTheme } from './logging/console-log-sink.js';
export { ConsoleLogSink, consoleTheme } from './logging/console-log-sink.js';
export type { JournalIdentity, JournalKind } from './logging/file-log-sink.js';
export { FileLogSink, JOURNAL_FILE } from './logging/file-log-sink.js';
export { TeeLogSink } from './logging/tee-log-sink.js';
export { ulid, ulidTime } from './logging/ulid.js';
export type { JournalEvent, JournalReadResult, JournalReadStats } from './logging/log-reader.js';
export { readJournal } from './logging/log-reader.js';

// StateIO — journal storage
export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO } from './state/state-io.js';
