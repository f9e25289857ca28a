/**
 * rigger apply | revert | validate — Run a package lifecycle action
 *
 *   rigger apply nginx -p ./packages.js --set nginx.port=8080
 *   rigger validate nginx --config node.json --journal ./journal
 *   rigger revert nginx --dry-run
 *
 * The three commands share one option set and differ only in the action the
 * PackageRunner drives. Commands run against the local machine (LocalNode);
 * --dry-run swaps in the mock context so nothing on the node changes.
 *
 * Exit status is 1 when the run throws or a validate step is invalid.
 */

import { Command } from 'commander';
import chalk, { type ChalkInstance } from 'chalk';
import {
  Config,
  ExecutionContext,
  MockExecutionContext,
  PackageRunner,
  type ExecutionContextInit,
  type LifecycleAction,
  type LogSink,
  type PackageRegistry,
} from '@rigger/kernel';
import {
  ConsoleLogSink,
  FileLogSink,
  FileStateIO,
  LocalNode,
  LodashTemplateEngine,
  NodeLocalHost,
  TeeLogSink,
  consoleTheme,
} from '@rigger/runtime-host';
import { loadRegistry } from '../definitions.js';
import {
  DEFAULT_PACKAGES_FILE,
  callerConfig,
  collectAssignment,
  layerConfig,
  readConfigFile,
  type LifecycleOptions,
} from '../options.js';
import { renderReport } from '../output/report.js';
import { createPalette } from '../theme.js';

export interface LifecycleIO {
  readonly loadRegistry: (file: string) => Promise<PackageRegistry>;
  readonly write: (line: string) => void;
  readonly chalk: ChalkInstance;
}

const processIO: LifecycleIO = {
  loadRegistry,
  write: (line) => { process.stdout.write(line + '\n'); },
  chalk,
};

/**
 * Load the definitions, build the context chain for the local node and run
 * `command` on `packageName`. Answers the process exit status.
 */
export async function executeLifecycle(
  command: LifecycleAction,
  packageName: string,
  options: LifecycleOptions,
  io: LifecycleIO = processIO,
): Promise<number> {
  const registry = await io.loadRegistry(options.packages);
  const nodeConfig = options.config !== undefined ? await readConfigFile(options.config) : new Config();
  const node = new LocalNode({ user: options.user, config: nodeConfig.toJSON() });

  const consoleSink = new ConsoleLogSink(node, { write: io.write, theme: consoleTheme(io.chalk) });
  const log: LogSink =
    options.journal !== undefined
      ? new TeeLogSink(consoleSink, new FileLogSink(new FileStateIO(options.journal), node))
      : consoleSink;

  const init: ExecutionContextInit = {
    node,
    log,
    index: registry,
    host: new NodeLocalHost(),
    templates: new LodashTemplateEngine(),
    config: layerConfig(callerConfig(options.set ?? []), nodeConfig),
  };
  const context = options.dryRun === true ? new MockExecutionContext(init) : new ExecutionContext(init);

  const report = await new PackageRunner(registry).run(command, packageName, context);
  for (const line of renderReport(report, createPalette(io.chalk))) {
    io.write(line);
  }
  return report.ok ? 0 : 1;
}

const DESCRIPTIONS: Readonly<Record<LifecycleAction, string>> = {
  apply: 'Apply a package, its dependencies and its dependents',
  revert: 'Revert a package and everything its apply plan covers, in reverse',
  validate: 'Check whether a package and its plan are already in place',
};

export function lifecycleCommand(command: LifecycleAction): Command {
  return new Command(command)
    .description(DESCRIPTIONS[command])
    .argument('<package>', 'Package name')
    .option('-p, --packages <file>', 'ES module registering the packages', DEFAULT_PACKAGES_FILE)
    .option('-u, --user <user>', 'Run commands as this user')
    .option('-s, --set <key=value...>', 'Caller-level config value (dotted keys nest)', collectAssignment)
    .option('-c, --config <file>', 'JSON node configuration')
    .option('--dry-run', 'Log node-changing operations instead of performing them', false)
    .option('--journal <dir>', 'Append a JSONL run journal to <dir>/run.jsonl')
    .action(async (packageName: string, options: LifecycleOptions) => {
      try {
        process.exitCode = await executeLifecycle(command, packageName, options);
      } catch (err: unknown) {
        // eslint-disable-next-line no-console
        console.error(`[rigger ${command}] ${err instanceof Error ? err.message : String(err)}`);
        process.exitCode = 1;
      }
    });
}

export const applyCommand = lifecycleCommand('apply');
export const revertCommand = lifecycleCommand('revert');
export const validateCommand = lifecycleCommand('validate');
