/**
 * Rigger CLI — Option Parsing and Config Layering
 *
 * Config sources, highest precedence first:
 *
 *   --set key=value      caller-level values
 *   --config <file>      node configuration (JSON)
 *   package defaults     merged by the kernel on trigger
 *
 * Every layer is fill-missing merged into the one above it, so a key set
 * higher up is never overwritten.
 */

import { readFile } from 'node:fs/promises';
import { InvalidArgumentError } from 'commander';
import { Config, ConfigurationError, type ConfigScalar } from '@rigger/kernel';

export interface LifecycleOptions {
  readonly packages: string;
  readonly user?: string | undefined;
  readonly set?: ReadonlyArray<string> | undefined;
  readonly config?: string | undefined;
  readonly dryRun?: boolean | undefined;
  readonly journal?: string | undefined;
}

export const DEFAULT_PACKAGES_FILE = 'rigger.packages.js';

// ---------------------------------------------------------------------------
// --set
// ---------------------------------------------------------------------------

const NUMBER = /^-?\d+(\.\d+)?$/;

/** "true"/"false" become booleans and decimal literals numbers. */
export function coerceScalar(raw: string): ConfigScalar {
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  if (NUMBER.test(raw)) return Number(raw);
  return raw;
}

/**
 * Commander argument parser for one `key=value` pair; collects into an array.
 *
 * @throws {InvalidArgumentError} when the pair has no '=' or no key
 */
export function collectAssignment(raw: string, previous: ReadonlyArray<string> = []): string[] {
  const eq = raw.indexOf('=');
  if (eq <= 0) {
    throw new InvalidArgumentError(`Expected key=value, got '${raw}'.`);
  }
  return [...previous, raw];
}

/** Build the caller-level config from `key=value` pairs; dotted keys nest. */
export function callerConfig(assignments: ReadonlyArray<string>): Config {
  const config = new Config();
  for (const pair of assignments) {
    const eq = pair.indexOf('=');
    config.assign(pair.slice(0, eq), coerceScalar(pair.slice(eq + 1)));
  }
  return config;
}

// ---------------------------------------------------------------------------
// --config
// ---------------------------------------------------------------------------

/**
 * @throws {ConfigurationError} when the file is not JSON or not a config tree
 */
export async function readConfigFile(path: string): Promise<Config> {
  const text = await readFile(path, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err: unknown) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Config file '${path}' is not valid JSON: ${detail}`);
  }
  return Config.parse(raw);
}

/** `caller` with every key of `node` it does not already hold. */
export function layerConfig(caller: Config, node: Config): Config {
  return caller.clone().mergeMissing(node);
}
