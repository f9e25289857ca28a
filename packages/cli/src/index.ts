/**
 * @rigger/cli
 *
 * Command-line front end: loads package definitions, layers configuration
 * and drives the PackageRunner against the local node.
 *
 * Usage:
 *   rigger --help
 *   rigger apply <package> [-p file] [-u user] [-s key=value...] [-c file] [--dry-run] [--journal dir]
 *   rigger revert <package> [...]
 *   rigger validate <package> [...]
 *   rigger list [-p file]
 *   rigger log --journal <dir> [--task ref] [--kind kind] [--limit n]
 */

export { program } from './commands/index.js';
export type { LifecycleIO } from './commands/lifecycle.js';
export { executeLifecycle, lifecycleCommand } from './commands/lifecycle.js';
export type { DefinePackages } from './definitions.js';
export { buildRegistry, loadRegistry, resolveDefinitions } from './definitions.js';
export type { LifecycleOptions } from './options.js';
export { callerConfig, coerceScalar, layerConfig, readConfigFile } from './options.js';
