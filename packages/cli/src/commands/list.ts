/**
 * rigger list — Show registered packages
 *
 * Prints every package the definitions file registers, with its actions,
 * dependencies and dependents (generated file units included).
 */

import { Command } from 'commander';
import { loadRegistry } from '../definitions.js';
import { DEFAULT_PACKAGES_FILE } from '../options.js';
import { renderPackageList } from '../output/packages.js';

export const listCommand = new Command('list')
  .description('List the packages a definitions file registers')
  .option('-p, --packages <file>', 'ES module registering the packages', DEFAULT_PACKAGES_FILE)
  .action(async (options: { packages: string }) => {
    try {
      const registry = await loadRegistry(options.packages);
      for (const line of renderPackageList(registry.list())) {
        process.stdout.write(line + '\n');
      }
    } catch (err: unknown) {
      // eslint-disable-next-line no-console
      console.error(`[rigger list] ${err instanceof Error ? err.message : String(err)}`);
      process.exitCode = 1;
    }
  });
