/**
 * Rigger CLI — Package Definitions Loader
 *
 * A definitions file is an ES module whose default export registers
 * packages:
 *
 *   export default (registry) => {
 *     registry.define('nginx', (pkg) => {
 *       pkg.apply((ctx) => ctx.sudo('apt-get install -y nginx'));
 *     });
 *   };
 */

import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { ConfigurationError, PackageRegistry } from '@rigger/kernel';

export type DefinePackages = (registry: PackageRegistry) => void | Promise<void>;

/**
 * Extract the registering function from an imported module namespace.
 *
 * @throws {ConfigurationError} when the module has no function default export
 */
export function resolveDefinitions(mod: unknown, source: string): DefinePackages {
  const define: unknown = typeof mod === 'object' && mod !== null ? Reflect.get(mod, 'default') : undefined;
  if (typeof define !== 'function') {
    throw new ConfigurationError(
      `Package definitions '${source}' must default-export a function (registry) => void.`,
    );
  }
  return async (registry) => {
    await Reflect.apply(define, undefined, [registry]);
  };
}

export async function buildRegistry(define: DefinePackages): Promise<PackageRegistry> {
  const registry = new PackageRegistry();
  await define(registry);
  return registry;
}

export async function loadRegistry(file: string): Promise<PackageRegistry> {
  const mod: unknown = await import(pathToFileURL(resolve(file)).href);
  return buildRegistry(resolveDefinitions(mod, file));
}
