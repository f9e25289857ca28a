/**
 * Rigger Kernel — Package Registry
 *
 * The registry is the authoritative record of every package defined for a
 * run. Contexts receive it through the read-only PackageIndex view; only
 * definition code (packages modules, the file action generator) writes to it.
 *
 * Registry invariants:
 * - Package names are unique; a second registration under a taken name is a
 *   ConfigurationError, never a silent replacement.
 * - Package names never contain the reference separator, so every package
 *   can be addressed as `action:package`.
 * - The registry is passed explicitly. There is no process-wide instance.
 */

import { Config, type ConfigInput } from '../config/config.js';
import { REFERENCE_SEPARATOR } from '../context/reference.js';
import { ConfigurationError } from '../errors.js';
import type { ActionBody, Package, PackageIndex } from '../types/package.js';
import { PackageBuilder } from './package-builder.js';

// ---------------------------------------------------------------------------
// PackageDefinition
// ---------------------------------------------------------------------------

/**
 * Mutable package record used while definitions are being built. Once
 * registered it is only ever read through the Package interface.
 */
export class PackageDefinition implements Package {
  readonly config: Config = new Config();
  private readonly actions: Map<string, ActionBody> = new Map();
  private readonly dependencyNames: string[] = [];
  private readonly dependentNames: string[] = [];

  constructor(readonly name: string) {
    if (name.trim() === '') {
      throw new ConfigurationError('A package name must not be empty.');
    }
    if (name.includes(REFERENCE_SEPARATOR)) {
      throw new ConfigurationError(
        `Package name '${name}' must not contain '${REFERENCE_SEPARATOR}'.`,
      );
    }
  }

  get dependencies(): ReadonlyArray<string> {
    return this.dependencyNames;
  }

  get dependents(): ReadonlyArray<string> {
    return this.dependentNames;
  }

  action(name: string): ActionBody | undefined {
    return this.actions.get(name);
  }

  actionNames(): ReadonlyArray<string> {
    return Array.from(this.actions.keys());
  }

  /**
   * @throws {ConfigurationError} if the package already defines `name`
   */
  defineAction(name: string, body: ActionBody): void {
    if (this.actions.has(name)) {
      throw new ConfigurationError(`Package '${this.name}' already defines action '${name}'.`);
    }
    this.actions.set(name, body);
  }

  /** Fill-missing merge into the package defaults. */
  configure(defaults: ConfigInput | Config): void {
    this.config.mergeMissing(defaults instanceof Config ? defaults : Config.from(defaults));
  }

  addDependency(name: string): void {
    if (!this.dependencyNames.includes(name)) this.dependencyNames.push(name);
  }

  addDependent(name: string): void {
    if (!this.dependentNames.includes(name)) this.dependentNames.push(name);
  }
}

// ---------------------------------------------------------------------------
// PackageRegistry
// ---------------------------------------------------------------------------

export class PackageRegistry implements PackageIndex {
  private readonly packages: Map<string, Package> = new Map();

  /**
   * @throws {ConfigurationError} if a package with the same name exists
   */
  register(pkg: Package): void {
    this.assertAvailable(pkg.name);
    this.packages.set(pkg.name, pkg);
  }

  get(name: string): Package | undefined {
    return this.packages.get(name);
  }

  has(name: string): boolean {
    return this.packages.has(name);
  }

  /** All packages in registration order. */
  list(): ReadonlyArray<Package> {
    return Array.from(this.packages.values());
  }

  /**
   * Define and register a package.
   *
   * Nothing is registered until `build` returns. Packages generated from
   * inside `build` (file units) are staged with it and registered together,
   * ahead of the declaring package, so a build callback that throws leaves
   * the registry exactly as it was.
   */
  define(name: string, build?: (pkg: PackageBuilder) => void): PackageDefinition {
    const staged: PackageDefinition[] = [];
    const definition = this.stage(name, build, staged);
    for (const pkg of staged) this.register(pkg);
    return definition;
  }

  private stage(
    name: string,
    build: ((pkg: PackageBuilder) => void) | undefined,
    staged: PackageDefinition[],
  ): PackageDefinition {
    this.assertAvailable(name);
    if (staged.some((pkg) => pkg.name === name)) {
      throw duplicate(name);
    }
    const definition = new PackageDefinition(name);
    build?.(new PackageBuilder(definition, (unitName, unitBuild) => {
      this.stage(unitName, unitBuild, staged);
    }));
    staged.push(definition);
    return definition;
  }

  private assertAvailable(name: string): void {
    if (this.packages.has(name)) {
      throw duplicate(name);
    }
  }
}

function duplicate(name: string): ConfigurationError {
  return new ConfigurationError(
    `Package already registered: ${name}. Duplicate package names are not permitted.`,
  );
}
