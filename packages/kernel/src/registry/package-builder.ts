/**
 * Definition DSL handed to `PackageRegistry.define()` callbacks.
 *
 * @example
 * registry.define('nginx', (pkg) => {
 *   pkg.configure({ nginx: { port: 80 } });
 *   pkg.dependsOn('base');
 *   pkg.validate((ctx) => ctx.binaryExists('nginx'));
 *   pkg.apply((ctx) => ctx.sudo('apt-get install -y nginx'));
 *   pkg.file({
 *     template: 'templates/nginx.conf.tpl',
 *     destination: '/etc/nginx/nginx.conf',
 *     permissions: 0o644,
 *     user: 'root',
 *     onApply: (ctx) => ctx.sudo('systemctl reload nginx'),
 *   });
 * });
 */

import type { Config, ConfigInput } from '../config/config.js';
import type { ScopedBody } from '../context/router.js';
import { FileActionGenerator, type FileSpec } from '../files/file-action.js';
import type { ActionBody } from '../types/package.js';
import type { PackageDefinition } from './package-registry.js';

/** Stages a generated package; the registry registers it once the declaring build returns. */
export type GenerateUnit = (name: string, build: (pkg: PackageBuilder) => void) => void;

export class PackageBuilder {
  constructor(
    private readonly definition: PackageDefinition,
    private readonly generate: GenerateUnit,
  ) {}

  get name(): string {
    return this.definition.name;
  }

  configure(defaults: ConfigInput | Config): this {
    this.definition.configure(defaults);
    return this;
  }

  apply(body: ActionBody): this {
    return this.action('apply', body);
  }

  revert(body: ActionBody): this {
    return this.action('revert', body);
  }

  validate(body: ActionBody): this {
    return this.action('validate', body);
  }

  action(name: string, body: ActionBody): this {
    this.definition.defineAction(name, body);
    return this;
  }

  dependsOn(...names: string[]): this {
    for (const name of names) this.definition.addDependency(name);
    return this;
  }

  triggers(...names: string[]): this {
    for (const name of names) this.definition.addDependent(name);
    return this;
  }

  /**
   * Generate the content (and permissions) units for a managed file.
   * `onApply` is shorthand for `spec.onApply` and takes precedence over it.
   */
  file(spec: FileSpec, onApply?: ScopedBody<unknown>): this {
    const effective = onApply !== undefined ? { ...spec, onApply } : spec;
    new FileActionGenerator(this.definition, this.generate, effective).configure();
    return this;
  }
}
