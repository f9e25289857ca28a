/**
 * Rigger Kernel — File Action Generator
 *
 * Turns one declarative file specification into up to two generated
 * packages, staged for registration alongside the declaring package and
 * added as its dependents:
 *
 *   file-content[<name>]      apply / revert / validate the file content
 *   file-permissions[<name>]  apply / validate owner, group and mode; only
 *                             generated when permissions, user or group is
 *                             part of the specification
 *
 * `<name>` is the explicit `name`, or the destination when that is a literal
 * string. A destination containing the reference separator needs an explicit
 * name, since the unit could not be addressed by its path. Every field may be a literal or a function of the action scope;
 * functions are evaluated each time an action runs, never at definition time.
 *
 * The specification is checked in the constructor, so a malformed one throws
 * ConfigurationError before anything is registered.
 */

import { posix } from 'node:path';
import { REFERENCE_SEPARATOR } from '../context/reference.js';
import type { ActionScope, ScopedBody } from '../context/router.js';
import { shellQuote } from '../context/shell.js';
import { ConfigurationError } from '../errors.js';
import type { GenerateUnit } from '../registry/package-builder.js';
import type { PackageDefinition } from '../registry/package-registry.js';
import type { ActionBody } from '../types/package.js';

// ---------------------------------------------------------------------------
// Specification types
// ---------------------------------------------------------------------------

/** A value computed from the action scope when the action runs. */
export type Deferred<T> = (scope: ActionScope) => T | PromiseLike<T>;

/** What a specification field accepts: the value itself or a computation. */
export type Deferrable<T> = T | Deferred<T>;

/** Normalised field: literal or deferred, tagged. */
export type SpecValue<T> =
  | { readonly kind: 'literal'; readonly value: T }
  | { readonly kind: 'deferred'; readonly compute: Deferred<T> };

export interface FileSpec {
  /** Controller-side path of the payload. */
  readonly source?: Deferrable<string> | undefined;
  /** Template path on the controller, or inline template text. */
  readonly template?: Deferrable<string> | undefined;
  /** Path on the node. */
  readonly destination: Deferrable<string>;
  /** Unit name; required when `destination` is not a literal string. */
  readonly name?: string | undefined;
  /** Permission bits, e.g. 0o644. */
  readonly permissions?: Deferrable<number | undefined> | undefined;
  readonly user?: Deferrable<string | undefined> | undefined;
  /** Defaults to `user` where a group is needed for chown. */
  readonly group?: Deferrable<string | undefined> | undefined;
  /**
   * `true` creates the parent directory of the destination; a string names
   * the directory to create.
   */
  readonly createDir?: Deferrable<boolean | string | undefined> | undefined;
  /** Runs after a successful content or permissions apply. */
  readonly onApply?: ScopedBody<unknown> | undefined;
}

export const CONTENT_UNIT = 'content';
export const PERMISSIONS_UNIT = 'permissions';
export const REMOTE_TEMP_PREFIX = 'rigger-tmp-';

export function fileUnitName(unit: string, name: string): string {
  return `file-${unit}[${name}]`;
}

// ---------------------------------------------------------------------------
// Spec value helpers
// ---------------------------------------------------------------------------

function isDeferred<T>(input: Deferrable<T>): input is Deferred<T> {
  return typeof input === 'function';
}

export function specValue<T>(input: Deferrable<T>): SpecValue<T> {
  return isDeferred(input) ? { kind: 'deferred', compute: input } : { kind: 'literal', value: input };
}

async function evaluate<T>(value: SpecValue<T> | undefined, scope: ActionScope): Promise<T | undefined> {
  if (value === undefined) return undefined;
  return value.kind === 'literal' ? value.value : await value.compute(scope);
}

// ---------------------------------------------------------------------------
// FileActionGenerator
// ---------------------------------------------------------------------------

export class FileActionGenerator {
  private readonly source: SpecValue<string> | undefined;
  private readonly template: SpecValue<string> | undefined;
  private readonly destination: SpecValue<string>;
  private readonly permissions: SpecValue<number | undefined> | undefined;
  private readonly user: SpecValue<string | undefined> | undefined;
  private readonly group: SpecValue<string | undefined> | undefined;
  private readonly createDir: SpecValue<boolean | string | undefined> | undefined;
  private readonly onApply: ScopedBody<unknown> | undefined;
  readonly name: string;

  /**
   * @throws {ConfigurationError} if neither source nor template is given,
   *   if destination is missing, or if the unit name is missing or contains
   *   the reference separator
   */
  constructor(
    private readonly declaring: PackageDefinition,
    private readonly generate: GenerateUnit,
    spec: FileSpec,
  ) {
    if (spec.source === undefined && spec.template === undefined) {
      throw new ConfigurationError(
        `File in package '${declaring.name}': a source or a template must be provided.`,
      );
    }
    if (spec.destination === undefined) {
      throw new ConfigurationError(
        `File in package '${declaring.name}': a destination must be provided.`,
      );
    }

    this.destination = specValue(spec.destination);
    const name = spec.name ?? (this.destination.kind === 'literal' ? this.destination.value : undefined);
    if (name === undefined) {
      throw new ConfigurationError(
        `File in package '${declaring.name}': a name must be provided unless the destination is a literal string.`,
      );
    }
    if (name.includes(REFERENCE_SEPARATOR)) {
      throw new ConfigurationError(
        spec.name === undefined
          ? `File in package '${declaring.name}': destination '${name}' contains '${REFERENCE_SEPARATOR}'; give the file an explicit name.`
          : `File in package '${declaring.name}': name '${name}' must not contain '${REFERENCE_SEPARATOR}'.`,
      );
    }
    this.name = name;

    this.source = spec.source !== undefined ? specValue(spec.source) : undefined;
    this.template = spec.template !== undefined ? specValue(spec.template) : undefined;
    this.permissions = spec.permissions !== undefined ? specValue(spec.permissions) : undefined;
    this.user = spec.user !== undefined ? specValue(spec.user) : undefined;
    this.group = spec.group !== undefined ? specValue(spec.group) : undefined;
    this.createDir = spec.createDir !== undefined ? specValue(spec.createDir) : undefined;
    this.onApply = spec.onApply;
  }

  get hasPermissionsUnit(): boolean {
    return this.permissions !== undefined || this.user !== undefined || this.group !== undefined;
  }

  /** Stage the generated units; answers their package names. */
  configure(): ReadonlyArray<string> {
    const names = [this.addContentUnit()];
    if (this.hasPermissionsUnit) {
      names.push(this.addPermissionsUnit());
    }
    return names;
  }

  // -------------------------------------------------------------------------
  // Resolution against the running scope
  // -------------------------------------------------------------------------

  async remotePath(scope: ActionScope): Promise<string> {
    const destination = await evaluate(this.destination, scope);
    if (destination === undefined || destination === '') {
      throw new ConfigurationError(`File '${this.name}': destination resolved to an empty value.`);
    }
    return destination;
  }

  /** The controller-side file to transfer: the source, or the rendered template. */
  async localPath(scope: ActionScope): Promise<string> {
    const source = await evaluate(this.source, scope);
    if (source !== undefined) return source;
    const template = await evaluate(this.template, scope);
    if (template === undefined) {
      throw new ConfigurationError(`File '${this.name}': source and template both resolved to nothing.`);
    }
    return scope.template(template, { inlineFallback: true }).renderToTempfile();
  }

  /**
   * Generated units carry no defaults of their own: every body first fills
   * the context config from the declaring package, so deferred fields and
   * templates see the same values as the package that declared the file.
   */
  private body(run: (scope: ActionScope) => Promise<unknown>): ActionBody {
    return (scope) => {
      scope.config.mergeMissing(this.declaring.config);
      return run(scope);
    };
  }

  private async runAfterApply(scope: ActionScope): Promise<void> {
    if (this.onApply !== undefined) {
      await this.onApply.call(scope, scope);
    }
  }

  // -------------------------------------------------------------------------
  // Generated units
  // -------------------------------------------------------------------------

  private addContentUnit(): string {
    const unitName = fileUnitName(CONTENT_UNIT, this.name);
    this.generate(unitName, (pkg) => {
      pkg.apply(this.body(async (scope) => {
        const destination = await this.remotePath(scope);
        const createDir = await evaluate(this.createDir, scope);
        if (createDir !== undefined && createDir !== false && createDir !== '') {
          const dir = createDir === true ? posix.dirname(destination) : createDir;
          await scope.sudo(`mkdir -p ${shellQuote(dir)}`);
          const user = await evaluate(this.user, scope);
          if (user !== undefined) {
            const group = (await evaluate(this.group, scope)) ?? user;
            await scope.sudo(`chown ${shellQuote(`${user}:${group}`)} ${shellQuote(dir)}`);
          }
        }

        const payload = scope.local(await this.localPath(scope));
        const digest = await payload.hash();
        if (digest === undefined) {
          throw new Error(`File '${this.name}': local payload ${payload.path} does not exist.`);
        }
        const tmpPath = `${REMOTE_TEMP_PREFIX}${digest}`;
        await payload.copyTo(scope.remote(tmpPath));
        await scope.sudo(`mv ${shellQuote(tmpPath)} ${shellQuote(destination)}`);
        await this.runAfterApply(scope);
      }));

      pkg.revert(this.body(async (scope) => {
        await scope.remote(await this.remotePath(scope)).delete();
      }));

      pkg.validate(this.body(async (scope) => {
        const payload = scope.local(await this.localPath(scope));
        return payload.matches(scope.remote(await this.remotePath(scope)));
      }));
    });
    this.declaring.addDependent(unitName);
    return unitName;
  }

  private addPermissionsUnit(): string {
    const unitName = fileUnitName(PERMISSIONS_UNIT, this.name);
    this.generate(unitName, (pkg) => {
      pkg.apply(this.body(async (scope) => {
        const file = scope.remote(await this.remotePath(scope));
        const user = await evaluate(this.user, scope);
        const group = await evaluate(this.group, scope);
        const permissions = await evaluate(this.permissions, scope);
        if (user !== undefined || group !== undefined) {
          await file.setOwner(user, group);
        }
        if (permissions !== undefined) {
          await file.setPermissions(permissions);
        }
        await this.runAfterApply(scope);
      }));

      pkg.validate(this.body(async (scope) => {
        const stat = await scope.remote(await this.remotePath(scope)).stat();
        if (stat === undefined) return false;
        const permissions = await evaluate(this.permissions, scope);
        if (permissions !== undefined && (stat.permissions & 0o7777) !== (permissions & 0o7777)) {
          return false;
        }
        const user = await evaluate(this.user, scope);
        if (user !== undefined && stat.user !== user) return false;
        const group = await evaluate(this.group, scope);
        if (group !== undefined && stat.group !== group) return false;
        return true;
      }));
    });
    this.declaring.addDependent(unitName);
    return unitName;
  }
}
