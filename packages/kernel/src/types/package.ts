/**
 * Rigger Kernel — Package and Action Types
 *
 * A package is a named bundle of actions with default configuration.
 * An action is a named body belonging to exactly one package. The lifecycle
 * of a package is carried by three well-known action names:
 *
 *   apply    — bring the node into the described state
 *   revert   — undo what apply did
 *   validate — answer `true` when the node is already in the described state
 *
 * Packages may define further named actions, reachable through
 * `trigger('name:package')`.
 */

import type { Config } from '../config/config.js';
import type { ActionScope } from '../context/router.js';

/**
 * An action body.
 *
 * The router is both the receiver (`this`) and the first parameter, so
 * `function () { return this.run('id') }` and `(ctx) => ctx.run('id')` are
 * equivalent. Extra arguments passed to `trigger(ref, ...args)` follow.
 */
export type ActionBody = (this: ActionScope, scope: ActionScope, ...args: unknown[]) => unknown;

export const LIFECYCLE_ACTIONS = ['apply', 'revert', 'validate'] as const;

export type LifecycleAction = (typeof LIFECYCLE_ACTIONS)[number];

export interface Package {
  readonly name: string;
  /** Defaults merged (fill-missing) into the context config on trigger. */
  readonly config: Config;
  /** Packages that must be applied before this one. */
  readonly dependencies: ReadonlyArray<string>;
  /** Packages triggered after this one (generated file units land here). */
  readonly dependents: ReadonlyArray<string>;
  action(name: string): ActionBody | undefined;
  actionNames(): ReadonlyArray<string>;
}

/** Read-only view of the package registry handed to every context. */
export interface PackageIndex {
  get(name: string): Package | undefined;
}
