/**
 * Rigger Kernel — Package Runner
 *
 * Drives one lifecycle command across a package and everything it pulls in,
 * on one node, sequentially.
 *
 * Plan order (depth-first):
 *   dependencies of P (each with their own plan), then P, then the dependents
 *   of P (each with their own plan). Every package appears once. A cycle
 *   through dependency edges is a ConfigurationError; a dependent that is
 *   already being planned is left where it is, since it lands after its
 *   trigger anyway. `revert` walks the plan in reverse.
 *
 * Every step is a trigger("<command>:<package>") on the supplied context, so
 * config merging, frames and task names behave exactly as for a trigger
 * issued by an action body.
 */

import type { ExecutionContext } from '../context/execution-context.js';
import { formatActionReference } from '../context/reference.js';
import { ConfigurationError, UnknownPackageError } from '../errors.js';
import type { LifecycleAction, Package, PackageIndex } from '../types/package.js';

// ---------------------------------------------------------------------------
// Report types
// ---------------------------------------------------------------------------

export type StepOutcome = 'applied' | 'skipped' | 'valid' | 'invalid' | 'reverted' | 'no-action';

export interface RunStep {
  readonly package: string;
  readonly outcome: StepOutcome;
}

export interface RunReport {
  readonly command: LifecycleAction;
  readonly package: string;
  readonly steps: ReadonlyArray<RunStep>;
  /** False only when a validate step answered anything but `true`. */
  readonly ok: boolean;
}

// ---------------------------------------------------------------------------
// PackageRunner
// ---------------------------------------------------------------------------

export class PackageRunner {
  constructor(private readonly index: PackageIndex) {}

  /**
   * Resolve the execution plan for `packageName` in apply order.
   *
   * @throws {UnknownPackageError} if a package on the plan is not registered
   * @throws {ConfigurationError} if dependency edges form a cycle
   */
  plan(packageName: string): ReadonlyArray<Package> {
    const ordered: Package[] = [];
    const done = new Set<string>();
    const resolving: string[] = [];

    const visit = (name: string, requiredBy: string | undefined, viaDependency: boolean): void => {
      if (done.has(name)) return;
      if (resolving.includes(name)) {
        if (!viaDependency) return;
        const cycle = [...resolving.slice(resolving.indexOf(name)), name].join(' -> ');
        throw new ConfigurationError(`Dependency cycle detected: ${cycle}`);
      }
      const pkg = this.index.get(name);
      if (pkg === undefined) {
        throw new UnknownPackageError(name, requiredBy);
      }

      resolving.push(name);
      for (const dependency of pkg.dependencies) {
        visit(dependency, name, true);
      }
      resolving.pop();

      ordered.push(pkg);
      done.add(name);

      for (const dependent of pkg.dependents) {
        visit(dependent, name, false);
      }
    };

    visit(packageName, undefined, true);
    return ordered;
  }

  async run(command: LifecycleAction, packageName: string, context: ExecutionContext): Promise<RunReport> {
    const plan = this.plan(packageName);
    const packages = command === 'revert' ? [...plan].reverse() : plan;
    const steps: RunStep[] = [];

    for (const pkg of packages) {
      const outcome = await this.step(command, pkg, context);
      context.log(`${command.toUpperCase()} ${pkg.name}: ${outcome}`);
      steps.push({ package: pkg.name, outcome });
    }

    return {
      command,
      package: packageName,
      steps,
      ok: steps.every((step) => step.outcome !== 'invalid'),
    };
  }

  private async step(command: LifecycleAction, pkg: Package, context: ExecutionContext): Promise<StepOutcome> {
    const has = (action: LifecycleAction): boolean => pkg.action(action) !== undefined;
    const trigger = (action: LifecycleAction): Promise<unknown> =>
      context.trigger(formatActionReference(action, pkg.name));

    switch (command) {
      case 'apply': {
        if (has('validate') && (await trigger('validate')) === true) return 'skipped';
        if (!has('apply')) return 'no-action';
        await trigger('apply');
        return 'applied';
      }
      case 'validate': {
        if (!has('validate')) return 'no-action';
        return (await trigger('validate')) === true ? 'valid' : 'invalid';
      }
      case 'revert': {
        if (!has('revert')) return 'no-action';
        await trigger('revert');
        return 'reverted';
      }
    }
  }
}
