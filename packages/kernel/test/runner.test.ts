/**
 * Rigger Kernel — Package Runner Tests
 *
 *   RUN-1: plan order is dependencies, package, dependents; each once
 *   RUN-2: dependency cycles raise ConfigurationError
 *   RUN-3: unknown packages raise UnknownPackageError naming the requirer
 *   RUN-4: apply skips packages whose validate answers true
 *   RUN-5: validate reports invalid packages and clears ok
 *   RUN-6: revert walks the plan in reverse
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError, UnknownPackageError } from '../src/errors.js';
import { PackageRegistry } from '../src/registry/package-registry.js';
import { PackageRunner } from '../src/runner/runner.js';
import { harness, makeContext } from './fixtures.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

/**
 *   base <- web -> site
 *            |
 *            v
 *          users (also a dependency of site)
 */
function stack(): PackageRegistry {
  const registry = new PackageRegistry();
  registry.define('base', (pkg) => {
    pkg.validate((ctx) => ctx.binaryExists('curl'));
    pkg.apply((ctx) => ctx.sudo('apt-get install -y curl'));
  });
  registry.define('users', (pkg) => {
    pkg.apply((ctx) => ctx.sudo('useradd www'));
    pkg.revert((ctx) => ctx.sudo('userdel www'));
  });
  registry.define('web', (pkg) => {
    pkg.dependsOn('base', 'users');
    pkg.triggers('site');
    pkg.apply((ctx) => ctx.sudo('apt-get install -y nginx'));
    pkg.revert((ctx) => ctx.sudo('apt-get remove -y nginx'));
  });
  registry.define('site', (pkg) => {
    pkg.dependsOn('users');
    pkg.validate(() => false);
  });
  return registry;
}

// ---------------------------------------------------------------------------
// RUN-1 / RUN-2 / RUN-3
// ---------------------------------------------------------------------------

describe('RUN-1: plan', () => {
  it('orders dependencies, the package, then dependents', () => {
    const plan = new PackageRunner(stack()).plan('web');
    expect(plan.map((pkg) => pkg.name)).toEqual(['base', 'users', 'web', 'site']);
  });

  it('tolerates a dependent that depends back on its trigger', () => {
    const registry = new PackageRegistry();
    registry.define('app', (pkg) => pkg.triggers('reload'));
    registry.define('reload', (pkg) => pkg.dependsOn('app'));
    expect(new PackageRunner(registry).plan('app').map((pkg) => pkg.name)).toEqual(['app', 'reload']);
  });
});

describe('RUN-2: cycles', () => {
  it('rejects a dependency cycle', () => {
    const registry = new PackageRegistry();
    registry.define('a', (pkg) => pkg.dependsOn('b'));
    registry.define('b', (pkg) => pkg.dependsOn('a'));
    expect(() => new PackageRunner(registry).plan('a')).toThrow(ConfigurationError);
    expect(() => new PackageRunner(registry).plan('a')).toThrow('Dependency cycle detected: a -> b -> a');
  });
});

describe('RUN-3: unknown packages', () => {
  it('names the package that required the missing one', () => {
    const registry = new PackageRegistry();
    registry.define('web', (pkg) => pkg.dependsOn('base'));
    expect(() => new PackageRunner(registry).plan('web')).toThrow(
      "Package 'base' (required by 'web') is not registered.",
    );
  });

  it('rejects an unknown root package', () => {
    expect(() => new PackageRunner(new PackageRegistry()).plan('nope')).toThrow(UnknownPackageError);
  });
});

// ---------------------------------------------------------------------------
// RUN-4 / RUN-5 / RUN-6
// ---------------------------------------------------------------------------

describe('RUN-4: apply', () => {
  it('skips valid packages and applies the rest', async () => {
    const h = harness();
    h.node.state.binaries.add('curl');
    const registry = stack();
    const report = await new PackageRunner(registry).run('apply', 'web', makeContext(h, registry));

    expect(report.steps).toEqual([
      { package: 'base', outcome: 'skipped' },
      { package: 'users', outcome: 'applied' },
      { package: 'web', outcome: 'applied' },
      { package: 'site', outcome: 'no-action' },
    ]);
    expect(report.ok).toBe(true);
    expect(h.node.calls).toEqual(['sudo: useradd www', 'sudo: apt-get install -y nginx']);
  });

  it('runs each step under its trigger reference', async () => {
    const h = harness();
    const registry = stack();
    await new PackageRunner(registry).run('apply', 'users', makeContext(h, registry));
    expect(h.sink.entries).toEqual([
      { kind: 'remote', text: 'sudo useradd www', task: 'apply:users' },
      { kind: 'stdout', text: '', task: 'apply:users' },
      { kind: 'log', text: 'APPLY users: applied', task: undefined },
    ]);
  });
});

describe('RUN-5: validate', () => {
  it('reports valid, invalid and no-action steps', async () => {
    const h = harness();
    const registry = stack();
    const report = await new PackageRunner(registry).run('validate', 'web', makeContext(h, registry));

    expect(report.steps).toEqual([
      { package: 'base', outcome: 'invalid' },
      { package: 'users', outcome: 'no-action' },
      { package: 'web', outcome: 'no-action' },
      { package: 'site', outcome: 'invalid' },
    ]);
    expect(report.ok).toBe(false);
    expect(h.node.calls).toEqual([]);
  });
});

describe('RUN-6: revert', () => {
  it('reverts in reverse plan order', async () => {
    const h = harness();
    const registry = stack();
    const report = await new PackageRunner(registry).run('revert', 'web', makeContext(h, registry));

    expect(report.steps.map((step) => step.package)).toEqual(['site', 'web', 'users', 'base']);
    expect(h.node.calls).toEqual(['sudo: apt-get remove -y nginx', 'sudo: userdel www']);
    expect(report.ok).toBe(true);
  });
});
