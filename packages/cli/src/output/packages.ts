import type { Package } from '@rigger/kernel'
import { t, type Palette } from '../theme.js'

const LABEL_WIDTH = 12

/**
 * renderPackageList — one block per registered package:
 *
 *   nginx
 *     actions     apply, revert, validate
 *     depends on  base
 *     triggers    file-content[nginx.conf]
 *
 * Empty edges are left out; a package without actions shows "(none)".
 */
export function renderPackageList(packages: ReadonlyArray<Package>, p: Palette = t): string[] {
  if (packages.length === 0) {
    return [p.muted('no packages defined')]
  }

  const label = (s: string) => '  ' + p.muted(s.padEnd(LABEL_WIDTH))
  const lines: string[] = []

  for (const pkg of packages) {
    const actions = pkg.actionNames()
    lines.push(p.white(pkg.name))
    lines.push(label('actions') + (actions.length > 0 ? p.text(actions.join(', ')) : p.dim('(none)')))
    if (pkg.dependencies.length > 0) {
      lines.push(label('depends on') + p.text(pkg.dependencies.join(', ')))
    }
    if (pkg.dependents.length > 0) {
      lines.push(label('triggers') + p.text(pkg.dependents.join(', ')))
    }
  }
  return lines
}
