import type { RunReport } from '@rigger/kernel'
import { outcomeColor, t, type Palette } from '../theme.js'

const OUTCOME_WIDTH = 10

/**
 * renderReport — summary printed after a run:
 *
 *   VALIDATE web
 *     valid     base
 *     invalid   web
 *   1 invalid
 */
export function renderReport(report: RunReport, p: Palette = t): string[] {
  const lines = [p.white(report.command.toUpperCase()) + ' ' + p.text(report.package)]

  for (const step of report.steps) {
    lines.push('  ' + outcomeColor(step.outcome, p)(step.outcome.padEnd(OUTCOME_WIDTH)) + step.package)
  }

  const invalid = report.steps.filter((step) => step.outcome === 'invalid').length
  lines.push(report.ok ? p.green('ok') : p.red(`${invalid} invalid`))
  return lines
}
