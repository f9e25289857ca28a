import type { JournalEvent, JournalKind, JournalReadStats } from '@rigger/runtime-host'
import { t, type Palette } from '../theme.js'

export interface JournalFilter {
  readonly task?: string | undefined
  readonly kind?: JournalKind | undefined
  /** Keep only the last `limit` matching events. */
  readonly limit?: number | undefined
}

export function filterJournal(
  events: ReadonlyArray<JournalEvent>,
  filter: JournalFilter,
): JournalEvent[] {
  const matching = events.filter((e) =>
    (filter.task === undefined || e.task === filter.task) &&
    (filter.kind === undefined || e.kind === filter.kind),
  )
  return filter.limit !== undefined ? matching.slice(Math.max(0, matching.length - filter.limit)) : matching
}

/**
 * renderJournal — one line per line of entry text:
 *
 *   2026-01-01T00:00:00.000Z [web1] deploy apply:nginx remote sudo apt-get install -y nginx
 *
 * Entries outside any task show "-" in the task column.
 */
export function renderJournal(events: ReadonlyArray<JournalEvent>, p: Palette = t): string[] {
  const lines: string[] = []
  for (const e of events) {
    const head =
      p.dim(e.timestamp) + ' ' +
      p.blue(`[${e.node}]`) + ' ' +
      p.muted(e.user) + ' ' +
      p.white(e.task ?? '-') + ' ' +
      kindColor(e.kind, p)(e.kind)
    for (const line of e.text.split('\n')) {
      if (line.trim() !== '') lines.push(head + ' ' + line)
    }
  }
  return lines
}

/** Warnings for lines the reader could not use; empty when the journal is clean. */
export function renderJournalWarnings(stats: JournalReadStats, p: Palette = t): string[] {
  const warnings: string[] = []
  if (stats.parseErrors > 0) {
    warnings.push(p.amber(`warning: ${stats.parseErrors} malformed journal line(s) skipped`))
  }
  if (stats.partialTrailingLine) {
    warnings.push(p.amber('warning: journal ends with a partial line'))
  }
  return warnings
}

function kindColor(kind: JournalKind, p: Palette) {
  switch (kind) {
    case 'remote':
      return p.blueBright
    case 'local':
      return p.amber
    case 'stderr':
      return p.red
    case 'mock':
      return p.green
    case 'log':
    case 'stdout':
      return p.text
  }
}
