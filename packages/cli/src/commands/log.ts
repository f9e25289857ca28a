/**
 * rigger log — Print a run journal
 *
 * Reads <dir>/run.jsonl written by `--journal <dir>` runs. Entries are
 * deduplicated and ordered by timestamp; malformed lines are skipped with a
 * warning on stderr.
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { FileStateIO, JOURNAL_FILE, readJournal, type JournalKind } from '@rigger/runtime-host';
import { filterJournal, renderJournal, renderJournalWarnings } from '../output/journal.js';

const KINDS: ReadonlyArray<JournalKind> = ['log', 'local', 'remote', 'stdout', 'stderr', 'mock'];

function parseLimit(raw: string): number {
  const n = Number.parseInt(raw, 10);
  if (Number.isNaN(n) || n < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

export const logCommand = new Command('log')
  .description('Print the run journal')
  .requiredOption('--journal <dir>', 'Journal directory')
  .option('--task <reference>', 'Only entries written while <reference> ran (e.g. apply:nginx)')
  .addOption(new Option('--kind <kind>', 'Only entries of this kind').choices(KINDS))
  .option('--limit <n>', 'Only the last <n> matching entries', parseLimit)
  .action((options: { journal: string; task?: string; kind?: JournalKind; limit?: number }) => {
    const { events, stats } = readJournal(new FileStateIO(options.journal).readLogRaw(JOURNAL_FILE));
    for (const warning of renderJournalWarnings(stats)) {
      process.stderr.write(warning + '\n');
    }
    const selected = filterJournal(events, { task: options.task, kind: options.kind, limit: options.limit });
    for (const line of renderJournal(selected)) {
      process.stdout.write(line + '\n');
    }
  });
