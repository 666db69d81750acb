import chalk from 'chalk';
import Table from 'cli-table3';
import type { SeriesSummary } from './report.js';
import type { OutputOptions } from './types.js';

export type OutputFormat = 'json' | 'table' | 'csv' | 'quiet';

const SUMMARY_COLUMNS = ['chart', 'panel', 'series', 'points', 'peak'] as const;

export function detectFormat(opts: OutputOptions): OutputFormat {
  if (opts.quiet) return 'quiet';
  if (opts.json) return 'json';
  if (opts.csv) return 'csv';
  if (opts.table) return 'table';
  return process.stdout.isTTY ? 'table' : 'json';
}

function csvCell(value: string | number): string {
  const v = String(value);
  return v.includes(',') || v.includes('"') || v.includes('\n') ? `"${v.replace(/"/g, '""')}"` : v;
}

/** Prints what each chart plotted; quiet mode prints each written chart path once. */
export function printSummary(summary: SeriesSummary[], format: OutputFormat): void {
  switch (format) {
    case 'quiet':
      for (const file of new Set(summary.map(row => row.file))) console.log(file);
      return;
    case 'json':
      console.log(JSON.stringify(summary, null, 2));
      return;
    case 'csv':
      console.log(SUMMARY_COLUMNS.join(','));
      for (const row of summary) {
        console.log(SUMMARY_COLUMNS.map(c => csvCell(row[c])).join(','));
      }
      return;
    case 'table': {
      const table = new Table({
        head: SUMMARY_COLUMNS.map(c => chalk.cyan(c)),
        colAligns: ['left', 'left', 'left', 'right', 'right'],
        style: { head: [], border: [] },
      });
      for (const row of summary) {
        // Empty series stay listed, dimmed.
        const cells = SUMMARY_COLUMNS.map(c => String(row[c]));
        table.push(row.points === 0 ? cells.map(cell => chalk.dim(cell)) : cells);
      }
      console.log(table.toString());
      return;
    }
  }
}
