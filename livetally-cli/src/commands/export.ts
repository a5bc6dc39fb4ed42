/**
 * `livetally export-csv` and `livetally export-messages`: convert a session
 * log into CSV for spreadsheets.
 */

import chalk from 'chalk';
import { exportMessagesCsv, exportSnapshotsCsv } from 'livetally-shared';
import type { ExportResult } from 'livetally-shared';

interface ExportOptions {
  input: string;
  output?: string;
}

async function runExport(
  opts: ExportOptions,
  exporter: (input: string, output?: string) => Promise<ExportResult>,
): Promise<void> {
  let result: ExportResult;
  try {
    result = await exporter(opts.input, opts.output);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`Error: ${msg}\n`);
    process.exit(1);
  }

  if (result.skippedLines > 0) {
    process.stderr.write(chalk.dim(`Skipped ${result.skippedLines} unreadable line(s)\n`));
  }
  process.stdout.write(`Wrote ${result.outputPath} ${chalk.dim(`(${result.rows} rows)`)}\n`);
}

export function exportCsvAction(opts: ExportOptions): Promise<void> {
  return runExport(opts, exportSnapshotsCsv);
}

export function exportMessagesAction(opts: ExportOptions): Promise<void> {
  return runExport(opts, exportMessagesCsv);
}
