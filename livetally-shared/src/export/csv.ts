/**
 * CSV exports of a session log: one file of snapshot rows, one of chat
 * messages. Files are UTF-8 with a BOM so spreadsheet apps pick the
 * right encoding.
 *
 * @module export/csv
 */

import * as fs from 'fs';
import * as path from 'path';
import { LivetallyError } from '../errors';
import type { MessageRecord, SnapshotRecord } from '../log/records';
import { readSessionLog } from '../log/readSessionLog';

export const SNAPSHOT_CSV_HEADER = [
  'timestamp',
  'channel',
  'messages_per_minute',
  'messages_per_second',
  'unique_per_minute',
  'unique_per_second',
  'total_messages',
  'unique_total',
  'viewer_count',
  'screenshot_path',
] as const;

export const MESSAGE_CSV_HEADER = ['timestamp', 'channel', 'username', 'message'] as const;

const BOM = '\uFEFF';

type CsvValue = string | number | null;

export function csvField(value: CsvValue): string {
  if (value === null) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(header: readonly string[], rows: readonly CsvValue[][]): string {
  const lines = [header.join(','), ...rows.map((row) => row.map(csvField).join(','))];
  return BOM + lines.join('\n') + '\n';
}

export function snapshotRow(record: SnapshotRecord): CsvValue[] {
  return [
    record.ts,
    record.channel,
    record.messages_per_minute,
    record.messages_per_second,
    record.unique_per_minute,
    record.unique_per_second,
    record.total_messages,
    record.unique_total,
    record.viewer_count,
    record.screenshot_path,
  ];
}

export function messageRow(record: MessageRecord): CsvValue[] {
  return [record.ts, record.channel, record.username, record.message];
}

/** `session.jsonl` → `session.csv`. */
export function defaultSnapshotCsvPath(inputPath: string): string {
  const { dir, name } = path.parse(inputPath);
  return path.join(dir, `${name}.csv`);
}

/** `session.jsonl` → `session-messages.csv`. */
export function defaultMessagesCsvPath(inputPath: string): string {
  const { dir, name } = path.parse(inputPath);
  return path.join(dir, `${name}-messages.csv`);
}

export interface ExportResult {
  outputPath: string;
  rows: number;
  /** Log lines that could not be read as records. */
  skippedLines: number;
}

export async function exportSnapshotsCsv(inputPath: string, outputPath?: string): Promise<ExportResult> {
  const { records, skippedLines } = await readSessionLog(inputPath);
  const rows = records.flatMap((record) => (record.type === 'snapshot' ? [snapshotRow(record)] : []));
  if (rows.length === 0) {
    throw new LivetallyError('No snapshot data found');
  }

  const target = outputPath ?? defaultSnapshotCsvPath(inputPath);
  fs.writeFileSync(target, toCsv(SNAPSHOT_CSV_HEADER, rows), 'utf8');
  return { outputPath: target, rows: rows.length, skippedLines };
}

export async function exportMessagesCsv(inputPath: string, outputPath?: string): Promise<ExportResult> {
  const { records, skippedLines } = await readSessionLog(inputPath);
  const rows = records.flatMap((record) => (record.type === 'message' ? [messageRow(record)] : []));
  if (rows.length === 0) {
    throw new LivetallyError('No message data found');
  }

  const target = outputPath ?? defaultMessagesCsvPath(inputPath);
  fs.writeFileSync(target, toCsv(MESSAGE_CSV_HEADER, rows), 'utf8');
  return { outputPath: target, rows: rows.length, skippedLines };
}
