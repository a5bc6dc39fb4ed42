#!/usr/bin/env node
import * as fs from 'fs';
import * as path from 'path';
import { Command } from 'commander';

function readVersion(): string {
  const pkgPath = path.join(__dirname, '..', 'package.json');
  if (!fs.existsSync(pkgPath)) return '0.0.0';
  const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

const program = new Command();

program
  .name('livetally')
  .description('Live chat statistics, session logs and stream captures for Kick channels')
  .version(readVersion());

// Commands lazy-load so `--help` stays fast
program
  .command('run')
  .description('Connect to a channel and print live stats')
  .option('--channel <name>', 'Kick channel name')
  .option('--chatroom-id <id>', 'Chatroom id (skips the channel lookup)')
  .option('--proxy <url>', 'Proxy base url, e.g. http://localhost:3456')
  .option('--log <path>', 'Path to the session log (JSONL)')
  .option('--duration <seconds>', 'Stop after N seconds')
  .option('--inactivity <seconds>', 'Stop after N seconds without messages')
  .option('--screenshot-interval <seconds>', 'Capture a frame every N seconds')
  .option('--screenshot-on-snapshot', 'Capture a frame on every snapshot')
  .option('--screenshot-dir <path>', 'Directory for captured frames')
  .option('--screenshot-max <count>', 'Keep at most N captured frames')
  .option('--screenshot-format <fmt>', 'Frame format: jpg, png (default: jpg)')
  .option('--screenshot-embed', 'Embed a base64 thumbnail in each snapshot')
  .option('--screenshot-embed-width <px>', 'Thumbnail width in pixels (default: 160)')
  .option('--stream-url <url>', 'Stream URL for captures (default: looked up from the channel)')
  .option('--ffmpeg-path <path>', 'Path to the ffmpeg executable')
  .option('--verbose', 'Write diagnostic logging to stderr')
  .action(async (opts: Record<string, unknown>) => {
    const { runAction } = await import('./commands/run');
    return runAction(opts);
  });

program
  .command('export-csv')
  .description('Export session snapshots to CSV')
  .requiredOption('--input <path>', 'Session log (JSONL)')
  .option('--output <path>', 'CSV output path (default: next to the input)')
  .action(async (opts: { input: string; output?: string }) => {
    const { exportCsvAction } = await import('./commands/export');
    return exportCsvAction(opts);
  });

program
  .command('export-messages')
  .description('Export chat messages to CSV')
  .requiredOption('--input <path>', 'Session log (JSONL)')
  .option('--output <path>', 'CSV output path (default: <input>-messages.csv)')
  .action(async (opts: { input: string; output?: string }) => {
    const { exportMessagesAction } = await import('./commands/export');
    return exportMessagesAction(opts);
  });

program.parseAsync().catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(`Error: ${msg}\n`);
  process.exit(1);
});
