/**
 * `livetally run`: connect to a channel's chat and log live stats until a
 * stop condition or Ctrl+C.
 */

import chalk from 'chalk';
import {
  KickApiClient,
  PusherChatFeed,
  SessionController,
  SessionLogSink,
  configureLogger,
  exitCodeFor,
  parseRunOptions,
  prepareSession,
} from 'livetally-shared';
import type { SessionConfig, SessionOutcome } from 'livetally-shared';
import { StatusLine } from '../dashboard/statusLine';

/** Operator-facing line for how the session ended. */
export function stopMessage(outcome: SessionOutcome, config: SessionConfig): string {
  switch (outcome.reason) {
    case 'duration':
      return `Stopping after ${Math.round((config.durationMs ?? 0) / 1000)}s duration.`;
    case 'inactivity':
      return `Stopping after ${Math.round((config.inactivityMs ?? 0) / 1000)}s inactivity.`;
    case 'interrupted':
      return 'Stopping...';
    case 'capture-tool-missing':
      return 'ffmpeg not found. Install ffmpeg or disable screenshots.';
    case 'feed-closed':
      return `Chat feed closed: ${outcome.error?.message ?? 'unknown reason'}`;
  }
}

function fail(err: unknown): never {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(chalk.red(`Error: ${msg}`) + '\n');
  process.exit(1);
}

export async function runAction(opts: Record<string, unknown>): Promise<void> {
  let config: SessionConfig;
  let sink: SessionLogSink;
  const api = new KickApiClient();
  try {
    const options = parseRunOptions(opts);
    configureLogger({ verbose: options.verbose });
    config = await prepareSession(options, {
      directory: options.proxy ? new KickApiClient({ proxyUrl: options.proxy }) : api,
    });
    sink = SessionLogSink.open(config.logPath);
  } catch (err) {
    fail(err);
  }

  process.stdout.write(`Logging to ${config.logPath}\n`);

  const status = new StatusLine();
  const controller = new SessionController(config, {
    feed: new PusherChatFeed({ chatroomId: config.chatroomId }),
    sink,
    viewerSource: api,
    onTick: (view) => status.draw(view),
  });

  const onSigint = (): void => controller.stop('interrupted');
  process.once('SIGINT', onSigint);
  let outcome: SessionOutcome;
  try {
    outcome = await controller.run();
  } finally {
    process.off('SIGINT', onSigint);
    status.finish();
  }

  const code = exitCodeFor(outcome);
  const message = stopMessage(outcome, config);
  if (code === 0) {
    process.stdout.write(message + '\n');
  } else {
    process.stderr.write(chalk.red(message) + '\n');
  }
  process.exitCode = code;
}
