/**
 * Runs one live session from first frame to closed log.
 *
 * `run()` writes the start record, starts the feed, the viewer poller, the
 * snapshot scheduler and (when configured) the interval capture loop and
 * the duration timer, then waits for the first stop. Stopping is terminal:
 * later stop requests are ignored and the first reason is the outcome.
 * Shutdown waits for any in-flight capture to settle before closing the
 * log, so no record is written to a closed file.
 *
 * @module session/SessionController
 */

import { CaptureCoordinator } from '../capture/CaptureCoordinator';
import type { ProcessRunner } from '../capture/processRunner';
import type { CaptureOutcome } from '../capture/types';
import type { ViewerCountSource } from '../channel/types';
import { isoTimestamp, systemClock, type Clock } from '../clock';
import { CaptureToolMissingError, toError } from '../errors';
import type { ChatFeed, ChatMessage } from '../feed/types';
import type { SessionLogWriter } from '../log/SessionLogSink';
import { log, logError } from '../logger';
import { delay } from '../utils/delay';
import type { SessionConfig } from './config';
import { SessionState, type SessionView } from './SessionState';
import { SnapshotScheduler } from './SnapshotScheduler';
import { ViewerCountPoller } from './ViewerCountPoller';

export type StopReason = 'duration' | 'inactivity' | 'interrupted' | 'capture-tool-missing' | 'feed-closed';

export interface SessionOutcome {
  reason: StopReason;
  error?: Error;
}

/** Process exit code for an outcome. */
export function exitCodeFor(outcome: SessionOutcome): number {
  switch (outcome.reason) {
    case 'duration':
    case 'inactivity':
    case 'interrupted':
      return 0;
    default:
      return 1;
  }
}

export interface SessionDependencies {
  feed: ChatFeed;
  sink: SessionLogWriter;
  /** Omit to leave the viewer count at its startup value. */
  viewerSource?: ViewerCountSource;
  clock?: Clock;
  processRunner?: ProcessRunner;
  removeFile?: (filePath: string) => Promise<void>;
  onTick?: (view: SessionView) => void;
}

export class SessionController {
  private readonly clock: Clock;
  private readonly abort = new AbortController();
  private readonly cleanups: Array<() => void> = [];
  private outcome: SessionOutcome | null = null;
  private started = false;
  private state: SessionState | null = null;
  private resolveStopped: (outcome: SessionOutcome) => void = () => {};
  private readonly stopped: Promise<SessionOutcome>;

  constructor(
    private readonly config: SessionConfig,
    private readonly deps: SessionDependencies,
  ) {
    this.clock = deps.clock ?? systemClock;
    this.stopped = new Promise((resolve) => { this.resolveStopped = resolve; });
  }

  get isStopped(): boolean {
    return this.outcome !== null;
  }

  /** Current view, or null before `run()`. */
  view(): SessionView | null {
    return this.state?.view(this.clock.now()) ?? null;
  }

  async run(): Promise<SessionOutcome> {
    if (this.started) throw new Error('Session already started');
    this.started = true;

    const { config, deps } = this;
    const startedAt = this.clock.now();
    const state = new SessionState({ startedAt, initialViewerCount: config.initialViewerCount });
    this.state = state;

    deps.sink.write({
      type: 'session_start',
      ts: isoTimestamp(startedAt),
      channel: config.label,
      chatroom_id: config.chatroomId,
    });
    log(`Session started for ${config.label} (chatroom ${config.chatroomId})`);

    const capture = config.capture
      ? new CaptureCoordinator(config.capture.settings, {
        target: state,
        clock: this.clock,
        runner: deps.processRunner,
        removeFile: deps.removeFile,
      })
      : null;

    deps.feed.start({
      onMessage: (message) => this.handleMessage(state, message),
      onClose: (error) => this.stop('feed-closed', error),
    });
    this.onStop(() => deps.feed.stop());

    if (deps.viewerSource && config.channel) {
      const poller = new ViewerCountPoller(deps.viewerSource, config.channel, (count) => state.setViewerCount(count));
      poller.start();
      this.onStop(() => poller.stop());
    }

    if (config.durationMs !== undefined) {
      const timer = setTimeout(() => this.stop('duration'), config.durationMs);
      this.onStop(() => clearTimeout(timer));
    }

    let captureLoop: Promise<void> = Promise.resolve();
    if (capture && config.capture?.mode === 'interval') {
      captureLoop = this.runCaptureLoop(capture, config.capture.intervalMs);
    }

    const scheduler = new SnapshotScheduler({
      state,
      sink: deps.sink,
      clock: this.clock,
      channel: config.label,
      startedAt,
      embedThumbnail: config.capture?.settings.embedThumbnail ?? false,
      inactivityMs: config.inactivityMs,
      durationMs: config.durationMs,
      onTick: deps.onTick,
      onCaptureDue: capture && config.capture?.mode === 'on-snapshot'
        ? () => this.watchCapture(capture.captureIfIdle())
        : undefined,
      onStop: (reason) => this.stop(reason),
    });
    if (!this.isStopped) scheduler.start();
    this.onStop(() => scheduler.stop());

    const outcome = await this.stopped;
    await captureLoop;
    if (capture) await capture.whenIdle();
    deps.sink.close();
    log(`Session stopped: ${outcome.reason}`);
    return outcome;
  }

  /** Request a stop. The first call decides the outcome; later calls are ignored. */
  stop(reason: StopReason, error?: Error): void {
    if (this.outcome) return;
    this.outcome = error ? { reason, error } : { reason };
    this.abort.abort();
    for (const cleanup of this.cleanups) cleanup();
    this.cleanups.length = 0;
    this.resolveStopped(this.outcome);
  }

  /** Run `cleanup` on stop, or now if the session has already stopped. */
  private onStop(cleanup: () => void): void {
    if (this.outcome) {
      cleanup();
      return;
    }
    this.cleanups.push(cleanup);
  }

  private handleMessage(state: SessionState, message: ChatMessage): void {
    if (this.isStopped) return;
    const now = this.clock.now();
    state.recordMessage(now, message.username);
    this.deps.sink.write({
      type: 'message',
      ts: isoTimestamp(now),
      channel: this.config.label,
      username: message.username,
      message: message.content,
    });
  }

  private async runCaptureLoop(capture: CaptureCoordinator, intervalMs: number): Promise<void> {
    const { signal } = this.abort;
    while (!signal.aborted) {
      try {
        await capture.captureOnce();
      } catch (err) {
        this.handleCaptureError(err);
        if (err instanceof CaptureToolMissingError) return;
      }
      await delay(intervalMs, signal);
    }
  }

  private watchCapture(pending: Promise<CaptureOutcome>): void {
    void pending.catch((err: unknown) => this.handleCaptureError(err));
  }

  private handleCaptureError(err: unknown): void {
    if (err instanceof CaptureToolMissingError) {
      logError('Capture tool disappeared', err);
      this.stop('capture-tool-missing', err);
      return;
    }
    log(`Capture error: ${toError(err).message}`);
  }
}
