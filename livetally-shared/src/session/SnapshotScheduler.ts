/**
 * Once-a-second tick: query the window, hand the view to the renderer,
 * persist a snapshot record, optionally trigger a capture, then check the
 * stop conditions.
 *
 * Phases run `idle → ticking → stopping`; `stopping` is terminal.
 *
 * @module session/SnapshotScheduler
 */

import { isoTimestamp, type Clock } from '../clock';
import type { SessionLogWriter } from '../log/SessionLogSink';
import type { SnapshotRecord } from '../log/records';
import { log } from '../logger';
import type { SessionState, SessionView } from './SessionState';

export const SNAPSHOT_INTERVAL_MS = 1_000;

export type SchedulerPhase = 'idle' | 'ticking' | 'stopping';
export type ScheduledStop = 'inactivity' | 'duration';

export interface SnapshotSchedulerOptions {
  state: SessionState;
  sink: SessionLogWriter;
  clock: Clock;
  /** Channel label written into each record. */
  channel: string;
  startedAt: number;
  embedThumbnail: boolean;
  inactivityMs?: number;
  durationMs?: number;
  intervalMs?: number;
  onTick?: (view: SessionView) => void;
  /** Called on every tick when captures follow the snapshot cadence. */
  onCaptureDue?: () => void;
  onStop: (reason: ScheduledStop) => void;
}

export function buildSnapshotRecord(view: SessionView, channel: string, embedThumbnail: boolean): SnapshotRecord {
  const { stats } = view;
  return {
    type: 'snapshot',
    ts: isoTimestamp(view.at),
    channel,
    messages_per_minute: stats.perMinute,
    messages_per_second: stats.perSecond,
    unique_per_minute: stats.uniquePerMinute,
    unique_per_second: stats.uniquePerSecond,
    total_messages: stats.total,
    unique_total: stats.uniqueTotal,
    viewer_count: view.viewerCount,
    screenshot_path: view.latestCapture?.path ?? null,
    screenshot_base64: embedThumbnail ? view.thumbnail : null,
  };
}

export class SnapshotScheduler {
  private timer: ReturnType<typeof setInterval> | undefined;
  private currentPhase: SchedulerPhase = 'idle';

  constructor(private readonly options: SnapshotSchedulerOptions) {}

  get phase(): SchedulerPhase {
    return this.currentPhase;
  }

  /** Tick immediately, then every interval. */
  start(): void {
    if (this.currentPhase !== 'idle') return;
    this.currentPhase = 'ticking';
    this.tick();
    if (this.currentPhase !== 'ticking') return;
    this.timer = setInterval(() => this.tick(), this.options.intervalMs ?? SNAPSHOT_INTERVAL_MS);
  }

  stop(): void {
    this.currentPhase = 'stopping';
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  tick(): void {
    if (this.currentPhase !== 'ticking') return;
    const { state, sink, clock, channel, embedThumbnail } = this.options;

    const now = clock.now();
    const view = state.view(now);
    this.options.onTick?.(view);
    sink.write(buildSnapshotRecord(view, channel, embedThumbnail));
    this.options.onCaptureDue?.();

    const reason = this.dueStop(view, now);
    if (reason) {
      log(`Scheduled stop: ${reason}`);
      this.stop();
      this.options.onStop(reason);
    }
  }

  private dueStop(view: SessionView, now: number): ScheduledStop | null {
    const { inactivityMs, durationMs, startedAt } = this.options;
    if (inactivityMs !== undefined && now - view.lastActivityAt >= inactivityMs) {
      return 'inactivity';
    }
    if (durationMs !== undefined && now - startedAt >= durationMs) {
      return 'duration';
    }
    return null;
  }
}
