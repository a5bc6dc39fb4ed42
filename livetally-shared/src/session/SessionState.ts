/**
 * The one piece of state shared between the feed listener, the viewer
 * poller, the capture subsystem and the scheduler.
 *
 * Every method runs to completion synchronously, so each call is its own
 * critical section on the event loop: a snapshot never sees a message
 * counted but its actor not yet tallied, or a capture path without its
 * matching thumbnail reset.
 *
 * @module session/SessionState
 */

import { SlidingWindowAggregator, type SlidingWindowOptions } from '../aggregation/SlidingWindowAggregator';
import type { WindowStats } from '../aggregation/types';
import type { CaptureReference, CaptureTarget } from '../capture/types';

export interface SessionStateOptions {
  startedAt: number;
  initialViewerCount?: number | null;
  window?: SlidingWindowOptions;
}

/** Read-only view of the session at one instant. */
export interface SessionView {
  at: number;
  stats: WindowStats;
  viewerCount: number | null;
  latestCapture: CaptureReference | null;
  thumbnail: string | null;
  /** Time of the last message, or the session start if none arrived. */
  lastActivityAt: number;
}

export class SessionState implements CaptureTarget {
  private readonly window: SlidingWindowAggregator;
  private viewerCount: number | null;
  private latestCapture: CaptureReference | null = null;
  private thumbnail: string | null = null;
  private lastActivityAt: number;

  constructor(options: SessionStateOptions) {
    this.window = new SlidingWindowAggregator(options.window);
    this.viewerCount = options.initialViewerCount ?? null;
    this.lastActivityAt = options.startedAt;
  }

  recordMessage(occurredAt: number, actorId: string): void {
    this.window.record({ occurredAt, actorId });
    this.lastActivityAt = occurredAt;
  }

  /** Null means unknown; a failed refresh must pass null, not keep the old value. */
  setViewerCount(count: number | null): void {
    this.viewerCount = count;
  }

  recordCapture(reference: CaptureReference): void {
    this.latestCapture = reference;
    // A thumbnail belongs to the previous frame until a new one is derived.
    this.thumbnail = null;
  }

  setThumbnail(base64: string | null): void {
    this.thumbnail = base64;
  }

  view(now: number): SessionView {
    return {
      at: now,
      stats: this.window.query(now),
      viewerCount: this.viewerCount,
      latestCapture: this.latestCapture,
      thumbnail: this.thumbnail,
      lastActivityAt: this.lastActivityAt,
    };
  }
}
