/**
 * Sliding-window message statistics.
 *
 * Holds the events of the last minute in arrival order plus lifetime
 * totals. Eviction only ever pops from the front, and only events older
 * than the horizon. The one-second figures are recomputed by scanning the
 * retained minute on each query rather than kept incrementally; that scan
 * is bounded by one minute of traffic and becomes the cost to watch if the
 * feed rate grows by orders of magnitude.
 *
 * @module aggregation/SlidingWindowAggregator
 */

import { ActorTally } from './ActorTally';
import {
  DEFAULT_TOP_ACTORS,
  MINUTE_MS,
  SECOND_MS,
  type ChatEvent,
  type WindowStats,
} from './types';

export interface SlidingWindowOptions {
  /** Horizon of the long window in ms (default one minute). */
  horizonMs?: number;
  /** Length of the short window in ms (default one second). */
  shortWindowMs?: number;
  /** How many top actors to report (default 3). */
  topN?: number;
}

/** Age of an event at `now`, clamped so clock skew never yields a negative age. */
function ageOf(event: ChatEvent, now: number): number {
  return Math.max(0, now - event.occurredAt);
}

export class SlidingWindowAggregator {
  private events: ChatEvent[] = [];
  /** Index of the oldest retained event in `events`. */
  private head = 0;
  private readonly tally = new ActorTally();
  private readonly horizonMs: number;
  private readonly shortWindowMs: number;
  private readonly topN: number;

  constructor(options: SlidingWindowOptions = {}) {
    this.horizonMs = options.horizonMs ?? MINUTE_MS;
    this.shortWindowMs = options.shortWindowMs ?? SECOND_MS;
    this.topN = options.topN ?? DEFAULT_TOP_ACTORS;
  }

  /** Append an event. Events arrive in time order, so this is a push. */
  record(event: ChatEvent): void {
    this.events.push(event);
    this.tally.increment(event.actorId);
  }

  /** Drop events older than the horizon from the front of the window. */
  evict(now: number): void {
    while (this.head < this.events.length && ageOf(this.events[this.head], now) > this.horizonMs) {
      this.head++;
    }
    // Compact once the dead prefix dominates, keeping eviction O(1) amortized.
    if (this.head > 0 && this.head * 2 >= this.events.length) {
      this.events = this.events.slice(this.head);
      this.head = 0;
    }
  }

  /** Evict, then answer every window question at `now`. */
  query(now: number): WindowStats {
    this.evict(now);

    const minuteActors = new Set<string>();
    const secondActors = new Set<string>();
    let perSecond = 0;
    for (let i = this.head; i < this.events.length; i++) {
      const event = this.events[i];
      minuteActors.add(event.actorId);
      if (ageOf(event, now) <= this.shortWindowMs) {
        perSecond++;
        secondActors.add(event.actorId);
      }
    }

    return {
      perSecond,
      perMinute: this.events.length - this.head,
      uniquePerSecond: secondActors.size,
      uniquePerMinute: minuteActors.size,
      total: this.tally.total,
      uniqueTotal: this.tally.size,
      topActors: this.tally.getTopN(this.topN),
    };
  }

  /** Events currently retained (before any eviction at a later `now`). */
  get retained(): number {
    return this.events.length - this.head;
  }
}
