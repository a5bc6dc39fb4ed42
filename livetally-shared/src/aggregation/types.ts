/**
 * Aggregation types shared by the window, the scheduler and the CLI.
 *
 * @module aggregation/types
 */

/** One received chat message, reduced to what the window needs. Immutable. */
export interface ChatEvent {
  /** Epoch milliseconds at receipt. */
  readonly occurredAt: number;
  readonly actorId: string;
}

export interface ActorCount {
  actorId: string;
  count: number;
}

/** Point-in-time answer from {@link SlidingWindowAggregator.query}. */
export interface WindowStats {
  /** Events in the last second. */
  perSecond: number;
  /** Events in the last minute. */
  perMinute: number;
  uniquePerSecond: number;
  uniquePerMinute: number;
  /** Lifetime message count. */
  total: number;
  /** Lifetime distinct actors. */
  uniqueTotal: number;
  /** Top actors by lifetime count, ties in first-seen order. */
  topActors: ActorCount[];
}

export const SECOND_MS = 1_000;
export const MINUTE_MS = 60_000;
export const DEFAULT_TOP_ACTORS = 3;
