/**
 * Lifetime per-actor message counter.
 *
 * Keeps one entry per actor for the whole session. Map insertion order is
 * first-seen order, and entries are never moved, so a stable sort on count
 * breaks ties by who spoke first.
 *
 * @module aggregation/ActorTally
 */

import type { ActorCount } from './types';

export class ActorTally {
  private counts = new Map<string, number>();
  private totalCount = 0;

  /** Count one message for an actor. */
  increment(actorId: string): void {
    this.counts.set(actorId, (this.counts.get(actorId) ?? 0) + 1);
    this.totalCount++;
  }

  /** Top N actors by count; equal counts keep first-seen order. */
  getTopN(n: number): ActorCount[] {
    if (n <= 0) return [];
    return Array.from(this.counts, ([actorId, count]) => ({ actorId, count }))
      .sort((a, b) => b.count - a.count)
      .slice(0, n);
  }

  getCount(actorId: string): number {
    return this.counts.get(actorId) ?? 0;
  }

  /** Distinct actors ever seen. */
  get size(): number {
    return this.counts.size;
  }

  /** Messages ever counted. */
  get total(): number {
    return this.totalCount;
  }
}
