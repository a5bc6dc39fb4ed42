/**
 * Formatting helpers for the live status line.
 */

import type { ActorCount } from 'livetally-shared';

/** Thousands-separated count, or `n/a` when unknown. */
export function formatCount(n: number | null): string {
  if (n === null) return 'n/a';
  return n.toLocaleString('en-US');
}

/** Pad to exactly `width` characters, cutting longer text. */
export function pad(text: string | number, width: number): string {
  const s = String(text);
  if (s.length >= width) return s.slice(0, width);
  return s.padEnd(width);
}

/** `alice(3), bob(1)`, or `n/a` when nobody has chatted yet. */
export function formatTopActors(actors: readonly ActorCount[]): string {
  if (actors.length === 0) return 'n/a';
  return actors.map((a) => `${a.actorId}(${a.count})`).join(', ');
}
