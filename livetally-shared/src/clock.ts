/**
 * Time source for the engine. Every ingested event and every tick is
 * stamped through a Clock so windowing can be driven deterministically.
 *
 * @module clock
 */

export interface Clock {
  /** Current time as epoch milliseconds. */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/** Clock that only moves when told to. */
export class ManualClock implements Clock {
  private current: number;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  set(ms: number): void {
    this.current = ms;
  }
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** UTC label used in generated file names, e.g. `20240105-093007`. */
export function timestampLabel(ms: number): string {
  const d = new Date(ms);
  return `${d.getUTCFullYear()}${pad2(d.getUTCMonth() + 1)}${pad2(d.getUTCDate())}`
    + `-${pad2(d.getUTCHours())}${pad2(d.getUTCMinutes())}${pad2(d.getUTCSeconds())}`;
}

/** ISO-8601 UTC timestamp with millisecond resolution. */
export function isoTimestamp(ms: number): string {
  return new Date(ms).toISOString();
}
