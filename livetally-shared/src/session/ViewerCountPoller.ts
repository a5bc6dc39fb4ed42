import type { ViewerCountSource } from '../channel/types';
import { toError } from '../errors';
import { log } from '../logger';

export const VIEWER_POLL_INTERVAL_MS = 20_000;

/**
 * Refreshes the viewer count immediately and then on a fixed interval.
 * A failed refresh reports null (unknown) rather than keeping the last value.
 */
export class ViewerCountPoller {
  private timer: ReturnType<typeof setInterval> | undefined;
  private running = false;

  constructor(
    private readonly source: ViewerCountSource,
    private readonly channel: string,
    private readonly onUpdate: (count: number | null) => void,
    private readonly intervalMs = VIEWER_POLL_INTERVAL_MS,
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    void this.refresh();
    this.timer = setInterval(() => { void this.refresh(); }, this.intervalMs);
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  /** One refresh. Never rejects. */
  async refresh(): Promise<void> {
    let count: number | null;
    try {
      count = await this.source.fetchViewerCount(this.channel);
    } catch (err) {
      log(`Viewer count refresh failed: ${toError(err).message}`);
      count = null;
    }
    // A response that lands after stop must not touch the session.
    if (this.running) this.onUpdate(count);
  }
}
