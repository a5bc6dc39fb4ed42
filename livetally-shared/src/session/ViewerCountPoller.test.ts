import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import type { ViewerCountSource } from '../channel/types';
import { ViewerCountPoller } from './ViewerCountPoller';

describe('ViewerCountPoller', () => {
  let fetchViewerCount: Mock<(name: string) => Promise<number | null>>;
  let source: ViewerCountSource;
  let updates: Array<number | null>;

  beforeEach(() => {
    vi.useFakeTimers();
    fetchViewerCount = vi.fn<(name: string) => Promise<number | null>>();
    source = { fetchViewerCount };
    updates = [];
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('refreshes immediately and then every twenty seconds', async () => {
    fetchViewerCount.mockResolvedValueOnce(100).mockResolvedValueOnce(140);
    const poller = new ViewerCountPoller(source, 'somechannel', (count) => updates.push(count));

    poller.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(fetchViewerCount).toHaveBeenCalledWith('somechannel');
    expect(updates).toEqual([100]);

    await vi.advanceTimersByTimeAsync(19_999);
    expect(fetchViewerCount).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1);
    expect(updates).toEqual([100, 140]);
    poller.stop();
  });

  it('reports unknown when a refresh fails', async () => {
    fetchViewerCount.mockResolvedValueOnce(100).mockRejectedValueOnce(new Error('503'));
    const poller = new ViewerCountPoller(source, 'somechannel', (count) => updates.push(count), 1_000);

    poller.start();
    await vi.advanceTimersByTimeAsync(1_000);

    expect(updates).toEqual([100, null]);
    poller.stop();
  });

  it('ignores a response that arrives after stop', async () => {
    let resolveFetch: (count: number) => void = () => {};
    fetchViewerCount.mockImplementation(() => new Promise((resolve) => { resolveFetch = resolve; }));
    const poller = new ViewerCountPoller(source, 'somechannel', (count) => updates.push(count));

    poller.start();
    poller.stop();
    resolveFetch(500);
    await vi.advanceTimersByTimeAsync(40_000);

    expect(updates).toEqual([]);
    expect(fetchViewerCount).toHaveBeenCalledTimes(1);
    expect(poller.isRunning).toBe(false);
  });
});
