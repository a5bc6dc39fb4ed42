import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as path from 'path';
import type { CaptureSettings } from '../capture/CaptureCoordinator';
import type { ProcessResult, ProcessRunner } from '../capture/processRunner';
import { CaptureToolMissingError } from '../errors';
import type { ChatFeed, ChatFeedHandlers } from '../feed/types';
import { MemoryLogWriter } from '../log/SessionLogSink';
import type { MessageRecord, SnapshotRecord } from '../log/records';
import { configureLogger } from '../logger';
import type { SessionConfig } from './config';
import { exitCodeFor, SessionController } from './SessionController';

const START = Date.UTC(2024, 2, 1, 12, 0, 0);

class FakeFeed implements ChatFeed {
  private handlers: ChatFeedHandlers | null = null;
  stopped = false;

  start(handlers: ChatFeedHandlers): void {
    this.handlers = handlers;
  }

  stop(): void {
    this.stopped = true;
  }

  emit(username: string, content = 'hello'): void {
    this.handlers?.onMessage({ username, content });
  }

  fail(error: Error): void {
    this.handlers?.onClose(error);
  }
}

const baseConfig: SessionConfig = {
  channel: 'somechannel',
  label: 'somechannel',
  chatroomId: 42,
  logPath: '/logs/session.jsonl',
  initialViewerCount: null,
};

const captureSettings: CaptureSettings = {
  ffmpegPath: '/usr/bin/ffmpeg',
  streamUrl: 'https://stream.example/live.m3u8',
  outputDir: '/captures',
  filePrefix: 'somechannel',
  format: 'jpg',
  embedThumbnail: false,
  thumbnailWidth: 160,
};

const okResult: ProcessResult = { exitCode: 0, stdout: Buffer.alloc(0), stderr: '', timedOut: false };

function snapshots(sink: MemoryLogWriter): SnapshotRecord[] {
  return sink.records.flatMap((record) => (record.type === 'snapshot' ? [record] : []));
}

function messages(sink: MemoryLogWriter): MessageRecord[] {
  return sink.records.flatMap((record) => (record.type === 'message' ? [record] : []));
}

describe('SessionController', () => {
  let feed: FakeFeed;
  let sink: MemoryLogWriter;
  let logLines: string[];

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(START);
    feed = new FakeFeed();
    sink = new MemoryLogWriter();
    logLines = [];
    configureLogger({ verbose: false, write: (line) => { logLines.push(line); } });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('writes the start record first', async () => {
    const controller = new SessionController(baseConfig, { feed, sink });
    const pending = controller.run();

    expect(sink.records[0]).toEqual({
      type: 'session_start',
      ts: '2024-03-01T12:00:00.000Z',
      channel: 'somechannel',
      chatroom_id: 42,
    });

    controller.stop('interrupted');
    await pending;
  });

  it('counts messages and logs each one', async () => {
    const controller = new SessionController(baseConfig, { feed, sink });
    const pending = controller.run();

    feed.emit('alice', 'hi');
    feed.emit('alice', 'again');
    feed.emit('bob');
    feed.emit('carol');

    const stats = controller.view()?.stats;
    expect(stats?.total).toBe(4);
    expect(stats?.uniquePerSecond).toBe(3);
    expect(stats?.uniquePerMinute).toBe(3);
    expect(stats?.topActors).toEqual([
      { actorId: 'alice', count: 2 },
      { actorId: 'bob', count: 1 },
      { actorId: 'carol', count: 1 },
    ]);
    expect(messages(sink)[0]).toEqual({
      type: 'message',
      ts: '2024-03-01T12:00:00.000Z',
      channel: 'somechannel',
      username: 'alice',
      message: 'hi',
    });

    controller.stop('interrupted');
    await expect(pending).resolves.toEqual({ reason: 'interrupted' });
  });

  it('stops after the configured duration and closes the log', async () => {
    const controller = new SessionController({ ...baseConfig, durationMs: 5_000 }, { feed, sink });
    const pending = controller.run();

    feed.emit('alice');
    await vi.advanceTimersByTimeAsync(5_000);
    const outcome = await pending;

    expect(outcome).toEqual({ reason: 'duration' });
    expect(exitCodeFor(outcome)).toBe(0);
    expect(sink.isOpen).toBe(false);
    expect(feed.stopped).toBe(true);
  });

  it('stops after the inactivity threshold', async () => {
    const controller = new SessionController({ ...baseConfig, inactivityMs: 10_000 }, { feed, sink });
    const pending = controller.run();

    await vi.advanceTimersByTimeAsync(9_000);
    expect(controller.isStopped).toBe(false);

    await vi.advanceTimersByTimeAsync(1_000);
    await expect(pending).resolves.toEqual({ reason: 'inactivity' });
  });

  it('stops when the feed closes', async () => {
    const controller = new SessionController(baseConfig, { feed, sink });
    const pending = controller.run();
    const error = new Error('socket hang up');

    feed.fail(error);
    const outcome = await pending;

    expect(outcome).toEqual({ reason: 'feed-closed', error });
    expect(exitCodeFor(outcome)).toBe(1);
  });

  it('keeps the first stop reason', async () => {
    const controller = new SessionController(baseConfig, { feed, sink });
    const pending = controller.run();

    controller.stop('interrupted');
    controller.stop('duration');

    await expect(pending).resolves.toEqual({ reason: 'interrupted' });
  });

  it('ignores messages after stop', async () => {
    const controller = new SessionController(baseConfig, { feed, sink });
    const pending = controller.run();

    controller.stop('interrupted');
    feed.emit('late');
    await pending;

    expect(messages(sink)).toEqual([]);
  });

  it('refuses to run twice', async () => {
    const controller = new SessionController(baseConfig, { feed, sink });
    const pending = controller.run();

    await expect(controller.run()).rejects.toThrow('Session already started');
    controller.stop('interrupted');
    await pending;
  });

  it('publishes polled viewer counts in later snapshots', async () => {
    const viewerSource = { fetchViewerCount: vi.fn(async (_name: string) => 321) };
    const controller = new SessionController(
      { ...baseConfig, initialViewerCount: 300 },
      { feed, sink, viewerSource },
    );
    const pending = controller.run();

    await vi.advanceTimersByTimeAsync(1_000);
    controller.stop('interrupted');
    await pending;

    expect(viewerSource.fetchViewerCount).toHaveBeenCalledWith('somechannel');
    expect(snapshots(sink).map((s) => s.viewer_count)).toEqual([300, 321]);
  });

  it('captures on the snapshot cadence and reports the latest frame', async () => {
    const runner = vi.fn<ProcessRunner>(async () => okResult);
    const controller = new SessionController(
      { ...baseConfig, capture: { mode: 'on-snapshot', settings: captureSettings } },
      { feed, sink, processRunner: runner },
    );
    const pending = controller.run();

    await vi.advanceTimersByTimeAsync(1_000);
    controller.stop('interrupted');
    await pending;

    expect(runner).toHaveBeenCalledTimes(2);
    const snaps = snapshots(sink);
    expect(snaps[0].screenshot_path).toBeNull();
    expect(snaps[1].screenshot_path).toBe(path.join('/captures', 'somechannel-20240301-120000.jpg'));
  });

  it('captures on a fixed interval', async () => {
    const runner = vi.fn<ProcessRunner>(async () => okResult);
    const controller = new SessionController(
      { ...baseConfig, capture: { mode: 'interval', intervalMs: 10_000, settings: captureSettings } },
      { feed, sink, processRunner: runner },
    );
    const pending = controller.run();

    await vi.advanceTimersByTimeAsync(25_000);
    controller.stop('interrupted');
    await pending;

    expect(runner).toHaveBeenCalledTimes(3);
  });

  it('stops the session when the capture tool disappears', async () => {
    const missing = new CaptureToolMissingError('/usr/bin/ffmpeg');
    const runner = vi.fn<ProcessRunner>(async () => { throw missing; });
    const controller = new SessionController(
      { ...baseConfig, capture: { mode: 'on-snapshot', settings: captureSettings } },
      { feed, sink, processRunner: runner },
    );
    const pending = controller.run();

    await vi.advanceTimersByTimeAsync(0);
    const outcome = await pending;

    expect(outcome).toEqual({ reason: 'capture-tool-missing', error: missing });
    expect(exitCodeFor(outcome)).toBe(1);
    expect(logLines).toEqual([
      '[2024-03-01T12:00:00.000Z] ERROR Capture tool disappeared: Capture tool not found: /usr/bin/ffmpeg',
    ]);
    expect(sink.isOpen).toBe(false);
  });

  it('ends the interval capture loop when the capture tool disappears', async () => {
    const missing = new CaptureToolMissingError('/usr/bin/ffmpeg');
    const runner = vi.fn<ProcessRunner>(async () => { throw missing; });
    const controller = new SessionController(
      { ...baseConfig, capture: { mode: 'interval', intervalMs: 10_000, settings: captureSettings } },
      { feed, sink, processRunner: runner },
    );
    const pending = controller.run();

    await vi.advanceTimersByTimeAsync(0);
    const outcome = await pending;

    expect(outcome).toEqual({ reason: 'capture-tool-missing', error: missing });
    expect(exitCodeFor(outcome)).toBe(1);
    expect(runner).toHaveBeenCalledTimes(1);
    expect(logLines).toEqual([
      '[2024-03-01T12:00:00.000Z] ERROR Capture tool disappeared: Capture tool not found: /usr/bin/ffmpeg',
    ]);
    expect(sink.isOpen).toBe(false);
  });
});
