/**
 * Coordinates single-frame captures of the live stream.
 *
 * - `captureIfIdle()` is the per-tick path: it refuses to start while any
 *   capture is still running, so the tool never runs twice at once.
 * - `captureOnce()` always runs; the fixed-interval loop awaits it before
 *   sleeping, which keeps that path sequential too.
 * - With `maxRetained` set, successful captures go into a FIFO and the
 *   oldest file is deleted once the FIFO overflows. Deletion is best-effort.
 * - A missing tool rejects with {@link CaptureToolMissingError}; timeouts and
 *   non-zero exits resolve as outcomes and the session carries on.
 *
 * @module capture/CaptureCoordinator
 */

import * as fs from 'fs';
import * as path from 'path';
import { systemClock, timestampLabel, type Clock } from '../clock';
import { CaptureToolMissingError, toError } from '../errors';
import { log } from '../logger';
import { buildFrameArgs, buildThumbnailArgs } from './ffmpeg';
import { runProcess, type ProcessResult, type ProcessRunner } from './processRunner';
import type { CaptureFormat, CaptureOutcome, CaptureReference, CaptureTarget } from './types';

export const DEFAULT_CAPTURE_TIMEOUT_MS = 15_000;
export const DEFAULT_THUMBNAIL_TIMEOUT_MS = 10_000;
export const DEFAULT_THUMBNAIL_WIDTH = 160;

export interface CaptureSettings {
  ffmpegPath: string;
  streamUrl: string;
  outputDir: string;
  /** File name prefix, normally the channel name. */
  filePrefix: string;
  format: CaptureFormat;
  /** Keep at most this many files on disk. Unset keeps everything. */
  maxRetained?: number;
  embedThumbnail: boolean;
  thumbnailWidth: number;
  captureTimeoutMs?: number;
  thumbnailTimeoutMs?: number;
}

export interface CaptureDependencies {
  target: CaptureTarget;
  clock?: Clock;
  runner?: ProcessRunner;
  removeFile?: (filePath: string) => Promise<void>;
}

export class CaptureCoordinator {
  private readonly settings: CaptureSettings;
  private readonly target: CaptureTarget;
  private readonly clock: Clock;
  private readonly runner: ProcessRunner;
  private readonly removeFile: (filePath: string) => Promise<void>;
  private readonly active = new Set<Promise<CaptureOutcome>>();
  private readonly retained: string[] = [];

  constructor(settings: CaptureSettings, deps: CaptureDependencies) {
    this.settings = settings;
    this.target = deps.target;
    this.clock = deps.clock ?? systemClock;
    this.runner = deps.runner ?? runProcess;
    this.removeFile = deps.removeFile ?? ((p) => fs.promises.unlink(p));
  }

  /** True while any capture invocation has not completed. */
  get busy(): boolean {
    return this.active.size > 0;
  }

  /** Files currently held by the retention FIFO, oldest first. */
  get retainedPaths(): readonly string[] {
    return this.retained;
  }

  /** Start a capture unless one is already running. */
  captureIfIdle(): Promise<CaptureOutcome> {
    if (this.busy) {
      return Promise.resolve({ status: 'skipped' });
    }
    return this.captureOnce();
  }

  /** Start a capture unconditionally. */
  captureOnce(): Promise<CaptureOutcome> {
    const run = this.runCapture();
    this.active.add(run);
    const release = (): void => { this.active.delete(run); };
    run.then(release, release);
    return run;
  }

  /** Resolves once every running capture has settled, whatever its result. */
  async whenIdle(): Promise<void> {
    while (this.active.size > 0) {
      await Promise.allSettled(Array.from(this.active));
    }
  }

  private outputPathFor(createdAt: number): string {
    const { outputDir, filePrefix, format } = this.settings;
    return path.join(outputDir, `${filePrefix}-${timestampLabel(createdAt)}.${format}`);
  }

  private async runCapture(): Promise<CaptureOutcome> {
    const createdAt = this.clock.now();
    const outputPath = this.outputPathFor(createdAt);
    const timeoutMs = this.settings.captureTimeoutMs ?? DEFAULT_CAPTURE_TIMEOUT_MS;

    let result: ProcessResult;
    try {
      result = await this.runner(
        this.settings.ffmpegPath,
        buildFrameArgs(this.settings.streamUrl, outputPath),
        { timeoutMs },
      );
    } catch (err) {
      if (err instanceof CaptureToolMissingError) throw err;
      const error = toError(err);
      log(`Capture could not start: ${error.message}`);
      return { status: 'failed', exitCode: null, message: error.message };
    }

    if (result.timedOut) {
      log(`Capture timed out after ${timeoutMs}ms and was killed`);
      return { status: 'timeout' };
    }
    if (result.exitCode !== 0) {
      const message = result.stderr.trim().split(/\r?\n/).pop() || `exit code ${result.exitCode}`;
      log(`Capture failed (exit ${result.exitCode}): ${message}`);
      return { status: 'failed', exitCode: result.exitCode, message };
    }

    const reference: CaptureReference = { path: outputPath, createdAt };
    this.target.recordCapture(reference);
    await this.retain(outputPath);

    const thumbnail = this.settings.embedThumbnail
      ? await this.deriveThumbnail(outputPath)
      : false;
    return { status: 'captured', reference, thumbnail };
  }

  private async retain(filePath: string): Promise<void> {
    const max = this.settings.maxRetained;
    if (max === undefined) return;

    // Same-second captures share a name; the file was overwritten, so keep one entry.
    const existing = this.retained.indexOf(filePath);
    if (existing >= 0) this.retained.splice(existing, 1);
    this.retained.push(filePath);

    while (this.retained.length > max) {
      const oldest = this.retained.shift();
      if (oldest === undefined) break;
      try {
        await this.removeFile(oldest);
      } catch (err) {
        log(`Could not delete old capture ${oldest}: ${toError(err).message}`);
      }
    }
  }

  private async deriveThumbnail(framePath: string): Promise<boolean> {
    const timeoutMs = this.settings.thumbnailTimeoutMs ?? DEFAULT_THUMBNAIL_TIMEOUT_MS;
    let result: ProcessResult;
    try {
      result = await this.runner(
        this.settings.ffmpegPath,
        buildThumbnailArgs(framePath, this.settings.thumbnailWidth),
        { timeoutMs },
      );
    } catch (err) {
      if (err instanceof CaptureToolMissingError) throw err;
      log(`Thumbnail could not start: ${toError(err).message}`);
      return false;
    }

    if (result.timedOut) {
      log(`Thumbnail timed out after ${timeoutMs}ms and was killed`);
      return false;
    }
    if (result.exitCode !== 0 || result.stdout.length === 0) {
      log(`Thumbnail failed (exit ${result.exitCode})`);
      return false;
    }

    this.target.setThumbnail(result.stdout.toString('base64'));
    return true;
  }
}
