/**
 * Turns validated run options into an immutable {@link SessionConfig}:
 * resolves the chatroom, derives the log and capture paths and locates
 * ffmpeg. Everything that can fail at startup fails here.
 *
 * @module session/config
 */

import * as fs from 'fs';
import * as path from 'path';
import type { CaptureSettings } from '../capture/CaptureCoordinator';
import { resolveFfmpegPath } from '../capture/ffmpeg';
import type { ChannelDirectory, ChannelInfo } from '../channel/types';
import { systemClock, timestampLabel, type Clock } from '../clock';
import { CaptureToolMissingError, ChannelResolutionError, ConfigError, toError } from '../errors';
import { log } from '../logger';
import { capturesRequested, type RunOptions } from './options';

/** Label used in records when no channel name was given. */
export const MANUAL_CHANNEL_LABEL = 'manual';

export type CaptureConfig =
  | { readonly mode: 'interval'; readonly intervalMs: number; readonly settings: CaptureSettings }
  | { readonly mode: 'on-snapshot'; readonly settings: CaptureSettings };

export type CaptureMode = CaptureConfig['mode'];

export interface SessionConfig {
  /** Lowercased channel name, when one was given. */
  readonly channel: string | null;
  /** Channel value written into log records. */
  readonly label: string;
  readonly chatroomId: number;
  readonly logPath: string;
  readonly durationMs?: number;
  readonly inactivityMs?: number;
  /** Viewer count returned by the channel lookup, if any. */
  readonly initialViewerCount: number | null;
  readonly capture?: CaptureConfig;
}

export interface PrepareSessionDependencies {
  directory: ChannelDirectory;
  clock?: Clock;
  cwd?: string;
  resolveFfmpeg?: (explicitPath?: string) => string | null;
  makeDir?: (dir: string) => void;
}

/** `<channel>` or `chatroom-<id>`; prefixes generated file names. */
export function sessionSlug(channel: string | null, chatroomId: number): string {
  return channel || `chatroom-${chatroomId}`;
}

export function defaultLogFileName(channel: string | null, chatroomId: number, now: number): string {
  return `livetally-session-${sessionSlug(channel, chatroomId)}-${timestampLabel(now)}.jsonl`;
}

/** `<log path without extension>-screenshots`. */
export function defaultCaptureDir(logPath: string): string {
  const parsed = path.parse(logPath);
  return path.join(parsed.dir, `${parsed.name}-screenshots`);
}

async function resolveChatroom(
  options: RunOptions,
  directory: ChannelDirectory,
): Promise<{ chatroomId: number; viewerCount: number | null }> {
  if (options.chatroomId !== undefined) {
    return { chatroomId: options.chatroomId, viewerCount: null };
  }
  const channel = options.channel;
  if (!channel) {
    throw new ConfigError('Provide --channel or --chatroom-id.');
  }

  let info: ChannelInfo;
  try {
    info = await directory.resolveChannel(channel);
  } catch (err) {
    if (err instanceof ChannelResolutionError) throw err;
    throw new ChannelResolutionError(`Failed to resolve channel: ${toError(err).message}`);
  }
  if (info.chatroomId === null) {
    throw new ChannelResolutionError('Chatroom id not found.');
  }
  return { chatroomId: info.chatroomId, viewerCount: info.viewerCount };
}

async function resolveStreamUrl(options: RunOptions, directory: ChannelDirectory): Promise<string | null> {
  if (options.streamUrl) return options.streamUrl;
  if (!options.channel) return null;
  try {
    return await directory.resolveStreamUrl(options.channel);
  } catch (err) {
    log(`Stream URL lookup failed: ${toError(err).message}`);
    return null;
  }
}

export async function prepareSession(
  options: RunOptions,
  deps: PrepareSessionDependencies,
): Promise<SessionConfig> {
  const clock = deps.clock ?? systemClock;
  const cwd = deps.cwd ?? process.cwd();
  const channel = options.channel ?? null;

  const { chatroomId, viewerCount } = await resolveChatroom(options, deps.directory);

  const logPath = options.log
    ? path.resolve(cwd, options.log)
    : path.join(cwd, defaultLogFileName(channel, chatroomId, clock.now()));

  const config: SessionConfig = {
    channel,
    label: channel ?? MANUAL_CHANNEL_LABEL,
    chatroomId,
    logPath,
    durationMs: options.duration !== undefined ? options.duration * 1000 : undefined,
    inactivityMs: options.inactivity !== undefined ? options.inactivity * 1000 : undefined,
    initialViewerCount: viewerCount,
  };

  if (!capturesRequested(options)) return config;

  const streamUrl = await resolveStreamUrl(options, deps.directory);
  if (!streamUrl) {
    throw new ConfigError('Screenshots need a stream URL. Pass --stream-url.');
  }

  const resolveFfmpeg = deps.resolveFfmpeg
    ?? ((explicitPath?: string) => resolveFfmpegPath({ explicitPath }));
  const ffmpegPath = resolveFfmpeg(options.ffmpegPath);
  if (!ffmpegPath) {
    throw new CaptureToolMissingError(
      options.ffmpegPath ?? 'ffmpeg',
      'ffmpeg not found. Install ffmpeg or pass --ffmpeg-path.',
    );
  }

  const outputDir = options.screenshotDir
    ? path.resolve(cwd, options.screenshotDir)
    : defaultCaptureDir(logPath);
  const makeDir = deps.makeDir ?? ((dir: string) => { fs.mkdirSync(dir, { recursive: true }); });
  makeDir(outputDir);

  const settings: CaptureSettings = {
    ffmpegPath,
    streamUrl,
    outputDir,
    filePrefix: sessionSlug(channel, chatroomId),
    format: options.screenshotFormat,
    maxRetained: options.screenshotMax,
    embedThumbnail: options.screenshotEmbed,
    thumbnailWidth: options.screenshotEmbedWidth,
  };

  const capture: CaptureConfig = options.screenshotInterval !== undefined
    ? { mode: 'interval', intervalMs: options.screenshotInterval * 1000, settings }
    : { mode: 'on-snapshot', settings };

  return { ...config, capture };
}
