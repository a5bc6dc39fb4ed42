/**
 * ffmpeg command lines and executable discovery.
 *
 * @module capture/ffmpeg
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { execSync } from 'child_process';
import { log } from '../logger';

/** Height of the primary capture; width follows the stream's aspect ratio. */
export const CAPTURE_HEIGHT = 480;

/** Grab a single frame from the stream into `outputPath`. */
export function buildFrameArgs(streamUrl: string, outputPath: string): string[] {
  return [
    '-y',
    '-loglevel', 'error',
    '-i', streamUrl,
    '-frames:v', '1',
    '-vf', `scale=-2:${CAPTURE_HEIGHT}`,
    outputPath,
  ];
}

/** Re-encode a captured frame to a small JPEG on stdout. */
export function buildThumbnailArgs(inputPath: string, width: number): string[] {
  return [
    '-loglevel', 'error',
    '-i', inputPath,
    '-frames:v', '1',
    '-vf', `scale=${width}:-2`,
    '-f', 'image2pipe',
    '-vcodec', 'mjpeg',
    '-',
  ];
}

export interface ResolveFfmpegOptions {
  /** Path given on the command line. Must exist when set. */
  explicitPath?: string;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
}

/**
 * Common installation locations, most specific first.
 */
export function getCommonFfmpegPaths(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): string[] {
  if (platform === 'win32') {
    return [
      path.join(env.LOCALAPPDATA || os.homedir(), 'Chocolatey', 'bin', 'ffmpeg.exe'),
      'C:/ProgramData/chocolatey/bin/ffmpeg.exe',
      path.join(os.homedir(), 'scoop', 'shims', 'ffmpeg.exe'),
    ];
  }
  return [
    '/opt/homebrew/bin/ffmpeg',
    '/usr/local/bin/ffmpeg',
    '/usr/bin/ffmpeg',
    '/snap/bin/ffmpeg',
  ];
}

function resolveFromPath(platform: NodeJS.Platform): string | null {
  try {
    const cmd = platform === 'win32' ? 'where ffmpeg' : 'which ffmpeg';
    const result = execSync(cmd, {
      encoding: 'utf8',
      stdio: ['pipe', 'pipe', 'ignore'],
      timeout: 5000,
    });
    const resolved = result.trim().split(/\r?\n/)[0];
    if (resolved && fs.existsSync(resolved)) {
      log(`Resolved ffmpeg from PATH: ${resolved}`);
      return resolved;
    }
  } catch {
    // `which` exits non-zero when there is no match
  }
  return null;
}

/**
 * Finds the ffmpeg executable.
 *
 * Checks in order:
 * 1. The explicit path (no fallback when it is set but missing)
 * 2. `LIVETALLY_FFMPEG_PATH`
 * 3. `which`/`where` on the system PATH
 * 4. Common installation paths
 *
 * @returns Absolute path to ffmpeg, or null if not found
 */
export function resolveFfmpegPath(options: ResolveFfmpegOptions = {}): string | null {
  const env = options.env ?? process.env;
  const platform = options.platform ?? process.platform;

  if (options.explicitPath) {
    const expanded = options.explicitPath.replace(/^~(?=$|[\\/])/, os.homedir());
    if (fs.existsSync(expanded)) return expanded;
    log(`Configured ffmpeg path not found: ${expanded}`);
    return null;
  }

  const fromEnv = env.LIVETALLY_FFMPEG_PATH;
  if (fromEnv && fs.existsSync(fromEnv)) {
    log(`Using ffmpeg from LIVETALLY_FFMPEG_PATH: ${fromEnv}`);
    return fromEnv;
  }

  const fromPath = resolveFromPath(platform);
  if (fromPath) return fromPath;

  for (const candidate of getCommonFfmpegPaths(env, platform)) {
    if (fs.existsSync(candidate)) {
      log(`Found ffmpeg at: ${candidate}`);
      return candidate;
    }
  }

  return null;
}
