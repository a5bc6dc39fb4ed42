/**
 * Error types raised by the engine. Anything that is not one of these is a
 * programming error and propagates as-is.
 */

export class LivetallyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Invalid or contradictory run options. Raised before anything starts. */
export class ConfigError extends LivetallyError {}

/** The channel lookup failed or returned no chatroom. */
export class ChannelResolutionError extends LivetallyError {
  constructor(message: string, readonly status?: number) {
    super(message);
  }
}

/** The capture executable could not be found or launched. */
export class CaptureToolMissingError extends LivetallyError {
  constructor(readonly toolPath: string, message = `Capture tool not found: ${toolPath}`) {
    super(message);
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
