/**
 * Run options: parsed and validated once, before anything starts.
 *
 * Raw values arrive as strings from the command line; the schema coerces
 * numbers, normalizes case and rejects contradictory combinations, so no
 * later code needs to re-check them.
 *
 * @module session/options
 */

import { z } from 'zod';
import { DEFAULT_THUMBNAIL_WIDTH } from '../capture/CaptureCoordinator';
import { CAPTURE_FORMATS } from '../capture/types';
import { ConfigError } from '../errors';

function positiveInt(label: string) {
  return z.coerce
    .number({ invalid_type_error: `${label} must be a number.` })
    .int(`${label} must be a whole number.`)
    .positive(`${label} must be a positive number.`);
}

/** Longest delay a Node timer accepts, in whole seconds. */
export const MAX_TIMER_SECONDS = 2_147_483;

function timerSeconds(label: string) {
  return positiveInt(label).max(MAX_TIMER_SECONDS, `${label} is too large (max ${MAX_TIMER_SECONDS} seconds).`);
}

const captureFormatSchema = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(['jpg', 'png'], {
    errorMap: () => ({ message: `Screenshot format must be ${CAPTURE_FORMATS.join(' or ')}.` }),
  }));

export const runOptionsSchema = z
  .object({
    channel: z.string().trim().min(1, 'Channel must not be empty.').transform((value) => value.toLowerCase()).optional(),
    chatroomId: positiveInt('Chatroom id').optional(),
    proxy: z.string().url('Proxy must be a URL, e.g. http://localhost:3456.').optional(),
    log: z.string().min(1).optional(),
    duration: timerSeconds('Duration').optional(),
    inactivity: timerSeconds('Inactivity').optional(),
    screenshotInterval: timerSeconds('Screenshot interval').optional(),
    screenshotOnSnapshot: z.boolean().default(false),
    screenshotDir: z.string().min(1).optional(),
    screenshotMax: positiveInt('Screenshot max').optional(),
    screenshotFormat: captureFormatSchema.default('jpg'),
    screenshotEmbed: z.boolean().default(false),
    screenshotEmbedWidth: positiveInt('Screenshot embed width').default(DEFAULT_THUMBNAIL_WIDTH),
    streamUrl: z.string().min(1).optional(),
    ffmpegPath: z.string().min(1).optional(),
    verbose: z.boolean().default(false),
  })
  .superRefine((options, ctx) => {
    if (!options.channel && options.chatroomId === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Provide --channel or --chatroom-id.' });
    }
    if (options.screenshotInterval !== undefined && options.screenshotOnSnapshot) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Use either --screenshot-interval or --screenshot-on-snapshot, not both.',
      });
    }
  });

export type RunOptionsInput = z.input<typeof runOptionsSchema>;
export type RunOptions = z.output<typeof runOptionsSchema>;

/** Validate raw options, throwing a ConfigError with the first problem found. */
export function parseRunOptions(raw: unknown): RunOptions {
  const result = runOptionsSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(result.error.issues[0]?.message ?? 'Invalid options.');
  }
  return result.data;
}

/** True when the options ask for any kind of capture. */
export function capturesRequested(options: RunOptions): boolean {
  return options.screenshotInterval !== undefined || options.screenshotOnSnapshot;
}
