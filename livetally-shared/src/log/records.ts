/**
 * Session log record shapes. One JSON object per line; `type` discriminates.
 * These field names are what the CSV exports and any downstream tooling read.
 *
 * @module log/records
 */

import { z } from 'zod';

export const sessionStartRecordSchema = z.object({
  type: z.literal('session_start'),
  ts: z.string(),
  channel: z.string(),
  chatroom_id: z.number(),
});

export const messageRecordSchema = z.object({
  type: z.literal('message'),
  ts: z.string(),
  channel: z.string(),
  username: z.string(),
  message: z.string(),
});

export const snapshotRecordSchema = z.object({
  type: z.literal('snapshot'),
  ts: z.string(),
  channel: z.string(),
  messages_per_minute: z.number(),
  messages_per_second: z.number(),
  unique_per_minute: z.number(),
  unique_per_second: z.number(),
  total_messages: z.number(),
  unique_total: z.number(),
  viewer_count: z.number().nullable(),
  screenshot_path: z.string().nullable(),
  screenshot_base64: z.string().nullable(),
});

export const sessionLogRecordSchema = z.discriminatedUnion('type', [
  sessionStartRecordSchema,
  messageRecordSchema,
  snapshotRecordSchema,
]);

export type SessionStartRecord = z.infer<typeof sessionStartRecordSchema>;
export type MessageRecord = z.infer<typeof messageRecordSchema>;
export type SnapshotRecord = z.infer<typeof snapshotRecordSchema>;
export type SessionLogRecord = z.infer<typeof sessionLogRecordSchema>;
export type SessionLogRecordType = SessionLogRecord['type'];
