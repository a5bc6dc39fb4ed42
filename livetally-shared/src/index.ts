/**
 * Public API for livetally-shared.
 */

// Time
export { systemClock, ManualClock, timestampLabel, isoTimestamp } from './clock';
export type { Clock } from './clock';

// Logging & errors
export { configureLogger, log, logError } from './logger';
export type { LoggerOptions } from './logger';
export {
  LivetallyError,
  ConfigError,
  ChannelResolutionError,
  CaptureToolMissingError,
  toError,
} from './errors';

// Aggregation
export { SlidingWindowAggregator } from './aggregation/SlidingWindowAggregator';
export type { SlidingWindowOptions } from './aggregation/SlidingWindowAggregator';
export { ActorTally } from './aggregation/ActorTally';
export { SECOND_MS, MINUTE_MS, DEFAULT_TOP_ACTORS } from './aggregation/types';
export type { ChatEvent, ActorCount, WindowStats } from './aggregation/types';

// Session log
export { SessionLogSink, MemoryLogWriter } from './log/SessionLogSink';
export type { SessionLogWriter } from './log/SessionLogSink';
export { readSessionLog } from './log/readSessionLog';
export type { SessionLogContents } from './log/readSessionLog';
export {
  sessionLogRecordSchema,
  sessionStartRecordSchema,
  messageRecordSchema,
  snapshotRecordSchema,
} from './log/records';
export type {
  SessionLogRecord,
  SessionLogRecordType,
  SessionStartRecord,
  MessageRecord,
  SnapshotRecord,
} from './log/records';
export { JsonlParser } from './parsers/jsonl';
export type { JsonlParserCallbacks } from './parsers/jsonl';

// Capture
export {
  CaptureCoordinator,
  DEFAULT_CAPTURE_TIMEOUT_MS,
  DEFAULT_THUMBNAIL_TIMEOUT_MS,
  DEFAULT_THUMBNAIL_WIDTH,
} from './capture/CaptureCoordinator';
export type { CaptureSettings, CaptureDependencies } from './capture/CaptureCoordinator';
export { runProcess } from './capture/processRunner';
export type { ProcessResult, ProcessRunner, RunProcessOptions } from './capture/processRunner';
export { resolveFfmpegPath, buildFrameArgs, buildThumbnailArgs } from './capture/ffmpeg';
export { CAPTURE_FORMATS } from './capture/types';
export type { CaptureFormat, CaptureReference, CaptureTarget, CaptureOutcome } from './capture/types';

// Channel & feed
export { KickApiClient, KICK_API_BASE } from './channel/KickApiClient';
export type { KickApiClientOptions } from './channel/KickApiClient';
export type { ChannelInfo, ChannelDirectory, ViewerCountSource } from './channel/types';
export { PusherChatFeed, parseFeedFrame, connectWebSocket, PUSHER_URL } from './feed/PusherChatFeed';
export type { FeedFrame, FeedSocket, FeedSocketFactory, PusherChatFeedOptions } from './feed/PusherChatFeed';
export type { ChatFeed, ChatFeedHandlers, ChatMessage } from './feed/types';

// Session
export { parseRunOptions, runOptionsSchema, capturesRequested } from './session/options';
export type { RunOptions, RunOptionsInput } from './session/options';
export {
  prepareSession,
  defaultLogFileName,
  defaultCaptureDir,
  sessionSlug,
  MANUAL_CHANNEL_LABEL,
} from './session/config';
export type { SessionConfig, CaptureConfig, CaptureMode, PrepareSessionDependencies } from './session/config';
export { SessionState } from './session/SessionState';
export type { SessionView } from './session/SessionState';
export { SnapshotScheduler, buildSnapshotRecord, SNAPSHOT_INTERVAL_MS } from './session/SnapshotScheduler';
export type { SchedulerPhase, ScheduledStop } from './session/SnapshotScheduler';
export { ViewerCountPoller, VIEWER_POLL_INTERVAL_MS } from './session/ViewerCountPoller';
export { SessionController, exitCodeFor } from './session/SessionController';
export type { SessionOutcome, StopReason, SessionDependencies } from './session/SessionController';

// Export
export {
  exportSnapshotsCsv,
  exportMessagesCsv,
  defaultSnapshotCsvPath,
  defaultMessagesCsvPath,
  csvField,
  toCsv,
  SNAPSHOT_CSV_HEADER,
  MESSAGE_CSV_HEADER,
} from './export/csv';
export type { ExportResult } from './export/csv';
