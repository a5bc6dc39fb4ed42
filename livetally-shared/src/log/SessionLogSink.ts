/**
 * Append-only JSONL writer for a session.
 *
 * Each record is written with a single synchronous write on an open file
 * descriptor, so it reaches the OS before `write` returns. Records land in
 * the order their callers wrote them; readers must order by `ts`.
 *
 * @module log/SessionLogSink
 */

import * as fs from 'fs';
import * as path from 'path';
import type { SessionLogRecord } from './records';

/** What the session needs from a log. Lets tests capture records in memory. */
export interface SessionLogWriter {
  write(record: SessionLogRecord): void;
  close(): void;
  readonly isOpen: boolean;
}

export class SessionLogSink implements SessionLogWriter {
  private fd: number | null;
  private written = 0;

  private constructor(readonly filePath: string, fd: number) {
    this.fd = fd;
  }

  /** Create (or truncate) the log file, creating its directory if needed. */
  static open(filePath: string): SessionLogSink {
    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    return new SessionLogSink(filePath, fs.openSync(filePath, 'w'));
  }

  get isOpen(): boolean {
    return this.fd !== null;
  }

  /** Records written so far. */
  get count(): number {
    return this.written;
  }

  write(record: SessionLogRecord): void {
    if (this.fd === null) {
      throw new Error(`Session log ${this.filePath} is closed`);
    }
    fs.writeSync(this.fd, JSON.stringify(record) + '\n');
    this.written++;
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    fs.closeSync(fd);
  }
}

/** In-memory writer used by tests and dry runs. */
export class MemoryLogWriter implements SessionLogWriter {
  readonly records: SessionLogRecord[] = [];
  private open = true;

  get isOpen(): boolean {
    return this.open;
  }

  write(record: SessionLogRecord): void {
    if (!this.open) throw new Error('Session log is closed');
    this.records.push(record);
  }

  close(): void {
    this.open = false;
  }
}
