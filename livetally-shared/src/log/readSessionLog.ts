/**
 * Streams a session log back into validated records.
 *
 * Lines that are not JSON or do not match a known record shape are skipped
 * and counted, so a log cut off mid-line by a crash still reads.
 */

import * as fs from 'fs';
import { JsonlParser } from '../parsers/jsonl';
import { sessionLogRecordSchema, type SessionLogRecord } from './records';

export interface SessionLogContents {
  records: SessionLogRecord[];
  skippedLines: number;
}

export async function readSessionLog(filePath: string): Promise<SessionLogContents> {
  const records: SessionLogRecord[] = [];
  let skippedLines = 0;
  const parser = new JsonlParser<SessionLogRecord>(
    {
      onEvent: (record) => { records.push(record); },
      onError: () => { skippedLines++; },
    },
    (value) => sessionLogRecordSchema.parse(value),
  );

  const stream = fs.createReadStream(filePath, { encoding: 'utf-8' });
  for await (const chunk of stream) {
    parser.processChunk(String(chunk));
  }
  parser.flush();

  return { records, skippedLines };
}
