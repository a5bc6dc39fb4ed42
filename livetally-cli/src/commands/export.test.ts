import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { exportCsvAction, exportMessagesAction } from './export';

describe('export commands', () => {
  let dir: string;
  let input: string;
  let stdout: string[];
  let stderr: string[];

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'livetally-cli-export-'));
    input = path.join(dir, 'session.jsonl');
    fs.writeFileSync(input, [
      '{"type":"session_start","ts":"2024-03-01T12:00:00.000Z","channel":"somechannel","chatroom_id":42}',
      '{"type":"message","ts":"2024-03-01T12:00:00.500Z","channel":"somechannel","username":"alice","message":"hi"}',
      '',
    ].join('\n'));
    stdout = [];
    stderr = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stdout.push(String(chunk));
      return true;
    });
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stderr.push(String(chunk));
      return true;
    });
    vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit');
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes messages next to the input', async () => {
    await exportMessagesAction({ input });

    const output = path.join(dir, 'session-messages.csv');
    expect(fs.existsSync(output)).toBe(true);
    expect(stdout).toHaveLength(1);
    expect(stdout[0].startsWith(`Wrote ${output} `)).toBe(true);
    expect(stderr).toEqual([]);
  });

  it('exits with an error when there are no snapshots', async () => {
    await expect(exportCsvAction({ input })).rejects.toThrow('process.exit');

    expect(process.exit).toHaveBeenCalledWith(1);
    expect(stderr).toEqual(['Error: No snapshot data found\n']);
  });
});
