/**
 * Runs a short-lived external process with a hard timeout.
 *
 * On timeout the child is killed with SIGKILL and the promise settles once
 * the process has actually exited, so no child outlives its caller.
 */

import { spawn } from 'child_process';
import { CaptureToolMissingError } from '../errors';

export interface ProcessResult {
  /** Exit code, or null when the process was killed by a signal. */
  exitCode: number | null;
  stdout: Buffer;
  stderr: string;
  timedOut: boolean;
}

export interface RunProcessOptions {
  timeoutMs: number;
}

export type ProcessRunner = (
  command: string,
  args: readonly string[],
  options: RunProcessOptions,
) => Promise<ProcessResult>;

const MISSING_TOOL_CODES = new Set(['ENOENT', 'EACCES', 'ENOTDIR']);

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

export const runProcess: ProcessRunner = (command, args, options) => {
  return new Promise((resolve, reject) => {
    const child = spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });

    const stdout: Buffer[] = [];
    let stderr = '';
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGKILL');
    }, options.timeoutMs);

    child.stdout.on('data', (chunk: Buffer) => { stdout.push(chunk); });
    child.stderr.on('data', (chunk: Buffer) => { stderr += chunk.toString(); });

    child.on('error', (err) => {
      clearTimeout(timer);
      if (isErrnoException(err) && err.code !== undefined && MISSING_TOOL_CODES.has(err.code)) {
        reject(new CaptureToolMissingError(command));
      } else {
        reject(err);
      }
    });

    child.on('close', (code) => {
      clearTimeout(timer);
      resolve({ exitCode: code, stdout: Buffer.concat(stdout), stderr, timedOut });
    });
  });
};
