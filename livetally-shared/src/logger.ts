/**
 * Diagnostic logging to stderr.
 *
 * `log` is debug output and stays silent unless verbose mode is on, so
 * recoverable failures never break the live status line. `logError` is
 * always written.
 */

type LogWriter = (line: string) => void;

let verbose = false;
let writer: LogWriter = (line) => { process.stderr.write(line + '\n'); };

export interface LoggerOptions {
  verbose?: boolean;
  write?: LogWriter;
}

export function configureLogger(options: LoggerOptions): void {
  if (options.verbose !== undefined) verbose = options.verbose;
  if (options.write) writer = options.write;
}

export function log(message: string): void {
  if (!verbose) return;
  writer(`[${new Date().toISOString()}] ${message}`);
}

export function logError(message: string, error?: unknown): void {
  const detail = error === undefined
    ? ''
    : `: ${error instanceof Error ? error.message : String(error)}`;
  writer(`[${new Date().toISOString()}] ERROR ${message}${detail}`);
}
