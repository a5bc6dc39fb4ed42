/**
 * Line-buffered JSONL parser.
 *
 * Feed it arbitrary chunks; it emits one callback per complete JSON object
 * line and keeps the trailing partial line until more data or `flush()`.
 */

export interface JsonlParserCallbacks<T = unknown> {
  onEvent: (event: T) => void;
  onError?: (error: Error, line: string) => void;
}

export class JsonlParser<T = unknown> {
  private buffer = '';
  private readonly onEvent: (event: T) => void;
  private readonly onError?: (error: Error, line: string) => void;
  private readonly validate: (value: unknown) => T;

  /**
   * @param validate - Narrows each parsed value to `T`; throw to reject a line.
   */
  constructor(callbacks: JsonlParserCallbacks<T>, validate: (value: unknown) => T) {
    this.onEvent = callbacks.onEvent;
    this.onError = callbacks.onError;
    this.validate = validate;
  }

  processChunk(chunk: string): void {
    this.buffer += chunk;
    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() || '';
    for (const line of lines) {
      this.parseLine(line);
    }
  }

  flush(): void {
    if (this.buffer.trim().length > 0) {
      this.parseLine(this.buffer);
    }
    this.buffer = '';
  }

  reset(): void {
    this.buffer = '';
  }

  private parseLine(line: string): void {
    const trimmed = line.trim();
    if (!trimmed) return;
    let event: T;
    try {
      event = this.validate(JSON.parse(trimmed));
    } catch (error) {
      this.onError?.(error instanceof Error ? error : new Error(String(error)), line);
      return;
    }
    this.onEvent(event);
  }
}
