import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { JsonlParser } from './jsonl';

const itemSchema = z.object({ id: z.number() });
type Item = z.infer<typeof itemSchema>;

function makeParser() {
  const events: Item[] = [];
  const onError = vi.fn<(error: Error, line: string) => void>();
  const parser = new JsonlParser<Item>(
    { onEvent: (event) => { events.push(event); }, onError },
    (value) => itemSchema.parse(value),
  );
  return { parser, events, onError };
}

describe('JsonlParser', () => {
  it('emits one event per complete line', () => {
    const { parser, events } = makeParser();
    parser.processChunk('{"id":1}\n{"id":2}\n');

    expect(events).toEqual([{ id: 1 }, { id: 2 }]);
  });

  it('buffers a line split across chunks', () => {
    const { parser, events } = makeParser();
    parser.processChunk('{"id"');
    expect(events).toEqual([]);

    parser.processChunk(':3}\n');
    expect(events).toEqual([{ id: 3 }]);
  });

  it('parses the trailing line on flush', () => {
    const { parser, events } = makeParser();
    parser.processChunk('{"id":1}\n{"id":2}');
    parser.flush();

    expect(events).toEqual([{ id: 1 }, { id: 2 }]);
  });

  it('reports bad JSON and failed validation, then carries on', () => {
    const { parser, events, onError } = makeParser();
    parser.processChunk('nope\n{"id":"x"}\n\n{"id":4}\n');

    expect(events).toEqual([{ id: 4 }]);
    expect(onError).toHaveBeenCalledTimes(2);
    expect(onError.mock.calls[0][1]).toBe('nope');
  });

  it('drops buffered input on reset', () => {
    const { parser, events } = makeParser();
    parser.processChunk('{"id":9');
    parser.reset();
    parser.flush();

    expect(events).toEqual([]);
  });
});
