export interface StreamFrame {
  /** SSE `event:` name, when the upstream sent one */
  event?: string;
  data: string;
}

/**
 * Splits decoded upstream text into frames. Handles Server-Sent Events
 * (`event:` / `data:` blocks separated by a blank line) and newline
 * delimited JSON, where each non-empty line is a frame of its own.
 */
export async function* readFrames(chunks: AsyncIterable<string>): AsyncGenerator<StreamFrame> {
  let buffer = '';
  let event: string | undefined;
  let data: string[] = [];

  const flush = (): StreamFrame | null => {
    if (data.length === 0) {
      event = undefined;
      return null;
    }
    const frame: StreamFrame = event ? { event, data: data.join('\n') } : { data: data.join('\n') };
    event = undefined;
    data = [];
    return frame;
  };

  const consume = function* (line: string): Generator<StreamFrame> {
    if (line === '') {
      const frame = flush();
      if (frame) yield frame;
      return;
    }
    if (line.startsWith(':')) {
      return; // comment / keep-alive
    }
    const field = /^(event|data|id|retry):\s?(.*)$/.exec(line);
    if (!field) {
      // NDJSON line
      const pending = flush();
      if (pending) yield pending;
      yield { data: line.trim() };
      return;
    }
    if (field[1] === 'event') {
      event = field[2].trim();
    } else if (field[1] === 'data') {
      data.push(field[2]);
    }
  };

  for await (const chunk of chunks) {
    buffer += chunk;
    let newline = buffer.indexOf('\n');
    while (newline !== -1) {
      const line = buffer.slice(0, newline).replace(/\r$/, '');
      buffer = buffer.slice(newline + 1);
      yield* consume(line);
      newline = buffer.indexOf('\n');
    }
  }

  if (buffer.trim() !== '') {
    yield* consume(buffer.replace(/\r$/, ''));
  }
  const last = flush();
  if (last) yield last;
}
