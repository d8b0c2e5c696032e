import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  detectFormat,
  normalizeResponse,
  normalizeStream,
  StreamNormalizer,
} from '../src/normalizer/response-normalizer.js';
import { normalizeFinishReason, normalizeUsage } from '../src/normalizer/usage.js';
import { UpstreamError, UpstreamFormatError } from '../src/errors/errors.js';
import { readFrames } from '../src/transport/sse-reader.js';
import type { StreamFrame } from '../src/transport/sse-reader.js';
import type { CanonicalChatChunk } from '../src/types/index.js';

const bodies = {
  openai: {
    id: 'chatcmpl-1',
    choices: [{ index: 0, message: { role: 'assistant', content: 'hello' }, finish_reason: 'stop' }],
    usage: { prompt_tokens: 5, completion_tokens: 2, total_tokens: 7 },
  },
  llama: {
    completion_message: { role: 'assistant', content: { type: 'text', text: 'hello' }, stop_reason: 'stop' },
    metrics: [
      { metric: 'num_prompt_tokens', value: 5 },
      { metric: 'num_completion_tokens', value: 2 },
      { metric: 'num_total_tokens', value: 7 },
    ],
  },
  cohere: {
    id: 'c-1',
    message: { role: 'assistant', content: [{ type: 'text', text: 'hel' }, { type: 'text', text: 'lo' }] },
    finish_reason: 'COMPLETE',
    usage: { billed_units: { input_tokens: 5, output_tokens: 2 } },
  },
  anthropic: {
    id: 'msg_1',
    type: 'message',
    content: [{ type: 'text', text: 'hello' }],
    stop_reason: 'end_turn',
    usage: { input_tokens: 5, output_tokens: 2 },
  },
  gemini: {
    candidates: [{ content: { role: 'model', parts: [{ text: 'hello' }] }, finishReason: 'STOP' }],
    usageMetadata: { promptTokenCount: 5, candidatesTokenCount: 2, totalTokenCount: 7 },
  },
  bedrock: {
    output: { message: { role: 'assistant', content: [{ text: 'hello' }] } },
    stopReason: 'end_turn',
    usage: { inputTokens: 5, outputTokens: 2, totalTokens: 7 },
  },
  ollama: {
    model: 'llama3:8b',
    message: { role: 'assistant', content: 'hello' },
    done: true,
    done_reason: 'stop',
    prompt_eval_count: 5,
    eval_count: 2,
  },
};

function frame(value: unknown, event?: string): StreamFrame {
  return event ? { event, data: JSON.stringify(value) } : { data: JSON.stringify(value) };
}

async function* framesOf(...frames: StreamFrame[]): AsyncGenerator<StreamFrame> {
  for (const f of frames) yield f;
}

async function collect(stream: AsyncIterable<CanonicalChatChunk>): Promise<CanonicalChatChunk[]> {
  const out: CanonicalChatChunk[] = [];
  for await (const chunk of stream) out.push(chunk);
  return out;
}

describe('normalizeResponse', () => {
  it.each(Object.entries(bodies))('1. parses the %s shape into the same canonical response', (format, body) => {
    const text = JSON.stringify(body);

    expect(detectFormat(text)).toBe(format);
    expect(normalizeResponse(text)).toEqual({
      role: 'assistant',
      content: 'hello',
      finishReason: 'stop',
      usage: { inputTokens: 5, outputTokens: 2, totalTokens: 7 },
    });
  });

  it('2. extracts OpenAI tool calls', () => {
    const body = {
      choices: [
        {
          message: {
            role: 'assistant',
            content: null,
            tool_calls: [{ id: 'call_a', type: 'function', function: { name: 'get_weather', arguments: '{"city":"Oslo"}' } }],
          },
          finish_reason: 'tool_calls',
        },
      ],
    };

    expect(normalizeResponse(JSON.stringify(body))).toEqual({
      role: 'assistant',
      content: '',
      toolCalls: [{ id: 'call_a', name: 'get_weather', arguments: '{"city":"Oslo"}' }],
      finishReason: 'tool_calls',
    });
  });

  it('3. extracts Anthropic tool_use blocks', () => {
    const body = {
      content: [
        { type: 'text', text: 'Checking.' },
        { type: 'tool_use', id: 'toolu_1', name: 'get_weather', input: { city: 'Oslo' } },
      ],
      stop_reason: 'tool_use',
    };

    const response = normalizeResponse(JSON.stringify(body));

    expect(response.content).toBe('Checking.');
    expect(response.toolCalls).toEqual([{ id: 'toolu_1', name: 'get_weather', arguments: '{"city":"Oslo"}' }]);
    expect(response.finishReason).toBe('tool_calls');
  });

  it('4. maps a Gemini function call with STOP to tool_calls and drops thoughts', () => {
    const body = {
      candidates: [
        {
          content: { parts: [{ text: 'thinking', thought: true }, { functionCall: { name: 'lookup', args: { q: 1 } } }] },
          finishReason: 'STOP',
        },
      ],
    };

    const response = normalizeResponse(JSON.stringify(body));

    expect(response.content).toBe('');
    expect(response.toolCalls).toEqual([{ id: 'call_1', name: 'lookup', arguments: '{"q":1}' }]);
    expect(response.finishReason).toBe('tool_calls');
  });

  it('5. treats missing usage as absent, not an error', () => {
    const response = normalizeResponse(JSON.stringify({ choices: [{ message: { content: 'x' } }] }));

    expect(response.usage).toBeUndefined();
    expect(response.finishReason).toBeNull();
  });

  it('6. throws UpstreamFormatError carrying the raw body', () => {
    const raw = '{"result":"unknown shape"}';
    const error = (() => {
      try {
        normalizeResponse(raw, { provider: 'mystery', operation: 'chat' });
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(UpstreamFormatError);
    expect(error instanceof UpstreamFormatError && [error.upstreamBody, error.provider]).toEqual([raw, 'mystery']);
    expect(() => normalizeResponse('<html>')).toThrow('Upstream response is not valid JSON');
  });

  it('7. detection is idempotent', () => {
    const candidates = [...Object.values(bodies).map((b) => JSON.stringify(b)), '{}', 'null', 'not json'];
    fc.assert(
      fc.property(fc.constantFrom(...candidates), (text) => {
        expect(detectFormat(text)).toBe(detectFormat(text));
      })
    );
    fc.assert(
      fc.property(fc.json(), (text) => {
        expect(detectFormat(text)).toBe(detectFormat(text));
      })
    );
  });
});

describe('StreamNormalizer', () => {
  it('1. converts OpenAI deltas and stops at [DONE]', async () => {
    const chunks = await collect(
      normalizeStream(
        framesOf(
          frame({ choices: [{ index: 0, delta: { role: 'assistant', content: '' } }] }),
          frame({ choices: [{ index: 0, delta: { content: 'Hel' } }] }),
          frame({ choices: [{ index: 0, delta: { content: 'lo' }, finish_reason: 'stop' }] }),
          frame({ choices: [], usage: { prompt_tokens: 3, completion_tokens: 2 } }),
          { data: '[DONE]' },
          frame({ choices: [{ index: 0, delta: { content: 'after done' } }] })
        )
      )
    );

    expect(chunks).toEqual([
      { role: 'assistant' },
      { content: 'Hel' },
      { content: 'lo', finishReason: 'stop' },
      { usage: { inputTokens: 3, outputTokens: 2, totalTokens: 5 } },
    ]);
  });

  it('2. carries OpenAI tool call deltas', () => {
    const normalizer = new StreamNormalizer();

    const step = normalizer.push(
      frame({
        choices: [
          { delta: { tool_calls: [{ index: 0, id: 'call_1', function: { name: 'f', arguments: '{"a"' } }] } },
        ],
      })
    );

    expect(step).toEqual({ chunks: [{ toolCalls: [{ index: 0, id: 'call_1', name: 'f', arguments: '{"a"' }] }], done: false });
  });

  it('3. converts Anthropic events and combines input and output usage', async () => {
    const chunks = await collect(
      normalizeStream(
        framesOf(
          frame({ type: 'message_start', message: { id: 'msg_1', usage: { input_tokens: 12, output_tokens: 1 } } }, 'message_start'),
          frame({ type: 'content_block_start', index: 0, content_block: { type: 'text', text: '' } }),
          frame({ type: 'ping' }),
          frame({ type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text: 'Hi' } }),
          frame({ type: 'content_block_stop', index: 0 }),
          frame({ type: 'content_block_start', index: 1, content_block: { type: 'tool_use', id: 'toolu_1', name: 'f' } }),
          frame({ type: 'content_block_delta', index: 1, delta: { type: 'input_json_delta', partial_json: '{"x":1}' } }),
          frame({ type: 'message_delta', delta: { stop_reason: 'tool_use' }, usage: { output_tokens: 9 } }),
          frame({ type: 'message_stop' })
        )
      )
    );

    expect(chunks).toEqual([
      { role: 'assistant' },
      { content: 'Hi' },
      { toolCalls: [{ index: 0, id: 'toolu_1', name: 'f', arguments: '' }] },
      { toolCalls: [{ index: 0, arguments: '{"x":1}' }] },
      { finishReason: 'tool_calls', usage: { inputTokens: 12, outputTokens: 9, totalTokens: 21 } },
    ]);
  });

  it('4. raises an Anthropic error event as UpstreamError', () => {
    const normalizer = new StreamNormalizer({ provider: 'anthropic' });

    expect(() => normalizer.push(frame({ type: 'error', error: { type: 'overloaded_error', message: 'Overloaded' } }))).toThrow(
      UpstreamError
    );
  });

  it('5. converts Cohere events and ends at message-end', async () => {
    const chunks = await collect(
      normalizeStream(
        framesOf(
          frame({ type: 'message-start', id: 'c1' }),
          frame({ type: 'content-start', index: 0 }),
          frame({ type: 'content-delta', index: 0, delta: { message: { content: { text: 'hi' } } } }),
          frame({ type: 'content-end', index: 0 }),
          frame({
            type: 'message-end',
            delta: { finish_reason: 'COMPLETE', usage: { tokens: { input_tokens: 4, output_tokens: 1 } } },
          })
        )
      )
    );

    expect(chunks).toEqual([
      { role: 'assistant' },
      { content: 'hi' },
      { finishReason: 'stop', usage: { inputTokens: 4, outputTokens: 1, totalTokens: 5 } },
    ]);
  });

  it('6. reads Ollama NDJSON lines until done', async () => {
    const chunks = await collect(
      normalizeStream(
        framesOf(
          frame({ message: { role: 'assistant', content: 'a' }, done: false }),
          frame({ message: { role: 'assistant', content: 'b' }, done: false }),
          frame({ message: { role: 'assistant', content: '' }, done: true, done_reason: 'stop', prompt_eval_count: 3, eval_count: 2 })
        )
      )
    );

    expect(chunks).toEqual([
      { content: 'a' },
      { content: 'b' },
      { finishReason: 'stop', usage: { inputTokens: 3, outputTokens: 2, totalTokens: 5 } },
    ]);
  });

  it('7. reads Gemini candidate frames until the stream closes', async () => {
    const chunks = await collect(
      normalizeStream(
        framesOf(
          frame({ candidates: [{ content: { parts: [{ text: 'Hel' }] } }] }),
          frame({
            candidates: [{ content: { parts: [{ text: 'lo' }] }, finishReason: 'STOP' }],
            usageMetadata: { promptTokenCount: 2, candidatesTokenCount: 2 },
          })
        )
      )
    );

    expect(chunks).toEqual([
      { content: 'Hel' },
      { content: 'lo', finishReason: 'stop', usage: { inputTokens: 2, outputTokens: 2, totalTokens: 4 } },
    ]);
  });

  it('8. skips malformed and unknown frames', async () => {
    const chunks = await collect(
      normalizeStream(
        framesOf(
          { data: '{not json' },
          frame({ something: 'else' }),
          { data: '   ' },
          frame({ choices: [{ delta: { content: 'ok' } }] })
        )
      )
    );

    expect(chunks).toEqual([{ content: 'ok' }]);
  });

  it('9. parses a pretty-printed whole response sent to a stream request', async () => {
    async function* text(): AsyncGenerator<string> {
      yield JSON.stringify(bodies.gemini, null, 2).slice(0, 40);
      yield JSON.stringify(bodies.gemini, null, 2).slice(40);
    }

    const chunks = await collect(normalizeStream(readFrames(text()), { provider: 'gemini', operation: 'chat' }));

    expect(chunks).toEqual([
      { content: 'hello', finishReason: 'stop', usage: { inputTokens: 5, outputTokens: 2, totalTokens: 7 } },
    ]);
  });

  it('10. raises UpstreamFormatError when no frame is ever recognised', async () => {
    const unknown = collect(normalizeStream(framesOf({ data: '<html>' }, { data: 'oops' }), { provider: 'gemini' }));
    await expect(unknown).rejects.toThrow(UpstreamFormatError);
    await expect(unknown).rejects.toMatchObject({ provider: 'gemini', upstreamBody: '<html>\noops' });

    await expect(collect(normalizeStream(framesOf()))).rejects.toThrow(
      'Upstream stream ended without any recognisable frame'
    );
  });
});

describe('normalizeUsage', () => {
  it('should read every naming scheme', () => {
    expect(normalizeUsage({ prompt_tokens: 1, completion_tokens: 2 })).toEqual({ inputTokens: 1, outputTokens: 2, totalTokens: 3 });
    expect(normalizeUsage({ input_tokens: 1, output_tokens: 2 })).toEqual({ inputTokens: 1, outputTokens: 2, totalTokens: 3 });
    expect(normalizeUsage({ inputTokens: 1, outputTokens: 2, totalTokens: 9 })).toEqual({
      inputTokens: 1,
      outputTokens: 2,
      totalTokens: 9,
    });
    expect(normalizeUsage({ promptTokenCount: 4 })).toEqual({ inputTokens: 4, outputTokens: 0, totalTokens: 4 });
    expect(normalizeUsage({ billed_units: { input_tokens: 2, output_tokens: 3 } })).toEqual({
      inputTokens: 2,
      outputTokens: 3,
      totalTokens: 5,
    });
  });

  it('should return undefined when no counts are present', () => {
    expect(normalizeUsage(undefined)).toBeUndefined();
    expect(normalizeUsage({})).toBeUndefined();
    expect(normalizeUsage('12')).toBeUndefined();
  });
});

describe('normalizeFinishReason', () => {
  it('should map provider reasons onto the OpenAI set', () => {
    expect(normalizeFinishReason('end_turn')).toBe('stop');
    expect(normalizeFinishReason('MAX_TOKENS')).toBe('length');
    expect(normalizeFinishReason('tool_use')).toBe('tool_calls');
    expect(normalizeFinishReason('SAFETY')).toBe('content_filter');
    expect(normalizeFinishReason('something_new')).toBe('stop');
    expect(normalizeFinishReason(null)).toBeNull();
    expect(normalizeFinishReason('')).toBeNull();
  });
});
