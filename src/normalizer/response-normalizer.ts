import { UpstreamError, UpstreamFormatError } from '../errors/errors.js';
import type { ErrorContext } from '../errors/errors.js';
import type { CanonicalChatChunk, CanonicalChatResponse, TokenUsage } from '../types/index.js';
import type { StreamFrame } from '../transport/sse-reader.js';
import { detectResponse, detectStreamEvent, toCanonicalResponse } from './response-formats.js';
import type { DetectedResponse, DetectedStreamEvent, ResponseFormat } from './response-formats.js';
import { normalizeFinishReason, normalizeUsage } from './usage.js';
import logger from '../config/logger.js';

export type NormalizeContext = Pick<ErrorContext, 'provider' | 'operation'>;

/**
 * Parses a complete upstream body into the canonical response. Throws
 * UpstreamFormatError, carrying the raw body, when no known shape matches.
 */
export function normalizeResponse(body: string, context: NormalizeContext = {}): CanonicalChatResponse {
  return toCanonicalResponse(detectOrThrow(body, context));
}

/**
 * Name of the shape `body` parses as, or null. Pure: identical input always
 * yields the identical answer.
 */
export function detectFormat(body: string): ResponseFormat | null {
  const parsed = tryParse(body);
  return parsed === undefined ? null : (detectResponse(parsed)?.format ?? null);
}

function detectOrThrow(body: string, context: NormalizeContext): DetectedResponse {
  const parsed = tryParse(body);
  if (parsed === undefined) {
    throw new UpstreamFormatError('Upstream response is not valid JSON', { ...context, upstreamBody: body });
  }
  const detected = detectResponse(parsed);
  if (!detected) {
    throw new UpstreamFormatError('Upstream response matches no known format', { ...context, upstreamBody: body });
  }
  return detected;
}

export interface StreamStep {
  chunks: CanonicalChatChunk[];
  done: boolean;
}

/**
 * Converts stream frames into canonical chunks. One instance per stream: it
 * remembers Anthropic input usage and tool-block indices across frames.
 */
export class StreamNormalizer {
  private context: NormalizeContext;
  private anthropicInput?: number;
  private toolIndexByBlock = new Map<number, number>();
  private nextToolIndex = 0;
  private format?: DetectedStreamEvent['format'];
  private recognised = false;
  // Frames seen before anything was recognised; a non-SSE upstream may have
  // sent one pretty-printed JSON document
  private unparsed: string[] = [];

  constructor(context: NormalizeContext = {}) {
    this.context = context;
  }

  push(frame: StreamFrame): StreamStep {
    const data = frame.data.trim();
    if (data === '') {
      return { chunks: [], done: false };
    }
    if (data === '[DONE]') {
      this.recognised = true;
      return { chunks: [], done: true };
    }

    const parsed = tryParse(data);
    const detected = parsed === undefined ? null : detectStreamEvent(parsed);
    if (!detected) {
      if (!this.recognised) {
        this.unparsed.push(data);
        return { chunks: [], done: false };
      }
      const reason = parsed === undefined ? 'Skipping malformed stream frame' : 'Skipping stream frame of unknown format';
      logger.warn({ ...this.context, frame: truncate(data) }, reason);
      return { chunks: [], done: false };
    }
    if (!this.recognised) {
      this.recognised = true;
      if (this.unparsed.length > 0) {
        logger.warn({ ...this.context, skipped: this.unparsed.length }, 'Skipping stream frames before the first known one');
        this.unparsed = [];
      }
    }
    if (this.format === undefined) {
      this.format = detected.format;
      logger.debug({ ...this.context, format: detected.format }, 'Detected stream format');
    }
    return this.convert(detected, data);
  }

  /**
   * Called when the upstream closes without a terminator. When no frame was
   * ever recognised, the collected lines are parsed as one whole response;
   * failing that, UpstreamFormatError carries what was received.
   */
  finish(): CanonicalChatChunk[] {
    if (this.recognised) {
      return [];
    }
    if (this.unparsed.length === 0) {
      throw new UpstreamFormatError('Upstream stream ended without any recognisable frame', {
        ...this.context,
        upstreamBody: '',
      });
    }
    const body = this.unparsed.join('\n');
    this.unparsed = [];
    const chunk = responseChunk(normalizeResponse(body, this.context));
    this.recognised = true;
    return hasPayload(chunk) ? [chunk] : [];
  }

  private convert(detected: DetectedStreamEvent, raw: string): StreamStep {
    switch (detected.format) {
      case 'openai-delta': {
        const chunks: CanonicalChatChunk[] = [];
        for (const choice of detected.data.choices) {
          const chunk: CanonicalChatChunk = {};
          if (choice.delta.role === 'assistant') chunk.role = 'assistant';
          if (choice.delta.content) chunk.content = choice.delta.content;
          if (choice.delta.tool_calls) {
            chunk.toolCalls = choice.delta.tool_calls.map((call) => ({
              index: call.index,
              ...(call.id !== undefined && { id: call.id }),
              ...(call.function?.name !== undefined && { name: call.function.name }),
              ...(call.function?.arguments !== undefined && { arguments: call.function.arguments }),
            }));
          }
          const finish = normalizeFinishReason(choice.finish_reason);
          if (finish) chunk.finishReason = finish;
          chunks.push(chunk);
        }
        const usage = normalizeUsage(detected.data.usage);
        if (usage) {
          chunks.push({ usage });
        }
        return { chunks: chunks.filter(hasPayload), done: false };
      }

      case 'anthropic-event':
        return this.convertAnthropic(detected.data, raw);

      case 'cohere-event': {
        const event = detected.data;
        switch (event.type) {
          case 'content-delta':
            return step([{ content: event.delta.message.content.text }]);
          case 'tool-call-start': {
            const call = event.delta.message.tool_calls;
            return step([
              {
                toolCalls: [
                  {
                    index: event.index ?? 0,
                    id: call.id,
                    name: call.function.name,
                    arguments: call.function.arguments ?? '',
                  },
                ],
              },
            ]);
          }
          case 'tool-call-delta':
            return step([
              { toolCalls: [{ index: event.index ?? 0, arguments: event.delta.message.tool_calls.function.arguments }] },
            ]);
          case 'message-end': {
            const chunk: CanonicalChatChunk = {};
            const finish = normalizeFinishReason(event.delta?.finish_reason);
            if (finish) chunk.finishReason = finish;
            const usage = normalizeUsage(event.delta?.usage);
            if (usage) chunk.usage = usage;
            return { chunks: hasPayload(chunk) ? [chunk] : [], done: true };
          }
          case 'message-start':
            return step([{ role: 'assistant' }]);
          default:
            return step([]);
        }
      }

      default: {
        // A whole response per frame (Gemini streams, Ollama lines, or a
        // server that ignored the stream flag)
        const chunk = responseChunk(toCanonicalResponse(detected));
        const done = detected.format === 'ollama' ? detected.data.done : detected.format !== 'gemini';
        return { chunks: hasPayload(chunk) ? [chunk] : [], done };
      }
    }
  }

  private convertAnthropic(
    event: Extract<DetectedStreamEvent, { format: 'anthropic-event' }>['data'],
    raw: string
  ): StreamStep {
    switch (event.type) {
      case 'message_start': {
        this.anthropicInput = normalizeUsage(event.message.usage)?.inputTokens;
        return step([{ role: 'assistant' }]);
      }
      case 'content_block_start': {
        if (event.content_block.type === 'tool_use') {
          const index = this.nextToolIndex++;
          this.toolIndexByBlock.set(event.index, index);
          return step([
            {
              toolCalls: [{ index, id: event.content_block.id, name: event.content_block.name, arguments: '' }],
            },
          ]);
        }
        return step(event.content_block.text ? [{ content: event.content_block.text }] : []);
      }
      case 'content_block_delta': {
        if (event.delta.type === 'text_delta' && event.delta.text) {
          return step([{ content: event.delta.text }]);
        }
        if (event.delta.type === 'input_json_delta' && event.delta.partial_json !== undefined) {
          const index = this.toolIndexByBlock.get(event.index) ?? 0;
          return step([{ toolCalls: [{ index, arguments: event.delta.partial_json }] }]);
        }
        return step([]);
      }
      case 'message_delta': {
        const chunk: CanonicalChatChunk = {};
        const finish = normalizeFinishReason(event.delta.stop_reason);
        if (finish) chunk.finishReason = finish;
        const usage = this.anthropicUsage(event.usage);
        if (usage) chunk.usage = usage;
        return step(hasPayload(chunk) ? [chunk] : []);
      }
      case 'message_stop':
        return { chunks: [], done: true };
      case 'error':
        throw new UpstreamError(`Upstream stream error: ${event.error.message}`, 502, {
          ...this.context,
          upstreamBody: raw,
        });
      default:
        return step([]);
    }
  }

  private anthropicUsage(raw: unknown): TokenUsage | undefined {
    const usage = normalizeUsage(raw);
    if (!usage) return undefined;
    const inputTokens = usage.inputTokens || this.anthropicInput || 0;
    return { inputTokens, outputTokens: usage.outputTokens, totalTokens: inputTokens + usage.outputTokens };
  }
}

/**
 * Lazily converts a frame sequence into canonical chunks, ending at the first
 * terminator or when the frames run out
 */
export async function* normalizeStream(
  frames: AsyncIterable<StreamFrame>,
  context: NormalizeContext = {}
): AsyncGenerator<CanonicalChatChunk> {
  const normalizer = new StreamNormalizer(context);
  for await (const frame of frames) {
    const { chunks, done } = normalizer.push(frame);
    yield* chunks;
    if (done) {
      return;
    }
  }
  yield* normalizer.finish();
}

function responseChunk(response: CanonicalChatResponse): CanonicalChatChunk {
  const chunk: CanonicalChatChunk = {};
  if (response.content) chunk.content = response.content;
  if (response.toolCalls) {
    chunk.toolCalls = response.toolCalls.map((call, index) => ({
      index,
      id: call.id,
      name: call.name,
      arguments: call.arguments,
    }));
  }
  if (response.finishReason) chunk.finishReason = response.finishReason;
  if (response.usage) chunk.usage = response.usage;
  return chunk;
}

function step(chunks: CanonicalChatChunk[]): StreamStep {
  return { chunks, done: false };
}

function hasPayload(chunk: CanonicalChatChunk): boolean {
  return (
    chunk.role !== undefined ||
    chunk.content !== undefined ||
    chunk.toolCalls !== undefined ||
    chunk.usage !== undefined ||
    chunk.finishReason !== undefined
  );
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function truncate(text: string): string {
  return text.length > 200 ? `${text.slice(0, 200)}...` : text;
}
