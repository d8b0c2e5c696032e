import { randomUUID } from 'crypto';
import { isLmgateError } from '../errors/errors.js';
import type { LmgateError } from '../errors/errors.js';
import type {
  CanonicalChatChunk,
  CanonicalChatResponse,
  ChatCompletionResponse,
  ChatCompletionChunk,
  ChatCompletionChunkDelta,
  ChatCompletionUsage,
  ModelList,
  OpenAIError,
  TokenUsage,
} from '../types/index.js';
import type { ProviderModels } from '../models/model-catalog.js';

export class ResponseTransformer {
  private now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  /**
   * Convert a canonical response to an OpenAI ChatCompletionResponse.
   */
  toOpenAIResponse(response: CanonicalChatResponse, model: string): ChatCompletionResponse {
    const message: ChatCompletionResponse['choices'][number]['message'] = {
      role: 'assistant',
      content: response.content,
    };

    if (response.toolCalls && response.toolCalls.length > 0) {
      message.tool_calls = response.toolCalls.map((tc) => ({
        id: tc.id,
        type: 'function',
        function: { name: tc.name, arguments: tc.arguments },
      }));
      if (!response.content) message.content = null;
    }

    const completion: ChatCompletionResponse = {
      id: this.generateCompletionId(),
      object: 'chat.completion',
      created: this.timestamp(),
      model,
      choices: [
        {
          index: 0,
          message,
          finish_reason: response.finishReason ?? 'stop',
          logprobs: null,
        },
      ],
    };
    if (response.usage) {
      completion.usage = toUsage(response.usage);
    }
    return completion;
  }

  /**
   * Convert a canonical chunk to a ChatCompletionChunk.
   */
  toOpenAIChunk(chunk: CanonicalChatChunk, model: string, streamId: string): ChatCompletionChunk {
    const delta: ChatCompletionChunkDelta = {};

    if (chunk.role) delta.role = chunk.role;
    if (chunk.content !== undefined) delta.content = chunk.content;
    if (chunk.toolCalls) {
      delta.tool_calls = chunk.toolCalls.map((tc) => ({
        index: tc.index,
        ...(tc.id !== undefined && { id: tc.id, type: 'function' as const }),
        function: {
          ...(tc.name !== undefined && { name: tc.name }),
          ...(tc.arguments !== undefined && { arguments: tc.arguments }),
        },
      }));
    }

    const openaiChunk: ChatCompletionChunk = {
      id: streamId,
      object: 'chat.completion.chunk',
      created: this.timestamp(),
      model,
      choices: [
        {
          index: 0,
          delta,
          finish_reason: chunk.finishReason ?? null,
          logprobs: null,
        },
      ],
    };
    if (chunk.usage) {
      openaiChunk.usage = toUsage(chunk.usage);
    }
    return openaiChunk;
  }

  toModelList(groups: ProviderModels[], prefixed: boolean): ModelList {
    return {
      object: 'list',
      data: groups.flatMap(({ provider, models }) =>
        models.map((model) => ({
          id: prefixed ? `${provider}:${model.id}` : model.id,
          object: 'model' as const,
          created: model.created ?? 0,
          owned_by: provider,
        }))
      ),
    };
  }

  /**
   * Convert any error to the OpenAI error envelope.
   */
  toOpenAIError(error: unknown): OpenAIError {
    if (!isLmgateError(error)) {
      return envelope('Internal server error', 'server_error', null);
    }

    switch (error.kind) {
      case 'gateway':
        return envelope(error.message, error.statusCode === 401 ? 'authentication_error' : 'invalid_request_error', error.code);
      case 'backpressure':
        return envelope(error.message, 'rate_limit_error', 'rate_limit_exceeded');
      case 'upstream_status':
        return envelope(upstreamMessage(error), 'upstream_error', `upstream_${error.statusCode}`);
      case 'upstream_format':
        return envelope(upstreamMessage(error), 'upstream_error', 'upstream_format');
      case 'transport':
        return envelope(error.describe(), 'upstream_error', error.timeout ? 'upstream_timeout' : 'upstream_unreachable');
      case 'auth':
        return envelope(error.describe(), 'upstream_auth_error', 'upstream_auth');
      case 'config':
        return envelope(error.describe(), 'server_error', 'config_error');
    }
  }

  generateCompletionId(): string {
    return `chatcmpl-${randomUUID()}`;
  }

  formatSSE(chunk: ChatCompletionChunk | OpenAIError): string {
    return `data: ${JSON.stringify(chunk)}\n\n`;
  }

  formatSSEDone(): string {
    return 'data: [DONE]\n\n';
  }

  private timestamp(): number {
    return Math.floor(this.now() / 1000);
  }
}

/**
 * HTTP status the gateway answers with for an error
 */
export function httpStatusFor(error: unknown): number {
  if (!isLmgateError(error)) {
    return 500;
  }
  switch (error.kind) {
    case 'config':
      return 500;
    case 'auth':
      return 502;
    case 'transport':
      return error.timeout ? 504 : 502;
    case 'upstream_format':
      return 502;
    case 'upstream_status':
      return error.statusCode >= 400 && error.statusCode <= 599 ? error.statusCode : 502;
    case 'gateway':
      return error.statusCode;
    case 'backpressure':
      return 429;
  }
}

function toUsage(usage: TokenUsage): ChatCompletionUsage {
  return {
    prompt_tokens: usage.inputTokens,
    completion_tokens: usage.outputTokens,
    total_tokens: usage.totalTokens,
  };
}

function envelope(message: string, type: string, code: string | null): OpenAIError {
  return { error: { message, type, param: null, code } };
}

// `openai chat: Upstream returned HTTP 500: <body>`
function upstreamMessage(error: LmgateError): string {
  const where = [error.provider, error.operation].filter(Boolean).join(' ');
  const message = error.upstreamBody ? `${error.message}: ${error.upstreamBody}` : error.message;
  return where ? `${where}: ${message}` : message;
}
