import { z } from 'zod';
import { GatewayError } from '../errors/errors.js';
import type { Router, ResolvedRoute } from '../router/router.js';
import type { ProviderClient } from '../providers/provider-client.js';
import type { ResponseTransformer } from '../transformer/response-transformer.js';
import type { UsageSink } from '../usage/usage-tracker.js';
import type {
  CanonicalChatRequest,
  CanonicalMessage,
  ChatCompletionResponse,
  ContentPart,
  TokenUsage,
} from '../types/index.js';
import logger from '../config/logger.js';

const contentPartSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), text: z.string() }),
  z.object({
    type: z.literal('image_url'),
    image_url: z.object({ url: z.string().min(1), detail: z.enum(['low', 'high', 'auto']).optional() }),
  }),
  z.object({
    type: z.literal('input_audio'),
    input_audio: z.object({ data: z.string().min(1), format: z.string().min(1) }),
  }),
]);

const messageSchema = z.object({
  role: z.enum(['system', 'developer', 'user', 'assistant', 'tool']),
  content: z.union([z.string(), z.array(contentPartSchema), z.null()]).optional(),
  name: z.string().optional(),
  tool_calls: z
    .array(
      z.object({
        id: z.string(),
        type: z.literal('function').optional(),
        function: z.object({ name: z.string(), arguments: z.string() }),
      })
    )
    .optional(),
  tool_call_id: z.string().optional(),
});

const chatRequestSchema = z.object({
  model: z.string(),
  messages: z.array(messageSchema).min(1, 'messages must be a non-empty array'),
  max_tokens: z.number().int().positive().optional(),
  max_completion_tokens: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(2).optional(),
  stream: z.boolean().optional(),
  tools: z
    .array(
      z.object({
        type: z.literal('function'),
        function: z.object({
          name: z.string().min(1),
          description: z.string().optional(),
          parameters: z.record(z.string(), z.unknown()).optional(),
        }),
      })
    )
    .optional(),
});

type WireMessage = z.infer<typeof messageSchema>;

export class RequestHandler {
  private router: Router;
  private client: ProviderClient;
  private transformer: ResponseTransformer;
  private usage?: UsageSink;
  private now: () => number;

  constructor(
    router: Router,
    client: ProviderClient,
    transformer: ResponseTransformer,
    usage?: UsageSink,
    now: () => number = Date.now
  ) {
    this.router = router;
    this.client = client;
    this.transformer = transformer;
    this.usage = usage;
    this.now = now;
  }

  /**
   * Parse and validate an inbound OpenAI chat request into the canonical shape.
   * Throws GatewayError (400) when the body is invalid.
   */
  parseRequest(body: unknown): CanonicalChatRequest {
    const parsed = chatRequestSchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      throw new GatewayError(`${where}${issue?.message ?? 'invalid request'}`, 400, 'invalid_request');
    }

    const data = parsed.data;
    const request: CanonicalChatRequest = {
      model: data.model,
      messages: data.messages.map(toCanonicalMessage),
    };
    const maxTokens = data.max_completion_tokens ?? data.max_tokens;
    if (maxTokens !== undefined) request.maxTokens = maxTokens;
    if (data.temperature !== undefined) request.temperature = data.temperature;
    if (data.stream !== undefined) request.stream = data.stream;
    if (data.tools && data.tools.length > 0) {
      request.tools = data.tools.map((tool) => ({
        name: tool.function.name,
        ...(tool.function.description !== undefined && { description: tool.function.description }),
        ...(tool.function.parameters !== undefined && { parameters: tool.function.parameters }),
      }));
    }
    return request;
  }

  /**
   * Handle a non-streaming chat completion request.
   * Pipeline: route -> provider call -> usage -> transform
   */
  async handleCompletion(request: CanonicalChatRequest, signal?: AbortSignal): Promise<ChatCompletionResponse> {
    const route = this.router.resolve(request.model);
    logger.info({ model: request.model, provider: route.provider, upstreamModel: route.model, via: route.via }, 'Routing chat request');

    const response = await this.client.chat(route.provider, { ...request, model: route.model, stream: false }, signal);
    this.recordUsage(route, response.usage);
    return this.transformer.toOpenAIResponse(response, request.model);
  }

  /**
   * Handle a streaming chat completion request.
   * Yields SSE-formatted strings in upstream order, ending with `data: [DONE]`.
   */
  async *handleCompletionStream(request: CanonicalChatRequest, signal?: AbortSignal): AsyncGenerator<string> {
    const route = this.router.resolve(request.model);
    logger.info({ model: request.model, provider: route.provider, upstreamModel: route.model, via: route.via }, 'Routing chat stream');

    const streamId = this.transformer.generateCompletionId();
    let usage: TokenUsage | undefined;
    let first = true;

    try {
      for await (const chunk of this.client.chatStream(route.provider, { ...request, model: route.model, stream: true }, signal)) {
        if (chunk.usage) usage = chunk.usage;
        const outgoing = first && !chunk.role ? { role: 'assistant' as const, ...chunk } : chunk;
        first = false;
        yield this.transformer.formatSSE(this.transformer.toOpenAIChunk(outgoing, request.model, streamId));
      }
    } catch (error) {
      // Chunks already went out; count them with whatever usage arrived
      if (!first) this.recordUsage(route, usage);
      throw error;
    }

    this.recordUsage(route, usage);
    yield this.transformer.formatSSEDone();
  }

  private recordUsage(route: ResolvedRoute, usage: TokenUsage | undefined): void {
    this.usage?.record({
      provider: route.provider,
      model: route.model,
      inputTokens: usage?.inputTokens ?? 0,
      outputTokens: usage?.outputTokens ?? 0,
      timestamp: this.now(),
    });
  }
}

function toCanonicalMessage(message: WireMessage): CanonicalMessage {
  const canonical: CanonicalMessage = {
    role: message.role === 'developer' ? 'system' : message.role,
    content: toCanonicalContent(message.content),
  };
  if (message.name) canonical.name = message.name;
  if (message.tool_call_id) canonical.toolCallId = message.tool_call_id;
  if (message.tool_calls && message.tool_calls.length > 0) {
    canonical.toolCalls = message.tool_calls.map((call) => ({
      id: call.id,
      name: call.function.name,
      arguments: call.function.arguments,
    }));
  }
  return canonical;
}

function toCanonicalContent(content: WireMessage['content']): CanonicalMessage['content'] {
  if (content === undefined || content === null) return null;
  if (typeof content === 'string') return content;
  return content.map((part): ContentPart => {
    switch (part.type) {
      case 'text':
        return { type: 'text', text: part.text };
      case 'image_url':
        return {
          type: 'image',
          url: part.image_url.url,
          ...(part.image_url.detail !== undefined && { detail: part.image_url.detail }),
        };
      case 'input_audio':
        return { type: 'audio', data: part.input_audio.data, format: part.input_audio.format };
    }
  });
}
