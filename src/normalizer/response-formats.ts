import { z } from 'zod';
import type { CanonicalChatResponse, CanonicalToolCall } from '../types/index.js';
import { normalizeFinishReason, normalizeUsage } from './usage.js';

// ============================================================================
// Whole-response shapes, in detection order
// ============================================================================

const functionCallSchema = z.object({
  id: z.string().optional(),
  function: z.object({ name: z.string(), arguments: z.union([z.string(), z.record(z.string(), z.unknown())]).optional() }),
});

const textPartSchema = z.object({ type: z.string().optional(), text: z.string() });

/** A: `choices[0].message` */
export const openaiResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          role: z.string().optional(),
          content: z.union([z.string(), z.array(textPartSchema.partial()), z.null()]).optional(),
          tool_calls: z.array(functionCallSchema).optional(),
        }),
        finish_reason: z.string().nullish(),
      })
    )
    .min(1),
  usage: z.unknown().optional(),
});

/** B: `completion_message.content.{type,text}` */
export const llamaResponseSchema = z.object({
  completion_message: z.object({
    role: z.string().optional(),
    content: z.object({ type: z.string(), text: z.string() }),
    stop_reason: z.string().nullish(),
    tool_calls: z.array(functionCallSchema).optional(),
  }),
  metrics: z.unknown().optional(),
  usage: z.unknown().optional(),
});

/** C: `message.content[].text` */
export const cohereResponseSchema = z.object({
  message: z.object({
    role: z.string().optional(),
    content: z.array(textPartSchema),
    tool_calls: z.array(functionCallSchema).optional(),
  }),
  finish_reason: z.string().nullish(),
  usage: z.unknown().optional(),
});

/** D: `content[].{type,text}` with a stop reason */
export const anthropicResponseSchema = z.object({
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
      id: z.string().optional(),
      name: z.string().optional(),
      input: z.unknown().optional(),
    })
  ),
  stop_reason: z.string().nullable(),
  usage: z.unknown().optional(),
});

/** E: `candidates[0].content.parts[]` */
export const geminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z
              .array(
                z.object({
                  text: z.string().optional(),
                  thought: z.boolean().optional(),
                  functionCall: z.object({ name: z.string(), args: z.unknown().optional() }).optional(),
                })
              )
              .optional(),
          })
          .optional(),
        finishReason: z.string().optional(),
      })
    )
    .min(1),
  usageMetadata: z.unknown().optional(),
});

/** F: `output.message.content[].text` */
export const bedrockResponseSchema = z.object({
  output: z.object({
    message: z.object({
      role: z.string().optional(),
      content: z.array(
        z.object({
          text: z.string().optional(),
          toolUse: z.object({ toolUseId: z.string(), name: z.string(), input: z.unknown().optional() }).optional(),
        })
      ),
    }),
  }),
  stopReason: z.string().optional(),
  usage: z.unknown().optional(),
});

/** G: Ollama native `message.content` or `response` lines with `done` */
export const ollamaResponseSchema = z.object({
  message: z.object({ role: z.string().optional(), content: z.string() }).optional(),
  response: z.string().optional(),
  done: z.boolean(),
  done_reason: z.string().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

export type DetectedResponse =
  | { format: 'openai'; data: z.infer<typeof openaiResponseSchema> }
  | { format: 'llama'; data: z.infer<typeof llamaResponseSchema> }
  | { format: 'cohere'; data: z.infer<typeof cohereResponseSchema> }
  | { format: 'anthropic'; data: z.infer<typeof anthropicResponseSchema> }
  | { format: 'gemini'; data: z.infer<typeof geminiResponseSchema> }
  | { format: 'bedrock'; data: z.infer<typeof bedrockResponseSchema> }
  | { format: 'ollama'; data: z.infer<typeof ollamaResponseSchema> };

export type ResponseFormat = DetectedResponse['format'];

type Detector = (body: unknown) => DetectedResponse | null;

const RESPONSE_DETECTORS: readonly Detector[] = [
  (body) => {
    const r = openaiResponseSchema.safeParse(body);
    return r.success ? { format: 'openai', data: r.data } : null;
  },
  (body) => {
    const r = llamaResponseSchema.safeParse(body);
    return r.success ? { format: 'llama', data: r.data } : null;
  },
  (body) => {
    const r = cohereResponseSchema.safeParse(body);
    return r.success ? { format: 'cohere', data: r.data } : null;
  },
  (body) => {
    const r = anthropicResponseSchema.safeParse(body);
    return r.success ? { format: 'anthropic', data: r.data } : null;
  },
  (body) => {
    const r = geminiResponseSchema.safeParse(body);
    return r.success ? { format: 'gemini', data: r.data } : null;
  },
  (body) => {
    const r = bedrockResponseSchema.safeParse(body);
    return r.success ? { format: 'bedrock', data: r.data } : null;
  },
  (body) => {
    const r = ollamaResponseSchema.safeParse(body);
    return r.success && (r.data.message !== undefined || r.data.response !== undefined)
      ? { format: 'ollama', data: r.data }
      : null;
  },
];

/**
 * Ordered trial parse. The first shape that validates wins; null when none does.
 */
export function detectResponse(body: unknown): DetectedResponse | null {
  for (const detect of RESPONSE_DETECTORS) {
    const detected = detect(body);
    if (detected) {
      return detected;
    }
  }
  return null;
}

export function toCanonicalResponse(detected: DetectedResponse): CanonicalChatResponse {
  switch (detected.format) {
    case 'openai': {
      const choice = detected.data.choices[0];
      const content = choice.message.content;
      return build(
        typeof content === 'string' ? content : (content ?? []).map((p) => p.text ?? '').join(''),
        (choice.message.tool_calls ?? []).map(fromFunctionCall),
        choice.finish_reason,
        detected.data.usage
      );
    }
    case 'llama': {
      const message = detected.data.completion_message;
      return build(
        message.content.text,
        (message.tool_calls ?? []).map(fromFunctionCall),
        message.stop_reason,
        detected.data.metrics ?? detected.data.usage
      );
    }
    case 'cohere': {
      const message = detected.data.message;
      return build(
        message.content.map((part) => part.text).join(''),
        (message.tool_calls ?? []).map(fromFunctionCall),
        detected.data.finish_reason,
        detected.data.usage
      );
    }
    case 'anthropic': {
      const blocks = detected.data.content;
      const toolCalls = blocks
        .filter((b) => b.type === 'tool_use')
        .map((b, i) => ({ id: b.id ?? `call_${i}`, name: b.name ?? '', arguments: JSON.stringify(b.input ?? {}) }));
      return build(
        blocks
          .filter((b) => b.type === 'text')
          .map((b) => b.text ?? '')
          .join(''),
        toolCalls,
        detected.data.stop_reason,
        detected.data.usage
      );
    }
    case 'gemini': {
      const candidate = detected.data.candidates[0];
      const parts = candidate.content?.parts ?? [];
      const toolCalls: CanonicalToolCall[] = [];
      parts.forEach((part, i) => {
        if (part.functionCall) {
          toolCalls.push({
            id: `call_${i}`,
            name: part.functionCall.name,
            arguments: JSON.stringify(part.functionCall.args ?? {}),
          });
        }
      });
      return build(
        parts
          .filter((part) => !part.thought)
          .map((part) => part.text ?? '')
          .join(''),
        toolCalls,
        toolCalls.length > 0 && candidate.finishReason === 'STOP' ? 'tool_calls' : candidate.finishReason,
        detected.data.usageMetadata
      );
    }
    case 'bedrock': {
      const content = detected.data.output.message.content;
      const toolCalls = content.flatMap((block) =>
        block.toolUse
          ? [{ id: block.toolUse.toolUseId, name: block.toolUse.name, arguments: JSON.stringify(block.toolUse.input ?? {}) }]
          : []
      );
      return build(
        content.map((block) => block.text ?? '').join(''),
        toolCalls,
        detected.data.stopReason,
        detected.data.usage
      );
    }
    case 'ollama': {
      const data = detected.data;
      return build(
        data.message?.content ?? data.response ?? '',
        [],
        data.done ? (data.done_reason ?? 'stop') : null,
        data
      );
    }
  }
}

function build(
  content: string,
  toolCalls: CanonicalToolCall[],
  finishReason: string | null | undefined,
  usage: unknown
): CanonicalChatResponse {
  const response: CanonicalChatResponse = {
    role: 'assistant',
    content,
    finishReason: normalizeFinishReason(finishReason),
  };
  if (toolCalls.length > 0) {
    response.toolCalls = toolCalls;
  }
  const tokens = normalizeUsage(usage);
  if (tokens) {
    response.usage = tokens;
  }
  return response;
}

function fromFunctionCall(call: z.infer<typeof functionCallSchema>, index: number): CanonicalToolCall {
  const args = call.function.arguments;
  return {
    id: call.id ?? `call_${index}`,
    name: call.function.name,
    arguments: typeof args === 'string' ? args : JSON.stringify(args ?? {}),
  };
}

// ============================================================================
// Stream event shapes, tried before the whole-response shapes
// ============================================================================

/** OpenAI-compatible `chat.completion.chunk` */
export const openaiDeltaSchema = z.object({
  choices: z.array(
    z.object({
      delta: z.object({
        role: z.string().optional(),
        content: z.string().nullish(),
        tool_calls: z
          .array(
            z.object({
              index: z.number().int().nonnegative(),
              id: z.string().optional(),
              function: z.object({ name: z.string().optional(), arguments: z.string().optional() }).optional(),
            })
          )
          .optional(),
      }),
      finish_reason: z.string().nullish(),
    })
  ),
  usage: z.unknown().optional(),
});

/** Anthropic messages streaming events */
export const anthropicEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('message_start'), message: z.object({ usage: z.unknown().optional() }) }),
  z.object({
    type: z.literal('content_block_start'),
    index: z.number(),
    content_block: z.object({ type: z.string(), id: z.string().optional(), name: z.string().optional(), text: z.string().optional() }),
  }),
  z.object({
    type: z.literal('content_block_delta'),
    index: z.number(),
    delta: z.object({ type: z.string(), text: z.string().optional(), partial_json: z.string().optional() }),
  }),
  z.object({ type: z.literal('content_block_stop'), index: z.number() }),
  z.object({
    type: z.literal('message_delta'),
    delta: z.object({ stop_reason: z.string().nullish() }),
    usage: z.unknown().optional(),
  }),
  z.object({ type: z.literal('message_stop') }),
  z.object({ type: z.literal('ping') }),
  z.object({ type: z.literal('error'), error: z.object({ type: z.string().optional(), message: z.string() }) }),
]);

/** Cohere v2 chat streaming events */
export const cohereEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('message-start') }),
  z.object({
    type: z.literal('content-start'),
  }),
  z.object({
    type: z.literal('content-delta'),
    delta: z.object({ message: z.object({ content: z.object({ text: z.string() }) }) }),
  }),
  z.object({ type: z.literal('content-end') }),
  z.object({
    type: z.literal('tool-call-start'),
    index: z.number().optional(),
    delta: z.object({
      message: z.object({
        tool_calls: z.object({ id: z.string(), function: z.object({ name: z.string(), arguments: z.string().optional() }) }),
      }),
    }),
  }),
  z.object({
    type: z.literal('tool-call-delta'),
    index: z.number().optional(),
    delta: z.object({
      message: z.object({ tool_calls: z.object({ function: z.object({ arguments: z.string() }) }) }),
    }),
  }),
  z.object({ type: z.literal('tool-call-end') }),
  z.object({
    type: z.literal('message-end'),
    delta: z.object({ finish_reason: z.string().nullish(), usage: z.unknown().optional() }).optional(),
  }),
]);

export type DetectedStreamEvent =
  | { format: 'openai-delta'; data: z.infer<typeof openaiDeltaSchema> }
  | { format: 'anthropic-event'; data: z.infer<typeof anthropicEventSchema> }
  | { format: 'cohere-event'; data: z.infer<typeof cohereEventSchema> }
  | DetectedResponse;

/**
 * Ordered trial parse for a single stream frame: the incremental event shapes
 * first, then the whole-response shapes.
 */
export function detectStreamEvent(frame: unknown): DetectedStreamEvent | null {
  const delta = openaiDeltaSchema.safeParse(frame);
  if (delta.success) return { format: 'openai-delta', data: delta.data };

  const anthropic = anthropicEventSchema.safeParse(frame);
  if (anthropic.success) return { format: 'anthropic-event', data: anthropic.data };

  const cohere = cohereEventSchema.safeParse(frame);
  if (cohere.success) return { format: 'cohere-event', data: cohere.data };

  return detectResponse(frame);
}
