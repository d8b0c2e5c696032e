import { z } from 'zod';
import type { FinishReason, TokenUsage } from '../types/index.js';

const count = z.coerce.number().int().nonnegative();

const pairSchema = z.object({ input_tokens: count.optional(), output_tokens: count.optional() });

const usageSchema = z.object({
  prompt_tokens: count.optional(),
  completion_tokens: count.optional(),
  total_tokens: count.optional(),
  input_tokens: count.optional(),
  output_tokens: count.optional(),
  inputTokens: count.optional(),
  outputTokens: count.optional(),
  totalTokens: count.optional(),
  promptTokenCount: count.optional(),
  candidatesTokenCount: count.optional(),
  totalTokenCount: count.optional(),
  prompt_eval_count: count.optional(),
  eval_count: count.optional(),
  tokens: pairSchema.optional(),
  billed_units: pairSchema.optional(),
});

const metricsSchema = z.array(z.object({ metric: z.string(), value: count }));

/**
 * Reads token counts under any of the known naming schemes. Returns undefined
 * when the value carries no counts at all.
 */
export function normalizeUsage(raw: unknown): TokenUsage | undefined {
  const metrics = metricsSchema.safeParse(raw);
  if (metrics.success) {
    return fromMetrics(metrics.data);
  }

  const parsed = usageSchema.safeParse(raw);
  if (!parsed.success) {
    return undefined;
  }
  const u = parsed.data;
  const pair = u.tokens ?? u.billed_units;

  const input =
    u.prompt_tokens ?? u.input_tokens ?? u.inputTokens ?? u.promptTokenCount ?? u.prompt_eval_count ?? pair?.input_tokens;
  const output =
    u.completion_tokens ??
    u.output_tokens ??
    u.outputTokens ??
    u.candidatesTokenCount ??
    u.eval_count ??
    pair?.output_tokens;

  if (input === undefined && output === undefined) {
    return undefined;
  }
  const inputTokens = input ?? 0;
  const outputTokens = output ?? 0;
  return {
    inputTokens,
    outputTokens,
    totalTokens: u.total_tokens ?? u.totalTokens ?? u.totalTokenCount ?? inputTokens + outputTokens,
  };
}

function fromMetrics(metrics: { metric: string; value: number }[]): TokenUsage | undefined {
  const find = (name: string) => metrics.find((m) => m.metric === name)?.value;
  const input = find('num_prompt_tokens');
  const output = find('num_completion_tokens');
  if (input === undefined && output === undefined) {
    return undefined;
  }
  const inputTokens = input ?? 0;
  const outputTokens = output ?? 0;
  return { inputTokens, outputTokens, totalTokens: find('num_total_tokens') ?? inputTokens + outputTokens };
}

const FINISH_REASONS: Readonly<Record<string, FinishReason>> = {
  stop: 'stop',
  end_turn: 'stop',
  stop_sequence: 'stop',
  complete: 'stop',
  eos: 'stop',
  eos_token: 'stop',
  length: 'length',
  max_tokens: 'length',
  model_length: 'length',
  tool_calls: 'tool_calls',
  tool_call: 'tool_calls',
  tool_use: 'tool_calls',
  function_call: 'tool_calls',
  content_filter: 'content_filter',
  content_filtered: 'content_filter',
  safety: 'content_filter',
  recitation: 'content_filter',
  blocklist: 'content_filter',
  prohibited_content: 'content_filter',
  guardrail_intervened: 'content_filter',
  error_toxic: 'content_filter',
};

/**
 * Maps provider stop reasons onto the OpenAI set. Unknown non-empty reasons
 * are reported as `stop`.
 */
export function normalizeFinishReason(raw: string | null | undefined): FinishReason | null {
  if (!raw) {
    return null;
  }
  return FINISH_REASONS[raw.toLowerCase()] ?? 'stop';
}
