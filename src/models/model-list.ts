import { z } from 'zod';
import { UpstreamFormatError } from '../errors/errors.js';
import type { ModelCapabilities, ModelInfo } from '../types/index.js';

const modelItemSchema = z.union([
  z.string().min(1),
  z
    .object({
      id: z.string().optional(),
      name: z.string().optional(),
      model: z.string().optional(),
      display_name: z.string().optional(),
      displayName: z.string().optional(),
      created: z.number().optional(),
      context_length: z.number().optional(),
      context_window: z.number().optional(),
      max_context_length: z.number().optional(),
      inputTokenLimit: z.number().optional(),
      capabilities: z.union([z.array(z.string()), z.record(z.string(), z.unknown())]).optional(),
      supported_parameters: z.array(z.string()).optional(),
      supportedGenerationMethods: z.array(z.string()).optional(),
      architecture: z.object({ input_modalities: z.array(z.string()).optional() }).optional(),
      pricing: z
        .object({ prompt: z.coerce.number().optional(), completion: z.coerce.number().optional() })
        .optional(),
    })
    .passthrough(),
]);

type ModelItem = z.infer<typeof modelItemSchema>;

const modelListSchema = z.union([
  z.object({ data: z.array(modelItemSchema) }),
  z.object({ models: z.array(modelItemSchema) }),
  z.array(modelItemSchema),
]);

/**
 * Parses a provider's model listing. Accepts `{data: [...]}`, `{models: [...]}`
 * or a bare array, with string or object entries.
 */
export function parseModelList(body: string, provider?: string): ModelInfo[] {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new UpstreamFormatError('Model list is not valid JSON', {
      provider,
      operation: 'models',
      upstreamBody: body,
      cause: error,
    });
  }

  const parsed = modelListSchema.safeParse(json);
  if (!parsed.success) {
    throw new UpstreamFormatError('Model list matches no known format', {
      provider,
      operation: 'models',
      upstreamBody: body,
    });
  }

  const items = Array.isArray(parsed.data) ? parsed.data : 'data' in parsed.data ? parsed.data.data : parsed.data.models;
  const seen = new Set<string>();
  const models: ModelInfo[] = [];
  for (const item of items) {
    const info = toModelInfo(item);
    if (info && !seen.has(info.id)) {
      seen.add(info.id);
      models.push(info);
    }
  }
  return models.sort((a, b) => a.id.localeCompare(b.id));
}

function toModelInfo(item: ModelItem): ModelInfo | null {
  if (typeof item === 'string') {
    return { id: stripPrefix(item), capabilities: detectCapabilities(item) };
  }
  const rawId = item.id ?? item.name ?? item.model;
  if (!rawId) {
    return null;
  }
  const id = stripPrefix(rawId);
  const info: ModelInfo = { id, capabilities: detectCapabilities(id, item) };

  const displayName = item.display_name ?? item.displayName ?? (item.id && item.name !== item.id ? item.name : undefined);
  if (displayName) info.displayName = displayName;

  const contextLength = item.context_length ?? item.context_window ?? item.max_context_length ?? item.inputTokenLimit;
  if (contextLength !== undefined) info.contextLength = contextLength;

  if (item.created !== undefined) info.created = item.created;

  if (item.pricing && (item.pricing.prompt !== undefined || item.pricing.completion !== undefined)) {
    // Listings price per token; store per million
    info.pricing = {
      ...(item.pricing.prompt !== undefined && { input: item.pricing.prompt * 1_000_000 }),
      ...(item.pricing.completion !== undefined && { output: item.pricing.completion * 1_000_000 }),
    };
  }
  return info;
}

/**
 * Gemini lists models as `models/<id>`
 */
function stripPrefix(id: string): string {
  return id.startsWith('models/') ? id.slice('models/'.length) : id;
}

function detectCapabilities(id: string, item?: Exclude<ModelItem, string>): ModelCapabilities {
  const flags = new Set<string>();
  if (item) {
    const caps = item.capabilities;
    if (Array.isArray(caps)) {
      caps.forEach((c) => flags.add(c.toLowerCase()));
    } else if (caps) {
      for (const [name, enabled] of Object.entries(caps)) {
        if (enabled === true) flags.add(name.toLowerCase());
      }
    }
    item.supported_parameters?.forEach((p) => flags.add(p.toLowerCase()));
    item.architecture?.input_modalities?.forEach((m) => flags.add(m.toLowerCase()));
  }

  const lower = id.toLowerCase();
  return {
    tools: flags.has('tools') || flags.has('function_calling') || flags.has('tool_use'),
    vision: flags.has('vision') || flags.has('image'),
    audio: flags.has('audio') || lower.includes('audio'),
    reasoning: flags.has('reasoning') || flags.has('thinking') || /(^|[-/])o[134]([-.]|$)|reason/.test(lower),
  };
}
