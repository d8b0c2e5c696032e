// Provider configuration and model metadata types

// ============================================================================
// Provider Configuration
// ============================================================================

export const OPERATIONS = ['chat', 'models', 'images', 'speech', 'embeddings', 'audio'] as const;

export type Operation = (typeof OPERATIONS)[number];

export const DEFAULT_PATHS: Readonly<Record<Operation, string>> = {
  chat: '/chat/completions',
  models: '/models',
  images: '/images/generations',
  speech: '/audio/speech',
  embeddings: '/embeddings',
  audio: '/audio/transcriptions',
};

/**
 * Path keys a provider may set: one per operation, plus `chatStream` for
 * backends that stream from a different path than they answer on
 */
export const PATH_KEYS = [...OPERATIONS, 'chatStream'] as const;

export type PathKey = (typeof PATH_KEYS)[number];

/** Operations besides chat whose JSON request body may come from a template */
export const TEMPLATED_OPERATIONS = ['embeddings', 'images', 'speech'] as const;

export type TemplatedOperation = (typeof TEMPLATED_OPERATIONS)[number];

/**
 * One entry of an ordered request-template list. The first entry whose
 * `pattern` (a regular expression) matches the model name is used.
 */
export interface TemplateRule {
  pattern: string;
  template: string;
}

export type ChatTemplateRule = TemplateRule;

export interface ProviderConfig {
  name: string;
  endpoint: string;
  paths: Partial<Record<PathKey, string>>;
  headers: Record<string, string>;
  vars: Record<string, string>;
  chatTemplates: ChatTemplateRule[];
  /** Request templates for the other JSON operations */
  templates: Partial<Record<TemplatedOperation, TemplateRule[]>>;
  /** Cap on concurrent outbound calls to this provider */
  maxConcurrent?: number;
}

type Defaulted = 'paths' | 'headers' | 'vars' | 'chatTemplates' | 'templates';

export type ProviderConfigInput = Omit<ProviderConfig, Defaulted> & Partial<Pick<ProviderConfig, Defaulted>>;

// ============================================================================
// Model Metadata
// ============================================================================

export interface ModelCapabilities {
  tools: boolean;
  vision: boolean;
  audio: boolean;
  reasoning: boolean;
}

export interface ModelPricing {
  /** USD per million input tokens */
  input?: number;
  /** USD per million output tokens */
  output?: number;
}

export interface ModelInfo {
  id: string;
  displayName?: string;
  capabilities: ModelCapabilities;
  contextLength?: number;
  pricing?: ModelPricing;
  created?: number;
}

export interface ModelCacheEntry {
  provider: string;
  models: ModelInfo[];
  /** Unix timestamp in milliseconds */
  refreshedAt: number;
  ttlMs: number;
}
