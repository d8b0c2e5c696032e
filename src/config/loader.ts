import { readFileSync } from 'fs';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError } from '../errors/errors.js';
import { DEFAULT_TRANSPORT_SETTINGS } from '../transport/http-transport.js';
import { DEFAULT_MODEL_CACHE_TTL_MS } from '../models/model-cache.js';
import type { Configuration } from './types.js';
import logger from './logger.js';

export const GATEWAY_API_KEY_ENV = 'LMGATE_API_KEY';

type Env = Record<string, string | undefined>;

const templateRuleSchema = z.object({ pattern: z.string(), template: z.string() });

const providerSchema = z.object({
  name: z.string().min(1),
  endpoint: z.string().min(1),
  paths: z.record(z.string(), z.string()).default({}),
  headers: z.record(z.string(), z.string()).default({}),
  vars: z.record(z.string(), z.coerce.string()).default({}),
  chatTemplates: z.array(templateRuleSchema).default([]),
  templates: z
    .object({
      embeddings: z.array(templateRuleSchema).optional(),
      images: z.array(templateRuleSchema).optional(),
      speech: z.array(templateRuleSchema).optional(),
    })
    .strict()
    .default({}),
  maxConcurrent: z.number().int().positive().optional(),
});

const credentialSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('api-key'), key: z.string().optional(), keyEnv: z.string().optional() }),
  z.object({
    type: z.literal('header'),
    name: z.string().min(1),
    value: z.string().optional(),
    valueEnv: z.string().optional(),
  }),
  z.object({
    type: z.literal('oauth'),
    token: z.string().optional(),
    tokenEnv: z.string().optional(),
    expiresAt: z.number().optional(),
    refreshUrl: z.string().url().optional(),
    refreshKey: z.string().optional(),
    refreshKeyEnv: z.string().optional(),
  }),
  z.object({
    type: z.literal('service-account'),
    file: z.string().optional(),
    json: z.string().optional(),
    jsonEnv: z.string().optional(),
    tokenUrl: z.string().url().optional(),
    scope: z.string().optional(),
    audience: z.string().optional(),
  }),
]);

const configSchema = z.object({
  gateway: z
    .object({
      host: z.string().default('127.0.0.1'),
      port: z.number().int().min(0).max(65535).default(8080),
      provider: z.string().optional(),
      model: z.string().optional(),
      apiKey: z.string().optional(),
      apiKeyEnv: z.string().optional(),
      generateApiKey: z.boolean().default(false),
    })
    .default({}),
  transport: z
    .object({
      timeoutMs: z.number().int().positive().default(DEFAULT_TRANSPORT_SETTINGS.timeoutMs),
      streamIdleTimeoutMs: z.number().int().positive().default(DEFAULT_TRANSPORT_SETTINGS.streamIdleTimeoutMs),
      maxRetries: z.number().int().min(0).default(DEFAULT_TRANSPORT_SETTINGS.maxRetries),
      retryBaseDelayMs: z.number().int().min(0).default(DEFAULT_TRANSPORT_SETTINGS.retryBaseDelayMs),
    })
    .default({}),
  modelCache: z
    .object({
      ttlMs: z.number().int().positive().default(DEFAULT_MODEL_CACHE_TTL_MS),
    })
    .default({}),
  defaultProvider: z.string().optional(),
  providers: z.array(providerSchema).default([]),
  credentials: z.record(z.string(), credentialSchema).default({}),
  aliases: z.record(z.string(), z.string()).default({}),
});

/**
 * Parses YAML configuration text, applying defaults. The gateway key may come
 * from `gateway.apiKeyEnv` or LMGATE_API_KEY instead of the file.
 */
export function parseConfig(text: string, env: Env = process.env, source = 'configuration'): Configuration {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${source}`, { cause: error });
  }

  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ConfigError(`Invalid ${source}: ${where}${issue?.message ?? 'unknown error'}`);
  }

  const { apiKeyEnv, ...gateway } = result.data.gateway;
  const apiKey = gateway.apiKey ?? (apiKeyEnv ? env[apiKeyEnv] : undefined) ?? env[GATEWAY_API_KEY_ENV];

  const names = new Set<string>();
  for (const provider of result.data.providers) {
    if (names.has(provider.name)) {
      throw new ConfigError(`Duplicate provider in ${source}: ${provider.name}`, { provider: provider.name });
    }
    names.add(provider.name);
  }
  if (gateway.provider && !names.has(gateway.provider)) {
    throw new ConfigError(`gateway.provider "${gateway.provider}" is not a configured provider`);
  }

  return {
    ...result.data,
    gateway: { ...gateway, ...(apiKey ? { apiKey } : {}) },
  };
}

export function loadConfig(configPath: string, env: Env = process.env): Configuration {
  let fileContents: string;
  try {
    fileContents = readFileSync(configPath, 'utf8');
  } catch (error) {
    logger.error({ error, configPath }, 'Failed to load configuration');
    throw new ConfigError(`Failed to read configuration from ${configPath}`, { cause: error });
  }

  const config = parseConfig(fileContents, env, configPath);
  logger.info({ configPath, providers: config.providers.length }, 'Configuration loaded successfully');
  return config;
}
