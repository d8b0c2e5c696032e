import { ConfigError } from '../errors/errors.js';
import { PATH_KEYS, TEMPLATED_OPERATIONS } from '../types/provider.js';
import type { ProviderConfig, ProviderConfigInput, TemplateRule, TemplatedOperation } from '../types/provider.js';
import logger from '../config/logger.js';

export type ProviderPatch = Partial<Omit<ProviderConfig, 'name'>>;

/**
 * Holds provider configuration. Readers always see one immutable snapshot;
 * writers build a new map and swap it in, so in-flight requests are never
 * blocked or handed a half-updated record.
 */
export class ProviderRegistry {
  private snapshot: ReadonlyMap<string, Readonly<ProviderConfig>>;

  constructor(providers: ProviderConfigInput[] = []) {
    const initial = new Map<string, Readonly<ProviderConfig>>();
    for (const input of providers) {
      const config = normalizeProvider(input);
      if (initial.has(config.name)) {
        throw new ConfigError(`Duplicate provider: ${config.name}`, { provider: config.name });
      }
      initial.set(config.name, config);
    }
    this.snapshot = initial;
  }

  get(name: string): Readonly<ProviderConfig> {
    const config = this.snapshot.get(name);
    if (!config) {
      throw new ConfigError(`Unknown provider: ${name}`, { provider: name });
    }
    return config;
  }

  find(name: string): Readonly<ProviderConfig> | undefined {
    return this.snapshot.get(name);
  }

  has(name: string): boolean {
    return this.snapshot.has(name);
  }

  names(): string[] {
    return [...this.snapshot.keys()].sort();
  }

  list(): Readonly<ProviderConfig>[] {
    return this.names().map((name) => this.get(name));
  }

  add(input: ProviderConfigInput): Readonly<ProviderConfig> {
    const config = normalizeProvider(input);
    if (this.snapshot.has(config.name)) {
      throw new ConfigError(`Provider already exists: ${config.name}`, { provider: config.name });
    }
    this.swap((next) => next.set(config.name, config));
    logger.info({ provider: config.name }, 'Provider added');
    return config;
  }

  update(name: string, patch: ProviderPatch): Readonly<ProviderConfig> {
    const current = this.get(name);
    const config = normalizeProvider({ ...current, ...patch, name });
    this.swap((next) => next.set(name, config));
    logger.info({ provider: name }, 'Provider updated');
    return config;
  }

  /**
   * Adds the provider or replaces it wholesale
   */
  upsert(input: ProviderConfigInput): Readonly<ProviderConfig> {
    const config = normalizeProvider(input);
    this.swap((next) => next.set(config.name, config));
    return config;
  }

  remove(name: string): void {
    if (!this.snapshot.has(name)) {
      throw new ConfigError(`Unknown provider: ${name}`, { provider: name });
    }
    this.swap((next) => next.delete(name));
    logger.info({ provider: name }, 'Provider removed');
  }

  private swap(mutate: (next: Map<string, Readonly<ProviderConfig>>) => void): void {
    const next = new Map(this.snapshot);
    mutate(next);
    this.snapshot = next;
  }
}

function normalizeProvider(input: ProviderConfigInput): Readonly<ProviderConfig> {
  if (!input.name || input.name.includes(':')) {
    throw new ConfigError(`Invalid provider name: "${input.name}"`, { provider: input.name });
  }
  if (!/^https?:\/\//.test(input.endpoint)) {
    throw new ConfigError(`Provider endpoint must be an http(s) URL: ${input.endpoint}`, { provider: input.name });
  }
  if (input.maxConcurrent !== undefined && (!Number.isInteger(input.maxConcurrent) || input.maxConcurrent < 1)) {
    throw new ConfigError(`maxConcurrent must be a positive integer`, { provider: input.name });
  }

  const paths = { ...input.paths };
  for (const key of Object.keys(paths)) {
    if (!(PATH_KEYS as readonly string[]).includes(key)) {
      throw new ConfigError(`Unknown operation path: ${key}`, { provider: input.name });
    }
  }

  const chatTemplates = (input.chatTemplates ?? []).map((rule) => validateRule(input.name, rule));
  const templates: Partial<Record<TemplatedOperation, TemplateRule[]>> = {};
  for (const [key, rules] of Object.entries(input.templates ?? {})) {
    const operation = TEMPLATED_OPERATIONS.find((candidate) => candidate === key);
    if (!operation) {
      throw new ConfigError(`Templates are not supported for operation: ${key}`, { provider: input.name });
    }
    templates[operation] = (rules ?? []).map((rule) => validateRule(input.name, rule));
  }

  return Object.freeze({
    name: input.name,
    endpoint: input.endpoint,
    paths: Object.freeze(paths),
    headers: Object.freeze({ ...input.headers }),
    vars: Object.freeze({ ...input.vars }),
    chatTemplates,
    templates: Object.freeze(templates),
    maxConcurrent: input.maxConcurrent,
  });
}

function validateRule(provider: string, rule: TemplateRule): TemplateRule {
  try {
    new RegExp(rule.pattern);
  } catch (error) {
    throw new ConfigError(`Invalid template pattern "${rule.pattern}"`, { provider, cause: error });
  }
  return Object.freeze({ pattern: rule.pattern, template: rule.template });
}
