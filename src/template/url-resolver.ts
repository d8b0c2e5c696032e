import { DEFAULT_PATHS } from '../types/provider.js';
import type { PathKey, ProviderConfig } from '../types/provider.js';
import type { ProviderRegistry } from '../registry/provider-registry.js';

const ABSOLUTE_URL = /^https?:\/\//i;
const PLACEHOLDER = /\{([A-Za-z0-9_.-]+)\}/g;
const MODEL_TOKENS = new Set(['model', 'model_name']);

/**
 * Builds the outgoing URL for `operation` on the named provider.
 * Throws ConfigError when the provider is not registered.
 */
export function resolveUrl(
  registry: ProviderRegistry,
  providerName: string,
  operation: PathKey,
  modelName: string
): string {
  return resolveProviderUrl(registry.get(providerName), operation, modelName);
}

export function resolveProviderUrl(
  provider: Readonly<ProviderConfig>,
  operation: PathKey,
  modelName: string
): string {
  const path = substitutePlaceholders(operationPath(provider, operation), modelName, provider.vars);
  if (ABSOLUTE_URL.test(path)) {
    return path;
  }
  return joinUrl(provider.endpoint, path);
}

/**
 * Configured path for `key`, else the default. `chatStream` falls back to
 * the chat path.
 */
export function operationPath(provider: Readonly<ProviderConfig>, key: PathKey): string {
  if (key === 'chatStream') {
    return provider.paths.chatStream ?? operationPath(provider, 'chat');
  }
  return provider.paths[key] ?? DEFAULT_PATHS[key];
}

/**
 * True when the provider's path for `operation` embeds the model name
 */
export function pathCarriesModel(provider: Readonly<ProviderConfig>, operation: PathKey): boolean {
  for (const match of operationPath(provider, operation).matchAll(PLACEHOLDER)) {
    if (MODEL_TOKENS.has(match[1])) {
      return true;
    }
  }
  return false;
}

/**
 * Replaces `{model}`/`{model_name}` and `{var}` tokens in one left-to-right
 * scan. Replacement text is never rescanned; unknown tokens are kept as is.
 */
export function substitutePlaceholders(path: string, modelName: string, vars: Readonly<Record<string, string>>): string {
  return path.replace(PLACEHOLDER, (token, key: string) => {
    if (MODEL_TOKENS.has(key)) {
      return modelName;
    }
    return Object.prototype.hasOwnProperty.call(vars, key) ? vars[key] : token;
  });
}

export function joinUrl(endpoint: string, path: string): string {
  const base = endpoint.replace(/\/+$/, '');
  const tail = path.replace(/^\/+/, '');
  return tail ? `${base}/${tail}` : base;
}
