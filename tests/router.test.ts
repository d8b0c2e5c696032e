import { describe, it, expect, beforeEach } from 'vitest';
import fc from 'fast-check';
import { Router } from '../src/router/router.js';
import { AliasRegistry } from '../src/router/alias-registry.js';
import { ProviderRegistry } from '../src/registry/provider-registry.js';
import { ConfigError, GatewayError } from '../src/errors/errors.js';
import type { ProviderConfigInput } from '../src/types/index.js';

const providers: ProviderConfigInput[] = [
  { name: 'openai', endpoint: 'https://api.openai.com/v1' },
  { name: 'ollama', endpoint: 'http://localhost:11434' },
  { name: 'anthropic', endpoint: 'https://api.anthropic.com/v1' },
];

function routeError(fn: () => unknown): GatewayError {
  try {
    fn();
  } catch (error) {
    if (error instanceof GatewayError) return error;
    throw error;
  }
  throw new Error('expected a GatewayError');
}

describe('Router', () => {
  let registry: ProviderRegistry;
  let aliases: AliasRegistry;
  let router: Router;

  beforeEach(() => {
    registry = new ProviderRegistry(providers);
    aliases = new AliasRegistry({ fast: 'openai:gpt-4o-mini', local: 'ollama:llama3:8b' });
    router = new Router(registry, aliases);
  });

  describe('resolve', () => {
    it('1. resolves aliases first', () => {
      expect(router.resolve('fast')).toEqual({ provider: 'openai', model: 'gpt-4o-mini', via: 'alias' });
      expect(router.resolve('local')).toEqual({ provider: 'ollama', model: 'llama3:8b', via: 'alias' });
    });

    it('2. splits provider:model on the first colon when the prefix is a provider', () => {
      expect(router.resolve('ollama:llama3:8b')).toEqual({ provider: 'ollama', model: 'llama3:8b', via: 'explicit' });
      expect(router.resolve(' openai:gpt-4 ')).toEqual({ provider: 'openai', model: 'gpt-4', via: 'explicit' });
    });

    it('3. rejects a bare model name without a filter as ambiguous', () => {
      const error = routeError(() => router.resolve('gpt-4'));

      expect([error.statusCode, error.code]).toEqual([400, 'ambiguous_model']);
    });

    it('4. does not treat an unregistered prefix as a provider', () => {
      const error = routeError(() => router.resolve('llama3:8b'));

      expect(error.code).toBe('ambiguous_model');
    });

    it('5. rejects an empty model and a missing model after the prefix', () => {
      expect(routeError(() => router.resolve('')).code).toBe('invalid_model');
      expect(routeError(() => router.resolve('openai:')).code).toBe('invalid_model');
    });
  });

  describe('with a gateway filter', () => {
    it('1. routes an unprefixed colon-bearing model to the pinned provider', () => {
      const pinned = new Router(registry, aliases, { provider: 'ollama', model: 'llama3:8b' });

      expect(pinned.resolve('llama3:8b')).toEqual({ provider: 'ollama', model: 'llama3:8b', via: 'filter' });
      expect(pinned.resolve('')).toEqual({ provider: 'ollama', model: 'llama3:8b', via: 'filter' });
      expect(pinned.resolve('ollama:llama3:8b').via).toBe('explicit');
      expect(pinned.resolve('local').via).toBe('alias');
    });

    it('2. answers 404 for another bare model', () => {
      const pinned = new Router(registry, aliases, { provider: 'ollama', model: 'llama3:8b' });

      const error = routeError(() => pinned.resolve('mistral'));

      expect([error.statusCode, error.code]).toEqual([404, 'model_not_found']);
    });

    it('3. answers 403 for a route outside the filter', () => {
      const pinned = new Router(registry, aliases, { provider: 'ollama' });

      expect(routeError(() => pinned.resolve('openai:gpt-4')).statusCode).toBe(403);
      expect(routeError(() => pinned.resolve('fast')).code).toBe('model_not_allowed');
      expect(pinned.resolve('mistral')).toEqual({ provider: 'ollama', model: 'mistral', via: 'filter' });
    });

    it('4. lists only the pinned provider', () => {
      expect(new Router(registry, aliases, { provider: 'ollama' }).permittedProviders()).toEqual(['ollama']);
      expect(new Router(registry, aliases, { provider: 'missing' }).permittedProviders()).toEqual([]);
      expect(router.permittedProviders()).toEqual(['anthropic', 'ollama', 'openai']);
    });

    it('5. keeps the filter fixed for the router lifetime', () => {
      const filter = { provider: 'ollama' };
      const pinned = new Router(registry, aliases, filter);
      filter.provider = 'openai';

      expect(pinned.getFilter()).toEqual({ provider: 'ollama' });
    });
  });

  describe('property-based tests', () => {
    it('explicit routes keep everything after the first colon', () => {
      fc.assert(
        fc.property(fc.constantFrom('openai', 'ollama', 'anthropic'), fc.stringMatching(/^[a-z0-9][a-z0-9.:-]{0,20}$/), (p, m) => {
          expect(router.resolve(`${p}:${m}`)).toEqual({ provider: p, model: m, via: 'explicit' });
        })
      );
    });
  });
});

describe('AliasRegistry', () => {
  it('should reject malformed targets and chains', () => {
    expect(() => new AliasRegistry({ a: 'no-colon' })).toThrow(ConfigError);
    expect(() => new AliasRegistry({ a: 'openai:' })).toThrow(ConfigError);
    expect(() => new AliasRegistry({ 'openai:x': 'openai:gpt-4', b: 'openai:x' })).toThrow('chains are not allowed');
  });

  it('should set, list, remove and replace aliases', () => {
    const aliases = new AliasRegistry();

    aliases.set('fast', 'openai:gpt-4o-mini');
    expect(aliases.list()).toEqual({ fast: 'openai:gpt-4o-mini' });
    expect(aliases.remove('fast')).toBe(true);
    expect(aliases.remove('fast')).toBe(false);

    aliases.replace({ local: 'ollama:llama3:8b' });
    expect(aliases.resolve('local')).toEqual({ provider: 'ollama', model: 'llama3:8b' });
    expect(aliases.has('fast')).toBe(false);
  });

  it('should keep the old table when a replacement is invalid', () => {
    const aliases = new AliasRegistry({ fast: 'openai:gpt-4o-mini' });

    expect(() => aliases.replace({ broken: 'nope' })).toThrow(ConfigError);
    expect(aliases.list()).toEqual({ fast: 'openai:gpt-4o-mini' });
  });
});

describe('ProviderRegistry', () => {
  it('1. fills defaults and freezes records', () => {
    const registry = new ProviderRegistry([{ name: 'openai', endpoint: 'https://api.openai.com/v1' }]);
    const config = registry.get('openai');

    expect(config).toEqual({
      name: 'openai',
      endpoint: 'https://api.openai.com/v1',
      paths: {},
      headers: {},
      vars: {},
      chatTemplates: [],
      templates: {},
      maxConcurrent: undefined,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('2. rejects invalid providers', () => {
    expect(() => new ProviderRegistry([{ name: 'a:b', endpoint: 'https://x.test' }])).toThrow('Invalid provider name');
    expect(() => new ProviderRegistry([{ name: 'a', endpoint: 'ftp://x.test' }])).toThrow('http(s) URL');
    expect(() => new ProviderRegistry([{ name: 'a', endpoint: 'https://x.test', maxConcurrent: 0 }])).toThrow(
      'maxConcurrent'
    );
    expect(
      () => new ProviderRegistry([{ name: 'a', endpoint: 'https://x.test', chatTemplates: [{ pattern: '(', template: '{}' }] }])
    ).toThrow('Invalid template pattern');
    expect(
      () =>
        new ProviderRegistry([
          { name: 'a', endpoint: 'https://x.test', templates: { images: [{ pattern: '[', template: '{}' }] } },
        ])
    ).toThrow('Invalid template pattern "["');
    const paths: Record<string, string> = { stream: '/s' };
    expect(() => new ProviderRegistry([{ name: 'a', endpoint: 'https://x.test', paths }])).toThrow(
      'Unknown operation path: stream'
    );
    expect(
      () =>
        new ProviderRegistry([
          { name: 'a', endpoint: 'https://x.test' },
          { name: 'a', endpoint: 'https://y.test' },
        ])
    ).toThrow('Duplicate provider: a');
  });

  it('3. add, update and remove swap the snapshot', () => {
    const registry = new ProviderRegistry();
    const added = registry.add({ name: 'ollama', endpoint: 'http://localhost:11434' });

    const updated = registry.update('ollama', { headers: { 'x-team': 'ml' } });

    expect(added.headers).toEqual({});
    expect(updated.headers).toEqual({ 'x-team': 'ml' });
    expect(() => registry.add({ name: 'ollama', endpoint: 'http://localhost:11434' })).toThrow('already exists');

    registry.remove('ollama');
    expect(registry.has('ollama')).toBe(false);
    expect(() => registry.get('ollama')).toThrow('Unknown provider: ollama');
    expect(() => registry.remove('ollama')).toThrow(ConfigError);
  });
});
