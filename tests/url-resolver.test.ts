import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { ProviderRegistry } from '../src/registry/provider-registry.js';
import {
  joinUrl,
  pathCarriesModel,
  resolveProviderUrl,
  resolveUrl,
  substitutePlaceholders,
} from '../src/template/url-resolver.js';
import { ConfigError } from '../src/errors/errors.js';

describe('resolveUrl', () => {
  const registry = new ProviderRegistry([
    { name: 'openai', endpoint: 'https://api.openai.com/v1' },
    {
      name: 'gemini',
      endpoint: 'https://generativelanguage.googleapis.com/v1beta/',
      paths: { chat: '/models/{model}:generateContent' },
    },
    {
      name: 'vertex',
      endpoint: 'https://aiplatform.googleapis.com/v1',
      paths: { chat: 'https://{region}-aiplatform.googleapis.com/v1/projects/{project}/models/{model_name}' },
      vars: { region: 'europe-west4', project: 'demo' },
    },
  ]);

  it('1. joins the default chat path to the endpoint', () => {
    expect(resolveUrl(registry, 'openai', 'chat', 'gpt-4')).toBe('https://api.openai.com/v1/chat/completions');
  });

  it('2. uses the default path of every other operation', () => {
    expect(resolveUrl(registry, 'openai', 'models', '')).toBe('https://api.openai.com/v1/models');
    expect(resolveUrl(registry, 'openai', 'embeddings', 'x')).toBe('https://api.openai.com/v1/embeddings');
    expect(resolveUrl(registry, 'openai', 'images', 'x')).toBe('https://api.openai.com/v1/images/generations');
    expect(resolveUrl(registry, 'openai', 'speech', 'x')).toBe('https://api.openai.com/v1/audio/speech');
    expect(resolveUrl(registry, 'openai', 'audio', 'x')).toBe('https://api.openai.com/v1/audio/transcriptions');
  });

  it('3. substitutes the model into a custom path and trims duplicate slashes', () => {
    expect(resolveUrl(registry, 'gemini', 'chat', 'gemini-2.0-flash')).toBe(
      'https://generativelanguage.googleapis.com/v1beta/models/gemini-2.0-flash:generateContent'
    );
  });

  it('4. uses an absolute path verbatim after substitution', () => {
    expect(resolveUrl(registry, 'vertex', 'chat', 'gemini-pro')).toBe(
      'https://europe-west4-aiplatform.googleapis.com/v1/projects/demo/models/gemini-pro'
    );
  });

  it('5. throws ConfigError for an unknown provider', () => {
    expect(() => resolveUrl(registry, 'nope', 'chat', 'm')).toThrow(ConfigError);
  });

  it('6. reports whether a path carries the model', () => {
    expect(pathCarriesModel(registry.get('gemini'), 'chat')).toBe(true);
    expect(pathCarriesModel(registry.get('vertex'), 'chat')).toBe(true);
    expect(pathCarriesModel(registry.get('openai'), 'chat')).toBe(false);
  });

  it('7. resolves against a provider record directly', () => {
    expect(resolveProviderUrl(registry.get('openai'), 'chat', 'gpt-4')).toBe('https://api.openai.com/v1/chat/completions');
  });
});

describe('substitutePlaceholders', () => {
  it('should replace every occurrence of model tokens', () => {
    expect(substitutePlaceholders('/{model}/{model_name}/{model}', 'm1', {})).toBe('/m1/m1/m1');
  });

  it('should let model tokens win over a var of the same name', () => {
    expect(substitutePlaceholders('/{model}', 'real', { model: 'shadow' })).toBe('/real');
  });

  it('should keep unknown tokens intact', () => {
    expect(substitutePlaceholders('/{region}/{model}', 'm', {})).toBe('/{region}/m');
  });

  it('should not expand text that substitution inserted', () => {
    expect(substitutePlaceholders('/{a}', 'm', { a: '{model}', model: 'x' })).toBe('/{model}');
    expect(substitutePlaceholders('/{model}', '{a}', { a: 'b' })).toBe('/{a}');
  });
});

describe('joinUrl', () => {
  it('should keep the endpoint when the path is empty', () => {
    expect(joinUrl('http://localhost:11434/', '/')).toBe('http://localhost:11434');
  });

  it('should never produce a double slash at the join', () => {
    const segment = fc.stringMatching(/^[a-z0-9]{1,8}$/);
    fc.assert(
      fc.property(
        segment,
        fc.nat({ max: 3 }),
        fc.nat({ max: 3 }),
        segment,
        (host, trailing, leading, path) => {
          const url = joinUrl(`https://${host}.test/api${'/'.repeat(trailing)}`, `${'/'.repeat(leading)}${path}`);
          expect(url).toBe(`https://${host}.test/api/${path}`);
        }
      )
    );
  });

  it('should substitute every placeholder occurrence for any model name', () => {
    fc.assert(
      fc.property(fc.stringMatching(/^[A-Za-z0-9._-]{1,20}$/), (model) => {
        const resolved = substitutePlaceholders('/a/{model}/b/{model_name}/{model}', model, {});
        expect(resolved).toBe(`/a/${model}/b/${model}/${model}`);
        expect(resolved).not.toContain('{model');
      })
    );
  });
});
