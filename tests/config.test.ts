import { describe, it, expect, beforeEach, vi } from 'vitest';
import { fileURLToPath } from 'url';

const mockFileWatcher = vi.hoisted(() => ({
  handlers: new Map<string, (path: string) => void>(),
  on: vi.fn(),
  close: vi.fn(async () => undefined),
}));

vi.mock('chokidar', () => ({
  watch: vi.fn(() => mockFileWatcher),
}));

import { watch } from 'chokidar';
import { loadConfig, parseConfig } from '../src/config/loader.js';
import { ConfigWatcher } from '../src/config/watcher.js';
import { createRuntime } from '../src/index.js';
import { resolveProviderUrl } from '../src/template/url-resolver.js';
import type { Runtime } from '../src/index.js';
import { ConfigError } from '../src/errors/errors.js';
import type { Configuration } from '../src/types/index.js';

const BASE_YAML = `
providers:
  - name: openai
    endpoint: https://api.openai.com/v1
  - name: ollama
    endpoint: http://localhost:11434
    maxConcurrent: 2
credentials:
  openai:
    type: api-key
    key: test-secret
aliases:
  fast: openai:gpt-4o-mini
`;

describe('parseConfig', () => {
  it('1. applies defaults', () => {
    const config = parseConfig('providers:\n  - name: openai\n    endpoint: https://api.openai.com/v1\n', {});

    expect(config).toEqual({
      gateway: { host: '127.0.0.1', port: 8080, generateApiKey: false },
      transport: { timeoutMs: 120_000, streamIdleTimeoutMs: 60_000, maxRetries: 3, retryBaseDelayMs: 250 },
      modelCache: { ttlMs: 86_400_000 },
      providers: [
        {
          name: 'openai',
          endpoint: 'https://api.openai.com/v1',
          paths: {},
          headers: {},
          vars: {},
          chatTemplates: [],
          templates: {},
        },
      ],
      credentials: {},
      aliases: {},
    });
  });

  it('2. treats an empty file as all defaults', () => {
    expect(parseConfig('', {}).providers).toEqual([]);
  });

  it('3. resolves the gateway key from the file, a named variable, then LMGATE_API_KEY', () => {
    expect(parseConfig('gateway:\n  apiKey: from-file\n', { LMGATE_API_KEY: 'x' }).gateway.apiKey).toBe('from-file');
    expect(
      parseConfig('gateway:\n  apiKeyEnv: MY_KEY\n', { MY_KEY: 'from-named', LMGATE_API_KEY: 'x' }).gateway.apiKey
    ).toBe('from-named');
    expect(parseConfig('gateway: {}\n', { LMGATE_API_KEY: 'test-secret' }).gateway.apiKey).toBe('test-secret');
    expect(parseConfig('gateway: {}\n', {}).gateway.apiKey).toBeUndefined();
  });

  it('4. coerces provider vars to strings', () => {
    const config = parseConfig(
      'providers:\n  - name: vertex\n    endpoint: https://v.test\n    vars:\n      project: 123\n',
      {}
    );

    expect(config.providers[0].vars).toEqual({ project: '123' });
  });

  it('5. rejects invalid YAML and invalid fields', () => {
    expect(() => parseConfig('providers: [', {})).toThrow('Invalid YAML in configuration');
    expect(() => parseConfig('gateway:\n  port: nope\n', {}, 'lmgate.yaml')).toThrow(
      /^Invalid lmgate\.yaml: gateway\.port: /
    );
    expect(() => parseConfig('credentials:\n  openai:\n    type: magic\n', {})).toThrow(ConfigError);
  });

  it('6. rejects duplicate providers and an unknown gateway provider', () => {
    const duplicate = 'providers:\n  - {name: a, endpoint: "https://a.test"}\n  - {name: a, endpoint: "https://b.test"}\n';

    expect(() => parseConfig(duplicate, {})).toThrow('Duplicate provider in configuration: a');
    expect(() => parseConfig('gateway:\n  provider: ghost\n', {})).toThrow(
      'gateway.provider "ghost" is not a configured provider'
    );
  });
});

describe('loadConfig', () => {
  it('should load the example configuration', () => {
    const config = loadConfig(fileURLToPath(new URL('../config.example.yaml', import.meta.url)), {});

    expect(config.providers.map((p) => p.name)).toEqual(['openai', 'ollama', 'gemini', 'anthropic', 'vertex']);
    expect(config.aliases.local).toBe('ollama:llama3:8b');
    expect(config.defaultProvider).toBe('openai');
    expect(() => createRuntime(config, { env: {} })).not.toThrow();
  });

  it('should stream gemini through its server-sent events path', () => {
    const config = loadConfig(fileURLToPath(new URL('../config.example.yaml', import.meta.url)), {});
    const gemini = createRuntime(config, { env: {} }).registry.get('gemini');

    expect(resolveProviderUrl(gemini, 'chatStream', 'gemini-2.0-flash')).toBe(
      'https://generativelanguage.googleapis.com/v1beta/models/gemini-2.0-flash:streamGenerateContent?alt=sse'
    );
    expect(resolveProviderUrl(gemini, 'chat', 'gemini-2.0-flash')).toBe(
      'https://generativelanguage.googleapis.com/v1beta/models/gemini-2.0-flash:generateContent'
    );
  });

  it('should report an unreadable file', () => {
    expect(() => loadConfig('/nonexistent/lmgate.yaml', {})).toThrow(
      'Failed to read configuration from /nonexistent/lmgate.yaml'
    );
  });
});

describe('ConfigWatcher', () => {
  let initial: Configuration;
  let runtime: Runtime;

  beforeEach(() => {
    vi.clearAllMocks();
    mockFileWatcher.handlers.clear();
    mockFileWatcher.on.mockImplementation((event: string, handler: (path: string) => void) => {
      mockFileWatcher.handlers.set(event, handler);
      return mockFileWatcher;
    });
    initial = parseConfig(BASE_YAML, {});
    runtime = createRuntime(initial, { env: {} });
  });

  it('1. applies added, changed and removed providers', async () => {
    const invalidateCatalog = vi.spyOn(runtime.catalog, 'invalidate');
    const next = parseConfig(
      `
providers:
  - name: openai
    endpoint: https://proxy.test/v1
    maxConcurrent: 1
  - name: gemini
    endpoint: https://gemini.test/v1beta
credentials:
  openai:
    type: api-key
    key: test-secret
aliases:
  flash: gemini:gemini-2.0-flash
`,
      {}
    );

    await new ConfigWatcher('lmgate.yaml', initial, runtime).apply(next);

    expect(runtime.registry.names()).toEqual(['gemini', 'openai']);
    expect(runtime.registry.get('openai').endpoint).toBe('https://proxy.test/v1');
    expect(runtime.limiter.getStatus('openai').limit).toBe(1);
    expect(runtime.aliases.list()).toEqual({ flash: 'gemini:gemini-2.0-flash' });
    expect(invalidateCatalog).toHaveBeenCalledWith('ollama');
    expect(invalidateCatalog).toHaveBeenCalledWith('openai');
    expect(invalidateCatalog).not.toHaveBeenCalledWith('gemini');
  });

  it('2. drops derived tokens of providers whose credential changed', async () => {
    const invalidateAuth = vi.spyOn(runtime.auth, 'invalidate');
    const next = parseConfig(BASE_YAML.replace('key: test-secret', 'key: rotated-secret'), {});

    await new ConfigWatcher('lmgate.yaml', initial, runtime).apply(next);

    expect(invalidateAuth).toHaveBeenCalledTimes(1);
    expect(invalidateAuth).toHaveBeenCalledWith('openai');
    expect(await runtime.credentials.getCredential('openai')).toEqual({ kind: 'api-key', key: 'rotated-secret' });
  });

  it('3. keeps the running configuration when the new one is invalid', async () => {
    const bad: Configuration = { ...initial, aliases: { broken: 'no-colon' } };
    const watcher = new ConfigWatcher('lmgate.yaml', initial, runtime, { load: () => bad });

    expect(await watcher.reload()).toBe(false);
    expect(runtime.aliases.list()).toEqual({ fast: 'openai:gpt-4o-mini' });
    expect(runtime.registry.names()).toEqual(['ollama', 'openai']);
  });

  it('4. reloads when the watched file changes', async () => {
    const next = parseConfig(BASE_YAML.replace('fast: openai:gpt-4o-mini', 'fast: openai:gpt-4o'), {});
    const load = vi.fn(() => next);
    const watcher = new ConfigWatcher('/etc/lmgate.yaml', initial, runtime, { load, stabilityThresholdMs: 10 });

    watcher.start();
    mockFileWatcher.handlers.get('change')?.('/etc/lmgate.yaml');

    await vi.waitFor(() => expect(runtime.aliases.resolve('fast')).toEqual({ provider: 'openai', model: 'gpt-4o' }));
    expect(watch).toHaveBeenCalledWith(
      '/etc/lmgate.yaml',
      expect.objectContaining({ ignoreInitial: true, awaitWriteFinish: expect.objectContaining({ stabilityThreshold: 10 }) })
    );
    expect(load).toHaveBeenCalledWith('/etc/lmgate.yaml');

    await watcher.stop();
    expect(mockFileWatcher.close).toHaveBeenCalled();
  });
});
