#!/usr/bin/env node
import { Command } from 'commander';
import { fileURLToPath } from 'url';
import { argv } from 'process';
import type { AddressInfo } from 'net';
import { loadConfig } from './config/loader.js';
import { ConfigWatcher } from './config/watcher.js';
import logger from './config/logger.js';
import { MemoryTokenStore } from './auth/token-store.js';
import { ConfigCredentialStore } from './auth/credential-store.js';
import { AuthManager } from './auth/auth-manager.js';
import { HttpTransport } from './transport/http-transport.js';
import { ConcurrencyLimiter } from './rate-limiter/concurrency-limiter.js';
import { ProviderRegistry } from './registry/provider-registry.js';
import { ProviderClient } from './providers/provider-client.js';
import { MemoryModelCache } from './models/model-cache.js';
import { ModelCatalog } from './models/model-catalog.js';
import { AliasRegistry } from './router/alias-registry.js';
import { Router } from './router/router.js';
import type { GatewayFilter } from './router/router.js';
import { ResponseTransformer } from './transformer/response-transformer.js';
import { UsageTracker } from './usage/usage-tracker.js';
import { RequestHandler } from './handler/request-handler.js';
import { GatewayProxy, generateApiKey } from './server/gateway-proxy.js';
import { isLmgateError } from './errors/errors.js';
import type { CanonicalChatRequest, CanonicalMessage, Configuration, GatewaySettings } from './types/index.js';

export interface Runtime {
  config: Configuration;
  registry: ProviderRegistry;
  aliases: AliasRegistry;
  credentials: ConfigCredentialStore;
  auth: AuthManager;
  transport: HttpTransport;
  limiter: ConcurrencyLimiter;
  client: ProviderClient;
  catalog: ModelCatalog;
  router: Router;
  transformer: ResponseTransformer;
  usage: UsageTracker;
  requestHandler: RequestHandler;
}

export interface RuntimeOptions {
  filter?: GatewayFilter;
  transport?: HttpTransport;
  env?: Record<string, string | undefined>;
}

/**
 * Wires every component from a loaded configuration
 */
export function createRuntime(config: Configuration, options: RuntimeOptions = {}): Runtime {
  const registry = new ProviderRegistry(config.providers);
  const aliases = new AliasRegistry(config.aliases);
  const credentials = new ConfigCredentialStore(config.credentials, options.env ?? process.env);
  const transport = options.transport ?? new HttpTransport(config.transport, { env: options.env });
  const auth = new AuthManager(credentials, new MemoryTokenStore(), transport);

  const limits: Record<string, number> = {};
  for (const provider of registry.list()) {
    if (provider.maxConcurrent !== undefined) limits[provider.name] = provider.maxConcurrent;
  }
  const limiter = new ConcurrencyLimiter(limits);

  const client = new ProviderClient({ registry, auth, transport, limiter });
  const catalog = new ModelCatalog(new MemoryModelCache(config.modelCache.ttlMs), (provider) => client.listModels(provider));
  const router = new Router(registry, aliases, options.filter ?? {});
  const transformer = new ResponseTransformer();
  const usage = new UsageTracker();
  const requestHandler = new RequestHandler(router, client, transformer, usage);

  logger.info({ providers: registry.names(), aliases: Object.keys(config.aliases).length }, 'Runtime initialized');

  return { config, registry, aliases, credentials, auth, transport, limiter, client, catalog, router, transformer, usage, requestHandler };
}

export interface GatewayOverrides extends Partial<GatewaySettings> {
  watch?: boolean;
}

export async function startGateway(
  configPath: string,
  overrides: GatewayOverrides = {}
): Promise<{ gateway: GatewayProxy; runtime: Runtime; address: AddressInfo; cleanup: () => Promise<void> }> {
  // 1. Load configuration
  const config = loadConfig(configPath);
  const settings: GatewaySettings = {
    host: overrides.host ?? config.gateway.host,
    port: overrides.port ?? config.gateway.port,
    provider: overrides.provider ?? config.gateway.provider,
    model: overrides.model ?? config.gateway.model,
    apiKey: overrides.apiKey ?? config.gateway.apiKey,
    generateApiKey: overrides.generateApiKey ?? config.gateway.generateApiKey,
  };

  // 2. Bearer key, generated once per process when asked for
  if (!settings.apiKey && settings.generateApiKey) {
    settings.apiKey = generateApiKey();
    process.stdout.write(`Gateway API key: ${settings.apiKey}\n`);
  }

  // 3. Components
  const runtime = createRuntime(config, { filter: { provider: settings.provider, model: settings.model } });

  // 4. HTTP surface
  const gateway = new GatewayProxy(
    {
      requestHandler: runtime.requestHandler,
      router: runtime.router,
      catalog: runtime.catalog,
      transformer: runtime.transformer,
    },
    settings
  );
  const address = await gateway.start();

  // 5. Hot reload
  const watcher = new ConfigWatcher(configPath, config, runtime);
  if (overrides.watch ?? true) watcher.start();

  // Cleanup function
  const cleanup = async () => {
    await gateway.stop();
    await watcher.stop();
    logger.info({ usage: runtime.usage.getStats() }, 'All components cleaned up');
  };

  return { gateway, runtime, address, cleanup };
}

/**
 * Qualifies a bare model name with the default provider, unless it is an
 * alias or already names a registered provider
 */
export function qualifyModel(runtime: Runtime, model: string): string {
  if (runtime.aliases.has(model)) return model;
  const separator = model.indexOf(':');
  if (separator > 0 && runtime.registry.has(model.slice(0, separator))) return model;
  return runtime.config.defaultProvider ? `${runtime.config.defaultProvider}:${model}` : model;
}

interface ProxyOptions {
  config: string;
  host?: string;
  port?: string;
  provider?: string;
  model?: string;
  apiKey?: string;
  generateKey?: boolean;
  watch: boolean;
}

interface ChatOptions {
  config: string;
  system?: string;
  maxTokens?: string;
  temperature?: string;
  stream: boolean;
}

async function runChat(model: string, promptWords: string[], options: ChatOptions): Promise<void> {
  const runtime = createRuntime(loadConfig(options.config));
  const prompt = promptWords.length > 0 ? promptWords.join(' ') : await readStdin();

  const messages: CanonicalMessage[] = [];
  if (options.system) messages.push({ role: 'system', content: options.system });
  if (prompt.trim()) messages.push({ role: 'user', content: prompt });

  const route = runtime.router.resolve(qualifyModel(runtime, model));
  const request: CanonicalChatRequest = { model: route.model, messages };
  if (options.maxTokens !== undefined) request.maxTokens = parsePositiveInt(options.maxTokens, '--max-tokens');
  if (options.temperature !== undefined) {
    const temperature = Number(options.temperature);
    if (!Number.isFinite(temperature)) throw new Error('--temperature must be a number');
    request.temperature = temperature;
  }

  if (options.stream) {
    for await (const chunk of runtime.client.chatStream(route.provider, { ...request, stream: true })) {
      if (chunk.content) process.stdout.write(chunk.content);
    }
    process.stdout.write('\n');
    return;
  }

  const response = await runtime.client.chat(route.provider, request);
  process.stdout.write(`${response.content}\n`);
  for (const call of response.toolCalls ?? []) {
    process.stdout.write(`[tool call] ${call.name}(${call.arguments})\n`);
  }
}

async function runModels(provider: string | undefined, options: { config: string; refresh: boolean }): Promise<void> {
  const runtime = createRuntime(loadConfig(options.config));
  const providers = provider ? [provider] : runtime.registry.names();

  for (const name of providers) {
    const models = await runtime.catalog.getModels(name, { forceRefresh: options.refresh });
    for (const model of models) {
      process.stdout.write(`${name}:${model.id}\n`);
    }
  }
}

async function readStdin(): Promise<string> {
  if (process.stdin.isTTY) return '';
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

function parsePositiveInt(value: string, flag: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${flag} must be a positive integer`);
  }
  return parsed;
}

function reportFailure(error: unknown): void {
  const message = isLmgateError(error) ? error.describe() : error instanceof Error ? error.message : String(error);
  logger.error({ kind: isLmgateError(error) ? error.kind : undefined }, message);
  process.exitCode = 1;
}

// CLI setup
const program = new Command();

program.name('lmgate').description('Multi-provider LLM client and OpenAI-compatible gateway').version('0.1.0');

program
  .command('proxy')
  .alias('serve')
  .description('Run the OpenAI-compatible gateway')
  .option('-c, --config <path>', 'Path to configuration file', './lmgate.yaml')
  .option('--host <host>', 'Address to bind')
  .option('-p, --port <port>', 'Port to listen on')
  .option('--provider <name>', 'Serve only this provider')
  .option('--model <name>', 'Serve only this model (needs --provider)')
  .option('--api-key <key>', 'Bearer key clients must present')
  .option('--generate-key', 'Generate and print a bearer key')
  .option('--no-watch', 'Do not reload the configuration file on change')
  .action(async (options: ProxyOptions) => {
    try {
      logger.info('Starting lmgate proxy...');
      const { cleanup } = await startGateway(options.config, {
        host: options.host,
        port: options.port === undefined ? undefined : parsePositiveInt(options.port, '--port'),
        provider: options.provider,
        model: options.model,
        apiKey: options.apiKey,
        generateApiKey: options.generateKey,
        watch: options.watch,
      });

      // Graceful shutdown handlers
      const shutdown = () => {
        logger.info('Shutting down gracefully...');
        cleanup()
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            reportFailure(error);
            process.exit(1);
          });
      };

      process.on('SIGINT', shutdown);
      process.on('SIGTERM', shutdown);

      logger.info('lmgate proxy started successfully');
    } catch (error) {
      reportFailure(error);
    }
  });

program
  .command('chat')
  .description('Send one chat request and print the reply')
  .argument('<model>', 'alias, provider:model, or a model of the default provider')
  .argument('[prompt...]', 'prompt text; read from stdin when omitted')
  .option('-c, --config <path>', 'Path to configuration file', './lmgate.yaml')
  .option('-s, --system <text>', 'System prompt')
  .option('--max-tokens <n>', 'Maximum tokens to generate')
  .option('-t, --temperature <value>', 'Sampling temperature')
  .option('--no-stream', 'Wait for the whole reply instead of streaming')
  .action(async (model: string, prompt: string[], options: ChatOptions) => {
    try {
      await runChat(model, prompt, options);
    } catch (error) {
      reportFailure(error);
    }
  });

program
  .command('models')
  .description('List the models of one or every configured provider')
  .argument('[provider]', 'provider name')
  .option('-c, --config <path>', 'Path to configuration file', './lmgate.yaml')
  .option('--refresh', 'Bypass the model cache', false)
  .action(async (provider: string | undefined, options: { config: string; refresh: boolean }) => {
    try {
      await runModels(provider, options);
    } catch (error) {
      reportFailure(error);
    }
  });

// Only run CLI when this module is executed directly (not imported in tests)
const __filename = fileURLToPath(import.meta.url);
const isMain = argv[1] && (argv[1] === __filename || argv[1].endsWith('index.js') || argv[1].endsWith('index.ts'));
if (isMain) {
  program.parseAsync().catch(reportFailure);
}
