import { watch, FSWatcher } from 'chokidar';
import { ProviderRegistry } from '../registry/provider-registry.js';
import { AliasRegistry } from '../router/alias-registry.js';
import type { ConfigCredentialStore } from '../auth/credential-store.js';
import type { AuthManager } from '../auth/auth-manager.js';
import type { ConcurrencyLimiter } from '../rate-limiter/concurrency-limiter.js';
import type { ModelCatalog } from '../models/model-catalog.js';
import type { Configuration } from './types.js';
import { loadConfig } from './loader.js';
import logger from './logger.js';

export interface ReloadTargets {
  registry: ProviderRegistry;
  aliases: AliasRegistry;
  credentials: ConfigCredentialStore;
  auth: AuthManager;
  limiter: ConcurrencyLimiter;
  catalog: ModelCatalog;
}

export interface ConfigWatcherOptions {
  load?: (configPath: string) => Configuration;
  /** Milliseconds the file must stay unchanged before it is read */
  stabilityThresholdMs?: number;
}

/**
 * Watches the configuration file and applies provider, alias and credential
 * changes to the running gateway. Gateway and transport settings are fixed at
 * startup and need a restart.
 */
export class ConfigWatcher {
  private configPath: string;
  private targets: ReloadTargets;
  private current: Configuration;
  private load: (configPath: string) => Configuration;
  private stabilityThresholdMs: number;
  private fileWatcher: FSWatcher | null = null;

  constructor(configPath: string, initial: Configuration, targets: ReloadTargets, options: ConfigWatcherOptions = {}) {
    this.configPath = configPath;
    this.current = initial;
    this.targets = targets;
    this.load = options.load ?? ((path) => loadConfig(path));
    this.stabilityThresholdMs = options.stabilityThresholdMs ?? 500;
  }

  start(): void {
    if (this.fileWatcher) {
      logger.warn('Config watcher already started');
      return;
    }

    this.fileWatcher = watch(this.configPath, {
      persistent: true,
      ignoreInitial: true,
      awaitWriteFinish: {
        stabilityThreshold: this.stabilityThresholdMs,
        pollInterval: 100,
      },
    });

    this.fileWatcher.on('change', (path) => {
      logger.info({ path }, 'Configuration file changed');
      void this.reload();
    });

    this.fileWatcher.on('error', (error) => {
      logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Config watcher error');
    });

    logger.info({ configPath: this.configPath }, 'Watching configuration file');
  }

  async stop(): Promise<void> {
    if (this.fileWatcher) {
      await this.fileWatcher.close();
      this.fileWatcher = null;
    }
  }

  /**
   * Re-reads the file and applies it. An invalid file is logged and the
   * running configuration stays in place. Returns whether it was applied.
   */
  async reload(): Promise<boolean> {
    try {
      const next = this.load(this.configPath);
      await this.apply(next);
      return true;
    } catch (error) {
      logger.error(
        { configPath: this.configPath, error: error instanceof Error ? error.message : String(error) },
        'Configuration reload rejected; keeping previous configuration'
      );
      return false;
    }
  }

  /**
   * Validates the whole configuration first, then swaps it in
   */
  async apply(next: Configuration): Promise<void> {
    // Throws ConfigError before anything running is touched
    new ProviderRegistry(next.providers);
    new AliasRegistry(next.aliases);

    const { registry, aliases, credentials, auth, limiter, catalog } = this.targets;
    const previous = this.current;
    const incoming = new Set(next.providers.map((provider) => provider.name));

    for (const name of registry.names()) {
      if (!incoming.has(name)) {
        registry.remove(name);
        catalog.invalidate(name);
        limiter.setLimit(name, undefined);
      }
    }

    for (const provider of next.providers) {
      const before = registry.find(provider.name);
      const after = registry.upsert(provider);
      limiter.setLimit(provider.name, after.maxConcurrent);
      if (before && (before.endpoint !== after.endpoint || before.paths.models !== after.paths.models)) {
        catalog.invalidate(provider.name);
      }
    }

    aliases.replace(next.aliases);
    credentials.replace(next.credentials);

    const changed = new Set([...Object.keys(previous.credentials), ...Object.keys(next.credentials)]);
    for (const provider of changed) {
      if (JSON.stringify(previous.credentials[provider]) !== JSON.stringify(next.credentials[provider])) {
        await auth.invalidate(provider);
      }
    }

    this.current = next;
    logger.info(
      { providers: registry.names(), aliases: Object.keys(next.aliases).length },
      'Configuration reloaded'
    );
  }
}
