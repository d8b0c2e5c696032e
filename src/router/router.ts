import { GatewayError } from '../errors/errors.js';
import type { ProviderRegistry } from '../registry/provider-registry.js';
import type { AliasRegistry } from './alias-registry.js';
import logger from '../config/logger.js';

/**
 * Single provider/model a gateway instance is pinned to, fixed for its lifetime
 */
export interface GatewayFilter {
  provider?: string;
  model?: string;
}

export interface ResolvedRoute {
  provider: string;
  model: string;
  via: 'alias' | 'explicit' | 'filter';
}

export class Router {
  private registry: ProviderRegistry;
  private aliases: AliasRegistry;
  private filter: Readonly<GatewayFilter>;

  constructor(registry: ProviderRegistry, aliases: AliasRegistry, filter: GatewayFilter = {}) {
    this.registry = registry;
    this.aliases = aliases;
    this.filter = Object.freeze({ ...filter });
    logger.debug({ filter: this.filter }, 'Router initialized');
  }

  /**
   * Resolves an inbound model name, in order: alias, explicit
   * `provider:model` (only when the prefix is a registered provider), the
   * gateway's provider filter. Anything else is ambiguous.
   */
  resolve(model: string): ResolvedRoute {
    const requested = model.trim();

    const alias = requested ? this.aliases.resolve(requested) : undefined;
    if (alias) {
      return this.permit({ ...alias, via: 'alias' });
    }

    const separator = requested.indexOf(':');
    if (separator > 0) {
      const provider = requested.slice(0, separator);
      if (this.registry.has(provider)) {
        const name = requested.slice(separator + 1);
        if (!name) {
          throw new GatewayError(`Model name missing in "${requested}"`, 400, 'invalid_model');
        }
        return this.permit({ provider, model: name, via: 'explicit' });
      }
    }

    if (this.filter.provider) {
      const pinned = this.filter.model;
      if (pinned && requested && requested !== pinned) {
        throw new GatewayError(
          `Model "${requested}" is not served by this gateway (only "${pinned}")`,
          404,
          'model_not_found',
          { provider: this.filter.provider }
        );
      }
      const name = pinned ?? requested;
      if (!name) {
        throw new GatewayError('model is required', 400, 'invalid_model');
      }
      return { provider: this.filter.provider, model: name, via: 'filter' };
    }

    if (!requested) {
      throw new GatewayError('model is required', 400, 'invalid_model');
    }
    throw new GatewayError(
      `ambiguous model "${requested}": use an alias or provider:model`,
      400,
      'ambiguous_model'
    );
  }

  /**
   * Providers whose models this gateway may serve
   */
  permittedProviders(): string[] {
    if (this.filter.provider) {
      return this.registry.has(this.filter.provider) ? [this.filter.provider] : [];
    }
    return this.registry.names();
  }

  getFilter(): Readonly<GatewayFilter> {
    return this.filter;
  }

  private permit(route: ResolvedRoute): ResolvedRoute {
    const { provider, model } = this.filter;
    if ((provider && route.provider !== provider) || (model && route.model !== model)) {
      throw new GatewayError(
        `Model "${route.provider}:${route.model}" is outside this gateway's filter`,
        403,
        'model_not_allowed',
        { provider: route.provider }
      );
    }
    return route;
  }
}
