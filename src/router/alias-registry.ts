import { ConfigError } from '../errors/errors.js';
import logger from '../config/logger.js';

export interface AliasTarget {
  provider: string;
  model: string;
}

/**
 * Short model names mapped to `provider:model`. A target may not itself be an
 * alias, so resolution is always a single lookup.
 */
export class AliasRegistry {
  private snapshot: ReadonlyMap<string, AliasTarget> = new Map();

  constructor(aliases: Record<string, string> = {}) {
    this.replace(aliases);
  }

  resolve(name: string): AliasTarget | undefined {
    return this.snapshot.get(name);
  }

  has(name: string): boolean {
    return this.snapshot.has(name);
  }

  set(name: string, target: string): void {
    const next = new Map(this.snapshot);
    next.set(name, parseTarget(name, target));
    assertNoChains(next);
    this.snapshot = next;
    logger.info({ alias: name, target }, 'Alias set');
  }

  remove(name: string): boolean {
    if (!this.snapshot.has(name)) return false;
    const next = new Map(this.snapshot);
    next.delete(name);
    this.snapshot = next;
    return true;
  }

  /**
   * Swaps in a whole new alias table after validating every entry
   */
  replace(aliases: Record<string, string>): void {
    const next = new Map<string, AliasTarget>();
    for (const [name, target] of Object.entries(aliases)) {
      next.set(name, parseTarget(name, target));
    }
    assertNoChains(next);
    this.snapshot = next;
  }

  list(): Record<string, string> {
    const out: Record<string, string> = {};
    for (const [name, target] of this.snapshot) {
      out[name] = `${target.provider}:${target.model}`;
    }
    return out;
  }
}

function parseTarget(name: string, target: string): AliasTarget {
  if (!name.trim()) {
    throw new ConfigError('Alias name must not be empty');
  }
  const separator = target.indexOf(':');
  if (separator <= 0 || separator === target.length - 1) {
    throw new ConfigError(`Alias "${name}" must point at provider:model, got "${target}"`);
  }
  return { provider: target.slice(0, separator), model: target.slice(separator + 1) };
}

function assertNoChains(aliases: ReadonlyMap<string, AliasTarget>): void {
  for (const [name, target] of aliases) {
    const full = `${target.provider}:${target.model}`;
    if (aliases.has(full)) {
      throw new ConfigError(`Alias "${name}" points at another alias (${full}); chains are not allowed`);
    }
  }
}
