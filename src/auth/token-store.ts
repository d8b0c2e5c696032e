import type { TokenStore, TokenSet } from '../types/index.js';

/**
 * In-memory TokenStore. Derived access tokens live only as long as the process.
 */
export class MemoryTokenStore implements TokenStore {
  private tokens: Map<string, TokenSet> = new Map();
  private now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  async saveToken(provider: string, tokenSet: TokenSet): Promise<void> {
    this.tokens.set(provider, tokenSet);
  }

  async getToken(provider: string): Promise<TokenSet | null> {
    return this.tokens.get(provider) ?? null;
  }

  async deleteToken(provider: string): Promise<void> {
    this.tokens.delete(provider);
  }

  async isTokenExpired(provider: string, marginMs: number = 0): Promise<boolean> {
    const tokenSet = this.tokens.get(provider);

    if (!tokenSet) {
      return true; // No token means it's "expired"
    }

    return this.now() + marginMs >= tokenSet.expiresAt;
  }
}
