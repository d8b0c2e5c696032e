import { z } from 'zod';
import { AuthError, isLmgateError } from '../errors/errors.js';
import type {
  AuthCredential,
  CredentialStore,
  OAuthCredential,
  ServiceAccountCredential,
  TokenSet,
  TokenStore,
} from '../types/index.js';
import type { HttpTransport } from '../transport/http-transport.js';
import { buildClaims, exchangeForm, signJwt } from './service-account.js';
import logger from '../config/logger.js';

export const TOKEN_REFRESH_MARGIN_MS = 60_000;

const exchangeResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().positive().optional(),
});

const oauthRefreshResponseSchema = z.object({
  token: z.string().min(1),
  /** Unix seconds */
  expires_at: z.coerce.number().positive(),
});

export interface AuthManagerOptions {
  now?: () => number;
  refreshMarginMs?: number;
}

/**
 * AuthManager turns a provider's credential into request headers and owns the
 * lifecycle of derived access tokens (OAuth refresh, service-account exchange)
 */
export class AuthManager {
  private credentials: CredentialStore;
  private tokenStore: TokenStore;
  private transport: HttpTransport;
  private now: () => number;
  private refreshMarginMs: number;
  private inflight: Map<string, Promise<TokenSet>> = new Map();

  constructor(
    credentials: CredentialStore,
    tokenStore: TokenStore,
    transport: HttpTransport,
    options: AuthManagerOptions = {}
  ) {
    this.credentials = credentials;
    this.tokenStore = tokenStore;
    this.transport = transport;
    this.now = options.now ?? Date.now;
    this.refreshMarginMs = options.refreshMarginMs ?? TOKEN_REFRESH_MARGIN_MS;
  }

  /**
   * Headers authenticating a request to `provider`. When no credential is
   * passed, the credential store is asked; a provider without one gets none.
   */
  async prepareHeaders(provider: string, credential?: AuthCredential | null): Promise<Record<string, string>> {
    const resolved = credential === undefined ? await this.credentials.getCredential(provider) : credential;
    if (!resolved) {
      return {};
    }

    switch (resolved.kind) {
      case 'api-key':
        if (!resolved.key) {
          throw new AuthError('API key is empty', { provider });
        }
        return { Authorization: `Bearer ${resolved.key}` };

      case 'header':
        if (!resolved.name || !resolved.value) {
          throw new AuthError('Custom auth header needs a name and a value', { provider });
        }
        return { [resolved.name]: resolved.value };

      case 'oauth': {
        const token = await this.getOAuthToken(provider, resolved);
        return { Authorization: `Bearer ${token}` };
      }

      case 'service-account': {
        const tokenSet = await this.getServiceAccountToken(provider, resolved);
        return { Authorization: `Bearer ${tokenSet.accessToken}` };
      }
    }
  }

  /**
   * Cached service-account access token, exchanged anew once it is within the
   * refresh margin of expiry. Concurrent callers share one exchange.
   */
  async getServiceAccountToken(provider: string, credential: ServiceAccountCredential): Promise<TokenSet> {
    const cached = await this.freshToken(provider);
    if (cached) {
      return cached;
    }
    return this.singleFlight(provider, async () => {
      const again = await this.freshToken(provider);
      if (again) return again;
      return this.exchangeServiceAccount(provider, credential);
    });
  }

  /**
   * Drops the derived token so the next request mints a new one
   */
  async invalidate(provider: string): Promise<void> {
    await this.tokenStore.deleteToken(provider);
  }

  private async getOAuthToken(provider: string, credential: OAuthCredential): Promise<string> {
    if (credential.token && (credential.expiresAt === undefined || this.now() < credential.expiresAt)) {
      return credential.token;
    }

    const cached = await this.freshToken(provider);
    if (cached) {
      return cached.accessToken;
    }

    const { refreshUrl } = credential;
    if (!refreshUrl) {
      throw new AuthError('OAuth token has expired and no refresh URL is configured', { provider });
    }
    const refreshed = await this.singleFlight(provider, async () => {
      const again = await this.freshToken(provider);
      if (again) return again;
      return this.refreshOAuth(provider, refreshUrl, credential.refreshKey);
    });
    return refreshed.accessToken;
  }

  private async exchangeServiceAccount(provider: string, credential: ServiceAccountCredential): Promise<TokenSet> {
    const issuedAt = this.now();
    const assertion = signJwt(buildClaims(credential, issuedAt), credential.privateKey, provider);

    logger.info({ provider, tokenUrl: credential.tokenUrl }, 'Exchanging service-account assertion');

    const body = await this.call(provider, 'Service-account token exchange failed', () =>
      this.transport.send({
        method: 'POST',
        url: credential.tokenUrl,
        headers: { 'Content-Type': 'application/x-www-form-urlencoded', Accept: 'application/json' },
        body: exchangeForm(assertion),
        provider,
      })
    );

    const parsed = exchangeResponseSchema.safeParse(parseJson(body));
    if (!parsed.success) {
      throw new AuthError('Token endpoint returned no access_token', { provider, upstreamBody: body });
    }

    const lifetimeSeconds = parsed.data.expires_in ?? credential.lifetimeSeconds ?? 3600;
    const tokenSet: TokenSet = {
      accessToken: parsed.data.access_token,
      expiresAt: issuedAt + lifetimeSeconds * 1000,
      provider,
    };
    await this.tokenStore.saveToken(provider, tokenSet);
    logger.info({ provider, expiresAt: new Date(tokenSet.expiresAt).toISOString() }, 'Service-account token cached');
    return tokenSet;
  }

  private async refreshOAuth(provider: string, refreshUrl: string, refreshKey: string | undefined): Promise<TokenSet> {
    logger.info({ provider }, 'Refreshing OAuth token');

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (refreshKey) {
      headers.Authorization = `token ${refreshKey}`;
    }
    const body = await this.call(provider, 'OAuth token refresh failed', () =>
      this.transport.send({ method: 'GET', url: refreshUrl, headers, provider })
    );

    const parsed = oauthRefreshResponseSchema.safeParse(parseJson(body));
    if (!parsed.success) {
      throw new AuthError('OAuth refresh endpoint returned no token', { provider, upstreamBody: body });
    }

    const tokenSet: TokenSet = {
      accessToken: parsed.data.token,
      expiresAt: parsed.data.expires_at * 1000,
      provider,
    };
    await this.tokenStore.saveToken(provider, tokenSet);
    logger.info({ provider }, 'OAuth token refreshed');
    return tokenSet;
  }

  private async freshToken(provider: string): Promise<TokenSet | null> {
    if (await this.tokenStore.isTokenExpired(provider, this.refreshMarginMs)) {
      return null;
    }
    return this.tokenStore.getToken(provider);
  }

  private singleFlight(provider: string, task: () => Promise<TokenSet>): Promise<TokenSet> {
    const pending = this.inflight.get(provider);
    if (pending) {
      return pending;
    }
    const promise = task().finally(() => {
      this.inflight.delete(provider);
    });
    this.inflight.set(provider, promise);
    return promise;
  }

  private async call(provider: string, message: string, send: () => Promise<{ body: string }>): Promise<string> {
    try {
      const response = await send();
      return response.body;
    } catch (error) {
      logger.error({ provider, error: error instanceof Error ? error.message : String(error) }, message);
      throw new AuthError(`${message}: ${error instanceof Error ? error.message : String(error)}`, {
        provider,
        upstreamBody: isLmgateError(error) ? error.upstreamBody : undefined,
        cause: error,
      });
    }
  }
}

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}
