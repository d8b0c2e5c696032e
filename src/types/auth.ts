/**
 * Credential and token cache type definitions
 */

export interface ApiKeyCredential {
  kind: 'api-key';
  key: string;
}

export interface HeaderCredential {
  kind: 'header';
  name: string;
  value: string;
}

export interface OAuthCredential {
  kind: 'oauth';
  token?: string;
  /** Unix timestamp in milliseconds */
  expiresAt?: number;
  /** GET endpoint returning `{ token, expires_at }`, used once `token` has expired */
  refreshUrl?: string;
  refreshKey?: string;
}

export interface ServiceAccountCredential {
  kind: 'service-account';
  clientEmail: string;
  /** PEM-encoded RSA private key */
  privateKey: string;
  tokenUrl: string;
  scope: string;
  /** Defaults to `tokenUrl` */
  audience?: string;
  lifetimeSeconds?: number;
}

export type AuthCredential = ApiKeyCredential | HeaderCredential | OAuthCredential | ServiceAccountCredential;

/**
 * A short-lived access token derived from an OAuth or service-account credential
 */
export interface TokenSet {
  accessToken: string;
  expiresAt: number; // Unix timestamp in milliseconds
  provider: string;
}

/**
 * Cache of derived access tokens, keyed by provider
 */
export interface TokenStore {
  saveToken(provider: string, tokenSet: TokenSet): Promise<void>;
  getToken(provider: string): Promise<TokenSet | null>;
  deleteToken(provider: string): Promise<void>;
  /**
   * True when no token is stored or it expires within `marginMs`
   */
  isTokenExpired(provider: string, marginMs?: number): Promise<boolean>;
}

/**
 * Supplies the credential configured for a provider. The core only reads it.
 */
export interface CredentialStore {
  getCredential(provider: string): Promise<AuthCredential | null>;
}
