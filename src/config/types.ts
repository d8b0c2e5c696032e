// Configuration types for lmgate

import type { ProviderConfig } from '../types/provider.js';

// ============================================================================
// Credential references (resolved by the credential store)
// ============================================================================

export interface ApiKeyCredentialConfig {
  type: 'api-key';
  key?: string;
  keyEnv?: string;
}

export interface HeaderCredentialConfig {
  type: 'header';
  name: string;
  value?: string;
  valueEnv?: string;
}

export interface OAuthCredentialConfig {
  type: 'oauth';
  token?: string;
  tokenEnv?: string;
  /** Unix timestamp in milliseconds */
  expiresAt?: number;
  refreshUrl?: string;
  refreshKey?: string;
  refreshKeyEnv?: string;
}

export interface ServiceAccountCredentialConfig {
  type: 'service-account';
  /** Path to a service-account JSON key file */
  file?: string;
  json?: string;
  jsonEnv?: string;
  tokenUrl?: string;
  scope?: string;
  audience?: string;
}

export type CredentialConfig =
  | ApiKeyCredentialConfig
  | HeaderCredentialConfig
  | OAuthCredentialConfig
  | ServiceAccountCredentialConfig;

// ============================================================================
// Configuration Types
// ============================================================================

export interface GatewaySettings {
  host: string;
  port: number;
  /** Single-provider filter */
  provider?: string;
  /** Single-model filter */
  model?: string;
  apiKey?: string;
  /** Generate a random bearer key at startup when no apiKey is set */
  generateApiKey: boolean;
}

export interface TransportSettings {
  timeoutMs: number;
  streamIdleTimeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
}

export interface ModelCacheSettings {
  ttlMs: number;
}

export interface Configuration {
  gateway: GatewaySettings;
  transport: TransportSettings;
  modelCache: ModelCacheSettings;
  defaultProvider?: string;
  providers: ProviderConfig[];
  credentials: Record<string, CredentialConfig>;
  aliases: Record<string, string>;
}
