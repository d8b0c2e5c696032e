import { promises as fs } from 'fs';
import { z } from 'zod';
import { AuthError } from '../errors/errors.js';
import type { AuthCredential, CredentialConfig, CredentialStore } from '../types/index.js';

export const DEFAULT_SA_TOKEN_URL = 'https://oauth2.googleapis.com/token';
export const DEFAULT_SA_SCOPE = 'https://www.googleapis.com/auth/cloud-platform';

const serviceAccountKeySchema = z.object({
  client_email: z.string().min(1),
  private_key: z.string().min(1),
  token_uri: z.string().url().optional(),
});

type Env = Record<string, string | undefined>;
type ReadFile = (path: string) => Promise<string>;

/**
 * Resolves credentials declared in the configuration file. Values may be
 * inline, taken from an environment variable (`*Env`) or, for service
 * accounts, read from a JSON key file. Nothing is ever written back.
 */
export class ConfigCredentialStore implements CredentialStore {
  private credentials: Readonly<Record<string, CredentialConfig>>;
  private env: Env;
  private readFile: ReadFile;
  private resolved = new Map<string, AuthCredential>();
  // Bumped by replace(); a resolution that spans a replace is not cached
  private generation = 0;

  constructor(
    credentials: Record<string, CredentialConfig>,
    env: Env = process.env,
    readFile: ReadFile = (path) => fs.readFile(path, 'utf-8')
  ) {
    this.credentials = { ...credentials };
    this.env = env;
    this.readFile = readFile;
  }

  async getCredential(provider: string): Promise<AuthCredential | null> {
    const config = this.credentials[provider];
    if (!config) {
      return null;
    }
    const cached = this.resolved.get(provider);
    if (cached) {
      return cached;
    }
    const generation = this.generation;
    const credential = await this.resolve(provider, config);
    if (generation === this.generation) {
      this.resolved.set(provider, credential);
    }
    return credential;
  }

  /**
   * Replaces the credential table, dropping every resolved value
   */
  replace(credentials: Record<string, CredentialConfig>): void {
    this.credentials = { ...credentials };
    this.resolved = new Map();
    this.generation++;
  }

  private async resolve(provider: string, config: CredentialConfig): Promise<AuthCredential> {
    switch (config.type) {
      case 'api-key':
        return { kind: 'api-key', key: this.required(provider, 'key', config.key, config.keyEnv) };

      case 'header':
        return {
          kind: 'header',
          name: config.name,
          value: this.required(provider, `header ${config.name}`, config.value, config.valueEnv),
        };

      case 'oauth': {
        const token = this.lookup(config.token, config.tokenEnv);
        if (!token && !config.refreshUrl) {
          throw new AuthError('OAuth credential has neither a token nor a refresh URL', { provider });
        }
        return {
          kind: 'oauth',
          token,
          expiresAt: config.expiresAt,
          refreshUrl: config.refreshUrl,
          refreshKey: this.lookup(config.refreshKey, config.refreshKeyEnv),
        };
      }

      case 'service-account': {
        const key = await this.loadServiceAccountKey(provider, config.json, config.jsonEnv, config.file);
        return {
          kind: 'service-account',
          clientEmail: key.client_email,
          privateKey: key.private_key,
          tokenUrl: config.tokenUrl ?? key.token_uri ?? DEFAULT_SA_TOKEN_URL,
          scope: config.scope ?? DEFAULT_SA_SCOPE,
          audience: config.audience,
        };
      }
    }
  }

  private async loadServiceAccountKey(
    provider: string,
    json: string | undefined,
    jsonEnv: string | undefined,
    file: string | undefined
  ): Promise<z.infer<typeof serviceAccountKeySchema>> {
    let raw = this.lookup(json, jsonEnv);
    if (!raw && file) {
      try {
        raw = await this.readFile(file);
      } catch (error) {
        throw new AuthError(`Cannot read service-account key file ${file}`, { provider, cause: error });
      }
    }
    if (!raw) {
      throw new AuthError('Service-account credential has no key material', { provider });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new AuthError('Service-account key is not valid JSON', { provider, cause: error });
    }
    const result = serviceAccountKeySchema.safeParse(parsed);
    if (!result.success) {
      throw new AuthError(`Service-account key is malformed: ${result.error.issues[0]?.message ?? 'invalid'}`, {
        provider,
      });
    }
    return result.data;
  }

  private lookup(inline: string | undefined, envName: string | undefined): string | undefined {
    if (inline) return inline;
    return envName ? this.env[envName] || undefined : undefined;
  }

  private required(provider: string, what: string, inline: string | undefined, envName: string | undefined): string {
    const value = this.lookup(inline, envName);
    if (!value) {
      const source = envName ? ` (environment variable ${envName} is not set)` : '';
      throw new AuthError(`Missing ${what} for provider ${provider}${source}`, { provider });
    }
    return value;
  }
}
