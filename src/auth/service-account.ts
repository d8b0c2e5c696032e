import { createSign } from 'crypto';
import { AuthError } from '../errors/errors.js';
import type { ServiceAccountCredential } from '../types/index.js';

export const JWT_BEARER_GRANT = 'urn:ietf:params:oauth:grant-type:jwt-bearer';
export const DEFAULT_TOKEN_LIFETIME_SECONDS = 3600;

export interface JwtClaims {
  iss: string;
  scope: string;
  aud: string;
  iat: number;
  exp: number;
}

export function buildClaims(credential: ServiceAccountCredential, nowMs: number): JwtClaims {
  const iat = Math.floor(nowMs / 1000);
  return {
    iss: credential.clientEmail,
    scope: credential.scope,
    aud: credential.audience ?? credential.tokenUrl,
    iat,
    exp: iat + (credential.lifetimeSeconds ?? DEFAULT_TOKEN_LIFETIME_SECONDS),
  };
}

/**
 * Signs the claims as a compact RS256 JWT
 */
export function signJwt(claims: JwtClaims, privateKey: string, provider?: string): string {
  const header = base64url(JSON.stringify({ alg: 'RS256', typ: 'JWT' }));
  const payload = base64url(JSON.stringify(claims));
  const input = `${header}.${payload}`;

  let signature: string;
  try {
    signature = createSign('RSA-SHA256').update(input).sign(privateKey, 'base64url');
  } catch (error) {
    throw new AuthError('Failed to sign service-account assertion', { provider, cause: error });
  }
  return `${input}.${signature}`;
}

/**
 * Form body for the two-legged JWT-bearer token exchange
 */
export function exchangeForm(assertion: string): string {
  return new URLSearchParams({ grant_type: JWT_BEARER_GRANT, assertion }).toString();
}

function base64url(text: string): string {
  return Buffer.from(text, 'utf-8').toString('base64url');
}
