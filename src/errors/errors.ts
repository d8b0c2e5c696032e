import type { Operation } from '../types/provider.js';

export type ErrorKind =
  | 'config'
  | 'auth'
  | 'transport'
  | 'upstream_format'
  | 'upstream_status'
  | 'gateway'
  | 'backpressure';

export interface ErrorContext {
  provider?: string;
  operation?: Operation;
  /** Raw upstream response body, when one was received */
  upstreamBody?: string;
  cause?: unknown;
}

/**
 * Base class of every error the gateway core raises. `kind` is the
 * discriminator used by the HTTP surface and the CLI.
 */
export abstract class LmgateError extends Error {
  abstract readonly kind: ErrorKind;
  readonly provider?: string;
  readonly operation?: Operation;
  readonly upstreamBody?: string;

  constructor(message: string, context: ErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = new.target.name;
    this.provider = context.provider;
    this.operation = context.operation;
    this.upstreamBody = context.upstreamBody;
  }

  /**
   * Message with operation, provider and upstream body appended
   */
  describe(): string {
    const where = [this.operation, this.provider].filter(Boolean).join(' @ ');
    const head = where ? `${this.message} [${where}]` : this.message;
    return this.upstreamBody ? `${head}\n${this.upstreamBody}` : head;
  }
}

/** Unknown provider, malformed template, path or pattern. Never retried. */
export class ConfigError extends LmgateError {
  readonly kind = 'config';
}

/** Missing or invalid credential, JWT signing or token exchange failure. Never retried. */
export class AuthError extends LmgateError {
  readonly kind = 'auth';
}

export interface TransportErrorContext extends ErrorContext {
  code?: string;
  timeout?: boolean;
  cancelled?: boolean;
}

/** Timeout, connection reset, TLS failure, idle stream or cancellation. */
export class TransportError extends LmgateError {
  readonly kind = 'transport';
  readonly code?: string;
  readonly timeout: boolean;
  readonly cancelled: boolean;

  constructor(message: string, context: TransportErrorContext = {}) {
    super(message, context);
    this.code = context.code;
    this.timeout = context.timeout ?? false;
    this.cancelled = context.cancelled ?? false;
  }
}

/** The upstream answered, but in no known response shape. */
export class UpstreamFormatError extends LmgateError {
  readonly kind = 'upstream_format';
}

/** The upstream answered with a non-2xx status. */
export class UpstreamError extends LmgateError {
  readonly kind = 'upstream_status';
  readonly statusCode: number;

  constructor(message: string, statusCode: number, context: ErrorContext = {}) {
    super(message, context);
    this.statusCode = statusCode;
  }
}

/** Ambiguous model, filter mismatch, unauthorized or malformed inbound request. */
export class GatewayError extends LmgateError {
  readonly kind = 'gateway';
  readonly statusCode: number;
  readonly code: string | null;

  constructor(message: string, statusCode: number, code: string | null = null, context: ErrorContext = {}) {
    super(message, context);
    this.statusCode = statusCode;
    this.code = code;
  }
}

/** A provider's concurrency cap is reached. */
export class BackpressureError extends LmgateError {
  readonly kind = 'backpressure';
}

export type KnownError =
  | ConfigError
  | AuthError
  | TransportError
  | UpstreamFormatError
  | UpstreamError
  | GatewayError
  | BackpressureError;

/**
 * Narrows to the closed set of error classes above, discriminated by `kind`
 */
export function isLmgateError(error: unknown): error is KnownError {
  return error instanceof LmgateError;
}
