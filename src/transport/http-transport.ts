import http from 'http';
import https from 'https';
import axios from 'axios';
import type { AxiosInstance, AxiosResponse } from 'axios';
import { TransportError, UpstreamError, isLmgateError } from '../errors/errors.js';
import type { LmgateError } from '../errors/errors.js';
import type { Operation, TransportSettings } from '../types/index.js';
import logger from '../config/logger.js';

export const DEFAULT_TRANSPORT_SETTINGS: Readonly<TransportSettings> = {
  timeoutMs: 120_000,
  streamIdleTimeoutMs: 60_000,
  maxRetries: 3,
  retryBaseDelayMs: 250,
};

export const INSECURE_TLS_ENV = 'LMGATE_INSECURE_TLS';

/**
 * Error codes meaning the request never reached the upstream: the name did not
 * resolve or the connection was refused. Only these make a POST retryable.
 */
export const PRE_SEND_ERROR_CODES: ReadonlySet<string> = new Set(['ENOTFOUND', 'EAI_AGAIN', 'ECONNREFUSED']);

const TIMEOUT_CODES: ReadonlySet<string> = new Set(['ECONNABORTED', 'ETIMEDOUT']);
const MAX_ERROR_BODY = 64 * 1024;

export type HttpMethod = 'GET' | 'POST';

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  /** JSON text, or a multipart form for uploads */
  body?: string | FormData;
  signal?: AbortSignal;
  provider?: string;
  operation?: Operation;
}

export interface TransportResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export interface BinaryResponse {
  status: number;
  headers: Record<string, string>;
  body: Buffer;
}

export interface TransportOptions {
  env?: Record<string, string | undefined>;
  client?: AxiosInstance;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

interface ByteSource extends AsyncIterable<Uint8Array | string> {
  destroy?: (error?: Error) => void;
}

export class HttpTransport {
  readonly settings: Readonly<TransportSettings>;
  readonly insecureTls: boolean;
  private client: AxiosInstance;
  private sleep: (ms: number) => Promise<void>;
  private random: () => number;

  constructor(settings: Partial<TransportSettings> = {}, options: TransportOptions = {}) {
    this.settings = { ...DEFAULT_TRANSPORT_SETTINGS, ...settings };
    const env = options.env ?? process.env;
    this.insecureTls = env[INSECURE_TLS_ENV] === '1' || env[INSECURE_TLS_ENV] === 'true';
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.random = options.random ?? Math.random;
    this.client =
      options.client ??
      axios.create({
        timeout: this.settings.timeoutMs,
        httpAgent: new http.Agent({ keepAlive: true }),
        httpsAgent: new https.Agent({ keepAlive: true, rejectUnauthorized: !this.insecureTls }),
        validateStatus: () => true,
        maxRedirects: 5,
      });

    if (this.insecureTls) {
      logger.warn(`${INSECURE_TLS_ENV} is set: TLS certificate verification is DISABLED`);
    }
  }

  /**
   * Sends a buffered request. Non-2xx answers become UpstreamError.
   * GET is retried on network errors, 5xx and 429; POST only when the
   * request never left this process (see PRE_SEND_ERROR_CODES).
   */
  async send(request: TransportRequest): Promise<TransportResponse> {
    return this.withRetry(request, async () => {
      const response = await this.dispatch(request, 'text');
      const body = asText(response.data);
      if (response.status < 200 || response.status >= 300) {
        throw upstreamError(request, response.status, body);
      }
      return { status: response.status, headers: flattenHeaders(response.headers), body };
    });
  }

  /**
   * Like `send`, for answers that are not text (generated audio)
   */
  async sendBytes(request: TransportRequest): Promise<BinaryResponse> {
    return this.withRetry(request, async () => {
      const response = await this.dispatch(request, 'arraybuffer');
      const body = asBuffer(response.data);
      if (response.status < 200 || response.status >= 300) {
        throw upstreamError(request, response.status, body.toString('utf-8'));
      }
      return { status: response.status, headers: flattenHeaders(response.headers), body };
    });
  }

  /**
   * Opens a streaming request and yields decoded text as it arrives. The
   * stream is closed when no bytes arrive for `streamIdleTimeoutMs`, when
   * the signal aborts or when the consumer stops iterating.
   */
  async *stream(request: TransportRequest): AsyncGenerator<string> {
    const source = await this.withRetry(request, async () => {
      const response = await this.dispatch(request, 'stream');
      if (!isByteSource(response.data)) {
        throw new TransportError('Upstream did not return a readable stream', {
          provider: request.provider,
          operation: request.operation,
        });
      }
      if (response.status < 200 || response.status >= 300) {
        const body = await drain(response.data);
        throw upstreamError(request, response.status, body);
      }
      return response.data;
    });

    yield* readChunks(source, this.settings.streamIdleTimeoutMs, request);
  }

  private async dispatch(
    request: TransportRequest,
    responseType: 'text' | 'stream' | 'arraybuffer'
  ): Promise<AxiosResponse<unknown>> {
    if (this.insecureTls) {
      logger.warn({ url: request.url }, 'Sending request with TLS verification disabled');
    }
    logger.debug({ method: request.method, url: request.url, provider: request.provider }, 'Upstream request');

    try {
      return await this.client.request<unknown>({
        method: request.method,
        url: request.url,
        headers: request.headers,
        data: request.body,
        signal: request.signal,
        responseType,
      });
    } catch (error) {
      throw toTransportError(error, request);
    }
  }

  private async withRetry<T>(request: TransportRequest, attempt: () => Promise<T>): Promise<T> {
    for (let retry = 0; ; retry++) {
      try {
        return await attempt();
      } catch (error) {
        if (retry >= this.settings.maxRetries || !isRetryable(request.method, error) || request.signal?.aborted) {
          throw error;
        }
        const delay = this.backoff(retry);
        logger.warn(
          { provider: request.provider, url: request.url, attempt: retry + 1, delay, error: describe(error) },
          'Retrying upstream request'
        );
        await this.sleep(delay);
      }
    }
  }

  private backoff(retry: number): number {
    const base = this.settings.retryBaseDelayMs;
    return Math.round(base * 2 ** retry + this.random() * base);
  }
}

export function isRetryable(method: HttpMethod, error: unknown): boolean {
  if (error instanceof TransportError) {
    if (error.cancelled) return false;
    if (method === 'GET') return true;
    return error.code !== undefined && PRE_SEND_ERROR_CODES.has(error.code);
  }
  if (error instanceof UpstreamError) {
    return method === 'GET' && (error.statusCode >= 500 || error.statusCode === 429);
  }
  return false;
}

export function toTransportError(error: unknown, request: Pick<TransportRequest, 'provider' | 'operation' | 'signal'>): LmgateError {
  if (isLmgateError(error)) {
    return error;
  }
  const code = errorCode(error);
  const context = { provider: request.provider, operation: request.operation, code, cause: error };
  const message = error instanceof Error ? error.message : String(error);

  if (code === 'ERR_CANCELED' || request.signal?.aborted) {
    return new TransportError('Request cancelled', { ...context, cancelled: true });
  }
  if (code !== undefined && TIMEOUT_CODES.has(code)) {
    return new TransportError(`Upstream request timed out: ${message}`, { ...context, timeout: true });
  }
  return new TransportError(`Upstream request failed: ${message}`, context);
}

async function* readChunks(
  source: ByteSource,
  idleMs: number,
  request: Pick<TransportRequest, 'provider' | 'operation' | 'signal'>
): AsyncGenerator<string> {
  const iterator = source[Symbol.asyncIterator]();
  const decoder = new TextDecoder();
  try {
    for (;;) {
      let next: IteratorResult<Uint8Array | string>;
      try {
        next = await nextWithin(iterator, idleMs, request);
      } catch (error) {
        throw toTransportError(error, request);
      }
      if (next.done) break;
      const text = typeof next.value === 'string' ? next.value : decoder.decode(next.value, { stream: true });
      if (text) yield text;
    }
    const tail = decoder.decode();
    if (tail) yield tail;
  } finally {
    source.destroy?.();
  }
}

function nextWithin<T>(
  iterator: AsyncIterator<T>,
  idleMs: number,
  request: Pick<TransportRequest, 'provider' | 'operation' | 'signal'>
): Promise<IteratorResult<T>> {
  const { signal } = request;
  return new Promise((resolve, reject) => {
    const onIdle = () => {
      cleanup();
      reject(
        new TransportError(`Stream idle for ${idleMs} ms`, {
          provider: request.provider,
          operation: request.operation,
          code: 'ESTREAMIDLE',
          timeout: true,
        })
      );
    };
    const onAbort = () => {
      cleanup();
      reject(
        new TransportError('Request cancelled', {
          provider: request.provider,
          operation: request.operation,
          code: 'ERR_CANCELED',
          cancelled: true,
        })
      );
    };
    const timer = setTimeout(onIdle, idleMs);
    const cleanup = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };

    if (signal?.aborted) {
      onAbort();
      return;
    }
    signal?.addEventListener('abort', onAbort, { once: true });
    iterator.next().then(
      (result) => {
        cleanup();
        resolve(result);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      }
    );
  });
}

async function drain(source: ByteSource): Promise<string> {
  const decoder = new TextDecoder();
  let text = '';
  try {
    for await (const chunk of source) {
      text += typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });
      if (text.length > MAX_ERROR_BODY) break;
    }
  } finally {
    source.destroy?.();
  }
  return text + decoder.decode();
}

function upstreamError(request: TransportRequest, status: number, body: string): UpstreamError {
  return new UpstreamError(`Upstream returned HTTP ${status}`, status, {
    provider: request.provider,
    operation: request.operation,
    upstreamBody: body,
  });
}

function isByteSource(value: unknown): value is ByteSource {
  return typeof value === 'object' && value !== null && Symbol.asyncIterator in value;
}

function asText(data: unknown): string {
  if (data === undefined || data === null) return '';
  if (typeof data === 'string') return data;
  if (data instanceof Uint8Array) return new TextDecoder().decode(data);
  return JSON.stringify(data);
}

function asBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof Uint8Array) return Buffer.from(data);
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  return Buffer.from(asText(data), 'utf-8');
}

function flattenHeaders(headers: AxiosResponse['headers'] | undefined): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers ?? {})) {
    if (typeof value === 'string') out[name.toLowerCase()] = value;
    else if (Array.isArray(value)) out[name.toLowerCase()] = value.join(', ');
    else if (typeof value === 'number') out[name.toLowerCase()] = String(value);
  }
  return out;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
