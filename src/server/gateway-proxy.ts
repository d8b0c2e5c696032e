import express, { Request, Response, NextFunction } from 'express';
import type { Server } from 'http';
import type { AddressInfo } from 'net';
import type { Writable } from 'stream';
import { randomInt, randomUUID, timingSafeEqual } from 'crypto';
import type { RequestHandler } from '../handler/request-handler.js';
import type { Router } from '../router/router.js';
import type { ModelCatalog, ProviderModels } from '../models/model-catalog.js';
import type { ResponseTransformer } from '../transformer/response-transformer.js';
import { httpStatusFor } from '../transformer/response-transformer.js';
import { ConfigError, GatewayError, isLmgateError } from '../errors/errors.js';
import type { GatewaySettings, OpenAIError } from '../types/index.js';
import logger from '../config/logger.js';

const LOOPBACK_HOSTS = ['localhost', '127.0.0.1', '::1'];
const KEY_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

/**
 * Random gateway bearer key: `sk-` followed by 32 alphanumerics
 */
export function generateApiKey(): string {
  let key = 'sk-';
  for (let i = 0; i < 32; i++) {
    key += KEY_ALPHABET[randomInt(KEY_ALPHABET.length)];
  }
  return key;
}

/**
 * Writes one SSE frame and, when the socket buffer is full, waits until it
 * drains or the client goes away.
 */
export async function writeFrame(out: Writable, frame: string): Promise<void> {
  if (out.write(frame) || out.destroyed) {
    return;
  }
  await new Promise<void>((resolve) => {
    const done = (): void => {
      out.off('drain', done);
      out.off('close', done);
      resolve();
    };
    out.on('drain', done);
    out.on('close', done);
  });
}

export interface GatewayDeps {
  requestHandler: RequestHandler;
  router: Router;
  catalog: ModelCatalog;
  transformer: ResponseTransformer;
}

export class GatewayProxy {
  private app: express.Application;
  private server: Server | null = null;
  private deps: GatewayDeps;
  private settings: Readonly<GatewaySettings>;

  constructor(deps: GatewayDeps, settings: GatewaySettings) {
    this.deps = deps;
    this.settings = Object.freeze({ ...settings });
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandler();
  }

  private setupMiddleware(): void {
    // Request ID and logging
    this.app.use((req: Request, res: Response, next: NextFunction) => {
      const requestId = randomUUID();
      req.headers['x-request-id'] = requestId;
      res.setHeader('x-request-id', requestId);
      logger.info({ method: req.method, path: req.path, requestId }, 'Incoming request');
      next();
    });

    const apiKey = this.settings.apiKey;
    if (apiKey) {
      this.app.use((req: Request, res: Response, next: NextFunction) => {
        if (bearerMatches(req.headers.authorization, apiKey)) {
          next();
          return;
        }
        logger.warn({ path: req.path }, 'Rejected request without a valid bearer key');
        res.status(401).json(this.deps.transformer.toOpenAIError(new GatewayError('Invalid or missing API key', 401, 'invalid_api_key')));
      });
    }

    this.app.use(express.json({ limit: '10mb' }));
  }

  private setupRoutes(): void {
    this.app.post(['/chat/completions', '/v1/chat/completions'], this.handleChatCompletions.bind(this));
    this.app.get(['/models', '/v1/models'], this.handleListModels.bind(this));
    this.app.get('/health', this.handleHealth.bind(this));

    // 404 handler
    this.app.use((_req: Request, res: Response) => {
      res.status(404).json({
        error: { message: 'Not found', type: 'invalid_request_error', param: null, code: null },
      });
    });
  }

  private async handleChatCompletions(req: Request, res: Response, next: NextFunction): Promise<void> {
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) {
        logger.info({ requestId: req.headers['x-request-id'] }, 'Client disconnected, aborting upstream request');
        controller.abort();
      }
    });

    try {
      const request = this.deps.requestHandler.parseRequest(req.body);

      if (!request.stream) {
        const response = await this.deps.requestHandler.handleCompletion(request, controller.signal);
        res.json(response);
        return;
      }

      const iterator = this.deps.requestHandler.handleCompletionStream(request, controller.signal);
      // Upstream failures before the first chunk still get a proper status code
      const first = await iterator.next();

      res.status(200);
      res.setHeader('Content-Type', 'text/event-stream');
      res.setHeader('Cache-Control', 'no-cache');
      res.setHeader('Connection', 'keep-alive');
      res.setHeader('X-Accel-Buffering', 'no');
      res.flushHeaders();

      try {
        let step = first;
        while (!step.done) {
          if (res.destroyed) {
            await iterator.return(undefined);
            return;
          }
          await writeFrame(res, step.value);
          step = await iterator.next();
        }
      } catch (streamError: unknown) {
        if (controller.signal.aborted || res.destroyed) {
          logger.debug({ requestId: req.headers['x-request-id'] }, 'Stream ended after client disconnect');
          return;
        }
        // Mid-stream error: send error as SSE event then close
        logger.error({ error: describe(streamError) }, 'Upstream stream failed');
        res.write(this.deps.transformer.formatSSE(this.deps.transformer.toOpenAIError(streamError)));
        res.write(this.deps.transformer.formatSSEDone());
      }

      if (!res.destroyed) {
        res.end();
      }
    } catch (error: unknown) {
      if (controller.signal.aborted) {
        logger.debug({ requestId: req.headers['x-request-id'] }, 'Request cancelled by client');
        return;
      }
      next(error);
    }
  }

  private async handleListModels(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const filter = this.deps.router.getFilter();
      let providers = this.deps.router.permittedProviders();

      const requested = req.query.provider;
      if (typeof requested === 'string' && requested) {
        if (!providers.includes(requested)) {
          throw new GatewayError(`Unknown provider: ${requested}`, 404, 'provider_not_found');
        }
        providers = [requested];
      }

      let groups: ProviderModels[] = await this.deps.catalog.listAll(providers);
      if (filter.provider && filter.model) {
        const pinned = filter.model;
        groups = groups.map((group) => {
          const match = group.models.filter((model) => model.id === pinned);
          return {
            provider: group.provider,
            models:
              match.length > 0
                ? match
                : [{ id: pinned, capabilities: { tools: false, vision: false, audio: false, reasoning: false } }],
          };
        });
      }

      res.json(this.deps.transformer.toModelList(groups, !filter.provider));
    } catch (error: unknown) {
      next(error);
    }
  }

  private handleHealth(_req: Request, res: Response): void {
    res.json({ status: 'ok', providers: this.deps.router.permittedProviders() });
  }

  private setupErrorHandler(): void {
    this.app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
      const { status, body } = this.errorResponse(err);
      if (status >= 500) {
        logger.error({ error: isLmgateError(err) ? err.describe() : describe(err) }, 'Request error');
      } else {
        logger.warn({ status, error: describe(err) }, 'Request rejected');
      }

      if (res.headersSent) {
        res.end();
        return;
      }
      res.status(status).json(body);
    });
  }

  private errorResponse(err: unknown): { status: number; body: OpenAIError } {
    if (isLmgateError(err)) {
      return { status: httpStatusFor(err), body: this.deps.transformer.toOpenAIError(err) };
    }
    // body-parser errors carry their own 4xx status
    if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number' && err.status < 500) {
      return {
        status: err.status,
        body: { error: { message: describe(err), type: 'invalid_request_error', param: null, code: null } },
      };
    }
    return { status: 500, body: this.deps.transformer.toOpenAIError(err) };
  }

  /**
   * Binding beyond loopback is only allowed with a bearer key
   */
  private validateHost(host: string): void {
    if (!LOOPBACK_HOSTS.includes(host) && !this.settings.apiKey) {
      throw new ConfigError(`Refusing to listen on ${host} without a gateway API key`);
    }
  }

  async start(): Promise<AddressInfo> {
    const { host, port } = this.settings;
    this.validateHost(host);

    return new Promise((resolve, reject) => {
      const server = this.app.listen(port, host, () => {
        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new ConfigError(`Unexpected listen address: ${String(address)}`));
          return;
        }
        logger.info({ host, port: address.port }, 'Gateway proxy started');
        resolve(address);
      });
      server.on('error', reject);
      this.server = server;
    });
  }

  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.server) {
        resolve();
        return;
      }
      this.server.close((err) => {
        if (err) reject(err);
        else {
          this.server = null;
          logger.info('Gateway proxy stopped');
          resolve();
        }
      });
    });
  }

  getApp(): express.Application {
    return this.app;
  }
}

function bearerMatches(header: string | undefined, apiKey: string): boolean {
  const match = /^Bearer\s+(.+)$/i.exec(header ?? '');
  if (!match) return false;
  const presented = Buffer.from(match[1].trim());
  const expected = Buffer.from(apiKey);
  return presented.length === expected.length && timingSafeEqual(presented, expected);
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
