import { z } from 'zod';
import { GatewayError, UpstreamError, UpstreamFormatError } from '../errors/errors.js';
import type {
  CanonicalChatChunk,
  CanonicalChatRequest,
  CanonicalChatResponse,
  EmbeddingRequest,
  EmbeddingResult,
  GeneratedImage,
  ImageGenerationRequest,
  ModelInfo,
  Operation,
  ProviderConfig,
  SpeechRequest,
  SpeechResult,
  TranscriptionRequest,
  TranscriptionResult,
} from '../types/index.js';
import type { ProviderRegistry } from '../registry/provider-registry.js';
import type { AuthManager } from '../auth/auth-manager.js';
import type { HttpTransport } from '../transport/http-transport.js';
import type { ConcurrencyLimiter } from '../rate-limiter/concurrency-limiter.js';
import { readFrames } from '../transport/sse-reader.js';
import { RequestRenderer } from '../template/request-renderer.js';
import { pathCarriesModel, resolveProviderUrl } from '../template/url-resolver.js';
import { normalizeResponse, normalizeStream } from '../normalizer/response-normalizer.js';
import { normalizeUsage } from '../normalizer/usage.js';
import { parseModelList } from '../models/model-list.js';
import logger from '../config/logger.js';

const embeddingResponseSchema = z.union([
  z.object({
    data: z.array(z.object({ embedding: z.array(z.number()), index: z.number().optional() })),
    usage: z.unknown().optional(),
  }),
  z.object({ embeddings: z.array(z.object({ values: z.array(z.number()) })) }),
  z.object({ embeddings: z.array(z.array(z.number())), prompt_eval_count: z.number().optional() }),
]);

const imageResponseSchema = z.object({
  data: z.array(
    z.object({ url: z.string().optional(), b64_json: z.string().optional(), revised_prompt: z.string().optional() })
  ),
});

export interface ProviderClientDeps {
  registry: ProviderRegistry;
  auth: AuthManager;
  transport: HttpTransport;
  limiter: ConcurrencyLimiter;
  renderer?: RequestRenderer;
}

/**
 * Runs the outbound pipeline for one provider call:
 * registry → URL and body → auth headers → transport → normalizer.
 */
export class ProviderClient {
  private registry: ProviderRegistry;
  private auth: AuthManager;
  private transport: HttpTransport;
  private limiter: ConcurrencyLimiter;
  private renderer: RequestRenderer;

  constructor(deps: ProviderClientDeps) {
    this.registry = deps.registry;
    this.auth = deps.auth;
    this.transport = deps.transport;
    this.limiter = deps.limiter;
    this.renderer = deps.renderer ?? new RequestRenderer();
  }

  async chat(providerName: string, request: CanonicalChatRequest, signal?: AbortSignal): Promise<CanonicalChatResponse> {
    assertMessages(request, providerName);
    const provider = this.registry.get(providerName);
    const url = resolveProviderUrl(provider, 'chat', request.model);
    const body = this.renderer.render(provider, request.model, { ...request, stream: false });

    const release = this.limiter.tryAcquire(providerName);
    try {
      const headers = await this.headersFor(provider);
      logger.info({ provider: providerName, model: request.model }, 'Chat request');
      const response = await this.send(provider, 'chat', { method: 'POST', url, headers, body, signal });
      return normalizeResponse(response, { provider: providerName, operation: 'chat' });
    } finally {
      release();
    }
  }

  /**
   * Streams canonical chunks in upstream order. Stopping iteration early
   * closes the upstream connection.
   */
  async *chatStream(
    providerName: string,
    request: CanonicalChatRequest,
    signal?: AbortSignal
  ): AsyncGenerator<CanonicalChatChunk> {
    assertMessages(request, providerName);
    const provider = this.registry.get(providerName);
    const url = resolveProviderUrl(provider, 'chatStream', request.model);
    const body = this.renderer.render(provider, request.model, { ...request, stream: true });

    const release = this.limiter.tryAcquire(providerName);
    try {
      const headers = await this.headersFor(provider);
      headers.Accept = 'text/event-stream';
      logger.info({ provider: providerName, model: request.model }, 'Chat stream request');
      const text = this.transport.stream({
        method: 'POST',
        url,
        headers,
        body,
        signal,
        provider: providerName,
        operation: 'chat',
      });
      yield* normalizeStream(readFrames(text), { provider: providerName, operation: 'chat' });
    } catch (error) {
      await this.onUpstreamError(providerName, error);
      throw error;
    } finally {
      release();
    }
  }

  async listModels(providerName: string, signal?: AbortSignal): Promise<ModelInfo[]> {
    const provider = this.registry.get(providerName);
    const url = resolveProviderUrl(provider, 'models', '');

    const release = this.limiter.tryAcquire(providerName);
    try {
      const headers = await this.headersFor(provider);
      const body = await this.send(provider, 'models', { method: 'GET', url, headers, signal });
      return parseModelList(body, providerName);
    } finally {
      release();
    }
  }

  async embed(providerName: string, request: EmbeddingRequest, signal?: AbortSignal): Promise<EmbeddingResult> {
    if (request.input.length === 0) {
      throw new GatewayError('input must not be empty', 400, 'invalid_request', {
        provider: providerName,
        operation: 'embeddings',
      });
    }
    const provider = this.registry.get(providerName);
    const url = resolveProviderUrl(provider, 'embeddings', request.model);
    const payload: Record<string, unknown> = { input: request.input };
    if (!pathCarriesModel(provider, 'embeddings')) payload.model = request.model;
    const requestBody = this.renderer.renderOperation(provider, 'embeddings', request.model, { input: request.input }, payload);

    const release = this.limiter.tryAcquire(providerName);
    try {
      const headers = await this.headersFor(provider);
      const body = await this.send(provider, 'embeddings', { method: 'POST', url, headers, body: requestBody, signal });
      return parseEmbeddings(body, providerName);
    } finally {
      release();
    }
  }

  async generateImages(
    providerName: string,
    request: ImageGenerationRequest,
    signal?: AbortSignal
  ): Promise<GeneratedImage[]> {
    const provider = this.registry.get(providerName);
    const url = resolveProviderUrl(provider, 'images', request.model);
    const payload: Record<string, unknown> = { prompt: request.prompt };
    if (!pathCarriesModel(provider, 'images')) payload.model = request.model;
    if (request.n !== undefined) payload.n = request.n;
    if (request.size !== undefined) payload.size = request.size;
    const requestBody = this.renderer.renderOperation(
      provider,
      'images',
      request.model,
      { prompt: request.prompt, n: request.n, size: request.size },
      payload
    );

    const release = this.limiter.tryAcquire(providerName);
    try {
      const headers = await this.headersFor(provider);
      const body = await this.send(provider, 'images', { method: 'POST', url, headers, body: requestBody, signal });
      const parsed = imageResponseSchema.safeParse(safeJson(body));
      if (!parsed.success) {
        throw new UpstreamFormatError('Image response matches no known format', {
          provider: providerName,
          operation: 'images',
          upstreamBody: body,
        });
      }
      return parsed.data.data.map((image) => ({
        ...(image.url !== undefined && { url: image.url }),
        ...(image.b64_json !== undefined && { b64Json: image.b64_json }),
        ...(image.revised_prompt !== undefined && { revisedPrompt: image.revised_prompt }),
      }));
    } finally {
      release();
    }
  }

  /**
   * Text to speech. Returns the audio bytes as the upstream sent them.
   */
  async speech(providerName: string, request: SpeechRequest, signal?: AbortSignal): Promise<SpeechResult> {
    if (!request.input.trim()) {
      throw new GatewayError('input must not be empty', 400, 'invalid_request', {
        provider: providerName,
        operation: 'speech',
      });
    }
    const provider = this.registry.get(providerName);
    const url = resolveProviderUrl(provider, 'speech', request.model);
    const payload: Record<string, unknown> = { input: request.input, voice: request.voice };
    if (!pathCarriesModel(provider, 'speech')) payload.model = request.model;
    if (request.responseFormat !== undefined) payload.response_format = request.responseFormat;
    if (request.speed !== undefined) payload.speed = request.speed;
    const requestBody = this.renderer.renderOperation(
      provider,
      'speech',
      request.model,
      { input: request.input, voice: request.voice, response_format: request.responseFormat, speed: request.speed },
      payload
    );

    const release = this.limiter.tryAcquire(providerName);
    try {
      const headers = await this.headersFor(provider);
      logger.info({ provider: providerName, model: request.model }, 'Speech request');
      const response = await this.upstream(providerName, () =>
        this.transport.sendBytes({
          method: 'POST',
          url,
          headers,
          body: requestBody,
          signal,
          provider: providerName,
          operation: 'speech',
        })
      );
      const contentType = response.headers['content-type'];
      return { audio: response.body, ...(contentType !== undefined && { contentType }) };
    } finally {
      release();
    }
  }

  /**
   * Speech to text. The audio goes up as a multipart form; the answer may be
   * JSON or plain text depending on `responseFormat`.
   */
  async transcribe(
    providerName: string,
    request: TranscriptionRequest,
    signal?: AbortSignal
  ): Promise<TranscriptionResult> {
    const audio = decodeAudio(request.file, providerName);
    const provider = this.registry.get(providerName);
    const url = resolveProviderUrl(provider, 'audio', request.model);

    const form = new FormData();
    form.append('model', request.model);
    form.append('file', new Blob([new Uint8Array(audio.bytes)], { type: audio.mimeType }), `audio.${audio.extension}`);
    if (request.language !== undefined) form.append('language', request.language);
    if (request.prompt !== undefined) form.append('prompt', request.prompt);
    if (request.responseFormat !== undefined) form.append('response_format', request.responseFormat);
    if (request.temperature !== undefined) form.append('temperature', String(request.temperature));

    const release = this.limiter.tryAcquire(providerName);
    try {
      // The transport sets the multipart boundary
      const headers = await this.headersFor(provider, null);
      logger.info({ provider: providerName, model: request.model, bytes: audio.bytes.length }, 'Transcription request');
      const body = await this.send(provider, 'audio', { method: 'POST', url, headers, body: form, signal });
      return parseTranscription(body, providerName);
    } finally {
      release();
    }
  }

  private async headersFor(
    provider: Readonly<ProviderConfig>,
    contentType: string | null = 'application/json'
  ): Promise<Record<string, string>> {
    const auth = await this.auth.prepareHeaders(provider.name);
    return { ...(contentType !== null && { 'Content-Type': contentType }), ...provider.headers, ...auth };
  }

  private async send(
    provider: Readonly<ProviderConfig>,
    operation: Operation,
    request: {
      method: 'GET' | 'POST';
      url: string;
      headers: Record<string, string>;
      body?: string | FormData;
      signal?: AbortSignal;
    }
  ): Promise<string> {
    const response = await this.upstream(provider.name, () =>
      this.transport.send({ ...request, provider: provider.name, operation })
    );
    return response.body;
  }

  private async upstream<T>(provider: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      await this.onUpstreamError(provider, error);
      throw error;
    }
  }

  private async onUpstreamError(provider: string, error: unknown): Promise<void> {
    if (error instanceof UpstreamError && error.statusCode === 401) {
      // A rejected derived token must not be reused
      await this.auth.invalidate(provider);
    }
  }
}

function assertMessages(request: CanonicalChatRequest, provider: string): void {
  if (request.messages.length === 0) {
    throw new GatewayError('messages must not be empty', 400, 'invalid_request', { provider, operation: 'chat' });
  }
}

function parseEmbeddings(body: string, provider: string): EmbeddingResult {
  const parsed = embeddingResponseSchema.safeParse(safeJson(body));
  if (!parsed.success) {
    throw new UpstreamFormatError('Embedding response matches no known format', {
      provider,
      operation: 'embeddings',
      upstreamBody: body,
    });
  }
  const data = parsed.data;
  if ('data' in data) {
    const ordered = [...data.data].sort((a, b) => (a.index ?? 0) - (b.index ?? 0));
    const usage = normalizeUsage(data.usage);
    return { embeddings: ordered.map((item) => item.embedding), ...(usage && { usage }) };
  }
  const items: (number[] | { values: number[] })[] = data.embeddings;
  const embeddings = items.map((item) => (Array.isArray(item) ? item : item.values));
  const usage = 'prompt_eval_count' in data ? normalizeUsage({ prompt_eval_count: data.prompt_eval_count }) : undefined;
  return { embeddings, ...(usage && { usage }) };
}

const transcriptionSchema = z.object({
  text: z.string(),
  language: z.string().optional(),
  duration: z.number().optional(),
});

function parseTranscription(body: string, provider: string): TranscriptionResult {
  if (!body.trimStart().startsWith('{')) {
    // response_format text, srt or vtt
    return { text: body.trim() };
  }
  const parsed = transcriptionSchema.safeParse(safeJson(body));
  if (!parsed.success) {
    throw new UpstreamFormatError('Transcription response matches no known format', {
      provider,
      operation: 'audio',
      upstreamBody: body,
    });
  }
  return {
    text: parsed.data.text,
    ...(parsed.data.language !== undefined && { language: parsed.data.language }),
    ...(parsed.data.duration !== undefined && { duration: parsed.data.duration }),
  };
}

const AUDIO_EXTENSIONS: Readonly<Record<string, string>> = {
  'audio/mpeg': 'mp3',
  'audio/mp3': 'mp3',
  'audio/wav': 'wav',
  'audio/wave': 'wav',
  'audio/flac': 'flac',
  'audio/ogg': 'ogg',
  'audio/webm': 'webm',
  'audio/mp4': 'mp4',
};

interface DecodedAudio {
  bytes: Buffer;
  extension: string;
  mimeType: string;
}

/**
 * Accepts raw base64 or a `data:` URL. Without a recognised audio MIME type
 * the upload is named audio.wav.
 */
export function decodeAudio(file: string, provider?: string): DecodedAudio {
  const invalid = (message: string) =>
    new GatewayError(message, 400, 'invalid_request', { provider, operation: 'audio' });

  let base64 = file.trim();
  let extension = 'wav';
  if (base64.startsWith('data:')) {
    const comma = base64.indexOf(',');
    if (comma === -1) {
      throw invalid('file is not a valid data URL');
    }
    const mime = base64.slice('data:'.length, comma).split(';')[0].toLowerCase();
    extension = AUDIO_EXTENSIONS[mime] ?? 'wav';
    base64 = base64.slice(comma + 1);
  }
  if (!/^[A-Za-z0-9+/]+={0,2}$/.test(base64.replace(/\s+/g, ''))) {
    throw invalid('file must be base64 encoded audio');
  }
  const bytes = Buffer.from(base64, 'base64');
  return { bytes, extension, mimeType: extension === 'mp3' ? 'audio/mpeg' : `audio/${extension}` };
}

function safeJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}
