// Canonical, provider-agnostic request/response shapes

// ============================================================================
// Message Types
// ============================================================================

export type CanonicalRole = 'system' | 'user' | 'assistant' | 'tool';

export interface TextPart {
  type: 'text';
  text: string;
}

export interface ImagePart {
  type: 'image';
  /** http(s) URL or a `data:<mime>;base64,...` URL */
  url: string;
  detail?: 'low' | 'high' | 'auto';
}

export interface AudioPart {
  type: 'audio';
  /** base64 payload without a data: prefix */
  data: string;
  format: string;
}

export type ContentPart = TextPart | ImagePart | AudioPart;

export type MessageContent = string | ContentPart[];

export interface CanonicalToolCall {
  id: string;
  name: string;
  /** JSON-encoded arguments, as the OpenAI wire format carries them */
  arguments: string;
}

export interface CanonicalMessage {
  role: CanonicalRole;
  content: MessageContent | null;
  toolCalls?: CanonicalToolCall[];
  toolCallId?: string;
  name?: string;
}

// ============================================================================
// Tool Types
// ============================================================================

export interface CanonicalTool {
  name: string;
  description?: string;
  parameters?: Record<string, unknown>;
}

// ============================================================================
// Request / Response
// ============================================================================

export interface CanonicalChatRequest {
  model: string;
  messages: CanonicalMessage[];
  maxTokens?: number;
  temperature?: number;
  tools?: CanonicalTool[];
  stream?: boolean;
}

export type FinishReason = 'stop' | 'length' | 'tool_calls' | 'content_filter';

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface CanonicalChatResponse {
  role: 'assistant';
  content: string;
  toolCalls?: CanonicalToolCall[];
  usage?: TokenUsage;
  finishReason: FinishReason | null;
}

export interface ToolCallDelta {
  index: number;
  id?: string;
  name?: string;
  arguments?: string;
}

export interface CanonicalChatChunk {
  role?: 'assistant';
  content?: string;
  toolCalls?: ToolCallDelta[];
  usage?: TokenUsage;
  finishReason?: FinishReason;
}

// ============================================================================
// Auxiliary operations
// ============================================================================

export interface EmbeddingRequest {
  model: string;
  input: string[];
}

export interface EmbeddingResult {
  embeddings: number[][];
  usage?: TokenUsage;
}

export interface ImageGenerationRequest {
  model: string;
  prompt: string;
  n?: number;
  size?: string;
}

export interface GeneratedImage {
  url?: string;
  b64Json?: string;
  revisedPrompt?: string;
}

export interface SpeechRequest {
  model: string;
  /** Text to speak */
  input: string;
  voice: string;
  /** mp3, opus, aac, flac, wav or pcm */
  responseFormat?: string;
  speed?: number;
}

export interface SpeechResult {
  audio: Buffer;
  contentType?: string;
}

export interface TranscriptionRequest {
  model: string;
  /** Base64 audio, or a `data:audio/...;base64,` URL */
  file: string;
  language?: string;
  prompt?: string;
  /** json, text, srt, verbose_json or vtt */
  responseFormat?: string;
  temperature?: number;
}

export interface TranscriptionResult {
  text: string;
  language?: string;
  duration?: number;
}
