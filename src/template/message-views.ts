import type {
  CanonicalMessage,
  CanonicalTool,
  CanonicalToolCall,
  ContentPart,
  MessageContent,
  ContentPartParam,
  Message,
  Tool,
} from '../types/index.js';

// Pre-shaped message lists exposed to request templates, one per wire dialect.

// ============================================================================
// OpenAI
// ============================================================================

export function toWireMessages(messages: CanonicalMessage[]): Message[] {
  return messages.map(toWireMessage);
}

export function toWireMessage(message: CanonicalMessage): Message {
  const wire: Message = {
    role: message.role,
    content: message.content === null ? null : toWireContent(message.content),
  };
  if (message.name) wire.name = message.name;
  if (message.toolCallId) wire.tool_call_id = message.toolCallId;
  if (message.toolCalls && message.toolCalls.length > 0) {
    wire.tool_calls = message.toolCalls.map((call) => ({
      id: call.id,
      type: 'function',
      function: { name: call.name, arguments: call.arguments },
    }));
  }
  return wire;
}

function toWireContent(content: MessageContent): string | ContentPartParam[] {
  if (typeof content === 'string') {
    return content;
  }
  return content.map((part): ContentPartParam => {
    switch (part.type) {
      case 'text':
        return { type: 'text', text: part.text };
      case 'image':
        return {
          type: 'image_url',
          image_url: part.detail ? { url: part.url, detail: part.detail } : { url: part.url },
        };
      case 'audio':
        return { type: 'input_audio', input_audio: { data: part.data, format: part.format } };
    }
  });
}

export function toWireTools(tools: CanonicalTool[]): Tool[] {
  return tools.map((tool) => ({
    type: 'function',
    function: {
      name: tool.name,
      ...(tool.description !== undefined && { description: tool.description }),
      ...(tool.parameters !== undefined && { parameters: tool.parameters }),
    },
  }));
}

// ============================================================================
// Shared helpers
// ============================================================================

/**
 * Concatenated text of all system messages, or undefined when there are none
 */
export function systemPrompt(messages: CanonicalMessage[]): string | undefined {
  const parts = messages.filter((m) => m.role === 'system').map((m) => textOf(m.content));
  return parts.length > 0 ? parts.join('\n') : undefined;
}

export function textOf(content: MessageContent | null): string {
  if (content === null) return '';
  if (typeof content === 'string') return content;
  return content
    .filter((part): part is Extract<ContentPart, { type: 'text' }> => part.type === 'text')
    .map((part) => part.text)
    .join('');
}

interface DataUrl {
  mimeType: string;
  data: string;
}

export function parseDataUrl(url: string): DataUrl | null {
  const match = /^data:([^;,]+);base64,(.*)$/s.exec(url);
  return match ? { mimeType: match[1], data: match[2] } : null;
}

export function parseArguments(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw);
    return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
      ? Object.fromEntries(Object.entries(parsed))
      : {};
  } catch {
    return {};
  }
}

function partsOf(content: MessageContent | null): ContentPart[] {
  if (content === null || content === '') return [];
  return typeof content === 'string' ? [{ type: 'text', text: content }] : content;
}

function toolNameFor(messages: CanonicalMessage[], toolCallId: string | undefined): string {
  for (const message of messages) {
    const call = message.toolCalls?.find((c: CanonicalToolCall) => c.id === toolCallId);
    if (call) return call.name;
  }
  return toolCallId ?? 'tool';
}

// ============================================================================
// Gemini: { role: 'user' | 'model', parts: [...] }, system messages excluded
// ============================================================================

export function toGeminiContents(messages: CanonicalMessage[]): Record<string, unknown>[] {
  return messages
    .filter((m) => m.role !== 'system')
    .map((message) => {
      if (message.role === 'tool') {
        return {
          role: 'user',
          parts: [
            {
              functionResponse: {
                name: message.name ?? toolNameFor(messages, message.toolCallId),
                response: { content: textOf(message.content) },
              },
            },
          ],
        };
      }

      const parts: Record<string, unknown>[] = partsOf(message.content).map((part) => {
        switch (part.type) {
          case 'text':
            return { text: part.text };
          case 'image': {
            const inline = parseDataUrl(part.url);
            return inline
              ? { inlineData: { mimeType: inline.mimeType, data: inline.data } }
              : { fileData: { fileUri: part.url } };
          }
          case 'audio':
            return { inlineData: { mimeType: `audio/${part.format}`, data: part.data } };
        }
      });
      for (const call of message.toolCalls ?? []) {
        parts.push({ functionCall: { name: call.name, args: parseArguments(call.arguments) } });
      }
      return { role: message.role === 'assistant' ? 'model' : 'user', parts };
    });
}

// ============================================================================
// Anthropic messages API: system messages excluded, tool results as user turns
// ============================================================================

export function toAnthropicMessages(messages: CanonicalMessage[]): Record<string, unknown>[] {
  return messages
    .filter((m) => m.role !== 'system')
    .map((message) => {
      if (message.role === 'tool') {
        return {
          role: 'user',
          content: [{ type: 'tool_result', tool_use_id: message.toolCallId ?? '', content: textOf(message.content) }],
        };
      }

      const hasToolCalls = (message.toolCalls?.length ?? 0) > 0;
      if (typeof message.content === 'string' && !hasToolCalls) {
        return { role: message.role, content: message.content };
      }

      const blocks: Record<string, unknown>[] = [];
      for (const part of partsOf(message.content)) {
        if (part.type === 'text') {
          blocks.push({ type: 'text', text: part.text });
        } else if (part.type === 'image') {
          const inline = parseDataUrl(part.url);
          blocks.push({
            type: 'image',
            source: inline
              ? { type: 'base64', media_type: inline.mimeType, data: inline.data }
              : { type: 'url', url: part.url },
          });
        }
      }
      for (const call of message.toolCalls ?? []) {
        blocks.push({ type: 'tool_use', id: call.id, name: call.name, input: parseArguments(call.arguments) });
      }
      return { role: message.role, content: blocks };
    });
}

export function toAnthropicTools(tools: CanonicalTool[]): Record<string, unknown>[] {
  return tools.map((tool) => ({
    name: tool.name,
    ...(tool.description !== undefined && { description: tool.description }),
    input_schema: tool.parameters ?? { type: 'object', properties: {} },
  }));
}

// ============================================================================
// Bedrock Converse: { role, content: [{ text } | { image }] }
// ============================================================================

export function toBedrockMessages(messages: CanonicalMessage[]): Record<string, unknown>[] {
  return messages
    .filter((m) => m.role !== 'system')
    .map((message) => {
      if (message.role === 'tool') {
        return {
          role: 'user',
          content: [
            {
              toolResult: {
                toolUseId: message.toolCallId ?? '',
                content: [{ text: textOf(message.content) }],
              },
            },
          ],
        };
      }

      const content: Record<string, unknown>[] = [];
      for (const part of partsOf(message.content)) {
        if (part.type === 'text') {
          content.push({ text: part.text });
        } else if (part.type === 'image') {
          const inline = parseDataUrl(part.url);
          if (inline) {
            content.push({ image: { format: inline.mimeType.replace(/^image\//, ''), source: { bytes: inline.data } } });
          }
        }
      }
      for (const call of message.toolCalls ?? []) {
        content.push({ toolUse: { toolUseId: call.id, name: call.name, input: parseArguments(call.arguments) } });
      }
      return { role: message.role === 'assistant' ? 'assistant' : 'user', content };
    });
}
