import { ConfigError } from '../errors/errors.js';
import type {
  CanonicalChatRequest,
  Operation,
  ProviderConfig,
  TemplateRule,
  TemplatedOperation,
} from '../types/index.js';
import type { ProviderRegistry } from '../registry/provider-registry.js';
import { TemplateEngine } from './template-engine.js';
import type { TemplateContext } from './template-engine.js';
import { pathCarriesModel } from './url-resolver.js';
import {
  systemPrompt,
  toAnthropicMessages,
  toAnthropicTools,
  toBedrockMessages,
  toGeminiContents,
  toWireMessages,
  toWireTools,
} from './message-views.js';

export class RequestRenderer {
  private engine: TemplateEngine;

  constructor(engine: TemplateEngine = new TemplateEngine()) {
    this.engine = engine;
  }

  /**
   * Renders the chat request body for `modelName`. The provider's chat
   * templates are tried in order; the first whose pattern matches wins and
   * the built-in OpenAI body is used when none does.
   */
  render(provider: Readonly<ProviderConfig>, modelName: string, request: CanonicalChatRequest): string {
    const rule = selectTemplate(provider.chatTemplates, modelName);
    if (!rule) {
      return JSON.stringify(defaultBody(provider, modelName, request));
    }
    return this.renderRule(provider, 'chat', rule, buildTemplateContext(provider, modelName, request));
  }

  /**
   * Same selection for embeddings, images and speech. `values` fills the
   * template context next to `model` and the provider vars; `fallback` is
   * sent when no template matches.
   */
  renderOperation(
    provider: Readonly<ProviderConfig>,
    operation: TemplatedOperation,
    modelName: string,
    values: TemplateContext,
    fallback: Record<string, unknown>
  ): string {
    const rule = selectTemplate(provider.templates[operation] ?? [], modelName);
    if (!rule) {
      return JSON.stringify(fallback);
    }
    return this.renderRule(provider, operation, rule, { ...provider.vars, ...values, model: modelName });
  }

  private renderRule(
    provider: Readonly<ProviderConfig>,
    operation: Operation,
    rule: TemplateRule,
    context: TemplateContext
  ): string {
    const body = this.engine.render(rule.template, context);
    try {
      JSON.parse(body);
    } catch (error) {
      throw new ConfigError(`${operation} template for pattern "${rule.pattern}" did not produce valid JSON`, {
        provider: provider.name,
        operation,
        cause: error,
      });
    }
    return body;
  }
}

export function renderRequestBody(
  registry: ProviderRegistry,
  providerName: string,
  modelName: string,
  request: CanonicalChatRequest,
  renderer: RequestRenderer = new RequestRenderer()
): string {
  return renderer.render(registry.get(providerName), modelName, request);
}

export function selectTemplate(rules: readonly TemplateRule[], modelName: string): TemplateRule | undefined {
  return rules.find((rule) => new RegExp(rule.pattern).test(modelName));
}

export function buildTemplateContext(
  provider: Readonly<ProviderConfig>,
  modelName: string,
  request: CanonicalChatRequest
): TemplateContext {
  const tools = request.tools ?? [];
  return {
    ...provider.vars,
    model: modelName,
    max_tokens: request.maxTokens,
    temperature: request.temperature,
    stream: request.stream ?? false,
    messages: toWireMessages(request.messages),
    chat_messages: toWireMessages(request.messages.filter((m) => m.role !== 'system')),
    system_prompt: systemPrompt(request.messages),
    tools: toWireTools(tools),
    anthropic_tools: toAnthropicTools(tools),
    gemini_contents: toGeminiContents(request.messages),
    anthropic_messages: toAnthropicMessages(request.messages),
    bedrock_messages: toBedrockMessages(request.messages),
  };
}

function defaultBody(
  provider: Readonly<ProviderConfig>,
  modelName: string,
  request: CanonicalChatRequest
): Record<string, unknown> {
  const body: Record<string, unknown> = {};
  if (!pathCarriesModel(provider, request.stream ? 'chatStream' : 'chat')) {
    body.model = modelName;
  }
  body.messages = toWireMessages(request.messages);
  if (request.maxTokens !== undefined) body.max_tokens = request.maxTokens;
  if (request.temperature !== undefined) body.temperature = request.temperature;
  if (request.tools && request.tools.length > 0) body.tools = toWireTools(request.tools);
  if (request.stream) body.stream = true;
  return body;
}
