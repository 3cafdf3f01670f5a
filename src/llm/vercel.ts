/**
 * VercelAIBackend - Model backend using Vercel AI SDK
 *
 * Supports multiple providers through Vercel AI SDK:
 * - OpenAI
 * - Anthropic
 * - Cerebras
 * - OpenAI-compatible (Groq, Together, Fireworks, etc.)
 *
 * Tools are declared without `execute`, so tool calls come back to the
 * agent runner instead of being run by the SDK.
 */

import { APICallError, generateText, jsonSchema, tool } from 'ai';
import type { CoreMessage, CoreTool, LanguageModel } from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import { createAnthropic } from '@ai-sdk/anthropic';
import { createCerebras } from '@ai-sdk/cerebras';
import { createOpenAICompatible } from '@ai-sdk/openai-compatible';
import { ApiError, MissingApiKeyError, ProviderError, UnknownProviderError, errorMessage } from '../errors';
import { NullLogger, type Logger } from '../logging';
import { ProfileManager } from '../profiles';
import { toJsonValue } from '../values';
import type { ChatRequest, ChatResponse, Message, ModelBackend, ModelConfig, ToolDefinition } from './types';

// Known provider base URLs for OpenAI-compatible providers
const PROVIDER_BASE_URLS: Record<string, string> = {
  cerebras: 'https://api.cerebras.ai/v1',
  groq: 'https://api.groq.com/openai/v1',
  together: 'https://api.together.xyz/v1',
  fireworks: 'https://api.fireworks.ai/inference/v1',
  deepseek: 'https://api.deepseek.com/v1',
  mistral: 'https://api.mistral.ai/v1',
  perplexity: 'https://api.perplexity.ai',
};

const JSON_MODE_INSTRUCTION = 'Respond only with valid JSON. Do not include any other text.';

export interface VercelAIBackendOptions {
  /** API keys by lowercase provider name. Falls back to `<PROVIDER>_API_KEY`. */
  apiKeys?: Record<string, string | undefined>;
  profiles?: ProfileManager;
  /** Used when a request names no model. */
  defaultModel?: string;
  logger?: Logger;
  /** Builds the model for a resolved config. Defaults to the provider SDKs. */
  modelFactory?: (config: ModelConfig) => LanguageModel;
}

export class VercelAIBackend implements ModelBackend {
  totalApiCalls = 0;

  private apiKeys: Record<string, string | undefined>;
  private profiles: ProfileManager;
  private defaultModel: string | undefined;
  private logger: Logger;
  private modelFactory: (config: ModelConfig) => LanguageModel;
  private models = new Map<string, LanguageModel>();

  constructor(options: VercelAIBackendOptions = {}) {
    this.apiKeys = options.apiKeys ?? {};
    this.profiles = options.profiles ?? new ProfileManager();
    this.defaultModel = options.defaultModel;
    this.logger = options.logger ?? new NullLogger();
    this.modelFactory = options.modelFactory ?? ((config) => this.createModel(config));
  }

  async chat(request: ChatRequest): Promise<ChatResponse> {
    const config = this.profiles.resolveModelConfig(request.model ?? this.defaultModel);
    const model = this.getModel(config);

    const system = systemPrompt(request.messages, request.jsonMode);
    const messages = toCoreMessages(request.messages);
    const tools = request.tools.length > 0 ? toCoreTools(request.tools) : undefined;

    this.totalApiCalls++;
    this.logger.debug('Calling model', {
      provider: config.provider,
      model: config.name,
      messages: messages.length,
      tools: request.tools.length,
    });

    try {
      const result = await generateText({
        model,
        system,
        messages,
        tools,
        temperature: config.temperature,
        maxTokens: config.max_tokens,
        topP: config.top_p,
      });

      return {
        content: result.text.length > 0 ? result.text : undefined,
        toolCalls: result.toolCalls.map((call) => ({
          id: call.toolCallId,
          name: call.toolName,
          arguments: toJsonValue(call.args),
        })),
      };
    } catch (err) {
      if (APICallError.isInstance(err)) {
        throw new ApiError(err.message, err.statusCode);
      }
      throw new ProviderError(config.provider, errorMessage(err));
    }
  }

  private getModel(config: ModelConfig): LanguageModel {
    const key = `${config.provider}/${config.name}@${config.base_url ?? ''}`;
    const cached = this.models.get(key);
    if (cached) return cached;
    const model = this.modelFactory(config);
    this.models.set(key, model);
    return model;
  }

  private createModel(config: ModelConfig): LanguageModel {
    const { provider, name: modelName, base_url: baseURL } = config;
    const providerLower = provider.toLowerCase();
    const providerUpper = provider.toUpperCase();

    // Get API key from options or environment
    const apiKey = this.apiKeys[providerLower] ?? process.env[`${providerUpper}_API_KEY`];
    if (!apiKey) {
      throw new MissingApiKeyError(providerLower);
    }

    if (providerLower === 'openai') {
      const openai = createOpenAI({ apiKey, baseURL });
      return openai.chat(modelName);
    }

    if (providerLower === 'anthropic') {
      const anthropic = createAnthropic({ apiKey, baseURL });
      return anthropic(modelName);
    }

    if (providerLower === 'cerebras') {
      const cerebras = createCerebras({ apiKey, baseURL });
      return cerebras(modelName);
    }

    // Use createOpenAICompatible for any other OpenAI-compatible provider
    const resolvedBaseURL = baseURL ?? process.env[`${providerUpper}_BASE_URL`] ?? PROVIDER_BASE_URLS[providerLower];
    if (!resolvedBaseURL) {
      throw new UnknownProviderError(provider);
    }

    const compatible = createOpenAICompatible({
      name: providerLower,
      baseURL: resolvedBaseURL,
      headers: {
        Authorization: `Bearer ${apiKey}`,
      },
    });

    return compatible(modelName);
  }
}

/**
 * System messages are sent through the SDK's `system` field.
 */
export function systemPrompt(messages: Message[], jsonMode: boolean): string | undefined {
  const parts = messages.filter((m) => m.role === 'system').map((m) => m.content);
  if (jsonMode) parts.push(JSON_MODE_INSTRUCTION);
  return parts.length > 0 ? parts.join('\n\n') : undefined;
}

export function toCoreMessages(messages: Message[]): CoreMessage[] {
  const toolNames = new Map<string, string>();
  const out: CoreMessage[] = [];

  for (const message of messages) {
    switch (message.role) {
      case 'system':
        break;
      case 'user':
        out.push({ role: 'user', content: message.content });
        break;
      case 'assistant': {
        const calls = message.tool_calls ?? [];
        if (calls.length === 0) {
          out.push({ role: 'assistant', content: message.content });
          break;
        }
        for (const call of calls) toolNames.set(call.id, call.name);
        out.push({
          role: 'assistant',
          content: [
            ...(message.content ? [{ type: 'text' as const, text: message.content }] : []),
            ...calls.map((call) => ({
              type: 'tool-call' as const,
              toolCallId: call.id,
              toolName: call.name,
              args: call.arguments,
            })),
          ],
        });
        break;
      }
      case 'tool': {
        const toolCallId = message.tool_call_id ?? '';
        out.push({
          role: 'tool',
          content: [
            {
              type: 'tool-result',
              toolCallId,
              toolName: toolNames.get(toolCallId) ?? 'unknown',
              result: message.content,
              isError: message.is_error ?? false,
            },
          ],
        });
        break;
      }
    }
  }

  return out;
}

export function toCoreTools(definitions: ToolDefinition[]): Record<string, CoreTool> {
  const tools: Record<string, CoreTool> = {};
  for (const def of definitions) {
    tools[def.name] = tool({
      description: def.description,
      parameters: jsonSchema(def.parameters),
    });
  }
  return tools;
}
