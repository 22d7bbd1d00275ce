/**
 * OpenAI-compatible VLM Provider (LM Studio, llama.cpp server, vLLM)
 */

import type { Logger } from '../../types.js';
import { MalformedResponseError } from '../../errors.js';
import {
  VlmProvider,
  type VlmProviderConfig,
  VlmProviderRegistry,
  type CaptionRequest,
  type ProviderHttpRequest,
  type VlmResponse,
} from '../provider.js';

/**
 * Chat completion response types (minimal typing for the API)
 */
interface OpenAIMessage {
  role?: string;
  content?: unknown;
}

interface OpenAIChoice {
  message?: OpenAIMessage;
  finish_reason?: string;
}

interface OpenAIUsage {
  total_tokens?: number;
}

interface OpenAIResponse {
  choices?: OpenAIChoice[];
  usage?: OpenAIUsage;
  model?: string;
}

interface OpenAIModelList {
  data?: unknown[];
}

function isObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}

/**
 * Message content may be a string or an array of text parts
 */
function contentText(content: unknown): string | null {
  if (typeof content === 'string') {
    return content;
  }
  if (Array.isArray(content)) {
    const parts: string[] = [];
    for (const part of content) {
      if (isObject(part) && 'text' in part && typeof part.text === 'string') {
        parts.push(part.text);
      }
    }
    return parts.length > 0 ? parts.join('') : null;
  }
  return null;
}

/**
 * Provider for local servers speaking the chat completions protocol
 */
export class OpenAIProvider extends VlmProvider {
  constructor(config: VlmProviderConfig, logger: Logger) {
    super({ ...config, baseUrl: config.baseUrl || 'http://localhost:1234/v1' }, logger);
  }

  get name(): string {
    return 'openai';
  }

  validate(): string[] {
    const errors: string[] = [];

    if (!/^https?:\/\//.test(this.config.baseUrl)) {
      errors.push(`OpenAI-compatible endpoint must be an http(s) URL, got "${this.config.baseUrl}"`);
    }

    return errors;
  }

  protected get modelsPath(): string {
    return '/models';
  }

  protected buildCaptionRequest(request: CaptionRequest): ProviderHttpRequest {
    return {
      path: '/chat/completions',
      body: {
        model: request.model,
        max_tokens: this.config.maxTokens,
        stream: false,
        messages: [
          {
            role: 'user',
            content: [
              ...request.images.map(image => ({
                type: 'image_url',
                image_url: {
                  url: `data:${image.mediaType};base64,${image.base64}`,
                },
              })),
              {
                type: 'text',
                text: request.prompt,
              },
            ],
          },
        ],
      },
    };
  }

  protected parseCaptionResponse(data: unknown, request: CaptionRequest): VlmResponse {
    if (!isObject(data)) {
      throw new MalformedResponseError('Chat completion returned a non-object body');
    }
    const body: OpenAIResponse = data;

    const choice = Array.isArray(body.choices) ? body.choices[0] : undefined;
    const text = isObject(choice) && isObject(choice.message) ? contentText(choice.message.content) : null;
    if (text === null) {
      throw new MalformedResponseError('Chat completion has no message content');
    }

    const tokensUsed = typeof body.usage?.total_tokens === 'number' ? body.usage.total_tokens : 0;

    return {
      text,
      tokensUsed: tokensUsed || Math.ceil(text.length / 4),
      model: typeof body.model === 'string' ? body.model : request.model,
    };
  }

  protected parseModels(data: unknown): string[] {
    if (!isObject(data)) return [];
    const body: OpenAIModelList = data;
    if (!Array.isArray(body.data)) return [];

    return body.data.flatMap(model =>
      isObject(model) && 'id' in model && typeof model.id === 'string' ? [model.id] : []
    );
  }
}

// Register the provider
VlmProviderRegistry.register('openai', OpenAIProvider);
VlmProviderRegistry.register('openai-compatible', OpenAIProvider); // Alias
VlmProviderRegistry.register('lmstudio', OpenAIProvider); // Alias
VlmProviderRegistry.register('llamacpp', OpenAIProvider); // Alias
