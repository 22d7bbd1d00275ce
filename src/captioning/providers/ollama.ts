/**
 * Ollama VLM Provider for local vision models
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
 * Ollama response types
 */
interface OllamaResponse {
  model?: string;
  response?: unknown;
  done?: boolean;
  prompt_eval_count?: number;
  eval_count?: number;
}

interface OllamaTagsResponse {
  models?: unknown[];
}

function isObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}

/**
 * Ollama provider for local vision-language models (LLaVA, etc.)
 */
export class OllamaProvider extends VlmProvider {
  constructor(config: VlmProviderConfig, logger: Logger) {
    super({ ...config, baseUrl: config.baseUrl || 'http://localhost:11434' }, logger);
  }

  get name(): string {
    return 'ollama';
  }

  validate(): string[] {
    const errors: string[] = [];

    if (!/^https?:\/\//.test(this.config.baseUrl)) {
      errors.push(`Ollama endpoint must be an http(s) URL, got "${this.config.baseUrl}"`);
    }

    return errors;
  }

  protected get modelsPath(): string {
    return '/api/tags';
  }

  protected buildCaptionRequest(request: CaptionRequest): ProviderHttpRequest {
    return {
      path: '/api/generate',
      body: {
        model: request.model,
        prompt: request.prompt,
        images: request.images.map(image => image.base64),
        stream: false,
        options: {
          num_predict: this.config.maxTokens,
        },
      },
    };
  }

  protected parseCaptionResponse(data: unknown, request: CaptionRequest): VlmResponse {
    if (!isObject(data)) {
      throw new MalformedResponseError('Ollama returned a non-object body');
    }
    const body: OllamaResponse = data;

    if (typeof body.response !== 'string') {
      throw new MalformedResponseError('Ollama response has no "response" text');
    }

    // Ollama reports counts when available; estimate otherwise
    const tokensUsed = (body.prompt_eval_count ?? 0) + (body.eval_count ?? 0);

    return {
      text: body.response,
      tokensUsed: tokensUsed || Math.ceil(body.response.length / 4),
      model: typeof body.model === 'string' ? body.model : request.model,
    };
  }

  protected parseModels(data: unknown): string[] {
    if (!isObject(data)) return [];
    const body: OllamaTagsResponse = data;
    if (!Array.isArray(body.models)) return [];

    return body.models.flatMap(model =>
      isObject(model) && 'name' in model && typeof model.name === 'string' ? [model.name] : []
    );
  }
}

// Register the provider
VlmProviderRegistry.register('ollama', OllamaProvider);
VlmProviderRegistry.register('llava', OllamaProvider); // Alias
VlmProviderRegistry.register('local', OllamaProvider); // Alias
