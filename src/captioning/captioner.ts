/**
 * VLM (Vision Language Model) captioning service
 *
 * Provider-agnostic model client used by the pipeline workers.
 */

import type { CaptioningConfig, DeepReadonly, Logger } from '../types.js';
import { ConfigError, toErrorMessage } from '../errors.js';
import {
  VlmProvider,
  VlmProviderRegistry,
  type CaptionRequest,
  type HealthStatus,
  type ModelCaption,
  type ModelClient,
} from './provider.js';

// Import providers to register them
import './providers/index.js';

/**
 * Captioner class for generating descriptions using VLM providers
 */
export class Captioner implements ModelClient {
  private provider: VlmProvider;
  private logger: Logger;

  constructor(config: DeepReadonly<CaptioningConfig>, logger: Logger) {
    this.logger = logger;

    if (!VlmProviderRegistry.get(config.provider)) {
      throw new ConfigError(
        `Unknown VLM provider: ${config.provider}. Available: ${VlmProviderRegistry.list().join(', ')}`
      );
    }

    // Create the provider instance
    this.provider = VlmProviderRegistry.create(
      config.provider,
      {
        baseUrl: config.endpoint,
        apiKey: config.apiKey,
        maxTokens: config.maxTokens,
      },
      logger
    );

    // Validate provider configuration
    const validationErrors = this.provider.validate();
    if (validationErrors.length > 0) {
      throw new ConfigError(`Invalid provider configuration: ${validationErrors.join(', ')}`);
    }

    this.logger.debug(`Captioner initialized with provider: ${this.provider.name}`);
  }

  get name(): string {
    return this.provider.name;
  }

  /**
   * List available providers
   */
  static listProviders(): string[] {
    return VlmProviderRegistry.list();
  }

  /**
   * Send one request to the model
   */
  async caption(request: CaptionRequest): Promise<ModelCaption> {
    try {
      const result = await this.provider.caption(request);

      this.logger.debug('Caption received', {
        model: result.model,
        tokensUsed: result.tokensUsed,
        durationMs: result.durationMs,
      });

      return result;
    } catch (error) {
      this.logger.debug('Caption request failed', {
        error: toErrorMessage(error),
        provider: this.provider.name,
        model: request.model,
      });
      throw error;
    }
  }

  async healthCheck(): Promise<HealthStatus> {
    return this.provider.healthCheck();
  }
}
