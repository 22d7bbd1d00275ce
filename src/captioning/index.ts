/**
 * Captioning module exports
 */

export { Captioner } from './captioner.js';
export {
  VlmProvider,
  VlmProviderRegistry,
  cleanCaptionText,
  type VlmProviderConfig,
  type CaptionRequest,
  type HealthStatus,
  type ModelCaption,
  type ModelClient,
  type VlmResponse,
} from './provider.js';
export { renderPrompt, promptVersion, resolvePromptSource, type PromptVariables } from './prompt.js';

// Export individual providers
export { OpenAIProvider } from './providers/openai.js';
export { OllamaProvider } from './providers/ollama.js';
