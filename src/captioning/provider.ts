/**
 * Abstract VLM Provider interface for pluggable local inference servers
 */

import type { ImagePayload, Logger } from '../types.js';
import {
  ConnectionError,
  MalformedResponseError,
  ModelNotFoundError,
  RequestRejectedError,
  TimeoutError,
  toErrorMessage,
} from '../errors.js';

/**
 * Input for a captioning request
 */
export interface CaptionRequest {
  /** One image, or several frames of a video */
  images: ImagePayload[];
  /** Fully rendered prompt */
  prompt: string;
  /** Model identifier */
  model: string;
  /** Request timeout in milliseconds */
  timeoutMs: number;
}

/**
 * Raw response from VLM provider
 */
export interface VlmResponse {
  /** Raw text response */
  text: string;
  /** Tokens used (input + output) */
  tokensUsed: number;
  /** Model that was used */
  model: string;
}

/**
 * Parsed caption from a single request
 */
export interface ModelCaption extends VlmResponse {
  /** Wall time of the request */
  durationMs: number;
}

export interface HealthStatus {
  /** The server answered at all */
  reachable: boolean;
  /** Models the server reports as installed */
  models: string[];
  /** Why the check failed, if it did */
  error?: string;
}

/**
 * What the pipeline needs from an inference backend
 */
export interface ModelClient {
  readonly name: string;
  caption(request: CaptionRequest): Promise<ModelCaption>;
  healthCheck(): Promise<HealthStatus>;
}

/**
 * Configuration for VLM providers
 */
export interface VlmProviderConfig {
  /** Base URL of the server */
  baseUrl: string;
  /** Optional API key */
  apiKey: string;
  /** Maximum tokens for response */
  maxTokens: number;
  /** Optional additional headers */
  headers?: Readonly<Record<string, string>>;
}

/** HTTP request a provider wants sent */
export interface ProviderHttpRequest {
  path: string;
  body: unknown;
}

const HEALTH_CHECK_TIMEOUT_MS = 5000;

const LEADING_MARKERS: RegExp[] = [
  /^<\|im_start\|>\s*assistant\b\s*/i,
  /^<\|start_header_id\|>\s*assistant\s*<\|end_header_id\|>\s*/i,
  /^<\|assistant\|>\s*/i,
  /^<start_of_turn>\s*model\b\s*/i,
  /^\[\/INST\]\s*/i,
  /^#{2,3}\s*(?:assistant|response)\s*:?\s*/i,
  /^assistant\s*:\s*/i,
];

const TRAILING_MARKERS: RegExp[] = [
  /\s*<\|im_end\|>\s*$/i,
  /\s*<\|eot_id\|>\s*$/i,
  /\s*<\|endoftext\|>\s*$/i,
  /\s*<end_of_turn>\s*$/i,
  /\s*<\/s>\s*$/i,
];

/**
 * Strip chat-template artifacts and surrounding whitespace from model output
 */
export function cleanCaptionText(text: string): string {
  let cleaned = text.trim();
  let previous: string;

  do {
    previous = cleaned;
    for (const marker of LEADING_MARKERS) {
      cleaned = cleaned.replace(marker, '');
    }
    for (const marker of TRAILING_MARKERS) {
      cleaned = cleaned.replace(marker, '');
    }
    cleaned = cleaned.trim();
  } while (cleaned !== previous);

  return cleaned;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pull a human-readable message out of an error body
 */
export function extractErrorDetail(body: string): string {
  try {
    const parsed: unknown = JSON.parse(body);
    if (isRecord(parsed)) {
      const error = parsed['error'];
      if (typeof error === 'string') return error;
      if (isRecord(error) && typeof error['message'] === 'string') return error['message'];
      if (typeof parsed['message'] === 'string') return parsed['message'];
      if (typeof parsed['detail'] === 'string') return parsed['detail'];
    }
  } catch {
    // not JSON; fall through to the raw body
  }
  return body.trim().slice(0, 300) || 'empty response body';
}

const MODEL_MISSING_PATTERN = /not found|does not exist|no such model|unknown model|pull/i;

/**
 * Map a non-2xx HTTP answer to the pipeline's error taxonomy
 */
export function classifyHttpError(status: number, body: string, model: string): Error {
  const detail = extractErrorDetail(body);

  if ((status === 404 || status === 400) && /model/i.test(detail) && MODEL_MISSING_PATTERN.test(detail)) {
    return new ModelNotFoundError(model, detail);
  }
  if (status >= 500 || status === 429 || status === 408) {
    return new ConnectionError(`Server answered HTTP ${status}: ${detail}`);
  }
  return new RequestRejectedError(status, detail);
}

/**
 * Map a thrown fetch failure to the pipeline's error taxonomy
 */
export function classifyFetchError(error: unknown, url: string, timeoutMs: number): Error {
  if (error instanceof Error && error.name === 'TimeoutError') {
    return new TimeoutError(timeoutMs);
  }

  const cause = error instanceof Error ? error.cause : undefined;
  const code = isRecord(cause) && typeof cause['code'] === 'string' ? cause['code'] : undefined;
  const reason = code ?? toErrorMessage(error);
  return new ConnectionError(`Cannot reach ${url}: ${reason}`, { cause: error });
}

/**
 * Abstract base class for VLM providers
 */
export abstract class VlmProvider implements ModelClient {
  protected config: VlmProviderConfig;
  protected logger: Logger;

  constructor(config: VlmProviderConfig, logger: Logger) {
    this.config = config;
    this.logger = logger;
  }

  /**
   * Provider name identifier
   */
  abstract get name(): string;

  /**
   * Check if the provider is properly configured
   */
  abstract validate(): string[];

  /** Path and body of a caption request */
  protected abstract buildCaptionRequest(request: CaptionRequest): ProviderHttpRequest;

  /** Extract text and usage from a parsed success body; throw MalformedResponseError if absent */
  protected abstract parseCaptionResponse(data: unknown, request: CaptionRequest): VlmResponse;

  /** Path listing installed models */
  protected abstract get modelsPath(): string;

  /** Model names from a parsed model list body */
  protected abstract parseModels(data: unknown): string[];

  protected headers(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      ...(this.config.apiKey && { Authorization: `Bearer ${this.config.apiKey}` }),
      ...this.config.headers,
    };
  }

  protected url(pathname: string): string {
    return `${this.config.baseUrl.replace(/\/+$/, '')}${pathname}`;
  }

  /**
   * Send a captioning request and return the cleaned caption
   */
  async caption(request: CaptionRequest): Promise<ModelCaption> {
    const { path, body } = this.buildCaptionRequest(request);
    const url = this.url(path);
    const startedAt = Date.now();

    this.logger.debug(`${this.name} request`, { url, model: request.model, images: request.images.length });

    let status: number;
    let ok: boolean;
    let responseText: string;
    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(request.timeoutMs),
      });
      status = response.status;
      ok = response.ok;
      responseText = await response.text();
    } catch (error) {
      throw classifyFetchError(error, url, request.timeoutMs);
    }

    if (!ok) {
      throw classifyHttpError(status, responseText, request.model);
    }

    let data: unknown;
    try {
      data = JSON.parse(responseText);
    } catch {
      throw new MalformedResponseError(`${this.name} returned a body that is not JSON`);
    }

    const parsed = this.parseCaptionResponse(data, request);
    const text = cleanCaptionText(parsed.text);
    if (!text) {
      throw new MalformedResponseError(`${this.name} returned an empty caption`);
    }

    return {
      text,
      tokensUsed: parsed.tokensUsed,
      model: parsed.model || request.model,
      durationMs: Date.now() - startedAt,
    };
  }

  /**
   * Probe the server and list its models
   */
  async healthCheck(): Promise<HealthStatus> {
    const url = this.url(this.modelsPath);

    let response: Response;
    try {
      response = await fetch(url, {
        headers: this.headers(),
        signal: AbortSignal.timeout(HEALTH_CHECK_TIMEOUT_MS),
      });
    } catch (error) {
      return {
        reachable: false,
        models: [],
        error: classifyFetchError(error, url, HEALTH_CHECK_TIMEOUT_MS).message,
      };
    }

    // The server answered; anything wrong from here on is not reachability
    try {
      if (!response.ok) {
        return {
          reachable: true,
          models: [],
          error: `HTTP ${response.status}: ${extractErrorDetail(await response.text())}`,
        };
      }
      const data: unknown = await response.json();
      return { reachable: true, models: this.parseModels(data) };
    } catch (error) {
      return { reachable: true, models: [], error: `Unreadable model list from ${url}: ${toErrorMessage(error)}` };
    }
  }
}

type VlmProviderClass = new (config: VlmProviderConfig, logger: Logger) => VlmProvider;

/**
 * Registry for VLM providers
 */
export class VlmProviderRegistry {
  private static providers = new Map<string, VlmProviderClass>();

  /**
   * Register a provider class
   */
  static register(name: string, providerClass: VlmProviderClass): void {
    this.providers.set(name.toLowerCase(), providerClass);
  }

  /**
   * Get a provider by name
   */
  static get(name: string): VlmProviderClass | undefined {
    return this.providers.get(name.toLowerCase());
  }

  /**
   * List registered providers
   */
  static list(): string[] {
    return Array.from(this.providers.keys());
  }

  /**
   * Create a provider instance
   */
  static create(name: string, config: VlmProviderConfig, logger: Logger): VlmProvider {
    const ProviderClass = this.get(name);
    if (!ProviderClass) {
      throw new Error(`Unknown VLM provider: ${name}. Available: ${this.list().join(', ')}`);
    }
    return new ProviderClass(config, logger);
  }
}
