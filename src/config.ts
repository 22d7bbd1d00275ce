/**
 * Configuration loading and defaults
 */

import fs from 'fs';
import path from 'path';
import { config as dotenvConfig } from 'dotenv';
import type {
  QuillConfig,
  CaptioningConfig,
  MediaConfig,
  VideoConfig,
  RetryConfig,
  PipelineConfig,
  StorageConfig,
  RunConfig,
} from './types.js';
import { ConfigError, toErrorMessage } from './errors.js';
import { LOG_LEVELS } from './logger.js';

// Load environment variables
dotenvConfig();

export const DEFAULT_ENDPOINT = 'http://localhost:11434';

export const DEFAULT_PROMPT = `Your function is to generate an exacting and objective visual description for an AI art generator, constrained to a single paragraph of no more than three sentences. Specify the artistic style and medium, then articulate the composition, lighting, color story, and prevailing mood. If a dominant figure is present, inventory their distinct characteristics including physical build, complexion, and posture. You must also meticulously account for any digital overlays or post-processing effects, such as cinematic bars or filters, and for any text, quote its content directly and describe its font and position on the canvas. Exclude all subjective interpretation, meta-commentary, and extraneous remarks, delivering only the core English description.

Describe this {{mediaKind}} in detail.`;

/** Prompt file picked up from the working directory when present */
export const PROMPT_FILE_NAME = 'system.txt';

export const DEFAULT_IMAGE_EXTENSIONS = ['png', 'jpg', 'jpeg', 'webp'];

export const DEFAULT_VIDEO_EXTENSIONS = ['mp4', 'avi', 'mov', 'mkv', 'webm'];

export function createDefaultCaptioningConfig(env: NodeJS.ProcessEnv = process.env): CaptioningConfig {
  return {
    provider: env['QUILL_PROVIDER'] || 'ollama',
    endpoint: env['QUILL_ENDPOINT'] || DEFAULT_ENDPOINT,
    model: env['QUILL_MODEL'] || 'llava:latest',
    promptTemplate: DEFAULT_PROMPT,
    timeoutMs: 120000,
    maxTokens: 512,
    apiKey: env['QUILL_API_KEY'] || '',
  };
}

export const DEFAULT_MEDIA_CONFIG: MediaConfig = {
  imageExtensions: DEFAULT_IMAGE_EXTENSIONS,
  recursive: false,
  overwrite: false,
  captionExtension: '.txt',
};

export const DEFAULT_VIDEO_CONFIG: VideoConfig = {
  enabled: false,
  extensions: DEFAULT_VIDEO_EXTENSIONS,
  frameCount: 4,
  framePolicy: 'batched',
  maxFrameWidth: 768,
};

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  backoff: 'exponential',
  baseDelayMs: 1000,
  maxDelayMs: 30000,
};

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  concurrency: 2,
  preflight: true,
};

export const DEFAULT_STORAGE_CONFIG: StorageConfig = {
  dbPath: path.join(process.cwd(), 'data', 'quill.db'),
};

/**
 * Create default configuration
 */
export function createDefaultConfig(env: NodeJS.ProcessEnv = process.env): QuillConfig {
  return {
    captioning: createDefaultCaptioningConfig(env),
    media: { ...DEFAULT_MEDIA_CONFIG, imageExtensions: [...DEFAULT_MEDIA_CONFIG.imageExtensions] },
    video: { ...DEFAULT_VIDEO_CONFIG, extensions: [...DEFAULT_VIDEO_CONFIG.extensions] },
    retry: { ...DEFAULT_RETRY_CONFIG },
    pipeline: { ...DEFAULT_PIPELINE_CONFIG },
    storage: { ...DEFAULT_STORAGE_CONFIG },
    logLevel: env['QUILL_LOG_LEVEL'] || 'info',
  };
}

/** Shape of a JSON config file: every section optional and partial */
export interface QuillConfigFile {
  captioning?: Partial<CaptioningConfig>;
  media?: Partial<MediaConfig>;
  video?: Partial<VideoConfig>;
  retry?: Partial<RetryConfig>;
  pipeline?: Partial<PipelineConfig>;
  storage?: Partial<StorageConfig>;
  logLevel?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load configuration from a JSON file
 */
export function loadConfigFromFile(configPath: string): QuillConfigFile {
  let parsed: unknown;
  try {
    const content = fs.readFileSync(configPath, 'utf-8');
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to load config from ${configPath}`, { cause: error });
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file ${configPath} must contain a JSON object`);
  }

  for (const section of ['captioning', 'media', 'video', 'retry', 'pipeline', 'storage']) {
    if (section in parsed && !isRecord(parsed[section])) {
      throw new ConfigError(`Config section "${section}" in ${configPath} must be an object`);
    }
  }

  // Field types are checked by validateConfig once merged
  return parsed as QuillConfigFile;
}

/**
 * Merge configurations with defaults
 */
export function mergeConfig(
  partial: QuillConfigFile,
  defaults: QuillConfig = createDefaultConfig()
): QuillConfig {
  return {
    captioning: { ...defaults.captioning, ...partial.captioning },
    media: { ...defaults.media, ...partial.media },
    video: { ...defaults.video, ...partial.video },
    retry: { ...defaults.retry, ...partial.retry },
    pipeline: { ...defaults.pipeline, ...partial.pipeline },
    storage: { ...defaults.storage, ...partial.storage },
    logLevel: partial.logLevel ?? defaults.logLevel,
  };
}

/**
 * Read a prompt file from the working directory, if one is there
 */
export function readDefaultPrompt(cwd: string): string | null {
  const promptPath = path.join(cwd, PROMPT_FILE_NAME);
  if (!fs.existsSync(promptPath)) {
    return null;
  }

  let content: string;
  try {
    content = fs.readFileSync(promptPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read prompt file ${promptPath}: ${toErrorMessage(error)}`, { cause: error });
  }
  return content.trim() || null;
}

/**
 * Load and merge configuration. A system.txt in the working directory
 * replaces the built-in prompt; the config file and CLI still win over it.
 */
export function loadConfig(configPath?: string, cwd: string = process.cwd()): QuillConfig {
  const defaults = createDefaultConfig();

  const prompt = readDefaultPrompt(cwd);
  if (prompt !== null) {
    defaults.captioning.promptTemplate = prompt;
  }

  if (configPath) {
    if (!fs.existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    return mergeConfig(loadConfigFromFile(configPath), defaults);
  }

  // Try to load from default config location
  const defaultConfigPath = path.join(cwd, 'config', 'quill.json');
  if (fs.existsSync(defaultConfigPath)) {
    return mergeConfig(loadConfigFromFile(defaultConfigPath), defaults);
  }

  return defaults;
}

function isPositiveInteger(value: unknown): boolean {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function isNonNegativeNumber(value: unknown): boolean {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

function isExtensionList(value: unknown): boolean {
  return Array.isArray(value) && value.every(ext => typeof ext === 'string' && /^[a-z0-9]+$/.test(ext));
}

/**
 * Validate configuration
 */
export function validateConfig(config: QuillConfig): string[] {
  const errors: string[] = [];

  // Captioning validation
  const { captioning, media, video, retry, pipeline, storage } = config;
  if (typeof captioning.provider !== 'string' || !captioning.provider) {
    errors.push('captioning.provider is required');
  }
  if (typeof captioning.model !== 'string' || !captioning.model.trim()) {
    errors.push('captioning.model is required');
  }
  if (typeof captioning.endpoint !== 'string' || !URL.canParse(captioning.endpoint)) {
    errors.push(`captioning.endpoint must be a valid URL: ${String(captioning.endpoint)}`);
  }
  if (typeof captioning.promptTemplate !== 'string' || !captioning.promptTemplate.trim()) {
    errors.push('captioning.promptTemplate must not be empty');
  }
  if (!isPositiveInteger(captioning.timeoutMs) || captioning.timeoutMs < 1000) {
    errors.push('captioning.timeoutMs must be at least 1000ms');
  }
  if (!isPositiveInteger(captioning.maxTokens)) {
    errors.push('captioning.maxTokens must be a positive integer');
  }

  // Media validation
  if (!isExtensionList(media.imageExtensions) || media.imageExtensions.length === 0) {
    errors.push('media.imageExtensions must be a non-empty list of lower-case extensions without dots');
  }
  if (typeof media.captionExtension !== 'string' || !/^\.[A-Za-z0-9]+$/.test(media.captionExtension)) {
    errors.push('media.captionExtension must look like ".txt"');
  } else if (
    isExtensionList(media.imageExtensions) &&
    media.imageExtensions.includes(media.captionExtension.slice(1).toLowerCase())
  ) {
    errors.push('media.captionExtension must not be one of the image extensions');
  }

  // Video validation
  if (!isExtensionList(video.extensions)) {
    errors.push('video.extensions must be a list of lower-case extensions without dots');
  }
  if (!isPositiveInteger(video.frameCount) || video.frameCount > 32) {
    errors.push('video.frameCount must be between 1 and 32');
  }
  if (video.framePolicy !== 'batched' && video.framePolicy !== 'per_frame') {
    errors.push('video.framePolicy must be "batched" or "per_frame"');
  }
  if (!isPositiveInteger(video.maxFrameWidth) || video.maxFrameWidth < 64) {
    errors.push('video.maxFrameWidth must be at least 64');
  }

  // Retry validation
  if (!Number.isInteger(retry.maxRetries) || retry.maxRetries < 0) {
    errors.push('retry.maxRetries must be a non-negative integer');
  }
  if (retry.backoff !== 'linear' && retry.backoff !== 'exponential') {
    errors.push('retry.backoff must be "linear" or "exponential"');
  }
  if (!isNonNegativeNumber(retry.baseDelayMs)) {
    errors.push('retry.baseDelayMs must be non-negative');
  }
  if (!isNonNegativeNumber(retry.maxDelayMs) || retry.maxDelayMs < retry.baseDelayMs) {
    errors.push('retry.maxDelayMs must be at least retry.baseDelayMs');
  }

  // Pipeline validation
  if (!isPositiveInteger(pipeline.concurrency)) {
    errors.push('pipeline.concurrency must be at least 1');
  }

  if (typeof storage.dbPath !== 'string' || !storage.dbPath) {
    errors.push('storage.dbPath is required');
  }

  const logLevels: readonly string[] = LOG_LEVELS;
  if (!logLevels.includes(config.logLevel)) {
    errors.push(`logLevel must be one of: ${LOG_LEVELS.join(', ')}`);
  }

  return errors;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Validate and freeze a configuration for a run
 */
export function freezeConfig(config: QuillConfig): RunConfig {
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new ConfigError(`Invalid configuration: ${errors.join('; ')}`);
  }
  return deepFreeze(structuredClone(config));
}
