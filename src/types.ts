/**
 * Core type definitions for the Quill captioning pipeline
 */

/** Job lifecycle states */
export type JobStatus = 'pending' | 'in_progress' | 'done' | 'failed';

export const JOB_STATUSES: readonly JobStatus[] = ['pending', 'in_progress', 'done', 'failed'];

/** Kind of source media a job refers to */
export type MediaKind = 'image' | 'video';

/** How the frames sampled from a video are sent to the model */
export type FramePolicy = 'batched' | 'per_frame';

/** Shape of the delay between retry attempts */
export type BackoffCurve = 'linear' | 'exponential';

/** Image media types the model client can send */
export type ImageMediaType = 'image/png' | 'image/jpeg' | 'image/webp';

/** Run states of the pipeline controller */
export type RunState = 'idle' | 'running' | 'paused' | 'completed' | 'cancelled' | 'failed';

/** Configuration for the inference endpoint and prompt */
export interface CaptioningConfig {
  /** Provider name (ollama, openai) */
  provider: string;
  /** Base URL of the local inference server */
  endpoint: string;
  /** Model identifier as known by the server */
  model: string;
  /** Prompt template; supports {{filename}}, {{mediaKind}}, {{frameIndex}}, {{frameCount}} */
  promptTemplate: string;
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
  /** Maximum tokens for the generated caption */
  maxTokens: number;
  /** Optional API key for OpenAI-compatible servers */
  apiKey: string;
}

/** Configuration for media discovery */
export interface MediaConfig {
  /** Accepted image extensions, lower-case, without the dot */
  imageExtensions: string[];
  /** Descend into subdirectories when scanning */
  recursive: boolean;
  /** Re-caption items that already have a sidecar */
  overwrite: boolean;
  /** Extension of the sidecar caption file, with the dot */
  captionExtension: string;
}

/** Configuration for the video variant */
export interface VideoConfig {
  /** Whether video files are discovered at all */
  enabled: boolean;
  /** Accepted video extensions, lower-case, without the dot */
  extensions: string[];
  /** Number of frames sampled per video */
  frameCount: number;
  /** One request per video, or one per frame */
  framePolicy: FramePolicy;
  /** Frames wider than this are scaled down */
  maxFrameWidth: number;
}

/** Retry policy for model calls */
export interface RetryConfig {
  /** Retries after the first attempt for retryable errors */
  maxRetries: number;
  /** Delay curve between attempts */
  backoff: BackoffCurve;
  /** Delay before the first retry in milliseconds */
  baseDelayMs: number;
  /** Upper bound for any single delay */
  maxDelayMs: number;
}

/** Configuration for the pipeline run */
export interface PipelineConfig {
  /** Number of concurrent workers */
  concurrency: number;
  /** Run a health check against the endpoint before claiming jobs */
  preflight: boolean;
}

/** Configuration for storage */
export interface StorageConfig {
  /** SQLite state store path */
  dbPath: string;
}

/** Full application configuration */
export interface QuillConfig {
  captioning: CaptioningConfig;
  media: MediaConfig;
  video: VideoConfig;
  retry: RetryConfig;
  pipeline: PipelineConfig;
  storage: StorageConfig;
  logLevel: string;
}

/** Recursively read-only view of a value */
export type DeepReadonly<T> = T extends (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

/** Configuration as handed to the pipeline: frozen for the whole run */
export type RunConfig = DeepReadonly<QuillConfig>;

/** Per-job values that take precedence over the run configuration */
export interface JobOverrides {
  model?: string;
  prompt?: string;
}

/** A captionable item found by the enumerator */
export interface MediaItem {
  /** Absolute source path */
  sourcePath: string;
  /** Image or video */
  mediaKind: MediaKind;
  /** Prior state annotated in a queue file */
  priorStatus?: JobStatus;
  /** Overrides from a JSON queue entry */
  overrides?: JobOverrides;
}

/** One unit of captioning work */
export interface Job {
  /** Stable identifier derived from the source path */
  id: string;
  /** Absolute source path */
  sourcePath: string;
  /** Image or video */
  mediaKind: MediaKind;
  /** Current state */
  status: JobStatus;
  /** Message of the last error, if any */
  lastError: string | null;
  /** Model calls made during the latest claim */
  attempts: number;
  /** Sidecar path once done */
  resultPath: string | null;
  /** Position in queue order */
  position: number;
  /** Per-job model and prompt overrides */
  overrides?: JobOverrides;
  /** Timestamp when job was created */
  createdAt: Date;
  /** Timestamp when job was last updated */
  updatedAt: Date;
}

/** An encoded image sent to the model */
export interface ImagePayload {
  /** Base64 encoded image bytes */
  base64: string;
  /** Image media type */
  mediaType: ImageMediaType;
}

/** A frame sampled from a video */
export interface FramePayload extends ImagePayload {
  /** Zero-based frame index within the sample */
  index: number;
  /** Position in the video in seconds */
  timestamp: number;
}

/** Result from VLM captioning */
export interface CaptionResult {
  /** Cleaned caption text, never empty */
  text: string;
  /** Model that produced the caption */
  model: string;
  /** Timestamp of captioning */
  timestamp: Date;
  /** Short hash of the prompt template used */
  promptVersion: string;
  /** Tokens used for the request(s) */
  tokensUsed: number;
  /** Wall time of the request(s) in milliseconds */
  durationMs: number;
  /** Frame timestamps used, for video jobs */
  frames?: number[];
}

/** Counts of jobs per state */
export interface QueueStats {
  pending: number;
  inProgress: number;
  done: number;
  failed: number;
  total: number;
}

/** Progress report delivered after each job outcome */
export type ProgressCallback = (
  completed: number,
  failed: number,
  total: number,
  currentItem: string
) => void;

/** Failed job entry of a run summary */
export interface FailedJobSummary {
  id: string;
  sourcePath: string;
  lastError: string | null;
  attempts: number;
}

/** Outcome of a pipeline run */
export interface RunSummary {
  state: RunState;
  completed: number;
  failed: number;
  total: number;
  remaining: number;
  startTime: Date;
  endTime: Date;
  failedJobs: FailedJobSummary[];
  /** Message of the error that aborted the run */
  fatalError?: string;
}

/** Logger interface for dependency injection */
export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

/** Database row type for SQLite */
export interface JobRow {
  id: string;
  source_path: string;
  media_kind: string;
  status: string;
  last_error: string | null;
  attempts: number;
  result_path: string | null;
  position: number;
  override_model: string | null;
  override_prompt: string | null;
  caption_text: string | null;
  caption_model: string | null;
  prompt_version: string | null;
  captioned_at: string | null;
  created_at: string;
  updated_at: string;
}

export interface RunRow {
  id: number;
  state: string;
  started_at: string;
  ended_at: string;
  completed: number;
  failed: number;
  total: number;
  fatal_error: string | null;
}

export interface RunLockRow {
  owner: string;
  pid: number;
  acquired_at: string;
}
