/**
 * Error taxonomy for the captioning pipeline
 */

export type ErrorKind = 'config' | 'discovery' | 'media' | 'transport' | 'model' | 'persistence';

/**
 * Base class for every error the pipeline raises on purpose
 */
export abstract class QuillError extends Error {
  abstract readonly kind: ErrorKind;
  /** Whether a later attempt of the same request may succeed */
  readonly retryable: boolean = false;
  /** Whether the error aborts the whole run */
  readonly fatal: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends QuillError {
  readonly kind = 'config';
  override readonly fatal = true;
}

// ============ Discovery ============

export class DiscoveryError extends QuillError {
  readonly kind = 'discovery';
  override readonly fatal = true;
}

/** Thrown when a queue file record cannot be parsed */
export class InvalidQueueFormatError extends DiscoveryError {
  constructor(
    message: string,
    readonly line?: number
  ) {
    super(line === undefined ? message : `Line ${line}: ${message}`);
  }
}

// ============ Media ============

export class MediaError extends QuillError {
  readonly kind = 'media';
}

export class UnreadableMediaError extends MediaError {}

export class EmptyMediaError extends MediaError {}

// ============ Transport ============

export class TransportError extends QuillError {
  readonly kind = 'transport';
  override readonly retryable = true;
}

/** Server unreachable, connection reset, or a 5xx answer */
export class ConnectionError extends TransportError {}

export class TimeoutError extends TransportError {
  constructor(readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
  }
}

// ============ Model ============

export class ModelError extends QuillError {
  readonly kind = 'model';
}

export class ModelNotFoundError extends ModelError {
  constructor(readonly model: string, detail?: string) {
    super(detail ? `Model not found: ${model} (${detail})` : `Model not found: ${model}`);
  }
}

/** Unparsable payload or empty caption; retried once */
export class MalformedResponseError extends ModelError {
  override readonly retryable = true;
}

/** The server refused the request (4xx other than a missing model) */
export class RequestRejectedError extends ModelError {
  constructor(
    readonly status: number,
    detail: string
  ) {
    super(`Request rejected with HTTP ${status}: ${detail}`);
  }
}

// ============ Persistence ============

export class PersistenceError extends QuillError {
  readonly kind = 'persistence';
}

/** Sidecar could not be written; fails the job only */
export class WriteError extends PersistenceError {}

/** The state store itself is unusable; nothing can be tracked any more */
export class StoreError extends PersistenceError {
  override readonly fatal = true;
}

/** A state transition the queue does not allow */
export class QueueStateError extends PersistenceError {}

/** Another live process is running the same queue */
export class RunLockedError extends PersistenceError {
  override readonly fatal = true;
}

/**
 * Normalize a thrown value into a message for logs and the state store
 */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Whether an error aborts the run rather than a single job
 */
export function isFatal(error: unknown): boolean {
  return error instanceof QuillError && error.fatal;
}
