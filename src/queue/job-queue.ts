/**
 * Durable job queue with exclusive claims
 */

import { createHash } from 'crypto';
import path from 'path';
import type {
  Job,
  JobStatus,
  MediaItem,
  CaptionResult,
  QueueStats,
  FailedJobSummary,
  RunSummary,
  Logger,
} from '../types.js';
import type { QuillDatabase, RunLock, RunRecord } from '../storage/database.js';
import { QueueStateError, RunLockedError, toErrorMessage } from '../errors.js';

/**
 * Stable job identifier for a source path
 */
export function jobIdFor(sourcePath: string): string {
  return createHash('sha256').update(path.resolve(sourcePath)).digest('hex').slice(0, 16);
}

/**
 * Whether a process with this pid is still running
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return error instanceof Error && 'code' in error && error.code === 'EPERM';
  }
}

export interface PopulateOptions {
  /** Reset done jobs to pending and ignore existing sidecars */
  overwrite?: boolean;
  /** Sidecar path for a source item, used to detect already captioned items */
  sidecarFor?: (sourcePath: string) => string;
  /** Existence check for sidecars */
  exists?: (filePath: string) => boolean;
}

export interface PopulateResult {
  added: number;
  skippedExisting: number;
  requeued: number;
}

/**
 * Job queue manager on top of the state store
 */
export class JobQueue {
  private db: QuillDatabase;
  private logger: Logger;

  constructor(db: QuillDatabase, logger: Logger) {
    this.db = db;
    this.logger = logger;
  }

  /**
   * Take the run lock and put jobs left in progress by a dead run back to
   * pending. Only the process that is about to run the queue calls this;
   * opening the queue to inspect it leaves live claims alone.
   */
  beginRun(owner: string): number {
    return this.db.transaction(() => {
      const holder = this.db.getRunLock();
      if (holder && holder.owner !== owner && isProcessAlive(holder.pid)) {
        throw new RunLockedError(
          `Queue is already being run by pid ${holder.pid} since ${holder.acquiredAt.toISOString()}`
        );
      }
      if (holder && holder.owner !== owner) {
        this.logger.warn(`Taking over run lock left by pid ${holder.pid}`);
      }
      this.db.setRunLock(owner, process.pid);

      const interrupted = this.db.resetAllToPending('in_progress');
      if (interrupted > 0) {
        this.logger.warn(`Resumed ${interrupted} interrupted job(s) as pending`);
      }
      return interrupted;
    });
  }

  /**
   * Release the run lock taken by beginRun
   */
  endRun(owner: string): void {
    this.db.releaseRunLock(owner);
  }

  /**
   * The run currently holding the queue, if its process is alive
   */
  activeRun(): RunLock | null {
    const holder = this.db.getRunLock();
    return holder && isProcessAlive(holder.pid) ? holder : null;
  }

  /**
   * Add discovered items in order. Items already in the queue keep their state.
   */
  populate(items: MediaItem[], options: PopulateOptions = {}): PopulateResult {
    const { overwrite = false, sidecarFor, exists } = options;
    const result: PopulateResult = { added: 0, skippedExisting: 0, requeued: 0 };

    this.db.transaction(() => {
      let position = this.db.maxPosition();

      for (const item of items) {
        const id = jobIdFor(item.sourcePath);
        const existing = this.db.getJob(id);

        if (existing) {
          if (overwrite && existing.status !== 'pending') {
            result.requeued += this.db.resetToPending([id], ['done', 'failed']);
          }
          continue;
        }

        let status: JobStatus = 'pending';
        let resultPath: string | null = null;

        if (item.priorStatus === 'done' || item.priorStatus === 'failed') {
          status = item.priorStatus;
        }

        const sidecar = sidecarFor?.(item.sourcePath);
        if (overwrite) {
          status = 'pending';
        } else if (sidecar && exists?.(sidecar)) {
          status = 'done';
          resultPath = sidecar;
          result.skippedExisting++;
        }

        position++;
        const inserted = this.db.insertJob({
          id,
          sourcePath: path.resolve(item.sourcePath),
          mediaKind: item.mediaKind,
          status,
          resultPath,
          position,
          overrideModel: item.overrides?.model ?? null,
          overridePrompt: item.overrides?.prompt ?? null,
        });

        if (inserted) {
          result.added++;
        }
      }
    });

    this.logger.info(`Populated queue with ${result.added} new job(s)`, {
      skippedExisting: result.skippedExisting,
      requeued: result.requeued,
    });

    return result;
  }

  /**
   * Append a single item at the end of the queue
   */
  append(item: MediaItem): Job {
    const id = jobIdFor(item.sourcePath);
    return this.db.transaction(() => {
      const existing = this.db.getJob(id);
      if (existing) {
        return existing;
      }
      this.db.insertJob({
        id,
        sourcePath: path.resolve(item.sourcePath),
        mediaKind: item.mediaKind,
        status: 'pending',
        resultPath: null,
        position: this.db.maxPosition() + 1,
        overrideModel: item.overrides?.model ?? null,
        overridePrompt: item.overrides?.prompt ?? null,
      });
      this.logger.debug(`Appended job: ${item.sourcePath}`);
      return this.requireJob(id);
    });
  }

  /**
   * Atomically claim the next pending job in queue order
   */
  claimNext(): Job | null {
    const job = this.db.claimNextPending();
    if (job) {
      this.logger.debug(`Claimed job: ${job.sourcePath}`, { id: job.id });
    }
    return job;
  }

  /**
   * Count one model call against a claimed job
   */
  recordAttempt(jobId: string): number {
    return this.db.incrementAttempts(jobId);
  }

  /**
   * Mark a claimed job done. Re-applying the same result is a no-op.
   * Returns false when nothing changed.
   */
  complete(jobId: string, resultPath: string, result: CaptionResult): boolean {
    return this.db.transaction(() => {
      const job = this.requireJob(jobId);

      if (job.status === 'done') {
        if (job.resultPath === resultPath && this.db.getCaptionText(jobId) === result.text) {
          return false;
        }
        throw new QueueStateError(`Job ${jobId} is already done with a different result`);
      }
      if (job.status !== 'in_progress') {
        throw new QueueStateError(`Cannot complete job ${jobId} in state ${job.status}`);
      }

      this.db.markDone(jobId, resultPath, result);
      this.logger.info(`Completed job: ${job.sourcePath}`, { resultPath });
      return true;
    });
  }

  /**
   * Mark a claimed job failed. Re-applying the same error is a no-op.
   * Returns false when nothing changed.
   */
  fail(jobId: string, error: unknown): boolean {
    const errorMessage = toErrorMessage(error);

    return this.db.transaction(() => {
      const job = this.requireJob(jobId);

      if (job.status === 'failed') {
        if (job.lastError === errorMessage) {
          return false;
        }
        throw new QueueStateError(`Job ${jobId} has already failed with a different error`);
      }
      if (job.status !== 'in_progress') {
        throw new QueueStateError(`Cannot fail job ${jobId} in state ${job.status}`);
      }

      this.db.markFailed(jobId, errorMessage);
      this.logger.error(`Job failed permanently: ${job.sourcePath}`, {
        error: errorMessage,
        attempts: job.attempts,
      });
      return true;
    });
  }

  /**
   * Put every failed job back to pending
   */
  requeueFailed(): number {
    const count = this.db.resetAllToPending('failed');
    this.logger.info(`Re-queued ${count} failed job(s)`);
    return count;
  }

  /**
   * Put specific failed jobs back to pending
   */
  requeue(jobIds: string[]): number {
    return this.db.resetToPending(jobIds, ['failed']);
  }

  /**
   * Explicit user request to caption done jobs again
   */
  recaption(jobIds: string[]): number {
    const count = this.db.resetToPending(jobIds, ['done', 'failed']);
    this.logger.info(`Marked ${count} job(s) for re-captioning`);
    return count;
  }

  /**
   * Flush state to durable storage
   */
  persist(): void {
    this.db.checkpoint();
  }

  recordRun(summary: RunSummary): void {
    this.db.recordRun(summary);
  }

  lastRun(): RunRecord | null {
    return this.db.getLastRun();
  }

  getJob(jobId: string): Job | null {
    return this.db.getJob(jobId);
  }

  list(status?: JobStatus): Job[] {
    return this.db.listJobs(status);
  }

  failedJobs(): FailedJobSummary[] {
    return this.db.listJobs('failed').map(job => ({
      id: job.id,
      sourcePath: job.sourcePath,
      lastError: job.lastError,
      attempts: job.attempts,
    }));
  }

  /**
   * Get queue statistics
   */
  getStats(): QueueStats {
    return this.db.getJobStats();
  }

  private requireJob(jobId: string): Job {
    const job = this.db.getJob(jobId);
    if (!job) {
      throw new QueueStateError(`Unknown job: ${jobId}`);
    }
    return job;
  }
}
