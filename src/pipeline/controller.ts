/**
 * Pipeline run controller: worker pool, run state and progress
 */

import { randomUUID } from 'crypto';
import path from 'path';
import PQueue from 'p-queue';
import type {
  FailedJobSummary,
  Logger,
  ProgressCallback,
  RunConfig,
  RunState,
  RunSummary,
} from '../types.js';
import type { HealthStatus, ModelClient } from '../captioning/provider.js';
import type { JobQueue } from '../queue/job-queue.js';
import type { ResultWriter } from '../storage/result-writer.js';
import type { FrameExtractor } from '../media/frame-extractor.js';
import { ConnectionError, toErrorMessage } from '../errors.js';
import { JobWorker } from './worker.js';

/**
 * Everything a run needs, built once from the frozen configuration
 */
export interface PipelineContext {
  config: RunConfig;
  logger: Logger;
  queue: JobQueue;
  client: ModelClient;
  writer: ResultWriter;
  extractor: FrameExtractor | null;
}

export interface ControllerOptions {
  /** Fired once per job outcome */
  onProgress?: ProgressCallback;
  /** Fired on every run state transition */
  onStateChange?: (state: RunState) => void;
  /** Delay between retries; defaults to a timer */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Runs the queue to completion with a bounded pool of workers.
 * One controller drives one run.
 */
export class PipelineController {
  private context: PipelineContext;
  private options: ControllerOptions;
  private worker: JobWorker;
  private pool: PQueue;
  private owner = randomUUID();
  private lockHeld = false;

  private runState: RunState = 'idle';
  private cancelRequested = false;
  private paused = false;
  private drained = false;
  private fatalError: unknown = null;
  private resumeWaiters: (() => void)[] = [];

  private total = 0;
  private completed = 0;
  private failed = 0;

  constructor(context: PipelineContext, options: ControllerOptions = {}) {
    this.context = context;
    this.options = options;
    this.worker = new JobWorker({
      config: context.config,
      client: context.client,
      queue: context.queue,
      writer: context.writer,
      extractor: context.extractor,
      logger: context.logger,
      ...(options.sleep && { sleep: options.sleep }),
    });

    this.pool = new PQueue({ concurrency: context.config.pipeline.concurrency });

    this.pool.on('active', () => {
      this.context.logger.debug(`Pool active, queued: ${this.pool.size}, running: ${this.pool.pending}`);
    });
  }

  get state(): RunState {
    return this.runState;
  }

  /**
   * Run until the queue drains, the run is cancelled, or a fatal error occurs
   */
  async start(): Promise<RunSummary> {
    if (this.runState !== 'idle') {
      throw new Error(`Pipeline already started (state: ${this.runState})`);
    }

    const { queue, logger, config } = this.context;
    const startTime = new Date();

    try {
      queue.beginRun(this.owner);
      this.lockHeld = true;
      this.total = queue.getStats().pending;
    } catch (error) {
      this.fatalError = error;
      return this.finish(startTime);
    }

    this.setState('running');
    logger.info(`Starting run: ${this.total} pending job(s), concurrency ${config.pipeline.concurrency}`);

    if (config.pipeline.preflight && !this.cancelRequested) {
      await this.preflight();
    }

    if (!this.shouldStop()) {
      await this.dispatch();
    }
    await this.pool.onIdle();

    return this.finish(startTime);
  }

  /**
   * Stop claiming new jobs. In-flight jobs finish; the rest stay pending.
   */
  cancel(): void {
    if (this.cancelRequested || this.isFinished()) {
      return;
    }
    this.cancelRequested = true;
    this.context.logger.warn('Cancellation requested; waiting for in-flight jobs');
    this.releaseWaiters();
  }

  /**
   * Stop claiming new jobs until resume()
   */
  pause(): void {
    if (this.runState !== 'running') {
      return;
    }
    this.paused = true;
    this.setState('paused');
    this.context.logger.info('Run paused');
  }

  resume(): void {
    if (this.runState !== 'paused') {
      return;
    }
    this.paused = false;
    this.setState('running');
    this.context.logger.info('Run resumed');
    this.releaseWaiters();
  }

  private async preflight(): Promise<void> {
    const { client, config, logger } = this.context;
    let health: HealthStatus;
    try {
      health = await client.healthCheck();
    } catch (error) {
      this.abort(error);
      return;
    }

    if (!health.reachable) {
      this.abort(
        new ConnectionError(`Inference endpoint unreachable at ${config.captioning.endpoint}: ${health.error ?? 'no answer'}`)
      );
      return;
    }

    if (health.error) {
      logger.warn(`Health check answered with an error: ${health.error}`);
    } else if (health.models.length > 0 && !health.models.includes(config.captioning.model)) {
      logger.warn(`Model ${config.captioning.model} is not listed by the server`, {
        available: health.models,
      });
    }
  }

  /**
   * Feed claim tasks to the pool while it has room. Claims happen inside
   * the task so a job is only in_progress while a slot works on it.
   */
  private async dispatch(): Promise<void> {
    while (!this.shouldStop()) {
      await this.waitWhilePaused();
      if (this.shouldStop()) break;

      await this.pool.onSizeLessThan(1);
      if (this.shouldStop()) break;

      this.pool.add(() => this.runNext()).catch((error: unknown) => this.abort(error));
    }
  }

  private async runNext(): Promise<void> {
    if (this.shouldStop() || this.paused) {
      return;
    }

    const job = this.context.queue.claimNext();
    if (!job) {
      this.drained = true;
      return;
    }

    const outcome = await this.worker.process(job);
    if (outcome === 'done') {
      this.completed++;
    } else {
      this.failed++;
    }

    this.reportProgress(path.basename(job.sourcePath));
  }

  private reportProgress(currentItem: string): void {
    if (!this.options.onProgress) return;
    try {
      this.options.onProgress(this.completed, this.failed, this.total, currentItem);
    } catch (error) {
      this.context.logger.warn('Progress callback threw', { error: toErrorMessage(error) });
    }
  }

  private abort(error: unknown): void {
    if (this.fatalError === null) {
      this.fatalError = error;
      this.context.logger.error(`Run aborted: ${toErrorMessage(error)}`);
    }
    this.releaseWaiters();
  }

  private shouldStop(): boolean {
    return this.cancelRequested || this.drained || this.fatalError !== null;
  }

  private isFinished(): boolean {
    return this.runState === 'completed' || this.runState === 'cancelled' || this.runState === 'failed';
  }

  private waitWhilePaused(): Promise<void> {
    if (!this.paused || this.cancelRequested) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.resumeWaiters.push(resolve);
    });
  }

  private releaseWaiters(): void {
    const waiters = this.resumeWaiters;
    this.resumeWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  private setState(state: RunState): void {
    this.runState = state;
    this.options.onStateChange?.(state);
  }

  private finish(startTime: Date): RunSummary {
    const { queue, logger } = this.context;

    let remaining = 0;
    let failedJobs: FailedJobSummary[] = [];
    try {
      queue.persist();
      remaining = queue.getStats().pending;
      failedJobs = queue.failedJobs();
    } catch (error) {
      if (this.fatalError === null) {
        this.abort(error);
      } else {
        logger.warn(`Could not read final queue state: ${toErrorMessage(error)}`);
      }
    }

    const state: RunState =
      this.fatalError !== null ? 'failed' : this.cancelRequested ? 'cancelled' : 'completed';
    this.setState(state);

    const summary: RunSummary = {
      state,
      completed: this.completed,
      failed: this.failed,
      total: this.total,
      remaining,
      startTime,
      endTime: new Date(),
      failedJobs,
      ...(this.fatalError !== null && { fatalError: toErrorMessage(this.fatalError) }),
    };

    try {
      queue.recordRun(summary);
    } catch (error) {
      logger.error(`Could not record run: ${toErrorMessage(error)}`);
    }

    if (this.lockHeld) {
      try {
        queue.endRun(this.owner);
        this.lockHeld = false;
      } catch (error) {
        logger.warn(`Could not release run lock: ${toErrorMessage(error)}`);
      }
    }

    logger.info(`Run ${state}`, {
      completed: summary.completed,
      failed: summary.failed,
      remaining: summary.remaining,
      durationMs: summary.endTime.getTime() - startTime.getTime(),
    });

    return summary;
  }
}
