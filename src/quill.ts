/**
 * Quill - Main orchestrator class
 *
 * Wires the state store, queue, model client, media readers and result
 * writer together and exposes the operations the CLI needs.
 */

import { existsSync } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import type {
  FailedJobSummary,
  Job,
  JobStatus,
  Logger,
  MediaItem,
  QueueStats,
  RunConfig,
  RunSummary,
} from './types.js';
import { Captioner } from './captioning/index.js';
import {
  FrameExtractor,
  enumerateDirectory,
  enumerateOptionsFrom,
  loadQueueFile,
  type VideoBackend,
} from './media/index.js';
import { ffmpegBackend } from './media/ffmpeg.js';
import { QuillDatabase, ResultWriter, type RunLock, type RunRecord } from './storage/index.js';
import { JobQueue, formatQueueFile, type PopulateResult } from './queue/index.js';
import { PipelineController, type ControllerOptions, type PipelineContext } from './pipeline/index.js';
import { ConnectionError, WriteError, toErrorMessage } from './errors.js';
import type { ModelClient } from './captioning/index.js';

export interface QuillDependencies {
  /** Model client; defaults to the configured provider */
  client?: ModelClient;
  /** Video tool; defaults to ffmpeg */
  videoBackend?: VideoBackend;
}

/**
 * Main Quill captioning orchestrator
 */
export class Quill {
  private config: RunConfig;
  private logger: Logger;
  private database: QuillDatabase;
  private queue: JobQueue;
  private writer: ResultWriter;
  private client: ModelClient;
  private extractor: FrameExtractor | null;
  private controller: PipelineController | null = null;

  constructor(config: RunConfig, logger: Logger, deps: QuillDependencies = {}) {
    this.config = config;
    this.logger = logger;

    this.client = deps.client ?? new Captioner(config.captioning, logger);
    this.database = new QuillDatabase(config.storage.dbPath, logger);
    this.queue = new JobQueue(this.database, logger);
    this.writer = new ResultWriter(this.queue, config.media.captionExtension, logger);
    this.extractor = config.video.enabled
      ? new FrameExtractor(config.video, deps.videoBackend ?? ffmpegBackend, logger)
      : null;
  }

  /**
   * Scan a directory and add what it holds to the queue
   */
  async addDirectory(directory: string): Promise<PopulateResult> {
    const items = await enumerateDirectory(directory, enumerateOptionsFrom(this.config));
    this.logger.info(`Found ${items.length} captionable item(s) in ${path.resolve(directory)}`);
    return this.populate(items);
  }

  /**
   * Load a queue file (line format or JSON directory list) into the queue
   */
  async addQueueFile(queuePath: string): Promise<PopulateResult> {
    const items = await loadQueueFile(queuePath, enumerateOptionsFrom(this.config), this.logger);
    return this.populate(items);
  }

  private populate(items: MediaItem[]): PopulateResult {
    this.warnSidecarCollisions(items);
    return this.queue.populate(items, {
      overwrite: this.config.media.overwrite,
      sidecarFor: sourcePath => this.writer.sidecarPath(sourcePath),
      exists: existsSync,
    });
  }

  private warnSidecarCollisions(items: MediaItem[]): void {
    const owners = new Map<string, string>();
    for (const item of items) {
      const sidecar = this.writer.sidecarPath(item.sourcePath);
      const owner = owners.get(sidecar);
      if (owner) {
        this.logger.warn(`${path.basename(item.sourcePath)} and ${path.basename(owner)} share the caption file ${sidecar}`);
      } else {
        owners.set(sidecar, item.sourcePath);
      }
    }
  }

  /**
   * Run the pipeline over every pending job
   */
  async run(options: ControllerOptions = {}): Promise<RunSummary> {
    const context: PipelineContext = {
      config: this.config,
      logger: this.logger,
      queue: this.queue,
      client: this.client,
      writer: this.writer,
      extractor: this.extractor,
    };

    this.controller = new PipelineController(context, options);
    try {
      return await this.controller.start();
    } finally {
      this.controller = null;
    }
  }

  cancel(): void {
    this.controller?.cancel();
  }

  pause(): void {
    this.controller?.pause();
  }

  resume(): void {
    this.controller?.resume();
  }

  getQueueStats(): QueueStats {
    return this.queue.getStats();
  }

  listJobs(status?: JobStatus): Job[] {
    return this.queue.list(status);
  }

  failedJobs(): FailedJobSummary[] {
    return this.queue.failedJobs();
  }

  lastRun(): RunRecord | null {
    return this.queue.lastRun();
  }

  /**
   * The process running this queue right now, if any
   */
  activeRun(): RunLock | null {
    return this.queue.activeRun();
  }

  /**
   * Re-queue failed jobs: the given ids, or all of them
   */
  requeue(jobIds: string[] = []): number {
    return jobIds.length > 0 ? this.queue.requeue(jobIds) : this.queue.requeueFailed();
  }

  /**
   * Write the whole queue in the line format
   */
  async exportQueue(filePath: string): Promise<number> {
    const jobs = this.queue.list();
    try {
      await fs.writeFile(filePath, formatQueueFile(jobs), 'utf-8');
    } catch (error) {
      throw new WriteError(`Cannot write queue file ${filePath}: ${toErrorMessage(error)}`, { cause: error });
    }
    return jobs.length;
  }

  async listModels(): Promise<string[]> {
    const health = await this.client.healthCheck();
    if (!health.reachable) {
      throw new ConnectionError(`Cannot reach ${this.config.captioning.endpoint}: ${health.error ?? 'no answer'}`);
    }
    return health.models;
  }

  /**
   * Flush and close the state store
   */
  close(): void {
    this.database.close();
  }
}
