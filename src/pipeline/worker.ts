/**
 * Processing of a single claimed job
 */

import path from 'path';
import type { CaptionResult, FramePayload, ImagePayload, Job, Logger, RunConfig } from '../types.js';
import type { ModelCaption, ModelClient } from '../captioning/provider.js';
import type { JobQueue } from '../queue/job-queue.js';
import type { ResultWriter } from '../storage/result-writer.js';
import type { FrameExtractor } from '../media/frame-extractor.js';
import { renderPrompt, promptVersion } from '../captioning/prompt.js';
import { readImagePayload } from '../media/image.js';
import { UnreadableMediaError, isFatal, toErrorMessage } from '../errors.js';
import { withRetry } from './retry.js';

export type JobOutcome = 'done' | 'failed';

export interface WorkerDependencies {
  config: RunConfig;
  client: ModelClient;
  queue: JobQueue;
  writer: ResultWriter;
  /** Absent when the video variant is off */
  extractor: FrameExtractor | null;
  logger: Logger;
  /** Delay between retries; defaults to a timer */
  sleep?: (ms: number) => Promise<void>;
}

interface JobSettings {
  model: string;
  template: string;
  filename: string;
}

/**
 * Caption one claimed job and record its outcome. Per-job errors end as a
 * failed job; fatal errors propagate to the controller.
 */
export class JobWorker {
  private deps: WorkerDependencies;

  constructor(deps: WorkerDependencies) {
    this.deps = deps;
  }

  async process(job: Job): Promise<JobOutcome> {
    const { queue, writer, logger } = this.deps;

    try {
      const result = await this.caption(job);
      await writer.write(job, result);
      return 'done';
    } catch (error) {
      if (isFatal(error)) {
        throw error;
      }
      logger.debug(`Job ${job.id} failed`, { error: toErrorMessage(error) });
      try {
        queue.fail(job.id, error);
      } catch (failError) {
        if (isFatal(failError)) {
          throw failError;
        }
        logger.warn(`Could not record failure of job ${job.id}: ${toErrorMessage(failError)}`);
      }
      return 'failed';
    }
  }

  private async caption(job: Job): Promise<CaptionResult> {
    const { config } = this.deps;
    const settings: JobSettings = {
      model: job.overrides?.model ?? config.captioning.model,
      template: job.overrides?.prompt ?? config.captioning.promptTemplate,
      filename: path.basename(job.sourcePath),
    };

    if (job.mediaKind === 'image') {
      return this.captionImage(job, settings);
    }
    return config.video.framePolicy === 'per_frame'
      ? this.captionFramesSeparately(job, settings)
      : this.captionFramesBatched(job, settings);
  }

  private async captionImage(job: Job, settings: JobSettings): Promise<CaptionResult> {
    const payload = await readImagePayload(job.sourcePath);
    const prompt = renderPrompt(settings.template, { filename: settings.filename, mediaKind: 'image' });
    const reply = await this.callModel(job, [payload], prompt, settings.model);

    return this.toResult(reply.text, settings, [reply]);
  }

  private async captionFramesBatched(job: Job, settings: JobSettings): Promise<CaptionResult> {
    const frames: FramePayload[] = [];
    for await (const frame of this.extractor(job).extract(job.sourcePath)) {
      frames.push(frame);
    }

    const prompt = renderPrompt(settings.template, {
      filename: settings.filename,
      mediaKind: 'video',
      frameCount: frames.length,
    });
    const reply = await this.callModel(job, frames, prompt, settings.model);

    return {
      ...this.toResult(reply.text, settings, [reply]),
      frames: frames.map(frame => frame.timestamp),
    };
  }

  private async captionFramesSeparately(job: Job, settings: JobSettings): Promise<CaptionResult> {
    const { config } = this.deps;
    const lines: string[] = [];
    const replies: ModelCaption[] = [];
    const timestamps: number[] = [];

    for await (const frame of this.extractor(job).extract(job.sourcePath)) {
      const prompt = renderPrompt(settings.template, {
        filename: settings.filename,
        mediaKind: 'video',
        frameIndex: frame.index,
        frameCount: config.video.frameCount,
      });
      const reply = await this.callModel(job, [frame], prompt, settings.model);

      replies.push(reply);
      timestamps.push(frame.timestamp);
      lines.push(`[${frame.timestamp}s] ${reply.text}`);
    }

    return {
      ...this.toResult(lines.join('\n'), settings, replies),
      frames: timestamps,
    };
  }

  private extractor(job: Job): FrameExtractor {
    if (!this.deps.extractor) {
      throw new UnreadableMediaError(`Video support is disabled; cannot caption ${job.sourcePath}`);
    }
    return this.deps.extractor;
  }

  private callModel(job: Job, images: ImagePayload[], prompt: string, model: string): Promise<ModelCaption> {
    const { config, client, queue, logger, sleep } = this.deps;

    return withRetry(
      () =>
        client.caption({
          images,
          prompt,
          model,
          timeoutMs: config.captioning.timeoutMs,
        }),
      config.retry,
      {
        onAttempt: () => {
          queue.recordAttempt(job.id);
        },
        onRetry: (error, retry, delayMs) => {
          logger.warn(`Retrying ${path.basename(job.sourcePath)} (${retry}/${config.retry.maxRetries})`, {
            error: toErrorMessage(error),
            delayMs,
          });
        },
        ...(sleep && { sleep }),
      }
    );
  }

  private toResult(text: string, settings: JobSettings, replies: ModelCaption[]): CaptionResult {
    return {
      text,
      model: replies[0]?.model ?? settings.model,
      timestamp: new Date(),
      promptVersion: promptVersion(settings.template),
      tokensUsed: replies.reduce((sum, reply) => sum + reply.tokensUsed, 0),
      durationMs: replies.reduce((sum, reply) => sum + reply.durationMs, 0),
    };
  }
}
