/**
 * Sidecar caption files
 */

import { randomUUID } from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import type { CaptionResult, Job, Logger } from '../types.js';
import type { JobQueue } from '../queue/job-queue.js';
import { WriteError, toErrorMessage } from '../errors.js';

/**
 * Sidecar path for a source file: same directory, same base name
 */
export function sidecarPathFor(sourcePath: string, captionExtension: string): string {
  const parsed = path.parse(sourcePath);
  return path.join(parsed.dir, `${parsed.name}${captionExtension}`);
}

/**
 * Writes captions next to their source and marks the job done
 */
export class ResultWriter {
  private queue: JobQueue;
  private captionExtension: string;
  private logger: Logger;

  constructor(queue: JobQueue, captionExtension: string, logger: Logger) {
    this.queue = queue;
    this.captionExtension = captionExtension;
    this.logger = logger;
  }

  sidecarPath(sourcePath: string): string {
    return sidecarPathFor(sourcePath, this.captionExtension);
  }

  /**
   * Write the caption and record the job as done. The job is only marked
   * done once the sidecar is in place.
   */
  async write(job: Job, result: CaptionResult): Promise<string> {
    const target = this.sidecarPath(job.sourcePath);

    await this.writeAtomic(target, result.text);
    this.queue.complete(job.id, target, result);

    return target;
  }

  /**
   * Write to a temp file in the target directory, then rename over the target
   */
  private async writeAtomic(target: string, content: string): Promise<void> {
    const dir = path.dirname(target);
    const temp = path.join(dir, `.${path.basename(target)}.${randomUUID().slice(0, 8)}.tmp`);

    try {
      const handle = await fs.open(temp, 'wx');
      try {
        await handle.writeFile(content, 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(temp, target);
    } catch (error) {
      await fs.rm(temp, { force: true }).catch((cleanupError: unknown) => {
        this.logger.warn(`Could not remove temp file ${temp}`, { error: toErrorMessage(cleanupError) });
      });
      throw new WriteError(`Cannot write caption ${target}: ${toErrorMessage(error)}`, { cause: error });
    }

    this.logger.debug(`Wrote caption: ${target}`);
  }
}
