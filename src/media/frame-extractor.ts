/**
 * Frame sampling for video jobs
 */

import type { FramePayload, Logger, VideoConfig, DeepReadonly } from '../types.js';
import { EmptyMediaError, MediaError, UnreadableMediaError, toErrorMessage } from '../errors.js';
import type { VideoBackend } from './ffmpeg.js';

export type FrameExtractorOptions = Pick<DeepReadonly<VideoConfig>, 'frameCount' | 'maxFrameWidth'>;

/**
 * Timestamps of `frameCount` frames, each at the middle of an equal slice
 * of the video, rounded to milliseconds
 */
export function sampleTimestamps(duration: number, frameCount: number): number[] {
  if (!(duration > 0) || frameCount < 1) {
    return [];
  }

  const timestamps: number[] = [];
  for (let i = 0; i < frameCount; i++) {
    timestamps.push(Math.round((duration * (i + 0.5) * 1000) / frameCount) / 1000);
  }
  return timestamps;
}

export class FrameExtractor {
  private options: FrameExtractorOptions;
  private backend: VideoBackend;
  private logger: Logger;

  constructor(options: FrameExtractorOptions, backend: VideoBackend, logger: Logger) {
    this.options = options;
    this.backend = backend;
    this.logger = logger;
  }

  /**
   * Yield sampled frames one at a time, in timestamp order. Frames that
   * decode to nothing are skipped; a video with no usable frame fails.
   */
  async *extract(videoPath: string): AsyncGenerator<FramePayload> {
    let duration: number;
    try {
      duration = await this.backend.probeDuration(videoPath);
    } catch (error) {
      if (error instanceof MediaError) throw error;
      throw new UnreadableMediaError(`Cannot probe ${videoPath}: ${toErrorMessage(error)}`, { cause: error });
    }

    const timestamps = sampleTimestamps(duration, this.options.frameCount);
    if (timestamps.length === 0) {
      throw new EmptyMediaError(`Video has no duration: ${videoPath}`);
    }

    this.logger.debug(`Sampling ${timestamps.length} frame(s) from ${videoPath}`, { duration });

    let yielded = 0;
    for (const [index, timestamp] of timestamps.entries()) {
      let data: Buffer;
      try {
        data = await this.backend.grabFrame(videoPath, timestamp, this.options.maxFrameWidth);
      } catch (error) {
        if (error instanceof MediaError) throw error;
        throw new UnreadableMediaError(`Cannot decode frame at ${timestamp}s of ${videoPath}: ${toErrorMessage(error)}`, {
          cause: error,
        });
      }

      if (data.length === 0) {
        this.logger.debug(`Empty frame at ${timestamp}s of ${videoPath}, skipping`);
        continue;
      }

      yielded++;
      yield { index, timestamp, base64: data.toString('base64'), mediaType: 'image/jpeg' };
    }

    if (yielded === 0) {
      throw new EmptyMediaError(`No frames could be extracted from ${videoPath}`);
    }
  }
}
