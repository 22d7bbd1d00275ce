/**
 * fluent-ffmpeg backend for video probing and frame grabs
 */

import fs from 'fs';
import { PassThrough } from 'stream';
import ffmpeg, { type FfprobeData } from 'fluent-ffmpeg';
import ffmpegInstaller from '@ffmpeg-installer/ffmpeg';
import ffprobeInstaller from '@ffprobe-installer/ffprobe';
import { UnreadableMediaError, toErrorMessage } from '../errors.js';

/**
 * Operations the frame extractor needs from a video tool
 */
export interface VideoBackend {
  /** Duration in seconds; 0 when the container reports none */
  probeDuration(videoPath: string): Promise<number>;
  /** One JPEG frame at `seconds`, scaled down to at most `maxWidth` pixels wide */
  grabFrame(videoPath: string, seconds: number, maxWidth: number): Promise<Buffer>;
}

/** Seconds before a stuck ffmpeg process is killed */
const FFMPEG_TIMEOUT_SECONDS = 60;

// Use FFMPEG_PATH / FFPROBE_PATH if the file exists, else the npm installer binary
function resolveBinaryPath(envPath: string | undefined, fallback: string): string {
  if (envPath && fs.existsSync(envPath)) return envPath;
  return fallback;
}

let binariesConfigured = false;

function configureBinaries(): void {
  if (binariesConfigured) return;
  ffmpeg.setFfmpegPath(resolveBinaryPath(process.env.FFMPEG_PATH, ffmpegInstaller.path));
  ffmpeg.setFfprobePath(resolveBinaryPath(process.env.FFPROBE_PATH, ffprobeInstaller.path));
  binariesConfigured = true;
}

function probe(videoPath: string): Promise<FfprobeData> {
  return new Promise((resolve, reject) => {
    ffmpeg.ffprobe(videoPath, (err: Error | null, metadata: FfprobeData) => {
      if (err) {
        reject(new UnreadableMediaError(`ffprobe failed for ${videoPath}: ${toErrorMessage(err)}`, { cause: err }));
        return;
      }
      resolve(metadata);
    });
  });
}

export const ffmpegBackend: VideoBackend = {
  async probeDuration(videoPath: string): Promise<number> {
    configureBinaries();
    const metadata = await probe(videoPath);

    if (!metadata.streams.some(stream => stream.codec_type === 'video')) {
      throw new UnreadableMediaError(`No video stream in ${videoPath}`);
    }

    const duration = Number(metadata.format.duration);
    return Number.isFinite(duration) && duration > 0 ? duration : 0;
  },

  grabFrame(videoPath: string, seconds: number, maxWidth: number): Promise<Buffer> {
    configureBinaries();

    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      const output = new PassThrough();
      output.on('data', (chunk: Buffer) => chunks.push(chunk));

      ffmpeg(videoPath, { timeout: FFMPEG_TIMEOUT_SECONDS })
        .seekInput(seconds)
        .frames(1)
        .videoFilters(`scale='min(${maxWidth},iw)':-2`)
        .outputOptions(['-q:v', '3'])
        .videoCodec('mjpeg')
        .format('image2pipe')
        .on('end', () => {
          resolve(Buffer.concat(chunks));
        })
        .on('error', (err: Error) => {
          reject(
            new UnreadableMediaError(
              `ffmpeg could not read a frame at ${seconds}s from ${videoPath}: ${toErrorMessage(err)}`,
              { cause: err }
            )
          );
        })
        .pipe(output, { end: true });
    });
  },
};
