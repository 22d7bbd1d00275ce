/**
 * Media module exports
 */

export {
  enumerateDirectory,
  enumerateOptionsFrom,
  loadQueueFile,
  classifyPath,
  getExtension,
  type EnumerateOptions,
} from './enumerator.js';
export { FrameExtractor, sampleTimestamps, type FrameExtractorOptions } from './frame-extractor.js';
export { readImagePayload, sniffImageType } from './image.js';
export type { VideoBackend } from './ffmpeg.js';
