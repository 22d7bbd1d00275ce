/**
 * Image payload loading
 */

import fs from 'fs/promises';
import type { ImageMediaType, ImagePayload } from '../types.js';
import { EmptyMediaError, UnreadableMediaError, toErrorMessage } from '../errors.js';

/**
 * Media type from the file signature, or null if it is not a supported image
 */
export function sniffImageType(data: Buffer): ImageMediaType | null {
  if (data.length >= 8 && data.subarray(0, 8).equals(Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]))) {
    return 'image/png';
  }
  if (data.length >= 3 && data[0] === 0xff && data[1] === 0xd8 && data[2] === 0xff) {
    return 'image/jpeg';
  }
  if (
    data.length >= 12 &&
    data.toString('ascii', 0, 4) === 'RIFF' &&
    data.toString('ascii', 8, 12) === 'WEBP'
  ) {
    return 'image/webp';
  }
  return null;
}

/**
 * Read an image file into a model payload
 */
export async function readImagePayload(filePath: string): Promise<ImagePayload> {
  let data: Buffer;
  try {
    data = await fs.readFile(filePath);
  } catch (error) {
    throw new UnreadableMediaError(`Cannot read ${filePath}: ${toErrorMessage(error)}`, { cause: error });
  }

  if (data.length === 0) {
    throw new EmptyMediaError(`Image file is empty: ${filePath}`);
  }

  const mediaType = sniffImageType(data);
  if (!mediaType) {
    throw new UnreadableMediaError(`Not a PNG, JPEG or WebP image: ${filePath}`);
  }

  return { base64: data.toString('base64'), mediaType };
}
