import fs from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { readImagePayload, sniffImageType } from './image.js';
import { EmptyMediaError, UnreadableMediaError } from '../errors.js';
import { JPEG_BYTES, PNG_BYTES, makeTempDir, removeDir } from '../testing/helpers.js';

describe('sniffImageType', () => {
  it('recognises PNG, JPEG and WebP signatures', () => {
    expect(sniffImageType(PNG_BYTES)).toBe('image/png');
    expect(sniffImageType(JPEG_BYTES)).toBe('image/jpeg');
    expect(sniffImageType(Buffer.from('RIFF\0\0\0\0WEBPVP8 ', 'latin1'))).toBe('image/webp');
  });

  it('returns null for anything else', () => {
    expect(sniffImageType(Buffer.from('GIF89a'))).toBeNull();
    expect(sniffImageType(Buffer.from([0xff, 0xd8]))).toBeNull();
  });
});

describe('readImagePayload', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('encodes the file as base64 with its sniffed type', async () => {
    const file = path.join(dir, 'photo.jpg');
    await fs.writeFile(file, PNG_BYTES);

    expect(await readImagePayload(file)).toEqual({ base64: PNG_BYTES.toString('base64'), mediaType: 'image/png' });
  });

  it('rejects an empty file', async () => {
    const file = path.join(dir, 'empty.png');
    await fs.writeFile(file, '');

    await expect(readImagePayload(file)).rejects.toThrow(EmptyMediaError);
  });

  it('rejects a file that is not an image', async () => {
    const file = path.join(dir, 'fake.png');
    await fs.writeFile(file, 'plain text');

    await expect(readImagePayload(file)).rejects.toThrow(`Not a PNG, JPEG or WebP image: ${file}`);
  });

  it('rejects a missing file', async () => {
    await expect(readImagePayload(path.join(dir, 'gone.png'))).rejects.toThrow(UnreadableMediaError);
  });
});
