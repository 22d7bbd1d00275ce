/**
 * Media discovery: directory scans and queue files
 */

import fs from 'fs/promises';
import type { Stats } from 'fs';
import path from 'path';
import type { MediaItem, MediaKind, RunConfig, Logger } from '../types.js';
import { DiscoveryError, InvalidQueueFormatError, toErrorMessage } from '../errors.js';
import { parseQueueFile, parseJsonQueue } from '../queue/queue-file.js';
import { resolvePromptSource } from '../captioning/prompt.js';

export interface EnumerateOptions {
  /** Accepted image extensions, lower-case, without the dot */
  imageExtensions: readonly string[];
  /** Accepted video extensions; empty when the video variant is off */
  videoExtensions: readonly string[];
  /** Descend into subdirectories */
  recursive: boolean;
}

export function enumerateOptionsFrom(config: RunConfig): EnumerateOptions {
  return {
    imageExtensions: config.media.imageExtensions,
    videoExtensions: config.video.enabled ? config.video.extensions : [],
    recursive: config.media.recursive,
  };
}

/**
 * Lower-case extension without the dot
 */
export function getExtension(filePath: string): string {
  return path.extname(filePath).slice(1).toLowerCase();
}

/**
 * Media kind of a path, or null when the extension is not accepted
 */
export function classifyPath(filePath: string, options: EnumerateOptions): MediaKind | null {
  const ext = getExtension(filePath);
  if (!ext) return null;
  if (options.imageExtensions.includes(ext)) return 'image';
  if (options.videoExtensions.includes(ext)) return 'video';
  return null;
}

function compareCodePoints(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

async function listFiles(dir: string, recursive: boolean): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);

    if (entry.isDirectory()) {
      if (recursive && !entry.name.startsWith('.')) {
        files.push(...await listFiles(fullPath, recursive));
      }
      continue;
    }

    if (entry.isFile()) {
      files.push(fullPath);
    } else if (entry.isSymbolicLink()) {
      const target = await fs.stat(fullPath).catch(() => null);
      if (target?.isFile()) {
        files.push(fullPath);
      }
    }
  }

  return files;
}

/**
 * Scan a directory for captionable items in deterministic path order
 */
export async function enumerateDirectory(root: string, options: EnumerateOptions): Promise<MediaItem[]> {
  const dir = path.resolve(root);

  let stats: Stats;
  try {
    stats = await fs.stat(dir);
  } catch (error) {
    throw new DiscoveryError(`Cannot read directory ${dir}: ${toErrorMessage(error)}`, { cause: error });
  }
  if (!stats.isDirectory()) {
    throw new DiscoveryError(`Not a directory: ${dir}`);
  }

  let files: string[];
  try {
    files = await listFiles(dir, options.recursive);
  } catch (error) {
    throw new DiscoveryError(`Cannot read directory ${dir}: ${toErrorMessage(error)}`, { cause: error });
  }

  const items: MediaItem[] = [];
  for (const file of files.sort(compareCodePoints)) {
    const mediaKind = classifyPath(file, options);
    if (mediaKind) {
      items.push({ sourcePath: file, mediaKind });
    }
  }

  return items;
}

/**
 * Read a queue file into ordered media items. `.json` files use the
 * directory queue format, everything else the line format.
 */
export async function loadQueueFile(
  queuePath: string,
  options: EnumerateOptions,
  logger: Logger
): Promise<MediaItem[]> {
  const file = path.resolve(queuePath);
  const baseDir = path.dirname(file);

  let content: string;
  try {
    content = await fs.readFile(file, 'utf-8');
  } catch (error) {
    throw new DiscoveryError(`Cannot read queue file ${file}: ${toErrorMessage(error)}`, { cause: error });
  }

  const items: MediaItem[] = [];
  const seen = new Set<string>();
  const add = (item: MediaItem): void => {
    if (seen.has(item.sourcePath)) {
      logger.debug(`Duplicate queue entry ignored: ${item.sourcePath}`);
      return;
    }
    seen.add(item.sourcePath);
    items.push(item);
  };

  if (getExtension(file) === 'json') {
    const entries = parseJsonQueue(content, baseDir);

    for (const [index, entry] of entries.entries()) {
      if (!entry) {
        logger.warn(`Queue entry ${index} has no "directory", skipping`);
        continue;
      }

      const prompt = entry.system ? await resolvePromptSource(entry.system, baseDir) : undefined;
      const found = await enumerateDirectory(entry.directory, options);
      if (found.length === 0) {
        logger.info(`No media found in ${entry.directory}`);
      }

      for (const item of found) {
        const overrides = {
          ...(entry.model && { model: entry.model }),
          ...(prompt && { prompt }),
        };
        add(Object.keys(overrides).length > 0 ? { ...item, overrides } : item);
      }
    }
  } else {
    for (const entry of parseQueueFile(content, baseDir)) {
      const mediaKind = classifyPath(entry.sourcePath, options);
      if (!mediaKind) {
        throw new InvalidQueueFormatError(`unsupported media type: ${entry.sourcePath}`, entry.line);
      }
      add({
        sourcePath: entry.sourcePath,
        mediaKind,
        ...(entry.priorStatus && { priorStatus: entry.priorStatus }),
      });
    }
  }

  logger.info(`Loaded ${items.length} item(s) from queue file ${file}`);
  return items;
}
