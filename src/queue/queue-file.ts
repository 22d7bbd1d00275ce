/**
 * Queue file formats
 *
 * Line format: one record per line, either `<path>` or `<state>\t<path>`.
 * Blank lines and lines starting with `#` are skipped. Relative paths
 * resolve against the directory holding the queue file.
 *
 * JSON format: an array of `{ "directory": string, "model"?: string, "system"?: string }`,
 * one entry per directory to scan.
 */

import path from 'path';
import type { Job, JobStatus } from '../types.js';
import { JOB_STATUSES } from '../types.js';
import { InvalidQueueFormatError } from '../errors.js';

export interface QueueEntry {
  /** Absolute source path */
  sourcePath: string;
  /** Prior state annotation, if present */
  priorStatus?: JobStatus;
  /** 1-based line number in the file */
  line: number;
}

export interface JsonQueueEntry {
  /** Absolute directory to scan */
  directory: string;
  /** Model override for the directory's jobs */
  model?: string;
  /** Prompt text, or path to a prompt file */
  system?: string;
}

const QUEUE_FILE_HEADER = '# Quill job queue: one "<state>\\t<path>" record per line';

function parseStatus(value: string): JobStatus | undefined {
  return JOB_STATUSES.find(status => status === value);
}

/**
 * Parse the line-oriented queue format
 */
export function parseQueueFile(content: string, baseDir: string): QueueEntry[] {
  const entries: QueueEntry[] = [];
  const lines = content.split(/\r?\n/);

  lines.forEach((raw, index) => {
    const line = index + 1;
    const text = raw.trim();

    if (!text || text.startsWith('#')) {
      return;
    }
    if (text.includes('\0')) {
      throw new InvalidQueueFormatError('record contains a NUL character', line);
    }

    let priorStatus: JobStatus | undefined;
    let filePath = text;

    const tab = text.indexOf('\t');
    if (tab !== -1) {
      const annotation = text.slice(0, tab).trim();
      priorStatus = parseStatus(annotation);
      if (!priorStatus) {
        throw new InvalidQueueFormatError(`unknown state "${annotation}"`, line);
      }
      filePath = text.slice(tab + 1).trim();
    }

    if (!filePath) {
      throw new InvalidQueueFormatError('record has no path', line);
    }

    entries.push({
      sourcePath: path.resolve(baseDir, filePath),
      ...(priorStatus && { priorStatus }),
      line,
    });
  });

  return entries;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(entry: Record<string, unknown>, key: string, index: number): string | undefined {
  const value = entry[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string' || !value.trim()) {
    throw new InvalidQueueFormatError(`entry ${index}: "${key}" must be a non-empty string`);
  }
  return value;
}

/**
 * Parse the JSON directory queue. Entries without a directory are returned
 * as null so the caller can report them.
 */
export function parseJsonQueue(content: string, baseDir: string): (JsonQueueEntry | null)[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new InvalidQueueFormatError(`invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (!Array.isArray(parsed)) {
    throw new InvalidQueueFormatError('JSON queue must be an array of entries');
  }

  return parsed.map((entry: unknown, index): JsonQueueEntry | null => {
    if (!isRecord(entry)) {
      throw new InvalidQueueFormatError(`entry ${index} must be an object`);
    }

    const directory = optionalString(entry, 'directory', index);
    if (!directory) {
      return null;
    }

    const model = optionalString(entry, 'model', index);
    const system = optionalString(entry, 'system', index);

    return {
      directory: path.resolve(baseDir, directory),
      ...(model && { model }),
      ...(system && { system }),
    };
  });
}

/**
 * Serialize jobs to the line format. In-progress jobs are written as pending,
 * matching what a restart would do with them.
 */
export function formatQueueFile(jobs: Job[]): string {
  const lines = [QUEUE_FILE_HEADER];
  for (const job of jobs) {
    const status = job.status === 'in_progress' ? 'pending' : job.status;
    lines.push(`${status}\t${job.sourcePath}`);
  }
  return `${lines.join('\n')}\n`;
}
