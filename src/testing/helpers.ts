/**
 * Shared fixtures for the test suites
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { vi } from 'vitest';
import type { Logger, QuillConfig, RunConfig } from '../types.js';
import { createDefaultConfig, freezeConfig } from '../config.js';

export function createSilentLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

export function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'quill-test-'));
}

export function removeDir(dir: string): Promise<void> {
  return fs.rm(dir, { recursive: true, force: true });
}

/** Smallest byte sequences the image sniffer accepts */
export const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00, 0x00, 0x0d]);
export const JPEG_BYTES = Buffer.from([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10]);

/**
 * Frozen configuration for tests: in-memory store, no retry delays
 */
export function createTestConfig(customize?: (config: QuillConfig) => void): RunConfig {
  const config = createDefaultConfig({});
  config.storage.dbPath = ':memory:';
  config.retry.baseDelayMs = 0;
  config.retry.maxDelayMs = 0;
  customize?.(config);
  return freezeConfig(config);
}
