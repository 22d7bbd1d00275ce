/**
 * Prompt templates
 */

import { createHash } from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import type { MediaKind } from '../types.js';

export interface PromptVariables {
  filename: string;
  mediaKind: MediaKind;
  frameIndex?: number;
  frameCount?: number;
}

/**
 * Fill {{name}} placeholders. Unknown placeholders are left untouched.
 */
export function renderPrompt(template: string, variables: PromptVariables): string {
  const values: Record<string, string> = {
    filename: variables.filename,
    mediaKind: variables.mediaKind === 'video' ? 'video' : 'image',
  };
  if (variables.frameIndex !== undefined) {
    values['frameIndex'] = String(variables.frameIndex + 1);
  }
  if (variables.frameCount !== undefined) {
    values['frameCount'] = String(variables.frameCount);
  }

  return template.replace(/\{\{\s*(\w+)\s*\}\}/g, (match, name: string) => values[name] ?? match);
}

/**
 * Short, stable version tag of a prompt template
 */
export function promptVersion(template: string): string {
  return createHash('sha256').update(template).digest('hex').slice(0, 12);
}

/**
 * A prompt argument may be literal text or a path to a text file.
 * Files are read and trimmed; anything else is returned as given.
 */
export async function resolvePromptSource(value: string, baseDir: string = process.cwd()): Promise<string> {
  const candidate = path.resolve(baseDir, value);
  try {
    const stats = await fs.stat(candidate);
    if (stats.isFile()) {
      return (await fs.readFile(candidate, 'utf-8')).trim();
    }
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code !== 'ENOENT' && code !== 'ENAMETOOLONG' && code !== 'ENOTDIR') {
      throw error;
    }
  }
  return value;
}
