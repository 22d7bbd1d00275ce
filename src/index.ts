#!/usr/bin/env node

/**
 * Quill CLI
 *
 * Batch-captions image folders and video files with a local vision-language model.
 */

import path from 'path';
import { Command, InvalidArgumentError } from 'commander';
import { freezeConfig, loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { Quill } from './quill.js';
import { Captioner, resolvePromptSource } from './captioning/index.js';
import { toErrorMessage } from './errors.js';
import type { FramePolicy, Logger, QuillConfig, RunSummary } from './types.js';

const VERSION = '1.0.0';

interface CommonOptions {
  config?: string;
  store?: string;
  verbose?: boolean;
  logFile?: string;
}

interface ModelOptions extends CommonOptions {
  provider?: string;
  endpoint?: string;
  model?: string;
}

interface RunOptions extends ModelOptions {
  queue?: string;
  prompt?: string;
  concurrency?: number;
  overwrite?: boolean;
  recursive?: boolean;
  video?: boolean;
  framePolicy?: FramePolicy;
  frames?: number;
  preflight: boolean;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function parseFramePolicy(value: string): FramePolicy {
  if (value === 'batched' || value === 'per_frame') {
    return value;
  }
  throw new InvalidArgumentError('Must be "batched" or "per_frame".');
}

function applyCommonOptions(config: QuillConfig, options: ModelOptions): void {
  if (options.store) {
    config.storage.dbPath = path.resolve(options.store);
  }
  if (options.provider) {
    config.captioning.provider = options.provider;
  }
  if (options.endpoint) {
    config.captioning.endpoint = options.endpoint;
  }
  if (options.model) {
    config.captioning.model = options.model;
  }
  if (options.verbose) {
    config.logLevel = 'debug';
  }
}

/**
 * Load config, apply CLI overrides and open the pipeline
 */
async function openQuill(
  options: ModelOptions,
  applyOverrides?: (config: QuillConfig) => Promise<void>
): Promise<{ quill: Quill; logger: Logger }> {
  const config = loadConfig(options.config);
  applyCommonOptions(config, options);
  await applyOverrides?.(config);

  const logger = createLogger(config.logLevel, { ...(options.logFile && { file: options.logFile }) });
  const quill = new Quill(freezeConfig(config), logger);
  return { quill, logger };
}

function fail(logger: Logger, message: string, error: unknown): void {
  logger.error(message, { error: toErrorMessage(error) });
  process.exitCode = 1;
}

function printSummary(summary: RunSummary): void {
  const seconds = Math.round((summary.endTime.getTime() - summary.startTime.getTime()) / 1000);

  console.log(`\n🪶 Run ${summary.state} in ${seconds}s`);
  console.log(`   Completed: ${summary.completed}`);
  console.log(`   Failed:    ${summary.failed}`);
  console.log(`   Remaining: ${summary.remaining}`);

  if (summary.fatalError) {
    console.log(`\n   Aborted: ${summary.fatalError}`);
  }

  if (summary.failedJobs.length > 0) {
    console.log('\n❌ Failed jobs:');
    for (const job of summary.failedJobs) {
      console.log(`   ${job.id}  ${job.sourcePath}`);
      console.log(`      ${job.lastError ?? 'unknown error'}`);
    }
  }
}

function exitCodeFor(summary: RunSummary): number {
  switch (summary.state) {
    case 'completed':
      return summary.failed > 0 ? 2 : 0;
    case 'cancelled':
      return 130;
    default:
      return 1;
  }
}

const program = new Command();

program
  .name('quill')
  .description('🪶 Quill - batch captioning with a local vision-language model')
  .version(VERSION);

// Run command
program
  .command('run [directory]')
  .description('Caption every image (and video) in a directory or queue file')
  .option('-q, --queue <file>', 'Queue file (line format, or .json directory list)')
  .option('-m, --model <model>', 'Model to use for captioning')
  .option('-p, --provider <provider>', 'Provider (ollama, openai)')
  .option('-e, --endpoint <url>', 'Inference server base URL')
  .option('--prompt <text>', 'Prompt text, or path to a prompt file')
  .option('-c, --concurrency <n>', 'Number of concurrent requests', parsePositiveInt)
  .option('--overwrite', 'Re-caption items that already have a caption file')
  .option('-r, --recursive', 'Scan subdirectories')
  .option('--video', 'Caption video files as well')
  .option('--frame-policy <policy>', 'Video frames in one request (batched) or one each (per_frame)', parseFramePolicy)
  .option('--frames <n>', 'Frames sampled per video', parsePositiveInt)
  .option('--no-preflight', 'Skip the endpoint health check')
  .option('--store <path>', 'State store (SQLite) path')
  .option('--config <path>', 'Path to config file')
  .option('--log-file <path>', 'Also write logs to this file')
  .option('-v, --verbose', 'Enable verbose logging')
  .action(async (directory: string | undefined, options: RunOptions) => {
    let logger = createLogger('info');

    if (!directory && !options.queue) {
      logger.error('Provide a directory or --queue <file>');
      process.exitCode = 1;
      return;
    }

    let quill: Quill;
    try {
      ({ quill, logger } = await openQuill(options, async config => {
        if (options.prompt) {
          config.captioning.promptTemplate = await resolvePromptSource(options.prompt);
        }
        if (options.concurrency) {
          config.pipeline.concurrency = options.concurrency;
        }
        if (options.overwrite) {
          config.media.overwrite = true;
        }
        if (options.recursive) {
          config.media.recursive = true;
        }
        if (options.video) {
          config.video.enabled = true;
        }
        if (options.framePolicy) {
          config.video.framePolicy = options.framePolicy;
        }
        if (options.frames) {
          config.video.frameCount = options.frames;
        }
        if (options.preflight === false) {
          config.pipeline.preflight = false;
        }
      }));
    } catch (error) {
      fail(logger, 'Could not start', error);
      return;
    }

    // First signal cancels gracefully, a second one exits
    let interrupted = false;
    const shutdown = (): void => {
      if (interrupted) {
        logger.warn('Forced exit; in-flight jobs resume as pending next time');
        process.exit(130);
      }
      interrupted = true;
      logger.info('Finishing in-flight jobs (press Ctrl+C again to exit now)');
      quill.cancel();
    };
    let paused = false;
    const togglePause = (): void => {
      paused = !paused;
      if (paused) {
        quill.pause();
      } else {
        quill.resume();
      }
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
    process.on('SIGUSR1', togglePause);

    try {
      if (options.queue) {
        await quill.addQueueFile(options.queue);
      }
      if (directory) {
        await quill.addDirectory(directory);
      }

      const summary = await quill.run({
        onProgress: (completed, failed, total, currentItem) => {
          console.log(`[${completed + failed}/${total}] ${currentItem}`);
        },
      });

      printSummary(summary);
      process.exitCode = exitCodeFor(summary);
    } catch (error) {
      fail(logger, 'Run failed', error);
    } finally {
      process.off('SIGINT', shutdown);
      process.off('SIGTERM', shutdown);
      process.off('SIGUSR1', togglePause);
      quill.close();
    }
  });

// Status command
program
  .command('status')
  .description('Show queue statistics and the last run')
  .option('--store <path>', 'State store (SQLite) path')
  .option('--config <path>', 'Path to config file')
  .action(async (options: CommonOptions) => {
    let logger = createLogger('info');

    try {
      let quill: Quill;
      ({ quill, logger } = await openQuill(options));

      const stats = quill.getQueueStats();
      const lastRun = quill.lastRun();
      const activeRun = quill.activeRun();

      console.log('\n🪶 Quill Queue:');
      console.log(`   Pending:     ${stats.pending}`);
      console.log(`   In progress: ${stats.inProgress}`);
      console.log(`   Done:        ${stats.done}`);
      console.log(`   Failed:      ${stats.failed}`);
      console.log(`   Total:       ${stats.total}`);

      if (activeRun) {
        console.log(`\n   Running: pid ${activeRun.pid} since ${activeRun.acquiredAt.toISOString()}`);
      }

      if (lastRun) {
        console.log(`\n   Last run: ${lastRun.state} at ${lastRun.endedAt.toISOString()}`);
        console.log(`   ${lastRun.completed} completed, ${lastRun.failed} failed of ${lastRun.total}`);
        if (lastRun.fatalError) {
          console.log(`   Aborted: ${lastRun.fatalError}`);
        }
      }

      quill.close();
    } catch (error) {
      fail(logger, 'Failed to get status', error);
    }
  });

// Failed command
program
  .command('failed')
  .description('List failed jobs with their last error')
  .option('--store <path>', 'State store (SQLite) path')
  .option('--config <path>', 'Path to config file')
  .action(async (options: CommonOptions) => {
    let logger = createLogger('info');

    try {
      let quill: Quill;
      ({ quill, logger } = await openQuill(options));

      const failed = quill.failedJobs();
      if (failed.length === 0) {
        console.log('No failed jobs.');
      }
      for (const job of failed) {
        console.log(`${job.id}  ${job.sourcePath}`);
        console.log(`   attempts: ${job.attempts}  error: ${job.lastError ?? 'unknown error'}`);
      }

      quill.close();
    } catch (error) {
      fail(logger, 'Failed to list failed jobs', error);
    }
  });

// Requeue command
program
  .command('requeue [ids...]')
  .description('Move failed jobs back to pending (all of them when no id is given)')
  .option('--store <path>', 'State store (SQLite) path')
  .option('--config <path>', 'Path to config file')
  .action(async (ids: string[], options: CommonOptions) => {
    let logger = createLogger('info');

    try {
      let quill: Quill;
      ({ quill, logger } = await openQuill(options));

      const count = quill.requeue(ids);
      console.log(`Re-queued ${count} job(s).`);

      quill.close();
    } catch (error) {
      fail(logger, 'Failed to re-queue jobs', error);
    }
  });

// Export command
program
  .command('export-queue <file>')
  .description('Write the queue to a line-format queue file')
  .option('--store <path>', 'State store (SQLite) path')
  .option('--config <path>', 'Path to config file')
  .action(async (file: string, options: CommonOptions) => {
    let logger = createLogger('info');

    try {
      let quill: Quill;
      ({ quill, logger } = await openQuill(options));

      const count = await quill.exportQueue(path.resolve(file));
      console.log(`Wrote ${count} job(s) to ${path.resolve(file)}`);

      quill.close();
    } catch (error) {
      fail(logger, 'Failed to export queue', error);
    }
  });

// Models command
program
  .command('models')
  .description('List models installed on the inference server')
  .option('-p, --provider <provider>', 'Provider (ollama, openai)')
  .option('-e, --endpoint <url>', 'Inference server base URL')
  .option('--config <path>', 'Path to config file')
  .action(async (options: ModelOptions) => {
    let logger = createLogger('info');

    try {
      let quill: Quill;
      ({ quill, logger } = await openQuill(options));

      try {
        const models = await quill.listModels();
        if (models.length === 0) {
          console.log('The server reports no models.');
        }
        for (const model of models) {
          console.log(model);
        }
      } finally {
        quill.close();
      }
    } catch (error) {
      fail(logger, 'Failed to list models', error);
    }
  });

// Providers command
program
  .command('providers')
  .description('List available model providers')
  .action(() => {
    console.log('\n🤖 Available providers:');
    for (const provider of Captioner.listProviders()) {
      console.log(`   - ${provider}`);
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(toErrorMessage(error));
  process.exitCode = 1;
});
