import fs from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { PipelineController, type PipelineContext } from './controller.js';
import { QuillDatabase } from '../storage/database.js';
import { ResultWriter } from '../storage/result-writer.js';
import { JobQueue } from '../queue/job-queue.js';
import { ModelNotFoundError, QueueStateError, TimeoutError } from '../errors.js';
import type { CaptionRequest, HealthStatus, ModelCaption, ModelClient } from '../captioning/provider.js';
import type { QuillConfig } from '../types.js';
import { PNG_BYTES, createSilentLogger, createTestConfig, makeTempDir, removeDir } from '../testing/helpers.js';

class FakeClient implements ModelClient {
  readonly name = 'fake';
  health: HealthStatus = { reachable: true, models: ['llava:latest'] };
  caption = vi.fn(async (request: CaptionRequest): Promise<ModelCaption> => reply(`Caption for: ${request.prompt}`));
  healthCheck = vi.fn(async () => this.health);
}

function reply(text: string): ModelCaption {
  return { text, tokensUsed: 10, model: 'llava:latest', durationMs: 1 };
}

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('PipelineController', () => {
  let dir: string;
  let db: QuillDatabase;
  let queue: JobQueue;
  let client: FakeClient;

  beforeEach(async () => {
    dir = await makeTempDir();
    db = new QuillDatabase(':memory:', createSilentLogger());
    queue = new JobQueue(db, createSilentLogger());
    client = new FakeClient();
  });

  afterEach(async () => {
    db.close();
    await removeDir(dir);
  });

  async function addImages(...names: string[]): Promise<void> {
    for (const name of names) {
      await fs.writeFile(path.join(dir, name), PNG_BYTES);
    }
    queue.populate(names.map(name => ({ sourcePath: path.join(dir, name), mediaKind: 'image' as const })));
  }

  function createContext(customize?: (config: QuillConfig) => void): PipelineContext {
    const config = createTestConfig(c => {
      c.captioning.promptTemplate = 'Describe {{filename}}.';
      customize?.(c);
    });
    const logger = createSilentLogger();
    return {
      config,
      logger,
      queue,
      client,
      writer: new ResultWriter(queue, config.media.captionExtension, logger),
      extractor: null,
    };
  }

  it('captions every pending job and writes sidecars', async () => {
    await addImages('a.png', 'b.png', 'c.png');
    const onProgress = vi.fn();
    const states: string[] = [];

    const summary = await new PipelineController(createContext(), {
      onProgress,
      onStateChange: state => states.push(state),
    }).start();

    expect(summary).toMatchObject({ state: 'completed', completed: 3, failed: 0, total: 3, remaining: 0 });
    expect(summary.failedJobs).toEqual([]);
    expect(states).toEqual(['running', 'completed']);
    expect(await fs.readFile(path.join(dir, 'b.txt'), 'utf-8')).toBe('Caption for: Describe b.png.');
    expect(onProgress).toHaveBeenCalledTimes(3);
    expect(onProgress.mock.lastCall?.slice(0, 3)).toEqual([3, 0, 3]);
    expect(queue.getStats()).toEqual({ pending: 0, inProgress: 0, done: 3, failed: 0, total: 3 });
    expect(queue.lastRun()?.state).toBe('completed');
  });

  it('uses per-job model and prompt overrides', async () => {
    await fs.writeFile(path.join(dir, 'a.png'), PNG_BYTES);
    queue.populate([
      { sourcePath: path.join(dir, 'a.png'), mediaKind: 'image', overrides: { model: 'moondream', prompt: 'Tag {{filename}}' } },
    ]);

    await new PipelineController(createContext()).start();

    expect(client.caption).toHaveBeenCalledWith(
      expect.objectContaining({ model: 'moondream', prompt: 'Tag a.png', timeoutMs: 120000 })
    );
  });

  it('fails a job on a missing model without retrying', async () => {
    await addImages('a.png');
    client.caption.mockRejectedValue(new ModelNotFoundError('llava:latest'));

    const summary = await new PipelineController(createContext()).start();

    expect(summary).toMatchObject({ state: 'completed', completed: 0, failed: 1 });
    expect(client.caption).toHaveBeenCalledTimes(1);
    expect(summary.failedJobs).toEqual([
      expect.objectContaining({ lastError: 'Model not found: llava:latest', attempts: 1 }),
    ]);
  });

  it('retries timeouts up to the configured limit', async () => {
    await addImages('a.png');
    client.caption
      .mockRejectedValueOnce(new TimeoutError(1000))
      .mockRejectedValueOnce(new TimeoutError(1000))
      .mockRejectedValueOnce(new TimeoutError(1000))
      .mockResolvedValueOnce(reply('A late caption.'));

    const summary = await new PipelineController(createContext()).start();

    expect(summary).toMatchObject({ completed: 1, failed: 0 });
    expect(client.caption).toHaveBeenCalledTimes(4);
    expect(await fs.readFile(path.join(dir, 'a.txt'), 'utf-8')).toBe('A late caption.');
  });

  it('fails a job once timeouts exhaust the retries', async () => {
    await addImages('a.png');
    client.caption.mockRejectedValue(new TimeoutError(1000));

    const summary = await new PipelineController(createContext()).start();

    expect(client.caption).toHaveBeenCalledTimes(4);
    expect(summary.failedJobs).toEqual([
      expect.objectContaining({ lastError: 'Request timed out after 1000ms', attempts: 4 }),
    ]);
  });

  it('fails an unreadable image and keeps going', async () => {
    await addImages('a.png');
    await fs.writeFile(path.join(dir, 'b.png'), 'not an image');
    queue.populate([{ sourcePath: path.join(dir, 'b.png'), mediaKind: 'image' }]);

    const summary = await new PipelineController(createContext()).start();

    expect(summary).toMatchObject({ state: 'completed', completed: 1, failed: 1 });
    expect(client.caption).toHaveBeenCalledTimes(1);
  });

  it('lets in-flight jobs finish on cancel and leaves the rest pending', async () => {
    await addImages('a.png', 'b.png', 'c.png', 'd.png');
    const pending: Deferred<ModelCaption>[] = [];
    client.caption.mockImplementation(() => {
      const next = deferred<ModelCaption>();
      pending.push(next);
      return next.promise;
    });

    const controller = new PipelineController(createContext(c => (c.pipeline.concurrency = 2)));
    const run = controller.start();

    await vi.waitFor(() => expect(pending).toHaveLength(2));
    controller.cancel();
    for (const call of pending) {
      call.resolve(reply('Done before cancel.'));
    }
    const summary = await run;

    expect(summary).toMatchObject({ state: 'cancelled', completed: 2, failed: 0, remaining: 2 });
    expect(client.caption).toHaveBeenCalledTimes(2);
    expect(queue.getStats()).toEqual({ pending: 2, inProgress: 0, done: 2, failed: 0, total: 4 });
  });

  it('stops claiming while paused', async () => {
    await addImages('a.png', 'b.png');
    const controller = new PipelineController(createContext(c => (c.pipeline.concurrency = 1)));
    client.caption.mockImplementationOnce(async () => {
      controller.pause();
      return reply('First.');
    });

    const run = controller.start();
    await vi.waitFor(() => expect(queue.getStats().done).toBe(1));
    await new Promise(resolve => setTimeout(resolve, 20));

    expect(controller.state).toBe('paused');
    expect(client.caption).toHaveBeenCalledTimes(1);
    expect(queue.getStats().pending).toBe(1);

    controller.resume();
    const summary = await run;
    expect(summary).toMatchObject({ state: 'completed', completed: 2 });
  });

  it('aborts before claiming when the endpoint is unreachable', async () => {
    await addImages('a.png', 'b.png');
    client.health = { reachable: false, models: [], error: 'ECONNREFUSED' };

    const summary = await new PipelineController(createContext()).start();

    expect(summary.state).toBe('failed');
    expect(summary.fatalError).toBe('Inference endpoint unreachable at http://localhost:11434: ECONNREFUSED');
    expect(client.caption).not.toHaveBeenCalled();
    expect(queue.getStats().pending).toBe(2);
  });

  it('skips the health check when preflight is off', async () => {
    await addImages('a.png');
    client.health = { reachable: false, models: [] };

    const summary = await new PipelineController(createContext(c => (c.pipeline.preflight = false))).start();

    expect(summary.state).toBe('completed');
    expect(client.healthCheck).not.toHaveBeenCalled();
  });

  it('aborts the run when the state store fails', async () => {
    await addImages('a.png', 'b.png');
    client.caption.mockImplementation(async () => {
      db.close();
      return reply('Never recorded.');
    });

    const summary = await new PipelineController(createContext(c => (c.pipeline.concurrency = 1))).start();

    expect(summary.state).toBe('failed');
    expect(summary.fatalError).toMatch(/^State store failed to /);
    expect(client.caption).toHaveBeenCalledTimes(1);
  });

  it('keeps its claims when another process opens the queue mid-run', async () => {
    db.close();
    const dbPath = path.join(dir, 'state', 'quill.db');
    db = new QuillDatabase(dbPath, createSilentLogger());
    queue = new JobQueue(db, createSilentLogger());
    await addImages('a.png', 'b.png');

    const seenByInspector: number[] = [];
    client.caption.mockImplementation(async request => {
      const inspectorDb = new QuillDatabase(dbPath, createSilentLogger());
      seenByInspector.push(new JobQueue(inspectorDb, createSilentLogger()).getStats().inProgress);
      inspectorDb.close();
      return reply(`Caption for: ${request.prompt}`);
    });

    const summary = await new PipelineController(createContext(c => (c.pipeline.concurrency = 1))).start();

    expect(summary).toMatchObject({ state: 'completed', completed: 2, failed: 0 });
    expect(client.caption.mock.calls.map(([request]) => request.prompt)).toEqual(['Describe a.png.', 'Describe b.png.']);
    expect(seenByInspector).toEqual([1, 1]);
    expect(db.getRunLock()).toBeNull();
  });

  it('refuses to run a queue another live run holds', async () => {
    await addImages('a.png');
    queue.beginRun('other-run');

    const summary = await new PipelineController(createContext()).start();

    expect(summary.state).toBe('failed');
    expect(summary.fatalError).toMatch(/^Queue is already being run by pid \d+ since /);
    expect(client.caption).not.toHaveBeenCalled();
    expect(db.getRunLock()?.owner).toBe('other-run');
  });

  it('keeps running when a job changes state under its worker', async () => {
    await addImages('a.png');
    const context = createContext(c => (c.pipeline.concurrency = 1));
    vi.spyOn(queue, 'complete').mockImplementationOnce(() => {
      db.resetAllToPending('in_progress');
      throw new QueueStateError('Job was re-queued while captioning');
    });

    const summary = await new PipelineController(context).start();

    expect(summary.state).toBe('completed');
    expect(summary.fatalError).toBeUndefined();
    expect(summary).toMatchObject({ completed: 1, failed: 1 });
    expect(context.logger.warn).toHaveBeenCalledWith(
      expect.stringMatching(/^Could not record failure of job [0-9a-f]{16}: Cannot fail job [0-9a-f]{16} in state pending$/)
    );
    expect(queue.getStats()).toEqual({ pending: 0, inProgress: 0, done: 1, failed: 0, total: 1 });
  });

  it('can only be started once', async () => {
    const controller = new PipelineController(createContext());
    await controller.start();
    await expect(controller.start()).rejects.toThrow('Pipeline already started (state: completed)');
  });
});
