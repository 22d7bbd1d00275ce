import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { JobQueue, isProcessAlive, jobIdFor } from './job-queue.js';
import { QuillDatabase } from '../storage/database.js';
import { QueueStateError, RunLockedError, StoreError } from '../errors.js';
import { createSilentLogger, makeTempDir, removeDir } from '../testing/helpers.js';
import type { CaptionResult, MediaItem } from '../types.js';

const image = (name: string): MediaItem => ({ sourcePath: path.resolve('/media', name), mediaKind: 'image' });

const result = (text: string): CaptionResult => ({
  text,
  model: 'llava:latest',
  timestamp: new Date('2024-01-01T00:00:00Z'),
  promptVersion: 'abc123def456',
  tokensUsed: 10,
  durationMs: 5,
});

describe('JobQueue', () => {
  let db: QuillDatabase;
  let queue: JobQueue;

  beforeEach(() => {
    db = new QuillDatabase(':memory:', createSilentLogger());
    queue = new JobQueue(db, createSilentLogger());
  });

  afterEach(() => {
    db.close();
  });

  it('derives stable job ids from the resolved path', () => {
    expect(jobIdFor('/media/a.png')).toBe(jobIdFor('/media/../media/a.png'));
    expect(jobIdFor('/media/a.png')).toMatch(/^[0-9a-f]{16}$/);
    expect(jobIdFor('/media/a.png')).not.toBe(jobIdFor('/media/b.png'));
  });

  it('claims pending jobs in queue order', () => {
    queue.populate([image('b.png'), image('a.png'), image('c.png')]);

    expect(queue.claimNext()?.sourcePath).toBe(path.resolve('/media/b.png'));
    expect(queue.claimNext()?.sourcePath).toBe(path.resolve('/media/a.png'));
    expect(queue.claimNext()?.sourcePath).toBe(path.resolve('/media/c.png'));
    expect(queue.claimNext()).toBeNull();
  });

  it('never hands out the same job twice', () => {
    queue.populate(Array.from({ length: 20 }, (_, i) => image(`${i}.png`)));

    const claimed = new Set<string>();
    for (let job = queue.claimNext(); job; job = queue.claimNext()) {
      expect(claimed.has(job.id)).toBe(false);
      expect(job.status).toBe('in_progress');
      claimed.add(job.id);
    }

    expect(claimed.size).toBe(20);
    expect(queue.getStats()).toEqual({ pending: 0, inProgress: 20, done: 0, failed: 0, total: 20 });
  });

  it('keeps the state of jobs already in the queue', () => {
    queue.populate([image('a.png')]);
    const job = queue.claimNext();
    expect(job).not.toBeNull();
    queue.complete(jobIdFor('/media/a.png'), '/media/a.txt', result('a cat'));

    const second = queue.populate([image('a.png'), image('b.png')]);
    expect(second).toEqual({ added: 1, skippedExisting: 0, requeued: 0 });
    expect(queue.getJob(jobIdFor('/media/a.png'))?.status).toBe('done');
  });

  it('inserts items with an existing sidecar as done unless overwriting', () => {
    const options = { sidecarFor: (p: string) => p.replace(/\.png$/, '.txt'), exists: (p: string) => p.endsWith('a.txt') };

    const first = queue.populate([image('a.png'), image('b.png')], options);
    expect(first).toEqual({ added: 2, skippedExisting: 1, requeued: 0 });
    expect(queue.getJob(jobIdFor('/media/a.png'))).toMatchObject({
      status: 'done',
      resultPath: path.resolve('/media/a.txt'),
    });

    const again = queue.populate([image('a.png')], { ...options, overwrite: true });
    expect(again).toEqual({ added: 0, skippedExisting: 0, requeued: 1 });
    expect(queue.getJob(jobIdFor('/media/a.png'))?.status).toBe('pending');
  });

  it('honours prior states from a queue file', () => {
    queue.populate([
      { ...image('a.png'), priorStatus: 'done' },
      { ...image('b.png'), priorStatus: 'failed' },
      { ...image('c.png'), priorStatus: 'in_progress' },
    ]);

    expect(queue.getStats()).toEqual({ pending: 1, inProgress: 0, done: 1, failed: 1, total: 3 });
  });

  it('stores per-job overrides', () => {
    queue.populate([{ ...image('a.png'), overrides: { model: 'moondream', prompt: 'Short caption.' } }]);
    expect(queue.claimNext()?.overrides).toEqual({ model: 'moondream', prompt: 'Short caption.' });
  });

  it('treats a repeated identical complete as a no-op', () => {
    queue.populate([image('a.png')]);
    const job = queue.claimNext();
    if (!job) throw new Error('expected a job');

    expect(queue.complete(job.id, '/media/a.txt', result('a cat'))).toBe(true);
    const after = queue.getJob(job.id);

    expect(queue.complete(job.id, '/media/a.txt', result('a cat'))).toBe(false);
    expect(queue.getJob(job.id)).toEqual(after);
  });

  it('rejects a different result for a done job', () => {
    queue.populate([image('a.png')]);
    const job = queue.claimNext();
    if (!job) throw new Error('expected a job');

    queue.complete(job.id, '/media/a.txt', result('a cat'));
    expect(() => queue.complete(job.id, '/media/a.txt', result('a dog'))).toThrow(QueueStateError);
  });

  it('rejects completing or failing a job that was not claimed', () => {
    queue.populate([image('a.png')]);
    const id = jobIdFor('/media/a.png');

    expect(() => queue.complete(id, '/media/a.txt', result('a cat'))).toThrow(QueueStateError);
    expect(() => queue.fail(id, new Error('boom'))).toThrow('Cannot fail job');
    expect(() => queue.fail('0000000000000000', new Error('boom'))).toThrow('Unknown job: 0000000000000000');
  });

  it('treats a repeated identical fail as a no-op', () => {
    queue.populate([image('a.png')]);
    const job = queue.claimNext();
    if (!job) throw new Error('expected a job');

    expect(queue.fail(job.id, new Error('timed out'))).toBe(true);
    expect(queue.fail(job.id, new Error('timed out'))).toBe(false);
    expect(queue.failedJobs()).toEqual([
      { id: job.id, sourcePath: path.resolve('/media/a.png'), lastError: 'timed out', attempts: 0 },
    ]);
  });

  it('counts attempts within a claim and resets them on the next claim', () => {
    queue.populate([image('a.png')]);
    const job = queue.claimNext();
    if (!job) throw new Error('expected a job');

    queue.recordAttempt(job.id);
    expect(queue.recordAttempt(job.id)).toBe(2);
    queue.fail(job.id, 'gave up');

    expect(queue.requeueFailed()).toBe(1);
    expect(queue.claimNext()?.attempts).toBe(0);
  });

  it('re-queues only failed jobs by id', () => {
    queue.populate([image('a.png'), image('b.png')]);
    const a = queue.claimNext();
    const b = queue.claimNext();
    if (!a || !b) throw new Error('expected two jobs');
    queue.fail(a.id, 'broken');
    queue.complete(b.id, '/media/b.txt', result('a boat'));

    expect(queue.requeue([a.id, b.id])).toBe(1);
    expect(queue.getJob(a.id)?.status).toBe('pending');
    expect(queue.getJob(b.id)?.status).toBe('done');

    expect(queue.recaption([b.id])).toBe(1);
    expect(queue.getJob(b.id)?.status).toBe('pending');
  });

  it('appends single items at the end of the queue', () => {
    queue.populate([image('a.png')]);
    queue.append(image('z.png'));
    queue.append(image('a.png'));

    expect(queue.list().map(job => path.basename(job.sourcePath))).toEqual(['a.png', 'z.png']);
  });
});

describe('JobQueue persistence', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('reconstructs the partition after a restart, resuming interrupted jobs when a run begins', () => {
    const dbPath = path.join(dir, 'state', 'quill.db');
    const db = new QuillDatabase(dbPath, createSilentLogger());
    const queue = new JobQueue(db, createSilentLogger());

    queue.populate(['a.png', 'b.png', 'c.png', 'd.png'].map(image));
    const a = queue.claimNext();
    const b = queue.claimNext();
    queue.claimNext();
    if (!a || !b) throw new Error('expected jobs');
    queue.complete(a.id, '/media/a.txt', result('a cat'));
    queue.fail(b.id, 'unreadable');
    queue.persist();
    db.close();

    const reopened = new QuillDatabase(dbPath, createSilentLogger());
    const logger = createSilentLogger();
    const resumed = new JobQueue(reopened, logger);

    expect(resumed.getStats()).toEqual({ pending: 1, inProgress: 1, done: 1, failed: 1, total: 4 });
    expect(logger.warn).not.toHaveBeenCalled();

    expect(resumed.beginRun('second-run')).toBe(1);
    expect(resumed.getStats()).toEqual({ pending: 2, inProgress: 0, done: 1, failed: 1, total: 4 });
    expect(resumed.claimNext()?.sourcePath).toBe(path.resolve('/media/c.png'));
    expect(logger.warn).toHaveBeenCalledWith('Resumed 1 interrupted job(s) as pending');
    reopened.close();
  });

  it('leaves live claims alone when another connection opens the queue', () => {
    const dbPath = path.join(dir, 'quill.db');
    const runnerDb = new QuillDatabase(dbPath, createSilentLogger());
    const runner = new JobQueue(runnerDb, createSilentLogger());
    runner.populate([image('a.png'), image('b.png')]);
    runner.beginRun('runner');
    const claimed = runner.claimNext();
    if (!claimed) throw new Error('expected a job');

    const inspectorDb = new QuillDatabase(dbPath, createSilentLogger());
    const inspector = new JobQueue(inspectorDb, createSilentLogger());
    expect(inspector.getStats()).toEqual({ pending: 1, inProgress: 1, done: 0, failed: 0, total: 2 });
    expect(inspector.activeRun()).toMatchObject({ owner: 'runner', pid: process.pid });
    inspectorDb.close();

    expect(runner.complete(claimed.id, '/media/a.txt', result('a cat'))).toBe(true);
    runnerDb.close();
  });

  it('refuses to begin a second run while a live process holds the lock', () => {
    const dbPath = path.join(dir, 'quill.db');
    const firstDb = new QuillDatabase(dbPath, createSilentLogger());
    const first = new JobQueue(firstDb, createSilentLogger());
    first.populate([image('a.png')]);
    first.beginRun('first');
    first.claimNext();

    const secondDb = new QuillDatabase(dbPath, createSilentLogger());
    const second = new JobQueue(secondDb, createSilentLogger());
    expect(() => second.beginRun('second')).toThrow(RunLockedError);
    expect(second.getStats().inProgress).toBe(1);

    first.endRun('first');
    expect(second.activeRun()).toBeNull();
    expect(second.beginRun('second')).toBe(1);

    firstDb.close();
    secondDb.close();
  });

  it('takes over a lock left by a process that is gone', () => {
    const db = new QuillDatabase(path.join(dir, 'quill.db'), createSilentLogger());
    const logger = createSilentLogger();
    const queue = new JobQueue(db, logger);
    const deadPid = 2147483646;
    expect(isProcessAlive(deadPid)).toBe(false);
    db.setRunLock('crashed-run', deadPid);

    expect(queue.activeRun()).toBeNull();
    expect(queue.beginRun('new-run')).toBe(0);
    expect(logger.warn).toHaveBeenCalledWith(`Taking over run lock left by pid ${deadPid}`);
    expect(db.getRunLock()).toMatchObject({ owner: 'new-run', pid: process.pid });
    db.close();
  });

  it('records runs', () => {
    const db = new QuillDatabase(path.join(dir, 'quill.db'), createSilentLogger());
    const queue = new JobQueue(db, createSilentLogger());

    expect(queue.lastRun()).toBeNull();
    queue.recordRun({
      state: 'completed',
      completed: 3,
      failed: 1,
      total: 4,
      remaining: 0,
      startTime: new Date('2024-01-01T00:00:00Z'),
      endTime: new Date('2024-01-01T00:01:00Z'),
      failedJobs: [],
    });

    expect(queue.lastRun()).toMatchObject({ state: 'completed', completed: 3, failed: 1, total: 4, fatalError: null });
    db.close();
  });

  it('raises StoreError when the store cannot be opened', () => {
    expect(() => new QuillDatabase(path.join(dir, 'missing', '\0bad', 'quill.db'), createSilentLogger())).toThrow(
      StoreError
    );
  });
});
