/**
 * SQLite database holding the durable job queue
 */

import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import type {
  Job,
  JobRow,
  JobStatus,
  MediaKind,
  CaptionResult,
  QueueStats,
  RunLockRow,
  RunRow,
  RunSummary,
  Logger,
} from '../types.js';
import { JOB_STATUSES } from '../types.js';
import { QuillError, StoreError, toErrorMessage } from '../errors.js';

/** Fields needed to insert a new job row */
export interface NewJob {
  id: string;
  sourcePath: string;
  mediaKind: MediaKind;
  status: JobStatus;
  resultPath: string | null;
  position: number;
  overrideModel: string | null;
  overridePrompt: string | null;
}

/** Process currently running the queue */
export interface RunLock {
  owner: string;
  pid: number;
  acquiredAt: Date;
}

/** Last recorded run, for status output */
export interface RunRecord {
  id: number;
  state: string;
  startedAt: Date;
  endedAt: Date;
  completed: number;
  failed: number;
  total: number;
  fatalError: string | null;
}

function isJobStatus(value: string): value is JobStatus {
  return JOB_STATUSES.some(status => status === value);
}

function isMediaKind(value: string): value is MediaKind {
  return value === 'image' || value === 'video';
}

/**
 * Database manager for the job queue
 */
export class QuillDatabase {
  private db: Database.Database;
  private logger: Logger;

  constructor(dbPath: string, logger: Logger) {
    this.logger = logger;

    try {
      if (dbPath !== ':memory:') {
        fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
      }
      this.db = new Database(dbPath);
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('synchronous = FULL');
    } catch (error) {
      throw new StoreError(`Cannot open state store at ${dbPath}: ${toErrorMessage(error)}`, { cause: error });
    }

    this.initSchema();
  }

  /**
   * Initialize database schema
   */
  private initSchema(): void {
    this.guard('initialize schema', () => {
      this.db.exec(`
        -- Jobs table: one row per source media item, ordered by position
        CREATE TABLE IF NOT EXISTS jobs (
          id TEXT PRIMARY KEY,
          source_path TEXT NOT NULL UNIQUE,
          media_kind TEXT NOT NULL,
          status TEXT NOT NULL DEFAULT 'pending',
          last_error TEXT,
          attempts INTEGER NOT NULL DEFAULT 0,
          result_path TEXT,
          position INTEGER NOT NULL,
          override_model TEXT,
          override_prompt TEXT,
          caption_text TEXT,
          caption_model TEXT,
          prompt_version TEXT,
          captioned_at TEXT,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );

        -- Runs table: one row per finished pipeline run
        CREATE TABLE IF NOT EXISTS runs (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          state TEXT NOT NULL,
          started_at TEXT NOT NULL,
          ended_at TEXT NOT NULL,
          completed INTEGER NOT NULL DEFAULT 0,
          failed INTEGER NOT NULL DEFAULT 0,
          total INTEGER NOT NULL DEFAULT 0,
          fatal_error TEXT
        );

        -- Run lock: at most one row, held by the process running the queue
        CREATE TABLE IF NOT EXISTS run_lock (
          id INTEGER PRIMARY KEY CHECK (id = 1),
          owner TEXT NOT NULL,
          pid INTEGER NOT NULL,
          acquired_at TEXT NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_jobs_status_position ON jobs(status, position);
      `);
    });

    this.logger.debug('Database schema initialized');
  }

  /**
   * Run a function inside an immediate transaction
   */
  transaction<T>(fn: () => T): T {
    return this.guard('run transaction', () => this.db.transaction(fn).immediate());
  }

  // ============ Job Methods ============

  /**
   * Insert a job unless its id already exists. Returns true when inserted.
   */
  insertJob(job: NewJob): boolean {
    return this.guard('insert job', () => {
      const now = new Date().toISOString();
      const result = this.db.prepare(`
        INSERT OR IGNORE INTO jobs (
          id, source_path, media_kind, status, attempts, result_path, position,
          override_model, override_prompt, created_at, updated_at
        ) VALUES (?, ?, ?, ?, 0, ?, ?, ?, ?, ?, ?)
      `).run(
        job.id,
        job.sourcePath,
        job.mediaKind,
        job.status,
        job.resultPath,
        job.position,
        job.overrideModel,
        job.overridePrompt,
        now,
        now
      );
      return result.changes > 0;
    });
  }

  /**
   * Get a job by its ID
   */
  getJob(id: string): Job | null {
    const row = this.guard('read job', () =>
      this.db.prepare(`SELECT * FROM jobs WHERE id = ?`).get(id) as JobRow | undefined
    );
    return row ? this.rowToJob(row) : null;
  }

  /**
   * Get the stored caption text of a done job
   */
  getCaptionText(id: string): string | null {
    const row = this.guard('read caption', () =>
      this.db.prepare(`SELECT caption_text FROM jobs WHERE id = ?`).get(id) as
        Pick<JobRow, 'caption_text'> | undefined
    );
    return row?.caption_text ?? null;
  }

  /**
   * List jobs in queue order, optionally filtered by status
   */
  listJobs(status?: JobStatus): Job[] {
    const rows = this.guard('list jobs', () =>
      status
        ? this.db.prepare(`SELECT * FROM jobs WHERE status = ? ORDER BY position ASC`).all(status) as JobRow[]
        : this.db.prepare(`SELECT * FROM jobs ORDER BY position ASC`).all() as JobRow[]
    );
    return rows.map(row => this.rowToJob(row));
  }

  /**
   * Highest position in use, or -1 for an empty queue
   */
  maxPosition(): number {
    const row = this.guard('read max position', () =>
      this.db.prepare(`SELECT MAX(position) AS max FROM jobs`).get() as { max: number | null }
    );
    return row.max ?? -1;
  }

  /**
   * Move the first pending job to in_progress and return it
   */
  claimNextPending(): Job | null {
    const row = this.guard('claim job', () =>
      this.db.prepare(`
        UPDATE jobs SET
          status = 'in_progress',
          attempts = 0,
          updated_at = ?
        WHERE id = (
          SELECT id FROM jobs WHERE status = 'pending' ORDER BY position ASC LIMIT 1
        ) AND status = 'pending'
        RETURNING *
      `).get(new Date().toISOString()) as JobRow | undefined
    );
    return row ? this.rowToJob(row) : null;
  }

  /**
   * Record a successful caption
   */
  markDone(id: string, resultPath: string, result: CaptionResult): void {
    this.guard('mark job done', () => {
      this.db.prepare(`
        UPDATE jobs SET
          status = 'done',
          last_error = NULL,
          result_path = ?,
          caption_text = ?,
          caption_model = ?,
          prompt_version = ?,
          captioned_at = ?,
          updated_at = ?
        WHERE id = ?
      `).run(
        resultPath,
        result.text,
        result.model,
        result.promptVersion,
        result.timestamp.toISOString(),
        new Date().toISOString(),
        id
      );
    });
  }

  /**
   * Record a permanent failure
   */
  markFailed(id: string, errorMessage: string): void {
    this.guard('mark job failed', () => {
      this.db.prepare(`
        UPDATE jobs SET status = 'failed', last_error = ?, updated_at = ? WHERE id = ?
      `).run(errorMessage, new Date().toISOString(), id);
    });
  }

  /**
   * Increment the attempt counter of a job
   */
  incrementAttempts(id: string): number {
    const row = this.guard('record attempt', () =>
      this.db.prepare(`
        UPDATE jobs SET attempts = attempts + 1, updated_at = ? WHERE id = ? RETURNING attempts
      `).get(new Date().toISOString(), id) as { attempts: number } | undefined
    );
    return row?.attempts ?? 0;
  }

  /**
   * Reset jobs in one of the given states back to pending
   */
  resetToPending(ids: string[], fromStatuses: JobStatus[]): number {
    if (ids.length === 0 || fromStatuses.length === 0) {
      return 0;
    }
    return this.transaction(() => {
      const stmt = this.db.prepare(`
        UPDATE jobs SET status = 'pending', attempts = 0, updated_at = ?
        WHERE id = ? AND status IN (${fromStatuses.map(() => '?').join(', ')})
      `);
      const now = new Date().toISOString();
      let changed = 0;
      for (const id of ids) {
        changed += stmt.run(now, id, ...fromStatuses).changes;
      }
      return changed;
    });
  }

  /**
   * Reset every job in a state back to pending
   */
  resetAllToPending(fromStatus: JobStatus): number {
    return this.guard('reset jobs', () =>
      this.db.prepare(`
        UPDATE jobs SET status = 'pending', attempts = 0, updated_at = ? WHERE status = ?
      `).run(new Date().toISOString(), fromStatus).changes
    );
  }

  /**
   * Get job queue statistics
   */
  getJobStats(): QueueStats {
    const result = this.guard('read stats', () =>
      this.db.prepare(`
        SELECT
          SUM(CASE WHEN status = 'pending' THEN 1 ELSE 0 END) as pending,
          SUM(CASE WHEN status = 'in_progress' THEN 1 ELSE 0 END) as in_progress,
          SUM(CASE WHEN status = 'done' THEN 1 ELSE 0 END) as done,
          SUM(CASE WHEN status = 'failed' THEN 1 ELSE 0 END) as failed,
          COUNT(*) as total
        FROM jobs
      `).get() as {
        pending: number | null;
        in_progress: number | null;
        done: number | null;
        failed: number | null;
        total: number;
      }
    );
    return {
      pending: result.pending ?? 0,
      inProgress: result.in_progress ?? 0,
      done: result.done ?? 0,
      failed: result.failed ?? 0,
      total: result.total,
    };
  }

  // ============ Run Methods ============

  /**
   * Record the outcome of a pipeline run
   */
  recordRun(summary: RunSummary): void {
    this.guard('record run', () => {
      this.db.prepare(`
        INSERT INTO runs (state, started_at, ended_at, completed, failed, total, fatal_error)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `).run(
        summary.state,
        summary.startTime.toISOString(),
        summary.endTime.toISOString(),
        summary.completed,
        summary.failed,
        summary.total,
        summary.fatalError ?? null
      );
    });
  }

  /**
   * Get the most recent run
   */
  getLastRun(): RunRecord | null {
    const row = this.guard('read last run', () =>
      this.db.prepare(`SELECT * FROM runs ORDER BY id DESC LIMIT 1`).get() as RunRow | undefined
    );
    if (!row) return null;
    return {
      id: row.id,
      state: row.state,
      startedAt: new Date(row.started_at),
      endedAt: new Date(row.ended_at),
      completed: row.completed,
      failed: row.failed,
      total: row.total,
      fatalError: row.fatal_error,
    };
  }

  /**
   * Current holder of the run lock
   */
  getRunLock(): RunLock | null {
    const row = this.guard('read run lock', () =>
      this.db.prepare(`SELECT owner, pid, acquired_at FROM run_lock WHERE id = 1`).get() as RunLockRow | undefined
    );
    if (!row) return null;
    return { owner: row.owner, pid: row.pid, acquiredAt: new Date(row.acquired_at) };
  }

  /**
   * Take the run lock, replacing any previous holder
   */
  setRunLock(owner: string, pid: number): void {
    this.guard('take run lock', () => {
      this.db.prepare(`
        INSERT INTO run_lock (id, owner, pid, acquired_at) VALUES (1, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET owner = excluded.owner, pid = excluded.pid, acquired_at = excluded.acquired_at
      `).run(owner, pid, new Date().toISOString());
    });
  }

  /**
   * Release the run lock if the owner still holds it
   */
  releaseRunLock(owner: string): boolean {
    return this.guard('release run lock', () =>
      this.db.prepare(`DELETE FROM run_lock WHERE id = 1 AND owner = ?`).run(owner).changes > 0
    );
  }

  /**
   * Flush the write-ahead log into the main database file
   */
  checkpoint(): void {
    this.guard('checkpoint', () => {
      this.db.pragma('wal_checkpoint(TRUNCATE)');
    });
  }

  /**
   * Convert a database row to a Job object
   */
  private rowToJob(row: JobRow): Job {
    if (!isJobStatus(row.status) || !isMediaKind(row.media_kind)) {
      throw new StoreError(`Corrupt job row ${row.id}: status=${row.status} kind=${row.media_kind}`);
    }

    const job: Job = {
      id: row.id,
      sourcePath: row.source_path,
      mediaKind: row.media_kind,
      status: row.status,
      lastError: row.last_error,
      attempts: row.attempts,
      resultPath: row.result_path,
      position: row.position,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };

    if (row.override_model !== null || row.override_prompt !== null) {
      job.overrides = {
        ...(row.override_model !== null && { model: row.override_model }),
        ...(row.override_prompt !== null && { prompt: row.override_prompt }),
      };
    }

    return job;
  }

  /**
   * Turn driver failures into StoreError, passing our own errors through
   */
  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof QuillError) {
        throw error;
      }
      throw new StoreError(`State store failed to ${operation}: ${toErrorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Close the database connection
   */
  close(): void {
    if (!this.db.open) return;
    this.db.close();
    this.logger.debug('Database connection closed');
  }
}
