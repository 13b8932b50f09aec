import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";
import {
  NotFoundError,
  ValidationError,
  type IngestionResult,
  type JobStatus,
  type PipelineJob,
} from "@lolqa/core";

export interface JobStatusStore {
  create(jobId: string, status: JobStatus, message: string): PipelineJob;
  update(
    jobId: string,
    status: JobStatus,
    message: string,
    extra?: { result?: IngestionResult; error?: string }
  ): PipelineJob;
  get(jobId: string): PipelineJob | null;
  list(limit: number): PipelineJob[];
  /** Fails every job still `running`, as left by a process that died mid-job. */
  failInterrupted(message: string): number;
  close(): void;
}

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  queued: ["running", "failed"],
  running: ["completed", "failed"],
  completed: [],
  failed: [],
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

const JobStatusSchema = z.enum(["queued", "running", "completed", "failed"]);

const ResultSchema = z.object({
  documents: z.number(),
  chunks: z.number(),
  mode: z.enum(["create", "refresh", "append"]),
});

const JobRow = z.object({
  job_id: z.string(),
  status: JobStatusSchema,
  message: z.string(),
  result_json: z.string().nullable(),
  error: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
  started_at: z.string().nullable(),
  completed_at: z.string().nullable(),
});

function toJob(raw: unknown): PipelineJob {
  const row = JobRow.parse(raw);
  return {
    job_id: row.job_id,
    status: row.status,
    message: row.message,
    result: row.result_json === null ? null : ResultSchema.parse(JSON.parse(row.result_json)),
    error: row.error,
    created_at: row.created_at,
    updated_at: row.updated_at,
    started_at: row.started_at,
    completed_at: row.completed_at,
  };
}

/** Job status records in SQLite. Transitions are checked before every write. */
export class SqliteJobStore implements JobStatusStore {
  private db: Database.Database;
  private readonly now: () => Date;

  constructor(dbPath: string, opts: { now?: () => Date } = {}) {
    if (dbPath !== ":memory:") mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.now = opts.now ?? (() => new Date());
  }

  init(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS pipeline_jobs (
        job_id TEXT PRIMARY KEY,
        status TEXT NOT NULL,
        message TEXT NOT NULL,
        result_json TEXT,
        error TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        started_at TEXT,
        completed_at TEXT
      );
    `);
    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_pipeline_jobs_status
      ON pipeline_jobs(status);
    `);
  }

  create(jobId: string, status: JobStatus, message: string): PipelineJob {
    const ts = this.now().toISOString();
    this.db
      .prepare(
        `INSERT INTO pipeline_jobs (job_id, status, message, created_at, updated_at, started_at, completed_at)
         VALUES (@job_id, @status, @message, @ts, @ts, @started_at, @completed_at)`
      )
      .run({
        job_id: jobId,
        status,
        message,
        ts,
        started_at: status === "running" ? ts : null,
        completed_at: status === "completed" || status === "failed" ? ts : null,
      });
    return this.require(jobId);
  }

  update(
    jobId: string,
    status: JobStatus,
    message: string,
    extra: { result?: IngestionResult; error?: string } = {}
  ): PipelineJob {
    const tx = this.db.transaction(() => {
      const current = this.require(jobId);
      if (!canTransition(current.status, status)) {
        throw new ValidationError(`Invalid job transition for ${jobId}: ${current.status} -> ${status}`);
      }

      const ts = this.now().toISOString();
      this.db
        .prepare(
          `UPDATE pipeline_jobs SET
             status = @status,
             message = @message,
             result_json = COALESCE(@result_json, result_json),
             error = COALESCE(@error, error),
             updated_at = @ts,
             started_at = CASE WHEN @status = 'running' THEN @ts ELSE started_at END,
             completed_at = CASE WHEN @status IN ('completed', 'failed') THEN @ts ELSE completed_at END
           WHERE job_id = @job_id`
        )
        .run({
          job_id: jobId,
          status,
          message,
          result_json: extra.result ? JSON.stringify(extra.result) : null,
          error: extra.error ?? null,
          ts,
        });
      return this.require(jobId);
    });
    return tx();
  }

  get(jobId: string): PipelineJob | null {
    const row: unknown = this.db.prepare(`SELECT * FROM pipeline_jobs WHERE job_id = ?`).get(jobId);
    return row === undefined ? null : toJob(row);
  }

  private require(jobId: string): PipelineJob {
    const job = this.get(jobId);
    if (!job) throw new NotFoundError(`Job ${jobId} not found`);
    return job;
  }

  list(limit: number): PipelineJob[] {
    return this.db
      .prepare(`SELECT * FROM pipeline_jobs ORDER BY created_at DESC, rowid DESC LIMIT ?`)
      .all(limit)
      .map(toJob);
  }

  failInterrupted(message: string): number {
    const ts = this.now().toISOString();
    return this.db
      .prepare(
        `UPDATE pipeline_jobs
         SET status = 'failed', message = @message, error = @message, updated_at = @ts, completed_at = @ts
         WHERE status = 'running'`
      )
      .run({ message, ts }).changes;
  }

  close(): void {
    this.db.close();
  }
}
