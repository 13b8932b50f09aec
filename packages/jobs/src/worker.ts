import {
  NullLogger,
  QueuedJobSchema,
  errorMessage,
  type Logger,
  type QueuedJob,
} from "@lolqa/core";
import type { Broker } from "./broker.js";
import { runIngestionJob, type PipelineRunner } from "./jobRunner.js";
import type { JobStatusStore } from "./jobStore.js";
import { sleep } from "./sleep.js";

export interface WorkerOptions {
  broker: Broker;
  store: JobStatusStore;
  pipeline: PipelineRunner;
  queue: string;
  pollTimeoutSeconds?: number;
  idleDelayMs?: number;
  errorDelayMs?: number;
  logger?: Logger;
}

/** Consumes the ingestion queue one job at a time until aborted. */
export class IngestionWorker {
  private readonly broker: Broker;
  private readonly store: JobStatusStore;
  private readonly pipeline: PipelineRunner;
  private readonly queue: string;
  private readonly pollTimeoutSeconds: number;
  private readonly idleDelayMs: number;
  private readonly errorDelayMs: number;
  private readonly logger: Logger;
  private processed = 0;

  constructor(opts: WorkerOptions) {
    this.broker = opts.broker;
    this.store = opts.store;
    this.pipeline = opts.pipeline;
    this.queue = opts.queue;
    this.pollTimeoutSeconds = opts.pollTimeoutSeconds ?? 5;
    this.idleDelayMs = opts.idleDelayMs ?? 1000;
    this.errorDelayMs = opts.errorDelayMs ?? 5000;
    this.logger = opts.logger ?? new NullLogger();
  }

  get jobsProcessed(): number {
    return this.processed;
  }

  async run(signal: AbortSignal): Promise<void> {
    this.logger.info("worker started", { queue: this.queue });

    while (!signal.aborted) {
      try {
        const handled = await this.processNext(this.pollTimeoutSeconds, signal);
        if (!handled) await sleep(this.idleDelayMs, signal);
      } catch (err) {
        this.logger.error("worker loop error", { error: errorMessage(err) });
        await sleep(this.errorDelayMs, signal);
      }
    }

    this.logger.info("worker stopped", { processed: this.processed });
  }

  /**
   * Takes at most one message and handles it. False when the queue was empty.
   * A message popped just as `signal` aborts is still run, so it is not lost.
   */
  async processNext(timeoutSeconds = 0, signal?: AbortSignal): Promise<boolean> {
    const raw = await this.broker.dequeue(this.queue, timeoutSeconds, signal);
    if (raw === null) return false;

    const job = this.parse(raw);
    if (job) {
      await runIngestionJob({ store: this.store, pipeline: this.pipeline, logger: this.logger }, job);
      this.processed++;
    }
    return true;
  }

  private parse(raw: string): QueuedJob | null {
    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (err) {
      this.logger.warn("dropping message that is not JSON", { error: errorMessage(err) });
      return null;
    }

    const parsed = QueuedJobSchema.safeParse(payload);
    if (parsed.success) return parsed.data;

    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "payload"}: ${i.message}`);
    this.logger.warn("dropping malformed job", { issues });
    this.failMalformed(payload, issues.join("; "));
    return null;
  }

  private failMalformed(payload: unknown, reason: string): void {
    if (typeof payload !== "object" || payload === null || !("jobId" in payload)) return;
    const jobId = payload.jobId;
    if (typeof jobId !== "string" || !jobId) return;

    try {
      const job = this.store.get(jobId);
      if (job?.status === "queued") {
        this.store.update(jobId, "failed", "Invalid job payload", { error: reason });
      }
    } catch (err) {
      this.logger.error("could not mark malformed job failed", { jobId, error: errorMessage(err) });
    }
  }
}
