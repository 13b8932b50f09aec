import {
  errorMessage,
  type IngestionResult,
  type Logger,
  type PipelineJob,
  type QueuedJob,
} from "@lolqa/core";
import type { IngestionRunOptions } from "@lolqa/ingestion";
import type { JobStatusStore } from "./jobStore.js";

export interface PipelineRunner {
  run(opts: IngestionRunOptions): Promise<IngestionResult>;
}

export interface JobRunnerDeps {
  store: JobStatusStore;
  pipeline: PipelineRunner;
  logger: Logger;
}

export function completionMessage(result: IngestionResult): string {
  return `Pipeline completed successfully. Processed ${result.documents} documents.`;
}

/**
 * Runs one queued job through `running` to `completed` or `failed`.
 * Never throws: pipeline failures end up on the job record, store failures in the log.
 */
export async function runIngestionJob(deps: JobRunnerDeps, job: QueuedJob): Promise<PipelineJob | null> {
  const { store, pipeline, logger } = deps;
  const log = logger.child(job.jobId.slice(0, 8));

  try {
    const existing = store.get(job.jobId);
    if (!existing) {
      log.warn("job record missing, recreating");
      store.create(job.jobId, "queued", "Job recovered from queue");
    } else if (existing.status !== "queued") {
      log.warn("job is not queued, skipping", { status: existing.status });
      return existing;
    }

    store.update(job.jobId, "running", "Starting pipeline...");
  } catch (err) {
    log.error("could not start job", { error: errorMessage(err) });
    return null;
  }

  let outcome: { result: IngestionResult } | { error: string };
  try {
    log.info("running", { sources: job.sources ?? "all", forceRefresh: job.forceRefresh });
    outcome = { result: await pipeline.run({ sources: job.sources, forceRefresh: job.forceRefresh }) };
  } catch (err) {
    outcome = { error: errorMessage(err) };
  }

  try {
    if ("result" in outcome) {
      log.info("completed", { ...outcome.result });
      return store.update(job.jobId, "completed", completionMessage(outcome.result), {
        result: outcome.result,
      });
    }
    log.error("failed", { error: outcome.error });
    return store.update(job.jobId, "failed", `Pipeline failed: ${outcome.error}`, { error: outcome.error });
  } catch (err) {
    log.error("could not record job outcome", { error: errorMessage(err) });
    return null;
  }
}
