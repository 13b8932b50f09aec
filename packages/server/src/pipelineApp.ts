import { randomUUID } from "node:crypto";
import type { Express } from "express";
import { z } from "zod";
import { NotFoundError, ValidationError, type Logger, type QueuedJob } from "@lolqa/core";
import type { Broker, JobStatusStore, WorkerState } from "@lolqa/jobs";
import { asyncHandler, createApp, errorHandler, parseWith } from "./http.js";

export const PIPELINE_SERVICE_NAME = "data-pipeline";
export const QUEUE_UNAVAILABLE = "Failed to queue job. Redis may be unavailable.";

const IngestBody = z.object({
  sources: z.array(z.string().min(1)).nullish(),
  force_refresh: z.boolean().nullish(),
});

const JobsQuery = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(20),
});

export interface PipelineAppDeps {
  broker: Broker;
  store: JobStatusStore;
  queue: string;
  /** Names of the enabled collectors; `/ingest` rejects anything else. */
  sources: string[];
  worker: { readonly state: WorkerState };
  version: string;
  logger: Logger;
}

export function createPipelineApp(deps: PipelineAppDeps): Express {
  const { broker, store, queue, logger } = deps;
  const app = createApp();

  app.get("/health", (_req, res) => {
    res.json({
      status: "healthy",
      service: PIPELINE_SERVICE_NAME,
      version: deps.version,
      worker: deps.worker.state,
    });
  });

  app.post(
    "/ingest",
    asyncHandler(async (req, res) => {
      const body = parseWith(IngestBody, req.body ?? {}, "ingest request");
      const sources = body.sources?.length ? [...new Set(body.sources)] : null;

      if (sources) {
        const unknown = sources.filter((s) => !deps.sources.includes(s));
        if (unknown.length > 0) {
          throw new ValidationError(
            `Unknown sources: ${unknown.join(", ")}. Available: ${deps.sources.join(", ")}`
          );
        }
      }

      const job: QueuedJob = { jobId: randomUUID(), sources, forceRefresh: body.force_refresh ?? false };
      store.create(job.jobId, "queued", "Job queued");

      if (!(await broker.enqueue(queue, job))) {
        store.update(job.jobId, "failed", "Failed to enqueue job", { error: "Queue enqueue failed" });
        logger.error("job could not be queued", { jobId: job.jobId, queue });
        res.status(503).json({ detail: QUEUE_UNAVAILABLE });
        return;
      }

      logger.info("job queued", { jobId: job.jobId, sources: sources ?? "all", forceRefresh: job.forceRefresh });
      res.status(202).json({
        job_id: job.jobId,
        status: "queued",
        message: "Pipeline job queued successfully",
      });
    })
  );

  app.get("/status/:jobId", (req, res) => {
    const job = store.get(req.params.jobId);
    if (!job) throw new NotFoundError("Job not found");
    res.json(job);
  });

  app.get("/jobs", (req, res) => {
    const { limit } = parseWith(JobsQuery, req.query, "query");
    res.json({ jobs: store.list(limit) });
  });

  app.get(
    "/queue",
    asyncHandler(async (_req, res) => {
      res.json({ queue, length: await broker.length(queue) });
    })
  );

  app.use(errorHandler(logger));
  return app;
}
