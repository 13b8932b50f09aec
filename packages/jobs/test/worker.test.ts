import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { NullLogger, type IngestionResult, type JobStatus, type QueuedJob } from "@lolqa/core";
import type { IngestionRunOptions } from "@lolqa/ingestion";
import {
  IngestionWorker,
  MemoryBroker,
  SqliteJobStore,
  runIngestionJob,
  type Broker,
  type PipelineRunner,
} from "../src/index.js";

const RESULT: IngestionResult = { documents: 8, chunks: 9, mode: "create" };

function okPipeline() {
  return { run: vi.fn(async (_opts: IngestionRunOptions) => RESULT) };
}

function queued(jobId: string, extra: Partial<QueuedJob> = {}): QueuedJob {
  return { jobId, sources: null, forceRefresh: false, ...extra };
}

describe("runIngestionJob", () => {
  let store: SqliteJobStore;

  beforeEach(() => {
    store = new SqliteJobStore(":memory:");
    store.init();
  });

  afterEach(() => {
    store.close();
  });

  it("moves a job through running to completed", async () => {
    store.create("job-1", "queued", "Job queued");
    const statuses: JobStatus[] = [];
    const update = store.update.bind(store);
    vi.spyOn(store, "update").mockImplementation((jobId, status, message, extra) => {
      statuses.push(status);
      return update(jobId, status, message, extra);
    });

    const pipeline = okPipeline();
    const job = await runIngestionJob({ store, pipeline, logger: new NullLogger() }, queued("job-1", { sources: ["sample"], forceRefresh: true }));

    expect(statuses).toEqual(["running", "completed"]);
    expect(pipeline.run).toHaveBeenCalledWith({ sources: ["sample"], forceRefresh: true });
    expect(job?.status).toBe("completed");
    expect(job?.message).toBe("Pipeline completed successfully. Processed 8 documents.");
    expect(job?.result).toEqual(RESULT);
  });

  it("records a pipeline failure on the job instead of throwing", async () => {
    store.create("job-1", "queued", "Job queued");
    const pipeline: PipelineRunner = {
      run: async () => {
        throw new Error("No documents collected");
      },
    };

    const job = await runIngestionJob({ store, pipeline, logger: new NullLogger() }, queued("job-1"));

    expect(job?.status).toBe("failed");
    expect(job?.error).toBe("No documents collected");
    expect(job?.started_at).not.toBeNull();
  });

  it("recreates a record the store does not know", async () => {
    const job = await runIngestionJob({ store, pipeline: okPipeline(), logger: new NullLogger() }, queued("orphan"));
    expect(job?.status).toBe("completed");
  });

  it("leaves a job that already finished alone", async () => {
    store.create("job-1", "queued", "Job queued");
    store.update("job-1", "failed", "Failed to queue job", { error: "queue unavailable" });
    const pipeline = okPipeline();

    const job = await runIngestionJob({ store, pipeline, logger: new NullLogger() }, queued("job-1"));

    expect(job?.status).toBe("failed");
    expect(pipeline.run).not.toHaveBeenCalled();
  });

  it("returns null when the store itself is broken", async () => {
    store.close();
    await expect(
      runIngestionJob({ store, pipeline: okPipeline(), logger: new NullLogger() }, queued("job-1"))
    ).resolves.toBeNull();
    store = new SqliteJobStore(":memory:");
  });
});

describe("IngestionWorker", () => {
  let store: SqliteJobStore;
  let broker: MemoryBroker;

  beforeEach(() => {
    store = new SqliteJobStore(":memory:");
    store.init();
    broker = new MemoryBroker();
  });

  afterEach(() => {
    store.close();
  });

  function worker(pipeline: PipelineRunner, overrides: Partial<ConstructorParameters<typeof IngestionWorker>[0]> = {}) {
    return new IngestionWorker({
      broker,
      store,
      pipeline,
      queue: "pipeline_jobs",
      pollTimeoutSeconds: 0,
      idleDelayMs: 5,
      errorDelayMs: 5,
      ...overrides,
    });
  }

  it("runs queued jobs in FIFO order", async () => {
    const order: string[] = [];
    const pipeline: PipelineRunner = {
      run: async (opts) => {
        order.push((opts.sources ?? []).join(","));
        return RESULT;
      },
    };
    for (const id of ["a", "b", "c"]) {
      store.create(id, "queued", "Job queued");
      await broker.enqueue("pipeline_jobs", queued(id, { sources: [id] }));
    }

    const w = worker(pipeline);
    while (await w.processNext()) {
      // drain
    }

    expect(order).toEqual(["a", "b", "c"]);
    expect(w.jobsProcessed).toBe(3);
    expect(store.list(10).every((j) => j.status === "completed")).toBe(true);
  });

  it("reports an empty queue", async () => {
    expect(await worker(okPipeline()).processNext()).toBe(false);
  });

  it("drops a malformed payload and fails its job", async () => {
    store.create("bad", "queued", "Job queued");
    broker.push("pipeline_jobs", JSON.stringify({ jobId: "bad", sources: "everything" }));
    const pipeline = okPipeline();

    expect(await worker(pipeline).processNext()).toBe(true);
    expect(pipeline.run).not.toHaveBeenCalled();
    expect(store.get("bad")?.status).toBe("failed");
    expect(store.get("bad")?.message).toBe("Invalid job payload");
  });

  it("drops a message that is not JSON", async () => {
    broker.push("pipeline_jobs", "{not json");
    const pipeline = okPipeline();

    expect(await worker(pipeline).processNext()).toBe(true);
    expect(pipeline.run).not.toHaveBeenCalled();
  });

  it("keeps polling until aborted and then exits", async () => {
    const controller = new AbortController();
    const w = worker(okPipeline());
    const running = w.run(controller.signal);

    store.create("j", "queued", "Job queued");
    await broker.enqueue("pipeline_jobs", queued("j"));
    await vi.waitFor(() => expect(store.get("j")?.status).toBe("completed"));

    controller.abort();
    await expect(running).resolves.toBeUndefined();
  });

  it("survives a broker that throws", async () => {
    let calls = 0;
    const flaky: Broker = {
      enqueue: async () => true,
      dequeue: async () => {
        calls++;
        if (calls === 1) throw new Error("socket closed");
        return null;
      },
      length: async () => 0,
      close: async () => undefined,
    };
    const controller = new AbortController();
    const running = worker(okPipeline(), { broker: flaky }).run(controller.signal);

    await vi.waitFor(() => expect(calls).toBeGreaterThanOrEqual(3));
    controller.abort();
    await running;
  });

  it("interrupts a blocking dequeue on abort", async () => {
    const controller = new AbortController();
    const running = worker(okPipeline(), { pollTimeoutSeconds: 30 }).run(controller.signal);

    const started = Date.now();
    setTimeout(() => controller.abort(), 20);
    await running;
    expect(Date.now() - started).toBeLessThan(5000);
  });
});
