import type { Server } from "node:http";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";
import {
  DependencyUnavailableError,
  LolqaError,
  NotFoundError,
  NullLogger,
  ValidationError,
} from "@lolqa/core";
import { MemoryBroker, SqliteJobStore, type Broker } from "@lolqa/jobs";
import { boundPort, closeServer, createPipelineApp, listen, statusFor } from "../src/index.js";

describe("statusFor", () => {
  it("maps error kinds to HTTP statuses", () => {
    expect(statusFor(new ValidationError("bad"))).toBe(400);
    expect(statusFor(z.string().safeParse(1).error)).toBe(400);
    expect(statusFor(new NotFoundError("gone"))).toBe(404);
    expect(statusFor(new DependencyUnavailableError("queue", "down"))).toBe(503);
    expect(statusFor(new LolqaError("boom"))).toBe(500);
    expect(statusFor(new Error("boom"))).toBe(500);
  });
});

describe("pipeline app", () => {
  let store: SqliteJobStore;
  let server: Server | null = null;

  beforeEach(() => {
    store = new SqliteJobStore(":memory:");
    store.init();
  });

  afterEach(async () => {
    if (server) await closeServer(server);
    server = null;
    store.close();
  });

  async function start(broker: Broker): Promise<string> {
    const app = createPipelineApp({
      broker,
      store,
      queue: "jobs",
      sources: ["sample", "data_dragon"],
      worker: { state: "idle" },
      version: "0.1.0",
      logger: new NullLogger(),
    });
    server = await listen(app, 0, "127.0.0.1");
    return `http://127.0.0.1:${boundPort(server)}`;
  }

  const post = (base: string, body: unknown) =>
    fetch(`${base}/ingest`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(body),
    });

  it("queues the job with its sources and refresh flag", async () => {
    const broker = new MemoryBroker();
    const base = await start(broker);

    const res = await post(base, { sources: ["sample", "sample"], force_refresh: true });
    expect(res.status).toBe(202);

    const raw = await broker.dequeue("jobs", 0);
    const payload: unknown = JSON.parse(raw ?? "null");
    expect(payload).toEqual({ jobId: expect.any(String), sources: ["sample"], forceRefresh: true });

    const [job] = store.list(1);
    expect(job).toMatchObject({ status: "queued", message: "Job queued" });
  });

  it("marks the job failed and answers 503 when the broker refuses it", async () => {
    const refusing: Broker = {
      enqueue: async () => false,
      dequeue: async () => null,
      length: async () => 0,
      close: async () => {},
    };
    const base = await start(refusing);

    const res = await post(base, {});
    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({ detail: "Failed to queue job. Redis may be unavailable." });

    const [job] = store.list(1);
    expect(job).toMatchObject({ status: "failed", error: "Queue enqueue failed" });
  });

  it("rejects a malformed request body", async () => {
    const base = await start(new MemoryBroker());
    const res = await post(base, { force_refresh: "yes" });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      detail: "Invalid ingest request: force_refresh: Expected boolean, received string",
    });
    expect(store.list(10)).toEqual([]);
  });

  it("validates the jobs limit", async () => {
    const base = await start(new MemoryBroker());
    const res = await fetch(`${base}/jobs?limit=0`);
    expect(res.status).toBe(400);
  });
});
