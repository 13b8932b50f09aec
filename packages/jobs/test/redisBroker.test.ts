import { beforeEach, describe, expect, it, vi } from "vitest";
import type { Logger, QueuedJob } from "@lolqa/core";
import { RedisBroker, type ListConnection } from "../src/index.js";

const job = (jobId: string): QueuedJob => ({ jobId, sources: ["sample"], forceRefresh: false });

interface Server {
  lists: Map<string, string[]>;
  down: boolean;
}

/** In-process stand-in for an ioredis connection over shared list state. */
class FakeConnection implements ListConnection {
  readonly duplicates: FakeConnection[] = [];
  readonly brpopCalls: Array<[string, number]> = [];
  disconnects = 0;
  private readonly errorListeners: Array<(err: Error) => void> = [];
  private pending: ((err: Error) => void) | null = null;

  constructor(private readonly server: Server) {}

  private list(key: string): string[] {
    let list = this.server.lists.get(key);
    if (!list) {
      list = [];
      this.server.lists.set(key, list);
    }
    return list;
  }

  private check(): void {
    if (this.server.down) throw new Error("connect ECONNREFUSED 127.0.0.1:6379");
  }

  async lpush(key: string, value: string): Promise<number> {
    this.check();
    return this.list(key).unshift(value);
  }

  async rpop(key: string): Promise<string | null> {
    this.check();
    return this.list(key).pop() ?? null;
  }

  brpop(key: string, timeout: number): Promise<[string, string] | null> {
    this.brpopCalls.push([key, timeout]);
    if (this.server.down) return Promise.reject(new Error("connect ECONNREFUSED 127.0.0.1:6379"));
    const value = this.list(key).pop();
    if (value !== undefined) return Promise.resolve([key, value]);
    // blocks until the connection is dropped
    return new Promise((_resolve, reject) => {
      this.pending = reject;
    });
  }

  async llen(key: string): Promise<number> {
    this.check();
    return this.list(key).length;
  }

  duplicate(): FakeConnection {
    const copy = new FakeConnection(this.server);
    this.duplicates.push(copy);
    return copy;
  }

  disconnect(): void {
    this.disconnects++;
    this.pending?.(new Error("Connection is closed."));
    this.pending = null;
  }

  on(_event: "error", listener: (err: Error) => void): this {
    this.errorListeners.push(listener);
    return this;
  }

  emitError(err: Error): void {
    for (const listener of this.errorListeners) listener(err);
  }
}

function recordingLogger() {
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: (): Logger => logger,
  };
  return logger;
}

describe("RedisBroker", () => {
  let server: Server;
  let conn: FakeConnection;
  let logger: ReturnType<typeof recordingLogger>;
  let broker: RedisBroker;

  beforeEach(() => {
    server = { lists: new Map(), down: false };
    conn = new FakeConnection(server);
    logger = recordingLogger();
    broker = new RedisBroker(conn, logger);
  });

  it("pushes JSON on the left and pops FIFO with RPOP when not waiting", async () => {
    expect(await broker.enqueue("jobs", job("1"))).toBe(true);
    expect(await broker.enqueue("jobs", job("2"))).toBe(true);

    expect(server.lists.get("jobs")).toEqual([JSON.stringify(job("2")), JSON.stringify(job("1"))]);
    expect(await broker.length("jobs")).toBe(2);
    expect(await broker.dequeue("jobs", 0)).toBe(JSON.stringify(job("1")));
    expect(await broker.dequeue("jobs", 0)).toBe(JSON.stringify(job("2")));
    expect(await broker.dequeue("jobs", 0)).toBeNull();
    expect(conn.duplicates).toHaveLength(0);
  });

  it("blocks with BRPOP on one dedicated connection", async () => {
    await broker.enqueue("jobs", job("1"));
    await broker.enqueue("jobs", job("2"));

    expect(await broker.dequeue("jobs", 5)).toBe(JSON.stringify(job("1")));
    expect(await broker.dequeue("jobs", 5)).toBe(JSON.stringify(job("2")));

    expect(conn.brpopCalls).toEqual([]);
    expect(conn.duplicates).toHaveLength(1);
    expect(conn.duplicates[0]?.brpopCalls).toEqual([
      ["jobs", 5],
      ["jobs", 5],
    ]);
  });

  it("maps an unreachable server to false, null and 0", async () => {
    server.down = true;

    expect(await broker.enqueue("jobs", job("1"))).toBe(false);
    expect(await broker.dequeue("jobs", 0)).toBeNull();
    expect(await broker.dequeue("jobs", 5)).toBeNull();
    expect(await broker.length("jobs")).toBe(0);

    expect(logger.error.mock.calls.map((c) => c[0])).toEqual([
      "enqueue failed",
      "dequeue failed",
      "dequeue failed",
      "queue length failed",
    ]);
  });

  it("drops the blocking connection on abort and pops nothing afterwards", async () => {
    const controller = new AbortController();
    const pending = broker.dequeue("jobs", 5, controller.signal);

    controller.abort();
    expect(await pending).toBeNull();

    const blocking = conn.duplicates[0];
    expect(blocking?.disconnects).toBe(1);
    expect(logger.error).not.toHaveBeenCalled();

    await broker.enqueue("jobs", job("late"));
    expect(await broker.length("jobs")).toBe(1);
    expect(blocking?.brpopCalls).toHaveLength(1);
  });

  it("does not touch Redis when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    await broker.enqueue("jobs", job("1"));

    expect(await broker.dequeue("jobs", 5, controller.signal)).toBeNull();
    expect(conn.duplicates).toHaveLength(0);
    expect(await broker.length("jobs")).toBe(1);
  });

  it("opens a fresh blocking connection after an abort", async () => {
    const controller = new AbortController();
    const pending = broker.dequeue("jobs", 5, controller.signal);
    controller.abort();
    await pending;

    await broker.enqueue("jobs", job("1"));
    expect(await broker.dequeue("jobs", 5)).toBe(JSON.stringify(job("1")));
    expect(conn.duplicates).toHaveLength(2);
  });

  it("logs errors raised on the blocking connection", async () => {
    await broker.enqueue("jobs", job("1"));
    await broker.dequeue("jobs", 5);

    conn.duplicates[0]?.emitError(new Error("read ECONNRESET"));

    expect(logger.warn).toHaveBeenCalledWith("blocking connection error", { error: "read ECONNRESET" });
  });

  it("closes only the blocking connection", async () => {
    await broker.enqueue("jobs", job("1"));
    await broker.dequeue("jobs", 5);

    await broker.close();

    expect(conn.duplicates[0]?.disconnects).toBe(1);
    expect(conn.disconnects).toBe(0);
  });
});
