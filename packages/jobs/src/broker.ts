import { NullLogger, errorMessage, type Logger, type QueuedJob } from "@lolqa/core";

/**
 * FIFO job queue. Delivery is at-most-once: a popped message is gone from the
 * broker whether or not the consumer finishes it.
 */
export interface Broker {
  /** False when the broker could not take the job. */
  enqueue(queue: string, job: QueuedJob): Promise<boolean>;
  /**
   * Raw message, or null when nothing arrived within `timeoutSeconds`
   * (0 = don't wait), when `signal` aborted, or when the broker is unreachable.
   */
  dequeue(queue: string, timeoutSeconds: number, signal?: AbortSignal): Promise<string | null>;
  length(queue: string): Promise<number>;
  close(): Promise<void>;
}

/** The slice of an ioredis client the broker talks to. */
export interface ListConnection {
  lpush(key: string, value: string): Promise<number>;
  rpop(key: string): Promise<string | null>;
  brpop(key: string, timeout: number): Promise<[string, string] | null>;
  llen(key: string): Promise<number>;
  duplicate(): ListConnection;
  disconnect(): void;
  on(event: "error", listener: (err: Error) => void): unknown;
}

/** Redis list broker: LPUSH to enqueue, BRPOP/RPOP to dequeue. */
export class RedisBroker implements Broker {
  private blocking: ListConnection | null = null;

  constructor(
    private readonly redis: ListConnection,
    private readonly logger: Logger = new NullLogger()
  ) {}

  async enqueue(queue: string, job: QueuedJob): Promise<boolean> {
    try {
      await this.redis.lpush(queue, JSON.stringify(job));
      return true;
    } catch (err) {
      this.logger.error("enqueue failed", { queue, jobId: job.jobId, error: errorMessage(err) });
      return false;
    }
  }

  // BRPOP holds its connection, so it gets one of its own
  private blockingConnection(): ListConnection {
    if (this.blocking) return this.blocking;
    const conn = this.redis.duplicate();
    // duplicate() does not carry listeners over
    conn.on("error", (err) => this.logger.warn("blocking connection error", { error: err.message }));
    this.blocking = conn;
    return conn;
  }

  async dequeue(queue: string, timeoutSeconds: number, signal?: AbortSignal): Promise<string | null> {
    if (signal?.aborted) return null;

    if (timeoutSeconds <= 0) {
      try {
        return await this.redis.rpop(queue);
      } catch (err) {
        this.logger.error("dequeue failed", { queue, error: errorMessage(err) });
        return null;
      }
    }

    const conn = this.blockingConnection();
    const onAbort = () => {
      // dropping the connection cancels the pending BRPOP server-side
      conn.disconnect();
      if (this.blocking === conn) this.blocking = null;
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const popped = await conn.brpop(queue, timeoutSeconds);
      return popped ? popped[1] : null;
    } catch (err) {
      if (!signal?.aborted) this.logger.error("dequeue failed", { queue, error: errorMessage(err) });
      return null;
    } finally {
      signal?.removeEventListener("abort", onAbort);
    }
  }

  async length(queue: string): Promise<number> {
    try {
      return await this.redis.llen(queue);
    } catch (err) {
      this.logger.error("queue length failed", { queue, error: errorMessage(err) });
      return 0;
    }
  }

  /** Drops the blocking connection. The main connection belongs to whoever passed it in. */
  async close(): Promise<void> {
    const blocking = this.blocking;
    this.blocking = null;
    blocking?.disconnect();
  }
}
