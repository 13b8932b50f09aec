import type { QueuedJob } from "@lolqa/core";
import type { Broker } from "./broker.js";

/** In-process broker with the same FIFO and blocking semantics as RedisBroker. */
export class MemoryBroker implements Broker {
  private readonly queues = new Map<string, string[]>();
  private readonly waiters = new Map<string, Set<() => void>>();

  private list(queue: string): string[] {
    let items = this.queues.get(queue);
    if (!items) {
      items = [];
      this.queues.set(queue, items);
    }
    return items;
  }

  async enqueue(queue: string, job: QueuedJob): Promise<boolean> {
    this.push(queue, JSON.stringify(job));
    return true;
  }

  /** Pushes a raw message, as another producer might. */
  push(queue: string, raw: string): void {
    this.list(queue).push(raw);
    const waiters = this.waiters.get(queue);
    const first = waiters?.values().next();
    if (waiters && first && !first.done) {
      waiters.delete(first.value);
      first.value();
    }
  }

  async dequeue(queue: string, timeoutSeconds: number, signal?: AbortSignal): Promise<string | null> {
    if (signal?.aborted) return null;
    const ready = this.list(queue).shift();
    if (ready !== undefined) return ready;
    if (timeoutSeconds <= 0) return null;

    await new Promise<void>((resolve) => {
      const waiters = this.waiters.get(queue) ?? new Set<() => void>();
      this.waiters.set(queue, waiters);

      const done = () => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", done);
        waiters.delete(done);
        resolve();
      };
      const timer = setTimeout(done, timeoutSeconds * 1000);
      signal?.addEventListener("abort", done, { once: true });
      waiters.add(done);
    });

    if (signal?.aborted) return null;
    return this.list(queue).shift() ?? null;
  }

  async length(queue: string): Promise<number> {
    return this.list(queue).length;
  }

  async close(): Promise<void> {
    for (const waiters of this.waiters.values()) {
      for (const wake of [...waiters]) wake();
    }
  }
}
