import { NullLogger, errorMessage, type Logger } from "@lolqa/core";
import { sleep } from "./sleep.js";

export type WorkerState = "idle" | "running" | "stopping" | "stopped";

export interface Runnable {
  run(signal: AbortSignal): Promise<void>;
}

export interface SupervisorOptions {
  logger?: Logger;
  restartDelayMs?: number;
  maxRestartDelayMs?: number;
}

/**
 * Owns a long-running task: starts it, restarts it with doubling back-off when it
 * exits or throws while it should still be running, and stops it on request.
 */
export class WorkerSupervisor {
  private readonly task: Runnable;
  private readonly logger: Logger;
  private readonly restartDelayMs: number;
  private readonly maxRestartDelayMs: number;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private currentState: WorkerState = "idle";
  private restartCount = 0;

  constructor(task: Runnable, opts: SupervisorOptions = {}) {
    this.task = task;
    this.logger = opts.logger ?? new NullLogger();
    this.restartDelayMs = opts.restartDelayMs ?? 1000;
    this.maxRestartDelayMs = opts.maxRestartDelayMs ?? 30_000;
  }

  get state(): WorkerState {
    return this.currentState;
  }

  get restarts(): number {
    return this.restartCount;
  }

  start(): void {
    if (this.currentState === "running" || this.currentState === "stopping") return;
    const controller = new AbortController();
    this.controller = controller;
    this.currentState = "running";
    this.loop = this.supervise(controller.signal);
  }

  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop || !this.controller) {
      this.currentState = "stopped";
      return;
    }
    this.currentState = "stopping";
    this.controller.abort();
    await loop;
    this.loop = null;
    this.controller = null;
    this.currentState = "stopped";
  }

  private async supervise(signal: AbortSignal): Promise<void> {
    let delay = this.restartDelayMs;

    while (!signal.aborted) {
      try {
        await this.task.run(signal);
        if (signal.aborted) break;
        this.logger.warn("worker exited unexpectedly, restarting", { delayMs: delay });
      } catch (err) {
        if (signal.aborted) break;
        this.logger.error("worker crashed, restarting", { error: errorMessage(err), delayMs: delay });
      }

      this.restartCount++;
      try {
        await sleep(delay, signal);
      } catch (err) {
        this.logger.error("restart back-off interrupted", { error: errorMessage(err) });
      }
      delay = Math.min(delay * 2, this.maxRestartDelayMs);
    }
  }
}
