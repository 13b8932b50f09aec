import { setTimeout as sleep } from "node:timers/promises";
import {
  DependencyUnavailableError,
  LolqaError,
  NullLogger,
  type Embedder,
  type Logger,
} from "@lolqa/core";
import { ollamaEmbedBatch } from "./ollama.js";

export const DEFAULT_EMBEDDING_MODEL = "nomic-embed-text:latest";

export interface OllamaEmbedderOptions {
  baseUrl?: string;
  model?: string;
  batchSize?: number;
  timeoutMs?: number;
  /** Extra attempts per batch after a transient failure. */
  retries?: number;
  retryDelayMs?: number;
  logger?: Logger;
}

/**
 * Embeds texts through Ollama in fixed-size batches.
 * A batch that fails with DependencyUnavailableError is retried on its own.
 */
export class OllamaEmbedder implements Embedder {
  readonly model: string;
  private readonly baseUrl: string;
  private readonly batchSize: number;
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly logger: Logger;

  constructor(opts: OllamaEmbedderOptions = {}) {
    this.model = opts.model ?? DEFAULT_EMBEDDING_MODEL;
    this.baseUrl = (opts.baseUrl ?? "http://localhost:11434").replace(/\/+$/, "");
    this.batchSize = Math.max(1, opts.batchSize ?? 100);
    this.timeoutMs = opts.timeoutMs ?? 300_000;
    this.retries = Math.max(0, opts.retries ?? 2);
    this.retryDelayMs = opts.retryDelayMs ?? 1000;
    this.logger = opts.logger ?? new NullLogger();
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const vectors: number[][] = [];
    for (let start = 0; start < texts.length; start += this.batchSize) {
      const batch = texts.slice(start, start + this.batchSize);
      vectors.push(...(await this.embedBatch(batch, start)));
    }

    const dim = vectors[0]?.length ?? 0;
    for (const v of vectors) {
      if (v.length !== dim) {
        throw new LolqaError(`Inconsistent embedding dimension: expected ${dim}, got ${v.length}`);
      }
    }

    return vectors;
  }

  private async embedBatch(batch: string[], offset: number): Promise<number[][]> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await ollamaEmbedBatch({
          baseUrl: this.baseUrl,
          model: this.model,
          texts: batch,
          timeoutMs: this.timeoutMs,
        });
      } catch (err) {
        if (!(err instanceof DependencyUnavailableError) || attempt >= this.retries) throw err;
        this.logger.warn("embedding batch failed, retrying", {
          offset,
          size: batch.length,
          attempt: attempt + 1,
          error: err.message,
        });
        if (this.retryDelayMs > 0) await sleep(this.retryDelayMs * (attempt + 1));
      }
    }
  }
}
