import crypto from "node:crypto";
import type { Redis } from "ioredis";
import { NullLogger, errorMessage, type Embedder, type Logger } from "@lolqa/core";

export interface EmbeddingCache {
  getMany(keys: string[]): Promise<Array<number[] | null>>;
  setMany(entries: Array<[key: string, vector: number[]]>, ttlSeconds: number): Promise<void>;
}

export function embeddingCacheKey(model: string, text: string): string {
  const digest = crypto.createHash("sha256").update(`${model}:${text}`).digest("hex");
  return `embedding:${digest.slice(0, 16)}`;
}

function parseVector(raw: string | null): number[] | null {
  if (raw === null) return null;
  const value: unknown = JSON.parse(raw);
  if (!Array.isArray(value)) return null;
  const out: number[] = [];
  for (const n of value) {
    if (typeof n !== "number") return null;
    out.push(n);
  }
  return out;
}

export class RedisEmbeddingCache implements EmbeddingCache {
  constructor(private readonly redis: Redis) {}

  async getMany(keys: string[]): Promise<Array<number[] | null>> {
    if (keys.length === 0) return [];
    const raw = await this.redis.mget(...keys);
    return raw.map(parseVector);
  }

  async setMany(entries: Array<[string, number[]]>, ttlSeconds: number): Promise<void> {
    if (entries.length === 0) return;
    const pipeline = this.redis.pipeline();
    for (const [key, vector] of entries) {
      if (ttlSeconds > 0) pipeline.set(key, JSON.stringify(vector), "EX", ttlSeconds);
      else pipeline.set(key, JSON.stringify(vector));
    }
    await pipeline.exec();
  }
}

/**
 * Serves repeated texts from the cache and embeds only the misses.
 * Cache failures are logged and the inner embedder is used directly.
 */
export class CachedEmbedder implements Embedder {
  constructor(
    private readonly inner: Embedder,
    private readonly cache: EmbeddingCache,
    private readonly ttlSeconds: number,
    private readonly logger: Logger = new NullLogger()
  ) {}

  get model(): string {
    return this.inner.model;
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    const keys = texts.map((t) => embeddingCacheKey(this.model, t));

    let cached: Array<number[] | null>;
    try {
      cached = await this.cache.getMany(keys);
    } catch (err) {
      this.logger.warn("embedding cache read failed", { error: errorMessage(err) });
      return this.inner.embed(texts);
    }

    const missing: number[] = [];
    texts.forEach((_, i) => {
      if (!cached[i]) missing.push(i);
    });
    if (missing.length === 0) return cached.filter((v): v is number[] => v !== null);

    const fresh = await this.inner.embed(missing.map((i) => texts[i] ?? ""));
    const entries: Array<[string, number[]]> = [];
    const out: number[][] = [];
    let next = 0;

    for (let i = 0; i < texts.length; i++) {
      const hit = cached[i];
      if (hit) {
        out.push(hit);
        continue;
      }
      const vector = fresh[next++];
      const key = keys[i];
      if (!vector || key === undefined) {
        throw new Error(`Missing embedding for text index ${i}`);
      }
      out.push(vector);
      entries.push([key, vector]);
    }

    try {
      await this.cache.setMany(entries, this.ttlSeconds);
    } catch (err) {
      this.logger.warn("embedding cache write failed", { error: errorMessage(err) });
    }

    this.logger.debug("embedded texts", { hits: texts.length - missing.length, misses: missing.length });
    return out;
  }
}
