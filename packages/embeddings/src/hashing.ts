import type { Embedder } from "@lolqa/core";

function fnv1a(token: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

/**
 * Offline bag-of-words embedder: each token is hashed into one of `dim` buckets
 * and the counts are L2-normalized. Texts sharing words score above zero.
 */
export class HashingEmbedder implements Embedder {
  readonly model: string;

  constructor(private readonly dim = 512) {
    this.model = `hashing-${dim}`;
  }

  embedOne(text: string): number[] {
    const vector = new Array<number>(this.dim).fill(0);
    for (const token of tokenize(text)) {
      const bucket = fnv1a(token) % this.dim;
      vector[bucket] = (vector[bucket] ?? 0) + 1;
    }
    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vector : vector.map((v) => v / norm);
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map((t) => this.embedOne(t));
  }
}
