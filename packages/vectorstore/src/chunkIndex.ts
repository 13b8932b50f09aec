import {
  LolqaError,
  NullLogger,
  type Chunk,
  type CollectionId,
  type EmbeddedChunk,
  type Embedder,
  type Logger,
  type RetrievedChunk,
} from "@lolqa/core";
import type { VectorStore, VectorStoreFilter } from "./store.js";

/**
 * A collection in a VectorStore, paired with the embedder that produced its vectors.
 * The read and write paths of the services both go through this.
 */
export class ChunkIndex {
  readonly collection: CollectionId;
  private readonly store: VectorStore;
  private readonly embedder: Embedder;
  private readonly logger: Logger;

  constructor(params: {
    store: VectorStore;
    embedder: Embedder;
    collection: CollectionId;
    logger?: Logger;
  }) {
    this.store = params.store;
    this.embedder = params.embedder;
    this.collection = params.collection;
    this.logger = params.logger ?? new NullLogger();
  }

  private async embedChunks(chunks: Chunk[]): Promise<EmbeddedChunk[]> {
    const vectors = await this.embedder.embed(chunks.map((c) => c.text));
    if (vectors.length !== chunks.length) {
      throw new LolqaError(
        `Embedding count mismatch: got ${vectors.length}, expected ${chunks.length}`
      );
    }

    return chunks.map((chunk, i) => {
      const vector = vectors[i];
      if (!vector) {
        throw new LolqaError(`Missing embedding for chunk index ${i} (chunkId=${chunk.id})`);
      }
      return { chunk, vector };
    });
  }

  /** Upserts by chunk id; unchanged content is written in place. */
  async add(chunks: Chunk[]): Promise<number> {
    if (chunks.length === 0) return 0;
    const items = await this.embedChunks(chunks);
    this.store.upsertEmbeddedChunks({ collection: this.collection, items });
    this.logger.info("chunks upserted", { collection: this.collection, count: items.length });
    return items.length;
  }

  /**
   * Rebuilds the collection from `chunks`. Embedding happens before anything is
   * deleted, so a failed embed leaves the previous collection in place.
   */
  async replaceAll(chunks: Chunk[]): Promise<number> {
    const items = await this.embedChunks(chunks);
    this.store.replaceCollection({ collection: this.collection, items });
    this.logger.info("collection rebuilt", { collection: this.collection, count: items.length });
    return items.length;
  }

  async similaritySearch(
    query: string,
    k: number,
    filter?: VectorStoreFilter
  ): Promise<RetrievedChunk[]> {
    const [queryVector] = await this.embedder.embed([query]);
    if (!queryVector) throw new LolqaError("Failed to embed query.");

    return this.store.search({
      collection: this.collection,
      queryVector,
      topK: k,
      ...(filter !== undefined && { filter }),
    });
  }

  listChunks(filter?: VectorStoreFilter): Chunk[] {
    return this.store.listChunks({
      collection: this.collection,
      ...(filter !== undefined && { filter }),
    });
  }

  count(): number {
    return this.store.count(this.collection);
  }

  deleteAll(): number {
    const removed = this.store.deleteCollection(this.collection);
    this.logger.info("collection cleared", { collection: this.collection, removed });
    return removed;
  }
}
