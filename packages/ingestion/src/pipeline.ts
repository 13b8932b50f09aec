import {
  IngestionError,
  NullLogger,
  type IndexWriteMode,
  type IngestionResult,
  type Logger,
} from "@lolqa/core";
import type { ChunkIndex } from "@lolqa/vectorstore";
import type { DocumentCollection } from "./documentCollection.js";
import { ingestCorpus } from "./ingestCorpus.js";
import { DEFAULT_CHUNKING, type ChunkingOptions } from "./textChunker.js";

export interface IngestionRunOptions {
  sources?: string[] | null;
  forceRefresh?: boolean;
}

/**
 * collect -> chunk -> embed -> index.
 * An empty index is built from scratch, `forceRefresh` rebuilds it, and anything
 * else is upserted next to what is already there.
 */
export class IngestionPipeline {
  private readonly collection: DocumentCollection;
  private readonly index: ChunkIndex;
  private readonly chunking: ChunkingOptions;
  private readonly logger: Logger;

  constructor(params: {
    collection: DocumentCollection;
    index: ChunkIndex;
    chunking?: ChunkingOptions;
    logger?: Logger;
  }) {
    this.collection = params.collection;
    this.index = params.index;
    this.chunking = params.chunking ?? DEFAULT_CHUNKING;
    this.logger = params.logger ?? new NullLogger();
  }

  async run(opts: IngestionRunOptions = {}): Promise<IngestionResult> {
    this.logger.info("start", { sources: opts.sources ?? "all", forceRefresh: opts.forceRefresh ?? false });

    const { documents, chunks } = await ingestCorpus({
      collection: this.collection,
      sources: opts.sources ?? null,
      chunking: this.chunking,
    });
    if (documents.length === 0) throw new IngestionError("No documents collected");

    this.logger.info("extracted", { documents: documents.length, chunks: chunks.length });

    let mode: IndexWriteMode;
    if (this.index.count() === 0) {
      mode = "create";
      await this.index.replaceAll(chunks);
    } else if (opts.forceRefresh) {
      mode = "refresh";
      await this.index.replaceAll(chunks);
    } else {
      mode = "append";
      await this.index.add(chunks);
    }

    this.logger.info("indexed", { mode, chunks: chunks.length, total: this.index.count() });
    return { documents: documents.length, chunks: chunks.length, mode };
  }
}
