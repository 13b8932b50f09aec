import type {
  Chunk,
  CollectionId,
  DocumentType,
  EmbeddedChunk,
  RetrievedChunk,
} from "@lolqa/core";

export type VectorStoreFilter = {
  allowedTypes?: DocumentType[];
  /** Case-insensitive match on `metadata.champion`. */
  champion?: string;
};

export interface VectorStore {
  init(): void;

  upsertEmbeddedChunks(params: {
    collection: CollectionId;
    items: EmbeddedChunk[];
  }): void;

  /** Drops every chunk of the collection and writes `items`, atomically. */
  replaceCollection(params: {
    collection: CollectionId;
    items: EmbeddedChunk[];
  }): void;

  search(params: {
    collection: CollectionId;
    queryVector: number[];
    topK: number;
    filter?: VectorStoreFilter;
  }): RetrievedChunk[];

  listChunks(params: { collection: CollectionId; filter?: VectorStoreFilter }): Chunk[];

  count(collection: CollectionId): number;

  deleteCollection(collection: CollectionId): number;

  close(): void;
}
