export type { VectorStore, VectorStoreFilter } from "./store.js";
export { SqliteStore, cosineSimilarity } from "./sqliteStore.js";
export { ChunkIndex } from "./chunkIndex.js";
