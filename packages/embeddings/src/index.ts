export { ollamaEmbedBatch } from "./ollama.js";
export { OllamaEmbedder, DEFAULT_EMBEDDING_MODEL, type OllamaEmbedderOptions } from "./embedder.js";
export { HashingEmbedder, tokenize } from "./hashing.js";
export {
  CachedEmbedder,
  RedisEmbeddingCache,
  embeddingCacheKey,
  type EmbeddingCache,
} from "./cache.js";
