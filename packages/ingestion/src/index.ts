export * from "./collectors/index.js";
export { DocumentCollection } from "./documentCollection.js";
export {
  splitDocument,
  splitDocuments,
  documentId,
  chunkId,
  DEFAULT_CHUNKING,
  type ChunkingOptions,
} from "./textChunker.js";
export { ingestCorpus } from "./ingestCorpus.js";
export { IngestionPipeline, type IngestionRunOptions } from "./pipeline.js";
