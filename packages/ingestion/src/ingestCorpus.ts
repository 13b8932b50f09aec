import type { Chunk, Document } from "@lolqa/core";
import type { DocumentCollection } from "./documentCollection.js";
import { splitDocuments, type ChunkingOptions } from "./textChunker.js";

export async function ingestCorpus(params: {
  collection: DocumentCollection;
  sources?: string[] | null;
  chunking: ChunkingOptions;
}): Promise<{ documents: Document[]; chunks: Chunk[] }> {
  const documents = await params.collection.collect({ sources: params.sources ?? null });
  const chunks = splitDocuments(documents, params.chunking);
  return { documents, chunks };
}
