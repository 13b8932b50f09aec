import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";
import {
  DocumentMetadataSchema,
  type Chunk,
  type CollectionId,
  type EmbeddedChunk,
  type RetrievedChunk,
} from "@lolqa/core";
import type { VectorStore, VectorStoreFilter } from "./store.js";

const SqlRow = z.object({
  chunk_id: z.string(),
  document_id: z.string(),
  chunk_index: z.number(),
  start_offset: z.number(),
  text: z.string(),
  metadata_json: z.string(),
});

const SqlRowWithVector = SqlRow.extend({ vector_json: z.string() });

const Vector = z.array(z.number());

function toChunk(row: z.infer<typeof SqlRow>): Chunk {
  return {
    id: row.chunk_id,
    documentId: row.document_id,
    index: row.chunk_index,
    start: row.start_offset,
    text: row.text,
    metadata: DocumentMetadataSchema.parse(JSON.parse(row.metadata_json)),
  };
}

function matches(chunk: Chunk, filter: VectorStoreFilter): boolean {
  if (filter.allowedTypes?.length && !filter.allowedTypes.includes(chunk.metadata.type)) {
    return false;
  }
  if (filter.champion) {
    const champion = chunk.metadata.champion?.toLowerCase();
    if (champion !== filter.champion.toLowerCase()) return false;
  }
  return true;
}

function ensureDir(path: string) {
  if (path === ":memory:") return;
  mkdirSync(dirname(path), { recursive: true });
}

export class SqliteStore implements VectorStore {
  private db: Database.Database;

  constructor(private readonly dbPath: string) {
    ensureDir(dbPath);
    this.db = new Database(dbPath);
  }

  init(): void {
    if (this.dbPath !== ":memory:") this.db.exec(`PRAGMA journal_mode = WAL;`);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS chunks (
        collection TEXT NOT NULL,
        chunk_id TEXT NOT NULL,
        document_id TEXT NOT NULL,
        chunk_index INTEGER NOT NULL,
        start_offset INTEGER NOT NULL,
        text TEXT NOT NULL,
        metadata_json TEXT NOT NULL,
        vector_json TEXT NOT NULL,
        PRIMARY KEY (collection, chunk_id)
      );
    `);

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_chunks_collection
      ON chunks(collection);
    `);
  }

  private insertMany(collection: CollectionId, items: EmbeddedChunk[]): void {
    const stmt = this.db.prepare(`
      INSERT INTO chunks (collection, chunk_id, document_id, chunk_index, start_offset, text, metadata_json, vector_json)
      VALUES (@collection, @chunk_id, @document_id, @chunk_index, @start_offset, @text, @metadata_json, @vector_json)
      ON CONFLICT(collection, chunk_id) DO UPDATE SET
        document_id = excluded.document_id,
        chunk_index = excluded.chunk_index,
        start_offset = excluded.start_offset,
        text = excluded.text,
        metadata_json = excluded.metadata_json,
        vector_json = excluded.vector_json;
    `);

    for (const it of items) {
      stmt.run({
        collection,
        chunk_id: it.chunk.id,
        document_id: it.chunk.documentId,
        chunk_index: it.chunk.index,
        start_offset: it.chunk.start,
        text: it.chunk.text,
        metadata_json: JSON.stringify(it.chunk.metadata),
        vector_json: JSON.stringify(it.vector),
      });
    }
  }

  upsertEmbeddedChunks(params: { collection: CollectionId; items: EmbeddedChunk[] }): void {
    const tx = this.db.transaction((items: EmbeddedChunk[]) => {
      this.insertMany(params.collection, items);
    });
    tx(params.items);
  }

  replaceCollection(params: { collection: CollectionId; items: EmbeddedChunk[] }): void {
    const del = this.db.prepare(`DELETE FROM chunks WHERE collection = ?`);
    const tx = this.db.transaction((items: EmbeddedChunk[]) => {
      del.run(params.collection);
      this.insertMany(params.collection, items);
    });
    tx(params.items);
  }

  search(params: {
    collection: CollectionId;
    queryVector: number[];
    topK: number;
    filter?: VectorStoreFilter;
  }): RetrievedChunk[] {
    if (params.topK <= 0) return [];

    const rows = this.db
      .prepare(
        `
        SELECT chunk_id, document_id, chunk_index, start_offset, text, metadata_json, vector_json
        FROM chunks
        WHERE collection = ?
        ORDER BY rowid
      `
      )
      .all(params.collection);

    const filter = params.filter ?? {};
    const scored: RetrievedChunk[] = [];

    for (const raw of rows) {
      const row = SqlRowWithVector.parse(raw);
      const chunk = toChunk(row);
      if (!matches(chunk, filter)) continue;

      const vector = Vector.parse(JSON.parse(row.vector_json));
      scored.push({ chunk, similarity: cosineSimilarity(params.queryVector, vector) });
    }

    // stable sort: equal scores keep insertion order
    scored.sort((a, b) => b.similarity - a.similarity);
    return scored.slice(0, params.topK);
  }

  listChunks(params: { collection: CollectionId; filter?: VectorStoreFilter }): Chunk[] {
    const rows = this.db
      .prepare(
        `
        SELECT chunk_id, document_id, chunk_index, start_offset, text, metadata_json
        FROM chunks
        WHERE collection = ?
        ORDER BY rowid
      `
      )
      .all(params.collection);

    const filter = params.filter ?? {};
    return rows.map((raw) => toChunk(SqlRow.parse(raw))).filter((c) => matches(c, filter));
  }

  count(collection: CollectionId): number {
    const row = z
      .object({ n: z.number() })
      .parse(this.db.prepare(`SELECT COUNT(*) AS n FROM chunks WHERE collection = ?`).get(collection));
    return row.n;
  }

  deleteCollection(collection: CollectionId): number {
    return this.db.prepare(`DELETE FROM chunks WHERE collection = ?`).run(collection).changes;
  }

  close(): void {
    this.db.close();
  }
}

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let na = 0;
  let nb = 0;

  const len = Math.min(a.length, b.length);
  for (let i = 0; i < len; i++) {
    const av = a[i] ?? 0;
    const bv = b[i] ?? 0;
    dot += av * bv;
    na += av * av;
    nb += bv * bv;
  }

  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}
