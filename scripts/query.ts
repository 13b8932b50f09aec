import { DocumentTypeSchema, ConsoleLogger, loadConfig, loadEnvFile } from "@lolqa/core";
import { ChunkIndex, SqliteStore, type VectorStoreFilter } from "@lolqa/vectorstore";
import { createEmbedder } from "@lolqa/server";

function getArg(name: string): string | null {
  const idx = process.argv.indexOf(`--${name}`);
  if (idx === -1) return null;
  return process.argv[idx + 1] ?? null;
}

loadEnvFile();
const config = loadConfig();

const q = getArg("q");
const dbPath = getArg("db") ?? config.vector.dbPath;
const collection = getArg("collection") ?? config.vector.collection;
const topK = Number(getArg("topK") ?? String(config.rag.retrievalK));

const type = getArg("type");
const champion = getArg("champion");

if (!q || !Number.isInteger(topK) || topK < 1) {
  console.error(
    "Usage: npm run query -- --q <question> [--topK 3] [--db <sqlitePath>] [--collection <id>] [--type champion|lore|...] [--champion Ahri]"
  );
  process.exit(1);
}

console.log("[query] start", { collection, dbPath, topK });

const store = new SqliteStore(dbPath);
store.init();

const index = new ChunkIndex({
  store,
  embedder: createEmbedder(config, null, new ConsoleLogger("query", config.logLevel)),
  collection,
});

const filter: VectorStoreFilter = {};
if (type) filter.allowedTypes = [DocumentTypeSchema.parse(type)];
if (champion) filter.champion = champion;

const results = await index.similaritySearch(q, topK, Object.keys(filter).length > 0 ? filter : undefined);

console.log("[query] results:", results.length);

for (const r of results) {
  const md = r.chunk.metadata;

  console.log("—".repeat(80));
  console.log(`similarity: ${r.similarity.toFixed(4)}`);
  console.log(`source: ${md.source}${md.champion ? `  >  ${md.champion}` : ""}`);
  console.log(`type: ${md.type}`);
  console.log("");
  console.log(r.chunk.text.slice(0, 600));
  if (r.chunk.text.length > 600) console.log("…");
}

console.log("—".repeat(80));
store.close();
