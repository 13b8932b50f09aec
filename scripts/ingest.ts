import { ConsoleLogger, loadConfig, loadEnvFile } from "@lolqa/core";
import { DocumentCollection, IngestionPipeline, createCollectors } from "@lolqa/ingestion";
import { ChunkIndex, SqliteStore } from "@lolqa/vectorstore";
import { createEmbedder } from "@lolqa/server";

function getArg(name: string): string | null {
  const idx = process.argv.indexOf(`--${name}`);
  if (idx === -1) return null;
  return process.argv[idx + 1] ?? null;
}

/**
 * Pass WITHOUT the leading "--"
 * Example: hasFlag("refresh") checks for "--refresh"
 */
function hasFlag(flag: string): boolean {
  return process.argv.includes(`--${flag}`);
}

if (hasFlag("help")) {
  console.error(
    "Usage: npm run ingest -- [--sources sample,data_dragon] [--refresh] [--db <sqlitePath>] [--collection <id>]"
  );
  process.exit(1);
}

loadEnvFile();
const config = loadConfig();

const dbPath = getArg("db") ?? config.vector.dbPath;
const collection = getArg("collection") ?? config.vector.collection;
const sources = getArg("sources")?.split(",").map((s) => s.trim()).filter(Boolean) ?? null;
const forceRefresh = hasFlag("refresh");

const logger = new ConsoleLogger("ingest", config.logLevel);

console.log("[ingest] start", { dbPath, collection, sources: sources ?? "all", forceRefresh });

const store = new SqliteStore(dbPath);
store.init();

// no Redis here: the embedding cache only pays off across service runs
const index = new ChunkIndex({
  store,
  embedder: createEmbedder(config, null, logger),
  collection,
  logger: logger.child("index"),
});

const pipeline = new IngestionPipeline({
  collection: new DocumentCollection(createCollectors(config.sources, logger), { logger }),
  index,
  chunking: config.chunking,
  logger,
});

try {
  const result = await pipeline.run({ sources, forceRefresh });
  console.log("[ingest] stored in sqlite OK", { dbPath, collection, ...result, totalChunks: index.count() });
} finally {
  store.close();
}
