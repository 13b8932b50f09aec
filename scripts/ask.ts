import { ConsoleLogger, loadConfig, loadEnvFile, type ConversationTurn } from "@lolqa/core";
import { RagService } from "@lolqa/rag";
import { ChunkIndex, SqliteStore } from "@lolqa/vectorstore";
import { createChatModel, createEmbedder } from "@lolqa/server";

/* -----------------------------
   CLI helpers
------------------------------ */
function getArg(name: string): string | null {
  const idx = process.argv.indexOf(`--${name}`);
  if (idx === -1) return null;
  return process.argv[idx + 1] ?? null;
}

/**
 * Pass WITHOUT the leading "--"
 * Example: hasFlag("debug") checks for "--debug"
 */
function hasFlag(flag: string): boolean {
  return process.argv.includes(`--${flag}`);
}

function getArgNumber(name: string, fallback: number): number {
  const v = getArg(name);
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) ? n : fallback;
}

function truncateText(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  return text.slice(0, maxChars).trimEnd() + "\n…";
}

/* -----------------------------
   CLI args
------------------------------ */
loadEnvFile();
const config = loadConfig();

const q = getArg("q");
const previous = getArg("after");
const dbPath = getArg("db") ?? config.vector.dbPath;
const k = getArgNumber("k", config.rag.retrievalK);
const debug = hasFlag("debug");
const noTools = hasFlag("noTools");

if (!q) {
  console.error(`Usage:
npm run ask -- --q "..." \\
  [--after "previous question"] \\
  [--k 3] \\
  [--db .data/vectorstore.sqlite] \\
  [--noTools] \\
  [--debug]`);
  process.exit(1);
}

const logger = new ConsoleLogger("ask", debug ? "debug" : config.logLevel);

console.log("[ask] start", { dbPath, k, model: config.models.chatModel, tools: !noTools });

const store = new SqliteStore(dbPath);
store.init();

const rag = new RagService({
  index: new ChunkIndex({
    store,
    embedder: createEmbedder(config, null, logger),
    collection: config.vector.collection,
  }),
  chat: createChatModel(config),
  logger,
  retrievalK: config.rag.retrievalK,
  minQuestionLength: config.rag.minQuestionLength,
  enableTools: config.rag.enableTools && !noTools,
});
rag.initialize();

// --after stands in for an earlier turn, to try follow-up questions
const history: ConversationTurn[] = previous ? [{ role: "user", content: previous }] : [];

console.log("[ask] generating with ollama...");
const result = await rag.query({ question: q, history, k });

if (debug) {
  console.log("\n=== CONTEXT (debug) ===\n");
  result.context.forEach((d, i) => {
    console.log(`[Source ${i + 1}] score=${d.score.toFixed(4)}\n${truncateText(d.content, 1600)}\n`);
  });
}

console.log("\n=== ANSWER ===\n");
console.log(result.answer);

console.log("\n=== SOURCES USED ===\n");
result.context.forEach((d, i) => {
  const md = d.metadata;
  console.log(`[Source ${i + 1}] ${md.source}/${md.type}${md.champion ? ` ${md.champion}` : ""} (similarity=${d.score.toFixed(4)})`);
});
if (result.toolsUsed.length > 0) console.log(`tools: ${result.toolsUsed.join(", ")}`);

store.close();
console.log("\n[ask] done ✅");
