import { existsSync, readFileSync } from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";
import { ValidationError } from "./errors.js";
import type { LogLevel } from "./logger.js";

const PackageJsonSchema = z.object({ version: z.string() });

/** Version of the service packages, read from this package's package.json. */
export const APP_VERSION: string = PackageJsonSchema.parse(
  JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf8"))
).version;

/**
 * Loads `.env` from the working directory (or `envPath`) into `process.env`.
 * Existing variables win over file values. Call once at process start.
 */
export function loadEnvFile(envPath?: string): void {
  const file = path.resolve(envPath ?? ".env");
  if (existsSync(file)) dotenv.config({ path: file });
}

const TRUTHY = new Set(["1", "true", "yes", "on"]);

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((v) => {
      const s = (v ?? "").trim().toLowerCase();
      if (!s) return fallback;
      return TRUTHY.has(s);
    });

const optionalText = z
  .string()
  .optional()
  .transform((v) => {
    const s = v?.trim();
    return s ? s : undefined;
  });

const int = (fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const EnvSchema = z.object({
  SERVICE: z.enum(["all", "pipeline", "rag"]).default("all"),
  HOST: z.string().default("127.0.0.1"),
  PIPELINE_PORT: int(8003, 0, 65535),
  RAG_PORT: int(8002, 0, 65535),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

  REDIS_URL: z.string().default("redis://localhost:6379/0"),
  QUEUE_BACKEND: z.enum(["redis", "memory"]).default("redis"),
  PIPELINE_QUEUE: z.string().min(1).default("pipeline_jobs"),
  JOB_DB_PATH: z.string().default(".data/jobs.sqlite"),
  VECTOR_DB_PATH: z.string().default(".data/vectorstore.sqlite"),
  COLLECTION: z.string().min(1).default("lolqa"),

  EMBEDDING_PROVIDER: z.enum(["ollama", "hashing"]).default("ollama"),
  OLLAMA_BASE_URL: z.string().url().default("http://localhost:11434"),
  EMBEDDING_MODEL: z.string().min(1).default("nomic-embed-text:latest"),
  CHAT_MODEL: z.string().min(1).default("llama3.1:8b"),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  EMBED_BATCH_SIZE: int(100, 1, 2048),
  EMBED_TIMEOUT_MS: int(300_000, 1000),
  CHAT_TIMEOUT_MS: int(60_000, 1000),
  EMBEDDING_CACHE_TTL_SECONDS: int(86_400, 0),

  CHUNK_SIZE: int(1000, 50, 20_000),
  CHUNK_OVERLAP: int(200, 0, 10_000),
  RETRIEVAL_K: int(3, 1, 20),
  MIN_QUESTION_LENGTH: int(3, 1, 200),
  RAG_ENABLE_TOOLS: flag(true),

  USE_DATA_DRAGON: flag(true),
  DATA_DRAGON_VERSION: optionalText,
  DATA_DRAGON_LANGUAGE: z.string().default("en_US"),
  DATA_DRAGON_INCLUDE_ITEMS: flag(false),
  USE_WEB_SCRAPER: flag(true),
  WEB_SCRAPER_BASE_URL: z.string().url().default("https://leagueoflegends.fandom.com"),
  USE_RIOT_API: flag(false),
  RIOT_API_KEY: optionalText,
  RIOT_API_REGION: z.string().default("na1"),
  USE_SAMPLE_DATA: flag(true),

  WORKER_POLL_TIMEOUT_SECONDS: int(5, 0, 300),
  WORKER_IDLE_DELAY_MS: int(1000, 0),
  WORKER_ERROR_DELAY_MS: int(5000, 0),
});

export type ServiceSelection = "all" | "pipeline" | "rag";

export interface SourcesConfig {
  useDataDragon: boolean;
  dataDragonVersion: string | undefined;
  dataDragonLanguage: string;
  dataDragonIncludeItems: boolean;
  useWebScraper: boolean;
  webScraperBaseUrl: string;
  useRiotApi: boolean;
  riotApiKey: string | undefined;
  riotApiRegion: string;
  useSampleData: boolean;
}

export interface AppConfig {
  service: ServiceSelection;
  host: string;
  logLevel: LogLevel;
  redisUrl: string;
  vector: {
    dbPath: string;
    collection: string;
  };
  models: {
    /** `hashing` embeds offline, for demos without an embedding server. */
    embeddingProvider: "ollama" | "hashing";
    ollamaBaseUrl: string;
    embeddingModel: string;
    chatModel: string;
    temperature: number;
    embedBatchSize: number;
    embedTimeoutMs: number;
    chatTimeoutMs: number;
    embeddingCacheTtlSeconds: number;
  };
  chunking: {
    chunkSize: number;
    chunkOverlap: number;
  };
  pipeline: {
    port: number;
    /** `memory` keeps the queue in process; only valid when one process runs both services. */
    queueBackend: "redis" | "memory";
    queue: string;
    jobDbPath: string;
    pollTimeoutSeconds: number;
    idleDelayMs: number;
    errorDelayMs: number;
  };
  rag: {
    port: number;
    retrievalK: number;
    minQuestionLength: number;
    enableTools: boolean;
  };
  sources: SourcesConfig;
}

/**
 * Parses service configuration from environment variables.
 * Throws a ValidationError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ValidationError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }
  const e = parsed.data;

  if (e.CHUNK_OVERLAP >= e.CHUNK_SIZE) {
    throw new ValidationError(
      `Invalid configuration: CHUNK_OVERLAP (${e.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${e.CHUNK_SIZE})`
    );
  }

  return {
    service: e.SERVICE,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    redisUrl: e.REDIS_URL,
    vector: {
      dbPath: e.VECTOR_DB_PATH,
      collection: e.COLLECTION,
    },
    models: {
      embeddingProvider: e.EMBEDDING_PROVIDER,
      ollamaBaseUrl: e.OLLAMA_BASE_URL.replace(/\/+$/, ""),
      embeddingModel: e.EMBEDDING_MODEL,
      chatModel: e.CHAT_MODEL,
      temperature: e.LLM_TEMPERATURE,
      embedBatchSize: e.EMBED_BATCH_SIZE,
      embedTimeoutMs: e.EMBED_TIMEOUT_MS,
      chatTimeoutMs: e.CHAT_TIMEOUT_MS,
      embeddingCacheTtlSeconds: e.EMBEDDING_CACHE_TTL_SECONDS,
    },
    chunking: {
      chunkSize: e.CHUNK_SIZE,
      chunkOverlap: e.CHUNK_OVERLAP,
    },
    pipeline: {
      port: e.PIPELINE_PORT,
      queueBackend: e.QUEUE_BACKEND,
      queue: e.PIPELINE_QUEUE,
      jobDbPath: e.JOB_DB_PATH,
      pollTimeoutSeconds: e.WORKER_POLL_TIMEOUT_SECONDS,
      idleDelayMs: e.WORKER_IDLE_DELAY_MS,
      errorDelayMs: e.WORKER_ERROR_DELAY_MS,
    },
    rag: {
      port: e.RAG_PORT,
      retrievalK: e.RETRIEVAL_K,
      minQuestionLength: e.MIN_QUESTION_LENGTH,
      enableTools: e.RAG_ENABLE_TOOLS,
    },
    sources: {
      useDataDragon: e.USE_DATA_DRAGON,
      dataDragonVersion: e.DATA_DRAGON_VERSION,
      dataDragonLanguage: e.DATA_DRAGON_LANGUAGE,
      dataDragonIncludeItems: e.DATA_DRAGON_INCLUDE_ITEMS,
      useWebScraper: e.USE_WEB_SCRAPER,
      webScraperBaseUrl: e.WEB_SCRAPER_BASE_URL.replace(/\/+$/, ""),
      useRiotApi: e.USE_RIOT_API,
      riotApiKey: e.RIOT_API_KEY,
      riotApiRegion: e.RIOT_API_REGION,
      useSampleData: e.USE_SAMPLE_DATA,
    },
  };
}
