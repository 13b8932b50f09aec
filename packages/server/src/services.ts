import type { Server } from "node:http";
import type { Express } from "express";
import { Redis } from "ioredis";
import {
  APP_VERSION,
  errorMessage,
  type AppConfig,
  type ChatModel,
  type Embedder,
  type Logger,
} from "@lolqa/core";
import { CachedEmbedder, HashingEmbedder, OllamaEmbedder, RedisEmbeddingCache } from "@lolqa/embeddings";
import { DocumentCollection, IngestionPipeline, createCollectors, type DocumentCollector } from "@lolqa/ingestion";
import {
  IngestionWorker,
  MemoryBroker,
  RedisBroker,
  SqliteJobStore,
  WorkerSupervisor,
  type Broker,
} from "@lolqa/jobs";
import { OllamaChatClient } from "@lolqa/llm";
import { RagService } from "@lolqa/rag";
import { ChunkIndex, SqliteStore } from "@lolqa/vectorstore";
import { boundPort, closeServer, listen } from "./http.js";
import { createPipelineApp } from "./pipelineApp.js";
import { createRagApp } from "./ragApp.js";

export const INTERRUPTED_MESSAGE = "Pipeline interrupted: the worker stopped before the job finished";

/** Replacements for outside collaborators, used by tests and offline runs. */
export interface ServiceOverrides {
  broker?: Broker;
  embedder?: Embedder;
  chat?: ChatModel;
  collectors?: DocumentCollector[];
}

export function createRedis(url: string, logger: Logger): Redis {
  const redis = new Redis(url, { lazyConnect: true, maxRetriesPerRequest: 1 });
  redis.on("error", (err: Error) => logger.warn("redis connection error", { error: err.message }));
  return redis;
}

export function createEmbedder(config: AppConfig, redis: Redis | null, logger: Logger): Embedder {
  const { models } = config;
  if (models.embeddingProvider === "hashing") return new HashingEmbedder();

  const embedder = new OllamaEmbedder({
    baseUrl: models.ollamaBaseUrl,
    model: models.embeddingModel,
    batchSize: models.embedBatchSize,
    timeoutMs: models.embedTimeoutMs,
    logger: logger.child("embeddings"),
  });
  if (!redis || models.embeddingCacheTtlSeconds === 0) return embedder;

  return new CachedEmbedder(
    embedder,
    new RedisEmbeddingCache(redis),
    models.embeddingCacheTtlSeconds,
    logger.child("embedding-cache")
  );
}

export function createChatModel(config: AppConfig): ChatModel {
  return new OllamaChatClient({
    baseUrl: config.models.ollamaBaseUrl,
    model: config.models.chatModel,
    temperature: config.models.temperature,
    timeoutMs: config.models.chatTimeoutMs,
  });
}

/** Connections both services read from: the vector index and, with the Redis backend, Redis. */
export class SharedResources {
  readonly redis: Redis | null;
  readonly vectorStore: SqliteStore;
  readonly index: ChunkIndex;

  constructor(config: AppConfig, logger: Logger, overrides: ServiceOverrides = {}) {
    this.redis =
      config.pipeline.queueBackend === "redis" ? createRedis(config.redisUrl, logger.child("redis")) : null;
    this.vectorStore = new SqliteStore(config.vector.dbPath);
    this.vectorStore.init();
    this.index = new ChunkIndex({
      store: this.vectorStore,
      embedder: overrides.embedder ?? createEmbedder(config, this.redis, logger),
      collection: config.vector.collection,
      logger: logger.child("index"),
    });
  }

  async close(): Promise<void> {
    this.vectorStore.close();
    if (this.redis) await this.redis.quit();
  }
}

/** Job store, broker, supervised worker and the HTTP app of the ingestion service. */
export class PipelineServices {
  readonly store: SqliteJobStore;
  readonly broker: Broker;
  readonly worker: IngestionWorker;
  readonly supervisor: WorkerSupervisor;
  readonly app: Express;
  private readonly logger: Logger;

  constructor(config: AppConfig, shared: SharedResources, logger: Logger, overrides: ServiceOverrides = {}) {
    this.logger = logger;
    this.store = new SqliteJobStore(config.pipeline.jobDbPath);
    this.store.init();

    this.broker =
      overrides.broker ??
      (shared.redis ? new RedisBroker(shared.redis, logger.child("broker")) : new MemoryBroker());

    const collectors = overrides.collectors ?? createCollectors(config.sources, logger.child("collectors"));
    const pipeline = new IngestionPipeline({
      collection: new DocumentCollection(collectors, { logger: logger.child("collect") }),
      index: shared.index,
      chunking: config.chunking,
      logger: logger.child("run"),
    });

    this.worker = new IngestionWorker({
      broker: this.broker,
      store: this.store,
      pipeline,
      queue: config.pipeline.queue,
      pollTimeoutSeconds: config.pipeline.pollTimeoutSeconds,
      idleDelayMs: config.pipeline.idleDelayMs,
      errorDelayMs: config.pipeline.errorDelayMs,
      logger: logger.child("worker"),
    });
    this.supervisor = new WorkerSupervisor(this.worker, { logger: logger.child("supervisor") });

    this.app = createPipelineApp({
      broker: this.broker,
      store: this.store,
      queue: config.pipeline.queue,
      sources: collectors.map((c) => c.name),
      worker: this.supervisor,
      version: APP_VERSION,
      logger,
    });
  }

  /** Settles jobs a previous process left running, then starts the worker. */
  start(): void {
    const interrupted = this.store.failInterrupted(INTERRUPTED_MESSAGE);
    if (interrupted > 0) this.logger.warn("marked interrupted jobs as failed", { count: interrupted });
    this.supervisor.start();
  }

  async close(): Promise<void> {
    await this.supervisor.stop();
    await this.broker.close();
    this.store.close();
  }
}

export class RagServices {
  readonly rag: RagService;
  readonly app: Express;

  constructor(config: AppConfig, shared: SharedResources, logger: Logger, overrides: ServiceOverrides = {}) {
    this.rag = new RagService({
      index: shared.index,
      chat: overrides.chat ?? createChatModel(config),
      logger: logger.child("query"),
      retrievalK: config.rag.retrievalK,
      minQuestionLength: config.rag.minQuestionLength,
      enableTools: config.rag.enableTools,
    });
    this.app = createRagApp({ rag: this.rag, version: APP_VERSION, logger });
  }

  start(): void {
    this.rag.initialize();
  }
}

export interface RunningServices {
  pipeline: PipelineServices | null;
  rag: RagServices | null;
  /** Bound ports, by service. */
  ports: { pipeline?: number; rag?: number };
  stop(): Promise<void>;
}

/**
 * Builds and starts the services `config.service` selects and binds their HTTP
 * listeners. `stop()` closes listeners, then the worker, then the stores.
 */
export async function startServices(
  config: AppConfig,
  logger: Logger,
  overrides: ServiceOverrides = {}
): Promise<RunningServices> {
  const shared = new SharedResources(config, logger, overrides);
  const servers: Server[] = [];
  const ports: RunningServices["ports"] = {};

  let pipeline: PipelineServices | null = null;
  let rag: RagServices | null = null;

  const stop = async () => {
    await Promise.all(servers.map((s) => closeServer(s)));
    if (pipeline) await pipeline.close();
    await shared.close();
  };

  try {
    if (config.service !== "rag") {
      pipeline = new PipelineServices(config, shared, logger.child("pipeline"), overrides);
      pipeline.start();
      const server = await listen(pipeline.app, config.pipeline.port, config.host);
      servers.push(server);
      ports.pipeline = boundPort(server);
      logger.info("pipeline service listening", { host: config.host, port: ports.pipeline });
    }

    if (config.service !== "pipeline") {
      rag = new RagServices(config, shared, logger.child("rag"), overrides);
      rag.start();
      const server = await listen(rag.app, config.rag.port, config.host);
      servers.push(server);
      ports.rag = boundPort(server);
      logger.info("rag service listening", { host: config.host, port: ports.rag });
    }
  } catch (err) {
    logger.error("startup failed", { error: errorMessage(err) });
    await stop();
    throw err;
  }

  return { pipeline, rag, ports, stop };
}
