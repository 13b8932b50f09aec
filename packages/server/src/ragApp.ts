import type { Express } from "express";
import { z } from "zod";
import { ConversationTurnSchema, type ContextDocument, type Logger } from "@lolqa/core";
import type { RagService } from "@lolqa/rag";
import { asyncHandler, createApp, errorHandler, parseWith } from "./http.js";

export const RAG_SERVICE_NAME = "rag";

const QueryBody = z.object({
  question: z.string(),
  conversation_history: z.array(ConversationTurnSchema).nullish(),
  k: z.number().nullish(),
  include_context: z.boolean().nullish(),
});

const RetrieveQuery = z.object({
  question: z.string(),
  k: z.coerce.number().optional(),
});

export interface RagAppDeps {
  rag: RagService;
  version: string;
  logger: Logger;
}

const toWire = (documents: ContextDocument[]) =>
  documents.map((d) => ({ content: d.content, metadata: d.metadata }));

export function createRagApp(deps: RagAppDeps): Express {
  const { rag, logger } = deps;
  const app = createApp();

  app.get("/health", (_req, res) => {
    res.json({
      status: rag.isReady ? "healthy" : "initializing",
      service: RAG_SERVICE_NAME,
      version: deps.version,
    });
  });

  app.post(
    "/query",
    asyncHandler(async (req, res) => {
      const body = parseWith(QueryBody, req.body, "query request");
      logger.info("query", { question: body.question.slice(0, 50) });

      const result = await rag.query({
        question: body.question,
        ...(body.conversation_history && { history: body.conversation_history }),
        ...(body.k != null && { k: body.k }),
      });

      // context is opt-in; asking for a specific k implies wanting to see it
      const includeContext = body.include_context ?? body.k != null;
      res.json({
        answer: result.answer,
        ...(includeContext && { context: toWire(result.context) }),
        tools_used: result.toolsUsed,
      });
    })
  );

  app.post(
    "/retrieve",
    asyncHandler(async (req, res) => {
      const { question, k } = parseWith(RetrieveQuery, req.query, "query");
      const documents = await rag.retrieve(question, k);
      res.json({ documents: toWire(documents) });
    })
  );

  app.get("/stats", (_req, res) => {
    const stats = rag.stats();
    res.json({
      total_chunks: stats.totalChunks,
      collection: stats.collection,
      retrieval_k: stats.retrievalK,
    });
  });

  app.use(errorHandler(logger));
  return app;
}
