import {
  LolqaError,
  NullLogger,
  ValidationError,
  type ChatModel,
  type ContextDocument,
  type ConversationTurn,
  type Logger,
  type QueryRequest,
  type QueryResult,
} from "@lolqa/core";
import type { ChunkIndex } from "@lolqa/vectorstore";
import { REFUSAL, buildAnswerMessages, buildToolAnswerMessages, formatContext } from "./prompts.js";
import {
  dispatchTool,
  formatToolResults,
  toolSpecs,
  validateToolRegistry,
  type ToolOutcome,
} from "./tools.js";

export const MAX_K = 20;

export interface RagServiceOptions {
  index: ChunkIndex;
  chat: ChatModel;
  logger?: Logger;
  retrievalK?: number;
  minQuestionLength?: number;
  enableTools?: boolean;
}

export interface RagStats {
  totalChunks: number;
  collection: string;
  retrievalK: number;
}

/**
 * Retrieval, grounded prompting and the optional single tool round.
 * A query makes at most two chat calls.
 */
export class RagService {
  readonly retrievalK: number;
  private readonly index: ChunkIndex;
  private readonly chat: ChatModel;
  private readonly logger: Logger;
  private readonly minQuestionLength: number;
  private readonly enableTools: boolean;
  private ready = false;

  constructor(opts: RagServiceOptions) {
    this.index = opts.index;
    this.chat = opts.chat;
    this.logger = opts.logger ?? new NullLogger();
    this.retrievalK = opts.retrievalK ?? 3;
    this.minQuestionLength = opts.minQuestionLength ?? 3;
    this.enableTools = opts.enableTools ?? true;
  }

  initialize(): void {
    if (this.enableTools) validateToolRegistry();
    this.ready = true;
    this.logger.info("rag service ready", {
      collection: this.index.collection,
      chunks: this.index.count(),
      model: this.chat.model,
      tools: this.enableTools,
    });
  }

  get isReady(): boolean {
    return this.ready;
  }

  async retrieve(question: string, k?: number): Promise<ContextDocument[]> {
    this.ensureReady();
    const q = this.validateQuestion(question);
    return this.search(q, this.validateK(k));
  }

  async query(request: QueryRequest): Promise<QueryResult> {
    this.ensureReady();
    const question = this.validateQuestion(request.question);
    const k = this.validateK(request.k);
    const history = request.history ?? [];

    const context = await this.search(retrievalQuery(question, history), k);
    const messages = buildAnswerMessages({
      question,
      context: formatContext(context),
      history,
    });

    this.logger.debug("generating answer", { k, sources: context.length, history: history.length });
    const first = await this.chat.chat({
      messages,
      ...(this.enableTools && { tools: toolSpecs() }),
    });

    if (!this.enableTools || first.toolCalls.length === 0) {
      return { answer: orRefusal(first.content), context, toolsUsed: [] };
    }

    const outcomes: ToolOutcome[] = [];
    for (const call of first.toolCalls) {
      const outcome = await dispatchTool({ index: this.index }, call);
      if (!outcome.ok) this.logger.warn("tool call failed", { tool: call.name, output: outcome.output });
      outcomes.push(outcome);
    }
    const toolsUsed = [...new Set(outcomes.map((o) => o.name))];
    this.logger.info("tools dispatched", { tools: toolsUsed });

    const second = await this.chat.chat({
      messages: buildToolAnswerMessages({ question, toolResults: formatToolResults(outcomes) }),
    });

    return { answer: orRefusal(second.content), context, toolsUsed };
  }

  stats(): RagStats {
    this.ensureReady();
    return {
      totalChunks: this.index.count(),
      collection: this.index.collection,
      retrievalK: this.retrievalK,
    };
  }

  private async search(query: string, k: number): Promise<ContextDocument[]> {
    const results = await this.index.similaritySearch(query, k);
    return results.map((r) => ({
      content: r.chunk.text,
      metadata: r.chunk.metadata,
      score: r.similarity,
    }));
  }

  private ensureReady(): void {
    if (!this.ready) throw new LolqaError("RAG service not initialized. Call initialize() first.");
  }

  private validateQuestion(question: string): string {
    const q = question.trim();
    if (q.length < this.minQuestionLength) {
      throw new ValidationError(`question must be at least ${this.minQuestionLength} characters`);
    }
    return q;
  }

  private validateK(k: number | undefined): number {
    if (k === undefined) return this.retrievalK;
    if (!Number.isInteger(k) || k < 1 || k > MAX_K) {
      throw new ValidationError(`k must be an integer between 1 and ${MAX_K}`);
    }
    return k;
  }
}

/** Follow-up questions lean on the previous user turn for retrieval ("his ultimate"). */
function retrievalQuery(question: string, history: ConversationTurn[]): string {
  const previous = history.filter((t) => t.role === "user").at(-1);
  return previous ? `${previous.content}\n${question}` : question;
}

function orRefusal(answer: string): string {
  const trimmed = answer.trim();
  return trimmed ? trimmed : `${REFUSAL}.`;
}
