import type { ChatModel, ChatRequest, ChatResult } from "@lolqa/core";
import { HashingEmbedder } from "@lolqa/embeddings";
import { SampleCollector, splitDocuments } from "@lolqa/ingestion";
import { ChunkIndex, SqliteStore } from "@lolqa/vectorstore";

type Reply = ChatResult | ((request: ChatRequest) => ChatResult);

/** Chat model that answers from a fixed script and records every request. */
export class ScriptedChat implements ChatModel {
  readonly model = "scripted";
  readonly requests: ChatRequest[] = [];
  private readonly replies: Reply[];

  constructor(replies: Reply[]) {
    this.replies = [...replies];
  }

  async chat(request: ChatRequest): Promise<ChatResult> {
    this.requests.push(request);
    const next = this.replies.shift();
    if (next === undefined) throw new Error("no scripted reply left");
    return typeof next === "function" ? next(request) : next;
  }
}

export const text = (content: string): ChatResult => ({ content, toolCalls: [] });

export function systemPrompt(request: ChatRequest | undefined): string {
  return request?.messages.find((m) => m.role === "system")?.content ?? "";
}

export function userPrompt(request: ChatRequest | undefined): string {
  return request?.messages.find((m) => m.role === "user")?.content ?? "";
}

/** Answers with the champion's ultimate when its sheet is in the context, else nothing. */
export function ultimateFromContext(champion: string) {
  return (request: ChatRequest): ChatResult => {
    const match = new RegExp(`Champion: ${champion}[\\s\\S]*?- R: (.+?) - `).exec(systemPrompt(request));
    return text(match ? `${champion}'s ultimate is ${match[1]}.` : "");
  };
}

export async function sampleIndex(): Promise<{ store: SqliteStore; index: ChunkIndex }> {
  const store = new SqliteStore(":memory:");
  store.init();
  const index = new ChunkIndex({ store, embedder: new HashingEmbedder(), collection: "test" });
  const documents = await new SampleCollector().collect();
  await index.replaceAll(splitDocuments(documents, { chunkSize: 1000, chunkOverlap: 200 }));
  return { store, index };
}
