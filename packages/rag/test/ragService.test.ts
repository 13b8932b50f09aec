import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { LolqaError, ValidationError } from "@lolqa/core";
import { OllamaChatClient } from "@lolqa/llm";
import type { ChunkIndex, SqliteStore } from "@lolqa/vectorstore";
import { RagService, REFUSAL } from "../src/index.js";
import { ScriptedChat, sampleIndex, systemPrompt, text, ultimateFromContext, userPrompt } from "./helpers.js";

describe("RagService", () => {
  let store: SqliteStore;
  let index: ChunkIndex;

  beforeEach(async () => {
    ({ store, index } = await sampleIndex());
  });

  afterEach(() => {
    store.close();
  });

  function service(chat: ScriptedChat, opts: { enableTools?: boolean } = {}): RagService {
    const rag = new RagService({ index, chat, retrievalK: 3, enableTools: opts.enableTools ?? false });
    rag.initialize();
    return rag;
  }

  it("refuses to work before initialize()", async () => {
    const rag = new RagService({ index, chat: new ScriptedChat([]) });
    await expect(rag.query({ question: "Who is Ahri?" })).rejects.toThrow(
      "RAG service not initialized. Call initialize() first."
    );
    expect(() => rag.stats()).toThrow(LolqaError);
  });

  it("rejects short questions and out-of-range k before any model call", async () => {
    const chat = new ScriptedChat([]);
    const rag = service(chat);

    await expect(rag.query({ question: "  hi " })).rejects.toThrow(
      new ValidationError("question must be at least 3 characters")
    );
    await expect(rag.query({ question: "" })).rejects.toBeInstanceOf(ValidationError);
    await expect(rag.query({ question: "Who is Ahri?", k: 0 })).rejects.toThrow(
      "k must be an integer between 1 and 20"
    );
    await expect(rag.retrieve("Who is Ahri?", 21)).rejects.toBeInstanceOf(ValidationError);
    await expect(rag.retrieve("Who is Ahri?", 2.5)).rejects.toBeInstanceOf(ValidationError);
    expect(chat.requests).toHaveLength(0);
  });

  it("answers with Ahri's ability names from the indexed sheet", async () => {
    const chat = new ScriptedChat([ultimateFromContext("Ahri")]);
    const rag = service(chat);

    const result = await rag.query({ question: "What are Ahri's abilities?", k: 4 });

    expect(result.answer).toBe("Ahri's ultimate is Spirit Rush.");
    expect(result.toolsUsed).toEqual([]);
    expect(result.context.some((d) => d.metadata.champion === "Ahri")).toBe(true);
    expect(chat.requests).toHaveLength(1);
    expect(chat.requests[0]?.tools).toBeUndefined();
  });

  it("threads conversation history into the prompt and retrieval", async () => {
    const chat = new ScriptedChat([ultimateFromContext("Yasuo")]);
    const rag = service(chat);

    const result = await rag.query({
      question: "What is his ultimate called?",
      history: [
        { role: "user", content: "Who is Yasuo?" },
        { role: "assistant", content: "Yasuo is a swordsman champion." },
      ],
      k: 4,
    });

    expect(result.answer).toBe("Yasuo's ultimate is Last Breath.");
    expect(result.context.some((d) => d.metadata.champion === "Yasuo")).toBe(true);

    const user = userPrompt(chat.requests[0]);
    expect(user).toContain(
      "Conversation History:\nUser: Who is Yasuo?\nAssistant: Yasuo is a swordsman champion."
    );
    expect(user).toContain("Current Question: What is his ultimate called?");
    expect(systemPrompt(chat.requests[0])).toContain("Pay attention to the conversation history.");
  });

  it("builds the grounded prompt with numbered sources", async () => {
    const chat = new ScriptedChat([text("ok")]);
    const rag = service(chat);

    const result = await rag.query({ question: "Tell me about Jinx", k: 2 });
    const system = systemPrompt(chat.requests[0]);

    expect(system.startsWith("You are a helpful assistant specialized in League of Legends game knowledge.")).toBe(
      true
    );
    expect(system).toContain(`explicitly say "${REFUSAL}"`);
    expect(system).toContain(`Context: [Source 1]\n${result.context[0]?.content}\n\n[Source 2]\n`);
    expect(system).not.toContain("[Source 3]");
    expect(userPrompt(chat.requests[0]).startsWith("Question: Tell me about Jinx\n")).toBe(true);
  });

  it("replaces an empty answer with the refusal phrase", async () => {
    const chat = new ScriptedChat([ultimateFromContext("Teemo")]);
    const rag = service(chat);

    const result = await rag.query({ question: "What is Teemo's ultimate?" });
    expect(result.answer).toBe(`${REFUSAL}.`);
  });

  it("orders retrieval by similarity and returns the same documents for the same question", async () => {
    const rag = service(new ScriptedChat([]));

    const first = await rag.retrieve("Jinx rocket launcher", 5);
    const second = await rag.retrieve("Jinx rocket launcher", 5);

    expect(first).toHaveLength(5);
    expect(second).toEqual(first);
    const scores = first.map((d) => d.score);
    expect([...scores].sort((a, b) => b - a)).toEqual(scores);
    expect(first[0]?.metadata.champion).toBe("Jinx");
  });

  it("uses the configured k when none is given", async () => {
    const rag = service(new ScriptedChat([]));
    expect(await rag.retrieve("ranked divisions")).toHaveLength(3);
  });

  it("reports stats for the collection", () => {
    const rag = service(new ScriptedChat([]));
    expect(rag.stats()).toEqual({ totalChunks: index.count(), collection: "test", retrievalK: 3 });
  });

  describe("with tools", () => {
    it("answers directly when the model calls no tool", async () => {
      const chat = new ScriptedChat([text("Thresh is a support.")]);
      const rag = service(chat, { enableTools: true });

      const result = await rag.query({ question: "Who is Thresh?" });

      expect(result).toMatchObject({ answer: "Thresh is a support.", toolsUsed: [] });
      expect(chat.requests).toHaveLength(1);
      expect(chat.requests[0]?.tools?.map((t) => t.name)).toEqual([
        "count_documents",
        "list_champions",
        "search_knowledge",
      ]);
    });

    it("dispatches tool calls and makes exactly one more model call", async () => {
      const chat = new ScriptedChat([
        {
          content: "",
          toolCalls: [
            { name: "count_documents", args: { type: "champion" } },
            { name: "list_champions", args: { role: "support" } },
          ],
        },
        text("There are 5 champions; Thresh is the support."),
      ]);
      const rag = service(chat, { enableTools: true });

      const result = await rag.query({ question: "How many champions are there?" });

      expect(result.answer).toBe("There are 5 champions; Thresh is the support.");
      expect(result.toolsUsed).toEqual(["count_documents", "list_champions"]);
      expect(chat.requests).toHaveLength(2);
      expect(chat.requests[1]?.tools).toBeUndefined();
      expect(systemPrompt(chat.requests[1])).toContain(
        "Tool Results:\ncount_documents: The knowledge base contains 5 documents of type champion.\n\n" +
          "list_champions: Champions with role support (1): Thresh"
      );
      expect(userPrompt(chat.requests[1])).toBe("Question: How many champions are there?");
    });

    it("folds an unknown tool into the results instead of failing", async () => {
      const chat = new ScriptedChat([
        { content: "", toolCalls: [{ name: "delete_everything", args: {} }] },
        text(""),
      ]);
      const rag = service(chat, { enableTools: true });

      const result = await rag.query({ question: "Please wipe the index" });

      expect(result.answer).toBe(`${REFUSAL}.`);
      expect(result.toolsUsed).toEqual(["delete_everything"]);
      expect(systemPrompt(chat.requests[1])).toContain('delete_everything: Error: unknown tool "delete_everything"');
    });

    it("reports undecodable tool arguments from the model as a tool error", async () => {
      const replies = [
        {
          message: {
            content: "",
            tool_calls: [{ function: { name: "count_documents", arguments: "{type: champion" } }],
          },
        },
        { message: { content: "I could not count them." } },
      ];
      const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
        new Response(JSON.stringify(replies.shift()), { status: 200 })
      );
      vi.stubGlobal("fetch", fetchMock);

      try {
        const rag = new RagService({ index, chat: new OllamaChatClient(), enableTools: true });
        rag.initialize();
        const result = await rag.query({ question: "How many champions are there?" });

        expect(result).toMatchObject({ answer: "I could not count them.", toolsUsed: ["count_documents"] });
        expect(fetchMock).toHaveBeenCalledTimes(2);

        const second = fetchMock.mock.calls[1]?.[1]?.body;
        expect(typeof second).toBe("string");
        expect(String(second)).toContain(
          "count_documents: Error: invalid arguments for count_documents: arguments are not valid JSON ("
        );
      } finally {
        vi.unstubAllGlobals();
      }
    });

    it("ignores tool calls when tools are disabled", async () => {
      const chat = new ScriptedChat([
        { content: "Ahri is a mage.", toolCalls: [{ name: "count_documents", args: {} }] },
      ]);
      const rag = service(chat, { enableTools: false });

      const result = await rag.query({ question: "Who is Ahri?" });
      expect(result).toMatchObject({ answer: "Ahri is a mage.", toolsUsed: [] });
      expect(chat.requests).toHaveLength(1);
    });

    it("propagates a model failure", async () => {
      const chat = new ScriptedChat([]);
      const rag = service(chat, { enableTools: true });
      await expect(rag.query({ question: "Who is Ahri?" })).rejects.toThrow("no scripted reply left");
    });
  });
});
