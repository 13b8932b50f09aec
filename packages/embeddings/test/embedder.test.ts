import { afterEach, describe, expect, it, vi } from "vitest";
import { DependencyUnavailableError, LolqaError } from "@lolqa/core";
import { OllamaEmbedder } from "../src/index.js";

type EmbedBody = { model: string; input: string[] };

function requestBody(init: RequestInit | undefined): EmbedBody {
  if (typeof init?.body !== "string") throw new Error("expected a JSON string body");
  return JSON.parse(init.body);
}

function vectorsFor(texts: string[]): number[][] {
  return texts.map((t) => [t.length, 1]);
}

function okResponse(texts: string[]): Response {
  return new Response(JSON.stringify({ embeddings: vectorsFor(texts) }), {
    status: 200,
    headers: { "content-type": "application/json" },
  });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("OllamaEmbedder", () => {
  it("splits the input into batches and keeps the order", async () => {
    const fetchMock = vi.fn(async (_url: string | URL | Request, init?: RequestInit) =>
      okResponse(requestBody(init).input)
    );
    vi.stubGlobal("fetch", fetchMock);

    const embedder = new OllamaEmbedder({ baseUrl: "http://ollama.test/", batchSize: 2 });
    const vectors = await embedder.embed(["a", "bb", "ccc", "dddd", "eeeee"]);

    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://ollama.test/api/embed");
    expect(requestBody(fetchMock.mock.calls[2]?.[1])).toEqual({
      model: "nomic-embed-text:latest",
      input: ["eeeee"],
    });
    expect(vectors).toEqual([
      [1, 1],
      [2, 1],
      [3, 1],
      [4, 1],
      [5, 1],
    ]);
  });

  it("returns nothing for no texts without calling the service", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);

    expect(await new OllamaEmbedder().embed([])).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("retries a batch after a network failure", async () => {
    const fetchMock = vi
      .fn()
      .mockRejectedValueOnce(new TypeError("fetch failed"))
      .mockImplementation(async (_url: string, init?: RequestInit) =>
        okResponse(requestBody(init).input)
      );
    vi.stubGlobal("fetch", fetchMock);

    const embedder = new OllamaEmbedder({ retries: 2, retryDelayMs: 0 });
    expect(await embedder.embed(["abc"])).toEqual([[3, 1]]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("gives up after the configured retries", async () => {
    const fetchMock = vi.fn().mockRejectedValue(new TypeError("fetch failed"));
    vi.stubGlobal("fetch", fetchMock);

    const embedder = new OllamaEmbedder({ retries: 2, retryDelayMs: 0 });
    await expect(embedder.embed(["abc"])).rejects.toBeInstanceOf(DependencyUnavailableError);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it("does not retry a client error", async () => {
    const fetchMock = vi.fn(async () => new Response("model not found", { status: 404, statusText: "Not Found" }));
    vi.stubGlobal("fetch", fetchMock);

    const embedder = new OllamaEmbedder({ retryDelayMs: 0 });
    const failure = embedder.embed(["abc"]);

    await expect(failure).rejects.toBeInstanceOf(LolqaError);
    await expect(failure).rejects.not.toBeInstanceOf(DependencyUnavailableError);
    await expect(failure).rejects.toThrow("Ollama embeddings request failed: 404 Not Found\nmodel not found");
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("treats a body that is not JSON as a service failure and retries it", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(new Response("<html>gateway</html>", { status: 200 }))
      .mockImplementation(async (_url: string, init?: RequestInit) =>
        okResponse(requestBody(init).input)
      );
    vi.stubGlobal("fetch", fetchMock);

    const embedder = new OllamaEmbedder({ retries: 1, retryDelayMs: 0 });
    expect(await embedder.embed(["ab"])).toEqual([[2, 1]]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("rejects a response with the wrong number of vectors", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response(JSON.stringify({ embeddings: [[1, 2]] }), { status: 200 }))
    );

    await expect(new OllamaEmbedder().embed(["a", "b"])).rejects.toThrow(
      "Embedding count mismatch: got 1, expected 2"
    );
  });
});
