import { z } from "zod";
import { DependencyUnavailableError, LolqaError, errorMessage } from "@lolqa/core";

const OllamaEmbedResponse = z.object({
  embeddings: z.array(z.array(z.number())),
});

function normalizeModelName(model: string): string {
  return model.trim();
}

/**
 * One `/api/embed` round trip for a batch of texts.
 * Network failures and 5xx answers are reported as DependencyUnavailableError.
 */
export async function ollamaEmbedBatch(args: {
  baseUrl: string;
  model: string;
  texts: string[];
  timeoutMs: number;
}): Promise<number[][]> {
  const { baseUrl, model, texts, timeoutMs } = args;

  let res: Response;
  try {
    res = await fetch(`${baseUrl}/api/embed`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({
        model: normalizeModelName(model),
        input: texts,
      }),
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    throw new DependencyUnavailableError("embedding service", errorMessage(err), err);
  }

  if (!res.ok) {
    const body = await res.text().catch(() => "");
    const message = `Ollama embeddings request failed: ${res.status} ${res.statusText}\n${body}`;
    if (res.status >= 500) throw new DependencyUnavailableError("embedding service", message);
    throw new LolqaError(message);
  }

  let payload: unknown;
  try {
    payload = await res.json();
  } catch (err) {
    throw new DependencyUnavailableError(
      "embedding service",
      `Ollama embeddings response is not JSON: ${errorMessage(err)}`,
      err
    );
  }

  const parsed = OllamaEmbedResponse.safeParse(payload);
  if (!parsed.success) {
    throw new LolqaError("Ollama embeddings response missing `embeddings` array.");
  }

  const vectors = parsed.data.embeddings;
  if (vectors.length !== texts.length) {
    throw new LolqaError(
      `Embedding count mismatch: got ${vectors.length}, expected ${texts.length}`
    );
  }
  return vectors;
}
