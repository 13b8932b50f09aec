import { z } from "zod";
import {
  DependencyUnavailableError,
  LolqaError,
  errorMessage,
  type ChatModel,
  type ChatRequest,
  type ChatResult,
  type ToolCall,
} from "@lolqa/core";

export const DEFAULT_CHAT_MODEL = "llama3.1:8b";

const ToolCallSchema = z.object({
  function: z.object({
    name: z.string(),
    arguments: z.union([z.record(z.unknown()), z.string()]).optional(),
  }),
});

const OllamaChatResponse = z.object({
  message: z.object({
    content: z.string().default(""),
    tool_calls: z.array(ToolCallSchema).optional(),
  }),
});

const ArgumentsObject = z.record(z.unknown());

/** Models sometimes send arguments as a JSON string; bad ones are flagged, not thrown. */
function toToolCall(name: string, raw: Record<string, unknown> | string | undefined): ToolCall {
  if (raw === undefined) return { name, args: {} };
  if (typeof raw !== "string") return { name, args: raw };
  if (!raw.trim()) return { name, args: {} };

  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err) {
    return { name, args: {}, argumentsError: `arguments are not valid JSON (${errorMessage(err)}): ${raw}` };
  }
  const parsed = ArgumentsObject.safeParse(value);
  if (parsed.success) return { name, args: parsed.data };
  return { name, args: {}, argumentsError: `arguments are not a JSON object: ${raw}` };
}

export interface OllamaChatOptions {
  baseUrl?: string;
  model?: string;
  temperature?: number;
  timeoutMs?: number;
}

/** Non-streaming `/api/chat` client. Tool calls are returned, never executed here. */
export class OllamaChatClient implements ChatModel {
  readonly model: string;
  private readonly baseUrl: string;
  private readonly temperature: number;
  private readonly timeoutMs: number;

  constructor(opts: OllamaChatOptions = {}) {
    this.model = opts.model ?? DEFAULT_CHAT_MODEL;
    this.baseUrl = (opts.baseUrl ?? "http://localhost:11434").replace(/\/+$/, "");
    this.temperature = opts.temperature ?? 0.2;
    this.timeoutMs = opts.timeoutMs ?? 60_000;
  }

  async chat(request: ChatRequest): Promise<ChatResult> {
    const body: Record<string, unknown> = {
      model: this.model,
      messages: request.messages,
      stream: false,
      options: { temperature: this.temperature },
    };
    if (request.tools?.length) {
      body.tools = request.tools.map((t) => ({
        type: "function",
        function: { name: t.name, description: t.description, parameters: t.parameters },
      }));
    }

    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}/api/chat`, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new DependencyUnavailableError("language model", errorMessage(err), err);
    }

    if (!res.ok) {
      const text = await res.text().catch(() => "");
      const message = `Ollama error: ${res.status} ${res.statusText}\n${text}`;
      if (res.status >= 500) throw new DependencyUnavailableError("language model", message);
      throw new LolqaError(message);
    }

    let payload: unknown;
    try {
      payload = await res.json();
    } catch (err) {
      throw new DependencyUnavailableError(
        "language model",
        `Ollama chat response is not JSON: ${errorMessage(err)}`,
        err
      );
    }

    const parsed = OllamaChatResponse.safeParse(payload);
    if (!parsed.success) {
      throw new LolqaError("Ollama chat response missing `message`.");
    }

    const toolCalls = (parsed.data.message.tool_calls ?? []).map((c) =>
      toToolCall(c.function.name, c.function.arguments)
    );

    return { content: parsed.data.message.content, toolCalls };
  }
}
