import { z } from "zod";
import {
  DocumentTypeSchema,
  ValidationError,
  errorMessage,
  type ToolCall,
  type ToolSpec,
} from "@lolqa/core";
import type { ChunkIndex } from "@lolqa/vectorstore";

export type ToolName = "count_documents" | "list_champions" | "search_knowledge";

export interface ToolContext {
  index: ChunkIndex;
}

export interface ToolDefinition {
  spec: ToolSpec;
  /** Validates `args` and runs the handler. Throws on invalid arguments or handler failure. */
  execute(ctx: ToolContext, args: Record<string, unknown>): Promise<string>;
}

function defineTool<S extends z.ZodTypeAny>(
  name: ToolName,
  def: {
    description: string;
    parameters: Record<string, unknown>;
    args: S;
    run: (ctx: ToolContext, args: z.infer<S>) => Promise<string>;
  }
): ToolDefinition {
  return {
    spec: { name, description: def.description, parameters: def.parameters },
    async execute(ctx, raw) {
      const parsed = def.args.safeParse(raw);
      if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "args"}: ${i.message}`);
        throw new ValidationError(`invalid arguments for ${name}: ${issues.join("; ")}`, issues);
      }
      return def.run(ctx, parsed.data);
    },
  };
}

const TOOLS: Record<ToolName, ToolDefinition> = {
  count_documents: defineTool("count_documents", {
    description:
      "Count the documents in the knowledge base, optionally only those of one type (for example champion).",
    parameters: {
      type: "object",
      properties: {
        type: { type: "string", enum: DocumentTypeSchema.options },
      },
    },
    args: z.object({ type: DocumentTypeSchema.optional() }),
    run: async ({ index }, { type }) => {
      const chunks = index.listChunks(type ? { allowedTypes: [type] } : undefined);
      const documents = new Set(chunks.map((c) => c.documentId)).size;
      return type
        ? `The knowledge base contains ${documents} documents of type ${type}.`
        : `The knowledge base contains ${documents} documents.`;
    },
  }),

  list_champions: defineTool("list_champions", {
    description: "List the champions in the knowledge base, optionally filtered by role (for example Mage).",
    parameters: {
      type: "object",
      properties: {
        role: { type: "string" },
      },
    },
    args: z.object({ role: z.string().trim().min(1).optional() }),
    run: async ({ index }, { role }) => {
      const wanted = role?.toLowerCase();
      const names = new Set<string>();
      for (const chunk of index.listChunks({ allowedTypes: ["champion"] })) {
        const { champion, role: chunkRole } = chunk.metadata;
        if (!champion) continue;
        if (wanted && !(chunkRole ?? "").toLowerCase().includes(wanted)) continue;
        names.add(champion);
      }

      const sorted = [...names].sort((a, b) => a.localeCompare(b));
      const scope = role ? ` with role ${role}` : "";
      if (sorted.length === 0) return `No champions found${scope}.`;
      return `Champions${scope} (${sorted.length}): ${sorted.join(", ")}`;
    },
  }),

  search_knowledge: defineTool("search_knowledge", {
    description: "Search the knowledge base for passages about a topic, champion or mechanic.",
    parameters: {
      type: "object",
      properties: {
        query: { type: "string" },
        k: { type: "integer", minimum: 1, maximum: 10 },
      },
      required: ["query"],
    },
    args: z.object({
      query: z.string().trim().min(1),
      k: z.number().int().min(1).max(10).default(3),
    }),
    run: async ({ index }, { query, k }) => {
      const results = await index.similaritySearch(query, k);
      if (results.length === 0) return `No passages found for "${query}".`;
      return results.map((r, i) => `[Result ${i + 1}] ${r.chunk.text}`).join("\n\n");
    },
  }),
};

export const TOOL_NAMES = Object.keys(TOOLS).filter(isToolName);

export function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(TOOLS, name);
}

/** Each registry entry must advertise the name it is registered under. */
export function validateToolRegistry(): void {
  for (const name of TOOL_NAMES) {
    const advertised = TOOLS[name].spec.name;
    if (advertised !== name) {
      throw new Error(`Tool registered as ${name} advertises itself as ${advertised}`);
    }
  }
}

export function toolSpecs(): ToolSpec[] {
  return TOOL_NAMES.map((name) => TOOLS[name].spec);
}

export interface ToolOutcome {
  name: string;
  ok: boolean;
  output: string;
}

/** Never throws: every failure becomes an `Error:` outcome. */
export async function dispatchTool(ctx: ToolContext, call: ToolCall): Promise<ToolOutcome> {
  if (!isToolName(call.name)) {
    return { name: call.name, ok: false, output: `Error: unknown tool "${call.name}"` };
  }
  if (call.argumentsError !== undefined) {
    const output = `Error: invalid arguments for ${call.name}: ${call.argumentsError}`;
    return { name: call.name, ok: false, output };
  }

  try {
    const output = await TOOLS[call.name].execute(ctx, call.args);
    return { name: call.name, ok: true, output };
  } catch (err) {
    if (err instanceof ValidationError) {
      return { name: call.name, ok: false, output: `Error: ${err.message}` };
    }
    return { name: call.name, ok: false, output: `Error: ${call.name} failed: ${errorMessage(err)}` };
  }
}

/** One `name: output` block per outcome, in call order. */
export function formatToolResults(outcomes: ToolOutcome[]): string {
  return outcomes.map((o) => `${o.name}: ${o.output}`).join("\n\n");
}
