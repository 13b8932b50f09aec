import { readFileSync } from "node:fs";
import { z } from "zod";
import { DocumentTypeSchema, NullLogger, type Document, type Logger } from "@lolqa/core";
import type { CollectorValidation, DocumentCollector } from "./types.js";

const DEFAULT_CORPUS_URL = new URL("../../data/sample-corpus.json", import.meta.url);

const SampleCorpus = z.object({
  champions: z.array(
    z.object({
      name: z.string(),
      role: z.string(),
      description: z.string(),
      abilities: z.object({ Q: z.string(), W: z.string(), E: z.string(), R: z.string() }),
      playstyle: z.string(),
    })
  ),
  documents: z.array(z.object({ type: DocumentTypeSchema, text: z.string() })),
});

export type SampleCorpus = z.infer<typeof SampleCorpus>;

export function loadSampleCorpus(file: string | URL = DEFAULT_CORPUS_URL): SampleCorpus {
  return SampleCorpus.parse(JSON.parse(readFileSync(file, "utf8")));
}

/** Fixed corpus shipped with the package. Always available. */
export class SampleCollector implements DocumentCollector {
  readonly name = "sample" as const;
  private readonly logger: Logger;
  private readonly file: string | URL;

  constructor(opts: { file?: string | URL; logger?: Logger } = {}) {
    this.file = opts.file ?? DEFAULT_CORPUS_URL;
    this.logger = opts.logger ?? new NullLogger();
  }

  validate(): CollectorValidation {
    return { ok: true };
  }

  async collect(): Promise<Document[]> {
    const corpus = loadSampleCorpus(this.file);

    const documents: Document[] = corpus.champions.map((c) => ({
      text: [
        `Champion: ${c.name}`,
        `Role: ${c.role}`,
        `Description: ${c.description}`,
        "",
        "Abilities:",
        `- Q: ${c.abilities.Q}`,
        `- W: ${c.abilities.W}`,
        `- E: ${c.abilities.E}`,
        `- R: ${c.abilities.R}`,
        "",
        `Playstyle: ${c.playstyle}`,
      ].join("\n"),
      metadata: { type: "champion", source: "sample", champion: c.name, role: c.role },
    }));

    for (const doc of corpus.documents) {
      documents.push({ text: doc.text, metadata: { type: doc.type, source: "sample" } });
    }

    this.logger.info("sample documents loaded", { count: documents.length });
    return documents;
  }
}
