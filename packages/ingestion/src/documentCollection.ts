import { NullLogger, errorMessage, type Document, type Logger } from "@lolqa/core";
import { SampleCollector, type DocumentCollector } from "./collectors/index.js";

/**
 * Runs every enabled collector and merges their documents.
 * A collector that fails or returns nothing is skipped, and the result is never
 * empty: the sample corpus stands in when every source comes back empty.
 */
export class DocumentCollection {
  private readonly collectors: DocumentCollector[];
  private readonly fallback: DocumentCollector;
  private readonly logger: Logger;

  constructor(
    collectors: DocumentCollector[],
    opts: { fallback?: DocumentCollector; logger?: Logger } = {}
  ) {
    this.collectors = collectors;
    this.logger = opts.logger ?? new NullLogger();
    this.fallback = opts.fallback ?? new SampleCollector({ logger: this.logger });
  }

  get names(): string[] {
    return this.collectors.map((c) => c.name);
  }

  async collect(opts: { sources?: string[] | null } = {}): Promise<Document[]> {
    const wanted = opts.sources?.length ? new Set(opts.sources) : null;
    const selected = wanted ? this.collectors.filter((c) => wanted.has(c.name)) : this.collectors;

    const documents: Document[] = [];
    const succeeded: string[] = [];
    const failed: string[] = [];

    for (const collector of selected) {
      const validation = collector.validate();
      if (!validation.ok) {
        this.logger.warn("collector disabled", { collector: collector.name, reason: validation.reason });
        failed.push(collector.name);
        continue;
      }

      try {
        this.logger.info("collecting", { collector: collector.name });
        const docs = await collector.collect();
        if (docs.length === 0) {
          this.logger.warn("collector returned no documents", { collector: collector.name });
          failed.push(collector.name);
          continue;
        }
        documents.push(...docs);
        succeeded.push(collector.name);
      } catch (err) {
        this.logger.error("collector failed", { collector: collector.name, error: errorMessage(err) });
        failed.push(collector.name);
      }
    }

    this.logger.info("collection complete", { succeeded, failed, documents: documents.length });

    if (documents.length === 0) {
      this.logger.warn("no documents from any source, using sample data");
      return this.fallback.collect();
    }
    return documents;
  }
}
