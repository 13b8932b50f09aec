import { NullLogger, errorMessage, type Document, type DocumentType, type Logger } from "@lolqa/core";
import { fetchText } from "./http.js";
import { extractPageLines } from "./html.js";
import type { CollectorValidation, DocumentCollector } from "./types.js";

export const WIKI_BASE_URL = "https://leagueoflegends.fandom.com";

const PAGES: ReadonlyArray<{ path: string; type: DocumentType }> = [
  { path: "/wiki/Game_Mechanics", type: "game_mechanics" },
  { path: "/wiki/Lore", type: "lore" },
];

const MAX_LINES = 200;

export class WebScraperCollector implements DocumentCollector {
  readonly name = "web_scraper" as const;
  private readonly baseUrl: string;
  private readonly logger: Logger;

  constructor(opts: { baseUrl?: string; logger?: Logger } = {}) {
    this.baseUrl = (opts.baseUrl ?? WIKI_BASE_URL).replace(/\/+$/, "");
    this.logger = opts.logger ?? new NullLogger();
  }

  validate(): CollectorValidation {
    return { ok: true };
  }

  async collect(): Promise<Document[]> {
    const documents: Document[] = [];
    for (const page of PAGES) {
      const doc = await this.scrapePage(`${this.baseUrl}${page.path}`, page.type);
      if (doc) documents.push(doc);
    }
    return documents;
  }

  /** A page that fails to load or has no text is skipped. */
  async scrapePage(url: string, type: DocumentType): Promise<Document | null> {
    try {
      this.logger.info("scraping", { url });
      const lines = extractPageLines(await fetchText(url, { timeoutMs: 30_000 }), MAX_LINES);
      if (lines.length === 0) return null;
      return { text: lines.join("\n"), metadata: { type, source: "web_scraper", url } };
    } catch (err) {
      this.logger.warn("failed to scrape page", { url, error: errorMessage(err) });
      return null;
    }
  }
}
