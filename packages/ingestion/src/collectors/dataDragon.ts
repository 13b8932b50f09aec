import { z } from "zod";
import { NullLogger, errorMessage, type Document, type Logger } from "@lolqa/core";
import { fetchJson } from "./http.js";
import { stripHtml } from "./html.js";
import type { CollectorValidation, DocumentCollector } from "./types.js";

export const DATA_DRAGON_BASE_URL = "https://ddragon.leagueoflegends.com";
export const FALLBACK_VERSION = "14.1.1";

const Versions = z.array(z.string()).min(1);

const Spell = z.object({
  name: z.string().default(""),
  description: z.string().default(""),
});

const Champion = z.object({
  id: z.string().default(""),
  name: z.string(),
  title: z.string().default(""),
  blurb: z.string().default(""),
  lore: z.string().optional(),
  tags: z.array(z.string()).default([]),
  passive: Spell.optional(),
  spells: z.array(Spell).default([]),
});

const ChampionFile = z.object({ data: z.record(Champion) });

const Item = z.object({
  name: z.string().default(""),
  description: z.string().default(""),
  gold: z.object({ total: z.number() }).optional(),
});

const ItemFile = z.object({ data: z.record(Item) });

type ChampionData = z.infer<typeof Champion>;

export interface DataDragonOptions {
  version?: string;
  language?: string;
  includeItems?: boolean;
  baseUrl?: string;
  logger?: Logger;
}

/** Riot's static game data CDN. Needs no API key. */
export class DataDragonCollector implements DocumentCollector {
  readonly name = "data_dragon" as const;
  private readonly baseUrl: string;
  private readonly language: string;
  private readonly includeItems: boolean;
  private readonly logger: Logger;
  private version: string | undefined;

  constructor(opts: DataDragonOptions = {}) {
    this.baseUrl = opts.baseUrl ?? DATA_DRAGON_BASE_URL;
    this.language = opts.language ?? "en_US";
    this.includeItems = opts.includeItems ?? false;
    this.version = opts.version;
    this.logger = opts.logger ?? new NullLogger();
  }

  validate(): CollectorValidation {
    return { ok: true };
  }

  /** Latest published version, or the fallback when the version list is unreachable. */
  async resolveVersion(): Promise<string> {
    if (this.version) return this.version;
    try {
      const versions = Versions.parse(
        await fetchJson(`${this.baseUrl}/api/versions.json`, { timeoutMs: 10_000 })
      );
      this.version = versions[0] ?? FALLBACK_VERSION;
    } catch (err) {
      this.logger.warn("could not fetch latest version, using fallback", {
        fallback: FALLBACK_VERSION,
        error: errorMessage(err),
      });
      this.version = FALLBACK_VERSION;
    }
    return this.version;
  }

  async collect(): Promise<Document[]> {
    const version = await this.resolveVersion();
    const url = `${this.baseUrl}/cdn/${version}/data/${this.language}/champion.json`;
    this.logger.info("fetching champion data", { url });

    const file = ChampionFile.parse(await fetchJson(url, { timeoutMs: 30_000 }));
    const documents = Object.values(file.data).map((c) => championToDocument(c, version));
    this.logger.info("champions collected", { count: documents.length });

    if (this.includeItems) documents.push(...(await this.collectItems(version)));
    return documents;
  }

  /** Item failures are logged; champions are still returned. */
  private async collectItems(version: string): Promise<Document[]> {
    const url = `${this.baseUrl}/cdn/${version}/data/${this.language}/item.json`;
    try {
      const file = ItemFile.parse(await fetchJson(url, { timeoutMs: 30_000 }));
      const documents: Document[] = [];
      for (const item of Object.values(file.data)) {
        if (!item.name || item.name.startsWith("@")) continue;
        const cost = item.gold ? `${item.gold.total}` : "Unknown";
        documents.push({
          text: [`Item: ${item.name}`, `Description: ${stripHtml(item.description)}`, `Cost: ${cost} gold`].join("\n"),
          metadata: { type: "item", source: "data_dragon", version },
        });
      }
      this.logger.info("items collected", { count: documents.length });
      return documents;
    } catch (err) {
      this.logger.warn("item collection failed", { url, error: errorMessage(err) });
      return [];
    }
  }
}

export function championToDocument(c: ChampionData, version: string): Document {
  const roles = c.tags.length > 0 ? c.tags.join(", ") : "Unknown";
  const lines = [
    `Champion: ${c.name}`,
    `Title: ${c.title}`,
    `Role: ${roles}`,
    "",
    `Description: ${stripHtml(c.blurb)}`,
  ];

  if (c.passive?.name) {
    lines.push("", `Passive Ability: ${c.passive.name}`, stripHtml(c.passive.description));
  }
  if (c.spells.length > 0) {
    lines.push("", "Abilities:");
    for (const spell of c.spells) lines.push(`- ${spell.name}: ${stripHtml(spell.description)}`);
  }
  if (c.lore) lines.push("", `Lore: ${stripHtml(c.lore)}`);

  return {
    text: lines.join("\n").trim(),
    metadata: { type: "champion", source: "data_dragon", champion: c.name, role: roles, version },
  };
}
