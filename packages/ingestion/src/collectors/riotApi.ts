import { z } from "zod";
import { NullLogger, type Document, type Logger } from "@lolqa/core";
import { fetchJson } from "./http.js";
import type { CollectorValidation, DocumentCollector } from "./types.js";

const Rotation = z.object({
  freeChampionIds: z.array(z.number()).default([]),
});

/** Live Riot Games API. Requires a developer key. */
export class RiotApiCollector implements DocumentCollector {
  readonly name = "riot_api" as const;
  private readonly apiKey: string | undefined;
  private readonly region: string;
  private readonly logger: Logger;

  constructor(opts: { apiKey?: string; region?: string; logger?: Logger } = {}) {
    this.apiKey = opts.apiKey;
    this.region = opts.region ?? "na1";
    this.logger = opts.logger ?? new NullLogger();
  }

  get baseUrl(): string {
    return `https://${this.region}.api.riotgames.com`;
  }

  validate(): CollectorValidation {
    if (!this.apiKey) return { ok: false, reason: "RIOT_API_KEY not set" };
    return { ok: true };
  }

  async collect(): Promise<Document[]> {
    if (!this.apiKey) return [];

    const rotation = Rotation.parse(
      await fetchJson(`${this.baseUrl}/lol/platform/v3/champion-rotations`, {
        timeoutMs: 10_000,
        headers: { "X-Riot-Token": this.apiKey },
      })
    );
    if (rotation.freeChampionIds.length === 0) return [];

    this.logger.info("champion rotation collected", { champions: rotation.freeChampionIds.length });
    return [
      {
        text: [
          "Current Free Champions Rotation:",
          rotation.freeChampionIds.join(", "),
          "",
          "These champions are free to play this week.",
        ].join("\n"),
        metadata: { type: "champion_rotation", source: "riot_api", region: this.region },
      },
    ];
  }
}
