import type { Logger, SourcesConfig } from "@lolqa/core";
import { DataDragonCollector } from "./dataDragon.js";
import { RiotApiCollector } from "./riotApi.js";
import { SampleCollector } from "./sample.js";
import type { DocumentCollector } from "./types.js";
import { WebScraperCollector } from "./webScraper.js";

export * from "./types.js";
export { DataDragonCollector, championToDocument, FALLBACK_VERSION, type DataDragonOptions } from "./dataDragon.js";
export { WebScraperCollector } from "./webScraper.js";
export { RiotApiCollector } from "./riotApi.js";
export { SampleCollector, loadSampleCorpus, type SampleCorpus } from "./sample.js";
export { stripHtml, extractPageLines } from "./html.js";

/** Builds the enabled collectors. The sample collector is added when nothing else is. */
export function createCollectors(config: SourcesConfig, logger: Logger): DocumentCollector[] {
  const collectors: DocumentCollector[] = [];

  if (config.useDataDragon) {
    collectors.push(
      new DataDragonCollector({
        ...(config.dataDragonVersion !== undefined && { version: config.dataDragonVersion }),
        language: config.dataDragonLanguage,
        includeItems: config.dataDragonIncludeItems,
        logger: logger.child("data_dragon"),
      })
    );
  }

  if (config.useWebScraper) {
    collectors.push(
      new WebScraperCollector({ baseUrl: config.webScraperBaseUrl, logger: logger.child("web_scraper") })
    );
  }

  if (config.useRiotApi) {
    collectors.push(
      new RiotApiCollector({
        ...(config.riotApiKey !== undefined && { apiKey: config.riotApiKey }),
        region: config.riotApiRegion,
        logger: logger.child("riot_api"),
      })
    );
  }

  if (config.useSampleData || collectors.length === 0) {
    collectors.push(new SampleCollector({ logger: logger.child("sample") }));
  }

  return collectors;
}
