import { z } from "zod";

export const DocumentTypeSchema = z.enum([
  "champion",
  "item",
  "game_mechanics",
  "items",
  "ranked",
  "lore",
  "champion_rotation",
]);

export const SourceNameSchema = z.enum(["data_dragon", "web_scraper", "riot_api", "sample"]);

export const DocumentMetadataSchema = z.object({
  type: DocumentTypeSchema,
  source: SourceNameSchema,
  champion: z.string().optional(),
  role: z.string().optional(),
  version: z.string().optional(),
  url: z.string().optional(),
  region: z.string().optional(),
});

export const DocumentSchema = z.object({
  text: z.string(),
  metadata: DocumentMetadataSchema,
});

export const QueuedJobSchema = z.object({
  jobId: z.string().min(1),
  sources: z.array(z.string()).nullable().default(null),
  forceRefresh: z.boolean().default(false),
});

export const ConversationTurnSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
});
