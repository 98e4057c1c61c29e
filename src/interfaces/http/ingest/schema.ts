import { config } from "@config/index";
import { z } from "zod";

export const DEFAULT_CRAWL_LIMIT = 10;

/** Non-positive limits fall back to the default; larger ones are capped. */
export function normalizeCrawlLimit(limit: number | undefined): number {
  if (limit === undefined || limit <= 0) {
    return DEFAULT_CRAWL_LIMIT;
  }
  return Math.min(limit, config.crawler.maxLimit);
}

export const CrawlIngestSchema = z.object({
  source: z.literal("pokemondb"),
  crawl_limit: z.number().int().optional().transform(normalizeCrawlLimit),
  start_from: z.number().int().min(0).default(0),
});

export const TextIngestSchema = z.object({
  source: z.literal("text"),
  title: z.string().trim().min(1).max(200),
  content: z.string().min(1).max(1_000_000),
  metadata: z.record(z.string()).optional(),
});

export const IngestRequestSchema = z.discriminatedUnion("source", [
  CrawlIngestSchema,
  TextIngestSchema,
]);

export type IngestRequestBody = z.infer<typeof IngestRequestSchema>;

export const IngestResponseSchema = z.object({
  message: z.string(),
  successCount: z.number().int(),
  failureCount: z.number().int(),
  chunkCount: z.number().int(),
});
