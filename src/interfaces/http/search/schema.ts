import { z } from "zod";

export const SearchRequestSchema = z.object({
  query: z.string().trim().min(1),
  top_k: z.number().int().min(1).max(50).optional(),
});

export const SearchResponseSchema = z.object({
  query: z.string(),
  results: z.array(
    z.object({
      content: z.string(),
      score: z.number(),
      metadata: z.record(z.string()),
    })
  ),
  sources: z.array(z.string()),
});
