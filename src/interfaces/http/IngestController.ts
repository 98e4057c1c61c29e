/**
 * HTTP boundary for POST /ingest. Accepts either a crawl request or a text
 * document; the response reports per-item counts.
 */
import type { IngestRequest, IngestUseCase } from "@app/ingest/IngestUseCase";
import {
  IngestRequestSchema,
  IngestResponseSchema,
  type IngestRequestBody,
} from "@interfaces/http/ingest/schema";
import { abortOnDisconnect } from "@interfaces/http/requestSignal";
import type { Request, RequestHandler, Response } from "express";

function toIngestRequest(body: IngestRequestBody): IngestRequest {
  if (body.source === "pokemondb") {
    return {
      source: "pokemondb",
      crawlLimit: body.crawl_limit,
      startFrom: body.start_from,
    };
  }

  return {
    source: "text",
    title: body.title,
    content: body.content,
    metadata: body.metadata,
  };
}

export function createIngestController(ingest: IngestUseCase): RequestHandler {
  return async (req: Request, res: Response): Promise<void> => {
    const body = IngestRequestSchema.parse(req.body);

    const result = await ingest.ingest(toIngestRequest(body), {
      signal: abortOnDisconnect(res),
    });

    res.json(
      IngestResponseSchema.parse({
        message:
          result.failureCount > 0
            ? "Ingestion completed with some failures"
            : "Data ingested successfully",
        ...result,
      })
    );
  };
}
