import type { IngestUseCase } from "@app/ingest/IngestUseCase";
import { createIngestController } from "@interfaces/http/IngestController";
import { Router } from "express";

export function ingestRouter(ingest: IngestUseCase): Router {
  const router = Router();
  router.post("/", createIngestController(ingest));
  return router;
}
