/**
 * Route registration. Everything is mounted under /api/v1:
 * - GET  /health
 * - POST /chat
 * - POST /ingest
 * - POST /search (internal, retrieval only)
 */
import type { AppServices } from "@app/container";
import { searchRouter } from "@routes/internal/search";
import { chatRouter } from "@routes/public/chat";
import { healthRouter } from "@routes/public/health";
import { ingestRouter } from "@routes/public/ingest";
import { Router, type Express } from "express";

export const API_PREFIX = "/api/v1";

export function registerRoutes(app: Express, services: AppServices): void {
  const api = Router();

  api.use("/health", healthRouter());
  api.use("/chat", chatRouter(services.chat));
  api.use("/ingest", ingestRouter(services.ingest));
  api.use("/search", searchRouter(services.search));

  app.use(API_PREFIX, api);
}
