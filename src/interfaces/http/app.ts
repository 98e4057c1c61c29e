/**
 * Express application factory, shared by the server entry point and the
 * HTTP tests.
 */
import type { AppServices } from "@app/container";
import { errorHandler } from "@middleware/errorHandler";
import { registerRoutes } from "@routes/index";
import { NotFoundError } from "@typesLocal/AppError";
import express, { type Express } from "express";

export function createApp(services: AppServices): Express {
  const app = express();

  app.disable("x-powered-by");
  app.use(express.json({ limit: "2mb" }));

  registerRoutes(app, services);

  app.use((req, _res, next) => {
    next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
  });

  app.use(errorHandler);

  return app;
}
