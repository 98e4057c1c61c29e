/**
 * Global error handling middleware.
 *
 * Every error leaving a route is rendered as
 * `{ error: { message, code, details } }`. Infrastructure failures only
 * expose their public message and, for upstream calls, a retry hint. Their
 * cause is logged, never returned.
 */
import { logger } from "@infrastructure/logging/Logger";
import {
  AppError,
  InfrastructureError,
  UpstreamError,
  ValidationError,
  isAppError,
  type AppErrorMetadata,
} from "@typesLocal/AppError";
import type { NextFunction, Request, Response } from "express";
import { ZodError } from "zod";

function readStatus(err: object): number | undefined {
  const status = "status" in err ? err.status : undefined;
  return typeof status === "number" ? status : undefined;
}

function toAppError(err: unknown): AppError {
  if (isAppError(err)) {
    return err;
  }

  if (err instanceof ZodError) {
    return new ValidationError("Invalid request body", {
      issues: err.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    });
  }

  // body-parser marks malformed JSON and oversized bodies with a 4xx status.
  if (err instanceof Error) {
    const status = readStatus(err);
    if (status !== undefined && status >= 400 && status < 500) {
      return new ValidationError(err.message, status);
    }
  }

  return new InfrastructureError(
    err instanceof Error ? err.message : String(err),
    500,
    undefined,
    { publicMessage: "Internal Server Error", cause: err }
  );
}

// Infrastructure errors expose nothing but the retry hint of an upstream failure.
function publicDetails(appError: AppError): AppErrorMetadata {
  if (appError instanceof UpstreamError) {
    return { retryable: appError.retryable };
  }
  if (appError.type === "InfrastructureError") {
    return {};
  }
  return appError.metadata ?? {};
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const appError = toAppError(err);
  const status = appError.statusCode ?? 500;

  logger.log(status >= 500 ? "error" : "warn", "REQUEST_FAILED", {
    method: req.method,
    path: req.originalUrl,
    type: appError.type,
    code: appError.code,
    statusCode: status,
    message: appError.message,
    cause:
      appError.cause instanceof Error ? appError.cause.message : undefined,
  });

  res.status(status).json({
    error: {
      message: appError.publicMessage,
      code: appError.code,
      details: publicDetails(appError),
    },
  });
}
