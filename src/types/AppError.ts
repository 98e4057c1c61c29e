/**
 * Error hierarchy shared by every layer of the service.
 *
 * Each error carries a coarse type, an HTTP status code and optional metadata
 * so the global error middleware can render a consistent JSON body without
 * inspecting error messages.
 */
export type AppErrorType =
  | "DomainError"
  | "InfrastructureError"
  | "AppError"
  | "ValidationError";

export interface AppErrorMetadata {
  [key: string]: unknown;
}

export class AppError extends Error {
  public readonly type: AppErrorType;
  public readonly statusCode: number | undefined;
  public readonly metadata: AppErrorMetadata | undefined;
  /** Machine-readable code surfaced to clients; defaults to the type. */
  public readonly code: string;
  /** Message safe to show to clients. */
  public readonly publicMessage: string;

  constructor(
    message: string,
    type: AppErrorType = "AppError",
    statusCode?: number,
    metadata?: AppErrorMetadata,
    options: { code?: string; publicMessage?: string; cause?: unknown } = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.type = type;
    this.statusCode = statusCode;
    this.metadata = metadata;
    this.code = options.code ?? type;
    this.publicMessage = options.publicMessage ?? message;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export class DomainError extends AppError {
  constructor(
    message: string,
    statusCode?: number,
    metadata?: AppErrorMetadata,
    options?: { code?: string; publicMessage?: string; cause?: unknown }
  ) {
    super(message, "DomainError", statusCode, metadata, options);
  }
}

export class InfrastructureError extends AppError {
  constructor(
    message: string,
    statusCode?: number,
    metadata?: AppErrorMetadata,
    options?: { code?: string; publicMessage?: string; cause?: unknown }
  ) {
    super(message, "InfrastructureError", statusCode, metadata, options);
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    statusOrMeta: number | AppErrorMetadata = 400,
    metadata?: AppErrorMetadata
  ) {
    if (typeof statusOrMeta === "number") {
      super(message, "ValidationError", statusOrMeta, metadata);
    } else {
      super(message, "ValidationError", 400, statusOrMeta);
    }
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * A chat request refused by the conversation validator. `code` carries the
 * rejection kind so clients can tell "start a new session" apart from
 * ordinary input errors.
 */
export class ConversationRejectedError extends AppError {
  constructor(kind: string, reason: string, metadata?: AppErrorMetadata) {
    super(reason, "ValidationError", 400, metadata, { code: kind });
  }
}

export type UpstreamErrorKind =
  | "EmbeddingError"
  | "SearchError"
  | "CompletionError";

const UPSTREAM_PUBLIC_MESSAGE =
  "The service is temporarily unavailable. Please try again.";

/**
 * A collaborator call (embedding, vector search, completion) failed or timed
 * out. The client only sees an opaque message and whether the whole request
 * is safe to retry; the cause stays in the logs.
 *
 * Embedding and search failures are retryable. A completion failure is left
 * to the caller.
 */
export class UpstreamError extends InfrastructureError {
  public readonly kind: UpstreamErrorKind;
  public readonly retryable: boolean;

  constructor(
    kind: UpstreamErrorKind,
    message: string,
    options: { cause?: unknown; timedOut?: boolean } = {}
  ) {
    super(
      message,
      options.timedOut ? 504 : 502,
      { kind, timedOut: options.timedOut ?? false },
      {
        code: kind,
        publicMessage: UPSTREAM_PUBLIC_MESSAGE,
        cause: options.cause,
      }
    );
    this.kind = kind;
    this.retryable = kind !== "CompletionError";
  }
}

/** Every item of an ingest run failed. */
export class IngestError extends InfrastructureError {
  constructor(message: string, metadata?: AppErrorMetadata) {
    super(message, 502, metadata, {
      code: "IngestError",
      publicMessage: message,
    });
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, "AppError", 404, undefined, { code: "NotFound" });
  }
}
