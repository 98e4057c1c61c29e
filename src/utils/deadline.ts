/**
 * Bounded collaborator calls.
 *
 * `runWithDeadline` gives the callee an AbortSignal that fires when either the
 * timeout elapses or the inbound request is cancelled, and reports which of
 * the two happened.
 */
import { AppError } from "@typesLocal/AppError";

export class DeadlineExceededError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
    options?: { cause?: unknown }
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`, options);
    this.name = "DeadlineExceededError";
  }
}

/** The caller gave up; nothing is left to answer. */
export class RequestAbortedError extends AppError {
  constructor(operation: string, options: { cause?: unknown } = {}) {
    super(`${operation} aborted by caller`, "AppError", 499, { operation }, {
      code: "RequestAborted",
      cause: options.cause,
    });
  }
}

export interface DeadlineOptions {
  timeoutMs: number;
  signal?: AbortSignal | undefined;
}

export async function runWithDeadline<T>(
  operation: string,
  fn: (signal: AbortSignal) => Promise<T>,
  { timeoutMs, signal }: DeadlineOptions
): Promise<T> {
  if (signal?.aborted) {
    throw new RequestAbortedError(operation);
  }

  const controller = new AbortController();
  let timedOut = false;

  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onAbort = (): void => controller.abort();
  signal?.addEventListener("abort", onAbort, { once: true });

  // Callees that ignore the signal are still cut off.
  const abandoned = new Promise<never>((_resolve, reject) => {
    controller.signal.addEventListener(
      "abort",
      () => reject(new Error(`${operation} abandoned`)),
      { once: true }
    );
  });

  try {
    return await Promise.race([fn(controller.signal), abandoned]);
  } catch (error: unknown) {
    if (timedOut) {
      throw new DeadlineExceededError(operation, timeoutMs, { cause: error });
    }
    if (signal?.aborted) {
      throw new RequestAbortedError(operation, { cause: error });
    }
    throw error;
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", onAbort);
  }
}

/** Resolves after `ms`, or rejects as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error("aborted"));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new Error("aborted"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
