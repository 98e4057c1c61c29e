import type { Response } from "express";

/**
 * Signal that aborts when the client goes away before the response is
 * written, so in-flight collaborator calls stop with it.
 */
export function abortOnDisconnect(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });
  return controller.signal;
}
