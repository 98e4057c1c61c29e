import {
  DeadlineExceededError,
  RequestAbortedError,
  runWithDeadline,
} from "@utils/deadline";
import { describe, expect, it } from "vitest";

const never = (): Promise<string> => new Promise(() => {});

describe("runWithDeadline", () => {
  it("returns the callee's result", async () => {
    await expect(
      runWithDeadline("lookup", async () => "pikachu", { timeoutMs: 100 })
    ).resolves.toBe("pikachu");
  });

  it("cuts off a callee that ignores its signal", async () => {
    const error = await runWithDeadline("lookup", never, {
      timeoutMs: 10,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DeadlineExceededError);
    expect(error).toHaveProperty("message", "lookup timed out after 10ms");
  });

  it("refuses to start once the caller has aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    let called = false;

    await expect(
      runWithDeadline(
        "lookup",
        async () => {
          called = true;
          return "x";
        },
        { timeoutMs: 100, signal: controller.signal }
      )
    ).rejects.toBeInstanceOf(RequestAbortedError);
    expect(called).toBe(false);
  });

  it("forwards a caller abort to the callee", async () => {
    const controller = new AbortController();
    let seen: AbortSignal | undefined;

    const pending = runWithDeadline(
      "lookup",
      (signal) => {
        seen = signal;
        return never();
      },
      { timeoutMs: 1000, signal: controller.signal }
    );
    controller.abort();

    await expect(pending).rejects.toMatchObject({
      code: "RequestAborted",
      statusCode: 499,
    });
    expect(seen?.aborted).toBe(true);
  });

  it("passes other failures through", async () => {
    const failure = new Error("boom");
    await expect(
      runWithDeadline(
        "lookup",
        async () => {
          throw failure;
        },
        { timeoutMs: 100 }
      )
    ).rejects.toBe(failure);
  });
});
