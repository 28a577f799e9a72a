import { describe, expect, it } from "vitest";
import { RequestCancelled, TimeoutError } from "../src/utils/errors";
import { withTimeout } from "../src/utils/timeout";

const never = (signal: AbortSignal) =>
  new Promise<string>((_, reject) => signal.addEventListener("abort", () => reject(signal.reason), { once: true }));

describe("withTimeout", () => {
  it("returns the operation's value", async () => {
    await expect(withTimeout(async () => "done", 1000, "lookup")).resolves.toBe("done");
  });

  it("aborts the operation at the deadline", async () => {
    let seen: AbortSignal | undefined;
    const run = withTimeout(
      (signal) => {
        seen = signal;
        return never(signal);
      },
      20,
      "lookup"
    );
    await expect(run).rejects.toThrow(new TimeoutError("lookup", 20).message);
    expect(seen?.aborted).toBe(true);
  });

  it("follows the caller's signal", async () => {
    const controller = new AbortController();
    const run = withTimeout(never, 1000, "lookup", controller.signal);
    controller.abort(new Error("client went away"));
    await expect(run).rejects.toThrow("client went away");
  });

  it("passes the caller's cancellation reason to the operation", async () => {
    const controller = new AbortController();
    let seen: unknown;
    const run = withTimeout(
      (signal) => {
        signal.addEventListener("abort", () => (seen = signal.reason), { once: true });
        return never(signal);
      },
      1000,
      "lookup",
      controller.signal
    );
    controller.abort(new RequestCancelled());
    await expect(run).rejects.toBeInstanceOf(RequestCancelled);
    expect(seen).toBeInstanceOf(RequestCancelled);
  });

  it("refuses to start once the caller has aborted", async () => {
    const controller = new AbortController();
    controller.abort(new Error("already gone"));
    await expect(withTimeout(async () => "done", 1000, "lookup", controller.signal)).rejects.toThrow("already gone");
  });
});
