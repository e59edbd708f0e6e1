import { describe, expect, it } from "vitest";
import { runDispatchLoop } from "./run_loop.js";

describe("runDispatchLoop", () => {
  it("runs one tick in single-tick mode", async () => {
    let ticks = 0;
    await runDispatchLoop({
      tick: () => {
        ticks += 1;
        return Promise.resolve();
      },
      intervalMs: 60_000,
      signal: new AbortController().signal,
      singleTick: true,
    });
    expect(ticks).toBe(1);
  });

  it("reports tick failures and keeps going until aborted", async () => {
    const controller = new AbortController();
    const errors: unknown[] = [];
    let ticks = 0;

    await runDispatchLoop({
      tick: () => {
        ticks += 1;
        if (ticks === 2) controller.abort();
        return Promise.reject(new Error(`tick ${ticks}`));
      },
      intervalMs: 0,
      signal: controller.signal,
      onError: (error) => errors.push(error),
    });

    expect(ticks).toBe(2);
    expect(errors.map((error) => (error instanceof Error ? error.message : error))).toEqual([
      "tick 1",
      "tick 2",
    ]);
  });

  it("rethrows tick failures without an error handler", async () => {
    await expect(
      runDispatchLoop({
        tick: () => Promise.reject(new Error("store unavailable")),
        intervalMs: 0,
        signal: new AbortController().signal,
      }),
    ).rejects.toThrow("store unavailable");
  });

  it("does not tick once already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    let ticks = 0;
    await runDispatchLoop({
      tick: () => {
        ticks += 1;
        return Promise.resolve();
      },
      intervalMs: 0,
      signal: controller.signal,
    });
    expect(ticks).toBe(0);
  });
});
