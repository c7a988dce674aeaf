import { describe, expect, it, vi } from "vitest";

import type { WindowEnumerator } from "../driver/index.js";
import { createSalvoError, windowId, type WindowHandle } from "../types/index.js";
import { createLogger } from "../utils/index.js";
import { awaitRecentWindows, awaitStableWindowSet, type PollClock } from "./poller.js";

const logger = createLogger({ level: "error" });

const handlesFor = (count: number): WindowHandle[] => {
  return Array.from({ length: count }, (_, index) => ({ id: windowId(String(100 + index)), title: "Example" }));
};

const createManualClock = (): PollClock & { sleeps: number[] } => {
  let nowMs = 0;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => nowMs,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      nowMs += ms;
    }
  };
};

const createEnumerator = (counts: readonly number[]) => {
  let call = 0;
  const query = vi.fn(async () => {
    const count = counts[Math.min(call, counts.length - 1)] ?? 0;
    call += 1;
    return handlesFor(count);
  });
  const enumerator: WindowEnumerator = {
    query,
    geometry: vi.fn(async () => undefined)
  };
  return { enumerator, query };
};

describe("awaitStableWindowSet", () => {
  it("waits past a transient count and reports stability at the settled total", async () => {
    const { enumerator, query } = createEnumerator([0, 2, 5, 5, 5]);
    const clock = createManualClock();

    const result = await awaitStableWindowSet(enumerator, {
      pattern: "Example",
      expectedCount: 5,
      pollIntervalMs: 100,
      stableForMs: 200,
      maxAttempts: 50,
      clock,
      logger
    });

    expect(result.stable).toBe(true);
    expect(result.handles).toHaveLength(5);
    expect(result.shortfall).toBe(0);
    expect(result.attempts).toBe(5);
    expect(query).toHaveBeenCalledTimes(5);
    expect(clock.sleeps).toEqual([100, 100, 100, 100]);
  });

  it("returns immediately without querying when nothing is expected", async () => {
    const { enumerator, query } = createEnumerator([3]);

    await expect(
      awaitStableWindowSet(enumerator, {
        pattern: "Example",
        expectedCount: 0,
        pollIntervalMs: 100,
        stableForMs: 200,
        maxAttempts: 5,
        clock: createManualClock(),
        logger
      })
    ).resolves.toEqual({ handles: [], shortfall: 0, stable: true, attempts: 0 });
    expect(query).not.toHaveBeenCalled();
  });

  it("never treats a steady empty set as stable", async () => {
    const { enumerator } = createEnumerator([0]);
    const clock = createManualClock();

    const result = await awaitStableWindowSet(enumerator, {
      pattern: "Example",
      expectedCount: 3,
      pollIntervalMs: 100,
      stableForMs: 100,
      maxAttempts: 6,
      clock,
      logger
    });

    expect(result).toEqual({ handles: [], shortfall: 3, stable: false, attempts: 6 });
    expect(clock.sleeps).toHaveLength(5);
  });

  it("returns the last partial set with its shortfall when attempts run out", async () => {
    const { enumerator } = createEnumerator([1, 2, 3, 4]);

    const result = await awaitStableWindowSet(enumerator, {
      pattern: "Example",
      expectedCount: 6,
      pollIntervalMs: 100,
      stableForMs: 300,
      maxAttempts: 4,
      clock: createManualClock(),
      logger
    });

    expect(result.stable).toBe(false);
    expect(result.handles).toHaveLength(4);
    expect(result.shortfall).toBe(2);
  });

  it("counts a failed query as an empty poll", async () => {
    const responses = [handlesFor(2), "fail", handlesFor(2), handlesFor(2), handlesFor(2)] as const;
    let call = 0;
    const enumerator: WindowEnumerator = {
      query: vi.fn(async () => {
        const response = responses[Math.min(call, responses.length - 1)];
        call += 1;
        if (response === "fail") {
          throw createSalvoError("BACKEND_FAILED", "display unavailable", true);
        }

        return response ?? [];
      }),
      geometry: vi.fn(async () => undefined)
    };

    const result = await awaitStableWindowSet(enumerator, {
      pattern: "Example",
      expectedCount: 2,
      pollIntervalMs: 100,
      stableForMs: 200,
      maxAttempts: 10,
      clock: createManualClock(),
      logger
    });

    expect(result.stable).toBe(true);
    expect(result.attempts).toBe(5);
  });
});

describe("awaitRecentWindows", () => {
  it("restricts the query to the given processes and stops once each shows a window", async () => {
    const { enumerator, query } = createEnumerator([1, 3, 4]);

    const result = await awaitRecentWindows(enumerator, {
      pattern: "Example",
      pids: [11, 12, 13, 14],
      pollIntervalMs: 100,
      maxAttempts: 120,
      clock: createManualClock(),
      logger
    });

    expect(result).toMatchObject({ shortfall: 0, stable: true, attempts: 3 });
    expect(query).toHaveBeenCalledWith("Example", { pids: [11, 12, 13, 14] });
  });

  it("reports the shortfall after the shorter attempt budget", async () => {
    const { enumerator } = createEnumerator([1]);

    const result = await awaitRecentWindows(enumerator, {
      pattern: "Example",
      pids: [11, 12],
      pollIntervalMs: 100,
      maxAttempts: 3,
      clock: createManualClock(),
      logger
    });

    expect(result).toMatchObject({ shortfall: 1, stable: false, attempts: 3 });
  });
});
