import { describe, expect, it, vi } from "vitest";

import type { ClipboardSink, InputInjector, StatusSurface } from "../driver/index.js";
import { createSalvoError, windowId, type WindowGeometry, type WindowId } from "../types/index.js";
import { createLogger } from "../utils/index.js";
import { FireSequencer, type FireRunOptions } from "./sequencer.js";

const logger = createLogger({ level: "error" });
const GEOMETRY: WindowGeometry = { x: 0, y: 0, width: 800, height: 600 };
const SAVED_POINTER = { x: 5, y: 6 };

const createHarness = (options: { missing?: readonly string[] } = {}) => {
  const missing = new Set(options.missing ?? []);
  const injector = {
    activate: vi.fn(async (_id: WindowId): Promise<void> => {}),
    pointerLocation: vi.fn(async () => SAVED_POINTER),
    movePointer: vi.fn(async (_point: { x: number; y: number }, _relativeTo?: WindowId): Promise<void> => {}),
    click: vi.fn(async (_button: number): Promise<void> => {}),
    scroll: vi.fn(async (_ticks: number): Promise<void> => {}),
    sendKeys: vi.fn(async (_id: WindowId, _keys: readonly string[]): Promise<void> => {})
  } satisfies InputInjector;
  const clipboard = { setText: vi.fn(async (_text: string): Promise<void> => {}) } satisfies ClipboardSink;
  const status = { setStatus: vi.fn(async (_text: string): Promise<void> => {}) } satisfies StatusSurface;
  const ledger = { appendRound: vi.fn(async (_url: string, _prompt: string): Promise<void> => {}) };
  const geometry = vi.fn(async (id: WindowId) => (missing.has(id) ? undefined : GEOMETRY));
  const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal): Promise<void> => {});
  const sequencer = new FireSequencer({ enumerator: { geometry }, injector, clipboard, status, ledger, logger, sleep });

  return { sequencer, injector, clipboard, status, ledger, geometry, sleep };
};

const baseOptions = (overrides: Partial<FireRunOptions> = {}): FireRunOptions => ({
  mode: "semi",
  windows: ["101", "202", "303"].map((id) => windowId(id)),
  prompt: "hello",
  urls: ["https://example.test/chat"],
  burstCount: 2,
  shotDelayMs: 250,
  roundDelayMs: 1000,
  anchors: {
    xFromLeft: { kind: "percent", value: 50 },
    yFromBottom: { kind: "pixels", value: 90 }
  },
  scrollTicks: 3,
  dropFailedWindows: false,
  ...overrides
});

describe("FireSequencer", () => {
  it("runs a single round in semi mode", async () => {
    const { sequencer, injector, ledger, clipboard } = createHarness();

    const summary = await sequencer.run(baseOptions());

    expect(summary).toEqual({
      mode: "semi",
      rounds: 1,
      completedRounds: 1,
      shots: 6,
      stopped: false,
      skippedWindows: 0,
      droppedWindows: []
    });
    expect(injector.activate.mock.calls.map(([id]) => id)).toEqual(["101", "202", "303"]);
    expect(injector.sendKeys).toHaveBeenCalledTimes(6);
    expect(injector.sendKeys).toHaveBeenCalledWith("101", ["ctrl+a", "ctrl+v", "Return"]);
    expect(clipboard.setText).toHaveBeenCalledWith("hello");
    expect(ledger.appendRound).toHaveBeenCalledTimes(1);
    expect(ledger.appendRound).toHaveBeenCalledWith("https://example.test/chat", "hello");
  });

  it("performs the per-window steps in order and restores the pointer", async () => {
    const { sequencer, injector } = createHarness();

    await sequencer.run(baseOptions({ windows: [windowId("101")], burstCount: 1 }));

    expect(injector.movePointer.mock.calls).toEqual([
      [{ x: 400, y: 510 }, "101"],
      [{ x: 400, y: 510 }, "101"],
      [SAVED_POINTER]
    ]);
    expect(injector.scroll).toHaveBeenCalledWith(3);
    expect(injector.click).toHaveBeenCalledWith(1);
  });

  it("runs exactly the capped number of rounds in auto mode, pausing between them", async () => {
    const { sequencer, ledger, sleep } = createHarness();

    const summary = await sequencer.run(baseOptions({ mode: "auto", roundCap: 3 }));

    expect(summary).toMatchObject({ mode: "auto", rounds: 3, completedRounds: 3, shots: 18, stopped: false });
    expect(ledger.appendRound).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.filter(([ms]) => ms === 1000)).toHaveLength(2);
  });

  it("appends one ledger line per round, not per window", async () => {
    const { sequencer, ledger } = createHarness();

    await sequencer.run(baseOptions({ mode: "auto", roundCap: 2 }));

    expect(ledger.appendRound).toHaveBeenCalledTimes(2);
  });

  it("halts before the next window when stopped mid-round and leaves the pointer restored", async () => {
    const { sequencer, injector, ledger } = createHarness();
    const controller = new AbortController();
    injector.activate.mockImplementation(async (id: WindowId) => {
      if (id === windowId("202")) {
        controller.abort();
      }
    });

    const summary = await sequencer.run(baseOptions({ mode: "auto", roundCap: 0, signal: controller.signal }));

    expect(summary).toMatchObject({ rounds: 1, completedRounds: 0, shots: 4, stopped: true });
    expect(injector.activate.mock.calls.map(([id]) => id)).toEqual(["101", "202"]);
    expect(injector.movePointer.mock.calls.at(-1)).toEqual([SAVED_POINTER]);
    expect(ledger.appendRound).not.toHaveBeenCalled();
  });

  it("ends an unbounded auto session when stopped during the pause between rounds", async () => {
    const { sequencer, sleep, ledger } = createHarness();
    const controller = new AbortController();
    sleep.mockImplementation(async (ms: number) => {
      if (ms === 1000) {
        controller.abort();
      }
    });

    const summary = await sequencer.run(baseOptions({ mode: "auto", signal: controller.signal }));

    expect(summary).toMatchObject({ rounds: 1, completedRounds: 1, stopped: true });
    expect(ledger.appendRound).toHaveBeenCalledTimes(1);
  });

  it("skips windows without geometry and retries them next round by default", async () => {
    const { sequencer, geometry } = createHarness({ missing: ["202"] });

    const summary = await sequencer.run(baseOptions({ mode: "auto", roundCap: 2 }));

    expect(summary).toMatchObject({ shots: 8, skippedWindows: 2, droppedWindows: [] });
    expect(geometry.mock.calls.filter(([id]) => id === "202")).toHaveLength(2);
  });

  it("drops windows without geometry for the rest of the session when configured", async () => {
    const { sequencer, geometry } = createHarness({ missing: ["202"] });

    const summary = await sequencer.run(baseOptions({ mode: "auto", roundCap: 2, dropFailedWindows: true }));

    expect(summary).toMatchObject({ shots: 8, skippedWindows: 1, droppedWindows: ["202"] });
    expect(geometry.mock.calls.filter(([id]) => id === "202")).toHaveLength(1);
  });

  it("skips the burst when the clipboard fails and keeps going", async () => {
    const { sequencer, clipboard, injector } = createHarness();
    clipboard.setText.mockRejectedValueOnce(createSalvoError("BACKEND_FAILED", "no clipboard", true));

    const summary = await sequencer.run(baseOptions());

    expect(summary).toMatchObject({ shots: 4, skippedWindows: 1 });
    expect(injector.sendKeys.mock.calls.map(([id]) => id)).toEqual(["202", "202", "303", "303"]);
    expect(injector.movePointer.mock.calls[1]).toEqual([SAVED_POINTER]);
  });

  it("restores the pointer when injection throws", async () => {
    const { sequencer, injector } = createHarness();
    injector.click.mockRejectedValueOnce(new Error("display gone"));

    const summary = await sequencer.run(baseOptions({ windows: [windowId("101")] }));

    expect(summary).toMatchObject({ shots: 0, skippedWindows: 1, completedRounds: 1 });
    expect(injector.movePointer.mock.calls.at(-1)).toEqual([SAVED_POINTER]);
  });

  it("sends the special clear and submit sequences without the clipboard", async () => {
    const clear = createHarness();
    await clear.sequencer.run(baseOptions({ prompt: "~", windows: [windowId("101")], burstCount: 1 }));
    expect(clear.injector.sendKeys).toHaveBeenCalledWith("101", ["ctrl+a", "Delete", "Return"]);
    expect(clear.clipboard.setText).not.toHaveBeenCalled();

    const submit = createHarness();
    await submit.sequencer.run(baseOptions({ prompt: "#", windows: [windowId("101")], burstCount: 1 }));
    expect(submit.injector.sendKeys).toHaveBeenCalledWith("101", ["Return"]);
    expect(submit.clipboard.setText).not.toHaveBeenCalled();
  });

  it("reports progress after each window", async () => {
    const { sequencer, status } = createHarness();
    const onProgress = vi.fn();

    await sequencer.run(baseOptions({ onProgress }));

    expect(onProgress.mock.calls.map(([progress]) => progress)).toEqual([
      { round: 1, shots: 2, windowIndex: 0, windowCount: 3 },
      { round: 1, shots: 4, windowIndex: 1, windowCount: 3 },
      { round: 1, shots: 6, windowIndex: 2, windowCount: 3 }
    ]);
    expect(status.setStatus).toHaveBeenLastCalledWith("COMPLETE (semi)");
  });
});
