import os from "node:os";
import path from "node:path";
import { mkdtemp, rm } from "node:fs/promises";

import { afterEach, describe, expect, it } from "vitest";

import { planPreviewTool } from "./plan-preview.js";
import { createToolHarness } from "./testing.js";

describe("plan_preview tool", () => {
  let tempDir: string | undefined;

  afterEach(async () => {
    if (tempDir !== undefined) {
      await rm(tempDir, { recursive: true, force: true });
      tempDir = undefined;
    }
  });

  it("plans synthetic windows from the given geometry", async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "salvo-plan-"));
    const { driver, context } = createToolHarness(tempDir);

    const result = await planPreviewTool.handler(
      {
        count: 5,
        screenWidth: 1920,
        screenHeight: 1080,
        windowWidth: 400,
        windowHeight: 300,
        maxOverlapPercent: 50,
        maxColumns: 3
      },
      context
    );

    expect(driver.displaySize).not.toHaveBeenCalled();
    expect(result.data).toMatchObject({ columns: 3, rows: 2, minShift: 200 });
    expect(result.data.placements.map((placement) => [placement.windowId, placement.x, placement.y])).toEqual([
      ["preview-1", 10, 235],
      ["preview-2", 760, 235],
      ["preview-3", 1510, 235],
      ["preview-4", 385, 545],
      ["preview-5", 1135, 545]
    ]);
  });

  it("falls back to the configuration and the display size", async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "salvo-plan-"));
    const { driver, context } = createToolHarness(tempDir);

    const result = await planPreviewTool.handler({ count: 0 }, context);

    expect(driver.displaySize).toHaveBeenCalledTimes(1);
    expect(result.data).toEqual({ columns: 6, rows: 0, minShift: 600, placements: [] });
  });
});
