import type { z } from "zod";

import { defineSalvoTool } from "../server.js";
import { StageWindowsInputSchema, StageWindowsOutputSchema } from "../types/schemas.js";
import { toPlacementOutput } from "./helpers.js";

type StageWindowsInput = z.infer<typeof StageWindowsInputSchema>;

export const stageWindowsTool = defineSalvoTool({
  name: "stage_windows",
  title: "Stage Windows",
  description: [
    "Launches browser windows on the target URLs and arranges them into a grid.",
    "What it does: stops any running fire session, launches `count` windows cycling through the URLs, waits for the window set to settle, then resizes and moves every window and records them as the staged set.",
    "What it cannot do: it does not verify that pages finished loading; a window counts as ready once it is visible with a matching title.",
    "Defaults: `count` falls back to STAGE_COUNT, `urls` to DEFAULT_URL, `wipe` to WIPE_ON_STAGE.",
    "Common error guidance: NO_WINDOWS means nothing matching WINDOW_PATTERN appeared; check BROWSER and WINDOW_PATTERN.",
    "Safety notes: opens and optionally closes desktop windows."
  ].join("\n"),
  inputSchema: StageWindowsInputSchema,
  outputSchema: StageWindowsOutputSchema,
  handler: async (input: StageWindowsInput, context) => {
    const result = await context.runtime.stage({
      ...(input.count === undefined ? {} : { count: input.count }),
      ...(input.urls === undefined ? {} : { urls: input.urls }),
      ...(input.wipe === undefined ? {} : { wipe: input.wipe })
    });

    return {
      data: {
        requested: result.requested,
        ready: result.ready,
        shortfall: result.shortfall,
        stable: result.stable,
        urls: result.urls,
        placements: result.placements.map(toPlacementOutput)
      },
      meta: {
        ...(result.shortfall > 0
          ? { warnings: [`Only ${result.ready} of ${result.requested} windows became ready.`] }
          : {}),
        suggestions: ["Call fire() to send the prompt to the staged windows."]
      }
    };
  }
});
