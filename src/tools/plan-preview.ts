import type { z } from "zod";

import { computeGridShape, planGrid, type GridOptions } from "../layout/index.js";
import { defineSalvoTool, type SalvoToolContext } from "../server.js";
import { windowId, type DisplaySize } from "../types/index.js";
import { PlanPreviewInputSchema, PlanPreviewOutputSchema } from "../types/schemas.js";
import { toPlacementOutput } from "./helpers.js";

type PlanPreviewInput = z.infer<typeof PlanPreviewInputSchema>;

const resolveScreen = async (input: PlanPreviewInput, context: SalvoToolContext): Promise<DisplaySize> => {
  const { config, driver } = context.runtime;
  const width = input.screenWidth ?? config.screenWidth;
  const height = input.screenHeight ?? config.screenHeight;
  if (width !== undefined && height !== undefined) {
    return { width, height };
  }

  const display = await driver.displaySize();
  return { width: width ?? display.width, height: height ?? display.height };
};

export const planPreviewTool = defineSalvoTool({
  name: "plan_preview",
  title: "Preview Grid Plan",
  description: [
    "Computes where `count` windows would be placed, without launching or moving anything.",
    "Defaults: every unset geometry field comes from the configuration; the screen size comes from SCREEN_WIDTH/SCREEN_HEIGHT or the display.",
    "Safety notes: read-only."
  ].join("\n"),
  inputSchema: PlanPreviewInputSchema,
  outputSchema: PlanPreviewOutputSchema,
  annotations: {
    readOnlyHint: true
  },
  handler: async (input: PlanPreviewInput, context) => {
    const { config } = context.runtime;
    const screen = await resolveScreen(input, context);
    const options: GridOptions = {
      screenWidth: screen.width,
      screenHeight: screen.height,
      windowWidth: input.windowWidth ?? config.windowWidth,
      windowHeight: input.windowHeight ?? config.windowHeight,
      margin: config.margin,
      maxOverlapPercent: input.maxOverlapPercent ?? config.maxOverlapPercent,
      verticalGap: config.verticalGap,
      maxColumns: input.maxColumns ?? config.maxColumns
    };
    const handles = Array.from({ length: input.count }, (_, index) => ({
      id: windowId(`preview-${index + 1}`),
      title: ""
    }));
    const shape = computeGridShape(input.count, options);

    return {
      data: {
        columns: shape.columns,
        rows: shape.rows,
        minShift: shape.minShift,
        placements: planGrid(handles, options).map(toPlacementOutput)
      }
    };
  }
});
