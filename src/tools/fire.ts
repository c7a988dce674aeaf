import type { z } from "zod";

import { defineSalvoTool } from "../server.js";
import { FireInputSchema, FireSummarySchema } from "../types/schemas.js";

type FireInput = z.infer<typeof FireInputSchema>;

export const fireTool = defineSalvoTool({
  name: "fire",
  title: "Fire Prompt",
  description: [
    "Sends the prompt to every staged window, one round after another.",
    "What it does: stops any running session, then for each staged window focuses it, pastes the prompt into the input area and submits it `burstCount` times; every completed round adds one line to each target ledger.",
    "What it cannot do: it cannot confirm that a page accepted the prompt.",
    "Defaults: `mode` is semi (exactly one round); auto runs `rounds` rounds, falling back to FIRE_COUNT, where 0 means until stop_fire() is called. The call returns when the session ends; cancelling the request stops the session.",
    "Common error guidance: NO_STAGED_WINDOWS means stage_windows() has not run or its windows were cleared.",
    "Safety notes: injects keyboard and mouse input into desktop windows."
  ].join("\n"),
  inputSchema: FireInputSchema,
  outputSchema: FireSummarySchema,
  handler: async (input: FireInput, context) => {
    const result = await context.runtime.controller.fire({
      mode: input.mode,
      ...(input.rounds === undefined ? {} : { rounds: input.rounds }),
      ...(input.prompt === undefined ? {} : { prompt: input.prompt }),
      ...(input.burstCount === undefined ? {} : { burstCount: input.burstCount }),
      ...(context.signal === undefined ? {} : { signal: context.signal })
    });

    const warnings = [
      ...(result.stopped ? ["The session was stopped before it finished."] : []),
      ...(result.skippedWindows > 0 ? [`${result.skippedWindows} window visits were skipped.`] : [])
    ];

    return {
      data: {
        sessionId: result.sessionId,
        mode: result.mode,
        rounds: result.rounds,
        completedRounds: result.completedRounds,
        shots: result.shots,
        stopped: result.stopped,
        skippedWindows: result.skippedWindows,
        droppedWindows: [...result.droppedWindows]
      },
      ...(warnings.length === 0 ? {} : { meta: { warnings } })
    };
  }
});
