import { defineSalvoTool } from "../server.js";
import { StopFireInputSchema, StopFireOutputSchema } from "../types/schemas.js";

export const stopFireTool = defineSalvoTool({
  name: "stop_fire",
  title: "Stop Fire",
  description: [
    "Stops the running fire session, wherever it runs.",
    "What it does: marks the persisted state as stopping, waits STOP_GRACE seconds for the session to let go of its lock and force-terminates it otherwise.",
    "Defaults: no input.",
    "Safety notes: returns to safe mode; calling it while idle is harmless."
  ].join("\n"),
  inputSchema: StopFireInputSchema,
  outputSchema: StopFireOutputSchema,
  handler: async (_input, context) => {
    const result = await context.runtime.controller.stop();
    return {
      data: result,
      ...(result.forced ? { meta: { warnings: ["The session did not stop in time and was terminated."] } } : {})
    };
  }
});
