import { defineSalvoTool } from "../server.js";
import { FireStatusInputSchema, FireStatusOutputSchema } from "../types/schemas.js";

export const fireStatusTool = defineSalvoTool({
  name: "fire_status",
  title: "Fire Status",
  description: [
    "Reports the persisted fire state, the session holding the lock and the number of staged windows.",
    "Also returns call and error counts for each tool this server has run.",
    "Safety notes: read-only."
  ].join("\n"),
  inputSchema: FireStatusInputSchema,
  outputSchema: FireStatusOutputSchema,
  annotations: {
    readOnlyHint: true
  },
  handler: async (_input, context) => {
    const status = await context.runtime.controller.status();
    return {
      data: {
        ...status,
        state: { ...status.state, stagedUrls: [...status.state.stagedUrls] },
        toolCalls: context.eventLog.stats()
      }
    };
  }
});
