import { fireStatusTool } from "./fire-status.js";
import { fireTool } from "./fire.js";
import { planPreviewTool } from "./plan-preview.js";
import { stageWindowsTool } from "./stage-windows.js";
import { stopFireTool } from "./stop-fire.js";

export { fireStatusTool } from "./fire-status.js";
export { fireTool } from "./fire.js";
export { planPreviewTool } from "./plan-preview.js";
export { stageWindowsTool } from "./stage-windows.js";
export { stopFireTool } from "./stop-fire.js";

export const coreTools = [stageWindowsTool, fireTool, stopFireTool, fireStatusTool, planPreviewTool] as const;
