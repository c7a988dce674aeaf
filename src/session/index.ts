export {
  defaultStatePaths,
  FireController,
  type FireControllerOptions,
  type FireRequest,
  type FireResult,
  type FireStatus,
  type StopResult
} from "./controller.js";
export { StateStatusSurface } from "./status-surface.js";
