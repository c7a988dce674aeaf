export { buildLaunchArgs, stageWindows, type StageDependencies, type StageRequest, type StageResult } from "./stage.js";
export { resolveUrls } from "./urls.js";
