export { slugForUrl, TargetLedger, targetFileName, type EnsureTargetOptions } from "./targets.js";
export { clearStagingLedger, readStagingLedger, writeStagingLedger } from "./staging.js";
