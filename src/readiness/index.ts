export {
  awaitRecentWindows,
  awaitStableWindowSet,
  systemClock,
  type PollClock,
  type ReadinessResult,
  type RecentWindowsOptions,
  type StableWindowSetOptions
} from "./poller.js";
