import type { SalvoConfig } from "../config/index.js";
import type { DesktopDriver } from "../driver/index.js";
import { planGrid } from "../layout/index.js";
import { clearStagingLedger, readStagingLedger, writeStagingLedger, type TargetLedger } from "../ledger/index.js";
import { awaitRecentWindows, awaitStableWindowSet, systemClock, type PollClock } from "../readiness/index.js";
import type { FireStateStore } from "../state/index.js";
import { createSalvoError, isSalvoError, type DisplaySize, type GridPlan } from "../types/index.js";
import { createLogger, type Logger } from "../utils/index.js";
import { resolveUrls } from "./urls.js";

export interface StageRequest {
  count?: number;
  /** Overrides `DEFAULT_URL` for this stage. */
  urls?: readonly string[];
  wipe?: boolean;
}

export interface StageResult {
  requested: number;
  ready: number;
  shortfall: number;
  stable: boolean;
  urls: string[];
  placements: GridPlan;
}

export interface StageDependencies {
  config: SalvoConfig;
  configDir: string;
  driver: DesktopDriver;
  store: FireStateStore;
  ledger: TargetLedger;
  /** Stops whatever fire session is running before windows are touched. */
  stopFire: () => Promise<unknown>;
  clock?: PollClock;
  logger?: Logger;
}

const asErrorMessage = (error: unknown): string => {
  return isSalvoError(error) || error instanceof Error ? error.message : String(error);
};

/** The URL is glued onto the last tail flag, so a tail of `--app=` yields `--app=<url>`. */
export const buildLaunchArgs = (flags: SalvoConfig["browserFlags"], url: string): string[] => {
  const tailLast = flags.tail.at(-1);
  return [
    ...flags.head,
    ...flags.middle,
    ...flags.tail.slice(0, -1),
    tailLast === undefined ? url : `${tailLast}${url}`
  ];
};

const resolveScreen = async (config: SalvoConfig, driver: DesktopDriver): Promise<DisplaySize> => {
  if (config.screenWidth !== undefined && config.screenHeight !== undefined) {
    return { width: config.screenWidth, height: config.screenHeight };
  }

  const display = await driver.displaySize();
  return {
    width: config.screenWidth ?? display.width,
    height: config.screenHeight ?? display.height
  };
};

export const stageWindows = async (dependencies: StageDependencies, request: StageRequest = {}): Promise<StageResult> => {
  const { config, driver, store, ledger } = dependencies;
  const clock = dependencies.clock ?? systemClock;
  const logger = dependencies.logger ?? createLogger({ scope: "stage" });
  const requested = request.count ?? config.stageCount;
  const urls = request.urls === undefined ? await resolveUrls(config.defaultUrl, dependencies.configDir) : [...request.urls];

  if (urls.length === 0) {
    throw createSalvoError("INVALID_INPUT", "No target URLs to stage.", false, { defaultUrl: config.defaultUrl });
  }

  await dependencies.stopFire();

  if (request.wipe ?? config.wipeOnStage) {
    const previous = await readStagingLedger(config.windowListPath);
    for (const id of previous) {
      try {
        await driver.close(id);
      } catch (error: unknown) {
        logger.warn("Could not close a previously staged window.", { windowId: id, message: asErrorMessage(error) });
      }
    }
  }

  await clearStagingLedger(config.windowListPath);

  const pids: number[] = [];
  for (let index = 0; index < requested; index += 1) {
    const url = urls[index % urls.length] ?? config.defaultUrl;
    try {
      const launched = await driver.spawn(config.browser, buildLaunchArgs(config.browserFlags, url));
      if (launched.pid !== undefined) {
        pids.push(launched.pid);
      }
    } catch (error: unknown) {
      logger.error("Browser launch failed.", { url, message: asErrorMessage(error) });
    }

    if (index < requested - 1 && config.stageDelayMs > 0) {
      await clock.sleep(config.stageDelayMs);
    }
  }

  const recentPids = pids.slice(-Math.min(requested, config.recentWaitCount));
  const recent = await awaitRecentWindows(driver, {
    pattern: config.windowPattern,
    pids: recentPids,
    pollIntervalMs: config.pollIntervalMs,
    maxAttempts: config.recentWaitAttempts,
    clock,
    logger
  });
  logger.debug("Most recent launches checked.", { expected: recentPids.length, ready: recent.handles.length });

  const readiness = await awaitStableWindowSet(driver, {
    pattern: config.windowPattern,
    expectedCount: requested,
    stableForMs: config.stableForMs,
    pollIntervalMs: config.pollIntervalMs,
    maxAttempts: config.maxPollAttempts,
    clock,
    logger
  });

  if (readiness.handles.length === 0) {
    throw createSalvoError("NO_WINDOWS", "No browser windows appeared.", true, {
      requested,
      pattern: config.windowPattern,
      attempts: readiness.attempts
    });
  }

  const screen = await resolveScreen(config, driver);
  const placements = planGrid(readiness.handles, {
    screenWidth: screen.width,
    screenHeight: screen.height,
    windowWidth: config.windowWidth,
    windowHeight: config.windowHeight,
    margin: config.margin,
    maxOverlapPercent: config.maxOverlapPercent,
    verticalGap: config.verticalGap,
    maxColumns: config.maxColumns
  });

  for (const placement of placements) {
    const id = placement.handle.id;
    try {
      await driver.resize(id, config.windowWidth, config.windowHeight);
      await driver.move(id, placement.x, placement.y);
    } catch (error: unknown) {
      logger.warn("Could not arrange window.", { windowId: id, message: asErrorMessage(error) });
    }
  }

  await writeStagingLedger(config.windowListPath, placements);

  const header = urls.length === 1;
  for (const url of urls) {
    await ledger.ensureExists(url, { header });
  }

  await store.update((state) => ({ ...state, stagedUrls: urls }));

  if (readiness.shortfall > 0) {
    logger.warn("Fewer windows than requested are ready.", {
      requested,
      ready: readiness.handles.length,
      shortfall: readiness.shortfall
    });
  }

  logger.info("Windows staged.", { requested, ready: placements.length, urls: urls.length });

  return {
    requested,
    ready: placements.length,
    shortfall: readiness.shortfall,
    stable: readiness.stable,
    urls,
    placements
  };
};
