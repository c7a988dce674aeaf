import type { SalvoConfig } from "./schema.js";

/** Fully populated settings for tests; paths point into `rootDir`. */
export const createTestConfig = (rootDir: string, overrides: Partial<SalvoConfig> = {}): SalvoConfig => {
  return {
    browser: "test-browser",
    browserFlags: { head: ["--new-window"], middle: [], tail: [] },
    defaultUrl: "https://example.test/chat",
    defaultPrompt: "hello",
    windowPattern: "Example",
    windowWidth: 800,
    windowHeight: 600,
    maxOverlapPercent: 25,
    maxColumns: 0,
    margin: 10,
    verticalGap: 10,
    anchors: {
      xFromLeft: { kind: "percent", value: 50 },
      yFromBottom: { kind: "pixels", value: 90 }
    },
    shotDelayMs: 0,
    roundDelayMs: 0,
    burstCount: 1,
    fireCount: 0,
    stageCount: 3,
    stageDelayMs: 0,
    pollIntervalMs: 1,
    stableForMs: 2,
    maxPollAttempts: 20,
    recentWaitCount: 4,
    recentWaitAttempts: 5,
    scrollTicks: 3,
    targetDir: `${rootDir}/targets`,
    windowListPath: `${rootDir}/.salvo/live_windows.txt`,
    stateDir: `${rootDir}/.salvo`,
    dropFailedWindows: false,
    wipeOnStage: false,
    stopGraceMs: 50,
    stopPollIntervalMs: 5,
    logLevel: "error",
    ...overrides
  };
};
