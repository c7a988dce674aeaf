import { createTestConfig } from "../config/testing.js";
import type { SalvoConfig } from "../config/index.js";
import { createFakeDriver } from "../driver/testing.js";
import type { PollClock } from "../readiness/index.js";
import { createSalvoRuntime } from "../runtime.js";
import type { SalvoToolContext } from "../server.js";
import { createLogger, EventLog } from "../utils/index.js";

const createManualClock = (): PollClock => {
  let nowMs = 0;
  return {
    now: () => nowMs,
    sleep: async (ms: number): Promise<void> => {
      nowMs += ms;
    }
  };
};

/** Tool context over an in-memory desktop with state files under `rootDir`. */
export const createToolHarness = (rootDir: string, overrides: Partial<SalvoConfig> = {}) => {
  const config = createTestConfig(rootDir, overrides);
  const fake = createFakeDriver();
  const logger = createLogger({ level: "error" });
  const runtime = createSalvoRuntime({
    config,
    configDir: rootDir,
    driver: fake.driver,
    logger,
    clock: createManualClock()
  });
  const context: SalvoToolContext = {
    runtime,
    metadata: { name: "salvo", version: "0.0.0-test" },
    startedAtMs: 0,
    eventLog: new EventLog(),
    logger
  };

  return { ...fake, config, runtime, context };
};
