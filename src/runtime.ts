import type { SalvoConfig } from "./config/index.js";
import type { DesktopDriver } from "./driver/index.js";
import { XdotoolDriver } from "./driver/xdotool.js";
import { TargetLedger } from "./ledger/index.js";
import type { PollClock } from "./readiness/index.js";
import { defaultStatePaths, FireController } from "./session/index.js";
import { stageWindows, type StageRequest, type StageResult } from "./stage/index.js";
import { FireStateStore, SessionLock, StopRequestFile } from "./state/index.js";
import { createLogger, type Logger } from "./utils/index.js";

export interface SalvoRuntimeOptions {
  config: SalvoConfig;
  configDir: string;
  driver?: DesktopDriver;
  logger?: Logger;
  clock?: PollClock;
}

/** Everything one control surface needs, wired from a resolved configuration. */
export interface SalvoRuntime {
  config: SalvoConfig;
  configDir: string;
  driver: DesktopDriver;
  store: FireStateStore;
  lock: SessionLock;
  ledger: TargetLedger;
  controller: FireController;
  logger: Logger;
  stage: (request?: StageRequest) => Promise<StageResult>;
}

export const createSalvoRuntime = (options: SalvoRuntimeOptions): SalvoRuntime => {
  const { config, configDir } = options;
  const logger = options.logger ?? createLogger({ level: config.logLevel });
  const driver = options.driver ?? new XdotoolDriver({ logger: logger.child("xdotool") });
  const paths = defaultStatePaths(config.stateDir);
  const store = new FireStateStore(paths.statePath, { logger: logger.child("state") });
  const lock = new SessionLock(paths.lockPath, { logger: logger.child("lock") });
  const ledger = new TargetLedger(config.targetDir);
  const controller = new FireController({
    config,
    configDir,
    driver,
    store,
    lock,
    stopRequests: new StopRequestFile(paths.stopRequestPath, { logger: logger.child("stop-request") }),
    ledger,
    logger: logger.child("session")
  });

  return {
    config,
    configDir,
    driver,
    store,
    lock,
    ledger,
    controller,
    logger,
    stage: async (request: StageRequest = {}): Promise<StageResult> => {
      return await stageWindows(
        {
          config,
          configDir,
          driver,
          store,
          ledger,
          stopFire: async () => await controller.stop(),
          logger: logger.child("stage"),
          ...(options.clock === undefined ? {} : { clock: options.clock })
        },
        request
      );
    }
  };
};
