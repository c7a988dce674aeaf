import { randomUUID } from "node:crypto";
import path from "node:path";
import process from "node:process";

import type { SalvoConfig } from "../config/index.js";
import type { DesktopDriver } from "../driver/index.js";
import { abortableSleep, FireSequencer, type AbortableSleep } from "../fire/index.js";
import { readStagingLedger, type TargetLedger } from "../ledger/index.js";
import { resolveUrls } from "../stage/urls.js";
import type { FireStateStore, LockRecord, SessionLock, StopRequestFile } from "../state/index.js";
import {
  createSalvoError,
  isSalvoError,
  type ActiveFireMode,
  type FireState,
  type FireSummary,
  type WindowId
} from "../types/index.js";
import { createLogger, isNodeError, type Logger } from "../utils/index.js";
import { StateStatusSurface } from "./status-surface.js";

export interface FireRequest {
  mode: ActiveFireMode;
  /** Auto mode round cap; defaults to FIRE_COUNT. */
  rounds?: number;
  prompt?: string;
  burstCount?: number;
  /** Aborting it stops the session the way stop() would. */
  signal?: AbortSignal;
}

export interface FireResult extends FireSummary {
  sessionId: string;
}

export interface StopResult {
  wasActive: boolean;
  forced: boolean;
  sessionId?: string;
}

export interface FireStatus {
  state: FireState;
  lock?: LockRecord;
  stagedWindows: number;
}

export interface FireControllerOptions {
  config: SalvoConfig;
  /** Directory the configuration was loaded from; relative URL list files resolve against it. */
  configDir: string;
  driver: DesktopDriver;
  store: FireStateStore;
  lock: SessionLock;
  stopRequests: StopRequestFile;
  ledger: TargetLedger;
  logger?: Logger;
  sleep?: AbortableSleep;
  now?: () => number;
  pid?: number;
  killProcess?: (pid: number, signal: NodeJS.Signals) => void;
  createSessionId?: () => string;
}

interface ActiveSession {
  sessionId: string;
  controller: AbortController;
  done: Promise<FireResult>;
}

const asErrorMessage = (error: unknown): string => {
  return isSalvoError(error) || error instanceof Error ? error.message : String(error);
};

/**
 * Owns the single active fire session. Starting a session stops the previous one first; stop requests
 * reach a running session through the stop request file, so `salvo stop` works from another process.
 */
export class FireController {
  private readonly options: FireControllerOptions;
  private readonly logger: Logger;
  private readonly sleep: AbortableSleep;
  private readonly now: () => number;
  private readonly pid: number;
  private readonly killProcess: (pid: number, signal: NodeJS.Signals) => void;
  private readonly createSessionId: () => string;
  private active: ActiveSession | undefined;

  public constructor(options: FireControllerOptions) {
    this.options = options;
    this.logger = options.logger ?? createLogger({ scope: "session" });
    this.sleep = options.sleep ?? abortableSleep;
    this.now = options.now ?? (() => Date.now());
    this.pid = options.pid ?? process.pid;
    this.killProcess =
      options.killProcess ??
      ((pid: number, signal: NodeJS.Signals): void => {
        process.kill(pid, signal);
      });
    this.createSessionId = options.createSessionId ?? randomUUID;
  }

  public async fire(request: FireRequest): Promise<FireResult> {
    const { config, lock } = this.options;
    const windows = await readStagingLedger(config.windowListPath);
    if (windows.length === 0) {
      throw createSalvoError("NO_STAGED_WINDOWS", "No staged windows; run stage first.", false, {
        windowList: config.windowListPath
      });
    }

    await this.stop();

    const sessionId = this.createSessionId();
    await lock.acquire(sessionId);
    await this.options.stopRequests.clear();

    const logger = this.logger.child("fire", { sessionId });
    const controller = new AbortController();
    const cancel = (): void => {
      logger.info("Fire request was cancelled; stopping the session.");
      controller.abort();
    };
    if (request.signal?.aborted === true) {
      cancel();
    } else {
      request.signal?.addEventListener("abort", cancel, { once: true });
    }

    const done = this.runSession(sessionId, request, windows, controller, logger);
    this.active = { sessionId, controller, done };

    try {
      return await done;
    } finally {
      request.signal?.removeEventListener("abort", cancel);
      if (this.active?.sessionId === sessionId) {
        this.active = undefined;
      }
    }
  }

  public async stop(): Promise<StopResult> {
    const { store, lock, config, stopRequests } = this.options;
    const active = this.active;
    active?.controller.abort();

    const state = await store.read();
    const owner = await lock.owner();

    if (owner === undefined && active === undefined) {
      if (state.mode !== "safe") {
        this.logger.warn("Resetting fire state left behind by a session that is gone.", { mode: state.mode });
        await store.write({ ...state, mode: "safe", status: "Ready" });
      }

      return { wasActive: false, forced: false };
    }

    const sessionId = active?.sessionId ?? owner?.sessionId;
    this.logger.info("Stopping fire session.", { sessionId });
    await stopRequests.request(sessionId);
    await store.update((current) => ({ ...current, mode: "stopping", status: "STOPPING" }));

    let forced = false;
    if (active !== undefined) {
      try {
        await active.done;
      } catch (error: unknown) {
        this.logger.warn("Stopped session ended with an error.", { sessionId, message: asErrorMessage(error) });
      }
    } else if (owner !== undefined) {
      forced = !(await this.waitForRelease(config.stopGraceMs));
      if (forced) {
        this.forceTerminate(owner);
        await lock.forceRemove();
      }
    }

    await stopRequests.clear();
    await store.update((current) =>
      current.mode === "stopping" || forced
        ? this.settledState(current, forced ? "STOPPED (forced)" : "STOPPED")
        : current
    );

    return {
      wasActive: true,
      forced,
      ...(sessionId === undefined ? {} : { sessionId })
    };
  }

  public async status(): Promise<FireStatus> {
    const state = await this.options.store.read();
    const owner = await this.options.lock.owner();
    const windows = await readStagingLedger(this.options.config.windowListPath);

    return {
      state,
      ...(owner === undefined ? {} : { lock: owner }),
      stagedWindows: windows.length
    };
  }

  private async runSession(
    sessionId: string,
    request: FireRequest,
    windows: readonly WindowId[],
    controller: AbortController,
    logger: Logger
  ): Promise<FireResult> {
    const { config, store, lock, driver, ledger } = this.options;
    const prompt = request.prompt ?? config.defaultPrompt;
    const burstCount = request.burstCount ?? config.burstCount;
    const roundCap = request.mode === "auto" ? (request.rounds ?? config.fireCount) : 1;
    const watcherStop = new AbortController();

    try {
      const previous = await store.read();
      const urls =
        previous.stagedUrls.length > 0 ? previous.stagedUrls : await resolveUrls(config.defaultUrl, this.options.configDir);

      await store.write({
        mode: request.mode,
        sessionId,
        round: 0,
        shots: 0,
        burstCount,
        shotDelayMs: config.shotDelayMs,
        roundDelayMs: config.roundDelayMs,
        roundCap,
        status: "STARTING",
        stagedUrls: urls,
        updatedAt: new Date(this.now()).toISOString()
      });

      const watcher = this.watchForStop(sessionId, controller, watcherStop.signal, logger);
      const sequencer = new FireSequencer({
        enumerator: driver,
        injector: driver,
        clipboard: driver,
        status: new StateStatusSurface(store, sessionId, logger),
        ledger,
        logger,
        sleep: this.sleep
      });

      let summary: FireSummary;
      try {
        summary = await sequencer.run({
          mode: request.mode,
          windows,
          prompt,
          urls,
          burstCount,
          shotDelayMs: config.shotDelayMs,
          roundDelayMs: config.roundDelayMs,
          roundCap,
          anchors: config.anchors,
          scrollTicks: config.scrollTicks,
          dropFailedWindows: config.dropFailedWindows,
          signal: controller.signal,
          onProgress: async (progress) => {
            await store.update((state) =>
              state.sessionId === sessionId ? { ...state, round: progress.round, shots: progress.shots } : state
            );
          }
        });
      } finally {
        watcherStop.abort();
        await watcher;
      }

      await store.update((state) =>
        state.sessionId === sessionId || state.mode === "stopping"
          ? this.settledState({ ...state, round: summary.rounds, shots: summary.shots }, summary.stopped ? "STOPPED" : "Ready")
          : state
      );

      return { ...summary, sessionId };
    } finally {
      await lock.release(sessionId);
    }
  }

  private settledState(state: FireState, status: string): FireState {
    const { sessionId: _sessionId, ...rest } = state;
    return { ...rest, mode: "safe", status };
  }

  private async watchForStop(
    sessionId: string,
    controller: AbortController,
    until: AbortSignal,
    logger: Logger
  ): Promise<void> {
    const { stopRequests, config } = this.options;
    while (!until.aborted && !controller.signal.aborted) {
      await this.sleep(config.stopPollIntervalMs, until);
      if (until.aborted) {
        return;
      }

      try {
        if (await stopRequests.targets(sessionId)) {
          logger.info("Stop requested by another process.");
          controller.abort();
        }
      } catch (error: unknown) {
        logger.warn("Could not read the stop request.", { message: asErrorMessage(error) });
      }
    }
  }

  private async waitForRelease(graceMs: number): Promise<boolean> {
    const { lock, config } = this.options;
    const deadline = this.now() + graceMs;
    while (this.now() < deadline) {
      if ((await lock.owner()) === undefined) {
        return true;
      }

      await this.sleep(config.stopPollIntervalMs);
    }

    return (await lock.owner()) === undefined;
  }

  private forceTerminate(owner: LockRecord): void {
    if (owner.pid === this.pid) {
      return;
    }

    try {
      this.killProcess(owner.pid, "SIGKILL");
      this.logger.warn("Force-terminated fire session.", { sessionId: owner.sessionId, pid: owner.pid });
    } catch (error: unknown) {
      if (isNodeError(error) && error.code === "ESRCH") {
        return;
      }

      throw error;
    }
  }
}

export const defaultStatePaths = (stateDir: string): { statePath: string; lockPath: string; stopRequestPath: string } => {
  return {
    statePath: path.join(stateDir, "fire_state.json"),
    lockPath: path.join(stateDir, "fire.lock"),
    stopRequestPath: path.join(stateDir, "stop_request.json")
  };
};
