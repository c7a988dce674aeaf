import { setTimeout as sleepFor } from "node:timers/promises";

import type { ClipboardSink, InputInjector, StatusSurface, WindowEnumerator } from "../driver/index.js";
import { MOUSE_BUTTONS } from "../driver/index.js";
import type { TargetLedger } from "../ledger/index.js";
import {
  isSalvoError,
  type ActiveFireMode,
  type FireProgress,
  type FireSummary,
  type Point,
  type WindowGeometry,
  type WindowId
} from "../types/index.js";
import { createLogger, type Logger } from "../utils/index.js";
import { computeInjectionPoint, type InjectionAnchors } from "./anchor.js";
import { burstPlanFor } from "./keys.js";

export type AbortableSleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Resolves after `ms`, or as soon as `signal` aborts. */
export const abortableSleep: AbortableSleep = async (ms, signal) => {
  if (ms <= 0 || signal?.aborted === true) {
    return;
  }

  try {
    await sleepFor(ms, undefined, signal === undefined ? {} : { signal });
  } catch (error: unknown) {
    if (signal?.aborted !== true) {
      throw error;
    }
  }
};

export interface FireSequencerDependencies {
  enumerator: Pick<WindowEnumerator, "geometry">;
  injector: InputInjector;
  clipboard: ClipboardSink;
  status: StatusSurface;
  ledger: Pick<TargetLedger, "appendRound">;
  logger?: Logger;
  sleep?: AbortableSleep;
}

export interface FireRunOptions {
  mode: ActiveFireMode;
  windows: readonly WindowId[];
  prompt: string;
  urls: readonly string[];
  burstCount: number;
  shotDelayMs: number;
  roundDelayMs: number;
  /** Auto mode only: stop after this many rounds; 0 or less runs until stopped. */
  roundCap?: number;
  anchors: InjectionAnchors;
  scrollTicks: number;
  dropFailedWindows: boolean;
  signal?: AbortSignal;
  onProgress?: (progress: FireProgress) => Promise<void> | void;
}

type WindowOutcome = "fired" | "missing" | "clipboard-failed" | "failed";

const asErrorMessage = (error: unknown): string => {
  return isSalvoError(error) || error instanceof Error ? error.message : String(error);
};

/**
 * Drives fire rounds over the staged windows. Stop is honoured before each window and during the
 * pause between rounds; a window that cannot be reached is skipped without ending the round.
 */
export class FireSequencer {
  private readonly dependencies: FireSequencerDependencies;
  private readonly logger: Logger;
  private readonly sleep: AbortableSleep;

  public constructor(dependencies: FireSequencerDependencies) {
    this.dependencies = dependencies;
    this.logger = dependencies.logger ?? createLogger({ scope: "fire" });
    this.sleep = dependencies.sleep ?? abortableSleep;
  }

  public async run(options: FireRunOptions): Promise<FireSummary> {
    const isStopped = (): boolean => options.signal?.aborted === true;
    const dropped = new Set<WindowId>();
    const roundCap = options.mode === "semi" ? 1 : (options.roundCap ?? 0);
    let round = 0;
    let completedRounds = 0;
    let shots = 0;
    let skippedWindows = 0;
    let stopped = false;

    await this.dependencies.status.setStatus("STARTING");

    while (true) {
      const activeWindows = options.windows.filter((id) => !dropped.has(id));
      if (activeWindows.length === 0) {
        this.logger.warn("No reachable windows left; ending the session.", { round });
        break;
      }

      round += 1;
      await this.dependencies.status.setStatus(`Round ${round} Shots ${shots} FIRING`);

      let roundInterrupted = false;
      for (const [index, id] of activeWindows.entries()) {
        if (isStopped()) {
          roundInterrupted = true;
          break;
        }

        const outcome = await this.fireWindow(id, options);
        if (outcome === "fired") {
          shots += options.burstCount;
        } else {
          skippedWindows += 1;
          if (outcome === "missing" && options.dropFailedWindows) {
            dropped.add(id);
          }
        }

        await options.onProgress?.({ round, shots, windowIndex: index, windowCount: activeWindows.length });
        await this.dependencies.status.setStatus(`Round ${round} Shots ${shots} FIRING`);
      }

      if (roundInterrupted) {
        stopped = true;
        break;
      }

      completedRounds += 1;
      await this.recordRound(options);

      if (roundCap > 0 && round >= roundCap) {
        break;
      }

      if (isStopped()) {
        stopped = true;
        break;
      }

      await this.sleep(options.roundDelayMs, options.signal);
      if (isStopped()) {
        stopped = true;
        break;
      }
    }

    await this.dependencies.status.setStatus(stopped ? "STOPPED" : `COMPLETE (${options.mode})`);
    this.logger.info("Fire session finished.", { mode: options.mode, round, completedRounds, shots, stopped });

    return {
      mode: options.mode,
      rounds: round,
      completedRounds,
      shots,
      stopped,
      skippedWindows,
      droppedWindows: [...dropped]
    };
  }

  private async recordRound(options: FireRunOptions): Promise<void> {
    for (const url of options.urls) {
      try {
        await this.dependencies.ledger.appendRound(url, options.prompt);
      } catch (error: unknown) {
        this.logger.error("Failed to append to the target ledger.", { url, message: asErrorMessage(error) });
      }
    }
  }

  private async resolveGeometry(id: WindowId): Promise<WindowGeometry | undefined> {
    try {
      return await this.dependencies.enumerator.geometry(id);
    } catch (error: unknown) {
      this.logger.warn("Geometry lookup failed.", { windowId: id, message: asErrorMessage(error) });
      return undefined;
    }
  }

  private async fireWindow(id: WindowId, options: FireRunOptions): Promise<WindowOutcome> {
    const geometry = await this.resolveGeometry(id);
    if (geometry === undefined) {
      this.logger.warn("Window is gone; skipping it this round.", { windowId: id });
      return "missing";
    }

    const { injector, clipboard } = this.dependencies;
    const point = computeInjectionPoint(geometry, options.anchors);
    const burst = burstPlanFor(options.prompt);
    let savedPointer: Point | undefined;

    try {
      await injector.activate(id);
      savedPointer = await injector.pointerLocation();
      await injector.movePointer(point, id);
      await injector.scroll(options.scrollTicks);

      if (burst.usesClipboard) {
        try {
          await clipboard.setText(options.prompt);
        } catch (error: unknown) {
          this.logger.error("Clipboard unavailable; skipping this window's burst.", {
            windowId: id,
            message: asErrorMessage(error)
          });
          return "clipboard-failed";
        }
      }

      await injector.movePointer(point, id);
      await injector.click(MOUSE_BUTTONS.left);

      for (let shot = 0; shot < options.burstCount; shot += 1) {
        await injector.sendKeys(id, burst.keys);
        await this.sleep(options.shotDelayMs);
      }

      return "fired";
    } catch (error: unknown) {
      this.logger.error("Injection failed; skipping window.", { windowId: id, message: asErrorMessage(error) });
      return "failed";
    } finally {
      if (savedPointer !== undefined) {
        await this.restorePointer(savedPointer, id);
      }
    }
  }

  private async restorePointer(point: Point, id: WindowId): Promise<void> {
    try {
      await this.dependencies.injector.movePointer(point);
    } catch (error: unknown) {
      this.logger.warn("Could not restore the pointer.", { windowId: id, message: asErrorMessage(error) });
    }
  }
}
