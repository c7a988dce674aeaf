import { setTimeout as sleepFor } from "node:timers/promises";

import type { WindowEnumerator } from "../driver/index.js";
import { isSalvoError, type WindowHandle } from "../types/index.js";
import { createLogger, type Logger } from "../utils/index.js";

export interface PollClock {
  now: () => number;
  sleep: (ms: number) => Promise<void>;
}

export const systemClock: PollClock = {
  now: () => Date.now(),
  sleep: async (ms: number): Promise<void> => {
    await sleepFor(ms);
  }
};

interface PollerBaseOptions {
  pattern: string;
  pollIntervalMs: number;
  maxAttempts: number;
  clock?: PollClock;
  logger?: Logger;
}

export interface StableWindowSetOptions extends PollerBaseOptions {
  expectedCount: number;
  stableForMs: number;
  pids?: readonly number[];
}

export interface RecentWindowsOptions extends PollerBaseOptions {
  /** Processes of the most recent launches; each is expected to show one window. */
  pids: readonly number[];
}

export interface ReadinessResult {
  handles: readonly WindowHandle[];
  shortfall: number;
  stable: boolean;
  attempts: number;
}

const asErrorMessage = (error: unknown): string => {
  return isSalvoError(error) || error instanceof Error ? error.message : String(error);
};

const queryOrEmpty = async (
  enumerator: WindowEnumerator,
  options: PollerBaseOptions & { pids?: readonly number[] },
  logger: Logger,
  attempt: number
): Promise<WindowHandle[]> => {
  try {
    return await enumerator.query(options.pattern, options.pids === undefined ? {} : { pids: options.pids });
  } catch (error: unknown) {
    logger.warn("Window query failed; counting this poll as empty.", {
      attempt,
      message: asErrorMessage(error)
    });
    return [];
  }
};

/**
 * Polls until the number of matching windows has stayed the same for `stableForMs`. An empty set is
 * never stable while windows are expected. Running out of attempts is not an error: the last result
 * is returned with the shortfall against `expectedCount`.
 */
export const awaitStableWindowSet = async (
  enumerator: WindowEnumerator,
  options: StableWindowSetOptions
): Promise<ReadinessResult> => {
  if (options.expectedCount <= 0) {
    return { handles: [], shortfall: 0, stable: true, attempts: 0 };
  }

  const clock = options.clock ?? systemClock;
  const logger = options.logger ?? createLogger({ scope: "readiness" });
  let lastTotal: number | undefined;
  let stableSinceMs = clock.now();
  let handles: WindowHandle[] = [];
  let attempts = 0;

  while (attempts < options.maxAttempts) {
    attempts += 1;
    handles = await queryOrEmpty(enumerator, options, logger, attempts);
    const total = handles.length;
    const nowMs = clock.now();

    if (total !== lastTotal) {
      lastTotal = total;
      stableSinceMs = nowMs;
    } else if (total > 0 && nowMs - stableSinceMs >= options.stableForMs) {
      logger.debug("Window set is stable.", { total, attempts });
      return {
        handles,
        shortfall: Math.max(0, options.expectedCount - total),
        stable: true,
        attempts
      };
    }

    if (attempts < options.maxAttempts) {
      await clock.sleep(options.pollIntervalMs);
    }
  }

  const shortfall = Math.max(0, options.expectedCount - handles.length);
  logger.warn("Window set did not stabilize before attempts ran out.", {
    attempts,
    ready: handles.length,
    expected: options.expectedCount
  });

  return { handles, shortfall, stable: false, attempts };
};

/**
 * Waits until every one of the given processes shows a matching window, or attempts run out.
 */
export const awaitRecentWindows = async (
  enumerator: WindowEnumerator,
  options: RecentWindowsOptions
): Promise<ReadinessResult> => {
  const expectedCount = options.pids.length;
  if (expectedCount === 0) {
    return { handles: [], shortfall: 0, stable: true, attempts: 0 };
  }

  const clock = options.clock ?? systemClock;
  const logger = options.logger ?? createLogger({ scope: "readiness" });
  let handles: WindowHandle[] = [];
  let attempts = 0;

  while (attempts < options.maxAttempts) {
    attempts += 1;
    handles = await queryOrEmpty(enumerator, options, logger, attempts);
    if (handles.length >= expectedCount) {
      return { handles, shortfall: 0, stable: true, attempts };
    }

    if (attempts < options.maxAttempts) {
      await clock.sleep(options.pollIntervalMs);
    }
  }

  logger.warn("Only some of the most recent windows appeared.", {
    ready: handles.length,
    expected: expectedCount
  });

  return { handles, shortfall: expectedCount - handles.length, stable: false, attempts };
};
