import os from "node:os";
import path from "node:path";
import { mkdtemp, readFile, rm } from "node:fs/promises";

import { afterEach, describe, expect, it, vi } from "vitest";

import { createTestConfig } from "../config/testing.js";
import { createFakeDriver } from "../driver/testing.js";
import { TargetLedger, writeStagingLedger } from "../ledger/index.js";
import { FireStateStore, SessionLock, StopRequestFile } from "../state/index.js";
import { windowId, type WindowId } from "../types/index.js";
import { createLogger } from "../utils/index.js";
import { defaultStatePaths, FireController } from "./controller.js";

const logger = createLogger({ level: "error" });

const createHarness = async (rootDir: string, stagedIds: readonly string[] = ["101", "202", "303"]) => {
  const config = createTestConfig(rootDir);
  const { driver } = createFakeDriver({ windows: stagedIds.map((id) => ({ id: windowId(id), title: "Example" })) });
  const paths = defaultStatePaths(config.stateDir);
  const store = new FireStateStore(paths.statePath, { logger });
  const lock = new SessionLock(paths.lockPath, { logger });
  const stopRequests = new StopRequestFile(paths.stopRequestPath, { logger });
  const ledger = new TargetLedger(config.targetDir);
  let sessionCounter = 0;

  await rm(config.windowListPath, { force: true });
  if (stagedIds.length > 0) {
    await writeStagingLedger(
      config.windowListPath,
      stagedIds.map((id, index) => ({ handle: { id: windowId(id), title: "Example" }, x: index, y: 0, row: 0, column: index }))
    );
  }

  const controller = new FireController({
    config,
    configDir: rootDir,
    driver,
    store,
    lock,
    stopRequests,
    ledger,
    logger,
    createSessionId: () => {
      sessionCounter += 1;
      return `session-${sessionCounter}`;
    }
  });

  return { config, driver, store, lock, stopRequests, ledger, controller, paths };
};

describe("FireController", () => {
  let tempDir: string | undefined;

  afterEach(async () => {
    if (tempDir !== undefined) {
      await rm(tempDir, { recursive: true, force: true });
      tempDir = undefined;
    }
  });

  it("refuses to fire without staged windows", async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "salvo-controller-"));
    const { controller } = await createHarness(tempDir, []);

    await expect(controller.fire({ mode: "semi" })).rejects.toMatchObject({ code: "NO_STAGED_WINDOWS" });
  });

  it("runs a semi session, records the ledger and returns to safe", async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "salvo-controller-"));
    const { controller, store, lock, ledger, paths } = await createHarness(tempDir);

    const result = await controller.fire({ mode: "semi" });

    expect(result).toMatchObject({ sessionId: "session-1", rounds: 1, completedRounds: 1, shots: 3, stopped: false });
    await expect(store.read()).resolves.toMatchObject({
      mode: "safe",
      round: 1,
      shots: 3,
      status: "Ready",
      stagedUrls: ["https://example.test/chat"]
    });
    await expect(lock.read()).resolves.toBeUndefined();
    await expect(ledger.rounds("https://example.test/chat")).resolves.toEqual(["hello"]);
    expect(JSON.parse(await readFile(paths.statePath, "utf8"))).not.toHaveProperty("sessionId");
  });

  it("fires 2 rounds across 3 windows with exactly 2 ledger lines", async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "salvo-controller-"));
    const { controller, ledger, driver } = await createHarness(tempDir);

    const result = await controller.fire({ mode: "auto", rounds: 2, prompt: "again" });

    expect(result).toMatchObject({ rounds: 2, completedRounds: 2, shots: 6 });
    expect(driver.activate).toHaveBeenCalledTimes(6);
    await expect(ledger.rounds("https://example.test/chat")).resolves.toEqual(["again", "again"]);
  });

  it("uses the staged URLs recorded in the state", async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "salvo-controller-"));
    const { controller, store, ledger } = await createHarness(tempDir);
    await store.update((state) => ({ ...state, stagedUrls: ["https://example.test/a", "https://example.test/b"] }));

    await controller.fire({ mode: "semi" });

    await expect(ledger.rounds("https://example.test/a")).resolves.toEqual(["hello"]);
    await expect(ledger.rounds("https://example.test/b")).resolves.toEqual(["hello"]);
  });

  it("stops when another process requests it, even if the session rewrites the state afterwards", async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "salvo-controller-"));
    const { controller, store, stopRequests, driver, ledger } = await createHarness(tempDir);
    driver.activate.mockImplementation(async (id: WindowId) => {
      if (id === windowId("202")) {
        const running = await store.read();
        await Promise.all([stopRequests.request("session-1"), store.update((state) => ({ ...state, status: "busy" }))]);
        await store.write(running);
        await new Promise<void>((resolve) => {
          setTimeout(resolve, 60);
        });
      }
    });

    const result = await controller.fire({ mode: "auto", rounds: 0 });

    expect(result).toMatchObject({ stopped: true, completedRounds: 0 });
    expect(driver.activate.mock.calls.map(([id]) => id)).toEqual(["101", "202"]);
    await expect(store.read()).resolves.toMatchObject({ mode: "safe", status: "STOPPED" });
    await expect(ledger.rounds("https://example.test/chat")).resolves.toEqual([]);
  });

  it("clears a leftover stop request before a new session starts", async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "salvo-controller-"));
    const { controller, stopRequests } = await createHarness(tempDir);
    await stopRequests.request();

    const result = await controller.fire({ mode: "semi" });

    expect(result).toMatchObject({ stopped: false, completedRounds: 1, shots: 3 });
    await expect(stopRequests.read()).resolves.toBeUndefined();
  });

  it("stops an in-process session through stop()", async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "salvo-controller-"));
    const { controller, driver, store, lock } = await createHarness(tempDir);
    let stopResult: Promise<unknown> | undefined;
    driver.activate.mockImplementation(async (id: WindowId) => {
      if (id === windowId("101") && stopResult === undefined) {
        stopResult = controller.stop();
      }
    });

    const result = await controller.fire({ mode: "auto", rounds: 0 });

    await expect(stopResult).resolves.toEqual({ wasActive: true, forced: false, sessionId: "session-1" });
    expect(result).toMatchObject({ stopped: true, completedRounds: 0, shots: 1 });
    await expect(store.read()).resolves.toMatchObject({ mode: "safe" });
    await expect(lock.read()).resolves.toBeUndefined();
  });

  it("force-terminates a session in another process that ignores the stop request", async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "salvo-controller-"));
    const config = createTestConfig(tempDir);
    const paths = defaultStatePaths(config.stateDir);
    const store = new FireStateStore(paths.statePath, { logger });
    const { driver } = createFakeDriver();
    const killProcess = vi.fn();
    const ownerLock = new SessionLock(paths.lockPath, { pid: 4242, isPidAlive: () => true, logger });
    await ownerLock.acquire("remote-session");

    const stopRequests = new StopRequestFile(paths.stopRequestPath, { logger });
    await store.write({ mode: "auto", sessionId: "remote-session", round: 3, shots: 9, status: "FIRING", stagedUrls: [], updatedAt: "" });

    const controller = new FireController({
      config,
      configDir: tempDir,
      driver,
      store,
      stopRequests,
      lock: new SessionLock(paths.lockPath, { pid: 1, isPidAlive: () => true, logger }),
      ledger: new TargetLedger(config.targetDir),
      logger,
      killProcess
    });

    await expect(controller.stop()).resolves.toEqual({ wasActive: true, forced: true, sessionId: "remote-session" });
    expect(killProcess).toHaveBeenCalledWith(4242, "SIGKILL");
    await expect(ownerLock.read()).resolves.toBeUndefined();
    await expect(store.read()).resolves.toMatchObject({ mode: "safe", status: "STOPPED (forced)", round: 3, shots: 9 });
    await expect(stopRequests.read()).resolves.toBeUndefined();
  });

  it("reports nothing to stop when idle and resets stale modes", async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "salvo-controller-"));
    const { controller, store } = await createHarness(tempDir);
    await store.update((state) => ({ ...state, mode: "auto" }));

    await expect(controller.stop()).resolves.toEqual({ wasActive: false, forced: false });
    await expect(store.read()).resolves.toMatchObject({ mode: "safe" });
  });

  it("reports status with the staged window count", async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "salvo-controller-"));
    const { controller } = await createHarness(tempDir);

    await expect(controller.status()).resolves.toMatchObject({ state: { mode: "safe" }, stagedWindows: 3 });
  });
});
