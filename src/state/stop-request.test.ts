import os from "node:os";
import path from "node:path";
import { mkdtemp, rm, writeFile } from "node:fs/promises";

import { afterEach, describe, expect, it } from "vitest";

import { createLogger } from "../utils/index.js";
import { FireStateStore } from "./store.js";
import { StopRequestFile } from "./stop-request.js";

const NOW = () => new Date("2026-01-02T03:04:05.000Z");
const logger = createLogger({ level: "error" });

describe("StopRequestFile", () => {
  let tempDir: string | undefined;

  afterEach(async () => {
    if (tempDir !== undefined) {
      await rm(tempDir, { recursive: true, force: true });
      tempDir = undefined;
    }
  });

  it("targets the named session or any session", async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "salvo-stop-"));
    const requests = new StopRequestFile(path.join(tempDir, "state", "stop_request.json"), { now: NOW, logger });

    await expect(requests.targets("session-a")).resolves.toBe(false);

    await expect(requests.request("session-a")).resolves.toEqual({
      sessionId: "session-a",
      requestedAt: "2026-01-02T03:04:05.000Z"
    });
    await expect(requests.targets("session-a")).resolves.toBe(true);
    await expect(requests.targets("session-b")).resolves.toBe(false);

    await requests.request();
    await expect(requests.targets("session-b")).resolves.toBe(true);

    await requests.clear();
    await expect(requests.read()).resolves.toBeUndefined();
  });

  it("ignores a file it cannot parse", async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "salvo-stop-"));
    const filePath = path.join(tempDir, "stop_request.json");
    await writeFile(filePath, "{not json", "utf8");

    await expect(new StopRequestFile(filePath, { logger }).read()).resolves.toBeUndefined();
  });

  it("survives concurrent rewrites of the fire state", async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "salvo-stop-"));
    const store = new FireStateStore(path.join(tempDir, "fire_state.json"), { logger });
    const requests = new StopRequestFile(path.join(tempDir, "stop_request.json"), { logger });

    for (let round = 0; round < 20; round += 1) {
      await requests.clear();
      const stale = await store.read();
      await Promise.all([
        store.update((state) => ({ ...state, status: `Round ${round}` })),
        requests.request("session-a")
      ]);
      await store.write(stale);

      await expect(requests.targets("session-a")).resolves.toBe(true);
    }
  });
});
