import process from "node:process";
import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";

import { createSalvoError } from "../types/index.js";
import { LockRecordSchema } from "../types/schemas.js";
import { createLogger, isNodeError, isPidAlive, type Logger } from "../utils/index.js";

export interface LockRecord {
  sessionId: string;
  pid: number;
  acquiredAt: string;
}

export interface SessionLockOptions {
  pid?: number;
  isPidAlive?: (pid: number) => boolean;
  now?: () => Date;
  logger?: Logger;
}

const MAX_ACQUIRE_ATTEMPTS = 3;

/**
 * Advisory single-session lock: a file created with exclusive create holding the owner's session id
 * and pid. A lock whose pid is gone, or whose contents cannot be read, is stale and may be replaced.
 */
export class SessionLock {
  public readonly filePath: string;
  private readonly pid: number;
  private readonly isAlive: (pid: number) => boolean;
  private readonly now: () => Date;
  private readonly logger: Logger;

  public constructor(filePath: string, options: SessionLockOptions = {}) {
    this.filePath = filePath;
    this.pid = options.pid ?? process.pid;
    this.isAlive = options.isPidAlive ?? isPidAlive;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger({ scope: "lock" });
  }

  /** The current lock record, or undefined when there is no readable lock file. */
  public async read(): Promise<LockRecord | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (error: unknown) {
      if (isNodeError(error) && error.code === "ENOENT") {
        return undefined;
      }

      throw error;
    }

    let document: unknown;
    try {
      document = JSON.parse(raw) as unknown;
    } catch {
      return undefined;
    }

    const parsed = LockRecordSchema.safeParse(document);
    return parsed.success ? parsed.data : undefined;
  }

  /** The lock record when its owner is still alive. */
  public async owner(): Promise<LockRecord | undefined> {
    const record = await this.read();
    return record !== undefined && this.isAlive(record.pid) ? record : undefined;
  }

  public async acquire(sessionId: string): Promise<LockRecord> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    const record: LockRecord = {
      sessionId,
      pid: this.pid,
      acquiredAt: this.now().toISOString()
    };

    for (let attempt = 1; attempt <= MAX_ACQUIRE_ATTEMPTS; attempt += 1) {
      try {
        await writeFile(this.filePath, `${JSON.stringify(record)}\n`, { encoding: "utf8", flag: "wx" });
        return record;
      } catch (error: unknown) {
        if (!isNodeError(error) || error.code !== "EEXIST") {
          throw error;
        }
      }

      const existing = await this.read();
      if (existing !== undefined && this.isAlive(existing.pid)) {
        throw createSalvoError("LOCK_HELD", `Fire session ${existing.sessionId} is still running.`, true, {
          sessionId: existing.sessionId,
          pid: existing.pid,
          acquiredAt: existing.acquiredAt
        });
      }

      this.logger.warn("Removing stale fire lock.", {
        path: this.filePath,
        ...(existing === undefined ? {} : { sessionId: existing.sessionId, pid: existing.pid })
      });
      await rm(this.filePath, { force: true });
    }

    throw createSalvoError("LOCK_HELD", "Could not acquire the fire lock.", true, { path: this.filePath });
  }

  /** Removes the lock only while it still names `sessionId`. */
  public async release(sessionId: string): Promise<boolean> {
    const existing = await this.read();
    if (existing?.sessionId !== sessionId) {
      return false;
    }

    await rm(this.filePath, { force: true });
    return true;
  }

  public async forceRemove(): Promise<void> {
    await rm(this.filePath, { force: true });
  }
}
