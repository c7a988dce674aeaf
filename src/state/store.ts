import { readFile } from "node:fs/promises";

import { createIdleFireState, type FireState } from "../types/index.js";
import { FireStateSchema } from "../types/schemas.js";
import { createLogger, isNodeError, writeJsonAtomic, type Logger } from "../utils/index.js";

export interface FireStateStoreOptions {
  now?: () => Date;
  logger?: Logger;
}

export type FireStateMutator = (state: FireState) => FireState;

const toFireState = (value: unknown): FireState | undefined => {
  const parsed = FireStateSchema.safeParse(value);
  if (!parsed.success) {
    return undefined;
  }

  const data = parsed.data;
  return {
    mode: data.mode,
    round: data.round,
    shots: data.shots,
    status: data.status,
    stagedUrls: data.stagedUrls,
    updatedAt: data.updatedAt,
    ...(data.sessionId === undefined ? {} : { sessionId: data.sessionId }),
    ...(data.burstCount === undefined ? {} : { burstCount: data.burstCount }),
    ...(data.shotDelayMs === undefined ? {} : { shotDelayMs: data.shotDelayMs }),
    ...(data.roundDelayMs === undefined ? {} : { roundDelayMs: data.roundDelayMs }),
    ...(data.roundCap === undefined ? {} : { roundCap: data.roundCap })
  };
};

/**
 * The fire state file shared between the running session and the control surfaces. Writers replace
 * the whole file atomically; a missing or unreadable file reads as the idle state.
 */
export class FireStateStore {
  public readonly filePath: string;
  private readonly now: () => Date;
  private readonly logger: Logger;

  public constructor(filePath: string, options: FireStateStoreOptions = {}) {
    this.filePath = filePath;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger({ scope: "state" });
  }

  public async read(): Promise<FireState> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (error: unknown) {
      if (isNodeError(error) && error.code === "ENOENT") {
        return this.idle();
      }

      throw error;
    }

    let document: unknown;
    try {
      document = JSON.parse(raw) as unknown;
    } catch (error: unknown) {
      this.logger.warn("Fire state file is not valid JSON; using the idle state.", {
        path: this.filePath,
        message: error instanceof Error ? error.message : String(error)
      });
      return this.idle();
    }

    const state = toFireState(document);
    if (state === undefined) {
      this.logger.warn("Fire state file failed validation; using the idle state.", { path: this.filePath });
      return this.idle();
    }

    return state;
  }

  public async write(state: FireState): Promise<FireState> {
    const stamped: FireState = { ...state, updatedAt: this.now().toISOString() };
    await writeJsonAtomic(this.filePath, stamped);
    return stamped;
  }

  public async update(mutator: FireStateMutator): Promise<FireState> {
    return await this.write(mutator(await this.read()));
  }

  private idle(): FireState {
    return { ...createIdleFireState(), updatedAt: this.now().toISOString() };
  }
}
