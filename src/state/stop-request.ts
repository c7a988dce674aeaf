import { mkdir, readFile, rm } from "node:fs/promises";
import path from "node:path";

import { StopRequestSchema } from "../types/schemas.js";
import { createLogger, isNodeError, writeJsonAtomic, type Logger } from "../utils/index.js";

export interface StopRequest {
  /** Session the request targets; absent means whichever session is running. */
  sessionId?: string;
  requestedAt: string;
}

export interface StopRequestFileOptions {
  now?: () => Date;
  logger?: Logger;
}

const parseJson = (raw: string): unknown => {
  try {
    return JSON.parse(raw);
  } catch (error: unknown) {
    if (error instanceof SyntaxError) {
      return undefined;
    }

    throw error;
  }
};

/**
 * Stop requests live in their own file, which only control surfaces write; the fire state file
 * belongs to the running session.
 */
export class StopRequestFile {
  public readonly filePath: string;
  private readonly now: () => Date;
  private readonly logger: Logger;

  public constructor(filePath: string, options: StopRequestFileOptions = {}) {
    this.filePath = filePath;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger({ scope: "stop-request" });
  }

  public async request(sessionId?: string): Promise<StopRequest> {
    const request: StopRequest = {
      ...(sessionId === undefined ? {} : { sessionId }),
      requestedAt: this.now().toISOString()
    };
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeJsonAtomic(this.filePath, request);
    return request;
  }

  public async read(): Promise<StopRequest | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (error: unknown) {
      if (isNodeError(error) && error.code === "ENOENT") {
        return undefined;
      }

      throw error;
    }

    const parsed = StopRequestSchema.safeParse(parseJson(raw));
    if (!parsed.success) {
      this.logger.warn("Ignoring an unreadable stop request.", { path: this.filePath });
      return undefined;
    }

    return {
      ...(parsed.data.sessionId === undefined ? {} : { sessionId: parsed.data.sessionId }),
      requestedAt: parsed.data.requestedAt
    };
  }

  /** True when a request names `sessionId` or names no session at all. */
  public async targets(sessionId: string): Promise<boolean> {
    const request = await this.read();
    return request !== undefined && (request.sessionId === undefined || request.sessionId === sessionId);
  }

  public async clear(): Promise<void> {
    await rm(this.filePath, { force: true });
  }
}
