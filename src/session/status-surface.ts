import type { StatusSurface } from "../driver/index.js";
import type { FireStateStore } from "../state/index.js";
import type { Logger } from "../utils/index.js";

/**
 * Publishes status text into the shared state file, where control surfaces poll for it. Writes are
 * dropped once another session owns the state.
 */
export class StateStatusSurface implements StatusSurface {
  private readonly store: FireStateStore;
  private readonly sessionId: string;
  private readonly logger: Logger;

  public constructor(store: FireStateStore, sessionId: string, logger: Logger) {
    this.store = store;
    this.sessionId = sessionId;
    this.logger = logger;
  }

  public async setStatus(text: string): Promise<void> {
    this.logger.info(text);
    await this.store.update((state) => (state.sessionId === this.sessionId ? { ...state, status: text } : state));
  }
}
