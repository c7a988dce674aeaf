import process from "node:process";

import { isNodeError } from "./atomic-write.js";

/**
 * Signal 0 probes for existence only. EPERM means the process exists but belongs to another user.
 */
export const isPidAlive = (pid: number): boolean => {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error: unknown) {
    return isNodeError(error) && error.code === "EPERM";
  }
};
