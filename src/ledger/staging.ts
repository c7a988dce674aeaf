import { readFile, rm } from "node:fs/promises";

import { windowId, type GridPlan, type WindowId } from "../types/index.js";
import { isNodeError, writeFileAtomic } from "../utils/index.js";

export const writeStagingLedger = async (filePath: string, plan: GridPlan): Promise<void> => {
  const lines = plan.map((placement) => placement.handle.id);
  await writeFileAtomic(filePath, lines.length === 0 ? "" : `${lines.join("\n")}\n`);
};

export const readStagingLedger = async (filePath: string): Promise<WindowId[]> => {
  let content: string;
  try {
    content = await readFile(filePath, "utf8");
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === "ENOENT") {
      return [];
    }

    throw error;
  }

  return content
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => windowId(line));
};

export const clearStagingLedger = async (filePath: string): Promise<void> => {
  await rm(filePath, { force: true });
};
