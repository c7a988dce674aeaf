import path from "node:path";
import { readFile, stat } from "node:fs/promises";

import { isNodeError } from "../utils/index.js";

const splitUrlList = (raw: string): string[] => {
  return raw.split(/[\s,]+/).filter((entry) => entry.length > 0);
};

const isFile = async (filePath: string): Promise<boolean> => {
  try {
    return (await stat(filePath)).isFile();
  } catch (error: unknown) {
    if (isNodeError(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return false;
    }

    throw error;
  }
};

/**
 * `DEFAULT_URL` is either a file with one URL per line (blank lines and `#` comments skipped) or a
 * comma or whitespace separated list of URLs.
 */
export const resolveUrls = async (raw: string, baseDir: string): Promise<string[]> => {
  const trimmed = raw.trim();
  if (trimmed.length > 0 && !trimmed.includes("://") && !/[\s,]/.test(trimmed)) {
    const candidate = path.resolve(baseDir, trimmed);
    if (await isFile(candidate)) {
      const content = await readFile(candidate, "utf8");
      return content
        .split("\n")
        .map((line) => line.trim())
        .filter((line) => line.length > 0 && !line.startsWith("#"));
    }
  }

  return splitUrlList(trimmed);
};
