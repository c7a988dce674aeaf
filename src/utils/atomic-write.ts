import { randomUUID } from "node:crypto";
import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import process from "node:process";

const temporaryPathFor = (filePath: string): string => {
  return path.join(path.dirname(filePath), `.${path.basename(filePath)}.${process.pid}.${randomUUID()}.tmp`);
};

/**
 * Replaces `filePath` with `content` through a sibling temporary file and a rename, so a concurrent
 * reader sees either the previous contents or the new contents, never a prefix.
 */
export const writeFileAtomic = async (filePath: string, content: string): Promise<void> => {
  await mkdir(path.dirname(filePath), { recursive: true });
  const temporaryPath = temporaryPathFor(filePath);

  try {
    await writeFile(temporaryPath, content, "utf8");
    await rename(temporaryPath, filePath);
  } catch (error: unknown) {
    await rm(temporaryPath, { force: true });
    throw error;
  }
};

export const writeJsonAtomic = async (filePath: string, value: unknown): Promise<void> => {
  await writeFileAtomic(filePath, `${JSON.stringify(value, null, 2)}\n`);
};

export const isNodeError = (value: unknown): value is NodeJS.ErrnoException => {
  return typeof value === "object" && value !== null && "code" in value;
};
