import path from "node:path";
import { readFile } from "node:fs/promises";

import { isNodeError, writeFileAtomic } from "../utils/index.js";

/**
 * Lossy file name for a URL: slashes become underscores, `?` and `:` are dropped. Distinct URLs may
 * share a slug.
 */
export const slugForUrl = (url: string): string => {
  return url.replace(/\//g, "_").replace(/[?:]/g, "");
};

export const targetFileName = (url: string): string => `${slugForUrl(url)}.txt`;

const readOptional = async (filePath: string): Promise<string | undefined> => {
  try {
    return await readFile(filePath, "utf8");
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === "ENOENT") {
      return undefined;
    }

    throw error;
  }
};

const HEADER_PREFIXES = ["# target: ", "# created: "] as const;

const toSingleLine = (text: string): string => text.replace(/\r?\n/g, " ");

export interface EnsureTargetOptions {
  /** Write the `# target:` / `# created:` header when the file is created. */
  header: boolean;
  now?: () => Date;
}

/**
 * One file per target URL, one line per completed fire round. Earlier lines are never modified; every
 * write replaces the file through a temporary sibling so readers never see a partial line.
 */
export class TargetLedger {
  public readonly directory: string;

  public constructor(directory: string) {
    this.directory = directory;
  }

  public pathFor(url: string): string {
    return path.join(this.directory, targetFileName(url));
  }

  /** Creates the ledger file when missing. Returns whether it was created. */
  public async ensureExists(url: string, options: EnsureTargetOptions): Promise<boolean> {
    const filePath = this.pathFor(url);
    if ((await readOptional(filePath)) !== undefined) {
      return false;
    }

    const createdAt = (options.now ?? (() => new Date()))().toISOString();
    const content = options.header ? `# target: ${url}\n# created: ${createdAt}\n` : "";
    await writeFileAtomic(filePath, content);
    return true;
  }

  public async appendRound(url: string, prompt: string): Promise<void> {
    const filePath = this.pathFor(url);
    const existing = (await readOptional(filePath)) ?? "";
    const prefix = existing.length === 0 || existing.endsWith("\n") ? existing : `${existing}\n`;

    await writeFileAtomic(filePath, `${prefix}${toSingleLine(prompt)}\n`);
  }

  /** Round lines of the ledger, header comments excluded. */
  public async rounds(url: string): Promise<string[]> {
    const content = (await readOptional(this.pathFor(url))) ?? "";
    return content.split("\n").filter((line) => line.length > 0 && !HEADER_PREFIXES.some((prefix) => line.startsWith(prefix)));
  }
}
