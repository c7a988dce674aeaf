import { readFile } from "node:fs/promises";

import { parseDocument } from "yaml";
import { z } from "zod";

import { createSalvoError } from "../types/index.js";
import { isNodeError, writeFileAtomic, writeJsonAtomic } from "../utils/index.js";
import { detectLayerFormat } from "./loader.js";

const KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_.-]*$/;

const readOptionalText = async (layerPath: string): Promise<string> => {
  try {
    return await readFile(layerPath, "utf8");
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === "ENOENT") {
      return "";
    }

    throw error;
  }
};

/**
 * dotenv strips one pair of quotes and, inside double quotes only, expands `\n` and `\r`; it has no
 * other escapes. Values no quoting form can carry come back undefined.
 */
const quoteEnvValue = (value: string): string | undefined => {
  if (/^[^\s'"`#\\]*$/.test(value)) {
    return value;
  }

  if (value.endsWith("\\")) {
    return undefined;
  }

  if (!value.includes("'")) {
    return `'${value}'`;
  }

  if (!value.includes("`")) {
    return `\`${value}\``;
  }

  return value.includes('"') || /\\[nr]/.test(value) ? undefined : `"${value}"`;
};

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Replaces every assignment of `key` (the last one wins in dotenv, so all are rewritten) or appends a
 * new line when the key is absent. Other lines, comments included, are kept as they are.
 */
export const setEnvValue = (rawText: string, key: string, value: string): string => {
  const quoted = quoteEnvValue(value);
  if (quoted === undefined) {
    throw createSalvoError("INVALID_INPUT", `Value for "${key}" cannot be stored in an env file unchanged.`, false, {
      key
    });
  }

  const assignment = `${key}=${quoted}`;
  const linePattern = new RegExp(`^\\s*(?:export\\s+)?${escapeRegExp(key)}\\s*=`);
  const lines = rawText.length === 0 ? [] : rawText.replace(/\n$/, "").split("\n");
  let replaced = false;

  const updated = lines.map((line) => {
    if (!linePattern.test(line)) {
      return line;
    }

    replaced = true;
    return assignment;
  });

  if (!replaced) {
    updated.push(assignment);
  }

  return `${updated.join("\n")}\n`;
};

const JsonLayerSchema = z.record(z.unknown());

export const updateLayerValue = async (layerPath: string, key: string, value: string): Promise<void> => {
  if (!KEY_PATTERN.test(key)) {
    throw createSalvoError("INVALID_INPUT", `Invalid configuration key "${key}".`, false, { key });
  }

  if (/[\r\n]/.test(value)) {
    throw createSalvoError("INVALID_INPUT", `Value for "${key}" must be a single line.`, false, { key });
  }

  const rawText = await readOptionalText(layerPath);
  const format = detectLayerFormat(layerPath);

  if (format === "env") {
    await writeFileAtomic(layerPath, setEnvValue(rawText, key, value));
    return;
  }

  if (format === "yaml") {
    const document = parseDocument(rawText);
    if (document.errors.length > 0) {
      throw createSalvoError("CONFIG_INVALID", `Failed to parse configuration layer "${layerPath}".`, false, {
        path: layerPath,
        message: document.errors[0]?.message
      });
    }

    document.set(key, value);
    await writeFileAtomic(layerPath, document.toString());
    return;
  }

  let existing: unknown = {};
  try {
    existing = rawText.trim().length === 0 ? {} : (JSON.parse(rawText) as unknown);
  } catch (error: unknown) {
    throw createSalvoError("CONFIG_INVALID", `Failed to parse configuration layer "${layerPath}".`, false, {
      path: layerPath,
      message: error instanceof Error ? error.message : String(error)
    });
  }

  const parsed = JsonLayerSchema.safeParse(existing);
  if (!parsed.success) {
    throw createSalvoError("CONFIG_INVALID", `Configuration layer "${layerPath}" must be a JSON object.`, false, {
      path: layerPath
    });
  }

  await writeJsonAtomic(layerPath, { ...parsed.data, [key]: value });
};
