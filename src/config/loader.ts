import path from "node:path";
import { readFile } from "node:fs/promises";

import { parse as parseDotenv } from "dotenv";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

import { createSalvoError } from "../types/index.js";
import { isNodeError } from "../utils/index.js";

export type ConfigLayerName = "system" | "session" | "user";

export interface ConfigLayer {
  name: ConfigLayerName;
  path: string;
  values: Readonly<Record<string, string>>;
}

export type ConfigLayerFormat = "env" | "json" | "yaml";

const FlatMappingSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));

export const detectLayerFormat = (layerPath: string): ConfigLayerFormat => {
  const extension = path.extname(layerPath).toLowerCase();
  if (extension === ".json") {
    return "json";
  }

  if (extension === ".yaml" || extension === ".yml") {
    return "yaml";
  }

  return "env";
};

const toStringValues = (mapping: z.infer<typeof FlatMappingSchema>): Record<string, string> => {
  return Object.fromEntries(
    Object.entries(mapping).map(([key, value]) => [key, value === null ? "" : String(value)] as const)
  );
};

/**
 * Parses one layer. `KEY=value` files go through dotenv; JSON and YAML layers must be flat mappings
 * of scalars.
 */
export const parseConfigLayer = (rawText: string, format: ConfigLayerFormat, layerPath: string): Record<string, string> => {
  if (format === "env") {
    return parseDotenv(rawText);
  }

  let document: unknown;
  try {
    document = format === "json" ? JSON.parse(rawText) : parseYaml(rawText);
  } catch (error: unknown) {
    throw createSalvoError("CONFIG_INVALID", `Failed to parse configuration layer "${layerPath}".`, false, {
      path: layerPath,
      parser: format,
      message: error instanceof Error ? error.message : String(error)
    });
  }

  if (document === null || document === undefined) {
    return {};
  }

  const parsed = FlatMappingSchema.safeParse(document);
  if (!parsed.success) {
    throw createSalvoError("CONFIG_INVALID", `Configuration layer "${layerPath}" must be a flat key/value mapping.`, false, {
      path: layerPath,
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message
      }))
    });
  }

  return toStringValues(parsed.data);
};

export const readConfigLayer = async (
  name: ConfigLayerName,
  layerPath: string,
  required: boolean
): Promise<ConfigLayer | undefined> => {
  let rawText: string;
  try {
    rawText = await readFile(layerPath, "utf8");
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === "ENOENT" && !required) {
      return undefined;
    }

    throw createSalvoError("CONFIG_INVALID", `Unable to read ${name} configuration layer "${layerPath}".`, false, {
      path: layerPath,
      message: error instanceof Error ? error.message : String(error)
    });
  }

  return {
    name,
    path: layerPath,
    values: parseConfigLayer(rawText, detectLayerFormat(layerPath), layerPath)
  };
};
