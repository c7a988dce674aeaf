import path from "node:path";
import process from "node:process";

import { readConfigLayer, type ConfigLayer, type ConfigLayerName } from "./loader.js";
import { mergeConfigLayers } from "./merge.js";
import { resolveConfig, type SalvoConfig } from "./schema.js";
import { updateLayerValue } from "./user-layer.js";
import { isLogLevel } from "../utils/index.js";

export const DEFAULT_LAYER_FILES: Readonly<Record<ConfigLayerName, string>> = {
  system: ".system_env",
  session: ".session_env",
  user: ".user_env"
};

export interface ConfigLocation {
  configDir: string;
  systemPath?: string;
  sessionPath?: string;
  userPath?: string;
}

export interface LayerPaths {
  system: string;
  session: string;
  user: string;
}

export interface LoadedConfig {
  config: SalvoConfig;
  paths: LayerPaths;
  layers: readonly ConfigLayer[];
  sources: Readonly<Record<string, ConfigLayerName>>;
}

export const resolveLayerPaths = (location: ConfigLocation): LayerPaths => {
  const resolve = (explicitPath: string | undefined, name: ConfigLayerName): string => {
    return path.resolve(location.configDir, explicitPath ?? DEFAULT_LAYER_FILES[name]);
  };

  return {
    system: resolve(location.systemPath, "system"),
    session: resolve(location.sessionPath, "session"),
    user: resolve(location.userPath, "user")
  };
};

/**
 * Loads the system layer (required) and the optional session and user layers, merges them and
 * validates the result. `SALVO_LOG_LEVEL` in the environment overrides `LOG_LEVEL`.
 */
export const loadConfig = async (
  location: ConfigLocation,
  env: NodeJS.ProcessEnv = process.env
): Promise<LoadedConfig> => {
  const paths = resolveLayerPaths(location);
  const candidates = await Promise.all([
    readConfigLayer("system", paths.system, true),
    readConfigLayer("session", paths.session, false),
    readConfigLayer("user", paths.user, false)
  ]);
  const layers = candidates.filter((layer): layer is ConfigLayer => layer !== undefined);
  const merged = mergeConfigLayers(layers);
  const config = resolveConfig(merged.values, location.configDir);
  const envLevel = env.SALVO_LOG_LEVEL?.trim().toLowerCase();

  return {
    config: envLevel !== undefined && isLogLevel(envLevel) ? { ...config, logLevel: envLevel } : config,
    paths,
    layers,
    sources: merged.sources
  };
};

export const updateUserValue = async (location: ConfigLocation, key: string, value: string): Promise<string> => {
  const userPath = resolveLayerPaths(location).user;
  await updateLayerValue(userPath, key, value);
  return userPath;
};

export { detectLayerFormat, parseConfigLayer, readConfigLayer, type ConfigLayer, type ConfigLayerFormat, type ConfigLayerName } from "./loader.js";
export { LAYER_ORDER, mergeConfigLayers, type MergedConfigValues } from "./merge.js";
export { MANDATORY_CONFIG_KEYS, RawConfigSchema, resolveConfig, type BrowserFlags, type MandatoryConfigKey, type SalvoConfig } from "./schema.js";
export { setEnvValue, updateLayerValue } from "./user-layer.js";
