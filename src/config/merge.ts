import type { ConfigLayer, ConfigLayerName } from "./loader.js";

export const LAYER_ORDER: readonly ConfigLayerName[] = ["system", "session", "user"];

export interface MergedConfigValues {
  values: Readonly<Record<string, string>>;
  sources: Readonly<Record<string, ConfigLayerName>>;
}

/**
 * Applies layers in fixed order (base defaults, runtime session state, user overrides); the later
 * layer wins for every key it defines, whatever order the layers are passed in.
 */
export const mergeConfigLayers = (layers: readonly ConfigLayer[]): MergedConfigValues => {
  const values: Record<string, string> = {};
  const sources: Record<string, ConfigLayerName> = {};
  const ordered = [...layers].sort((left, right) => LAYER_ORDER.indexOf(left.name) - LAYER_ORDER.indexOf(right.name));

  for (const layer of ordered) {
    for (const [key, value] of Object.entries(layer.values)) {
      values[key] = value;
      sources[key] = layer.name;
    }
  }

  return { values, sources };
};
