import type { WindowGeometry, Point } from "../types/index.js";

export type Anchor =
  | {
      kind: "pixels";
      value: number;
    }
  | {
      kind: "percent";
      value: number;
    };

export interface InjectionAnchors {
  xFromLeft: Anchor;
  yFromBottom: Anchor;
}

const PIXELS_PATTERN = /^-?\d+$/;
const PERCENT_PATTERN = /^(\d+(?:\.\d+)?)%$/;

/**
 * Parses `"120"` as absolute pixels and `"50%"` as a share of the window dimension.
 */
export const parseAnchor = (raw: string): Anchor | undefined => {
  const normalized = raw.trim();
  const percentMatch = PERCENT_PATTERN.exec(normalized);
  if (percentMatch?.[1] !== undefined) {
    const value = Number(percentMatch[1]);
    return value <= 100 ? { kind: "percent", value } : undefined;
  }

  if (PIXELS_PATTERN.test(normalized)) {
    return { kind: "pixels", value: Number(normalized) };
  }

  return undefined;
};

const resolveAnchor = (anchor: Anchor, extent: number): number => {
  return anchor.kind === "percent" ? Math.floor((extent * anchor.value) / 100) : anchor.value;
};

export const computeInjectionPoint = (geometry: WindowGeometry, anchors: InjectionAnchors): Point => {
  return {
    x: resolveAnchor(anchors.xFromLeft, geometry.width),
    y: geometry.height - resolveAnchor(anchors.yFromBottom, geometry.height)
  };
};
