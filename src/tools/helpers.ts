import type { GridPlacement } from "../types/index.js";

export interface PlacementOutput {
  windowId: string;
  title: string;
  x: number;
  y: number;
  row: number;
  column: number;
}

export const toPlacementOutput = (placement: GridPlacement): PlacementOutput => {
  return {
    windowId: placement.handle.id,
    title: placement.handle.title,
    x: placement.x,
    y: placement.y,
    row: placement.row,
    column: placement.column
  };
};
