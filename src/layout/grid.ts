import type { GridPlacement, GridPlan, WindowHandle } from "../types/index.js";

export const MIN_HORIZONTAL_SHIFT = 50;

export interface GridOptions {
  screenWidth: number;
  screenHeight: number;
  windowWidth: number;
  windowHeight: number;
  margin: number;
  maxOverlapPercent: number;
  verticalGap: number;
  /** Hard column cap; 0 or absent means no cap. */
  maxColumns?: number;
}

export interface GridShape {
  minShift: number;
  columns: number;
  rows: number;
  stepX: number;
  stepY: number;
  startY: number;
}

/**
 * Smallest center-to-center distance between neighbours in a row that keeps their overlap at or
 * below `maxOverlapPercent` of the window width.
 */
export const minimumShift = (windowWidth: number, maxOverlapPercent: number): number => {
  return Math.max(MIN_HORIZONTAL_SHIFT, Math.ceil((windowWidth * (100 - maxOverlapPercent)) / 100));
};

export const computeGridShape = (windowCount: number, options: GridOptions): GridShape => {
  const availableWidth = options.screenWidth - 2 * options.margin;
  const availableHeight = options.screenHeight - 2 * options.margin;
  const minShift = minimumShift(options.windowWidth, options.maxOverlapPercent);

  let columns = 1;
  let accumulated = options.windowWidth;
  while (accumulated + minShift <= availableWidth) {
    accumulated += minShift;
    columns += 1;
  }

  const cap = options.maxColumns ?? 0;
  if (cap > 0 && columns > cap) {
    columns = cap;
  }

  const rows = windowCount === 0 ? 0 : Math.ceil(windowCount / columns);
  const stepY = options.windowHeight + options.verticalGap;
  const totalHeight = rows === 0 ? 0 : options.windowHeight + (rows - 1) * stepY;
  const centeredY = options.margin + Math.floor((availableHeight - totalHeight) / 2);
  const stepX = columns > 1 ? Math.floor((availableWidth - options.windowWidth) / (columns - 1)) : 0;

  return {
    minShift,
    columns,
    rows,
    stepX,
    stepY,
    startY: Math.max(options.margin, centeredY)
  };
};

/**
 * Lays windows out row by row in input order. Rows are centered horizontally one at a time, so a
 * short last row sits in the middle; the whole grid is centered vertically.
 */
export const planGrid = (handles: readonly WindowHandle[], options: GridOptions): GridPlan => {
  if (handles.length === 0) {
    return [];
  }

  const shape = computeGridShape(handles.length, options);
  const availableWidth = options.screenWidth - 2 * options.margin;
  const placements: GridPlacement[] = [];

  for (let row = 0; row < shape.rows; row += 1) {
    const rowHandles = handles.slice(row * shape.columns, (row + 1) * shape.columns);
    const span = rowHandles.length > 1 ? options.windowWidth + (rowHandles.length - 1) * shape.stepX : options.windowWidth;
    const rowStartX = options.margin + Math.floor((availableWidth - span) / 2);
    const y = shape.startY + row * shape.stepY;

    rowHandles.forEach((handle, column) => {
      placements.push({
        handle,
        x: rowStartX + column * shape.stepX,
        y,
        row,
        column
      });
    });
  }

  return placements;
};
