export { computeGridShape, minimumShift, MIN_HORIZONTAL_SHIFT, planGrid, type GridOptions, type GridShape } from "./grid.js";
