import { describe, expect, it } from "vitest";

import { computeGridShape, minimumShift, planGrid, type GridOptions } from "./grid.js";
import { windowId, type WindowHandle } from "../types/index.js";

const handlesFor = (count: number): WindowHandle[] => {
  return Array.from({ length: count }, (_, index) => ({ id: windowId(`0x${(index + 1).toString(16)}`), title: `Target ${index + 1}` }));
};

const UHD_OPTIONS: GridOptions = {
  screenWidth: 3840,
  screenHeight: 2160,
  windowWidth: 800,
  windowHeight: 600,
  margin: 10,
  maxOverlapPercent: 25,
  verticalGap: 10,
  maxColumns: 4
};

describe("planGrid", () => {
  it("fills a capped grid as rows of four and three, each centered on its own", () => {
    const plan = planGrid(handlesFor(7), UHD_OPTIONS);

    expect(plan.map((placement) => [placement.row, placement.column, placement.x, placement.y])).toEqual([
      [0, 0, 11, 475],
      [0, 1, 1017, 475],
      [0, 2, 2023, 475],
      [0, 3, 3029, 475],
      [1, 0, 514, 1085],
      [1, 1, 1520, 1085],
      [1, 2, 2526, 1085]
    ]);
    expect(plan.map((placement) => placement.handle.title)).toEqual(handlesFor(7).map((handle) => handle.title));
  });

  it("returns an empty plan for no windows", () => {
    expect(planGrid([], UHD_OPTIONS)).toEqual([]);
  });

  it("uses one column when the window is wider than the available width", () => {
    const plan = planGrid(handlesFor(2), { ...UHD_OPTIONS, screenWidth: 700, maxColumns: 0 });

    expect(plan.map((placement) => placement.x)).toEqual([-50, -50]);
    expect(plan.map((placement) => placement.column)).toEqual([0, 0]);
  });

  it("clamps the grid top to the margin when rows overflow the screen", () => {
    const plan = planGrid(handlesFor(12), { ...UHD_OPTIONS, screenHeight: 1080 });

    expect(plan[0]?.y).toBe(10);
    expect(plan[11]?.y).toBe(10 + 2 * 610);
  });

  it("keeps same-row neighbours at least the overlap bound apart", () => {
    const cases: Array<Partial<GridOptions> & { count: number }> = [
      { count: 24, maxColumns: 0 },
      { count: 9, windowWidth: 1033, maxOverlapPercent: 40, maxColumns: 0 },
      { count: 5, screenWidth: 1920, windowWidth: 640, maxOverlapPercent: 70, maxColumns: 0 },
      { count: 13, screenWidth: 2560, windowWidth: 777, maxOverlapPercent: 33, maxColumns: 3 }
    ];

    for (const { count, ...overrides } of cases) {
      const options = { ...UHD_OPTIONS, ...overrides };
      const plan = planGrid(handlesFor(count), options);
      const bound = (options.windowWidth * (100 - options.maxOverlapPercent)) / 100;

      for (let index = 1; index < plan.length; index += 1) {
        const previous = plan[index - 1];
        const current = plan[index];
        if (previous !== undefined && current !== undefined && previous.row === current.row) {
          expect(current.x - previous.x).toBeGreaterThanOrEqual(bound);
        }
      }
    }
  });

  it("is deterministic for identical inputs", () => {
    const handles = handlesFor(11);

    expect(planGrid(handles, UHD_OPTIONS)).toEqual(planGrid(handles, UHD_OPTIONS));
  });
});

describe("grid shape", () => {
  it("rounds the minimum shift up and never goes below 50 pixels", () => {
    expect(minimumShift(801, 25)).toBe(601);
    expect(minimumShift(100, 90)).toBe(50);
  });

  it("derives columns from the overlap bound before applying the cap", () => {
    expect(computeGridShape(7, { ...UHD_OPTIONS, maxColumns: 0 })).toMatchObject({ columns: 6, rows: 2, stepX: 604 });
    expect(computeGridShape(7, UHD_OPTIONS)).toMatchObject({ minShift: 600, columns: 4, rows: 2, stepX: 1006, stepY: 610, startY: 475 });
  });
});
