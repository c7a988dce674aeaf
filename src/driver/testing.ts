import { vi } from "vitest";

import { windowId, type Point, type WindowGeometry, type WindowHandle, type WindowId } from "../types/index.js";
import type { DesktopDriver, LaunchedProcess, MouseButton, WindowQueryOptions } from "./index.js";

export interface FakeDriverOptions {
  windows?: readonly WindowHandle[];
  geometry?: WindowGeometry;
  displaySize?: { width: number; height: number };
}

/**
 * In-memory desktop: launched processes get a window each, every window has the same geometry
 * unless it is closed.
 */
export const createFakeDriver = (options: FakeDriverOptions = {}) => {
  const windows: WindowHandle[] = [...(options.windows ?? [])];
  const owners = new Map<WindowId, number>();
  const geometry = options.geometry ?? { x: 0, y: 0, width: 800, height: 600 };
  let nextPid = 1000;
  let pointer: Point = { x: 1, y: 1 };

  const driver = {
    name: "fake",
    query: vi.fn(async (_pattern: string, queryOptions: WindowQueryOptions = {}): Promise<WindowHandle[]> => {
      const pids = queryOptions.pids;
      return pids === undefined ? [...windows] : windows.filter((handle) => pids.includes(owners.get(handle.id) ?? -1));
    }),
    geometry: vi.fn(async (id: WindowId): Promise<WindowGeometry | undefined> => {
      return windows.some((handle) => handle.id === id) ? geometry : undefined;
    }),
    displaySize: vi.fn(async () => options.displaySize ?? { width: 3840, height: 2160 }),
    resize: vi.fn(async (_id: WindowId, _width: number, _height: number): Promise<void> => {}),
    move: vi.fn(async (_id: WindowId, _x: number, _y: number): Promise<void> => {}),
    close: vi.fn(async (id: WindowId): Promise<void> => {
      const index = windows.findIndex((handle) => handle.id === id);
      if (index >= 0) {
        windows.splice(index, 1);
      }
    }),
    spawn: vi.fn(async (_command: string, _args: readonly string[]): Promise<LaunchedProcess> => {
      nextPid += 1;
      const id = windowId(String(nextPid * 10));
      windows.push({ id, title: "Example" });
      owners.set(id, nextPid);
      return { pid: nextPid };
    }),
    activate: vi.fn(async (_id: WindowId): Promise<void> => {}),
    pointerLocation: vi.fn(async (): Promise<Point> => pointer),
    movePointer: vi.fn(async (point: Point, relativeTo?: WindowId): Promise<void> => {
      if (relativeTo === undefined) {
        pointer = point;
      }
    }),
    click: vi.fn(async (_button: MouseButton, _id?: WindowId): Promise<void> => {}),
    scroll: vi.fn(async (_ticks: number, _id?: WindowId): Promise<void> => {}),
    sendKeys: vi.fn(async (_id: WindowId, _keys: readonly string[]): Promise<void> => {}),
    setText: vi.fn(async (_text: string): Promise<void> => {})
  } satisfies DesktopDriver;

  return { driver, windows };
};
