import type { DisplaySize, Point, WindowGeometry, WindowHandle, WindowId } from "../types/index.js";

export interface WindowQueryOptions {
  /** Restrict the query to windows owned by these processes. */
  pids?: readonly number[];
}

export interface WindowEnumerator {
  query(pattern: string, options?: WindowQueryOptions): Promise<WindowHandle[]>;
  geometry(id: WindowId): Promise<WindowGeometry | undefined>;
}

export interface WindowArranger {
  displaySize(): Promise<DisplaySize>;
  resize(id: WindowId, width: number, height: number): Promise<void>;
  move(id: WindowId, x: number, y: number): Promise<void>;
  close(id: WindowId): Promise<void>;
}

export interface LaunchedProcess {
  pid?: number;
}

export interface WindowLauncher {
  spawn(command: string, args: readonly string[]): Promise<LaunchedProcess>;
}

export const MOUSE_BUTTONS = {
  left: 1,
  middle: 2,
  right: 3,
  wheelUp: 4,
  wheelDown: 5
} as const;

export type MouseButton = (typeof MOUSE_BUTTONS)[keyof typeof MOUSE_BUTTONS];

/**
 * Input injection is fire-and-forget: a resolved promise means the command was issued, not that the
 * target application reacted to it.
 */
export interface InputInjector {
  activate(id: WindowId): Promise<void>;
  pointerLocation(): Promise<Point>;
  /** Moves relative to the window's origin when `relativeTo` is given, otherwise to screen coordinates. */
  movePointer(point: Point, relativeTo?: WindowId): Promise<void>;
  click(button: MouseButton, id?: WindowId): Promise<void>;
  /** Positive ticks scroll up, negative ticks scroll down. */
  scroll(ticks: number, id?: WindowId): Promise<void>;
  sendKeys(id: WindowId, keys: readonly string[]): Promise<void>;
}

export interface ClipboardSink {
  setText(text: string): Promise<void>;
}

export interface StatusSurface {
  setStatus(text: string): Promise<void>;
}

export interface DesktopDriver extends WindowEnumerator, WindowArranger, WindowLauncher, InputInjector, ClipboardSink {
  readonly name: string;
}
