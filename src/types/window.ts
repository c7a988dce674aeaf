declare const WindowIdBrand: unique symbol;

export type WindowId = string & { readonly [WindowIdBrand]: typeof WindowIdBrand };

export const windowId = (id: string): WindowId => id as WindowId;

export interface WindowHandle {
  id: WindowId;
  title: string;
}

export interface WindowGeometry {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Point {
  x: number;
  y: number;
}

export interface DisplaySize {
  width: number;
  height: number;
}

export interface GridPlacement {
  handle: WindowHandle;
  x: number;
  y: number;
  row: number;
  column: number;
}

export type GridPlan = readonly GridPlacement[];
