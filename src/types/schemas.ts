import { z } from "zod";

import { FIRE_MODES } from "./fire.js";

export const FireModeSchema = z.enum(FIRE_MODES);

export const FireStateSchema = z.object({
  mode: FireModeSchema,
  sessionId: z.string().min(1).optional(),
  round: z.number().int().nonnegative(),
  shots: z.number().int().nonnegative(),
  burstCount: z.number().int().positive().optional(),
  shotDelayMs: z.number().int().nonnegative().optional(),
  roundDelayMs: z.number().int().nonnegative().optional(),
  roundCap: z.number().int().nonnegative().optional(),
  status: z.string(),
  stagedUrls: z.array(z.string().min(1)).default([]),
  updatedAt: z.string().min(1)
});

export const LockRecordSchema = z.object({
  sessionId: z.string().min(1),
  pid: z.number().int().positive(),
  acquiredAt: z.string().min(1)
});

export const StopRequestSchema = z.object({
  sessionId: z.string().min(1).optional(),
  requestedAt: z.string().min(1)
});

const PlacementSchema = z.object({
  windowId: z.string().min(1),
  title: z.string(),
  x: z.number().int(),
  y: z.number().int(),
  row: z.number().int().nonnegative(),
  column: z.number().int().nonnegative()
});

export const StageWindowsInputSchema = z.object({
  count: z.number().int().positive().max(200).optional(),
  urls: z.array(z.string().trim().min(1)).min(1).optional(),
  wipe: z.boolean().optional()
});

export const StageWindowsOutputSchema = z.object({
  requested: z.number().int().nonnegative(),
  ready: z.number().int().nonnegative(),
  shortfall: z.number().int().nonnegative(),
  stable: z.boolean(),
  urls: z.array(z.string()),
  placements: z.array(PlacementSchema)
});

export const FireInputSchema = z.object({
  mode: z.enum(["semi", "auto"]).default("semi"),
  rounds: z.number().int().nonnegative().optional(),
  prompt: z.string().min(1).optional(),
  burstCount: z.number().int().positive().max(100).optional()
});

export const FireSummarySchema = z.object({
  sessionId: z.string().min(1),
  mode: z.enum(["semi", "auto"]),
  rounds: z.number().int().nonnegative(),
  completedRounds: z.number().int().nonnegative(),
  shots: z.number().int().nonnegative(),
  stopped: z.boolean(),
  skippedWindows: z.number().int().nonnegative(),
  droppedWindows: z.array(z.string())
});

export const StopFireInputSchema = z.object({});

export const StopFireOutputSchema = z.object({
  wasActive: z.boolean(),
  forced: z.boolean(),
  sessionId: z.string().min(1).optional()
});

export const FireStatusInputSchema = z.object({});

export const FireStatusOutputSchema = z.object({
  state: FireStateSchema,
  lock: LockRecordSchema.optional(),
  stagedWindows: z.number().int().nonnegative(),
  toolCalls: z.record(z.object({ calls: z.number().int().nonnegative(), errors: z.number().int().nonnegative() }))
});

export const PlanPreviewInputSchema = z.object({
  count: z.number().int().nonnegative().max(500),
  screenWidth: z.number().int().positive().optional(),
  screenHeight: z.number().int().positive().optional(),
  windowWidth: z.number().int().positive().optional(),
  windowHeight: z.number().int().positive().optional(),
  maxOverlapPercent: z.number().int().min(0).max(99).optional(),
  maxColumns: z.number().int().nonnegative().optional()
});

export const PlanPreviewOutputSchema = z.object({
  columns: z.number().int().positive(),
  rows: z.number().int().nonnegative(),
  minShift: z.number().int().positive(),
  placements: z.array(PlacementSchema)
});
