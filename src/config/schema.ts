import path from "node:path";

import { z } from "zod";

import { parseAnchor, type Anchor, type InjectionAnchors } from "../fire/anchor.js";
import { createSalvoError } from "../types/index.js";
import { LOG_LEVELS, secondsToMs, type LogLevel } from "../utils/index.js";

export const MANDATORY_CONFIG_KEYS = [
  "BROWSER",
  "DEFAULT_URL",
  "DEFAULT_PROMPT",
  "WINDOW_PATTERN",
  "DEFAULT_WIDTH",
  "DEFAULT_HEIGHT",
  "MAX_OVERLAP_PERCENT",
  "PROMPT_X_FROM_LEFT",
  "PROMPT_Y_FROM_BOTTOM",
  "SHOT_DELAY",
  "ROUND_DELAY",
  "BURST_COUNT",
  "FIRE_COUNT",
  "STAGE_COUNT",
  "TARGET_DIR"
] as const;

export type MandatoryConfigKey = (typeof MANDATORY_CONFIG_KEYS)[number];

const NonEmptyStringSchema = z.string().trim().min(1);

const integerString = (minimum: number) =>
  z
    .string()
    .trim()
    .regex(/^-?\d+$/, "Expected an integer.")
    .transform(Number)
    .pipe(z.number().int().min(minimum));

const SecondsSchema = z
  .string()
  .trim()
  .regex(/^\d+(?:\.\d+)?$/, "Expected a non-negative number of seconds.")
  .transform((value) => secondsToMs(Number(value)));

const PositiveSecondsSchema = SecondsSchema.pipe(z.number().int().positive());

const YesNoSchema = z
  .string()
  .trim()
  .transform((value) => value.toLowerCase())
  .pipe(z.enum(["yes", "no", "true", "false", "1", "0"]))
  .transform((value) => value === "yes" || value === "true" || value === "1");

const AnchorSchema = z.string().transform((value, context): Anchor => {
  const anchor = parseAnchor(value);
  if (anchor === undefined) {
    context.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid anchor "${value}": expected pixels like "120" or a percentage like "50%".`
    });
    return z.NEVER;
  }

  return anchor;
});

const FlagListSchema = z.string().transform((value) => value.split(/\s+/).filter((token) => token.length > 0));

export const RawConfigSchema = z.object({
  BROWSER: NonEmptyStringSchema,
  BROWSER_FLAGS_HEAD: FlagListSchema.default(""),
  BROWSER_FLAGS_MIDDLE: FlagListSchema.default(""),
  BROWSER_FLAGS_TAIL: FlagListSchema.default(""),
  DEFAULT_URL: NonEmptyStringSchema,
  DEFAULT_PROMPT: NonEmptyStringSchema,
  WINDOW_PATTERN: NonEmptyStringSchema,
  DEFAULT_WIDTH: integerString(1),
  DEFAULT_HEIGHT: integerString(1),
  MAX_OVERLAP_PERCENT: integerString(0).pipe(z.number().max(99)),
  MAX_COLUMNS: integerString(0).default("0"),
  GRID_MARGIN: integerString(0).default("10"),
  GRID_VERTICAL_GAP: integerString(0).default("10"),
  SCREEN_WIDTH: integerString(1).optional(),
  SCREEN_HEIGHT: integerString(1).optional(),
  PROMPT_X_FROM_LEFT: AnchorSchema,
  PROMPT_Y_FROM_BOTTOM: AnchorSchema,
  SHOT_DELAY: SecondsSchema,
  ROUND_DELAY: SecondsSchema,
  BURST_COUNT: integerString(1),
  FIRE_COUNT: integerString(0),
  STAGE_COUNT: integerString(0),
  STAGE_DELAY: SecondsSchema.default("0.5"),
  POLL_INTERVAL: PositiveSecondsSchema.default("0.1"),
  STABLE_SECONDS: SecondsSchema.default("3"),
  MAX_POLL_ATTEMPTS: integerString(1).default("300"),
  RECENT_WAIT_COUNT: integerString(0).default("4"),
  RECENT_WAIT_ATTEMPTS: integerString(1).default("120"),
  SCROLL_TICKS: integerString(0).default("3"),
  TARGET_DIR: NonEmptyStringSchema,
  WINDOW_LIST: NonEmptyStringSchema.default(".salvo/live_windows.txt"),
  STATE_DIR: NonEmptyStringSchema.default(".salvo"),
  DROP_FAILED_WINDOWS: YesNoSchema.default("No"),
  WIPE_ON_STAGE: YesNoSchema.default("No"),
  STOP_GRACE: SecondsSchema.default("2"),
  STOP_POLL_INTERVAL: PositiveSecondsSchema.default("0.2"),
  LOG_LEVEL: z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS)).default("info")
});

export interface BrowserFlags {
  head: readonly string[];
  middle: readonly string[];
  tail: readonly string[];
}

export interface SalvoConfig {
  browser: string;
  browserFlags: BrowserFlags;
  defaultUrl: string;
  defaultPrompt: string;
  windowPattern: string;
  windowWidth: number;
  windowHeight: number;
  maxOverlapPercent: number;
  maxColumns: number;
  margin: number;
  verticalGap: number;
  screenWidth?: number;
  screenHeight?: number;
  anchors: InjectionAnchors;
  shotDelayMs: number;
  roundDelayMs: number;
  burstCount: number;
  fireCount: number;
  stageCount: number;
  stageDelayMs: number;
  pollIntervalMs: number;
  stableForMs: number;
  maxPollAttempts: number;
  recentWaitCount: number;
  recentWaitAttempts: number;
  scrollTicks: number;
  targetDir: string;
  windowListPath: string;
  stateDir: string;
  dropFailedWindows: boolean;
  wipeOnStage: boolean;
  stopGraceMs: number;
  stopPollIntervalMs: number;
  logLevel: LogLevel;
}

const withoutBlankValues = (values: Readonly<Record<string, string>>): Record<string, string> => {
  return Object.fromEntries(
    Object.entries(values).filter(([key, value]) => value.trim().length > 0 || key.startsWith("BROWSER_FLAGS_"))
  );
};

/**
 * Validates merged layer values and converts them into typed settings. Every missing or invalid key
 * is reported in one CONFIG_INVALID error. Relative paths resolve against `baseDir`.
 */
export const resolveConfig = (values: Readonly<Record<string, string>>, baseDir: string): SalvoConfig => {
  const parsed = RawConfigSchema.safeParse(withoutBlankValues(values));
  if (!parsed.success) {
    const missing = new Set<string>();
    const invalid: Array<{ key: string; message: string }> = [];

    for (const issue of parsed.error.issues) {
      const key = String(issue.path[0] ?? "");
      if (issue.code === z.ZodIssueCode.invalid_type && issue.received === "undefined") {
        missing.add(key);
      } else {
        invalid.push({ key, message: issue.message });
      }
    }

    const offending = [...missing, ...invalid.map((entry) => entry.key)];
    throw createSalvoError("CONFIG_INVALID", `Invalid configuration: ${[...new Set(offending)].join(", ")}.`, false, {
      missing: [...missing],
      invalid
    });
  }

  const raw = parsed.data;
  const resolvePath = (value: string): string => path.resolve(baseDir, value);

  return {
    browser: raw.BROWSER,
    browserFlags: {
      head: raw.BROWSER_FLAGS_HEAD,
      middle: raw.BROWSER_FLAGS_MIDDLE,
      tail: raw.BROWSER_FLAGS_TAIL
    },
    defaultUrl: raw.DEFAULT_URL,
    defaultPrompt: raw.DEFAULT_PROMPT,
    windowPattern: raw.WINDOW_PATTERN,
    windowWidth: raw.DEFAULT_WIDTH,
    windowHeight: raw.DEFAULT_HEIGHT,
    maxOverlapPercent: raw.MAX_OVERLAP_PERCENT,
    maxColumns: raw.MAX_COLUMNS,
    margin: raw.GRID_MARGIN,
    verticalGap: raw.GRID_VERTICAL_GAP,
    ...(raw.SCREEN_WIDTH === undefined ? {} : { screenWidth: raw.SCREEN_WIDTH }),
    ...(raw.SCREEN_HEIGHT === undefined ? {} : { screenHeight: raw.SCREEN_HEIGHT }),
    anchors: {
      xFromLeft: raw.PROMPT_X_FROM_LEFT,
      yFromBottom: raw.PROMPT_Y_FROM_BOTTOM
    },
    shotDelayMs: raw.SHOT_DELAY,
    roundDelayMs: raw.ROUND_DELAY,
    burstCount: raw.BURST_COUNT,
    fireCount: raw.FIRE_COUNT,
    stageCount: raw.STAGE_COUNT,
    stageDelayMs: raw.STAGE_DELAY,
    pollIntervalMs: raw.POLL_INTERVAL,
    stableForMs: raw.STABLE_SECONDS,
    maxPollAttempts: raw.MAX_POLL_ATTEMPTS,
    recentWaitCount: raw.RECENT_WAIT_COUNT,
    recentWaitAttempts: raw.RECENT_WAIT_ATTEMPTS,
    scrollTicks: raw.SCROLL_TICKS,
    targetDir: resolvePath(raw.TARGET_DIR),
    windowListPath: resolvePath(raw.WINDOW_LIST),
    stateDir: resolvePath(raw.STATE_DIR),
    dropFailedWindows: raw.DROP_FAILED_WINDOWS,
    wipeOnStage: raw.WIPE_ON_STAGE,
    stopGraceMs: raw.STOP_GRACE,
    stopPollIntervalMs: raw.STOP_POLL_INTERVAL,
    logLevel: raw.LOG_LEVEL
  };
};
