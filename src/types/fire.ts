export const FIRE_MODES = ["safe", "semi", "auto", "stopping"] as const;

export type FireMode = (typeof FIRE_MODES)[number];

export type ActiveFireMode = Extract<FireMode, "semi" | "auto">;

export interface FireProgress {
  round: number;
  shots: number;
  windowIndex: number;
  windowCount: number;
}

export interface FireSummary {
  mode: ActiveFireMode;
  rounds: number;
  completedRounds: number;
  shots: number;
  stopped: boolean;
  skippedWindows: number;
  droppedWindows: readonly string[];
}

export interface FireState {
  mode: FireMode;
  sessionId?: string;
  round: number;
  shots: number;
  burstCount?: number;
  shotDelayMs?: number;
  roundDelayMs?: number;
  roundCap?: number;
  status: string;
  stagedUrls: readonly string[];
  updatedAt: string;
}

export const createIdleFireState = (stagedUrls: readonly string[] = [], status: string = "Ready"): FireState => {
  return {
    mode: "safe",
    round: 0,
    shots: 0,
    status,
    stagedUrls,
    updatedAt: new Date().toISOString()
  };
};
