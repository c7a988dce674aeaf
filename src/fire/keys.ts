export const CLEAR_PROMPT = "~";
export const SUBMIT_ONLY_PROMPT = "#";

export interface BurstPlan {
  /** Whether the prompt text goes through the clipboard before the burst. */
  usesClipboard: boolean;
  keys: readonly string[];
}

/**
 * Key sequence for one shot. `~` clears the input and submits it empty, `#` only submits what is
 * already there; any other prompt is pasted from the clipboard over the current input.
 */
export const burstPlanFor = (prompt: string): BurstPlan => {
  if (prompt === CLEAR_PROMPT) {
    return { usesClipboard: false, keys: ["ctrl+a", "Delete", "Return"] };
  }

  if (prompt === SUBMIT_ONLY_PROMPT) {
    return { usesClipboard: false, keys: ["Return"] };
  }

  return { usesClipboard: true, keys: ["ctrl+a", "ctrl+v", "Return"] };
};
