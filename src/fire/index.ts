export { computeInjectionPoint, parseAnchor, type Anchor, type InjectionAnchors } from "./anchor.js";
export { burstPlanFor, CLEAR_PROMPT, SUBMIT_ONLY_PROMPT, type BurstPlan } from "./keys.js";
export {
  abortableSleep,
  FireSequencer,
  type AbortableSleep,
  type FireRunOptions,
  type FireSequencerDependencies
} from "./sequencer.js";
