import type { LoopState } from "../types.js";

export const INITIAL_LOOP_STATE: LoopState = Object.freeze({
  consecutiveFailureCount: 0,
  lastSuccessfulCycleTime: null,
  circuitOpen: false,
  circuitOpenedAt: null
});

export type LoopEvent =
  | { type: "INFERENCE_SUCCEEDED"; at: string }
  | { type: "BACKEND_UNREACHABLE"; at: string }
  | { type: "COOLDOWN_ELAPSED" }
  | { type: "RESET" };

export interface BreakerSettings {
  failureThreshold: number;
  cooldownMs: number;
}

export function reduceLoopState(state: LoopState, event: LoopEvent, settings: BreakerSettings): LoopState {
  switch (event.type) {
    case "INFERENCE_SUCCEEDED":
      return Object.freeze({
        consecutiveFailureCount: 0,
        lastSuccessfulCycleTime: event.at,
        circuitOpen: false,
        circuitOpenedAt: null
      });
    case "BACKEND_UNREACHABLE": {
      const count = state.consecutiveFailureCount + 1;
      const open = state.circuitOpen || count >= settings.failureThreshold;
      return Object.freeze({
        ...state,
        consecutiveFailureCount: count,
        circuitOpen: open,
        circuitOpenedAt: open ? state.circuitOpenedAt ?? event.at : null
      });
    }
    case "COOLDOWN_ELAPSED":
      // Half-open: the count is kept, so the next unreachable result reopens at once.
      return Object.freeze({ ...state, circuitOpen: false, circuitOpenedAt: null });
    case "RESET":
      return INITIAL_LOOP_STATE;
    default:
      return state;
  }
}

export function cooldownRemainingMs(state: LoopState, now: Date, settings: BreakerSettings): number {
  if (!state.circuitOpen || !state.circuitOpenedAt) return 0;
  const openedAt = Date.parse(state.circuitOpenedAt);
  if (!Number.isFinite(openedAt)) return 0;
  return Math.max(0, openedAt + settings.cooldownMs - now.getTime());
}
