import { isDeepStrictEqual } from "node:util";

import { errorMessage } from "./errors.js";
import { validateIntent, type SafetyPolicy } from "./policy.js";
import { parseRecommendation } from "./recommendation-parser.js";
import type { ActionIntent, CycleRecord, PolicyDecision } from "./types.js";

export interface ReplayResult {
  id: string;
  replayable: boolean;
  intent: ActionIntent | null;
  parseError: string | null;
  decision: PolicyDecision | null;
  matchesRecorded: boolean;
}

/**
 * Re-parses and re-validates a recorded cycle's model text under the current
 * policy. Nothing is executed.
 */
export function replayCycle(record: CycleRecord, policy: SafetyPolicy): ReplayResult {
  if (record.rawModelText === null) {
    return { id: record.id, replayable: false, intent: null, parseError: null, decision: null, matchesRecorded: false };
  }
  let intent: ActionIntent;
  let parseError: string | null = null;
  try {
    intent = parseRecommendation(record.rawModelText).intent;
  } catch (err) {
    parseError = errorMessage(err);
    intent = { kind: "NoAction", reason: "malformed_output" };
  }
  return {
    id: record.id,
    replayable: true,
    intent,
    parseError,
    decision: validateIntent(intent, policy),
    matchesRecorded: isDeepStrictEqual(intent, record.parsedIntent)
  };
}
