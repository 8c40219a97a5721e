import type { IntentKind, RiskLevel } from "./types.js";

export const ACTION_TAG = "ACTION=";

export const MAX_PID = 2 ** 32 - 1;
export const MAX_LIST_COUNT = 50;
export const MAX_VALUE_LENGTH = 128;

export type FieldRule =
  | { type: "int"; min: number; max: number }
  | { type: "slug" }
  | { type: "name" };

export interface FieldSpec {
  rule: FieldRule;
  required: boolean;
  placeholder: string;
}

export interface IntentShape {
  kind: IntentKind;
  risk: RiskLevel;
  fields: Record<string, FieldSpec>;
  /** Key sets accepted for this kind, one prompt line each. */
  forms: string[][];
}

const reason: FieldSpec = { rule: { type: "slug" }, required: false, placeholder: "<snake_case_reason>" };

export const INTENT_SHAPES: Record<IntentKind, IntentShape> = {
  ReportStatus: {
    kind: "ReportStatus",
    risk: "LOW",
    fields: {},
    forms: [[]]
  },
  ListTopProcesses: {
    kind: "ListTopProcesses",
    risk: "LOW",
    fields: {
      count: { rule: { type: "int", min: 1, max: MAX_LIST_COUNT }, required: true, placeholder: `<1-${MAX_LIST_COUNT}>` }
    },
    forms: [["count"]]
  },
  TerminateProcess: {
    kind: "TerminateProcess",
    risk: "HIGH",
    fields: {
      pid: { rule: { type: "int", min: 1, max: MAX_PID }, required: false, placeholder: "<pid>" },
      target: { rule: { type: "name" }, required: false, placeholder: "<process_name>" },
      reason
    },
    forms: [
      ["target", "reason"],
      ["pid", "reason"]
    ]
  },
  SetPowerPlan: {
    kind: "SetPowerPlan",
    risk: "MEDIUM",
    fields: {
      plan: { rule: { type: "slug" }, required: true, placeholder: "<plan>" }
    },
    forms: [["plan"]]
  },
  NoAction: {
    kind: "NoAction",
    risk: "LOW",
    fields: { reason },
    forms: [["reason"]]
  }
};

export const INTENT_KINDS: IntentKind[] = ["ReportStatus", "ListTopProcesses", "TerminateProcess", "SetPowerPlan", "NoAction"];

export function isIntentKind(value: string): value is IntentKind {
  return Object.prototype.hasOwnProperty.call(INTENT_SHAPES, value);
}

export function riskOf(kind: IntentKind): RiskLevel {
  return INTENT_SHAPES[kind].risk;
}

/**
 * Renders the output contract embedded in every prompt. The parser accepts
 * exactly the lines described here.
 */
export function renderGrammar(powerPlans: readonly string[]): string[] {
  const lines: string[] = [];
  for (const shape of Object.values(INTENT_SHAPES)) {
    for (const form of shape.forms) {
      const pairs = form.map((key) => {
        const placeholder = key === "plan" && powerPlans.length ? `<${powerPlans.join("|")}>` : shape.fields[key].placeholder;
        return `${key}=${placeholder}`;
      });
      lines.push([`${ACTION_TAG}${shape.kind}`, ...pairs].join(" "));
    }
  }
  return lines;
}
