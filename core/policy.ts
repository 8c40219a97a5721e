import { normalizeProcessName } from "./sensors/process-table.js";
import type { ActionIntent, AgentConfig, DenyReason, IntentKind, PolicyDecision } from "./types.js";

export interface SafetyPolicy {
  allowedActions: ReadonlySet<IntentKind>;
  protectedProcesses: ReadonlySet<string>;
  powerPlans: ReadonlySet<string>;
  reservedPids: ReadonlySet<number>;
}

const READ_ONLY = new Set<IntentKind>(["ReportStatus", "ListTopProcesses", "NoAction"]);

/** pid 0-4 cover the idle, init and Windows System processes. */
const LOW_PIDS = [0, 1, 2, 3, 4];

export function buildPolicy(
  config: Pick<AgentConfig, "allowedActions" | "protectedProcesses" | "powerPlans">,
  ownPids: number[] = [process.pid, process.ppid]
): SafetyPolicy {
  return {
    allowedActions: new Set(config.allowedActions),
    protectedProcesses: new Set(config.protectedProcesses.map(normalizeProcessName)),
    powerPlans: new Set(config.powerPlans.map((p) => p.toLowerCase())),
    reservedPids: new Set([...LOW_PIDS, ...ownPids])
  };
}

export function isProtectedName(policy: SafetyPolicy, name: string): boolean {
  return policy.protectedProcesses.has(normalizeProcessName(name));
}

function deny(reason: DenyReason): PolicyDecision {
  return { allowed: false, reason };
}

/** Pure allow/deny decision. Read-only intents are always allowed. */
export function validateIntent(intent: ActionIntent, policy: SafetyPolicy): PolicyDecision {
  if (READ_ONLY.has(intent.kind)) return { allowed: true };
  if (!policy.allowedActions.has(intent.kind)) return deny("action_not_allowed");

  if (intent.kind === "TerminateProcess") {
    if ("pid" in intent) {
      return policy.reservedPids.has(intent.pid) ? deny("reserved_pid") : { allowed: true };
    }
    return isProtectedName(policy, intent.name) ? deny("protected_process") : { allowed: true };
  }
  if (intent.kind === "SetPowerPlan") {
    return policy.powerPlans.has(intent.plan.toLowerCase()) ? { allowed: true } : deny("unrecognized_power_plan");
  }
  return { allowed: true };
}

export function describeDenial(reason: DenyReason): string {
  switch (reason) {
    case "action_not_allowed":
      return "this action type is disabled in allowed_actions";
    case "protected_process":
      return "the target is on the protected process list";
    case "reserved_pid":
      return "the target pid belongs to the system or to this agent";
    case "unrecognized_power_plan":
      return "the power plan is not one of the configured power_plans";
  }
}
