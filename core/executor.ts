import { errorMessage } from "./errors.js";
import { riskOf } from "./grammar.js";
import { SerialQueue } from "./loop/serial-queue.js";
import { logger as rootLogger, type Logger } from "./observability/logger.js";
import { describeDenial, validateIntent, type SafetyPolicy } from "./policy.js";
import type { ActionIntent, ActionOutcome, OutcomeCode, PolicyDecision, RiskLevel, SystemSnapshot } from "./types.js";
import { setPowerPlan } from "../executors/power-plan.js";
import { formatStatus, formatTopProcesses } from "../executors/report.js";
import type { SystemControl } from "../executors/system-control.js";
import { terminateProcess, type StepResult } from "../executors/terminate-process.js";

export type Approver = (intent: ActionIntent, risk: RiskLevel) => Promise<boolean>;

export interface ExecutionContext {
  snapshot: SystemSnapshot;
  /** Asked before any non read-only action; declining skips the OS call. */
  approve?: Approver;
}

const SUCCESS_CODES = new Set<OutcomeCode>(["ok", "no_action", "already_absent", "degraded"]);

export function createOutcome(intent: ActionIntent, code: OutcomeCode, message: string, at = new Date()): ActionOutcome {
  return Object.freeze({
    intent,
    succeeded: SUCCESS_CODES.has(code),
    message,
    executedAt: at.toISOString(),
    code
  });
}

export function describeIntent(intent: ActionIntent): string {
  switch (intent.kind) {
    case "TerminateProcess":
      return "pid" in intent ? `terminate pid ${intent.pid} (${intent.reason})` : `terminate ${intent.name} (${intent.reason})`;
    case "SetPowerPlan":
      return `set power plan ${intent.plan}`;
    case "ListTopProcesses":
      return `list top ${intent.count} processes`;
    case "ReportStatus":
      return "report status";
    case "NoAction":
      return `no action (${intent.reason})`;
  }
}

export interface ActionExecutorOptions {
  policy: SafetyPolicy;
  control: SystemControl;
  logger?: Logger;
}

export class ActionExecutor {
  readonly policy: SafetyPolicy;
  private readonly control: SystemControl;
  private readonly queue = new SerialQueue();
  private readonly log: Logger;

  constructor(opts: ActionExecutorOptions) {
    this.policy = opts.policy;
    this.control = opts.control;
    this.log = (opts.logger ?? rootLogger).child({ component: "executor" });
  }

  authorize(intent: ActionIntent): PolicyDecision {
    return validateIntent(intent, this.policy);
  }

  /**
   * Validates then executes one intent. Never throws: every failure becomes
   * an outcome. At most one execution runs at a time.
   */
  execute(intent: ActionIntent, context: ExecutionContext): Promise<ActionOutcome> {
    return this.queue.run(() => this.executeNow(intent, context));
  }

  private async executeNow(intent: ActionIntent, context: ExecutionContext): Promise<ActionOutcome> {
    const decision = this.authorize(intent);
    if (!decision.allowed) {
      this.log.warn({ intent, reason: decision.reason }, "intent denied by policy");
      return createOutcome(intent, "policy_denied", `denied: ${decision.reason} (${describeDenial(decision.reason)})`);
    }

    const risk = riskOf(intent.kind);
    if (context.approve && risk !== "LOW") {
      let approved = false;
      try {
        approved = await context.approve(intent, risk);
      } catch (err) {
        this.log.warn({ err: errorMessage(err) }, "approval prompt failed");
      }
      if (!approved) return createOutcome(intent, "operator_rejected", `rejected by operator: ${describeIntent(intent)}`);
    }

    let step: StepResult;
    try {
      step = await this.dispatch(intent, context.snapshot);
    } catch (err) {
      step = { code: "execution_failed", message: `failed to ${describeIntent(intent)}: ${errorMessage(err)}` };
    }
    const outcome = createOutcome(intent, step.code, step.message);
    this.log.info({ kind: intent.kind, code: outcome.code, succeeded: outcome.succeeded }, outcome.message);
    return outcome;
  }

  private async dispatch(intent: ActionIntent, snapshot: SystemSnapshot): Promise<StepResult> {
    switch (intent.kind) {
      case "NoAction":
        return { code: "no_action", message: "no action needed" };
      case "ReportStatus":
        return { code: "ok", message: formatStatus(snapshot) };
      case "ListTopProcesses":
        return { code: "ok", message: formatTopProcesses(snapshot, intent.count) };
      case "TerminateProcess":
        return terminateProcess(intent, this.control, this.policy);
      case "SetPowerPlan":
        return setPowerPlan(intent.plan, this.control);
    }
  }
}
