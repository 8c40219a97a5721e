import { randomUUID } from "node:crypto";

import { buildPrompt, needsAttention, type AttentionThresholds, type PromptOptions } from "../ai/prompt-builder.js";
import type { AuditLog } from "../audit-log.js";
import { InferenceError, errorMessage } from "../errors.js";
import { createOutcome, type ActionExecutor, type Approver } from "../executor.js";
import { logger as rootLogger, type Logger } from "../observability/logger.js";
import { circuitOpenGauge, cycleCounter } from "../observability/metrics.js";
import { parseRecommendation } from "../recommendation-parser.js";
import { createSnapshot, type SnapshotProvider } from "../sensors/snapshot-provider.js";
import type {
  ActionIntent,
  ActionOutcome,
  CycleMode,
  CycleRecord,
  CycleStatus,
  LoopPhase,
  LoopState,
  OutcomeCode,
  PolicyDecision,
  SystemSnapshot
} from "../types.js";
import { formatStatus } from "../../executors/report.js";
import { INITIAL_LOOP_STATE, cooldownRemainingMs, reduceLoopState, type BreakerSettings, type LoopEvent } from "./loop-state.js";
import { SerialQueue } from "./serial-queue.js";

export interface InferencePort {
  infer(prompt: string, opts?: { signal?: AbortSignal }): Promise<string>;
}

export interface LoopControllerOptions {
  sensors: SnapshotProvider;
  gateway: InferencePort;
  executor: ActionExecutor;
  audit: AuditLog;
  prompt?: PromptOptions;
  breaker?: Partial<BreakerSettings>;
  thresholds?: AttentionThresholds;
  backgroundOnlyOnAlert?: boolean;
  clock?: () => Date;
  logger?: Logger;
  onPhase?: (phase: LoopPhase) => void;
}

export interface CycleRequest {
  userRequest?: string | null;
  mode?: CycleMode;
  signal?: AbortSignal;
  approve?: Approver;
}

const PHASE_ORDER: LoopPhase[] = [
  "Idle",
  "BuildingPrompt",
  "AwaitingInference",
  "Parsing",
  "Validating",
  "Executing",
  "Recording"
];

interface CycleDraft {
  id: string;
  startedAt: string;
  mode: CycleMode;
  snapshot: SystemSnapshot;
  userRequest: string | null;
}

class CycleAbandoned extends Error {
  constructor(reason: string) {
    super(reason);
    this.name = "CycleAbandoned";
  }
}

/**
 * Drives snapshot → prompt → inference → parse → validate → execute → record.
 * Owns the LoopState; cycles are serialized, and a failed cycle is recorded
 * rather than thrown.
 */
export class LoopController {
  private loopState: LoopState = INITIAL_LOOP_STATE;
  private currentPhase: LoopPhase = "Idle";
  private readonly lock = new SerialQueue();
  private readonly breaker: BreakerSettings;
  private readonly clock: () => Date;
  private readonly log: Logger;

  constructor(private readonly opts: LoopControllerOptions) {
    this.breaker = {
      failureThreshold: opts.breaker?.failureThreshold ?? 3,
      cooldownMs: opts.breaker?.cooldownMs ?? 60_000
    };
    this.clock = opts.clock ?? (() => new Date());
    this.log = (opts.logger ?? rootLogger).child({ component: "loop" });
  }

  get state(): LoopState {
    return this.loopState;
  }

  get phase(): LoopPhase {
    return this.currentPhase;
  }

  /** Resolves with the recorded cycle, or null when the cycle was cancelled. */
  runCycle(request: CycleRequest = {}): Promise<CycleRecord | null> {
    return this.lock.run(() => this.cycle(request));
  }

  private dispatch(event: LoopEvent): void {
    const before = this.loopState;
    this.loopState = reduceLoopState(before, event, this.breaker);
    if (!before.circuitOpen && this.loopState.circuitOpen) {
      this.log.error({ failures: this.loopState.consecutiveFailureCount }, "circuit opened; inference suspended");
    } else if (before.circuitOpen && !this.loopState.circuitOpen) {
      this.log.info("circuit closed; inference resumed");
    }
    circuitOpenGauge.set(this.loopState.circuitOpen ? 1 : 0);
  }

  private enter(phase: LoopPhase): void {
    if (phase !== "Idle" && phase !== "CircuitOpen") {
      const from = PHASE_ORDER.indexOf(this.currentPhase);
      if (PHASE_ORDER.indexOf(phase) <= from) {
        throw new Error(`Illegal loop transition ${this.currentPhase} -> ${phase}`);
      }
    }
    this.currentPhase = phase;
    this.opts.onPhase?.(phase);
  }

  private checkCancelled(signal?: AbortSignal): void {
    if (signal?.aborted) throw new CycleAbandoned("cycle cancelled");
  }

  private async capture(): Promise<SystemSnapshot> {
    try {
      return await this.opts.sensors.capture();
    } catch (err) {
      this.log.warn({ err: errorMessage(err) }, "snapshot failed; using sentinel values");
      return createSnapshot({ timestamp: this.clock().toISOString() });
    }
  }

  private async cycle(request: CycleRequest): Promise<CycleRecord | null> {
    const { signal } = request;
    const mode = request.mode ?? "interactive";
    const userRequest = String(request.userRequest || "").trim() || null;
    try {
      this.checkCancelled(signal);
      const draft: CycleDraft = {
        id: randomUUID(),
        startedAt: this.clock().toISOString(),
        mode,
        snapshot: await this.capture(),
        userRequest
      };
      this.checkCancelled(signal);
      return await this.runPhases(draft, request);
    } catch (err) {
      if (err instanceof CycleAbandoned) {
        this.log.info({ mode }, "cycle abandoned before recording");
        return null;
      }
      throw err;
    } finally {
      this.enter("Idle");
    }
  }

  private async runPhases(draft: CycleDraft, request: CycleRequest): Promise<CycleRecord> {
    const { signal } = request;

    if (this.loopState.circuitOpen) {
      const remaining = cooldownRemainingMs(this.loopState, this.clock(), this.breaker);
      if (remaining > 0) return this.recordDegraded(draft, remaining);
      this.dispatch({ type: "COOLDOWN_ELAPSED" });
    }

    if (
      draft.mode === "background" &&
      (this.opts.backgroundOnlyOnAlert ?? true) &&
      !needsAttention(draft.snapshot, this.opts.thresholds)
    ) {
      const intent: ActionIntent = { kind: "NoAction", reason: "system_nominal" };
      this.enter("Validating");
      const decision = this.opts.executor.authorize(intent);
      this.enter("Executing");
      const outcome = await this.opts.executor.execute(intent, { snapshot: draft.snapshot });
      return this.record(draft, { rawModelText: null, intent, parseError: null, decision, outcome, status: "completed" });
    }

    this.enter("BuildingPrompt");
    let prompt: string;
    try {
      prompt = buildPrompt(draft.snapshot, draft.userRequest, this.opts.prompt);
    } catch (err) {
      return this.recordFailure(draft, "prompt_too_large", `prompt could not be built: ${errorMessage(err)}`);
    }

    this.enter("AwaitingInference");
    let raw: string;
    try {
      raw = await this.opts.gateway.infer(prompt, { signal });
    } catch (err) {
      if (signal?.aborted || (err instanceof InferenceError && err.kind === "Cancelled")) {
        throw new CycleAbandoned("inference cancelled");
      }
      const kind = err instanceof InferenceError ? err.kind : "BackendUnreachable";
      if (kind === "BackendUnreachable") this.dispatch({ type: "BACKEND_UNREACHABLE", at: this.clock().toISOString() });
      this.log.warn({ kind, err: errorMessage(err), failures: this.loopState.consecutiveFailureCount }, "inference failed");
      return this.recordFailure(draft, "inference_failed", `inference failed (${kind}): ${errorMessage(err)}`);
    }
    this.dispatch({ type: "INFERENCE_SUCCEEDED", at: this.clock().toISOString() });
    this.checkCancelled(signal);

    this.enter("Parsing");
    let intent: ActionIntent;
    let parseError: string | null = null;
    try {
      const parsed = parseRecommendation(raw);
      intent = parsed.intent;
      if (parsed.ignoredLines.length) {
        this.log.warn({ ignored: parsed.ignoredLines }, "ignoring additional action lines");
      }
    } catch (err) {
      parseError = errorMessage(err);
      intent = { kind: "NoAction", reason: "malformed_output" };
      this.log.warn({ err: parseError }, "model output rejected");
    }

    this.enter("Validating");
    const decision = this.opts.executor.authorize(intent);
    if (decision.allowed) this.enter("Executing");
    const outcome = await this.opts.executor.execute(intent, { snapshot: draft.snapshot, approve: request.approve });

    return this.record(draft, { rawModelText: raw, intent, parseError, decision, outcome, status: "completed" });
  }

  private recordDegraded(draft: CycleDraft, remainingMs: number): Promise<CycleRecord> {
    this.enter("CircuitOpen");
    const intent: ActionIntent = { kind: "ReportStatus" };
    const seconds = Math.ceil(remainingMs / 1000);
    const outcome = createOutcome(
      intent,
      "degraded",
      `degraded: inference suspended for ${seconds}s after ${this.loopState.consecutiveFailureCount} backend failures; ${formatStatus(draft.snapshot)}`,
      this.clock()
    );
    return this.record(draft, { rawModelText: null, intent, parseError: null, decision: null, outcome, status: "degraded" });
  }

  private recordFailure(draft: CycleDraft, reason: string, message: string): Promise<CycleRecord> {
    const intent: ActionIntent = { kind: "NoAction", reason };
    const code: OutcomeCode = "inference_failed";
    const outcome = createOutcome(intent, code, message, this.clock());
    return this.record(draft, { rawModelText: null, intent, parseError: null, decision: null, outcome, status: "failed" });
  }

  private async record(
    draft: CycleDraft,
    result: {
      rawModelText: string | null;
      intent: ActionIntent;
      parseError: string | null;
      decision: PolicyDecision | null;
      outcome: ActionOutcome;
      status: CycleStatus;
    }
  ): Promise<CycleRecord> {
    if (this.currentPhase !== "CircuitOpen") this.enter("Recording");
    const record: CycleRecord = Object.freeze({
      id: draft.id,
      startedAt: draft.startedAt,
      mode: draft.mode,
      snapshot: draft.snapshot,
      userRequest: draft.userRequest,
      rawModelText: result.rawModelText,
      parsedIntent: result.intent,
      parseError: result.parseError,
      decision: result.decision,
      outcome: result.outcome,
      status: result.status
    });
    try {
      await this.opts.audit.append(record);
    } catch (err) {
      this.log.error({ id: record.id, err: errorMessage(err) }, "audit append failed");
    }
    cycleCounter.inc({ mode: draft.mode, status: result.status });
    return record;
  }
}
