export type RiskLevel = "LOW" | "MEDIUM" | "HIGH";

export type IntentKind =
  | "ReportStatus"
  | "TerminateProcess"
  | "SetPowerPlan"
  | "ListTopProcesses"
  | "NoAction";

export interface ProcessInfo {
  pid: number;
  name: string;
  cpuPercent: number;
  memoryBytes: number;
}

export interface SystemSnapshot {
  readonly timestamp: string;
  readonly cpuPercent: number;
  readonly memoryPercent: number;
  readonly diskPercent: number;
  readonly batteryPercent: number | null;
  readonly batteryCharging: boolean | null;
  readonly topProcesses: readonly Readonly<ProcessInfo>[];
}

export type ActionIntent =
  | { kind: "ReportStatus" }
  | { kind: "TerminateProcess"; pid: number; reason: string }
  | { kind: "TerminateProcess"; name: string; reason: string }
  | { kind: "SetPowerPlan"; plan: string }
  | { kind: "ListTopProcesses"; count: number }
  | { kind: "NoAction"; reason: string };

export type TerminateIntent = Extract<ActionIntent, { kind: "TerminateProcess" }>;

export type DenyReason =
  | "action_not_allowed"
  | "protected_process"
  | "reserved_pid"
  | "unrecognized_power_plan";

export type PolicyDecision = { allowed: true } | { allowed: false; reason: DenyReason };

export type OutcomeCode =
  | "ok"
  | "no_action"
  | "already_absent"
  | "policy_denied"
  | "permission_denied"
  | "operator_rejected"
  | "execution_failed"
  | "inference_failed"
  | "degraded";

export interface ActionOutcome {
  readonly intent: ActionIntent;
  readonly succeeded: boolean;
  readonly message: string;
  readonly executedAt: string;
  readonly code: OutcomeCode;
}

export type CycleMode = "interactive" | "background";
export type CycleStatus = "completed" | "degraded" | "failed";

export interface CycleRecord {
  id: string;
  startedAt: string;
  mode: CycleMode;
  snapshot: SystemSnapshot;
  userRequest: string | null;
  rawModelText: string | null;
  parsedIntent: ActionIntent;
  parseError: string | null;
  decision: PolicyDecision | null;
  outcome: ActionOutcome;
  status: CycleStatus;
}

export type LoopPhase =
  | "Idle"
  | "BuildingPrompt"
  | "AwaitingInference"
  | "Parsing"
  | "Validating"
  | "Executing"
  | "Recording"
  | "CircuitOpen";

export interface LoopState {
  readonly consecutiveFailureCount: number;
  readonly lastSuccessfulCycleTime: string | null;
  readonly circuitOpen: boolean;
  readonly circuitOpenedAt: string | null;
}

export type LlmProvider = "ollama" | "openai";

export interface AgentConfig {
  llmProvider: LlmProvider;
  llmModel: string;
  apiBase: string;
  apiKey: string;
  systemCheckInterval: number;
  logLevel: "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";
  inferenceTimeoutSeconds: number;
  maxRetries: number;
  failureThreshold: number;
  circuitCooldownSeconds: number;
  startupProbeAttempts: number;
  promptByteBudget: number;
  maxResponseBytes: number;
  maxPromptProcesses: number;
  protectedProcesses: string[];
  powerPlans: string[];
  allowedActions: IntentKind[];
  backgroundOnlyOnAlert: boolean;
  auditLog: string;
}
