import { pino } from "pino";

import { DEFAULT_POWER_PLANS, DEFAULT_PROTECTED_PROCESSES } from "../core/config.js";
import { INTENT_KINDS } from "../core/grammar.js";
import { createOutcome } from "../core/executor.js";
import type { InferencePort } from "../core/loop/controller.js";
import { buildPolicy, type SafetyPolicy } from "../core/policy.js";
import { createSnapshot, type SnapshotInput, type SnapshotProvider } from "../core/sensors/snapshot-provider.js";
import type { ActionIntent, CycleRecord, ProcessInfo, SystemSnapshot } from "../core/types.js";
import type { SystemControl } from "../executors/system-control.js";

export const silentLogger = pino({ level: "silent" });

const MB = 1048576;

export const PROCESSES: ProcessInfo[] = [
  { pid: 4321, name: "chrome.exe", cpuPercent: 35.5, memoryBytes: 1200 * MB },
  { pid: 4400, name: "chrome.exe", cpuPercent: 5, memoryBytes: 300 * MB },
  { pid: 612, name: "winlogon.exe", cpuPercent: 0.1, memoryBytes: 8 * MB },
  { pid: 900, name: "code", cpuPercent: 12, memoryBytes: 600 * MB }
];

export function busySnapshot(overrides: SnapshotInput = {}): SystemSnapshot {
  return createSnapshot({
    timestamp: "2026-01-05T10:00:00.000Z",
    cpuPercent: 92,
    memoryPercent: 88,
    diskPercent: 40,
    batteryPercent: 80,
    batteryCharging: true,
    topProcesses: PROCESSES,
    ...overrides
  });
}

export function calmSnapshot(): SystemSnapshot {
  return createSnapshot({
    timestamp: "2026-01-05T10:00:00.000Z",
    cpuPercent: 10,
    memoryPercent: 30,
    diskPercent: 40,
    batteryPercent: null,
    topProcesses: PROCESSES
  });
}

export class FixedSensors implements SnapshotProvider {
  calls = 0;

  constructor(public snapshot: SystemSnapshot) {}

  async capture(): Promise<SystemSnapshot> {
    this.calls += 1;
    return this.snapshot;
  }
}

export function errnoError(code: string): NodeJS.ErrnoException {
  const err: NodeJS.ErrnoException = new Error(`${code}: simulated`);
  err.code = code;
  return err;
}

/** In-memory process table; signalled processes disappear. */
export class FakeControl implements SystemControl {
  readonly signals: number[] = [];
  readonly plans: string[] = [];
  readonly failWith = new Map<number, string>();
  planError: string | null = null;
  listCalls = 0;
  private processes: ProcessInfo[];

  constructor(processes: ProcessInfo[] = PROCESSES) {
    this.processes = processes.map((p) => ({ ...p }));
  }

  async listProcesses(): Promise<ProcessInfo[]> {
    this.listCalls += 1;
    return this.processes.map((p) => ({ ...p }));
  }

  async signal(pid: number): Promise<void> {
    this.signals.push(pid);
    const code = this.failWith.get(pid);
    if (code) throw errnoError(code);
    if (!this.processes.some((p) => p.pid === pid)) throw errnoError("ESRCH");
    this.processes = this.processes.filter((p) => p.pid !== pid);
  }

  async setPowerPlan(plan: string): Promise<void> {
    this.plans.push(plan);
    if (this.planError) throw errnoError(this.planError);
  }
}

/** Answers each call with the next scripted reply. */
export class ScriptedGateway implements InferencePort {
  readonly prompts: string[] = [];

  constructor(private readonly replies: Array<string | Error>) {}

  async infer(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const next = this.replies.shift();
    if (next === undefined) throw new Error("no scripted reply left");
    if (next instanceof Error) throw next;
    return next;
  }
}

export function testPolicy(ownPids: number[] = [99999]): SafetyPolicy {
  return buildPolicy(
    {
      allowedActions: INTENT_KINDS,
      protectedProcesses: DEFAULT_PROTECTED_PROCESSES,
      powerPlans: DEFAULT_POWER_PLANS
    },
    ownPids
  );
}

export function makeRecord(id: string, intent: ActionIntent = { kind: "ReportStatus" }, rawModelText: string | null = "ACTION=ReportStatus"): CycleRecord {
  return {
    id,
    startedAt: "2026-01-05T10:00:00.000Z",
    mode: "interactive",
    snapshot: busySnapshot(),
    userRequest: "how is my machine doing",
    rawModelText,
    parsedIntent: intent,
    parseError: null,
    decision: { allowed: true },
    outcome: createOutcome(intent, "ok", "cpu 92.0%", new Date("2026-01-05T10:00:01.000Z")),
    status: "completed"
  };
}
