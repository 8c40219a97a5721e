import { PromptTooLargeError } from "../errors.js";
import { ACTION_TAG, renderGrammar } from "../grammar.js";
import type { ProcessInfo, SystemSnapshot } from "../types.js";

export interface AttentionThresholds {
  cpuPercent: number;
  memoryPercent: number;
  diskPercent: number;
  batteryLowPercent: number;
}

export const DEFAULT_THRESHOLDS: AttentionThresholds = {
  cpuPercent: 80,
  memoryPercent: 80,
  diskPercent: 90,
  batteryLowPercent: 20
};

export interface AttentionFlags {
  highCpu: boolean;
  highMemory: boolean;
  highDisk: boolean;
  lowBattery: boolean;
  charging: boolean | null;
}

export interface PromptOptions {
  maxProcesses?: number;
  byteBudget?: number;
  powerPlans?: readonly string[];
  thresholds?: AttentionThresholds;
}

export const DEFAULT_MAX_PROCESSES = 10;
export const DEFAULT_BYTE_BUDGET = 4096;
export const MAX_REQUEST_CHARS = 500;

export function attentionFlags(snapshot: SystemSnapshot, thresholds: AttentionThresholds = DEFAULT_THRESHOLDS): AttentionFlags {
  return {
    highCpu: snapshot.cpuPercent > thresholds.cpuPercent,
    highMemory: snapshot.memoryPercent > thresholds.memoryPercent,
    highDisk: snapshot.diskPercent > thresholds.diskPercent,
    lowBattery: snapshot.batteryPercent !== null && snapshot.batteryPercent < thresholds.batteryLowPercent,
    charging: snapshot.batteryCharging
  };
}

/** True when the snapshot crosses a threshold worth asking the model about. */
export function needsAttention(snapshot: SystemSnapshot, thresholds: AttentionThresholds = DEFAULT_THRESHOLDS): boolean {
  const flags = attentionFlags(snapshot, thresholds);
  return flags.highCpu || flags.highMemory || flags.highDisk || (flags.lowBattery && flags.charging !== true);
}

export function describeAttention(flags: AttentionFlags): string[] {
  const notes: string[] = [];
  if (flags.highCpu) notes.push("CPU usage is high");
  if (flags.highMemory) notes.push("Memory usage is high");
  if (flags.highDisk) notes.push("Disk usage is high");
  if (flags.lowBattery) notes.push(flags.charging ? "Battery is low but charging" : "Battery is low and not charging");
  return notes;
}

export function selectTopProcesses(processes: readonly ProcessInfo[], max: number): ProcessInfo[] {
  return [...processes]
    .sort((a, b) => b.memoryBytes - a.memoryBytes || a.pid - b.pid)
    .slice(0, Math.max(0, max));
}

function clean(value: string, max: number): string {
  return value.replace(/[\u0000-\u001f\u007f]+/g, " ").trim().slice(0, max);
}

// Quotes and backslashes would break out of the quoted name field.
function processLabel(name: string): string {
  return clean(name.replace(/["\\]/g, ""), 64);
}

function pct(value: number): string {
  return `${value.toFixed(1)}%`;
}

function batteryLine(snapshot: SystemSnapshot): string {
  if (snapshot.batteryPercent === null) return "unavailable";
  const state = snapshot.batteryCharging === null ? "" : snapshot.batteryCharging ? " (charging)" : " (on battery)";
  return `${Math.round(snapshot.batteryPercent)}%${state}`;
}

function render(
  snapshot: SystemSnapshot,
  request: string,
  processes: readonly ProcessInfo[],
  notes: string[],
  grammar: string[]
): string {
  const lines = [
    "You are a local assistant that manages this computer's resources.",
    `System snapshot at ${snapshot.timestamp}:`,
    `- CPU: ${pct(snapshot.cpuPercent)}`,
    `- Memory: ${pct(snapshot.memoryPercent)}`,
    `- Disk: ${pct(snapshot.diskPercent)}`,
    `- Battery: ${batteryLine(snapshot)}`,
    `Attention: ${notes.length ? notes.join(", ") : "none"}.`,
    "Top processes by memory:"
  ];
  if (processes.length) {
    for (const p of processes) {
      lines.push(`- pid=${p.pid} name="${processLabel(p.name)}" cpu=${pct(p.cpuPercent)} memory=${Math.round(p.memoryBytes / 1048576)}MB`);
    }
  } else {
    lines.push("- (not listed)");
  }
  lines.push("");
  lines.push(request ? `User request: ${request}` : "No user request. Decide whether the current state needs an action.");
  lines.push("");
  lines.push("Reply format (required). Put your recommendation on its own line using exactly one of these forms:");
  lines.push(...grammar);
  lines.push(
    "Use only the fields shown. A value is a single word without spaces, or text wrapped in double quotes.",
    `Write exactly one ${ACTION_TAG} line. If nothing should be done, reply ${ACTION_TAG}NoAction reason=<snake_case_reason>.`
  );
  return lines.join("\n");
}

/**
 * Builds the model prompt. Pure and deterministic; process rows are dropped
 * from the end until the prompt fits the byte budget.
 */
export function buildPrompt(snapshot: SystemSnapshot, userRequest: string | null, options: PromptOptions = {}): string {
  const budget = options.byteBudget ?? DEFAULT_BYTE_BUDGET;
  const processes = selectTopProcesses(snapshot.topProcesses, options.maxProcesses ?? DEFAULT_MAX_PROCESSES);
  const request = clean(String(userRequest || ""), MAX_REQUEST_CHARS);
  const notes = describeAttention(attentionFlags(snapshot, options.thresholds));
  const grammar = renderGrammar(options.powerPlans ?? []);

  let bytes = 0;
  for (let n = processes.length; n >= 0; n -= 1) {
    const prompt = render(snapshot, request, processes.slice(0, n), notes, grammar);
    bytes = Buffer.byteLength(prompt, "utf8");
    if (bytes <= budget) return prompt;
  }
  throw new PromptTooLargeError(bytes, budget);
}
