import { selectTopProcesses } from "../core/ai/prompt-builder.js";
import type { SystemSnapshot } from "../core/types.js";

function mb(bytes: number): string {
  return `${Math.round(bytes / 1048576)} MB`;
}

export function formatStatus(snapshot: SystemSnapshot): string {
  const battery =
    snapshot.batteryPercent === null
      ? "battery n/a"
      : `battery ${Math.round(snapshot.batteryPercent)}%${snapshot.batteryCharging ? " (charging)" : ""}`;
  return [
    `cpu ${snapshot.cpuPercent.toFixed(1)}%`,
    `memory ${snapshot.memoryPercent.toFixed(1)}%`,
    `disk ${snapshot.diskPercent.toFixed(1)}%`,
    battery
  ].join(", ");
}

export function formatTopProcesses(snapshot: SystemSnapshot, count: number): string {
  const rows = selectTopProcesses(snapshot.topProcesses, count);
  if (!rows.length) return "no process data available";
  const listed = rows.map((p) => `${p.name} (pid ${p.pid}, ${mb(p.memoryBytes)}, cpu ${p.cpuPercent.toFixed(1)}%)`);
  return `top ${rows.length} by memory: ${listed.join("; ")}`;
}
