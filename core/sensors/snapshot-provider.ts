import { execFile } from "node:child_process";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { promisify } from "node:util";

import { errorMessage } from "../errors.js";
import { logger as rootLogger, type Logger } from "../observability/logger.js";
import type { ProcessInfo, SystemSnapshot } from "../types.js";
import { listProcesses } from "./process-table.js";

const execFileAsync = promisify(execFile);

export interface SnapshotProvider {
  capture(): Promise<SystemSnapshot>;
}

export interface SnapshotInput {
  timestamp?: string;
  cpuPercent?: number;
  memoryPercent?: number;
  diskPercent?: number;
  batteryPercent?: number | null;
  batteryCharging?: boolean | null;
  topProcesses?: ProcessInfo[];
}

function clampPercent(value: number | undefined): number {
  const n = Number(value);
  if (!Number.isFinite(n)) return 0;
  return Math.max(0, Math.min(100, n));
}

/** Builds a frozen snapshot. Missing readings become 0, or null for the battery. */
export function createSnapshot(input: SnapshotInput): SystemSnapshot {
  const battery = input.batteryPercent;
  const topProcesses = (input.topProcesses || []).map((p) => Object.freeze({ ...p }));
  return Object.freeze({
    timestamp: input.timestamp || new Date().toISOString(),
    cpuPercent: clampPercent(input.cpuPercent),
    memoryPercent: clampPercent(input.memoryPercent),
    diskPercent: clampPercent(input.diskPercent),
    batteryPercent: battery === null || battery === undefined ? null : clampPercent(battery),
    batteryCharging: input.batteryCharging ?? null,
    topProcesses: Object.freeze(topProcesses)
  });
}

interface CpuTimes {
  idle: number;
  total: number;
}

function cpuTimes(): CpuTimes {
  let idle = 0;
  let total = 0;
  for (const cpu of os.cpus()) {
    const t = cpu.times;
    idle += t.idle;
    total += t.user + t.nice + t.sys + t.irq + t.idle;
  }
  return { idle, total };
}

export interface NodeSnapshotProviderOptions {
  cpuSampleMs?: number;
  processLimit?: number;
  diskPath?: string;
  logger?: Logger;
}

/**
 * Reads metrics from the local machine. Each sensor is read on its own so
 * one unavailable source leaves its field at the sentinel instead of failing
 * the snapshot.
 */
export class NodeSnapshotProvider implements SnapshotProvider {
  private readonly cpuSampleMs: number;
  private readonly processLimit: number;
  private readonly diskPath: string;
  private readonly log: Logger;

  constructor(opts: NodeSnapshotProviderOptions = {}) {
    this.cpuSampleMs = opts.cpuSampleMs ?? 250;
    this.processLimit = opts.processLimit ?? 50;
    this.diskPath = opts.diskPath ?? (process.platform === "win32" ? `${process.env.SystemDrive || "C:"}\\` : "/");
    this.log = (opts.logger ?? rootLogger).child({ component: "sensors" });
  }

  async capture(): Promise<SystemSnapshot> {
    const [cpuPercent, diskPercent, battery, processes] = await Promise.all([
      this.read("cpu", () => this.cpuPercent()),
      this.read("disk", () => this.diskPercent()),
      this.read("battery", () => this.battery()),
      this.read("processes", () => listProcesses())
    ]);
    const total = os.totalmem();
    return createSnapshot({
      cpuPercent,
      memoryPercent: total > 0 ? ((total - os.freemem()) / total) * 100 : 0,
      diskPercent,
      batteryPercent: battery?.percent ?? null,
      batteryCharging: battery?.charging ?? null,
      topProcesses: [...(processes || [])]
        .sort((a, b) => b.memoryBytes - a.memoryBytes || a.pid - b.pid)
        .slice(0, this.processLimit)
    });
  }

  private async read<T>(sensor: string, fn: () => Promise<T>): Promise<T | undefined> {
    try {
      return await fn();
    } catch (err) {
      this.log.warn({ sensor, err: errorMessage(err) }, "sensor unavailable");
      return undefined;
    }
  }

  private async cpuPercent(): Promise<number> {
    const start = cpuTimes();
    await new Promise((resolve) => setTimeout(resolve, this.cpuSampleMs));
    const end = cpuTimes();
    const total = end.total - start.total;
    if (total <= 0) return 0;
    return (1 - (end.idle - start.idle) / total) * 100;
  }

  private async diskPercent(): Promise<number> {
    const stats = await fs.statfs(this.diskPath);
    const total = stats.blocks * stats.bsize;
    if (total <= 0) return 0;
    return ((total - stats.bavail * stats.bsize) / total) * 100;
  }

  private async battery(): Promise<{ percent: number; charging: boolean } | null> {
    if (process.platform === "linux") {
      const root = "/sys/class/power_supply";
      const entries = await fs.readdir(root);
      const bat = entries.find((e) => /^BAT/i.test(e));
      if (!bat) return null;
      const capacity = Number((await fs.readFile(path.join(root, bat, "capacity"), "utf8")).trim());
      const status = (await fs.readFile(path.join(root, bat, "status"), "utf8")).trim().toLowerCase();
      if (!Number.isFinite(capacity)) return null;
      return { percent: capacity, charging: status === "charging" || status === "full" };
    }
    if (process.platform === "darwin") {
      const { stdout } = await execFileAsync("pmset", ["-g", "batt"]);
      return parsePmsetOutput(stdout);
    }
    return null;
  }
}

/** Parses `pmset -g batt`; null when no internal battery is listed. */
export function parsePmsetOutput(stdout: string): { percent: number; charging: boolean } | null {
  const m = stdout.match(/(\d{1,3})%;\s*([a-z ]+);/i);
  if (!m) return null;
  const state = m[2].trim().toLowerCase();
  return { percent: Number(m[1]), charging: state !== "discharging" };
}
