import { execFile } from "node:child_process";
import path from "node:path";
import { promisify } from "node:util";

import type { ProcessInfo } from "../types.js";

const execFileAsync = promisify(execFile);

/** Parses `ps -axo pid=,pcpu=,rss=,comm=` output (rss in KiB). */
export function parsePsOutput(stdout: string): ProcessInfo[] {
  const rows: ProcessInfo[] = [];
  for (const line of stdout.split(/\r?\n/)) {
    const m = line.trim().match(/^(\d+)\s+([\d.]+)\s+(\d+)\s+(.+)$/);
    if (!m) continue;
    rows.push({
      pid: Number(m[1]),
      cpuPercent: Number(m[2]) || 0,
      memoryBytes: Number(m[3]) * 1024,
      name: path.posix.basename(m[4].trim())
    });
  }
  return rows;
}

// tasklist quotes every cell, including the thousands-separated memory column.
function splitCsvLine(line: string): string[] {
  return [...line.matchAll(/"((?:[^"]|"")*)"/g)].map((m) => m[1].replace(/""/g, '"'));
}

/** Parses `tasklist /fo csv /nh` output. tasklist reports no CPU share. */
export function parseTasklistCsv(stdout: string): ProcessInfo[] {
  const rows: ProcessInfo[] = [];
  for (const line of stdout.split(/\r?\n/)) {
    if (!line.trim()) continue;
    const cells = splitCsvLine(line.trim());
    if (cells.length < 5) continue;
    const pid = Number(cells[1]);
    if (!Number.isInteger(pid)) continue;
    const kib = Number(cells[4].replace(/[^\d]/g, ""));
    rows.push({
      pid,
      name: cells[0],
      cpuPercent: 0,
      memoryBytes: Number.isFinite(kib) ? kib * 1024 : 0
    });
  }
  return rows;
}

export async function listProcesses(platform: NodeJS.Platform = process.platform): Promise<ProcessInfo[]> {
  if (platform === "win32") {
    const { stdout } = await execFileAsync("tasklist", ["/fo", "csv", "/nh"], { windowsHide: true, maxBuffer: 8 * 1024 * 1024 });
    return parseTasklistCsv(stdout);
  }
  const { stdout } = await execFileAsync("ps", ["-axo", "pid=,pcpu=,rss=,comm="], { maxBuffer: 8 * 1024 * 1024 });
  return parsePsOutput(stdout);
}

/** Lower-cases and drops a trailing `.exe` so names compare across platforms. */
export function normalizeProcessName(name: string): string {
  return String(name || "").trim().toLowerCase().replace(/\.exe$/, "");
}
