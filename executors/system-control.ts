import { execFile } from "node:child_process";
import { promisify } from "node:util";

import { listProcesses } from "../core/sensors/process-table.js";
import type { ProcessInfo } from "../core/types.js";

const execFileAsync = promisify(execFile);

/**
 * Every OS side effect the agent can cause goes through this interface.
 * `signal` and `setPowerPlan` reject with the OS error (code ESRCH, EPERM, ...).
 */
export interface SystemControl {
  listProcesses(): Promise<ProcessInfo[]>;
  signal(pid: number): Promise<void>;
  setPowerPlan(plan: string): Promise<void>;
}

const WINDOWS_PLAN_GUIDS: Record<string, string> = {
  balanced: "381b4222-f694-41f0-9685-ff5bb260df2e",
  high_performance: "8c5e7fda-e8bf-4a96-9a85-a6e23a8c635c",
  power_saver: "a1841308-3541-4fab-bc81-f71556f20b4a"
};

const LINUX_PROFILES: Record<string, string> = {
  balanced: "balanced",
  high_performance: "performance",
  power_saver: "power-saver"
};

export class UnsupportedOperationError extends Error {
  readonly code = "ENOTSUP";

  constructor(message: string) {
    super(message);
    this.name = "UnsupportedOperationError";
  }
}

export class NodeSystemControl implements SystemControl {
  constructor(private readonly platform: NodeJS.Platform = process.platform) {}

  listProcesses(): Promise<ProcessInfo[]> {
    return listProcesses(this.platform);
  }

  async signal(pid: number): Promise<void> {
    process.kill(pid, "SIGTERM");
  }

  async setPowerPlan(plan: string): Promise<void> {
    const key = plan.toLowerCase();
    if (this.platform === "win32") {
      const guid = WINDOWS_PLAN_GUIDS[key];
      if (!guid) throw new UnsupportedOperationError(`No Windows power scheme is mapped to "${plan}"`);
      await execFileAsync("powercfg", ["/s", guid], { windowsHide: true });
      return;
    }
    if (this.platform === "linux") {
      const profile = LINUX_PROFILES[key];
      if (!profile) throw new UnsupportedOperationError(`No power profile is mapped to "${plan}"`);
      await execFileAsync("powerprofilesctl", ["set", profile]);
      return;
    }
    throw new UnsupportedOperationError(`Power plans are not supported on ${this.platform}`);
  }
}
