import { errnoCode, errorMessage } from "../core/errors.js";
import { isProtectedName, type SafetyPolicy } from "../core/policy.js";
import { normalizeProcessName } from "../core/sensors/process-table.js";
import type { OutcomeCode, TerminateIntent } from "../core/types.js";
import type { SystemControl } from "./system-control.js";

export interface StepResult {
  code: OutcomeCode;
  message: string;
}

type SignalResult = "terminated" | "absent" | "denied" | "failed";

async function sendSignal(control: SystemControl, pid: number): Promise<{ result: SignalResult; error?: string }> {
  try {
    await control.signal(pid);
    return { result: "terminated" };
  } catch (err) {
    const code = errnoCode(err);
    if (code === "ESRCH") return { result: "absent" };
    if (code === "EPERM" || code === "EACCES") return { result: "denied" };
    return { result: "failed", error: errorMessage(err) };
  }
}

/**
 * Terminates by pid or by name. A target that is already gone counts as
 * done, so repeating the call is harmless. Protected names are re-checked
 * against the live process table before any signal is sent. A name
 * target never reaches the reserved pids.
 */
export async function terminateProcess(
  intent: TerminateIntent,
  control: SystemControl,
  policy: SafetyPolicy
): Promise<StepResult> {
  const table = await control.listProcesses();

  if ("pid" in intent) {
    const row = table.find((p) => p.pid === intent.pid);
    if (!row) return { code: "already_absent", message: `process ${intent.pid} already absent` };
    if (isProtectedName(policy, row.name)) {
      return { code: "policy_denied", message: `denied: protected_process (pid ${intent.pid} is ${row.name})` };
    }
    const sent = await sendSignal(control, intent.pid);
    if (sent.result === "terminated") return { code: "ok", message: `terminated process ${intent.pid} (${row.name})` };
    if (sent.result === "absent") return { code: "already_absent", message: `process ${intent.pid} already absent` };
    if (sent.result === "denied") {
      return {
        code: "permission_denied",
        message: `permission denied terminating ${row.name} (pid ${intent.pid}); rerun with administrator rights or close it manually`
      };
    }
    return { code: "execution_failed", message: `failed to terminate pid ${intent.pid}: ${sent.error}` };
  }

  const wanted = normalizeProcessName(intent.name);
  const named = table.filter((p) => normalizeProcessName(p.name) === wanted);
  if (!named.length) return { code: "already_absent", message: `${intent.name} already absent` };
  const skipped = named.filter((p) => policy.reservedPids.has(p.pid)).map((p) => p.pid);
  const matches = named.filter((p) => !policy.reservedPids.has(p.pid));
  if (!matches.length) {
    return {
      code: "policy_denied",
      message: `denied: reserved_pid (every process named ${intent.name} is reserved: pid ${skipped.join(", ")})`
    };
  }
  const note = skipped.length ? `; skipped reserved pid ${skipped.join(", ")}` : "";

  const counts: Record<SignalResult, number> = { terminated: 0, absent: 0, denied: 0, failed: 0 };
  const errors: string[] = [];
  for (const p of matches) {
    const sent = await sendSignal(control, p.pid);
    counts[sent.result] += 1;
    if (sent.error) errors.push(`pid ${p.pid}: ${sent.error}`);
  }

  if (counts.denied) {
    return {
      code: "permission_denied",
      message: `permission denied for ${counts.denied} of ${matches.length} processes named ${intent.name}; rerun with administrator rights or close them manually`
    };
  }
  if (counts.failed) {
    return { code: "execution_failed", message: `failed to terminate ${intent.name}: ${errors.join("; ")}` };
  }
  if (!counts.terminated) return { code: "already_absent", message: `${intent.name} already absent` };
  const noun = counts.terminated === 1 ? "process" : "processes";
  return { code: "ok", message: `terminated ${counts.terminated} ${noun} named ${intent.name}${note}` };
}
