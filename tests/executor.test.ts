import assert from "node:assert/strict";
import test from "node:test";

import { ActionExecutor, type Approver } from "../core/executor.js";
import { buildPolicy, validateIntent } from "../core/policy.js";
import type { ActionIntent, RiskLevel } from "../core/types.js";
import { FakeControl, busySnapshot, silentLogger, testPolicy } from "./helpers.js";

function executorWith(control: FakeControl): ActionExecutor {
  return new ActionExecutor({ policy: testPolicy(), control, logger: silentLogger });
}

const snapshot = busySnapshot();

test("policy denies protected names case-insensitively", () => {
  const policy = testPolicy();
  assert.deepEqual(validateIntent({ kind: "TerminateProcess", name: "WinLogon.EXE", reason: "x" }, policy), {
    allowed: false,
    reason: "protected_process"
  });
  assert.deepEqual(validateIntent({ kind: "TerminateProcess", name: "winlogon", reason: "x" }, policy), {
    allowed: false,
    reason: "protected_process"
  });
  assert.deepEqual(validateIntent({ kind: "TerminateProcess", name: "chrome.exe", reason: "x" }, policy), { allowed: true });
});

test("policy reserves low pids and the agent's own pids", () => {
  const policy = testPolicy([99999]);
  assert.deepEqual(validateIntent({ kind: "TerminateProcess", pid: 4, reason: "x" }, policy), { allowed: false, reason: "reserved_pid" });
  assert.deepEqual(validateIntent({ kind: "TerminateProcess", pid: 99999, reason: "x" }, policy), {
    allowed: false,
    reason: "reserved_pid"
  });
  assert.deepEqual(validateIntent({ kind: "TerminateProcess", pid: 4321, reason: "x" }, policy), { allowed: true });
});

test("policy checks power plans and the allowed action list", () => {
  const policy = testPolicy();
  assert.deepEqual(validateIntent({ kind: "SetPowerPlan", plan: "turbo" }, policy), {
    allowed: false,
    reason: "unrecognized_power_plan"
  });
  assert.deepEqual(validateIntent({ kind: "SetPowerPlan", plan: "balanced" }, policy), { allowed: true });

  const readOnly = buildPolicy({ allowedActions: ["ReportStatus"], protectedProcesses: [], powerPlans: [] }, []);
  assert.deepEqual(validateIntent({ kind: "TerminateProcess", name: "chrome.exe", reason: "x" }, readOnly), {
    allowed: false,
    reason: "action_not_allowed"
  });
  assert.deepEqual(validateIntent({ kind: "ListTopProcesses", count: 3 }, readOnly), { allowed: true });
});

test("terminating the same pid twice signals once and reports absence", async () => {
  const control = new FakeControl();
  const executor = executorWith(control);
  const intent: ActionIntent = { kind: "TerminateProcess", pid: 4321, reason: "high_memory" };

  const first = await executor.execute(intent, { snapshot });
  assert.equal(first.code, "ok");
  assert.equal(first.message, "terminated process 4321 (chrome.exe)");

  const second = await executor.execute(intent, { snapshot });
  assert.equal(second.code, "already_absent");
  assert.equal(second.succeeded, true);
  assert.equal(second.message, "process 4321 already absent");
  assert.deepEqual(control.signals, [4321]);
});

test("terminating by name signals every match", async () => {
  const control = new FakeControl();
  const outcome = await executorWith(control).execute(
    { kind: "TerminateProcess", name: "Chrome.exe", reason: "high_memory" },
    { snapshot }
  );
  assert.equal(outcome.message, "terminated 2 processes named Chrome.exe");
  assert.deepEqual(control.signals, [4321, 4400]);
});

test("terminating by name skips the agent's own pid", async () => {
  const control = new FakeControl([
    { pid: 99999, name: "node", cpuPercent: 0, memoryBytes: 0 },
    { pid: 5000, name: "node", cpuPercent: 0, memoryBytes: 0 }
  ]);
  const outcome = await executorWith(control).execute({ kind: "TerminateProcess", name: "node", reason: "x" }, { snapshot });
  assert.equal(outcome.code, "ok");
  assert.equal(outcome.message, "terminated 1 process named node; skipped reserved pid 99999");
  assert.deepEqual(control.signals, [5000]);
});

test("a name that only matches reserved pids is refused", async () => {
  const control = new FakeControl([{ pid: 99999, name: "node", cpuPercent: 0, memoryBytes: 0 }]);
  const outcome = await executorWith(control).execute({ kind: "TerminateProcess", name: "node", reason: "x" }, { snapshot });
  assert.equal(outcome.code, "policy_denied");
  assert.equal(outcome.succeeded, false);
  assert.equal(outcome.message, "denied: reserved_pid (every process named node is reserved: pid 99999)");
  assert.deepEqual(control.signals, []);
});

test("a listed pid that vanishes before the signal counts as absent", async () => {
  const control = new FakeControl();
  control.failWith.set(4321, "ESRCH");
  const outcome = await executorWith(control).execute({ kind: "TerminateProcess", pid: 4321, reason: "x" }, { snapshot });
  assert.equal(outcome.code, "already_absent");
  assert.equal(outcome.succeeded, true);
  assert.equal(outcome.message, "process 4321 already absent");
  assert.deepEqual(control.signals, [4321]);
});

test("named processes that all vanish before the signal count as absent", async () => {
  const control = new FakeControl();
  control.failWith.set(4321, "ESRCH");
  control.failWith.set(4400, "ESRCH");
  const outcome = await executorWith(control).execute(
    { kind: "TerminateProcess", name: "chrome.exe", reason: "x" },
    { snapshot }
  );
  assert.equal(outcome.code, "already_absent");
  assert.equal(outcome.succeeded, true);
  assert.equal(outcome.message, "chrome.exe already absent");
  assert.deepEqual(control.signals, [4321, 4400]);
});

test("a denied intent never touches the system", async () => {
  const control = new FakeControl();
  const outcome = await executorWith(control).execute(
    { kind: "TerminateProcess", name: "winlogon.exe", reason: "cleanup" },
    { snapshot }
  );
  assert.equal(outcome.code, "policy_denied");
  assert.equal(outcome.succeeded, false);
  assert.equal(outcome.message, "denied: protected_process (the target is on the protected process list)");
  assert.equal(control.listCalls, 0);
  assert.deepEqual(control.signals, []);
});

test("a pid that resolves to a protected process is refused", async () => {
  const control = new FakeControl();
  const outcome = await executorWith(control).execute({ kind: "TerminateProcess", pid: 612, reason: "cleanup" }, { snapshot });
  assert.equal(outcome.code, "policy_denied");
  assert.equal(outcome.message, "denied: protected_process (pid 612 is winlogon.exe)");
  assert.deepEqual(control.signals, []);
});

test("permission errors are reported as actionable", async () => {
  const control = new FakeControl();
  control.failWith.set(900, "EPERM");
  const outcome = await executorWith(control).execute({ kind: "TerminateProcess", name: "code", reason: "x" }, { snapshot });
  assert.equal(outcome.code, "permission_denied");
  assert.equal(
    outcome.message,
    "permission denied for 1 of 1 processes named code; rerun with administrator rights or close them manually"
  );
});

test("the approver is asked for risky intents only", async () => {
  const control = new FakeControl();
  const asked: Array<[string, RiskLevel]> = [];
  const approve: Approver = async (intent, risk) => {
    asked.push([intent.kind, risk]);
    return false;
  };
  const executor = executorWith(control);

  const rejected = await executor.execute({ kind: "TerminateProcess", name: "chrome.exe", reason: "high_memory" }, { snapshot, approve });
  assert.equal(rejected.code, "operator_rejected");
  assert.equal(rejected.message, "rejected by operator: terminate chrome.exe (high_memory)");

  const report = await executor.execute({ kind: "ReportStatus" }, { snapshot, approve });
  assert.equal(report.message, "cpu 92.0%, memory 88.0%, disk 40.0%, battery 80% (charging)");
  assert.deepEqual(asked, [["TerminateProcess", "HIGH"]]);
  assert.deepEqual(control.signals, []);
});

test("power plan changes map OS errors", async () => {
  const control = new FakeControl();
  const executor = executorWith(control);
  const ok = await executor.execute({ kind: "SetPowerPlan", plan: "balanced" }, { snapshot });
  assert.equal(ok.message, "power plan set to balanced");

  control.planError = "EACCES";
  const denied = await executor.execute({ kind: "SetPowerPlan", plan: "power_saver" }, { snapshot });
  assert.equal(denied.code, "permission_denied");
  assert.deepEqual(control.plans, ["balanced", "power_saver"]);
});

test("read-only intents format the snapshot", async () => {
  const executor = executorWith(new FakeControl());
  const top = await executor.execute({ kind: "ListTopProcesses", count: 2 }, { snapshot });
  assert.equal(top.message, "top 2 by memory: chrome.exe (pid 4321, 1200 MB, cpu 35.5%); code (pid 900, 600 MB, cpu 12.0%)");
  const none = await executor.execute({ kind: "NoAction", reason: "no_tag" }, { snapshot });
  assert.equal(none.code, "no_action");
  assert.equal(none.message, "no action needed");
});

test("executions never overlap", async () => {
  let active = 0;
  let peak = 0;
  const control = new FakeControl();
  control.setPowerPlan = async (plan: string) => {
    active += 1;
    peak = Math.max(peak, active);
    await new Promise((resolve) => setTimeout(resolve, 5));
    control.plans.push(plan);
    active -= 1;
  };
  const executor = executorWith(control);
  await Promise.all([
    executor.execute({ kind: "SetPowerPlan", plan: "balanced" }, { snapshot }),
    executor.execute({ kind: "SetPowerPlan", plan: "power_saver" }, { snapshot })
  ]);
  assert.equal(peak, 1);
  assert.deepEqual(control.plans, ["balanced", "power_saver"]);
});
