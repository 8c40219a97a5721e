import assert from "node:assert/strict";
import test from "node:test";

import type { InferenceBackend } from "../core/ai/backends.js";
import { InferenceGateway } from "../core/ai/inference-gateway.js";
import type { PromptOptions } from "../core/ai/prompt-builder.js";
import { createAgent } from "../core/agent.js";
import { MemoryAuditLog, type AuditLog } from "../core/audit-log.js";
import { parseConfig } from "../core/config.js";
import { InferenceError } from "../core/errors.js";
import { ActionExecutor } from "../core/executor.js";
import { LoopController, type InferencePort } from "../core/loop/controller.js";
import type { SnapshotProvider } from "../core/sensors/snapshot-provider.js";
import type { LoopPhase, SystemSnapshot } from "../core/types.js";
import { FakeControl, FixedSensors, ScriptedGateway, busySnapshot, calmSnapshot, silentLogger, testPolicy } from "./helpers.js";

interface HarnessOptions {
  snapshot?: SystemSnapshot;
  sensors?: SnapshotProvider;
  audit?: AuditLog;
  clock?: () => Date;
  prompt?: PromptOptions;
}

function harness(gateway: InferencePort, opts: HarnessOptions = {}) {
  const control = new FakeControl();
  const audit = opts.audit ?? new MemoryAuditLog();
  const phases: LoopPhase[] = [];
  const controller = new LoopController({
    sensors: opts.sensors ?? new FixedSensors(opts.snapshot ?? busySnapshot()),
    gateway,
    executor: new ActionExecutor({ policy: testPolicy(), control, logger: silentLogger }),
    audit,
    prompt: opts.prompt,
    breaker: { failureThreshold: 3, cooldownMs: 60_000 },
    clock: opts.clock,
    logger: silentLogger,
    onPhase: (phase) => phases.push(phase)
  });
  return { controller, control, audit, phases };
}

const STATUS = "cpu 92.0%, memory 88.0%, disk 40.0%, battery 80% (charging)";

test("a recommendation to close chrome terminates it", async () => {
  const gateway = new ScriptedGateway(["Chrome is heavy.\nACTION=TerminateProcess target=chrome.exe reason=high_memory"]);
  const { controller, control, audit, phases } = harness(gateway);

  const record = await controller.runCycle({ userRequest: "free up some memory" });
  assert.ok(record);
  assert.deepEqual(record.parsedIntent, { kind: "TerminateProcess", name: "chrome.exe", reason: "high_memory" });
  assert.deepEqual(record.decision, { allowed: true });
  assert.equal(record.outcome.code, "ok");
  assert.equal(record.outcome.message, "terminated 2 processes named chrome.exe");
  assert.equal(record.status, "completed");
  assert.equal(record.userRequest, "free up some memory");
  assert.deepEqual(control.signals, [4321, 4400]);
  assert.deepEqual(phases, ["BuildingPrompt", "AwaitingInference", "Parsing", "Validating", "Executing", "Recording", "Idle"]);
  assert.deepEqual(await audit.list(), [record]);
  assert.ok(gateway.prompts[0].includes("User request: free up some memory"));
});

test("a conversational reply is no action", async () => {
  const { controller, control } = harness(new ScriptedGateway(["I think everything looks fine!"]));
  const record = await controller.runCycle({ userRequest: "how am I doing" });
  assert.ok(record);
  assert.deepEqual(record.parsedIntent, { kind: "NoAction", reason: "no_tag" });
  assert.equal(record.outcome.message, "no action needed");
  assert.equal(record.outcome.succeeded, true);
  assert.equal(record.rawModelText, "I think everything looks fine!");
  assert.deepEqual(control.signals, []);
});

test("a protected target is denied without executing", async () => {
  const { controller, control, phases } = harness(
    new ScriptedGateway(["ACTION=TerminateProcess target=winlogon.exe reason=cleanup"])
  );
  const record = await controller.runCycle({});
  assert.ok(record);
  assert.deepEqual(record.decision, { allowed: false, reason: "protected_process" });
  assert.equal(record.outcome.code, "policy_denied");
  assert.equal(record.status, "completed");
  assert.equal(control.listCalls, 0);
  assert.deepEqual(phases, ["BuildingPrompt", "AwaitingInference", "Parsing", "Validating", "Recording", "Idle"]);
});

test("malformed output is recorded as no action with the parse error", async () => {
  const raw = "ACTION=TerminateProcess target=chrome.exe pid=12";
  const { controller, control } = harness(new ScriptedGateway([raw]));
  const record = await controller.runCycle({});
  assert.ok(record);
  assert.deepEqual(record.parsedIntent, { kind: "NoAction", reason: "malformed_output" });
  assert.equal(record.parseError, "TerminateProcess takes either pid or target, not both");
  assert.equal(record.rawModelText, raw);
  assert.equal(record.outcome.code, "no_action");
  assert.equal(record.status, "completed");
  assert.deepEqual(control.signals, []);
});

test("the circuit opens after repeated failures and recovers after cooldown", async () => {
  let now = Date.parse("2026-01-05T10:00:00.000Z");
  const down = () => new InferenceError("BackendUnreachable", "backend down");
  const gateway = new ScriptedGateway([down(), down(), down(), "ACTION=ReportStatus"]);
  const { controller, phases } = harness(gateway, { clock: () => new Date(now) });

  for (let i = 0; i < 3; i += 1) {
    const failed = await controller.runCycle({});
    assert.ok(failed);
    assert.equal(failed.status, "failed");
    assert.equal(failed.outcome.code, "inference_failed");
    assert.equal(failed.outcome.message, "inference failed (BackendUnreachable): backend down");
    assert.deepEqual(failed.parsedIntent, { kind: "NoAction", reason: "inference_failed" });
  }
  assert.equal(controller.state.circuitOpen, true);

  phases.length = 0;
  const degraded = await controller.runCycle({});
  assert.ok(degraded);
  assert.equal(degraded.status, "degraded");
  assert.equal(degraded.outcome.code, "degraded");
  assert.equal(degraded.outcome.succeeded, true);
  assert.equal(degraded.outcome.message, `degraded: inference suspended for 60s after 3 backend failures; ${STATUS}`);
  assert.deepEqual(phases, ["CircuitOpen", "Idle"]);
  assert.equal(gateway.prompts.length, 3);

  now += 60_000;
  const recovered = await controller.runCycle({});
  assert.ok(recovered);
  assert.equal(recovered.status, "completed");
  assert.equal(recovered.outcome.message, STATUS);
  assert.deepEqual(controller.state, {
    consecutiveFailureCount: 0,
    lastSuccessfulCycleTime: "2026-01-05T10:01:00.000Z",
    circuitOpen: false,
    circuitOpenedAt: null
  });
});

test("one failure after cooldown reopens the circuit", async () => {
  let now = Date.parse("2026-01-05T10:00:00.000Z");
  const down = () => new InferenceError("BackendUnreachable", "backend down");
  const gateway = new ScriptedGateway([down(), down(), down(), down()]);
  const { controller } = harness(gateway, { clock: () => new Date(now) });
  for (let i = 0; i < 3; i += 1) await controller.runCycle({});

  now += 61_000;
  const record = await controller.runCycle({});
  assert.ok(record);
  assert.equal(record.status, "failed");
  assert.equal(controller.state.circuitOpen, true);
  assert.equal(controller.state.consecutiveFailureCount, 4);
  assert.equal(controller.state.circuitOpenedAt, "2026-01-05T10:01:01.000Z");
});

test("rejected requests do not count toward the circuit", async () => {
  const { controller } = harness(new ScriptedGateway([new InferenceError("BackendRejected", "HTTP 400")]));
  const record = await controller.runCycle({});
  assert.ok(record);
  assert.equal(record.outcome.message, "inference failed (BackendRejected): HTTP 400");
  assert.equal(controller.state.consecutiveFailureCount, 0);
});

test("an oversized prompt fails the cycle without inference", async () => {
  const gateway = new ScriptedGateway(["ACTION=ReportStatus"]);
  const { controller } = harness(gateway, { prompt: { byteBudget: 100 } });
  const record = await controller.runCycle({});
  assert.ok(record);
  assert.equal(record.status, "failed");
  assert.deepEqual(record.parsedIntent, { kind: "NoAction", reason: "prompt_too_large" });
  assert.equal(gateway.prompts.length, 0);
  assert.equal(controller.state.consecutiveFailureCount, 0);
});

test("background cycles skip inference while the system is nominal", async () => {
  const gateway = new ScriptedGateway(["ACTION=ReportStatus"]);
  const { controller, phases } = harness(gateway, { snapshot: calmSnapshot() });
  const record = await controller.runCycle({ mode: "background" });
  assert.ok(record);
  assert.equal(record.mode, "background");
  assert.deepEqual(record.parsedIntent, { kind: "NoAction", reason: "system_nominal" });
  assert.equal(record.rawModelText, null);
  assert.equal(gateway.prompts.length, 0);
  assert.deepEqual(phases, ["Validating", "Executing", "Recording", "Idle"]);
});

test("cycles are serialized", async () => {
  let active = 0;
  let peak = 0;
  const slow: InferencePort = {
    async infer() {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 10));
      active -= 1;
      return "ACTION=ReportStatus";
    }
  };
  const { controller, audit } = harness(slow);
  await Promise.all([controller.runCycle({}), controller.runCycle({ mode: "background" }), controller.runCycle({})]);
  assert.equal(peak, 1);
  assert.equal((await audit.list()).length, 3);
});

test("a cancelled inference abandons the cycle", async () => {
  const abort = new AbortController();
  const hanging: InferencePort = {
    infer: (_prompt, opts) =>
      new Promise<string>((_resolve, reject) => {
        opts?.signal?.addEventListener("abort", () => reject(new InferenceError("Cancelled", "aborted")), { once: true });
        queueMicrotask(() => abort.abort());
      })
  };
  const { controller, audit } = harness(hanging);
  const record = await controller.runCycle({ signal: abort.signal });
  assert.equal(record, null);
  assert.deepEqual(await audit.list(), []);
  assert.equal(controller.phase, "Idle");
  assert.equal(controller.state.consecutiveFailureCount, 0);
});

test("sensor and audit failures do not break the cycle", async () => {
  const sensors: SnapshotProvider = {
    capture: async () => {
      throw new Error("sensors offline");
    }
  };
  const audit: AuditLog = {
    append: async () => {
      throw new Error("disk full");
    },
    list: async () => [],
    get: async () => null
  };
  const { controller } = harness(new ScriptedGateway(["ACTION=ReportStatus"]), { sensors, audit });
  const record = await controller.runCycle({});
  assert.ok(record);
  assert.equal(record.outcome.message, "cpu 0.0%, memory 0.0%, disk 0.0%, battery n/a");
});

test("createAgent wires a working loop", async () => {
  const config = parseConfig({}, {});
  const backend: InferenceBackend = {
    name: "ollama",
    generate: async () => "ACTION=TerminateProcess target=chrome.exe reason=high_memory",
    listModels: async () => [config.llmModel]
  };
  const control = new FakeControl();
  const audit = new MemoryAuditLog();
  const agent = createAgent(config, {
    sensors: new FixedSensors(busySnapshot()),
    control,
    audit,
    gateway: new InferenceGateway({ model: config.llmModel, baseUrl: config.apiBase, backend, logger: silentLogger }),
    logger: silentLogger
  });
  const record = await agent.controller.runCycle({ userRequest: "close chrome" });
  assert.ok(record);
  assert.equal(record.outcome.message, "terminated 2 processes named chrome.exe");
  assert.equal((await audit.list()).length, 1);
});
