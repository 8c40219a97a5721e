import assert from "node:assert/strict";
import test from "node:test";

import { INITIAL_LOOP_STATE } from "../core/loop/loop-state.js";
import { buildStatusServer } from "../core/observability/server.js";

test("health reports the loop state", async () => {
  const app = buildStatusServer({ state: INITIAL_LOOP_STATE, phase: "Idle" });
  try {
    const res = await app.inject({ method: "GET", url: "/health" });
    assert.equal(res.statusCode, 200);
    assert.deepEqual(res.json(), {
      ok: true,
      phase: "Idle",
      circuit_open: false,
      consecutive_failures: 0,
      last_successful_cycle_time: null
    });
  } finally {
    await app.close();
  }
});

test("health turns unhealthy while the circuit is open", async () => {
  const state = {
    consecutiveFailureCount: 3,
    lastSuccessfulCycleTime: "2026-01-05T09:00:00.000Z",
    circuitOpen: true,
    circuitOpenedAt: "2026-01-05T10:00:00.000Z"
  };
  const app = buildStatusServer({ state, phase: "CircuitOpen" });
  try {
    const body = (await app.inject({ method: "GET", url: "/health" })).json();
    assert.equal(body.ok, false);
    assert.equal(body.consecutive_failures, 3);
  } finally {
    await app.close();
  }
});

test("metrics are served in prometheus format", async () => {
  const app = buildStatusServer({ state: INITIAL_LOOP_STATE, phase: "Idle" });
  try {
    const res = await app.inject({ method: "GET", url: "/metrics" });
    assert.equal(res.statusCode, 200);
    assert.ok(res.payload.includes("# TYPE hostpilot_circuit_open gauge"));
    assert.ok(res.payload.includes("# TYPE hostpilot_cycles_total counter"));
  } finally {
    await app.close();
  }
});
