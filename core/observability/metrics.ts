import { Counter, Gauge, Histogram, Registry } from "prom-client";

const registry = new Registry();

export const cycleCounter = new Counter({
  name: "hostpilot_cycles_total",
  help: "Loop cycles by status",
  labelNames: ["mode", "status"],
  registers: [registry]
});

export const inferenceLatencyHistogram = new Histogram({
  name: "hostpilot_inference_seconds",
  help: "Inference latency in seconds",
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60],
  registers: [registry]
});

export const circuitOpenGauge = new Gauge({
  name: "hostpilot_circuit_open",
  help: "1 while inference is suspended by the circuit breaker",
  registers: [registry]
});

export function metricsRegistry(): Registry {
  return registry;
}
