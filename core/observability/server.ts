import Fastify, { type FastifyInstance } from "fastify";

import type { LoopController } from "../loop/controller.js";
import { metricsRegistry } from "./metrics.js";

/** Health and Prometheus endpoints for background mode. */
export function buildStatusServer(controller: Pick<LoopController, "state" | "phase">): FastifyInstance {
  const app = Fastify({ logger: false });

  app.get("/health", async () => {
    const state = controller.state;
    return {
      ok: !state.circuitOpen,
      phase: controller.phase,
      circuit_open: state.circuitOpen,
      consecutive_failures: state.consecutiveFailureCount,
      last_successful_cycle_time: state.lastSuccessfulCycleTime
    };
  });

  app.get("/metrics", async (_, reply) => {
    reply.header("Content-Type", metricsRegistry().contentType);
    return metricsRegistry().metrics();
  });

  return app;
}
