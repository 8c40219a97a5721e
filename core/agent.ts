import { InferenceGateway } from "./ai/inference-gateway.js";
import { JsonlAuditLog, type AuditLog } from "./audit-log.js";
import { ActionExecutor } from "./executor.js";
import { LoopController } from "./loop/controller.js";
import { logger as rootLogger, type Logger } from "./observability/logger.js";
import { buildPolicy } from "./policy.js";
import { NodeSnapshotProvider, type SnapshotProvider } from "./sensors/snapshot-provider.js";
import type { AgentConfig } from "./types.js";
import { NodeSystemControl, type SystemControl } from "../executors/system-control.js";

export interface Agent {
  config: AgentConfig;
  sensors: SnapshotProvider;
  gateway: InferenceGateway;
  executor: ActionExecutor;
  audit: AuditLog;
  controller: LoopController;
}

export interface AgentOverrides {
  sensors?: SnapshotProvider;
  control?: SystemControl;
  audit?: AuditLog;
  gateway?: InferenceGateway;
  logger?: Logger;
}

/** Wires the loop components from a resolved config. */
export function createAgent(config: AgentConfig, overrides: AgentOverrides = {}): Agent {
  const logger = overrides.logger ?? rootLogger;
  const sensors = overrides.sensors ?? new NodeSnapshotProvider({ logger });
  const gateway =
    overrides.gateway ??
    new InferenceGateway({
      provider: config.llmProvider,
      model: config.llmModel,
      baseUrl: config.apiBase,
      apiKey: config.apiKey,
      timeoutMs: config.inferenceTimeoutSeconds * 1000,
      maxRetries: config.maxRetries,
      maxResponseBytes: config.maxResponseBytes,
      logger
    });
  const executor = new ActionExecutor({
    policy: buildPolicy(config),
    control: overrides.control ?? new NodeSystemControl(),
    logger
  });
  const audit = overrides.audit ?? new JsonlAuditLog(config.auditLog, logger);
  const controller = new LoopController({
    sensors,
    gateway,
    executor,
    audit,
    prompt: {
      maxProcesses: config.maxPromptProcesses,
      byteBudget: config.promptByteBudget,
      powerPlans: config.powerPlans
    },
    breaker: {
      failureThreshold: config.failureThreshold,
      cooldownMs: config.circuitCooldownSeconds * 1000
    },
    backgroundOnlyOnAlert: config.backgroundOnlyOnAlert,
    logger
  });
  return { config, sensors, gateway, executor, audit, controller };
}
