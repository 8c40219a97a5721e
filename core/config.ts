import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { z } from "zod";

import { ConfigurationError, errnoCode, errorMessage } from "./errors.js";
import { INTENT_KINDS } from "./grammar.js";
import type { AgentConfig } from "./types.js";

export function homeDir(): string {
  return process.env.HOSTPILOT_HOME || path.join(os.homedir(), ".hostpilot");
}

export function defaultConfigPath(): string {
  return path.join(homeDir(), "config.json");
}

export const DEFAULT_PROTECTED_PROCESSES = [
  "system",
  "system idle process",
  "smss.exe",
  "csrss.exe",
  "wininit.exe",
  "winlogon.exe",
  "services.exe",
  "lsass.exe",
  "svchost.exe",
  "dwm.exe",
  "explorer.exe",
  "init",
  "systemd",
  "launchd",
  "kernel_task",
  "loginwindow",
  "windowserver",
  "sshd",
  "dbus-daemon",
  "xorg"
];

export const DEFAULT_POWER_PLANS = ["balanced", "high_performance", "power_saver"];

const schema = z.object({
  llm_provider: z.enum(["ollama", "openai"]).default("ollama"),
  llm_model: z.string().min(1).default("llama3.2:1b"),
  api_base: z.string().url().default("http://localhost:11434"),
  api_key: z.string().default(""),
  system_check_interval: z.number().int().min(5).max(86_400).default(60),
  log_level: z
    .string()
    .transform((v) => v.toLowerCase())
    .pipe(z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]))
    .default("info"),
  inference_timeout_seconds: z.number().positive().max(600).default(30),
  max_retries: z.number().int().min(0).max(5).default(2),
  failure_threshold: z.number().int().min(1).max(100).default(3),
  circuit_cooldown_seconds: z.number().int().min(0).max(86_400).default(60),
  startup_probe_attempts: z.number().int().min(1).max(20).default(3),
  prompt_byte_budget: z.number().int().min(512).max(1_048_576).default(4096),
  max_response_bytes: z.number().int().min(64).max(1_048_576).default(16_384),
  max_prompt_processes: z.number().int().min(0).max(50).default(10),
  protected_processes: z.array(z.string().min(1)).default(DEFAULT_PROTECTED_PROCESSES),
  power_plans: z.array(z.string().regex(/^[a-z0-9_]{1,64}$/)).default(DEFAULT_POWER_PLANS),
  allowed_actions: z.array(z.enum(["ReportStatus", "TerminateProcess", "SetPowerPlan", "ListTopProcesses", "NoAction"])).default(INTENT_KINDS),
  background_only_on_alert: z.boolean().default(true),
  audit_log: z.string().min(1).optional()
});

export type ConfigFile = z.input<typeof schema>;

function toAgentConfig(file: z.output<typeof schema>, env: NodeJS.ProcessEnv): AgentConfig {
  const level = String(env.HOSTPILOT_LOG_LEVEL || file.log_level).toLowerCase();
  const logLevel = schema.shape.log_level.safeParse(level);
  return {
    llmProvider: file.llm_provider,
    llmModel: env.HOSTPILOT_MODEL || file.llm_model,
    apiBase: env.HOSTPILOT_API_BASE || file.api_base,
    apiKey: env.HOSTPILOT_API_KEY || env.OPENAI_API_KEY || file.api_key,
    systemCheckInterval: file.system_check_interval,
    logLevel: logLevel.success ? logLevel.data : file.log_level,
    inferenceTimeoutSeconds: file.inference_timeout_seconds,
    maxRetries: file.max_retries,
    failureThreshold: file.failure_threshold,
    circuitCooldownSeconds: file.circuit_cooldown_seconds,
    startupProbeAttempts: file.startup_probe_attempts,
    promptByteBudget: file.prompt_byte_budget,
    maxResponseBytes: file.max_response_bytes,
    maxPromptProcesses: file.max_prompt_processes,
    protectedProcesses: file.protected_processes.map((x) => x.toLowerCase()),
    powerPlans: file.power_plans,
    allowedActions: file.allowed_actions,
    backgroundOnlyOnAlert: file.background_only_on_alert,
    auditLog: file.audit_log || path.join(homeDir(), "audit.jsonl")
  };
}

export function defaultConfigFile(): ConfigFile {
  return {
    llm_model: "llama3.2:1b",
    api_base: "http://localhost:11434",
    system_check_interval: 60,
    log_level: "info"
  };
}

/** Validates a parsed config document. Throws ConfigurationError with every issue listed. */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): AgentConfig {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, parsed.error);
  }
  return toAgentConfig(parsed.data, env);
}

/**
 * Reads the config file. A missing file is created with defaults; an
 * unreadable or invalid one is a ConfigurationError.
 */
export async function readConfig(file = defaultConfigPath(), env: NodeJS.ProcessEnv = process.env): Promise<AgentConfig> {
  let text: string;
  try {
    text = await fs.readFile(file, "utf8");
  } catch (err) {
    if (errnoCode(err) !== "ENOENT") {
      throw new ConfigurationError(`Cannot read config ${file}: ${errorMessage(err)}`, err);
    }
    const defaults = defaultConfigFile();
    await writeConfig(defaults, file);
    return parseConfig(defaults, env);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`Config ${file} is not valid JSON: ${errorMessage(err)}`, err);
  }
  return parseConfig(raw, env);
}

export async function writeConfig(config: ConfigFile, file = defaultConfigPath()): Promise<void> {
  try {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, `${JSON.stringify(config, null, 2)}\n`, "utf8");
  } catch (err) {
    throw new ConfigurationError(`Cannot write config ${file}: ${errorMessage(err)}`, err);
  }
}
