import chalk from "chalk";
import { Command, InvalidArgumentError } from "commander";
import { config as loadDotenv } from "dotenv";
import ora, { type Ora } from "ora";
import readline, { type Interface } from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";

import { createAgent, type Agent } from "../core/agent.js";
import { JsonlAuditLog } from "../core/audit-log.js";
import { defaultConfigPath, readConfig } from "../core/config.js";
import { ConfigurationError, errorMessage } from "../core/errors.js";
import { describeIntent, type Approver } from "../core/executor.js";
import { BackgroundScheduler } from "../core/loop/scheduler.js";
import { logger } from "../core/observability/logger.js";
import { buildStatusServer } from "../core/observability/server.js";
import { buildPolicy } from "../core/policy.js";
import { replayCycle } from "../core/replay.js";
import { NodeSnapshotProvider } from "../core/sensors/snapshot-provider.js";
import type { AgentConfig } from "../core/types.js";
import { askYesNo } from "../utils/confirm.js";
import { printJson, renderLogLine, renderRecord, renderSnapshot } from "./render.js";

/** Failure that ends the command with a specific exit code. */
class CliError extends Error {
  constructor(message: string, readonly exitCode: number) {
    super(message);
    this.name = "CliError";
  }
}

interface GlobalOptions {
  config?: string;
  verbose?: boolean;
  background?: boolean;
  metricsPort?: number;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("Expected a positive integer.");
  return n;
}

function parsePort(value: string): number {
  const n = parsePositiveInt(value);
  if (n > 65_535) throw new InvalidArgumentError("Expected a port between 1 and 65535.");
  return n;
}

async function loadConfig(opts: GlobalOptions): Promise<{ config: AgentConfig; path: string }> {
  const file = opts.config || defaultConfigPath();
  const config = await readConfig(file);
  logger.level = config.logLevel;
  return { config, path: file };
}

async function ensureBackend(agent: Agent): Promise<void> {
  const { config, gateway } = agent;
  const probe = await gateway.waitUntilReachable(config.startupProbeAttempts);
  if (!probe.reachable) {
    throw new CliError(`LLM backend at ${config.apiBase} is unreachable: ${probe.error || "no answer"}`, 2);
  }
  if (!probe.modelAvailable) {
    logger.warn({ model: config.llmModel, available: probe.models }, "configured model not listed by the backend");
  }
}

function approver(rl: Interface | undefined, autoYes: boolean, spinner: Ora): Approver {
  return async (intent, risk) => {
    if (autoYes) return true;
    spinner.stop();
    return askYesNo(`${chalk.yellow(`[${risk}]`)} ${describeIntent(intent)}. Proceed?`, true, rl);
  };
}

function thinking(): Ora {
  return ora({ text: "Consulting the model...", stream: process.stderr }).start();
}

async function runInteractive(agent: Agent, verbose: boolean): Promise<void> {
  const rl = readline.createInterface({ input, output });
  const abort = new AbortController();
  rl.on("SIGINT", () => {
    abort.abort();
    rl.close();
  });
  output.write(chalk.cyan(`hostpilot ready (${agent.config.llmModel}). Describe what you need, or type "exit".\n`));

  try {
    for (;;) {
      let line: string;
      try {
        line = (await rl.question(chalk.bold("> "))).trim();
      } catch (err) {
        logger.debug({ err: errorMessage(err) }, "input closed");
        break;
      }
      if (!line) continue;
      if (/^(exit|quit)$/i.test(line)) break;

      const spinner = thinking();
      const record = await agent.controller.runCycle({
        userRequest: line,
        mode: "interactive",
        signal: abort.signal,
        approve: approver(rl, false, spinner)
      });
      spinner.stop();
      if (!record) {
        output.write(`${chalk.gray("cancelled")}\n`);
        break;
      }
      output.write(`${renderRecord(record, verbose)}\n`);
    }
  } finally {
    rl.close();
  }
}

async function runBackground(agent: Agent, metricsPort?: number): Promise<void> {
  const scheduler = new BackgroundScheduler({
    intervalMs: agent.config.systemCheckInterval * 1000,
    runCycle: async (signal) => {
      const record = await agent.controller.runCycle({ mode: "background", signal });
      if (record) {
        logger.info(
          { id: record.id, status: record.status, code: record.outcome.code, intent: describeIntent(record.parsedIntent) },
          record.outcome.message
        );
      }
    },
    logger
  });

  const server = metricsPort === undefined ? null : buildStatusServer(agent.controller);
  if (server) {
    await server.listen({ port: metricsPort, host: "127.0.0.1" });
    logger.info({ port: metricsPort }, "status server listening");
  }

  scheduler.start();
  await new Promise<void>((resolve) => {
    const shutdown = (signal: NodeJS.Signals) => {
      process.off("SIGINT", shutdown);
      process.off("SIGTERM", shutdown);
      logger.info({ signal }, "shutting down");
      resolve();
    };
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);
  });

  await scheduler.stop();
  if (server) await server.close();
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("hostpilot")
    .description("Local LLM assistant that watches this machine and carries out safe, validated actions")
    .version("0.1.0")
    .option("-c, --config <path>", "config file (default ~/.hostpilot/config.json)")
    .option("-v, --verbose", "show the raw model text for each cycle")
    .option("--background", "run cycles on the configured interval until interrupted")
    .option("--metrics-port <port>", "serve /health and /metrics while in background mode", parsePort)
    .action(async () => {
      const opts = program.opts<GlobalOptions>();
      const { config } = await loadConfig(opts);
      const agent = createAgent(config);
      await ensureBackend(agent);
      if (opts.background) {
        await runBackground(agent, opts.metricsPort);
        return;
      }
      await runInteractive(agent, Boolean(opts.verbose));
    });

  program
    .command("ask")
    .description("Run one cycle for a request")
    .argument("<request...>", "what you want done")
    .option("-y, --yes", "approve risky actions without asking")
    .option("--json", "print the cycle record as JSON")
    .action(async (parts: string[], cmdOpts: { yes?: boolean; json?: boolean }) => {
      const opts = program.opts<GlobalOptions>();
      const { config } = await loadConfig(opts);
      const agent = createAgent(config);
      await ensureBackend(agent);

      const abort = new AbortController();
      const cancel = () => abort.abort();
      process.once("SIGINT", cancel);
      const spinner = thinking();
      try {
        const record = await agent.controller.runCycle({
          userRequest: parts.join(" "),
          mode: "interactive",
          signal: abort.signal,
          approve: approver(undefined, Boolean(cmdOpts.yes), spinner)
        });
        spinner.stop();
        if (!record) {
          output.write(`${chalk.gray("cancelled")}\n`);
          return;
        }
        if (cmdOpts.json) printJson(record);
        else output.write(`${renderRecord(record, Boolean(opts.verbose))}\n`);
      } finally {
        spinner.stop();
        process.off("SIGINT", cancel);
      }
    });

  program
    .command("status")
    .description("Show the current snapshot without asking the model")
    .option("--json", "print the snapshot as JSON")
    .action(async (cmdOpts: { json?: boolean }) => {
      await loadConfig(program.opts<GlobalOptions>());
      const snapshot = await new NodeSnapshotProvider({ logger }).capture();
      if (cmdOpts.json) printJson(snapshot);
      else output.write(`${renderSnapshot(snapshot)}\n`);
    });

  program
    .command("doctor")
    .description("Check the config and the LLM backend")
    .action(async () => {
      const { config, path } = await loadConfig(program.opts<GlobalOptions>());
      const agent = createAgent(config);
      const probe = await agent.gateway.probe();
      const issues: string[] = [];
      if (!probe.reachable) issues.push(`Backend unreachable at ${config.apiBase}: ${probe.error || "no answer"}`);
      else if (!probe.modelAvailable) issues.push(`Model ${config.llmModel} is not available on the backend`);
      if (config.llmProvider === "openai" && !config.apiKey) issues.push("API key missing for openai provider");
      printJson({
        ok: issues.length === 0,
        issues,
        config_path: path,
        provider: config.llmProvider,
        model: config.llmModel,
        api_base: config.apiBase,
        models: probe.models
      });
    });

  program
    .command("config")
    .description("Print the resolved config")
    .action(async () => {
      const { config, path } = await loadConfig(program.opts<GlobalOptions>());
      printJson({ path, ...config, apiKey: config.apiKey ? "***" : "" });
    });

  program
    .command("logs")
    .description("List recent cycle records, newest first")
    .option("--limit <n>", "number of records", parsePositiveInt, 20)
    .option("--json", "print records as JSON")
    .action(async (cmdOpts: { limit: number; json?: boolean }) => {
      const { config } = await loadConfig(program.opts<GlobalOptions>());
      const records = await new JsonlAuditLog(config.auditLog, logger).list(cmdOpts.limit);
      if (cmdOpts.json) {
        printJson(records);
        return;
      }
      if (!records.length) output.write(`${chalk.gray("no cycles recorded yet")}\n`);
      for (const record of records) output.write(`${renderLogLine(record)}\n`);
    });

  program
    .command("replay")
    .description("Re-parse and re-validate a recorded cycle without executing it")
    .argument("<id>", "cycle id")
    .action(async (id: string) => {
      const { config } = await loadConfig(program.opts<GlobalOptions>());
      const record = await new JsonlAuditLog(config.auditLog, logger).get(id);
      if (!record) throw new CliError(`No cycle record with id ${id}`, 1);
      printJson({ ...replayCycle(record, buildPolicy(config)), executed: false });
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  loadDotenv();
  try {
    await buildProgram().parseAsync(argv);
  } catch (err) {
    if (err instanceof CliError) {
      process.stderr.write(`${chalk.red(err.message)}\n`);
      process.exitCode = err.exitCode;
      return;
    }
    if (err instanceof ConfigurationError) {
      process.stderr.write(`${chalk.red(err.message)}\n`);
      process.exitCode = 1;
      return;
    }
    process.stderr.write(`${err instanceof Error && err.stack ? err.stack : String(err)}\n`);
    process.exitCode = 1;
  }
}
