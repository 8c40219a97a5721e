import chalk from "chalk";

import { describeAttention, attentionFlags } from "../core/ai/prompt-builder.js";
import { describeIntent } from "../core/executor.js";
import { describeDenial } from "../core/policy.js";
import type { CycleRecord, SystemSnapshot } from "../core/types.js";
import { formatStatus, formatTopProcesses } from "../executors/report.js";

export function printJson(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

export function renderRecord(record: CycleRecord, verbose = false): string {
  const { outcome } = record;
  const mark = outcome.succeeded ? chalk.green("✔") : chalk.red("✖");
  const lines = [`${mark} ${chalk.bold(describeIntent(record.parsedIntent))}`, `  ${outcome.message}`];

  if (record.decision && !record.decision.allowed) {
    lines.push(chalk.red(`  blocked: ${describeDenial(record.decision.reason)}`));
  }
  if (outcome.code === "permission_denied") {
    lines.push(chalk.yellow("  hint: the OS refused the action; rerun the agent with elevated privileges"));
  }
  if (record.parseError) {
    lines.push(chalk.yellow(`  model output rejected: ${record.parseError}`));
  }
  if (verbose && record.rawModelText !== null) {
    lines.push(chalk.gray("  model said:"));
    for (const line of record.rawModelText.split(/\r?\n/)) lines.push(chalk.gray(`    ${line}`));
  }
  return lines.join("\n");
}

export function renderLogLine(record: CycleRecord): string {
  const status =
    record.status === "completed" ? chalk.green(record.status) : record.status === "degraded" ? chalk.yellow(record.status) : chalk.red(record.status);
  return `${chalk.gray(record.startedAt)} ${record.id} ${record.mode} ${status} ${describeIntent(record.parsedIntent)} - ${record.outcome.message}`;
}

export function renderSnapshot(snapshot: SystemSnapshot): string {
  const notes = describeAttention(attentionFlags(snapshot));
  return [
    chalk.bold(formatStatus(snapshot)),
    notes.length ? chalk.yellow(`attention: ${notes.join(", ")}`) : chalk.green("attention: none"),
    formatTopProcesses(snapshot, 10)
  ].join("\n");
}
