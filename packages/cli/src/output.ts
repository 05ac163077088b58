import type { PipelineOutcome, StageRecord } from "@notes-to-blog/content-pipeline";
import type { StageFailure } from "@notes-to-blog/core";
import chalk from "chalk";
import Table from "cli-table3";
import { InvalidArgumentError } from "commander";

export function formatCost(cost: number): string {
  return `$${cost.toFixed(3)}`;
}

export function formatDuration(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(1)}s`;
}

/** Commander parser for a positive integer option. */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("must be a positive integer");
  }
  return parsed;
}

export function describeFailure(stage: string, failure: StageFailure): string[] {
  const lines = [`${stage}: [${failure.kind}] ${failure.message}`];
  for (const detail of failure.details ?? []) lines.push(`  - ${detail}`);
  return lines;
}

export function stageTable(records: readonly StageRecord[]): string {
  const table = new Table({
    head: [
      chalk.blue("Stage"),
      chalk.blue("Status"),
      chalk.blue("Attempts"),
      chalk.blue("Duration"),
      chalk.blue("Cost"),
    ],
  });

  for (const record of records) {
    table.push([
      record.stage,
      record.status === "success" ? chalk.green("ok") : chalk.red(record.failure?.kind ?? "failed"),
      String(record.attempts),
      formatDuration(record.durationMs),
      formatCost(record.cost),
    ]);
  }
  return table.toString();
}

export function outcomeLabel(outcome: PipelineOutcome): string {
  if (outcome.status === "completed") return chalk.green("completed");
  return outcome.failure.kind === "Cancelled" ? chalk.yellow("cancelled") : chalk.red(`failed at ${outcome.stage}`);
}
