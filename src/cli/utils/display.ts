/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type { IterationSummary, JobSpec } from "../../types/index.js";

/**
 * Display loaded job definitions
 */
export function displayJobsTable(jobs: readonly JobSpec[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Database"),
      chalk.cyan("Tab"),
      chalk.cyan("Range"),
      chalk.cyan("Start"),
      chalk.cyan("Clear tail"),
      chalk.cyan("SSH"),
      chalk.cyan("Enrich"),
    ],
  });

  for (const job of jobs) {
    table.push([
      job.name,
      job.sheetTab,
      job.columnRange,
      String(job.startRow),
      job.clearTail ? "yes" : "no",
      job.tunnel === undefined ? chalk.gray("no") : chalk.green("yes"),
      job.enrich ? chalk.green("yes") : chalk.gray("no"),
    ]);
  }

  console.log(table.toString());
}

/**
 * Display per-job outcomes of one iteration
 */
export function displayIterationSummary(summary: IterationSummary): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Database"),
      chalk.cyan("Tab"),
      chalk.cyan("Status"),
      chalk.cyan("Rows"),
      chalk.cyan("Duration"),
      chalk.cyan("Error"),
    ],
    colWidths: [20, 20, 12, 8, 10, 50],
    wordWrap: true,
  });

  for (const outcome of summary.outcomes) {
    table.push([
      outcome.jobName,
      outcome.sheetTab,
      outcome.status === "succeeded"
        ? chalk.green(outcome.status)
        : chalk.red(outcome.status),
      String(outcome.rowCount),
      `${(outcome.durationMs / 1000).toFixed(1)}s`,
      outcome.error === null
        ? ""
        : `[${outcome.failedStage ?? "unknown"}] ${outcome.error.message}`,
    ]);
  }

  console.log(table.toString());
  console.log(
    `\n${chalk.green(`${String(summary.succeeded)} succeeded`)}, ` +
      `${summary.failed > 0 ? chalk.red(`${String(summary.failed)} failed`) : "0 failed"} ` +
      chalk.gray(`in ${(summary.durationMs / 1000).toFixed(1)}s`)
  );
}
