import ora from "ora";

import { createApp } from "../../app.js";
import { loadJobSpecs } from "../../config/jobs.js";
import { displayIterationSummary } from "../utils/display.js";
import { loadSettingsOrReport, reportError } from "./shared.js";

import type { Command } from "commander";

// ============================================================================
// Run Command
// ============================================================================

export function registerRunCommand(program: Command): void {
  program
    .command("run")
    .description("Run a single sync iteration and exit")
    .option("--job <names...>", "Only run the named databases")
    .action(async (options: { job?: string[] }) => {
      const settings = loadSettingsOrReport();
      if (settings === null) {
        return;
      }

      const only = options.job === undefined ? null : new Set(options.job);
      const app = createApp(settings, {
        loadJobs: async () => {
          const jobs = await loadJobSpecs(settings.jobsFile, settings);
          return only === null ? jobs : jobs.filter((job) => only.has(job.name));
        },
      });

      const spinner = ora("Loading jobs and connecting to spreadsheet...").start();

      try {
        const jobs = await app.scheduler.initialize();
        if (jobs.length === 0) {
          spinner.warn("No jobs to run");
          return;
        }

        spinner.text = `Syncing ${String(jobs.length)} job(s)...`;
        const summary = await app.scheduler.runIteration();

        if (summary.failed > 0) {
          spinner.fail(
            `Iteration finished with ${String(summary.failed)} failed job(s)`
          );
          process.exitCode = 1;
        } else {
          spinner.succeed("Iteration completed");
        }

        displayIterationSummary(summary);
      } catch (error) {
        spinner.fail("Sync failed");
        reportError(error);
      }
    });
}
