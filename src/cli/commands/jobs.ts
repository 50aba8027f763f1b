import chalk from "chalk";

import { loadJobSpecs } from "../../config/jobs.js";
import { displayJobsTable } from "../utils/display.js";
import { loadSettingsOrReport, reportError } from "./shared.js";

import type { Command } from "commander";

// ============================================================================
// Jobs Command
// ============================================================================

export function registerJobsCommand(program: Command): void {
  program
    .command("jobs")
    .description("List and validate the configured jobs")
    .action(async () => {
      const settings = loadSettingsOrReport();
      if (settings === null) {
        return;
      }

      try {
        const jobs = await loadJobSpecs(settings.jobsFile, settings);
        console.log(
          chalk.bold(`\n${String(jobs.length)} job(s) from ${settings.jobsFile}\n`)
        );
        displayJobsTable(jobs);
      } catch (error) {
        reportError(error);
      }
    });
}
