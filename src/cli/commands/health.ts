import chalk from "chalk";
import ora from "ora";

import { createEnrichment } from "../../app.js";
import { loadSettingsOrReport, reportError } from "./shared.js";

import type { Command } from "commander";

// ============================================================================
// Health Command
// ============================================================================

export function registerHealthCommand(program: Command): void {
  program
    .command("health")
    .description("Check that the partner API answers")
    .action(async () => {
      const settings = loadSettingsOrReport();
      if (settings === null) {
        return;
      }

      const enrichment = createEnrichment(settings);
      if (enrichment === null) {
        console.log(chalk.yellow("PARTNER_API_URL is not set, nothing to check"));
        return;
      }

      const spinner = ora("Checking partner API...").start();
      try {
        if (await enrichment.healthCheck()) {
          spinner.succeed(`Partner API is healthy (${settings.partner.apiUrl ?? ""})`);
        } else {
          spinner.fail("Partner API health check failed");
          process.exitCode = 1;
        }
      } catch (error) {
        spinner.fail("Partner API health check failed");
        reportError(error);
      }
    });
}
