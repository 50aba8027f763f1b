#!/usr/bin/env node

/**
 * Funnel Sheets Sync CLI
 *
 * Copies funnel data from the bot databases into Google Sheets tabs.
 */

import { Command } from "commander";

import { registerHealthCommand } from "./commands/health.js";
import { registerJobsCommand } from "./commands/jobs.js";
import { registerRunCommand } from "./commands/run.js";
import { registerStartCommand } from "./commands/start.js";

const program = new Command();

program
  .name("sheets-sync")
  .description("Sync bot funnel databases into Google Sheets")
  .version("0.1.0");

// Register all commands
registerStartCommand(program);
registerRunCommand(program);
registerJobsCommand(program);
registerHealthCommand(program);

program.action(() => {
  // Show help by default
  program.outputHelp();
});

await program.parseAsync();
