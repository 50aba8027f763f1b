import chalk from "chalk";

import { loadSettings, type Settings } from "../../config/settings.js";
import { ConfigValidationError, errorMessage } from "../../errors.js";

/**
 * Load settings, or print the problems and set a failing exit code
 */
export function loadSettingsOrReport(): Settings | null {
  try {
    return loadSettings();
  } catch (error) {
    reportError(error);
    return null;
  }
}

export function reportError(error: unknown): void {
  if (error instanceof ConfigValidationError) {
    console.error(chalk.red(`Configuration error: ${error.message}`));
  } else {
    console.error(chalk.red(`Error: ${errorMessage(error)}`));
  }
  process.exitCode = 1;
}
