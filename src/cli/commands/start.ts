import { createApp } from "../../app.js";
import { logger } from "../../logger.js";
import { buildStatusServer, startStatusServer } from "../../server/index.js";
import { loadSettingsOrReport, reportError } from "./shared.js";

import type { Command } from "commander";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Start Command
// ============================================================================

export function registerStartCommand(program: Command): void {
  program
    .command("start")
    .description("Run the sync loop until interrupted")
    .option("--port <port>", "Status server port (overrides STATUS_PORT)")
    .action(async (options: { port?: string }) => {
      const settings = loadSettingsOrReport();
      if (settings === null) {
        return;
      }

      const statusPort =
        options.port === undefined
          ? settings.statusPort
          : Number.parseInt(options.port, 10);

      const app = createApp(settings);
      let server: FastifyInstance | null = null;

      const shutdown = (signal: NodeJS.Signals): void => {
        logger.info({ signal }, "Shutdown signal received");
        app.scheduler.stop();
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);

      try {
        if (statusPort !== null && !Number.isNaN(statusPort)) {
          server = await buildStatusServer({
            enrichment: app.enrichment,
            status: () => app.scheduler.status(),
          });
          await startStatusServer(server, statusPort, settings.host);
        }

        await app.scheduler.start();
      } catch (error) {
        reportError(error);
      } finally {
        process.off("SIGINT", shutdown);
        process.off("SIGTERM", shutdown);
        if (server !== null) {
          await server.close();
        }
      }
    });
}
