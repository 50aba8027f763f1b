import Fastify, { type FastifyInstance } from "fastify";

import { fastifyLoggerConfig, serverLogger } from "../logger.js";
import { errorHandler } from "./plugins/error-handler.js";
import { registerApiRoutes, type RouteDeps } from "./routes/index.js";

export interface StatusServerOptions {
  /** Disable request logging (tests) */
  logger?: boolean;
}

/**
 * Build the status server without listening
 */
export async function buildStatusServer(
  deps: RouteDeps,
  options: StatusServerOptions = {}
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger === false ? false : fastifyLoggerConfig,
  });

  // Register error handler
  await app.register(errorHandler);

  // Register API routes
  await registerApiRoutes(app, deps);

  return app;
}

export async function startStatusServer(
  app: FastifyInstance,
  port: number,
  host: string
): Promise<void> {
  await app.listen({ port, host });
  serverLogger.info({ host, port }, "Status server started");
}
