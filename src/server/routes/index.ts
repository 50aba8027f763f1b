/**
 * API Routes Registration
 */

import { registerHealthRoutes, type HealthRouteDeps } from "./health.js";
import { registerStatusRoutes, type StatusRouteDeps } from "./status.js";

import type { FastifyInstance } from "fastify";

export type RouteDeps = HealthRouteDeps & StatusRouteDeps;

/**
 * Register health (unversioned) and API v1 routes
 */
export async function registerApiRoutes(
  app: FastifyInstance,
  deps: RouteDeps
): Promise<void> {
  registerHealthRoutes(app, deps);

  await app.register(
    (api) => {
      registerStatusRoutes(api, deps);
      return Promise.resolve();
    },
    { prefix: "/api/v1" }
  );
}
