/**
 * Health Routes
 */

import { Type, type Static } from "@sinclair/typebox";

import { ServiceUnavailableError } from "../plugins/error-handler.js";

import type { HealthDto } from "../../types/api.js";
import type { EnrichmentService } from "../../types/index.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const HealthQuerySchema = Type.Object({
  deep: Type.Optional(Type.Boolean({ default: false })),
});

type HealthQuery = Static<typeof HealthQuerySchema>;

const HealthResponseSchema = Type.Object(
  {
    status: Type.Literal("ok"),
    uptimeSeconds: Type.Number(),
    partnerApi: Type.Optional(
      Type.Union([Type.Literal("ok"), Type.Literal("not-configured")])
    ),
  },
  {
    examples: [{ status: "ok", uptimeSeconds: 42, partnerApi: "ok" }],
  }
);

export interface HealthRouteDeps {
  enrichment: EnrichmentService | null;
  /** Seconds since the process started */
  uptime?: () => number;
}

// ============================================================================
// Routes
// ============================================================================

export function registerHealthRoutes(
  app: FastifyInstance,
  deps: HealthRouteDeps
): void {
  const uptime = deps.uptime ?? (() => process.uptime());

  /**
   * GET /health - Process liveness, plus the partner API with ?deep=true
   */
  app.get<{ Querystring: HealthQuery }>(
    "/health",
    {
      schema: {
        querystring: HealthQuerySchema,
        response: {
          200: HealthResponseSchema,
        },
      },
    },
    async (request): Promise<HealthDto> => {
      const health: HealthDto = {
        status: "ok",
        uptimeSeconds: Math.round(uptime()),
      };

      if (request.query.deep !== true) {
        return health;
      }

      if (deps.enrichment === null) {
        return { ...health, partnerApi: "not-configured" };
      }

      const healthy = await deps.enrichment.healthCheck();
      if (!healthy) {
        throw new ServiceUnavailableError("Partner API health check failed");
      }
      return { ...health, partnerApi: "ok" };
    }
  );
}
