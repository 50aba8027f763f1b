/**
 * Status Routes
 *
 * Scheduler state and the outcome of the last sync iteration.
 */

import { Type, type Static } from "@sinclair/typebox";

import { NotFoundError } from "../plugins/error-handler.js";

import type { SchedulerStatus } from "../../services/sync/scheduler.js";
import type {
  IterationDto,
  OutcomeDto,
  SchedulerStatusDto,
  ApiResponse,
} from "../../types/api.js";
import type { IterationSummary, SyncOutcome } from "../../types/index.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const OutcomeSchema = Type.Object({
  jobName: Type.String(),
  sheetTab: Type.String(),
  status: Type.Union([Type.Literal("succeeded"), Type.Literal("failed")]),
  rowCount: Type.Number(),
  error: Type.Union([Type.String(), Type.Null()]),
  failedStage: Type.Union([Type.String(), Type.Null()]),
  durationMs: Type.Number(),
});

const IterationSchema = Type.Object({
  iteration: Type.Number(),
  startedAt: Type.String({ format: "date-time" }),
  durationMs: Type.Number(),
  succeeded: Type.Number(),
  failed: Type.Number(),
  outcomes: Type.Array(OutcomeSchema),
});

const StatusResponseSchema = Type.Object({
  data: Type.Object({
    state: Type.String(),
    jobCount: Type.Number(),
    iterations: Type.Number(),
    nextRunAt: Type.Union([Type.String({ format: "date-time" }), Type.Null()]),
    lastIteration: Type.Union([IterationSchema, Type.Null()]),
  }),
});

const JobParamsSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
});

type JobParams = Static<typeof JobParamsSchema>;

const JobOutcomeResponseSchema = Type.Object({
  data: OutcomeSchema,
});

export interface StatusRouteDeps {
  status: () => SchedulerStatus;
}

// ============================================================================
// Mapping
// ============================================================================

export function toOutcomeDto(outcome: SyncOutcome): OutcomeDto {
  return {
    jobName: outcome.jobName,
    sheetTab: outcome.sheetTab,
    status: outcome.status,
    rowCount: outcome.rowCount,
    error: outcome.error?.message ?? null,
    failedStage: outcome.failedStage,
    durationMs: outcome.durationMs,
  };
}

export function toIterationDto(summary: IterationSummary): IterationDto {
  return {
    iteration: summary.iteration,
    startedAt: summary.startedAt.toISOString(),
    durationMs: summary.durationMs,
    succeeded: summary.succeeded,
    failed: summary.failed,
    outcomes: summary.outcomes.map(toOutcomeDto),
  };
}

// ============================================================================
// Routes
// ============================================================================

export function registerStatusRoutes(
  app: FastifyInstance,
  deps: StatusRouteDeps
): void {
  /**
   * GET /status - Scheduler state and last iteration summary
   */
  app.get(
    "/status",
    {
      schema: {
        response: {
          200: StatusResponseSchema,
        },
      },
    },
    (): ApiResponse<SchedulerStatusDto> => {
      const status = deps.status();
      return {
        data: {
          state: status.state,
          jobCount: status.jobCount,
          iterations: status.iterations,
          nextRunAt: status.nextRunAt?.toISOString() ?? null,
          lastIteration:
            status.lastSummary === null
              ? null
              : toIterationDto(status.lastSummary),
        },
      };
    }
  );

  /**
   * GET /status/jobs/:name - Last outcome of one job
   */
  app.get<{ Params: JobParams }>(
    "/status/jobs/:name",
    {
      schema: {
        params: JobParamsSchema,
        response: {
          200: JobOutcomeResponseSchema,
        },
      },
    },
    (request): ApiResponse<OutcomeDto> => {
      const { name } = request.params;
      const outcome = deps
        .status()
        .lastSummary?.outcomes.find((candidate) => candidate.jobName === name);

      if (outcome === undefined) {
        throw new NotFoundError(`No outcome recorded for job '${name}'`);
      }
      return { data: toOutcomeDto(outcome) };
    }
  );
}
