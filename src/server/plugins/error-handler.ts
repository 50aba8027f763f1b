/**
 * Fastify error handler plugin
 */

import fp from "fastify-plugin";

import { categorizeError, SyncError } from "../../errors.js";

import type { ApiError } from "../../types/api.js";
import type {
  FastifyInstance,
  FastifyError,
  FastifyRequest,
  FastifyReply,
} from "fastify";

// ============================================================================
// Custom Error Classes
// ============================================================================

export class NotFoundError extends Error {
  code = "NOT_FOUND" as const;
  statusCode = 404;

  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export class ServiceUnavailableError extends Error {
  code = "SERVICE_UNAVAILABLE" as const;
  statusCode = 503;

  constructor(message: string) {
    super(message);
    this.name = "ServiceUnavailableError";
  }
}

// ============================================================================
// Error Handler Plugin
// ============================================================================

function errorHandlerPlugin(fastify: FastifyInstance): void {
  fastify.setErrorHandler(
    (error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
      const requestId = request.id;

      // Schema validation of params and querystring
      if (error.validation) {
        const response: ApiError = {
          error: "VALIDATION_ERROR",
          message: "Invalid request parameters",
          details: {
            validation: error.validation,
          },
          requestId,
        };
        return reply.status(400).send(response);
      }

      if (
        error instanceof NotFoundError ||
        error instanceof ServiceUnavailableError
      ) {
        const response: ApiError = {
          error: error.code,
          message: error.message,
          requestId,
        };
        return reply.status(error.statusCode).send(response);
      }

      // Pipeline errors surfacing through a route
      if (error instanceof SyncError) {
        const transient = categorizeError(error) === "transient";
        const response: ApiError = {
          error: transient ? "SERVICE_UNAVAILABLE" : "SYNC_ERROR",
          message: error.message,
          details: { category: error.category },
          requestId,
        };
        return reply.status(transient ? 503 : 500).send(response);
      }

      if (error.statusCode === 404) {
        const response: ApiError = {
          error: "NOT_FOUND",
          message: error.message || "Resource not found",
          requestId,
        };
        return reply.status(404).send(response);
      }

      request.log.error(error, "Unhandled error");

      const response: ApiError = {
        error: "INTERNAL_ERROR",
        message: "An unexpected error occurred",
        requestId,
      };
      return reply.status(500).send(response);
    }
  );

  fastify.setNotFoundHandler((request: FastifyRequest, reply: FastifyReply) => {
    const response: ApiError = {
      error: "NOT_FOUND",
      message: `Route ${request.method} ${request.url} not found`,
      requestId: request.id,
    };
    return reply.status(404).send(response);
  });
}

export const errorHandler = fp(errorHandlerPlugin, {
  name: "error-handler",
});
