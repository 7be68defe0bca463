/**
 * Fastify error handler plugin
 */

import fp from "fastify-plugin";

import { RecordNotFoundError } from "../../services/mirror/mirror-store.js";
import { UnknownRailError } from "../../services/rails/registry.js";
import {
  FatalSyncError,
  TransientSyncError,
  publicMessageFor,
} from "../../services/sync/errors.js";
import { InvalidTransitionError } from "../../services/sync/state-machine.js";
import { NotPayableError } from "../../services/views/approvals.js";

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

export class ValidationError extends Error {
  code = "VALIDATION_ERROR" as const;
  statusCode = 400;
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "ValidationError";
    this.details = details;
  }
}

export class ConflictError extends Error {
  code = "CONFLICT" as const;
  statusCode = 409;
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "ConflictError";
    this.details = details;
  }
}

export class UnauthorizedError extends Error {
  code = "UNAUTHORIZED" as const;
  statusCode = 401;

  constructor(message: string) {
    super(message);
    this.name = "UnauthorizedError";
  }
}

// ============================================================================
// Domain Error Mapping
// ============================================================================

/**
 * Translate service-layer errors into their HTTP counterparts. Sync errors
 * only expose their stable code and public message.
 */
export function toHttpError(
  error: unknown
): NotFoundError | ValidationError | ConflictError | null {
  if (error instanceof RecordNotFoundError) {
    return new NotFoundError(error.message);
  }
  if (error instanceof UnknownRailError) {
    return new NotFoundError(error.message);
  }
  if (error instanceof NotPayableError) {
    return new ConflictError(error.message, { reasons: error.reasons });
  }
  if (error instanceof InvalidTransitionError) {
    return new ConflictError(error.message, {
      state: error.from,
      event: error.event,
    });
  }
  if (error instanceof FatalSyncError) {
    const message =
      publicMessageFor(error.code) ?? "The request could not be completed.";
    return error.reason === "unsupported" || error.reason === "validation"
      ? new ValidationError(message, { code: error.code })
      : new ConflictError(message, { code: error.code });
  }
  return null;
}

function send(
  reply: FastifyReply,
  statusCode: number,
  response: ApiError
): FastifyReply {
  return reply.status(statusCode).send(response);
}

// ============================================================================
// Error Handler Plugin
// ============================================================================

function errorHandlerPlugin(fastify: FastifyInstance): void {
  fastify.setErrorHandler(
    (error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
      const requestId = request.id;

      // Handle Fastify validation errors
      if (error.validation) {
        return send(reply, 400, {
          error: "VALIDATION_ERROR",
          message: "Invalid request parameters",
          details: {
            validation: error.validation,
          },
          requestId,
        });
      }

      const mapped = toHttpError(error) ?? error;

      // Handle custom errors
      if (mapped instanceof NotFoundError) {
        return send(reply, mapped.statusCode, {
          error: mapped.code,
          message: mapped.message,
          requestId,
        });
      }

      if (
        mapped instanceof ValidationError ||
        mapped instanceof ConflictError
      ) {
        return send(reply, mapped.statusCode, {
          error: mapped.code,
          message: mapped.message,
          details: mapped.details,
          requestId,
        });
      }

      if (mapped instanceof UnauthorizedError) {
        return send(reply, mapped.statusCode, {
          error: mapped.code,
          message: mapped.message,
          requestId,
        });
      }

      if (error instanceof TransientSyncError) {
        request.log.warn({ status: error.status }, "Rail unavailable");
        return send(reply, 503, {
          error: error.code,
          message:
            publicMessageFor(error.code) ?? "The provider is unavailable.",
          requestId,
        });
      }

      // Handle 404 errors
      if (error.statusCode === 404) {
        return send(reply, 404, {
          error: "NOT_FOUND",
          message: error.message || "Resource not found",
          requestId,
        });
      }

      // Malformed bodies and other client errors raised by Fastify itself
      if (
        error.statusCode !== undefined &&
        error.statusCode >= 400 &&
        error.statusCode < 500
      ) {
        return send(reply, error.statusCode, {
          error: error.code || "BAD_REQUEST",
          message: error.message,
          requestId,
        });
      }

      // Log unexpected errors
      request.log.error(error, "Unhandled error");

      // Return generic error for unexpected errors
      return send(reply, 500, {
        error: "INTERNAL_ERROR",
        message: "An unexpected error occurred",
        requestId,
      });
    }
  );

  // Handle 404 for unknown routes
  fastify.setNotFoundHandler((request: FastifyRequest, reply: FastifyReply) => {
    return send(reply, 404, {
      error: "NOT_FOUND",
      message: `Route ${request.method} ${request.url} not found`,
      requestId: request.id,
    });
  });
}

export const errorHandler = fp(errorHandlerPlugin, {
  name: "error-handler",
});
