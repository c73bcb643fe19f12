/**
 * Error Handling Middleware
 *
 * Hono error handler that maps domain exceptions to HTTP status codes
 * with JSON error bodies of the form { error: { code, message } }.
 */

import type { Context, ErrorHandler } from "hono";
import { ZodError } from "zod";
import { formatZodError, type ErrorCode, type ErrorResponse } from "@study-loop/shared";
import { isStudyLoopError } from "../errors.js";
import { createLogger } from "../logger.js";

const log = createLogger("ErrorHandler");

export type ErrorStatus = 400 | 404 | 409 | 422 | 500;

/**
 * Maps error codes to HTTP status codes.
 *
 * - NOTE_NOT_FOUND: 404 Not Found
 * - INVALID_RATING, VALIDATION_ERROR: 400 Bad Request
 * - SESSION_ALREADY_RECORDED: 409 Conflict
 * - MALFORMED_HEADER: 422 Unprocessable Entity (note is quarantined)
 * - IO_ERROR, INTERNAL_ERROR: 500 Internal Server Error
 */
export function mapErrorCodeToStatus(code: ErrorCode): ErrorStatus {
  switch (code) {
    case "NOTE_NOT_FOUND":
      return 404;
    case "INVALID_RATING":
    case "VALIDATION_ERROR":
      return 400;
    case "SESSION_ALREADY_RECORDED":
      return 409;
    case "MALFORMED_HEADER":
      return 422;
    case "IO_ERROR":
    case "INTERNAL_ERROR":
      return 500;
  }
}

/**
 * Creates a JSON error response with the proper format.
 */
export function jsonError(c: Context, status: ErrorStatus, code: ErrorCode, message: string) {
  const body: ErrorResponse = {
    error: {
      code,
      message,
    },
  };
  return c.json(body, status);
}

/**
 * Logs error details server-side with context.
 * Stack traces are logged but never exposed in responses.
 */
function logError(c: Context, error: unknown): void {
  const method = c.req.method;
  const path = c.req.path;

  if (isStudyLoopError(error)) {
    // Known domain errors: log at warn level
    log.warn(`${method} ${path} - ${error.code}: ${error.message}`);
  } else if (error instanceof Error) {
    log.error(`${method} ${path} - Unexpected error: ${error.message}`, {
      stack: error.stack,
    });
  } else {
    log.error(`${method} ${path} - Unknown error type`, { error });
  }
}

/**
 * Hono error handler for REST API routes.
 *
 * Usage:
 * ```typescript
 * app.onError(restErrorHandler);
 * ```
 */
export const restErrorHandler: ErrorHandler = (err, c) => {
  logError(c, err);

  if (isStudyLoopError(err)) {
    return jsonError(c, mapErrorCodeToStatus(err.code), err.code, err.message);
  }

  if (err instanceof ZodError) {
    return jsonError(c, 400, "VALIDATION_ERROR", formatZodError(err));
  }

  // Return safe error message (no internal details or stack traces)
  return jsonError(c, 500, "INTERNAL_ERROR", "An unexpected error occurred. Please try again later.");
};
