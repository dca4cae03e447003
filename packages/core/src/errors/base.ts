/**
 * Base error class for routeweave.
 */

import type { ErrorResponse } from "./types.ts";

/**
 * Base error class for all routeweave errors.
 *
 * Composition errors are raised while a dispatch table is being built and are
 * never operational: they describe a broken route configuration.
 *
 * @example
 * ```typescript
 * throw new RouteError("Something went wrong", "INTERNAL_ERROR");
 * ```
 */
export class RouteError extends Error {
  /** Machine-readable error code */
  readonly code: string;
  /** HTTP status code used when the error is turned into a response */
  readonly status = 500;
  /** Additional error details */
  readonly details?: unknown;
  /** Whether this error is operational (expected) vs programming error */
  readonly isOperational: boolean;

  constructor(
    message: string,
    code = "INTERNAL_ERROR",
    details?: unknown,
    isOperational = false,
  ) {
    super(message);
    this.name = "RouteError";
    this.code = code;
    this.details = details;
    this.isOperational = isOperational;
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Convert error to JSON response object.
   * @param development Include stack trace and details
   */
  toJSON(development = false): ErrorResponse {
    const response: ErrorResponse = {
      error: {
        message: this.message,
        code: this.code,
        status: this.status,
      },
    };

    if (development) {
      if (this.details !== undefined) {
        response.error.details = this.details;
      }
      if (this.stack) {
        response.error.stack = this.stack.split("\n").map((l) => l.trim());
      }
    }

    return response;
  }

  /**
   * Create a Response object from this error.
   * @param development Include stack trace and details
   */
  toResponse(development = false): Response {
    return new Response(JSON.stringify(this.toJSON(development)), {
      status: this.status,
      headers: { "Content-Type": "application/json" },
    });
  }
}
