/**
 * Error transformation utilities.
 */

import { RouteError } from "~/errors/base.ts";
import type { ErrorTransformer } from "~/errors/types.ts";

/**
 * Default error transformer.
 * Converts any error to a RouteError.
 */
export function defaultErrorTransformer(error: unknown): RouteError {
  if (error instanceof RouteError) {
    return error;
  }

  if (error instanceof Error) {
    return new RouteError(error.message, "INTERNAL_ERROR", {
      originalName: error.name,
      originalStack: error.stack,
    }, true);
  }

  return new RouteError(
    "An unexpected error occurred",
    "INTERNAL_ERROR",
    { value: String(error) },
    true,
  );
}

/**
 * Create an error response from any error.
 */
export function errorToResponse(
  error: unknown,
  development = false,
  transformer: ErrorTransformer = defaultErrorTransformer,
): Response {
  return transformer(error).toResponse(development);
}
