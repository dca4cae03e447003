/**
 * Error handling middleware.
 */

import { errorToResponse } from "~/errors/transformer.ts";
import type { Middleware } from "~/route/types.ts";

/**
 * Create error handling middleware.
 *
 * Catches errors from downstream middleware/handlers and converts
 * them to error responses.
 *
 * @param onError - Optional custom error handler
 *
 * @example
 * ```typescript
 * group.attachMiddleware(errorHandler((error) =>
 *   new Response(`failed: ${error.message}`, { status: 500 })
 * ));
 * ```
 */
export function errorHandler(
  onError?: (
    error: Error,
    request: Request,
  ) => Response | Promise<Response>,
): Middleware {
  return (next) => async (request) => {
    try {
      return await next(request);
    } catch (error) {
      if (onError) {
        return await onError(
          error instanceof Error ? error : new Error(String(error)),
          request,
        );
      }
      return errorToResponse(error);
    }
  };
}
