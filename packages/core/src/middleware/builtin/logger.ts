/**
 * Logger middleware.
 */

import { defaultLogger } from "~/app/defaults.ts";
import type { Logger } from "~/app/types.ts";
import type { Middleware } from "~/route/types.ts";

/**
 * Create logger middleware.
 *
 * Logs request method, path, status and response time at info level.
 *
 * @example
 * ```typescript
 * group.attachMiddleware(logger());
 * // INFO GET /users method=GET path=/users status=200 duration=15ms
 * ```
 */
export function logger(log: Logger = defaultLogger()): Middleware {
  return (next) => async (request) => {
    const start = Date.now();
    const response = await next(request);
    const duration = Date.now() - start;
    const path = new URL(request.url).pathname;

    log.info(`${request.method} ${path}`, {
      method: request.method,
      path,
      status: response.status,
      duration: `${duration}ms`,
    });

    return response;
  };
}
