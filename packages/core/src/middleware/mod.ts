/**
 * Middleware module - wrapping and built-in middleware.
 */

export type { Middleware } from "~/route/types.ts";
export {
  applyMiddleware,
  isHandlerFn,
  isMiddleware,
  validateMiddleware,
  wrap,
} from "~/middleware/wrap.ts";

export {
  cors,
  type CorsOptions,
  errorHandler,
  logger,
} from "~/middleware/builtin/mod.ts";
