/**
 * routeweave core
 */

export { createGroup, Group, joinPath, newGroup } from "~/group/mod.ts";
export type { GroupOptions, Registrable } from "~/group/mod.ts";

export {
  define,
  isRoute,
  withHandler,
  withPath,
  wrapRoute,
} from "~/route/mod.ts";
export type {
  FlatDispatchTable,
  HandlerFn,
  Middleware,
  Route,
  RoutePair,
  Router,
} from "~/route/mod.ts";

export {
  applyMiddleware,
  cors,
  errorHandler,
  logger,
  wrap,
} from "~/middleware/mod.ts";
export type { CorsOptions } from "~/middleware/mod.ts";

export { compile, install, NOT_FOUND_BODY, ServeMux } from "~/dispatch/mod.ts";
export type {
  DuplicatePolicy,
  ServeMuxOptions,
  ServerCollaborator,
} from "~/dispatch/mod.ts";

export {
  ConfigError,
  defaultErrorTransformer,
  DuplicatePathError,
  errorToResponse,
  exitingReporter,
  GroupAlreadyComposedError,
  InvalidHandlerError,
  InvalidMiddlewareError,
  InvalidPathError,
  MiddlewareProducedNilError,
  NilHandlerInChainError,
  recordingReporter,
  RouteError,
  throwingReporter,
  UnrecognizedRegistrationTypeError,
} from "~/errors/mod.ts";
export type {
  ErrorResponse,
  ErrorTransformer,
  FatalReporter,
  RecordingReporter,
  ValidationIssue,
} from "~/errors/mod.ts";

export { configSchema, ENV_KEYS, loadConfig } from "~/config/mod.ts";
export type { RouteweaveConfig } from "~/config/mod.ts";

export { createLogger, isLogger } from "~/app/logger.ts";
export { defaultLogger, defaultReporter } from "~/app/defaults.ts";
export type { Logger, LoggerConfig, LogLevel, LogSink } from "~/app/types.ts";
