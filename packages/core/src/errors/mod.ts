/**
 * Errors module - structured error handling.
 */

export { RouteError } from "~/errors/base.ts";
export {
  ConfigError,
  DuplicatePathError,
  GroupAlreadyComposedError,
  InvalidHandlerError,
  InvalidMiddlewareError,
  InvalidPathError,
  MiddlewareProducedNilError,
  NilHandlerInChainError,
  UnrecognizedRegistrationTypeError,
} from "~/errors/composition.ts";
export {
  exitingReporter,
  type RecordingReporter,
  recordingReporter,
  throwingReporter,
} from "~/errors/reporter.ts";
export {
  defaultErrorTransformer,
  errorToResponse,
} from "~/errors/transformer.ts";
export type {
  ErrorResponse,
  ErrorTransformer,
  FatalReporter,
  ValidationIssue,
} from "~/errors/types.ts";
