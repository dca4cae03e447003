/**
 * Route composition error classes.
 */

import { RouteError } from "~/errors/base.ts";
import type { ValidationIssue } from "~/errors/types.ts";

/**
 * A route was defined with a handler that is not a function.
 */
export class InvalidHandlerError extends RouteError {
  readonly path: string;

  constructor(path: string) {
    super(`nil handler for route "${path}"`, "INVALID_HANDLER", { path });
    this.name = "InvalidHandlerError";
    this.path = path;
  }
}

/**
 * A middleware value that is not a function was attached.
 */
export class InvalidMiddlewareError extends RouteError {
  /** Position of the offending value, absent when none was given at all */
  readonly index?: number;

  constructor(index?: number) {
    super(
      index === undefined
        ? "no middleware given"
        : `nil middleware at position ${index}`,
      "INVALID_MIDDLEWARE",
      { index },
    );
    this.name = "InvalidMiddlewareError";
    this.index = index;
  }
}

/**
 * A route reached composition without a callable handler.
 */
export class NilHandlerInChainError extends RouteError {
  readonly path: string;

  constructor(path: string) {
    super(
      `nil handler in chain for route "${path}"`,
      "NIL_HANDLER_IN_CHAIN",
      { path },
    );
    this.name = "NilHandlerInChainError";
    this.path = path;
  }
}

/**
 * A middleware returned something other than a handler function.
 */
export class MiddlewareProducedNilError extends RouteError {
  /** Position of the middleware in its chain, 0 being the outermost */
  readonly index: number;
  readonly path?: string;

  constructor(index: number, path?: string) {
    super(
      path === undefined
        ? `middleware at position ${index} returned nil`
        : `middleware at position ${index} returned nil for route "${path}"`,
      "MIDDLEWARE_PRODUCED_NIL",
      { index, path },
    );
    this.name = "MiddlewareProducedNilError";
    this.index = index;
    this.path = path;
  }
}

/**
 * A registration item is neither a route, a group nor a path/handler pair.
 */
export class UnrecognizedRegistrationTypeError extends RouteError {
  /** Type name of the offending value */
  readonly type: string;
  /** Printable contents of the offending value */
  readonly contents: string;

  constructor(type: string, contents: string) {
    super(
      `${type}:${contents}: unrecognized registration type, want a route, a group or a (path, handler) pair`,
      "UNRECOGNIZED_REGISTRATION_TYPE",
      { type, contents },
    );
    this.name = "UnrecognizedRegistrationTypeError";
    this.type = type;
    this.contents = contents;
  }
}

/**
 * A group was modified after its dispatch table had been composed.
 */
export class GroupAlreadyComposedError extends RouteError {
  readonly operation: string;

  constructor(operation: string) {
    super(
      `${operation} called on a group that has already been composed`,
      "GROUP_ALREADY_COMPOSED",
      { operation },
    );
    this.name = "GroupAlreadyComposedError";
    this.operation = operation;
  }
}

/**
 * A path was bound twice on a multiplexer that rejects duplicates.
 */
export class DuplicatePathError extends RouteError {
  readonly path: string;

  constructor(path: string) {
    super(`path "${path}" is already bound`, "DUPLICATE_PATH", { path });
    this.name = "DuplicatePathError";
    this.path = path;
  }
}

/**
 * A path cannot be bound on a multiplexer.
 */
export class InvalidPathError extends RouteError {
  readonly path: string;

  constructor(path: string) {
    super(
      path === "" ? "empty path" : `path "${path}" must start with "/"`,
      "INVALID_PATH",
      { path },
    );
    this.name = "InvalidPathError";
    this.path = path;
  }
}

/**
 * Environment configuration failed validation.
 */
export class ConfigError extends RouteError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(
      `Invalid configuration: ${
        issues.map((issue) => `${issue.field}: ${issue.message}`).join(", ")
      }`,
      "INVALID_CONFIG",
      issues,
    );
    this.name = "ConfigError";
    this.issues = issues;
  }
}
