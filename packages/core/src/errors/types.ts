/**
 * Error type definitions.
 */

import type { RouteError } from "./base.ts";

/**
 * Validation issue structure.
 */
export interface ValidationIssue {
  /** Field path (e.g., "logLevel") */
  field: string;
  /** Error message */
  message: string;
  /** Error code (e.g., "invalid_enum_value") */
  code?: string;
}

/**
 * Standard error response structure.
 */
export interface ErrorResponse {
  error: {
    message: string;
    code: string;
    status: number;
    details?: unknown;
    stack?: string[];
  };
}

/**
 * Error transformer function type.
 */
export type ErrorTransformer = (error: unknown) => RouteError;

/**
 * Receives fatal construction errors.
 *
 * Implementations must not return: the build that raised the error is
 * abandoned, either by throwing or by terminating the process.
 */
export interface FatalReporter {
  report(error: RouteError): never;
}
