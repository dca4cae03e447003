/**
 * Fatal error reporters.
 *
 * Every composition failure is handed to a {@link FatalReporter}. The build
 * pipeline never continues past a report, so a broken middleware chain can
 * never be installed.
 */

import type { Logger } from "~/app/types.ts";
import type { RouteError } from "~/errors/base.ts";
import type { FatalReporter } from "~/errors/types.ts";

function logFatal(logger: Logger, error: RouteError): void {
  logger.fatal(error.message, { code: error.code, details: error.details });
}

/**
 * Log the error at fatal level, then throw it.
 */
export function throwingReporter(logger: Logger): FatalReporter {
  return {
    report(error: RouteError): never {
      logFatal(logger, error);
      throw error;
    },
  };
}

/**
 * Log the error at fatal level, then terminate the process with exit code 1.
 */
export function exitingReporter(logger: Logger): FatalReporter {
  return {
    report(error: RouteError): never {
      logFatal(logger, error);
      process.exit(1);
    },
  };
}

export interface RecordingReporter extends FatalReporter {
  /** Every error reported so far, oldest first */
  readonly errors: readonly RouteError[];
}

/**
 * Record each reported error, then throw it.
 *
 * @example
 * ```typescript
 * const reporter = recordingReporter();
 * const group = createGroup({ reporter });
 * expect(() => group.attachMiddleware(undefined)).toThrow();
 * expect(reporter.errors).toHaveLength(1);
 * ```
 */
export function recordingReporter(): RecordingReporter {
  const errors: RouteError[] = [];
  return {
    errors,
    report(error: RouteError): never {
      errors.push(error);
      throw error;
    },
  };
}
