/**
 * Middleware wrapping.
 */

import { defaultReporter } from "~/app/defaults.ts";
import {
  InvalidMiddlewareError,
  MiddlewareProducedNilError,
} from "~/errors/composition.ts";
import type { FatalReporter } from "~/errors/types.ts";
import type { HandlerFn, Middleware } from "~/route/types.ts";

export function isHandlerFn(value: unknown): value is HandlerFn {
  return typeof value === "function";
}

export function isMiddleware(value: unknown): value is Middleware {
  return typeof value === "function";
}

/**
 * Check that every value is a middleware function, reporting the first one
 * that is not.
 */
export function validateMiddleware(
  middleware: ReadonlyArray<Middleware | null | undefined>,
  reporter: FatalReporter,
): Middleware[] {
  const valid: Middleware[] = [];
  for (const [index, fn] of middleware.entries()) {
    if (!isMiddleware(fn)) {
      return reporter.report(new InvalidMiddlewareError(index));
    }
    valid.push(fn);
  }
  return valid;
}

/**
 * Wrap a handler with middleware, first registered outermost.
 *
 * `[m0, m1, m2]` applied to `h` yields `m0(m1(m2(h)))`.
 *
 * @param path - Route being wrapped, included in error reports
 */
export function applyMiddleware(
  handler: HandlerFn,
  middleware: readonly Middleware[],
  reporter: FatalReporter,
  path?: string,
): HandlerFn {
  return middleware.reduceRight<HandlerFn>((next, fn, index) => {
    const wrapped = fn(next);
    if (!isHandlerFn(wrapped)) {
      return reporter.report(new MiddlewareProducedNilError(index, path));
    }
    return wrapped;
  }, handler);
}

/**
 * Chain middleware into a single middleware, first in first applied.
 *
 * @example
 * ```typescript
 * const secured = wrap(logger(), cors());
 * const handler = secured(() => new Response("ok"));
 * ```
 */
export function wrap(
  ...middleware: Array<Middleware | null | undefined>
): (next: HandlerFn) => HandlerFn {
  const reporter = defaultReporter();
  const chain = validateMiddleware(middleware, reporter);
  return (next) => applyMiddleware(next, chain, reporter);
}
