import { defaultReporter } from "~/app/defaults.ts";
import { InvalidHandlerError } from "~/errors/composition.ts";
import type { FatalReporter } from "~/errors/types.ts";
import {
  applyMiddleware,
  isHandlerFn,
  validateMiddleware,
} from "~/middleware/wrap.ts";
import type { HandlerFn, Middleware, Route } from "~/route/types.ts";

function createRoute(path: string, handler: HandlerFn): Route {
  const route: Route = Object.freeze({
    kind: "route",
    path,
    handler,
    routes: () => [route],
  });
  return route;
}

/**
 * Define a route.
 *
 * @throws {InvalidHandlerError} through the reporter when `handler` is not a
 * function
 */
export function define(
  path: string,
  handler: HandlerFn | null | undefined,
  reporter: FatalReporter = defaultReporter(),
): Route {
  if (!isHandlerFn(handler)) {
    return reporter.report(new InvalidHandlerError(path));
  }
  return createRoute(path, handler);
}

export function isRoute(value: unknown): value is Route {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    value.kind === "route" &&
    "path" in value &&
    typeof value.path === "string" &&
    "handler" in value &&
    isHandlerFn(value.handler)
  );
}

/**
 * Return a copy of `route` whose handler is wrapped by `middleware`, first in
 * first applied. The original route is left untouched.
 */
export function wrapRoute(
  route: Route,
  ...middleware: Array<Middleware | null | undefined>
): Route {
  const reporter = defaultReporter();
  const chain = validateMiddleware(middleware, reporter);
  return createRoute(
    route.path,
    applyMiddleware(route.handler, chain, reporter, route.path),
  );
}

/**
 * Same route under another path. Used when a group prefixes its routes.
 */
export function withPath(route: Route, path: string): Route {
  return path === route.path ? route : createRoute(path, route.handler);
}

/** Same path, new handler. */
export function withHandler(route: Route, handler: HandlerFn): Route {
  return handler === route.handler ? route : createRoute(route.path, handler);
}
