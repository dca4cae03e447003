/**
 * Route type definitions.
 */

/**
 * Handler function signature: one request in, one response out.
 */
export type HandlerFn = (request: Request) => Response | Promise<Response>;

/**
 * Middleware wraps a handler function and returns the wrapper.
 *
 * The nullable return type covers middleware that fails to produce a
 * handler; such a chain is rejected when it is composed.
 *
 * @example
 * ```typescript
 * const poweredBy: Middleware = (next) => async (request) => {
 *   const response = await next(request);
 *   response.headers.set("X-Powered-By", "routeweave");
 *   return response;
 * };
 * ```
 */
export type Middleware = (next: HandlerFn) => HandlerFn | null | undefined;

/**
 * A collection of routes.
 */
export interface Router {
  routes(): readonly Route[];
}

/**
 * The atomic unit of routing: a path and the handler serving it.
 */
export interface Route extends Router {
  readonly kind: "route";
  readonly path: string;
  readonly handler: HandlerFn;
}

/**
 * Loose registration form accepted alongside routes and groups.
 */
export type RoutePair = readonly [path: string, handler: HandlerFn];

/**
 * Sequence of fully wrapped routes, ready to install on a server.
 */
export type FlatDispatchTable = readonly Route[];
