/**
 * routeweave - compose routes and middleware in nestable groups.
 *
 * @example
 * ```typescript
 * import { compile, createGroup, define } from "routeweave";
 *
 * const app = createGroup()
 *   .register(define("/", () => new Response("Hello from routeweave!")));
 *
 * const mux = compile(app);
 * const response = await mux.dispatch(new Request("http://localhost/"));
 * ```
 *
 * @module
 */

export * from "@routeweave/core";
