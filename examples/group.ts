import {
  compile,
  createGroup,
  createLogger,
  define,
  type Middleware,
} from "../packages/core/src/mod.ts";

const log = createLogger({ name: "group" });

const requireToken: Middleware = (next) => (request) =>
  request.headers.get("authorization") === "Bearer test-token"
    ? next(request)
    : new Response("Unauthorized", { status: 401 });

const tag = (value: string): Middleware => (next) => async (request) => {
  const response = await next(request);
  response.headers.set("X-Group", value);
  return response;
};

/**
 * Subgroup middleware stays with the subgroup:
 * - /api/admin/* requires a token, /api/public/* does not
 * - every /api route is tagged by the api group
 */
const admin = createGroup({ prefix: "/admin" })
  .attachMiddleware(requireToken)
  .register(define("/stats", () => new Response(JSON.stringify({ requests: 42 }))));

const open = createGroup({ prefix: "/public" })
  .register(define("/info", () => new Response(JSON.stringify({ name: "routeweave" }))));

const api = createGroup({ prefix: "/api" })
  .attachMiddleware(tag("api"))
  .register(admin, open);

const mux = compile(api);

const requests = [
  new Request("http://localhost/api/public/info"),
  new Request("http://localhost/api/admin/stats"),
  new Request("http://localhost/api/admin/stats", {
    headers: { authorization: "Bearer test-token" },
  }),
];

for (const request of requests) {
  const response = await mux.dispatch(request);
  log.info(new URL(request.url).pathname, {
    status: response.status,
    group: response.headers.get("X-Group"),
  });
}
