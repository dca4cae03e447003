import {
  compile,
  createGroup,
  createLogger,
  define,
} from "../packages/core/src/mod.ts";

const log = createLogger({ name: "basic", level: "debug" });

const app = createGroup({ logger: log })
  .register(define("/", () => new Response("Hello from routeweave!")))
  .register(["/health", () => new Response(JSON.stringify({ status: "ok" }))]);

const mux = compile(app);

for (const path of ["/", "/health", "/missing"]) {
  const response = await mux.dispatch(new Request(`http://localhost${path}`));
  log.info(`${path} -> ${response.status}`, { body: await response.text() });
}
