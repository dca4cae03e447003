import {
  compile,
  cors,
  createGroup,
  createLogger,
  define,
  errorHandler,
  logger,
  recordingReporter,
} from "../packages/core/src/mod.ts";

const log = createLogger({ name: "middleware" });

const app = createGroup({ logger: log })
  .attachMiddleware(logger(log), errorHandler(), cors({ origin: "*" }))
  .register(
    define("/ok", () => new Response("fine")),
    define("/fail", () => {
      throw new Error("something broke");
    }),
  );

const mux = compile(app);

for (const path of ["/ok", "/fail"]) {
  await mux.dispatch(new Request(`http://localhost${path}`));
}

// A broken chain never reaches the mux.
const reporter = recordingReporter();
try {
  compile(
    createGroup({ logger: log, reporter })
      .attachMiddleware(() => undefined)
      .register(define("/never", () => new Response("never"))),
  );
} catch (error) {
  log.warn("composition rejected", {
    error: error instanceof Error ? error.message : String(error),
    reported: reporter.errors.length,
  });
}
