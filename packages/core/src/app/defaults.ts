import { loadConfig, type RouteweaveConfig } from "~/config/config.ts";
import { createLogger } from "~/app/logger.ts";
import type { Logger } from "~/app/types.ts";
import { exitingReporter, throwingReporter } from "~/errors/reporter.ts";
import type { FatalReporter } from "~/errors/types.ts";

let config: RouteweaveConfig | undefined;
let logger: Logger | undefined;

/** Configuration read from the environment on first use. */
export function defaultConfig(): RouteweaveConfig {
  config ??= loadConfig();
  return config;
}

export function defaultLogger(): Logger {
  if (!logger) {
    const { logLevel, logJson } = defaultConfig();
    logger = createLogger({ name: "routeweave", level: logLevel, json: logJson });
  }
  return logger;
}

/**
 * Reporter selected by `ROUTEWEAVE_ON_FATAL`, logging through `log`.
 */
export function defaultReporter(log: Logger = defaultLogger()): FatalReporter {
  return defaultConfig().onFatal === "exit"
    ? exitingReporter(log)
    : throwingReporter(log);
}
