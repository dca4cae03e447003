/**
 * Environment configuration.
 */

import { z } from "zod";
import { ConfigError } from "~/errors/composition.ts";
import type { ValidationIssue } from "~/errors/types.ts";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

export const configSchema = z.object({
  logLevel: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info"),
  logJson: booleanFlag.default("false"),
  onFatal: z.enum(["throw", "exit"]).default("throw"),
  duplicates: z.enum(["overwrite", "reject"]).default("overwrite"),
});

export type RouteweaveConfig = z.infer<typeof configSchema>;

/** Environment variable read for each config field. */
export const ENV_KEYS = {
  logLevel: "ROUTEWEAVE_LOG_LEVEL",
  logJson: "ROUTEWEAVE_LOG_JSON",
  onFatal: "ROUTEWEAVE_ON_FATAL",
  duplicates: "ROUTEWEAVE_DUPLICATES",
} as const satisfies Record<keyof RouteweaveConfig, string>;

/**
 * Read and validate configuration from environment variables.
 *
 * Unset and empty variables take their defaults.
 *
 * @throws {ConfigError} when any variable holds an unsupported value
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): RouteweaveConfig {
  const pick = (key: string): string | undefined => {
    const value = env[key]?.trim();
    return value === "" ? undefined : value;
  };

  const result = configSchema.safeParse({
    logLevel: pick(ENV_KEYS.logLevel),
    logJson: pick(ENV_KEYS.logJson),
    onFatal: pick(ENV_KEYS.onFatal),
    duplicates: pick(ENV_KEYS.duplicates),
  });

  if (result.success) {
    return result.data;
  }

  const issues: ValidationIssue[] = result.error.issues.map((issue) => ({
    field: issue.path.map(String).join(".") || "(root)",
    message: issue.message,
    code: issue.code,
  }));

  throw new ConfigError(issues);
}
