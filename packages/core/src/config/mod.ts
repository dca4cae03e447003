export { configSchema, ENV_KEYS, loadConfig } from "~/config/config.ts";
export type { RouteweaveConfig } from "~/config/config.ts";
