export { cors, type CorsOptions } from "./cors.ts";
export { errorHandler } from "./error-handler.ts";
export { logger } from "./logger.ts";
