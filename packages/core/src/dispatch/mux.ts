import { defaultConfig, defaultLogger } from "~/app/defaults.ts";
import type { Logger } from "~/app/types.ts";
import type { DuplicatePolicy, ServerCollaborator } from "~/dispatch/types.ts";
import { DuplicatePathError, InvalidPathError } from "~/errors/composition.ts";
import { errorToResponse } from "~/errors/transformer.ts";
import type { HandlerFn } from "~/route/types.ts";

const TEXT_CONTENT_TYPE = "text/plain; charset=utf-8";
export const NOT_FOUND_BODY = "Not Found";

export interface ServeMuxOptions {
  /** Defaults to `ROUTEWEAVE_DUPLICATES`, itself defaulting to `overwrite` */
  duplicates?: DuplicatePolicy;
  logger?: Logger;
  /** Include error details and stacks in 500 responses */
  development?: boolean;
}

/**
 * Request multiplexer matching on the URL path.
 *
 * A path is matched exactly. Failing that, the longest bound path ending in
 * `/` that prefixes the request path wins, so `/static/` serves the whole
 * subtree. Anything else is a 404.
 */
export class ServeMux implements ServerCollaborator {
  private readonly handlers = new Map<string, HandlerFn>();
  private readonly duplicates: DuplicatePolicy;
  private readonly logger: Logger;
  private readonly development: boolean;

  constructor(options: ServeMuxOptions = {}) {
    this.duplicates = options.duplicates ?? defaultConfig().duplicates;
    this.logger = options.logger ?? defaultLogger();
    this.development = options.development ?? false;
  }

  /**
   * @throws {InvalidPathError} when `path` is empty or relative
   * @throws {DuplicatePathError} when `path` is bound and duplicates are rejected
   */
  bind(path: string, handler: HandlerFn): void {
    if (!path.startsWith("/")) {
      throw new InvalidPathError(path);
    }
    if (this.handlers.has(path)) {
      if (this.duplicates === "reject") {
        throw new DuplicatePathError(path);
      }
      this.logger.warn("overwriting bound path", { path });
    }
    this.handlers.set(path, handler);
  }

  /** Bound paths in binding order. */
  paths(): string[] {
    return [...this.handlers.keys()];
  }

  /** Handler serving `path`, if any. */
  match(path: string): HandlerFn | undefined {
    const exact = this.handlers.get(path);
    if (exact) {
      return exact;
    }

    let best: string | undefined;
    for (const pattern of this.handlers.keys()) {
      if (
        pattern.endsWith("/") &&
        path.startsWith(pattern) &&
        (best === undefined || pattern.length > best.length)
      ) {
        best = pattern;
      }
    }
    return best === undefined ? undefined : this.handlers.get(best);
  }

  async dispatch(request: Request): Promise<Response> {
    const path = new URL(request.url).pathname;
    const handler = this.match(path);

    if (!handler) {
      return new Response(NOT_FOUND_BODY, {
        status: 404,
        headers: { "Content-Type": TEXT_CONTENT_TYPE },
      });
    }

    try {
      return await handler(request);
    } catch (error) {
      this.logger.error("handler failed", {
        path,
        error: error instanceof Error ? error.message : String(error),
      });
      return errorToResponse(error, this.development);
    }
  }

  /** {@link dispatch} bound to this mux, for use as a Fetch handler. */
  readonly fetch = (request: Request): Promise<Response> =>
    this.dispatch(request);
}
