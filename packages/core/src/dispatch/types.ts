import type { HandlerFn } from "~/route/types.ts";

/**
 * The server side of installation: binds a path to a handler.
 *
 * Duplicate paths are handled by the collaborator's own policy.
 */
export interface ServerCollaborator {
  bind(path: string, handler: HandlerFn): void;
}

/** What happens when a path is bound a second time. */
export type DuplicatePolicy = "overwrite" | "reject";
