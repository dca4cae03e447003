/**
 * Dispatch table installation.
 */

import { defaultLogger } from "~/app/defaults.ts";
import type { Logger } from "~/app/types.ts";
import type { ServerCollaborator } from "~/dispatch/types.ts";
import { ServeMux } from "~/dispatch/mux.ts";
import type { Group } from "~/group/group.ts";
import type { FlatDispatchTable } from "~/route/types.ts";

/**
 * Bind every route of a composed table on `server`, in table order.
 *
 * @returns `server`, ready to dispatch
 */
export function install<TServer extends ServerCollaborator>(
  table: FlatDispatchTable,
  server: TServer,
  logger: Logger = defaultLogger(),
): TServer {
  for (const route of table) {
    server.bind(route.path, route.handler);
    logger.debug("bound route", { path: route.path });
  }
  return server;
}

/**
 * Compose `group` and install its table on `server`, a fresh
 * {@link ServeMux} unless one is given.
 */
export function compile(group: Group): ServeMux;
export function compile<TServer extends ServerCollaborator>(
  group: Group,
  server: TServer,
  logger?: Logger,
): TServer;
export function compile(
  group: Group,
  server: ServerCollaborator = new ServeMux(),
  logger?: Logger,
): ServerCollaborator {
  return install(group.compose(), server, logger);
}
