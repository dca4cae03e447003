import { defaultLogger, defaultReporter } from "~/app/defaults.ts";
import type { Logger } from "~/app/types.ts";
import {
  GroupAlreadyComposedError,
  InvalidMiddlewareError,
  NilHandlerInChainError,
  UnrecognizedRegistrationTypeError,
} from "~/errors/composition.ts";
import type { FatalReporter } from "~/errors/types.ts";
import { joinPath } from "~/group/path.ts";
import { classify, describeValue } from "~/group/registration.ts";
import {
  applyMiddleware,
  isHandlerFn,
  validateMiddleware,
} from "~/middleware/wrap.ts";
import { define, withHandler, withPath } from "~/route/route.ts";
import type {
  FlatDispatchTable,
  HandlerFn,
  Middleware,
  Route,
  Router,
} from "~/route/types.ts";

export interface GroupOptions {
  /** Path prefix applied to every route the group owns, defaults to `/` */
  prefix?: string;
  logger?: Logger;
  /** Receives fatal construction errors, defaults to the configured reporter */
  reporter?: FatalReporter;
}

/**
 * Anything `Group.register` accepts.
 */
export type Registrable =
  | Router
  | readonly [path: string, handler: HandlerFn | null | undefined];

/**
 * Builder for a set of routes sharing middleware.
 *
 * Middleware attached to a group wraps every route the group owns, first in
 * first applied. Groups can be registered into other groups: a subgroup is
 * composed on registration, so its middleware stays with its own routes while
 * the parent's middleware wraps the subgroup's routes along with the rest.
 *
 * @example
 * ```typescript
 * const admin = createGroup()
 *   .attachMiddleware(requireAdmin)
 *   .register(define("/admin/users", listUsers));
 *
 * const app = createGroup()
 *   .attachMiddleware(logger())
 *   .register(define("/health", health), admin);
 *
 * const mux = compile(app);
 * ```
 */
export class Group implements Router {
  readonly kind = "group";
  readonly prefix: string;

  private readonly logger: Logger;
  private readonly reporter: FatalReporter;
  private readonly middleware: Middleware[] = [];
  private readonly units: Route[] = [];
  private table?: FlatDispatchTable;

  constructor(options: GroupOptions = {}) {
    this.prefix = options.prefix ?? "/";
    this.logger = options.logger ?? defaultLogger();
    this.reporter = options.reporter ?? defaultReporter(this.logger);
  }

  static isGroup(value: unknown): value is Group {
    return value instanceof Group;
  }

  /** Whether `compose` has produced this group's dispatch table. */
  get composed(): boolean {
    return this.table !== undefined;
  }

  /**
   * Add routes, subgroups or `[path, handler]` pairs, in order.
   *
   * Subgroups are composed once every item of the call has been accepted and
   * contribute their wrapped routes.
   */
  register(...items: Registrable[]): this {
    this.assertOpen("register");

    // Every item is checked before any subgroup is composed (and sealed).
    const accepted = items.map((item) => this.accept(item));
    const incoming: Route[] = [];
    for (const entry of accepted) {
      incoming.push(...(Group.isGroup(entry) ? entry.compose() : [entry]));
    }
    this.units.push(...incoming);
    return this;
  }

  /**
   * Append middleware, in call order. Only routes owned by this group are
   * wrapped by it. A call without middleware is reported as invalid.
   */
  attachMiddleware(...middleware: Array<Middleware | null | undefined>): this {
    this.assertOpen("attachMiddleware");
    if (middleware.length === 0) {
      this.reporter.report(new InvalidMiddlewareError());
    }
    this.middleware.push(...validateMiddleware(middleware, this.reporter));
    return this;
  }

  /** Alias of {@link attachMiddleware}. */
  use(...middleware: Array<Middleware | null | undefined>): this {
    return this.attachMiddleware(...middleware);
  }

  /**
   * Wrap every route with this group's middleware and prefix, producing the
   * flat dispatch table.
   *
   * The table is computed once; later calls return the same table.
   */
  compose(): FlatDispatchTable {
    if (this.table) {
      return this.table;
    }

    const table = this.units.map((unit): Route => {
      if (!isHandlerFn(unit.handler)) {
        return this.reporter.report(new NilHandlerInChainError(unit.path));
      }
      const handler = applyMiddleware(
        unit.handler,
        this.middleware,
        this.reporter,
        unit.path,
      );
      return withPath(
        withHandler(unit, handler),
        joinPath(this.prefix, unit.path),
      );
    });

    this.table = Object.freeze(table);
    this.logger.debug("composed group", {
      prefix: this.prefix,
      routes: table.length,
      middleware: this.middleware.length,
    });
    return this.table;
  }

  routes(): FlatDispatchTable {
    return this.compose();
  }

  private accept(item: unknown): Route | Group {
    const registration = classify(item, Group.isGroup);
    switch (registration.type) {
      case "route":
        return registration.route;
      case "pair":
        return define(registration.path, registration.handler, this.reporter);
      case "group":
        if (registration.group === this) {
          return this.reporter.report(
            new UnrecognizedRegistrationTypeError("Group", "(self)"),
          );
        }
        return registration.group;
      case "unrecognized": {
        const { type, contents } = describeValue(registration.value);
        return this.reporter.report(
          new UnrecognizedRegistrationTypeError(type, contents),
        );
      }
      default: {
        const unreachable: never = registration;
        return unreachable;
      }
    }
  }

  private assertOpen(operation: string): void {
    if (this.table) {
      this.reporter.report(new GroupAlreadyComposedError(operation));
    }
  }
}

/**
 * Create an empty group.
 */
export function createGroup(options?: GroupOptions): Group {
  return new Group(options);
}

/** Alias of {@link createGroup}. */
export const newGroup = createGroup;
