export { define, isRoute, withHandler, withPath, wrapRoute } from "~/route/route.ts";
export type {
  FlatDispatchTable,
  HandlerFn,
  Middleware,
  Route,
  RoutePair,
  Router,
} from "~/route/types.ts";
