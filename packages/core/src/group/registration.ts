/**
 * Classification of registration items.
 */

import { isHandlerFn } from "~/middleware/wrap.ts";
import { isRoute } from "~/route/route.ts";
import type { HandlerFn, Route } from "~/route/types.ts";
import type { Group } from "~/group/group.ts";

export type Registration =
  | { readonly type: "route"; readonly route: Route }
  | { readonly type: "group"; readonly group: Group }
  | {
    readonly type: "pair";
    readonly path: string;
    readonly handler: HandlerFn | null | undefined;
  }
  | { readonly type: "unrecognized"; readonly value: unknown };

function isPair(
  value: unknown,
): value is readonly [string, HandlerFn | null | undefined] {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    typeof value[0] === "string" &&
    (value[1] == null || isHandlerFn(value[1]))
  );
}

/**
 * Resolve what kind of item was passed to `Group.register`.
 *
 * @param isGroup - Recognizes groups; injected to avoid a module cycle
 */
export function classify(
  value: unknown,
  isGroup: (value: unknown) => value is Group,
): Registration {
  if (isRoute(value)) {
    return { type: "route", route: value };
  }
  if (isGroup(value)) {
    return { type: "group", group: value };
  }
  if (isPair(value)) {
    return { type: "pair", path: value[0], handler: value[1] };
  }
  return { type: "unrecognized", value };
}

/**
 * Type name and printable contents of an arbitrary value, for error messages.
 */
export function describeValue(value: unknown): {
  type: string;
  contents: string;
} {
  if (value === null) return { type: "null", contents: "null" };
  if (Array.isArray(value)) {
    return { type: "Array", contents: stringify(value) };
  }
  if (typeof value === "object") {
    const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
    const type = typeof ctor === "function" && ctor.name ? ctor.name : "Object";
    return { type, contents: stringify(value) };
  }
  if (typeof value === "function") {
    return { type: "function", contents: value.name || "(anonymous)" };
  }
  return { type: typeof value, contents: String(value) };
}

function stringify(value: unknown): string {
  try {
    return JSON.stringify(value) ?? Object.prototype.toString.call(value);
  } catch {
    // circular or BigInt-holding values; String() throws on null prototypes
    return Object.prototype.toString.call(value);
  }
}
