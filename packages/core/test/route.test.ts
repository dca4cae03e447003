import { describe, expect, it } from "vitest";
import { InvalidHandlerError, InvalidMiddlewareError } from "~/errors/mod.ts";
import { recordingReporter } from "~/errors/reporter.ts";
import { define, isRoute, withPath, wrapRoute } from "~/route/mod.ts";
import type { HandlerFn, Middleware } from "~/route/types.ts";
import { applyMiddleware, wrap } from "~/middleware/wrap.ts";
import { MiddlewareProducedNilError } from "~/errors/composition.ts";
import { request, setHeader, textHandler, traced } from "./helpers.ts";

describe("define()", () => {
  it("should pair a path with its handler", () => {
    const handler = textHandler("hello");
    const route = define("/hello", handler);

    expect(route.kind).toBe("route");
    expect(route.path).toBe("/hello");
    expect(route.handler).toBe(handler);
  });

  it("should be immutable", () => {
    const route = define("/hello", textHandler("hello"));

    expect(Object.isFrozen(route)).toBe(true);
    expect(Reflect.set(route, "path", "/other")).toBe(false);
    expect(route.path).toBe("/hello");
  });

  it("should list itself as its only route", () => {
    const route = define("/hello", textHandler("hello"));

    expect(route.routes()).toEqual([route]);
  });

  it("should report a missing handler", () => {
    const reporter = recordingReporter();

    expect(() => define("/broken", null, reporter)).toThrow(
      InvalidHandlerError,
    );
    expect(reporter.errors).toHaveLength(1);
    expect(reporter.errors[0]).toBeInstanceOf(InvalidHandlerError);
    expect(reporter.errors[0].message).toBe('nil handler for route "/broken"');
  });

  it("should report an undefined handler", () => {
    const reporter = recordingReporter();

    expect(() => define("/broken", undefined, reporter)).toThrow(
      'nil handler for route "/broken"',
    );
    expect(reporter.errors).toHaveLength(1);
  });
});

describe("isRoute()", () => {
  it("should recognize defined routes", () => {
    expect(isRoute(define("/a", textHandler("a")))).toBe(true);
  });

  it("should reject other values", () => {
    expect(isRoute(null)).toBe(false);
    expect(isRoute("/a")).toBe(false);
    expect(isRoute({ path: "/a", handler: textHandler("a") })).toBe(false);
    expect(isRoute({ kind: "route", path: "/a", handler: "nope" })).toBe(false);
  });
});

describe("applyMiddleware()", () => {
  it("should return the handler unchanged without middleware", () => {
    const handler = textHandler("plain");

    expect(applyMiddleware(handler, [], recordingReporter())).toBe(handler);
  });

  it("should nest the first middleware outermost", () => {
    const received: Record<string, HandlerFn> = {};
    const produced: Record<string, HandlerFn> = {};
    const named = (name: string): Middleware => (next) => {
      received[name] = next;
      const fn: HandlerFn = (req) => next(req);
      produced[name] = fn;
      return fn;
    };
    const handler = textHandler("base");

    const wrapped = applyMiddleware(
      handler,
      [named("m1"), named("m2")],
      recordingReporter(),
    );

    expect(received.m2).toBe(handler);
    expect(received.m1).toBe(produced.m2);
    expect(wrapped).toBe(produced.m1);
  });

  it("should report middleware returning nil with its position and route", () => {
    const reporter = recordingReporter();
    const broken: Middleware = () => undefined;

    expect(() =>
      applyMiddleware(
        textHandler("x"),
        [setHeader("X-A", "1"), broken],
        reporter,
        "/x",
      )
    ).toThrow(MiddlewareProducedNilError);
    expect(reporter.errors).toHaveLength(1);
    expect(reporter.errors[0].message).toBe(
      'middleware at position 1 returned nil for route "/x"',
    );
  });
});

describe("wrap()", () => {
  it("should run middleware first in first applied", async () => {
    const trace: string[] = [];
    const handler = wrap(traced("outer", trace), traced("inner", trace))(
      () => {
        trace.push("handler");
        return new Response("ok");
      },
    );

    const response = await handler(request("/"));

    expect(await response.text()).toBe("ok");
    expect(trace).toEqual([
      "outer:before",
      "inner:before",
      "handler",
      "inner:after",
      "outer:after",
    ]);
  });

  it("should reject nil middleware before wrapping anything", () => {
    expect(() => wrap(setHeader("X-A", "1"), null)).toThrow(
      InvalidMiddlewareError,
    );
  });

  it("should report a middleware that returns nil", () => {
    const chain = wrap(() => null);

    expect(() => chain(textHandler("x"))).toThrow(
      "middleware at position 0 returned nil",
    );
  });
});

describe("wrapRoute()", () => {
  it("should return a wrapped copy and leave the original alone", async () => {
    const original = define("/wrapped", textHandler("body"));

    const wrapped = wrapRoute(original, setHeader("X-Wrapped", "yes"));

    expect(wrapped).not.toBe(original);
    expect(wrapped.path).toBe("/wrapped");
    const wrappedResponse = await wrapped.handler(request("/wrapped"));
    expect(wrappedResponse.headers.get("X-Wrapped")).toBe("yes");
    const originalResponse = await original.handler(request("/wrapped"));
    expect(originalResponse.headers.get("X-Wrapped")).toBeNull();
  });

  it("should apply several middleware in order", async () => {
    const trace: string[] = [];
    const route = wrapRoute(
      define("/t", () => {
        trace.push("handler");
        return new Response("t");
      }),
      traced("a", trace),
      traced("b", trace),
    );

    await route.handler(request("/t"));

    expect(trace).toEqual(["a:before", "b:before", "handler", "b:after", "a:after"]);
  });
});

describe("withPath()", () => {
  it("should keep the route when the path is unchanged", () => {
    const route = define("/same", textHandler("same"));

    expect(withPath(route, "/same")).toBe(route);
  });

  it("should move the handler to the new path", () => {
    const route = define("/users", textHandler("users"));

    const moved = withPath(route, "/api/users");

    expect(moved.path).toBe("/api/users");
    expect(moved.handler).toBe(route.handler);
  });
});
