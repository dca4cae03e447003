import { describe, expect, it } from "vitest";
import { createLogger, isLogger } from "~/app/logger.ts";
import { memorySink } from "./helpers.ts";

describe("createLogger()", () => {
  it("should write JSON entries with bindings and name", () => {
    const out = memorySink();
    const log = createLogger({ json: true, name: "test", stdout: out });

    log.info("hello", { routes: 2 });

    expect(out.lines).toHaveLength(1);
    const [entry] = out.entries();
    expect(entry.level).toBe("info");
    expect(entry.msg).toBe("hello");
    expect(entry.routes).toBe(2);
    expect(entry.name).toBe("test");
    expect(typeof entry.time).toBe("number");
  });

  it("should drop entries below the configured level", () => {
    const out = memorySink();
    const log = createLogger({ json: true, level: "warn", stdout: out });

    log.debug("hidden");
    log.info("hidden");
    log.warn("shown");

    expect(out.entries().map((entry) => entry.msg)).toEqual(["shown"]);
  });

  it("should send error and fatal entries to stderr", () => {
    const out = memorySink();
    const err = memorySink();
    const log = createLogger({ json: true, stdout: out, stderr: err });

    log.warn("to stdout");
    log.error("to stderr");
    log.fatal("also stderr");

    expect(out.entries().map((entry) => entry.msg)).toEqual(["to stdout"]);
    expect(err.entries().map((entry) => entry.level)).toEqual([
      "error",
      "fatal",
    ]);
  });

  it("should write nothing when silent", () => {
    const out = memorySink();
    const err = memorySink();
    const log = createLogger({ level: "silent", stdout: out, stderr: err });

    log.info("x");
    log.fatal("x");

    expect(out.lines).toEqual([]);
    expect(err.lines).toEqual([]);
  });

  it("should format pretty lines", () => {
    const out = memorySink();
    const log = createLogger({ name: "app", timestamp: false, stdout: out });

    log.info("ready");

    expect(out.lines).toEqual([
      "\x1b[36m\x1b[1m[app]\x1b[0m \x1b[32mINFO \x1b[0m ready\n",
    ]);
  });

  it("should append data as key=value pairs in pretty mode", () => {
    const out = memorySink();
    const log = createLogger({ timestamp: false, stdout: out });

    log.warn("slow", { path: "/a", ms: 12 });

    expect(out.lines).toEqual([
      "\x1b[33mWARN \x1b[0m slow \x1b[2mpath=\x1b[0m/a \x1b[2mms=\x1b[0m12\n",
    ]);
  });

  it("should carry bindings and names into children", () => {
    const out = memorySink();
    const log = createLogger({ json: true, name: "app", stdout: out });

    log.child({ name: "mux", requestId: "r1" }).info("child");

    const [entry] = out.entries();
    expect(entry.name).toBe("app:mux");
    expect(entry.requestId).toBe("r1");
  });

  it("should nest child bindings", () => {
    const out = memorySink();
    const log = createLogger({ json: true, stdout: out });

    log.child({ a: 1 }).child({ b: 2 }).info("nested");

    const [entry] = out.entries();
    expect(entry.a).toBe(1);
    expect(entry.b).toBe(2);
    expect(entry.name).toBeUndefined();
  });
});

describe("isLogger()", () => {
  it("should recognize loggers", () => {
    expect(isLogger(createLogger({ level: "silent" }))).toBe(true);
  });

  it("should reject other values", () => {
    expect(isLogger(null)).toBe(false);
    expect(isLogger({ info: () => {} })).toBe(false);
    expect(isLogger(console)).toBe(false);
  });
});
