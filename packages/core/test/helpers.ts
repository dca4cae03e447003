import { createLogger } from "~/app/logger.ts";
import type { Logger, LogSink } from "~/app/types.ts";
import type { HandlerFn, Middleware } from "~/route/types.ts";

export const silentLogger: Logger = createLogger({ level: "silent" });

export function request(path: string, init?: RequestInit): Request {
  return new Request(`http://localhost${path}`, init);
}

export function textHandler(body: string): HandlerFn {
  return () => new Response(body);
}

/** Middleware that sets `name: value` on the response it passes through. */
export function setHeader(name: string, value: string): Middleware {
  return (next) => async (req) => {
    const response = await next(req);
    response.headers.set(name, value);
    return response;
  };
}

/** Middleware recording `<name>:before` and `<name>:after` around the call. */
export function traced(name: string, trace: string[]): Middleware {
  return (next) => async (req) => {
    trace.push(`${name}:before`);
    const response = await next(req);
    trace.push(`${name}:after`);
    return response;
  };
}

export interface MemorySink extends LogSink {
  readonly lines: string[];
  entries(): Array<Record<string, unknown>>;
}

export function memorySink(): MemorySink {
  const lines: string[] = [];
  return {
    lines,
    write(data: string) {
      lines.push(data);
    },
    entries() {
      return lines.map((line) => {
        const parsed: unknown = JSON.parse(line);
        return typeof parsed === "object" && parsed !== null
          ? Object.fromEntries(Object.entries(parsed))
          : {};
      });
    },
  };
}
