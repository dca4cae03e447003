export type LogLevel =
  | "trace"
  | "debug"
  | "info"
  | "warn"
  | "error"
  | "fatal"
  | "silent";

export interface LoggerConfig {
  level?: LogLevel;
  name?: string;
  timestamp?: boolean;
  json?: boolean;
  /** Destination for trace..warn lines, defaults to process.stdout */
  stdout?: LogSink;
  /** Destination for error and fatal lines, defaults to process.stderr */
  stderr?: LogSink;
}

export interface LogSink {
  write(data: string): unknown;
}

export interface Logger {
  trace(msg: string, data?: Record<string, unknown>): void;
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  fatal(msg: string, data?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): Logger;
}
