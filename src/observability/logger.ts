import { LogFields, LogLevel } from "./types";

export interface LoggerContext {
  component: string;
  runId: string;
}

export interface LoggerOptions {
  minLevel?: LogLevel;
  /** Receives each serialized line; defaults to stdout, or stderr for errors. */
  output?: (line: string, level: LogLevel) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const SECRET_FIELD = /token|secret|password|authorization|api[-_]?key/i;

function redact(fields: LogFields): LogFields {
  const result: LogFields = {};
  for (const [key, value] of Object.entries(fields)) {
    result[key] = SECRET_FIELD.test(key) ? "[redacted]" : value;
  }
  return result;
}

function defaultOutput(line: string, level: LogLevel): void {
  if (level === "error") {
    console.error(line);
    return;
  }
  console.log(line);
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  return value === "debug" || value === "info" || value === "warn" || value === "error" ? value : undefined;
}

export class Logger {
  private readonly context: LoggerContext;
  private readonly minLevel: LogLevel;
  private readonly output: (line: string, level: LogLevel) => void;

  constructor(context: LoggerContext, options: LoggerOptions = {}) {
    this.context = context;
    this.minLevel = options.minLevel ?? "info";
    this.output = options.output ?? defaultOutput;
  }

  child(component: string): Logger {
    return new Logger({ component, runId: this.context.runId }, { minLevel: this.minLevel, output: this.output });
  }

  debug(msg: string, fields?: LogFields): void {
    this.write("debug", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.write("info", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.write("warn", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.write("error", msg, fields);
  }

  private write(level: LogLevel, msg: string, fields?: LogFields): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }

    const payload = {
      ts: new Date().toISOString(),
      level,
      msg,
      component: this.context.component,
      runId: this.context.runId,
      ...redact(fields ?? {}),
    };

    this.output(JSON.stringify(payload), level);
  }
}

/** Discards everything; for tests and library callers that bring no logger. */
export function createSilentLogger(component = "silent"): Logger {
  return new Logger({ component, runId: "none" }, { output: () => undefined });
}
