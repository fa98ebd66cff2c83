import type { LogFields, LogLevel } from "./types";

export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerContext {
  component: string;
  runId: string;
  minLevel?: LogLevel;
  sink?: LogSink;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function consoleSink(level: LogLevel, line: string): void {
  if (level === "error") {
    console.error(line);
    return;
  }
  console.log(line);
}

export class Logger {
  private readonly context: LoggerContext;

  constructor(context: LoggerContext) {
    this.context = context;
  }

  /** Logger that drops every line. Used where a component runs without a caller-provided logger. */
  static silent(component = "silent"): Logger {
    return new Logger({ component, runId: "none", sink: () => undefined });
  }

  get runId(): string {
    return this.context.runId;
  }

  child(component: string): Logger {
    return new Logger({ ...this.context, component });
  }

  withRunId(runId: string): Logger {
    return new Logger({ ...this.context, runId });
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
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.context.minLevel ?? "debug"]) {
      return;
    }

    const payload = {
      ts: new Date().toISOString(),
      level,
      msg,
      component: this.context.component,
      runId: this.context.runId,
      ...(fields ?? {}),
    };

    (this.context.sink ?? consoleSink)(level, JSON.stringify(payload));
  }
}
