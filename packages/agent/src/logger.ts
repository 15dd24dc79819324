export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

export interface LogEvent {
  level: LogLevel;
  namespace: string;
  message: string;
  context?: LogContext;
  error?: Error;
  createdAt: string;
}

export interface LoggerSink {
  emit(event: LogEvent): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export class InMemorySink implements LoggerSink {
  private events: LogEvent[] = [];

  emit(event: LogEvent): void {
    this.events.push(event);
  }

  read(): readonly LogEvent[] {
    return this.events;
  }

  clear(): void {
    this.events = [];
  }
}

/** One JSON object per line; the server keeps stdout for protocol traffic. */
export class JsonLineSink implements LoggerSink {
  constructor(private readonly write: (line: string) => void = (line) => process.stderr.write(line)) {}

  emit(event: LogEvent): void {
    const { error, ...rest } = event;
    const record = error ? { ...rest, error: { name: error.name, message: error.message } } : rest;
    this.write(`${JSON.stringify(record)}\n`);
  }
}

export interface LoggerOptions {
  level?: LogLevel;
  sinks?: LoggerSink[];
}

export class Logger {
  private readonly namespace: string;
  private readonly level: LogLevel;
  private sinks: LoggerSink[];

  constructor(namespace = "cadpilot", options: LoggerOptions = {}) {
    this.namespace = namespace;
    this.level = options.level ?? "info";
    this.sinks = options.sinks ?? [];
  }

  withSink(sink: LoggerSink): this {
    this.sinks = [...this.sinks, sink];
    return this;
  }

  /** Shares the sinks; events carry `parent.name`. */
  child(name: string): Logger {
    return new Logger(`${this.namespace}.${name}`, { level: this.level, sinks: this.sinks });
  }

  debug(message: string, context?: LogContext): void {
    this.emit("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.emit("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.emit("warn", message, context);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.emit("error", message, context, error);
  }

  private emit(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level] || this.sinks.length === 0) return;
    const event: LogEvent = {
      level,
      namespace: this.namespace,
      message,
      createdAt: new Date().toISOString(),
    };
    if (context) event.context = context;
    if (error) event.error = error;
    for (const sink of this.sinks) sink.emit(event);
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/** Logger with no sinks. */
export function silentLogger(): Logger {
  return new Logger("cadpilot", { sinks: [] });
}
