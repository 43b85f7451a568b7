/**
 * Logger utility with secret redaction and pluggable sinks
 *
 * Default: console only, text format. The CLI switches level and format at
 * startup; tests attach a stream sink to capture output.
 */

type LogLevel = "debug" | "info" | "warn" | "error";
type LogFormat = "text" | "json";

type LogSink = (entry: LogEntry) => void;

interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  sinks?: LogSink[];
}

interface LogEntry {
  level: LogLevel;
  format: LogFormat;
  args: unknown[];
  message: string;
  timestamp: Date;
  payload: {
    level: LogLevel;
    time: string;
    message: string;
    args: unknown[];
  };
}

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];
const REDACTED = "***REDACTED***";

class Logger {
  private minLevel: LogLevel;
  private sinks: LogSink[];
  private format: LogFormat;
  private secretValues = new Set<string>();

  constructor(options: LoggerOptions = {}) {
    this.minLevel = options.level ?? "info";
    this.format = options.format ?? "text";
    this.sinks = options.sinks ?? [createConsoleSink()];
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  setFormat(format: LogFormat): void {
    this.format = format;
  }

  /**
   * Replace the sinks, returning the previous ones so they can be restored.
   */
  setSinks(sinks: LogSink[]): LogSink[] {
    const previous = this.sinks;
    this.sinks = sinks;
    return previous;
  }

  /**
   * Register a literal value (e.g. a resolved secret) that must never be
   * printed. Values shorter than 4 characters are ignored.
   */
  addSecret(value: string): void {
    if (value.length >= 4) {
      this.secretValues.add(value);
    }
  }

  debug(...args: unknown[]): void {
    this.log("debug", args);
  }

  info(...args: unknown[]): void {
    this.log("info", args);
  }

  warn(...args: unknown[]): void {
    this.log("warn", args);
  }

  error(...args: unknown[]): void {
    this.log("error", args);
  }

  private log(level: LogLevel, args: unknown[]): void {
    if (!this.shouldLog(level)) return;

    const redactedArgs = this.redact(args);
    const message = this.buildMessage(redactedArgs);
    const timestamp = new Date();

    const entry: LogEntry = {
      level,
      format: this.format,
      args: redactedArgs,
      message,
      timestamp,
      payload: {
        level,
        time: timestamp.toISOString(),
        message,
        args: redactedArgs,
      },
    };

    for (const sink of this.sinks) {
      sink(entry);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.minLevel);
  }

  private buildMessage(args: unknown[]): string {
    return args
      .map((arg) => {
        if (typeof arg === "string") return arg;
        if (typeof arg === "number" || typeof arg === "boolean") return String(arg);
        if (arg instanceof Error) return `${arg.name}: ${this.redactString(arg.message)}`;
        try {
          return JSON.stringify(arg);
        } catch {
          return String(arg);
        }
      })
      .join(" ");
  }

  private redact(args: unknown[]): unknown[] {
    return args.map((arg) => {
      if (typeof arg === "string") {
        return this.redactString(arg);
      } else if (arg instanceof Error) {
        return arg;
      } else if (typeof arg === "object" && arg !== null) {
        return this.redactObject(arg);
      }
      return arg;
    });
  }

  private redactString(str: string): string {
    const sensitivePattern = /(password|secret|token|key|auth)=[^\s&]*/gi;
    let result = str.replace(sensitivePattern, `$1=${REDACTED}`);
    for (const value of this.secretValues) {
      result = result.split(value).join(REDACTED);
    }
    return result;
  }

  private redactObject(obj: unknown): unknown {
    if (Array.isArray(obj)) {
      return obj.map((item) => this.redactObject(item));
    }

    if (typeof obj === "object" && obj !== null) {
      const result: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(obj)) {
        if (this.isSensitiveKey(key)) {
          result[key] = REDACTED;
        } else if (typeof value === "string") {
          result[key] = this.redactString(value);
        } else if (typeof value === "object") {
          result[key] = this.redactObject(value);
        } else {
          result[key] = value;
        }
      }
      return result;
    }

    return obj;
  }

  private isSensitiveKey(key: string): boolean {
    const lowerKey = key.toLowerCase();
    const sensitiveWords = [
      "password",
      "secret",
      "token",
      "key",
      "auth",
      "credential",
      "apikey",
      "api_key",
    ];
    return sensitiveWords.some((word) => lowerKey.includes(word));
  }
}

export function createConsoleSink(): LogSink {
  return (entry) => {
    const method = entry.level === "debug"
      ? "debug"
      : entry.level === "info"
      ? "log"
      : entry.level === "warn"
      ? "warn"
      : "error";

    if (entry.format === "json") {
      console[method](JSON.stringify(entry.payload));
    } else {
      console[method](entry.message);
    }
  };
}

export function createStreamSink(
  write: (line: string) => void,
  format: LogFormat = "text",
): LogSink {
  return (entry) => {
    const line = format === "json" ? JSON.stringify(entry.payload) : entry.message;
    write(line);
  };
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}

export type { LogEntry, LogFormat, Logger, LoggerOptions, LogLevel, LogSink };

export const logger = createLogger();
