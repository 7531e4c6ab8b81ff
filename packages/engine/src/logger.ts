import type { LogLevel } from "./config";

const levelWeight: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export interface LogSink {
  (level: LogLevel, line: string): void;
}

// Operational logs stay on stderr so stdout carries only check and report lines.
const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case "warn":
      console.warn(line);
      break;
    default:
      console.error(line);
  }
};

export class Logger {
  private readonly minLevel: LogLevel;
  private readonly sink: LogSink;

  constructor(level: LogLevel = "info", sink: LogSink = consoleSink) {
    this.minLevel = level;
    this.sink = sink;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.write("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.write("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.write("error", message, meta);
  }

  private write(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (levelWeight[level] < levelWeight[this.minLevel]) {
      return;
    }
    const line = meta ? `[${level}] ${message} ${JSON.stringify(meta)}` : `[${level}] ${message}`;
    this.sink(level, line);
  }
}
