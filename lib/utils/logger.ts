/**
 * Console logger with an optional log file
 *
 * Messages go to the console as `[Netbox] message`. When a directory is set
 * they are also appended to a per-run log file as
 * `2026-01-01T00:00:00.000Z INFO  [Netbox] message`.
 */

import * as fs from "node:fs";
import * as path from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  child(scope: string): Logger;
  readonly level: LogLevel;
  readonly filePath?: string;
}

export interface LoggerOptions {
  level?: LogLevel;
  directory?: string;
  fileName?: string;
  scope?: string;
}

interface LogSink {
  level: LogLevel;
  filePath?: string;
}

function formatDetail(detail: unknown): string {
  if (detail instanceof Error) {
    return detail.stack ?? `${detail.name}: ${detail.message}`;
  }
  if (typeof detail === "string") {
    return detail;
  }
  try {
    return JSON.stringify(detail, null, 2);
  } catch {
    return String(detail);
  }
}

class ConsoleLogger implements Logger {
  constructor(
    private readonly sink: LogSink,
    private readonly scope?: string,
  ) {}

  get level(): LogLevel {
    return this.sink.level;
  }

  get filePath(): string | undefined {
    return this.sink.filePath;
  }

  debug(message: string, ...details: unknown[]): void {
    this.write("debug", message, details);
  }

  info(message: string, ...details: unknown[]): void {
    this.write("info", message, details);
  }

  warn(message: string, ...details: unknown[]): void {
    this.write("warn", message, details);
  }

  error(message: string, ...details: unknown[]): void {
    this.write("error", message, details);
  }

  child(scope: string): Logger {
    return new ConsoleLogger(this.sink, scope);
  }

  private write(level: LogLevel, message: string, details: unknown[]): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.sink.level]) {
      return;
    }

    const scoped = this.scope ? `[${this.scope}] ${message}` : message;
    const rendered = [scoped, ...details.map(formatDetail)].join(" ");

    switch (level) {
      case "debug":
        console.debug(rendered);
        break;
      case "info":
        console.log(rendered);
        break;
      case "warn":
        console.warn(rendered);
        break;
      case "error":
        console.error(rendered);
        break;
    }

    if (this.sink.filePath) {
      const line = `${new Date().toISOString()} ${level.toUpperCase().padEnd(5)} ${rendered}\n`;
      fs.appendFileSync(this.sink.filePath, line);
    }
  }
}

/**
 * Create the root logger for a run
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const sink: LogSink = { level: options.level ?? "info" };

  if (options.directory) {
    fs.mkdirSync(options.directory, { recursive: true });
    const stamp = new Date().toISOString().replace(/[:.]/g, "-");
    const fileName = options.fileName ?? `netbox-netshot-sync_${stamp}.log`;
    sink.filePath = path.join(options.directory, fileName);
  }

  return new ConsoleLogger(sink, options.scope);
}
