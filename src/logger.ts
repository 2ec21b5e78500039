import { appendFileSync } from "fs";
import type { LogLevel } from "./config/schema.js";
import { errorMessage } from "./errors.js";

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogSink = (line: string) => void;

/**
 * Timestamped line logger. Writes to stderr so it never interferes with the
 * MCP stdio transport, and optionally appends to a log file (the daemon's).
 */
export class Logger {
  private level: LogLevel;
  private sinks: LogSink[];

  constructor(options: { level?: LogLevel; logFile?: string; sinks?: LogSink[] } = {}) {
    this.level = options.level ?? "info";
    this.sinks = [...(options.sinks ?? [(line: string) => console.error(line)])];

    const logFile = options.logFile;
    if (logFile) {
      this.sinks.push((line) => {
        try {
          appendFileSync(logFile, line + "\n");
        } catch (error) {
          console.error(`Could not write ${logFile}: ${errorMessage(error)}`);
        }
      });
    }
  }

  debug(message: string): void {
    this.log("debug", message);
  }

  info(message: string): void {
    this.log("info", message);
  }

  warn(message: string): void {
    this.log("warn", message);
  }

  error(message: string): void {
    this.log("error", message);
  }

  private log(level: LogLevel, message: string): void {
    if (LEVELS[level] < LEVELS[this.level]) return;
    const line = `[${new Date().toISOString()}] ${level.toUpperCase()} ${message}`;
    for (const sink of this.sinks) {
      sink(line);
    }
  }
}

export const silentLogger = new Logger({ sinks: [] });
