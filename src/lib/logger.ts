import fs from "node:fs";
import chalk from "chalk";
import type { LogLevel } from "../types.js";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  // Flushes and releases the log file, if any; later lines still reach the console
  close(): Promise<void>;
}

export interface LoggerOptions {
  level?: LogLevel;
  // Plain-text copy of every emitted line, appended to this file
  file?: string;
  write?: (line: string) => void;
}

const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

const TAGS: Record<Exclude<LogLevel, "silent">, string> = {
  debug: chalk.gray("debug"),
  info: chalk.cyan("info "),
  warn: chalk.yellow("warn "),
  error: chalk.red("error")
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(ORDER, value);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = ORDER[options.level ?? "info"];
  const write = options.write ?? ((line: string) => process.stderr.write(line + "\n"));
  const fileStream = options.file ? fs.createWriteStream(options.file, { flags: "a" }) : undefined;
  fileStream?.on("error", (e) => {
    write(`${TAGS.warn} log file ${options.file} unavailable: ${e.message}`);
  });

  const emit = (level: Exclude<LogLevel, "silent">, message: string) => {
    if (ORDER[level] < threshold) return;
    write(`${TAGS[level]} ${message}`);
    if (fileStream && !fileStream.writableEnded) {
      fileStream.write(`${new Date().toISOString()} - ${level.toUpperCase()} - ${message}\n`);
    }
  };

  return {
    debug: (m) => emit("debug", m),
    info: (m) => emit("info", m),
    warn: (m) => emit("warn", m),
    error: (m) => emit("error", m),
    close: () =>
      new Promise<void>((resolve) => {
        if (!fileStream || fileStream.writableEnded) resolve();
        else fileStream.end(() => resolve());
      })
  };
}

export const silentLogger: Logger = createLogger({ level: "silent" });
