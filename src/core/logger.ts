import { appendFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { homedir } from "node:os";
import type { LogLevelName } from "../models/config";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LEVEL_NAMES: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

export const DEFAULT_LOG_DIR = join(homedir(), ".gitlab-facade", "logs");

export const isLogLevelName = (value: string): value is LogLevelName =>
  Object.prototype.hasOwnProperty.call(LEVEL_NAMES, value);

export const toLogLevel = (name: LogLevelName): LogLevel => LEVEL_NAMES[name];

export class Logger {
  private level: LogLevel = LogLevel.INFO;
  private logToFile = false;
  private logDir: string;
  private pending: Promise<void> = Promise.resolve();

  constructor(logDir: string = DEFAULT_LOG_DIR) {
    this.logDir = logDir;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLogToFile(enable: boolean, logDir?: string): void {
    this.logToFile = enable;
    if (logDir) {
      this.logDir = logDir;
    }
  }

  /** Resolves once every queued file write has settled. */
  flush(): Promise<void> {
    return this.pending;
  }

  private writeLog(level: string, message: string, meta?: unknown): void {
    if (!this.logToFile) {
      return;
    }

    const timestamp = new Date().toISOString();
    const metaStr = meta === undefined ? "" : ` ${JSON.stringify(meta)}`;
    const logEntry = `[${timestamp}] [${level}] ${message}${metaStr}\n`;
    const dir = this.logDir;

    this.pending = this.pending
      .then(async () => {
        await mkdir(dir, { recursive: true });
        await appendFile(join(dir, "app.log"), logEntry, "utf-8");
      })
      .catch((err: unknown) => {
        process.stderr.write(
          `log write failed: ${err instanceof Error ? err.message : String(err)}\n`,
        );
      });
  }

  debug(message: string, meta?: unknown): void {
    if (this.level <= LogLevel.DEBUG) {
      const prefix = "\x1b[34m[DEBUG]\x1b[0m";
      console.debug(`${prefix} ${message}`, meta ?? "");
      this.writeLog("DEBUG", message, meta);
    }
  }

  info(message: string, meta?: unknown): void {
    if (this.level <= LogLevel.INFO) {
      const prefix = "\x1b[32m[INFO]\x1b[0m";
      console.info(`${prefix} ${message}`, meta ?? "");
      this.writeLog("INFO", message, meta);
    }
  }

  warn(message: string, meta?: unknown): void {
    if (this.level <= LogLevel.WARN) {
      const prefix = "\x1b[33m[WARN]\x1b[0m";
      console.warn(`${prefix} ${message}`, meta ?? "");
      this.writeLog("WARN", message, meta);
    }
  }

  error(message: string, err?: unknown): void {
    if (this.level <= LogLevel.ERROR) {
      const prefix = "\x1b[31m[ERROR]\x1b[0m";
      console.error(`${prefix} ${message}`, err ?? "");
      const errorMeta = err instanceof Error ? { message: err.message, stack: err.stack } : err;
      this.writeLog("ERROR", message, errorMeta);
    }
  }
}

export const logger = new Logger();
