/**
 * Structured logging for the loader
 *
 * - Level threshold (DEBUG through SILENT)
 * - Structured context on every entry
 * - Optional JSON lines for log aggregation
 *
 * The loader only writes DEBUG entries, so the default WARN threshold keeps
 * embedding applications quiet. Set `LANGUAGES_LOG_LEVEL=DEBUG` to see which
 * files were read.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogContext = Record<string, unknown>;

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: LogContext;
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  DEBUG: LogLevel.DEBUG,
  INFO: LogLevel.INFO,
  WARN: LogLevel.WARN,
  ERROR: LogLevel.ERROR,
  SILENT: LogLevel.SILENT,
};

class Logger {
  private static instance: Logger | undefined;
  private level: LogLevel = LogLevel.WARN;
  private jsonOutput = false;

  private constructor() {
    const envLevel = process.env.LANGUAGES_LOG_LEVEL?.toUpperCase();
    if (envLevel && envLevel in LEVEL_NAMES) {
      this.level = LEVEL_NAMES[envLevel];
    }

    this.jsonOutput = process.env.LANGUAGES_LOG_JSON === 'true';
  }

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  public setLevel(level: LogLevel): void {
    this.level = level;
  }

  public getLevel(): LogLevel {
    return this.level;
  }

  public setJsonOutput(enabled: boolean): void {
    this.jsonOutput = enabled;
  }

  public isLevelEnabled(level: LogLevel): boolean {
    return level >= this.level && level !== LogLevel.SILENT;
  }

  private formatMessage(entry: LogEntry): string {
    if (this.jsonOutput) {
      return JSON.stringify({
        ...entry,
        level: LogLevel[entry.level],
      });
    }

    const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
    return `[${LogLevel[entry.level]}] ${entry.message}${contextStr}`;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const formatted = this.formatMessage({
      level,
      message,
      timestamp: new Date().toISOString(),
      context,
    });

    console.debug(formatted);
  }

  public debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }
}

export type { Logger };

export function getLogger(): Logger {
  return Logger.getInstance();
}

export const logger = Logger.getInstance();
