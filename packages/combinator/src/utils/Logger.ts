/**
 * Logging System
 *
 * Console-backed logging with levels and per-system prefixes. Recent entries
 * are kept in a bounded buffer so a batch run can attach them to its report.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  system?: string;
  error?: Error;
}

export interface LoggerConfig {
  minLevel: LogLevel;
  enableConsole: boolean;
  maxLogEntries: number;
}

class LoggerImpl {
  private config: LoggerConfig;
  private logs: LogEntry[] = [];
  private systemStats = new Map<
    string,
    { errors: number; warnings: number; messages: number }
  >();

  constructor(config?: Partial<LoggerConfig>) {
    this.config = {
      minLevel: LogLevel.INFO,
      enableConsole: true,
      maxLogEntries: 1000,
      ...config,
    };
  }

  public configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  public debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  public info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  public error(
    message: string,
    error?: Error,
    context?: Record<string, unknown>,
  ): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  public system(
    systemName: string,
    level: Exclude<LogLevel, LogLevel.SILENT>,
    message: string,
    context?: Record<string, unknown>,
    error?: Error,
  ): void {
    const stats = this.systemStats.get(systemName) || {
      errors: 0,
      warnings: 0,
      messages: 0,
    };
    if (level === LogLevel.ERROR) stats.errors++;
    else if (level === LogLevel.WARN) stats.warnings++;
    else stats.messages++;
    this.systemStats.set(systemName, stats);

    this.log(level, `[${systemName}] ${message}`, context, error, systemName);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error,
    system?: string,
  ): void {
    if (level < this.config.minLevel) return;

    const entry: LogEntry = {
      timestamp: Date.now(),
      level,
      message,
      context,
      error,
      system,
    };

    this.logs.push(entry);
    if (this.logs.length > this.config.maxLogEntries) {
      this.logs.splice(0, this.logs.length - this.config.maxLogEntries);
    }

    if (this.config.enableConsole) {
      this.outputToConsole(entry);
    }
  }

  private outputToConsole(entry: LogEntry): void {
    const timestamp = new Date(entry.timestamp).toISOString();
    const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : "";
    const logMessage = `[${timestamp}] ${entry.message}${contextStr}`;

    switch (entry.level) {
      case LogLevel.DEBUG:
        console.debug(logMessage);
        break;
      case LogLevel.INFO:
        console.info(logMessage);
        break;
      case LogLevel.WARN:
        console.warn(logMessage);
        break;
      case LogLevel.ERROR:
        if (entry.error) {
          console.error(logMessage, entry.error);
        } else {
          console.error(logMessage);
        }
        break;
    }
  }

  public getSystemStats(): Map<
    string,
    { errors: number; warnings: number; messages: number }
  > {
    return new Map(this.systemStats);
  }

  public getRecentLogs(count: number = 100): LogEntry[] {
    return this.logs.slice(-count);
  }

  public getSystemLogs(systemName: string, count: number = 100): LogEntry[] {
    return this.logs.filter((log) => log.system === systemName).slice(-count);
  }

  public clearLogs(): void {
    this.logs = [];
    this.systemStats.clear();
  }

  public setLogLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  public isLevelEnabled(level: LogLevel): boolean {
    return level >= this.config.minLevel;
  }
}

export const Logger = new LoggerImpl();

/**
 * Logger bound to one system name
 */
export class SystemLogger {
  constructor(private systemName: string) {}

  debug(message: string, context?: Record<string, unknown>): void {
    Logger.system(this.systemName, LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    Logger.system(this.systemName, LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    Logger.system(this.systemName, LogLevel.WARN, message, context);
  }

  error(
    message: string,
    error?: Error,
    context?: Record<string, unknown>,
  ): void {
    Logger.system(this.systemName, LogLevel.ERROR, message, context, error);
  }
}

function parseLogLevel(value: string): LogLevel | undefined {
  switch (value.toUpperCase()) {
    case "DEBUG":
      return LogLevel.DEBUG;
    case "INFO":
      return LogLevel.INFO;
    case "WARN":
      return LogLevel.WARN;
    case "ERROR":
      return LogLevel.ERROR;
    case "SILENT":
      return LogLevel.SILENT;
    default:
      return undefined;
  }
}

// Environment-based configuration
if (typeof process !== "undefined" && process.env) {
  if (process.env.NODE_ENV === "test") {
    Logger.configure({ minLevel: LogLevel.ERROR, enableConsole: false });
  } else if (process.env.NODE_ENV === "production") {
    Logger.configure({ minLevel: LogLevel.WARN });
  }

  const level = process.env.LOG_LEVEL
    ? parseLogLevel(process.env.LOG_LEVEL)
    : undefined;
  if (level !== undefined) {
    Logger.setLogLevel(level);
  }
}

export default Logger;
