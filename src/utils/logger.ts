import fs from 'fs';
import path from 'path';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  CRITICAL = 4
}

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext | undefined;
  error?: Error | undefined;
}

export interface LoggerOptions {
  level: LogLevel;
  toFile: boolean;
  directory: string;
  maxFiles: number;
  maxFileSize: number; // bytes
}

/**
 * Appends to one file per day under `directory`. A file that would grow past
 * `maxFileSize` is renamed aside, and only the newest `maxFiles` files are kept.
 */
class DailyLogFile {
  constructor(
    private readonly directory: string,
    private readonly maxFiles: number,
    private readonly maxFileSize: number
  ) {
    fs.mkdirSync(directory, { recursive: true });
  }

  append(line: string): void {
    const filePath = path.join(this.directory, `dashboard-${new Date().toISOString().slice(0, 10)}.log`);

    if (fs.existsSync(filePath) && fs.statSync(filePath).size + Buffer.byteLength(line) > this.maxFileSize) {
      const stamp = new Date().toISOString().replace(/[:.]/g, '-');
      fs.renameSync(filePath, filePath.replace(/\.log$/, `-${stamp}.log`));
      this.prune();
    }

    fs.appendFileSync(filePath, line);
  }

  private prune(): void {
    const files = fs.readdirSync(this.directory)
      .filter(name => name.endsWith('.log'))
      .map(name => {
        const filePath = path.join(this.directory, name);
        return { filePath, modified: fs.statSync(filePath).mtimeMs };
      })
      .sort((a, b) => b.modified - a.modified);

    for (const file of files.slice(this.maxFiles)) {
      fs.unlinkSync(file.filePath);
    }
  }
}

function optionsFromEnv(env: NodeJS.ProcessEnv): LoggerOptions {
  return {
    level: Logger.parseLogLevel(env.LOG_LEVEL || 'INFO'),
    toFile: env.LOG_TO_FILE === 'true',
    directory: env.LOG_FILE_PATH || './logs',
    maxFiles: parseInt(env.MAX_LOG_FILES || '10', 10),
    maxFileSize: parseInt(env.MAX_LOG_SIZE || '10485760', 10),
  };
}

function withDuration(duration: number | undefined): LogContext {
  return { duration: duration !== undefined ? `${duration}ms` : undefined };
}

export class Logger {
  private static instance: Logger;
  private logLevel: LogLevel;
  private file: DailyLogFile | undefined;

  private constructor(options: LoggerOptions) {
    this.logLevel = options.level;
    this.file = Logger.openFile(options);
  }

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger(optionsFromEnv(process.env));
    }
    return Logger.instance;
  }

  public static parseLogLevel(level: string): LogLevel {
    switch (level.toUpperCase()) {
      case 'DEBUG': return LogLevel.DEBUG;
      case 'INFO': return LogLevel.INFO;
      case 'WARN': return LogLevel.WARN;
      case 'ERROR': return LogLevel.ERROR;
      case 'CRITICAL': return LogLevel.CRITICAL;
      default: return LogLevel.INFO;
    }
  }

  private static openFile(options: LoggerOptions): DailyLogFile | undefined {
    return options.toFile ? new DailyLogFile(options.directory, options.maxFiles, options.maxFileSize) : undefined;
  }

  /**
   * Re-applies settings from the application config. Options left out keep their current values.
   */
  public configure(options: Partial<LoggerOptions>): void {
    const merged = { ...optionsFromEnv(process.env), level: this.logLevel, ...options };
    this.logLevel = merged.level;
    this.file = Logger.openFile(merged);
  }

  public formatLogEntry(entry: LogEntry): string {
    const parts = [`[${entry.timestamp}] ${LogLevel[entry.level]}: ${entry.message}`];

    if (entry.context && Object.keys(entry.context).length > 0) {
      parts.push(`Context: ${JSON.stringify(entry.context)}`);
    }
    if (entry.error) {
      parts.push(`Error: ${entry.error.message}`);
    }

    let formatted = parts.join(' | ');
    if (entry.error?.stack && entry.level >= LogLevel.ERROR) {
      formatted += `\nStack: ${entry.error.stack}`;
    }
    return formatted;
  }

  private log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (level < this.logLevel) return;

    const line = this.formatLogEntry({ timestamp: new Date().toISOString(), level, message, context, error }) + '\n';

    // stdout carries the host protocol
    process.stderr.write(line);

    if (this.file) {
      try {
        this.file.append(line);
      } catch (fileError) {
        process.stderr.write(`Failed to write to log file: ${fileError instanceof Error ? fileError.message : String(fileError)}\n`);
      }
    }
  }

  public debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  public info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  public warn(message: string, context?: LogContext, error?: Error): void {
    this.log(LogLevel.WARN, message, context, error);
  }

  public error(message: string, context?: LogContext, error?: Error): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  public critical(message: string, context?: LogContext, error?: Error): void {
    this.log(LogLevel.CRITICAL, message, context, error);
  }

  public logGitHubAPICall(method: string, endpoint: string, statusCode?: number, duration?: number): void {
    this.debug('GitHub API call', { method, endpoint, statusCode, ...withDuration(duration) });
  }

  public logRateLimitHit(endpoint: string, remaining: number, resetTime?: number): void {
    this.warn('GitHub rate limit reached', {
      endpoint,
      remaining,
      resetTime: resetTime !== undefined ? new Date(resetTime * 1000).toISOString() : undefined,
    });
  }

  public logStartup(component: string, success: boolean, duration?: number, error?: Error): void {
    if (success) {
      this.info(`${component} started successfully`, withDuration(duration));
    } else {
      this.error(`${component} startup failed`, withDuration(duration), error);
    }
  }

  public logShutdown(component: string, success: boolean, error?: Error): void {
    if (success) {
      this.info(`${component} shutdown completed`);
    } else {
      this.error(`${component} shutdown failed`, {}, error);
    }
  }

  public createTimer(operation: string): () => number {
    const startTime = Date.now();
    return () => {
      const duration = Date.now() - startTime;
      this.debug(`Operation completed: ${operation}`, withDuration(duration));
      return duration;
    };
  }

  public logHealthCheck(component: string, status: 'healthy' | 'unhealthy', details?: LogContext): void {
    if (status === 'healthy') {
      this.debug(`Health check passed: ${component}`, details);
    } else {
      this.warn(`Health check failed: ${component}`, details);
    }
  }

  public getLogLevel(): LogLevel {
    return this.logLevel;
  }
}

export const logger = Logger.getInstance();
