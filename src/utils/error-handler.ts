import { logger, LogContext } from './logger';

// Error types and classifications
export enum ErrorType {
  UNREACHABLE = 'UNREACHABLE',
  UPSTREAM = 'UPSTREAM',
  RATE_LIMITED = 'RATE_LIMITED',
  DECODE = 'DECODE',
  CONFIG_INVALID = 'CONFIG_INVALID',
  STORAGE = 'STORAGE',
  INTERNAL = 'INTERNAL'
}

export enum ErrorSeverity {
  LOW = 'LOW',
  MEDIUM = 'MEDIUM',
  HIGH = 'HIGH',
  CRITICAL = 'CRITICAL'
}

export interface AppError extends Error {
  type: ErrorType;
  severity: ErrorSeverity;
  code?: string | undefined;
  statusCode?: number | undefined;
  retryable?: boolean;
  context?: LogContext | undefined;
  originalError?: Error | undefined;
}

export interface ApplicationErrorOptions {
  code?: string | undefined;
  statusCode?: number | undefined;
  retryable?: boolean;
  context?: LogContext | undefined;
  originalError?: Error | undefined;
}

export class ApplicationError extends Error implements AppError {
  public readonly type: ErrorType;
  public readonly severity: ErrorSeverity;
  public readonly code?: string | undefined;
  public readonly statusCode?: number | undefined;
  public readonly retryable: boolean;
  public readonly context?: LogContext | undefined;
  public readonly originalError?: Error | undefined;

  constructor(
    message: string,
    type: ErrorType,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM,
    options: ApplicationErrorOptions = {}
  ) {
    super(message);
    this.name = 'ApplicationError';
    this.type = type;
    this.severity = severity;
    this.code = options.code;
    this.statusCode = options.statusCode;
    this.retryable = options.retryable ?? false;
    this.context = options.context;
    this.originalError = options.originalError;

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ApplicationError);
    }
  }
}

/**
 * Network-level failure: timeout, DNS, refused connection. No HTTP response was received.
 */
export class UnreachableError extends ApplicationError {
  constructor(message: string, originalError?: Error | undefined) {
    super(message, ErrorType.UNREACHABLE, ErrorSeverity.MEDIUM, {
      retryable: true,
      originalError
    });
    this.name = 'UnreachableError';
  }
}

export class UpstreamError extends ApplicationError {
  constructor(message: string, statusCode: number, originalError?: Error | undefined) {
    super(message, ErrorType.UPSTREAM, ErrorSeverity.MEDIUM, {
      statusCode,
      retryable: statusCode >= 500,
      originalError
    });
    this.name = 'UpstreamError';
  }
}

export class RateLimitError extends ApplicationError {
  public readonly resetAt?: number | undefined;

  constructor(message: string, statusCode: number, resetAt?: number | undefined, originalError?: Error | undefined) {
    super(message, ErrorType.RATE_LIMITED, ErrorSeverity.MEDIUM, {
      statusCode,
      retryable: true,
      context: resetAt !== undefined ? { resetAt: new Date(resetAt * 1000).toISOString() } : undefined,
      originalError
    });
    this.name = 'RateLimitError';
    this.resetAt = resetAt;
  }
}

export class DecodeError extends ApplicationError {
  constructor(message: string, field?: string) {
    super(message, ErrorType.DECODE, ErrorSeverity.MEDIUM, {
      context: field !== undefined ? { field } : undefined
    });
    this.name = 'DecodeError';
  }
}

export class ConfigInvalidError extends ApplicationError {
  constructor(message: string, field?: string) {
    super(message, ErrorType.CONFIG_INVALID, ErrorSeverity.LOW, {
      context: field !== undefined ? { field } : undefined
    });
    this.name = 'ConfigInvalidError';
  }
}

export class StorageError extends ApplicationError {
  constructor(message: string, originalError?: Error | undefined) {
    super(message, ErrorType.STORAGE, ErrorSeverity.HIGH, {
      retryable: true,
      originalError
    });
    this.name = 'StorageError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export interface ErrorStat {
  errorType: string;
  count: number;
  lastOccurrence: number;
}

// Error handler class for centralized error management
export class ErrorHandler {
  private static instance: ErrorHandler;

  private errorCounts: Map<string, number> = new Map();
  private lastErrorTime: Map<string, number> = new Map();
  private readonly maxErrorsPerMinute = 10;

  private constructor() {}

  public static getInstance(): ErrorHandler {
    if (!ErrorHandler.instance) {
      ErrorHandler.instance = new ErrorHandler();
    }
    return ErrorHandler.instance;
  }

  /**
   * Normalizes and logs an error. Returns the normalized error so callers can branch on its type.
   */
  public handleError(error: unknown, context?: LogContext): AppError {
    const appError = this.normalizeError(toError(error), context);
    this.logError(appError, context);
    return appError;
  }

  /**
   * Normalizes different error types into ApplicationError
   */
  public normalizeError(error: Error, context?: LogContext): AppError {
    if (error instanceof ApplicationError) {
      return error;
    }

    if (error instanceof SyntaxError) {
      return new DecodeError(error.message);
    }

    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    if (code === 'ECONNRESET' || code === 'ETIMEDOUT' || code === 'ENOTFOUND' || code === 'ECONNREFUSED') {
      return new UnreachableError(error.message, error);
    }

    if (code?.startsWith('SQLITE_')) {
      return new StorageError(error.message, error);
    }

    return new ApplicationError(
      error.message || 'An unexpected error occurred',
      ErrorType.INTERNAL,
      ErrorSeverity.MEDIUM,
      { originalError: error, context }
    );
  }

  /**
   * Logs errors with appropriate detail level
   */
  private logError(error: AppError, context?: LogContext): void {
    const errorKey = `${error.type}:${error.message}`;
    const now = Date.now();

    // Rate limit error logging to prevent spam
    const lastTime = this.lastErrorTime.get(errorKey) || 0;
    const count = this.errorCounts.get(errorKey) || 0;

    if (now - lastTime > 60000) { // Reset count every minute
      this.errorCounts.set(errorKey, 1);
      this.lastErrorTime.set(errorKey, now);
    } else {
      this.errorCounts.set(errorKey, count + 1);

      // Skip logging if we've seen this error too many times
      if (count >= this.maxErrorsPerMinute) {
        return;
      }
    }

    const logContext: LogContext = {
      type: error.type,
      severity: error.severity,
      code: error.code,
      statusCode: error.statusCode,
      retryable: error.retryable,
      errorContext: error.context,
      additionalContext: context
    };

    switch (error.severity) {
      case ErrorSeverity.LOW:
        logger.info(error.message, logContext);
        break;
      case ErrorSeverity.MEDIUM:
        logger.warn(error.message, logContext, error.originalError);
        break;
      case ErrorSeverity.HIGH:
        logger.error(error.message, logContext, error.originalError);
        break;
      case ErrorSeverity.CRITICAL:
        logger.critical(error.message, logContext, error.originalError);
        break;
    }
  }

  /**
   * Message suitable for a response envelope
   */
  public getUserFriendlyMessage(error: AppError): string {
    switch (error.type) {
      case ErrorType.UNREACHABLE:
        return `GitHub API is unreachable: ${error.message}`;
      case ErrorType.RATE_LIMITED:
        return 'GitHub API rate limit exceeded';
      case ErrorType.UPSTREAM:
        return `GitHub API error: ${error.statusCode ?? 'unknown status'}`;
      case ErrorType.DECODE:
        return `Unexpected response from GitHub: ${error.message}`;
      case ErrorType.STORAGE:
        return 'Plugin storage is unavailable';
      default:
        return error.message;
    }
  }

  /**
   * Gets error statistics for monitoring
   */
  public getErrorStats(): ErrorStat[] {
    const stats: ErrorStat[] = [];

    for (const [errorKey, count] of this.errorCounts.entries()) {
      stats.push({
        errorType: errorKey,
        count,
        lastOccurrence: this.lastErrorTime.get(errorKey) || 0
      });
    }

    return stats.sort((a, b) => b.count - a.count);
  }

  /**
   * Clears error statistics (useful for testing or periodic cleanup)
   */
  public clearErrorStats(): void {
    this.errorCounts.clear();
    this.lastErrorTime.clear();
  }
}

// Global error handler instance
export const errorHandler = ErrorHandler.getInstance();
