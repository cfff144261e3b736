/**
 * Structured logger with JSON output and correlation IDs
 */

import { randomUUID } from 'node:crypto';

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3
}

export interface LogContext {
  correlationId?: string;
  service?: string;
  operation?: string;
  entityId?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  correlationId: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  metadata?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry) => void;

export class Logger {
  private static instance: Logger | undefined;
  private correlationId: string;
  private context: LogContext;
  private readonly logLevel: LogLevel;
  private readonly outputStream: LogSink;

  constructor(logLevel: LogLevel = LogLevel.INFO, context: LogContext = {}, outputStream?: LogSink) {
    this.logLevel = logLevel;
    this.correlationId = context.correlationId || randomUUID();
    this.context = { ...context, correlationId: this.correlationId };
    this.outputStream = outputStream || ((entry) => console.log(JSON.stringify(entry)));
  }

  /**
   * Get singleton instance
   */
  static getInstance(logLevel?: LogLevel, context?: LogContext): Logger {
    if (!Logger.instance) {
      const level = logLevel ?? Logger.parseLogLevel(process.env.LOG_LEVEL);
      Logger.instance = new Logger(level, context);
    }
    return Logger.instance;
  }

  /**
   * Logger that drops everything, used as a default in tests and library code
   */
  static silent(): Logger {
    return new Logger(LogLevel.ERROR, {}, () => {});
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): Logger {
    return new Logger(
      this.logLevel,
      {
        ...this.context,
        ...context,
        correlationId: context.correlationId || this.correlationId
      },
      this.outputStream
    );
  }

  /**
   * Create a logger for a specific operation
   */
  forOperation(operation: string, context?: LogContext): Logger {
    return this.child({
      ...context,
      operation,
      operationId: randomUUID()
    });
  }

  static parseLogLevel(level?: string): LogLevel {
    switch (level?.toLowerCase()) {
      case 'error':
        return LogLevel.ERROR;
      case 'warn':
        return LogLevel.WARN;
      case 'info':
        return LogLevel.INFO;
      case 'debug':
        return LogLevel.DEBUG;
      default:
        return LogLevel.INFO;
    }
  }

  private formatEntry(
    level: string,
    message: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      correlationId: this.correlationId,
      context: this.context
    };

    if (metadata) {
      entry.metadata = metadata;
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack
      };
    }

    return entry;
  }

  private shouldLog(level: LogLevel): boolean {
    return level <= this.logLevel;
  }

  /**
   * Log an error
   */
  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      this.outputStream(this.formatEntry('ERROR', message, metadata, error));
    }
  }

  /**
   * Log a warning
   */
  warn(message: string, metadata?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.WARN)) {
      this.outputStream(this.formatEntry('WARN', message, metadata));
    }
  }

  /**
   * Log info
   */
  info(message: string, metadata?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.INFO)) {
      this.outputStream(this.formatEntry('INFO', message, metadata));
    }
  }

  /**
   * Log debug information
   */
  debug(message: string, metadata?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      this.outputStream(this.formatEntry('DEBUG', message, metadata));
    }
  }

  /**
   * Log an outbound HTTP call
   */
  logApiCall(
    service: string,
    method: string,
    url: string,
    duration: number,
    status?: number,
    error?: Error
  ): void {
    const metadata = {
      service,
      method,
      url,
      duration,
      status,
      success: !error && status !== undefined && status < 400
    };

    if (error) {
      this.error(`API call failed: ${service}`, error, metadata);
    } else if (status !== undefined && status >= 400) {
      this.warn(`API call returned error status: ${service}`, metadata);
    } else {
      this.debug(`API call completed: ${service}`, metadata);
    }
  }

  getCorrelationId(): string {
    return this.correlationId;
  }
}

export function getLogger(): Logger {
  return Logger.getInstance();
}

/**
 * Logger whose entries are captured in memory, for assertions in tests
 */
export function createCapturingLogger(level: LogLevel = LogLevel.DEBUG): {
  logger: Logger;
  entries: LogEntry[];
} {
  const entries: LogEntry[] = [];
  const logger = new Logger(level, { correlationId: 'test' }, (entry) => entries.push(entry));
  return { logger, entries };
}
