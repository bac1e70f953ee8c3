/**
 * Structured logging utility for the report normalizer
 * Provides consistent logging format with correlation IDs for better tracing
 */

import { environmentConfig } from "../config/environment";
import type { LogLevelName } from "../types/environment";

export interface LogContext {
  correlationId?: string;
  filePath?: string;
  formatName?: string;
  operation?: string;
  [key: string]: unknown;
}

export enum LogLevel {
  DEBUG = "DEBUG",
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR",
}

const LEVEL_ORDER: Record<LogLevelName, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

/**
 * Structured logger class with correlation ID support
 */
export class Logger {
  private readonly serviceName: string;
  private readonly defaultContext: LogContext;
  private readonly minLevel: LogLevelName;

  constructor(
    serviceName: string = "ReportNormalizer",
    defaultContext: LogContext = {},
    minLevel: LogLevelName = environmentConfig.logLevel,
  ) {
    this.serviceName = serviceName;
    this.defaultContext = defaultContext;
    this.minLevel = minLevel;
  }

  /**
   * Creates a child logger with additional default context
   */
  child(additionalContext: LogContext): Logger {
    return new Logger(
      this.serviceName,
      {
        ...this.defaultContext,
        ...additionalContext,
      },
      this.minLevel,
    );
  }

  debug(message: string, context: LogContext = {}): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context: LogContext = {}): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context: LogContext = {}): void {
    this.log(LogLevel.WARN, message, context);
  }

  /**
   * Logs an error message, expanding the error's name, message and stack
   */
  error(message: string, error?: Error, context: LogContext = {}): void {
    const errorContext = error
      ? {
          error: {
            name: error.name,
            message: error.message,
            stack: error.stack,
          },
        }
      : {};

    this.log(LogLevel.ERROR, message, { ...context, ...errorContext });
  }

  /**
   * Core logging method that outputs structured JSON logs
   */
  private log(
    level: LogLevel,
    message: string,
    context: LogContext = {},
  ): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }

    const logEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.serviceName,
      message,
      ...this.defaultContext,
      ...context,
    };

    const logOutput = JSON.stringify(logEntry);

    switch (level) {
      case LogLevel.DEBUG:
        console.debug(logOutput);
        break;
      case LogLevel.INFO:
        console.info(logOutput);
        break;
      case LogLevel.WARN:
        console.warn(logOutput);
        break;
      case LogLevel.ERROR:
        console.error(logOutput);
        break;
      default:
        console.log(logOutput);
    }
  }
}

/**
 * Default logger instance
 */
export const logger = new Logger("ReportNormalizer");

/**
 * Creates a logger with correlation ID context
 */
export function createCorrelatedLogger(
  correlationId: string,
  additionalContext: LogContext = {},
): Logger {
  return logger.child({ correlationId, ...additionalContext });
}

const dataQualityLogger = new Logger("DataQuality");

/**
 * Records a data quality finding against a table column
 */
export function logDataQualityIssue(
  table: string,
  column: string,
  issue: string,
  count?: number,
  context: LogContext = {},
): void {
  dataQualityLogger.warn(
    count !== undefined
      ? `${table}.${column}: ${issue} (${count} rows affected)`
      : `${table}.${column}: ${issue}`,
    {
      ...context,
      operation: "data_quality_issue",
      table,
      column,
      issue,
      count,
    },
  );
}
