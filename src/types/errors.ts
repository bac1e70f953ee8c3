/**
 * Error types for structured error handling in the report normalization system
 */

/**
 * Base error class for all report processing errors
 * Provides common properties for error tracking and debugging
 */
export abstract class ReportProcessingError extends Error {
  public readonly correlationId: string;
  public readonly timestamp: Date;
  public readonly context: Record<string, unknown>;

  constructor(
    message: string,
    correlationId: string,
    context: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = this.constructor.name;
    this.correlationId = correlationId;
    this.timestamp = new Date();
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Returns a structured representation of the error for logging
   */
  toLogFormat(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      correlationId: this.correlationId,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }
}

/**
 * Error thrown when a report file cannot be read or parsed
 */
export class ReportFileError extends ReportProcessingError {
  public readonly filePath: string;
  public readonly operation: "read" | "sniff" | "parse";

  constructor(
    message: string,
    correlationId: string,
    filePath: string,
    operation: "read" | "sniff" | "parse",
    context: Record<string, unknown> = {},
  ) {
    super(message, correlationId, { ...context, filePath, operation });
    this.filePath = filePath;
    this.operation = operation;
  }
}

/**
 * Error thrown when the format registry file cannot be loaded or written
 */
export class FormatRegistryError extends ReportProcessingError {
  public readonly registryPath: string;
  public readonly operation: "load" | "save";

  constructor(
    message: string,
    correlationId: string,
    registryPath: string,
    operation: "load" | "save",
    context: Record<string, unknown> = {},
  ) {
    super(message, correlationId, { ...context, registryPath, operation });
    this.registryPath = registryPath;
    this.operation = operation;
  }
}

/**
 * Error thrown when configuration is invalid or missing
 */
export class ConfigurationError extends ReportProcessingError {
  public readonly configKey: string;

  constructor(
    message: string,
    correlationId: string,
    configKey: string,
    context: Record<string, unknown> = {},
  ) {
    super(message, correlationId, { ...context, configKey });
    this.configKey = configKey;
  }
}

/**
 * Utility function to generate correlation IDs for request tracking
 */
export function generateCorrelationId(): string {
  return `rnorm-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
}

/**
 * Narrows an unknown thrown value to an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
