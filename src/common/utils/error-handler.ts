import { Logger } from '@nestjs/common';

/**
 * Extract a readable message from anything that was thrown
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : String(error);
}

/**
 * Base class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly metadata?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Get a string representation of the error
   */
  toString(): string {
    return `${this.name}(${this.code}): ${this.message}`;
  }
}

/**
 * Error for RPC-related issues
 */
export class RpcError extends AppError {
  constructor(
    message: string,
    public readonly endpoint?: string,
    public readonly method?: string,
    metadata?: Record<string, unknown>,
  ) {
    super(message, 'RPC_ERROR', { ...metadata, endpoint, method });
  }
}

/**
 * Error for configuration issues
 */
export class ConfigurationError extends AppError {
  constructor(
    message: string,
    public readonly configKey?: string,
    metadata?: Record<string, unknown>,
  ) {
    super(message, 'CONFIGURATION_ERROR', { ...metadata, configKey });
  }
}

/**
 * Error for failed alert deliveries
 */
export class NotificationError extends AppError {
  constructor(
    message: string,
    public readonly destination?: number,
    metadata?: Record<string, unknown>,
  ) {
    super(message, 'NOTIFICATION_ERROR', { ...metadata, destination });
  }
}

/**
 * Utility class for consistent error handling across the application
 */
export class ErrorHandler {
  private readonly logger: Logger;

  constructor(context: string) {
    this.logger = new Logger(context);
  }

  /**
   * Log and wrap an error if it's not already an AppError
   */
  handleError(error: unknown, defaultMessage = 'An unexpected error occurred', metadata?: Record<string, unknown>): AppError {
    if (error instanceof AppError) {
      this.logger.error(error.toString(), error.stack);
      return error;
    }

    const message = error instanceof Error ? error.message : defaultMessage;
    const appError = new AppError(message, 'UNKNOWN_ERROR', {
      ...metadata,
      originalError: String(error),
    });

    this.logger.error(appError.toString(), appError.stack);
    return appError;
  }
}
