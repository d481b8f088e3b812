import { MetalogAuditError, ErrorCodes } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for different types of errors in the metalog-audit CLI
 */

export class UsageError extends MetalogAuditError {
  constructor(message: string) {
    super(message, ErrorCodes.USAGE_ERROR);
    this.name = 'UsageError';
  }
}

export class FileSystemError extends MetalogAuditError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class MalformedLineError extends MetalogAuditError {
  public readonly lineNumber: number;
  public readonly line: string;

  constructor(lineNumber: number, line: string) {
    super(`line ${lineNumber}: expected "<filename> <key>=<value> ...", got "${line}"`, ErrorCodes.MALFORMED_LINE, { lineNumber, line });
    this.name = 'MalformedLineError';
    this.lineNumber = lineNumber;
    this.line = line;
  }
}

export class ConfigError extends MetalogAuditError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

/**
 * Message to show for a failure. Codes and details go to the debug log.
 */
export function describeError(error: unknown): string {
  if (error instanceof MetalogAuditError) {
    logger.debug(error.name, { code: error.code, details: error.details });
    return error.message;
  }
  if (error instanceof Error) {
    logger.debug(error.stack ?? error.message);
    return error.message;
  }
  return String(error);
}

/**
 * Commander action wrapper: any failure prints `error: <message>` and exits 1.
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      console.error(`error: ${describeError(error)}`);
      process.exit(1);
    }
  };
}
