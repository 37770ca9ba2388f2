import { z } from 'zod';

export type FileAccessErrorCode = 'NOT_FOUND' | 'PERMISSION_DENIED' | 'UNREADABLE';

/**
 * Error thrown by file system probes, classified from the underlying OS error
 */
export class FileAccessError extends Error {
  constructor(
    message: string,
    public readonly code: FileAccessErrorCode,
    public readonly path: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'FileAccessError';
  }
}

/**
 * Error thrown when a query object from the parser fails Zod validation
 */
export class QueryValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: z.ZodError
  ) {
    super(message);
    this.name = 'QueryValidationError';
  }
}

/**
 * Error thrown when a configuration file cannot be loaded or validated
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configName: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Error thrown when an operation exceeds its time budget
 */
export class TimeoutError extends Error {
  constructor(
    message: string,
    public readonly timeoutMs: number
  ) {
    super(message);
    this.name = 'TimeoutError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
