// This module provides the typed application error shared by the registry, the capabilities, and both transports.

export type AppErrorCode =
  | 'validation_error'
  | 'parse_error'
  | 'tool_not_found'
  | 'duplicate_tool'
  | 'registry_frozen'
  | 'invalid_config'
  | 'not_found'
  | 'http_error'
  | 'internal_error';

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: AppErrorCode;
  public readonly details?: unknown;

  public constructor(statusCode: number, code: AppErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

// Framework errors (oversized body, unsupported media type) carry their own 4xx status.
function frameworkStatus(error: Error): number | null {
  if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode >= 400 && error.statusCode < 500) {
    return error.statusCode;
  }

  return null;
}

// This helper normalizes unknown failures into an AppError without leaking internals.
export function normalizeError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof Error) {
    const status = frameworkStatus(error);
    return status === null
      ? new AppError(500, 'internal_error', error.message)
      : new AppError(status, 'http_error', error.message);
  }

  return new AppError(500, 'internal_error', 'An unexpected error occurred.');
}

export function hasErrorCode(error: unknown, code: AppErrorCode): error is AppError {
  return error instanceof AppError && error.code === code;
}

// This helper marks capability argument failures so the dispatcher reports them as invalid params.
export function validationError(message: string, details?: unknown): AppError {
  return new AppError(400, 'validation_error', message, details);
}

export function toolNotFoundError(name: string): AppError {
  return new AppError(404, 'tool_not_found', `Tool '${name}' not found`);
}
