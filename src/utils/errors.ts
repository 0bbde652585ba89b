import { Request, Response, NextFunction } from 'express';
import logger from './logger';

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode: number, isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * 400 Bad Request - validation errors
 */
export class ValidationError extends AppError {
  public readonly field?: string;

  constructor(message: string, field?: string) {
    super(message, 400);
    this.field = field;
  }
}

/**
 * 404 Not Found - resource not found
 */
export class NotFoundError extends AppError {
  public readonly resource: string;

  constructor(resource: string) {
    super(`${resource} not found`, 404);
    this.resource = resource;
  }
}

/**
 * Invalid environment variable or service catalogue entry.
 * Not operational: the process cannot start with it.
 */
export class ConfigError extends AppError {
  public readonly field: string;

  constructor(message: string, field: string) {
    super(message, 500, false);
    this.field = field;
  }
}

/**
 * Upstream answered, but not with something we can use
 * (non-2xx status, unparseable body, timeout).
 */
export class UpstreamError extends AppError {
  public readonly url: string;

  constructor(message: string, url: string) {
    super(message, 502);
    this.url = url;
  }
}

/**
 * The collection cycle ran out of time and aborted in-flight work.
 */
export class DeadlineExceededError extends AppError {
  constructor(message = 'Cycle deadline exceeded') {
    super(message, 504);
  }
}

/**
 * Standard error response shape
 */
export interface ErrorResponse {
  error: string;
  message?: string;
  field?: string;
}

/**
 * Format an error for JSON response.
 * AppError subclasses are considered operational and their messages are safe
 * to return to clients. All other errors get a generic message.
 */
export function formatError(error: unknown): ErrorResponse {
  if (error instanceof ValidationError) {
    return {
      error: error.message,
      ...(error.field && { field: error.field }),
    };
  }

  if (error instanceof AppError && error.isOperational) {
    return { error: error.message };
  }

  return { error: 'Internal server error' };
}

/**
 * Get status code from error
 */
export function getErrorStatusCode(error: unknown): number {
  if (error instanceof AppError) {
    return error.statusCode;
  }
  return 500;
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Express error handling middleware
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const statusCode = getErrorStatusCode(error);
  const response = formatError(error);

  if (statusCode >= 500) {
    logger.error({ err: error, method: req.method, path: req.path }, 'request failed');
  }

  res.status(statusCode).json(response);
}

/**
 * Async route handler wrapper that catches errors and forwards to error middleware
 */
export function asyncHandler<T>(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<T>
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * Patterns that indicate internal details in error messages.
 */
const PRIVATE_IP_PATTERN = /\b(?:10\.\d{1,3}\.\d{1,3}\.\d{1,3}|172\.(?:1[6-9]|2\d|3[01])\.\d{1,3}\.\d{1,3}|192\.168\.\d{1,3}\.\d{1,3}|127\.\d{1,3}\.\d{1,3}\.\d{1,3}|169\.254\.\d{1,3}\.\d{1,3})\b/g;
const URL_PATTERN = /https?:\/\/[^\s,)]+/gi;
const FILE_PATH_PATTERN = /(?:\/[\w.-]+){2,}|[A-Z]:\\[\w\\.-]+/g;

/**
 * Known fetch/network error patterns mapped to safe messages.
 */
const ERROR_SANITIZATION_MAP: Array<{ pattern: RegExp; replacement: string | ((match: string) => string) }> = [
  { pattern: /ECONNREFUSED/i, replacement: 'Connection refused' },
  { pattern: /ECONNRESET/i, replacement: 'Connection reset' },
  { pattern: /ETIMEDOUT/i, replacement: 'Connection timed out' },
  { pattern: /ENOTFOUND/i, replacement: 'DNS lookup failed' },
  { pattern: /EHOSTUNREACH/i, replacement: 'Host unreachable' },
  { pattern: /ENETUNREACH/i, replacement: 'Network unreachable' },
  { pattern: /deadline/i, replacement: 'Cycle deadline exceeded' },
  { pattern: /abort/i, replacement: 'Request timed out' },
  { pattern: /^HTTP \d{3}:/i, replacement: (match: string) => match.split(':')[0] },
];

/**
 * Sanitize an upstream error message before it lands in the output document.
 * Maps known error codes to safe descriptions, otherwise strips URLs,
 * private IPs and file paths.
 */
export function sanitizeUpstreamError(errorMessage: string): string {
  if (!errorMessage) return errorMessage;

  for (const { pattern, replacement } of ERROR_SANITIZATION_MAP) {
    const match = pattern.exec(errorMessage);
    if (match) {
      if (typeof replacement === 'function') {
        return replacement(match[0]);
      }
      return replacement;
    }
  }

  let sanitized = errorMessage;
  sanitized = sanitized.replace(URL_PATTERN, '[redacted-url]');
  sanitized = sanitized.replace(PRIVATE_IP_PATTERN, '[redacted-ip]');
  sanitized = sanitized.replace(FILE_PATH_PATTERN, '[redacted-path]');

  if (sanitized.length > 200) {
    sanitized = sanitized.substring(0, 200) + '...';
  }

  return sanitized;
}
