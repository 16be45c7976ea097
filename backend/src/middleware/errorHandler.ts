import { Request, Response, NextFunction } from 'express';
import { logger, loggers } from '@/utils/logger';
import { getRequestContext } from './logger';

export interface AppError extends Error {
  statusCode?: number;
  code?: string;
  details?: unknown;
  isOperational?: boolean;
}

export class CustomError extends Error implements AppError {
  statusCode: number;
  code: string;
  details?: unknown;
  isOperational: boolean;

  constructor(message: string, statusCode: number = 500, code?: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code || 'INTERNAL_ERROR';
    this.details = details;
    this.isOperational = true;

    Error.captureStackTrace(this, this.constructor);
  }
}

// Predefined error classes
export class ValidationError extends CustomError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR', details);
  }
}

export class NotFoundError extends CustomError {
  constructor(resource: string = 'Resource') {
    super(`${resource} not found`, 404, 'NOT_FOUND');
  }
}

export class ConflictError extends CustomError {
  constructor(message: string) {
    super(message, 409, 'CONFLICT_ERROR');
  }
}

export class ExternalServiceError extends CustomError {
  constructor(service: string, message?: string) {
    super(message || `External service ${service} unavailable`, 502, 'EXTERNAL_SERVICE_ERROR', { service });
  }
}

interface ErrorResponseBody {
  error: {
    message: string;
    code: string;
    timestamp: string;
    path: string;
    stack?: string;
    details?: unknown;
  };
}

// Main error handler middleware
export const errorHandler = (
  error: AppError,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  // Driver errors reach here untouched; give them a status first
  const err = error.statusCode === undefined && isDatabaseError(error) ? handleDatabaseError(error) : error;
  const statusCode = err.statusCode || 500;
  const code = err.code || 'INTERNAL_ERROR';

  const errorDetails = {
    message: err.message,
    code,
    statusCode,
    url: req.url,
    method: req.method,
    ip: req.ip,
    params: req.params,
    query: req.query,
    correlationId: getRequestContext()?.correlationId,
  };

  if (statusCode >= 500) {
    loggers.api.error(req.method, req.url, err);
  } else {
    logger.warn('Client error:', errorDetails);
  }

  // Don't leak error details in production
  const isDevelopment = process.env.NODE_ENV === 'development';

  const errorResponse: ErrorResponseBody = {
    error: {
      message: statusCode >= 500 && !isDevelopment ? 'Internal server error' : err.message,
      code,
      timestamp: new Date().toISOString(),
      path: req.path,
    }
  };

  if (isDevelopment) {
    errorResponse.error.stack = err.stack;
    errorResponse.error.details = err.details;
  }

  // Add validation details for client errors
  if (statusCode < 500 && err.details) {
    errorResponse.error.details = err.details;
  }

  res.status(statusCode).json(errorResponse);
};

// Async wrapper to handle promise rejections
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) => {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};

// 404 handler
export const notFoundHandler = (req: Request, _res: Response, next: NextFunction): void => {
  next(new NotFoundError(`Route ${req.originalUrl}`));
};

const errorCode = (error: unknown): string | undefined => {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
};

const isDatabaseError = (error: unknown): boolean => {
  const code = errorCode(error);
  return code !== undefined &&
    (code.startsWith('SQLITE_') || /^[0-9A-Z]{5}$/.test(code) || code === 'ECONNREFUSED' || code === 'ENOTFOUND');
};

// Database error handler
export const handleDatabaseError = (error: unknown): AppError => {
  const code = errorCode(error);

  // SQLite constraint errors
  if (code === 'SQLITE_CONSTRAINT_UNIQUE' || code === '23505') {
    return new ConflictError('Resource already exists');
  }

  if (code === 'SQLITE_CONSTRAINT_FOREIGNKEY' || code === '23503') {
    return new ValidationError('Referenced resource does not exist');
  }

  if (code === 'SQLITE_CONSTRAINT_NOTNULL' || code === '23502') {
    return new ValidationError('Required field is missing');
  }

  // Connection errors
  if (code === 'ECONNREFUSED' || code === 'ENOTFOUND') {
    return new ExternalServiceError('Database', 'Database connection failed');
  }

  return new CustomError('Database operation failed', 500, 'DATABASE_ERROR');
};

interface ValidationIssue {
  msg?: unknown;
  path?: string;
  param?: string;
}

// Validation error formatter
export const formatValidationErrors = (errors: ValidationIssue[]): Record<string, string[]> => {
  return errors.reduce<Record<string, string[]>>((acc, error) => {
    const field = error.path || error.param || 'unknown';
    if (!acc[field]) {
      acc[field] = [];
    }
    acc[field].push(String(error.msg));
    return acc;
  }, {});
};
