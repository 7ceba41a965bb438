/**
 * Centralized error types and HTTP error handling middleware
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ZodError } from 'zod';
import logger from '../utils/logger';

// Base error classes
export class AppError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code?: string,
    public isOperational = true,
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    public details?: unknown,
  ) {
    super(400, message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string = 'Unauthorized') {
    super(401, message, 'UNAUTHORIZED');
    this.name = 'AuthenticationError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(404, `${resource} not found`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class DatabaseError extends AppError {
  constructor(message: string, originalError?: Error) {
    super(500, message, 'DATABASE_ERROR');
    this.name = 'DatabaseError';
    if (originalError) {
      this.stack = originalError.stack;
    }
  }
}

/**
 * Missing or malformed startup configuration. Fatal.
 */
export class ConfigurationError extends AppError {
  constructor(
    message: string,
    public readonly keys: string[] = [],
  ) {
    super(500, message, 'CONFIGURATION_ERROR', false);
    this.name = 'ConfigurationError';
  }
}

/**
 * Extracts a loggable message from anything thrown
 */
export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

// Request logging middleware
export const requestLogger = (
  req: Request,
  res: Response,
  next: NextFunction,
) => {
  const start = Date.now();

  res.on('finish', () => {
    logger.debug('Request handled', {
      method: req.method,
      url: req.originalUrl,
      statusCode: res.statusCode,
      duration: `${Date.now() - start}ms`,
    });
  });

  next();
};

const handleValidationError = (error: ZodError): AppError => {
  const messages = error.errors.map((err) => {
    const path = err.path.join('.');
    return `${path}: ${err.message}`;
  });

  return new ValidationError(
    `Validation failed: ${messages.join(', ')}`,
    error.errors,
  );
};

// Main error handling middleware
export const errorHandler = (
  error: Error,
  req: Request,
  res: Response,
  // Express recognizes error handlers by arity
  next: NextFunction,
) => {
  let appError: AppError;

  if (error instanceof AppError) {
    appError = error;
  } else if (error instanceof ZodError) {
    appError = handleValidationError(error);
  } else {
    // Unknown error - don't leak details in production
    appError = new AppError(
      500,
      process.env.NODE_ENV === 'production'
        ? 'Something went wrong'
        : error.message,
      'INTERNAL_ERROR',
      false,
    );
  }

  const logData = {
    error: {
      name: appError.name,
      message: appError.message,
      code: appError.code,
      statusCode: appError.statusCode,
      stack: appError.stack,
    },
    request: {
      method: req.method,
      url: req.url,
    },
  };

  if (appError.statusCode >= 500) {
    logger.error('Server error', logData);
  } else {
    logger.warn('Client error', logData);
  }

  res.status(appError.statusCode).json({
    error: {
      message: appError.message,
      code: appError.code || 'UNKNOWN_ERROR',
    },
  });
};

// Async error wrapper for route handlers
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>,
): RequestHandler => {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
};

// 404 handler for unmatched routes
export const notFoundHandler = (
  req: Request,
  res: Response,
  next: NextFunction,
) => {
  next(new NotFoundError(`Route ${req.method} ${req.path}`));
};
