import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { ZodError } from 'zod';
import type { Logger } from './logger';

// HTTP status codes
export const HTTP_STATUS = {
  OK: 200,
  CREATED: 201,
  BAD_REQUEST: 400,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_SERVER_ERROR: 500,
  BAD_GATEWAY: 502,
  SERVICE_UNAVAILABLE: 503,
  GATEWAY_TIMEOUT: 504,
} as const;

export type ErrorContext = Record<string, unknown>;

// Base application error class
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code: string;
  public readonly context?: ErrorContext;

  constructor(
    message: string,
    statusCode: number = HTTP_STATUS.INTERNAL_SERVER_ERROR,
    isOperational: boolean = true,
    code: string = 'INTERNAL_SERVER_ERROR',
    context?: ErrorContext,
    options?: { cause?: unknown }
  ) {
    super(message, options);

    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.code = code;
    this.context = context;

    // Maintain proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      statusCode: this.statusCode,
      code: this.code,
      ...(this.context && { context: this.context }),
    };
  }
}

export class ValidationError extends AppError {
  constructor(message: string = 'Validation failed', context?: ErrorContext) {
    super(message, HTTP_STATUS.BAD_REQUEST, true, 'VALIDATION_ERROR', context);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string = 'Resource', context?: ErrorContext) {
    super(`${resource} not found`, HTTP_STATUS.NOT_FOUND, true, 'NOT_FOUND_ERROR', context);
  }
}

/**
 * Upstream quota exhausted. No backoff is attempted; the caller has to retry
 * later.
 */
export class RateLimitedError extends AppError {
  constructor(message: string = 'Upstream rate limit exceeded', context?: ErrorContext) {
    super(message, HTTP_STATUS.FORBIDDEN, true, 'RATE_LIMITED', context);
  }
}

export class UpstreamError extends AppError {
  constructor(service: string, message?: string, context?: ErrorContext, options?: { cause?: unknown }) {
    super(
      message || `Upstream service error: ${service}`,
      HTTP_STATUS.BAD_GATEWAY,
      true,
      'UPSTREAM_ERROR',
      { service, ...context },
      options
    );
  }
}

export class UpstreamTimeoutError extends AppError {
  constructor(service: string, timeoutMs: number, context?: ErrorContext) {
    super(
      `Upstream service timed out after ${timeoutMs}ms: ${service}`,
      HTTP_STATUS.GATEWAY_TIMEOUT,
      true,
      'UPSTREAM_TIMEOUT',
      { service, timeoutMs, ...context }
    );
  }
}

// Absorbed by the narrative generator; never reaches an HTTP response
export class MalformedAIResponseError extends AppError {
  constructor(message: string = 'Malformed completion response', context?: ErrorContext, options?: { cause?: unknown }) {
    super(message, HTTP_STATUS.BAD_GATEWAY, true, 'MALFORMED_AI_RESPONSE', context, options);
  }
}

export class PersistenceError extends AppError {
  constructor(message: string = 'Database operation failed', context?: ErrorContext, options?: { cause?: unknown }) {
    super(message, HTTP_STATUS.INTERNAL_SERVER_ERROR, true, 'PERSISTENCE_ERROR', context, options);
  }
}

export class ConfigError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, HTTP_STATUS.INTERNAL_SERVER_ERROR, false, 'CONFIG_ERROR', context);
  }
}

// Error response interface
export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
    requestId?: string;
  };
  timestamp: string;
}

// Format error response
export const formatErrorResponse = (
  error: AppError,
  options: { requestId?: string; exposeDetails: boolean }
): ErrorResponse => {
  const details = options.exposeDetails ? error.context : undefined;

  return {
    success: false,
    error: {
      code: error.code,
      message: error.message,
      ...(details && { details }),
      ...(options.requestId && { requestId: options.requestId }),
    },
    timestamp: new Date().toISOString(),
  };
};

// Convert various error types to AppError
export const normalizeError = (error: unknown): AppError => {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof ZodError) {
    return new ValidationError('Validation failed', {
      errors: error.errors.map(err => ({
        field: err.path.join('.'),
        message: err.message,
        code: err.code,
      })),
    });
  }

  // body-parser reports malformed JSON with a 400 status
  if (error instanceof SyntaxError && 'status' in error && error.status === HTTP_STATUS.BAD_REQUEST) {
    return new ValidationError('Malformed JSON body');
  }

  if (error instanceof Error) {
    return new AppError(
      'An unexpected error occurred',
      HTTP_STATUS.INTERNAL_SERVER_ERROR,
      false,
      'UNKNOWN_ERROR',
      { originalError: error.message },
      { cause: error }
    );
  }

  // Handle non-Error objects
  return new AppError(
    'An unexpected error occurred',
    HTTP_STATUS.INTERNAL_SERVER_ERROR,
    false,
    'UNKNOWN_ERROR',
    { originalError: String(error) }
  );
};

// Global error handler middleware
export const createErrorHandler = (logger: Logger, options: { exposeDetails: boolean }) => {
  return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
    const normalizedError = normalizeError(error);
    const requestId = req.get('x-request-id');

    const logContext = {
      err: normalizedError,
      requestId,
      url: req.url,
      method: req.method,
      statusCode: normalizedError.statusCode,
    };
    if (normalizedError.statusCode >= HTTP_STATUS.INTERNAL_SERVER_ERROR) {
      logger.error(logContext, 'Request failed');
    } else {
      logger.warn(logContext, 'Request rejected');
    }

    // Don't send error response if headers already sent
    if (res.headersSent) {
      next(error);
      return;
    }

    res
      .status(normalizedError.statusCode)
      .json(formatErrorResponse(normalizedError, { requestId, exposeDetails: options.exposeDetails }));
  };
};

// Async error wrapper for route handlers
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler => {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};

// Not found handler
export const notFoundHandler = (req: Request, _res: Response, next: NextFunction): void => {
  next(new NotFoundError('Endpoint', { method: req.method, path: req.path }));
};

// Process error handlers
export const setupProcessErrorHandlers = (logger: Logger): void => {
  process.on('uncaughtException', (error: Error) => {
    logger.fatal({ err: error }, 'Uncaught exception');
    process.exit(1);
  });
  process.on('unhandledRejection', (reason: unknown) => {
    logger.fatal({ err: reason }, 'Unhandled promise rejection');
    process.exit(1);
  });
};

/**
 * True when the error (or anything in its cause chain) is an abort raised by
 * an `AbortSignal.timeout` deadline.
 */
export const isTimeoutError = (error: unknown): boolean => {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    if (current.name === 'TimeoutError' || current.name === 'AbortError') {
      return true;
    }
    current = current.cause;
  }
  return false;
};
