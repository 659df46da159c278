import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { DatabaseError } from 'pg';
import { ZodError } from 'zod';
import { appConfig } from '../connections/config/app.config';
import { AppError } from '../utils/errors';
import { logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';

const UNIQUE_VIOLATION = '23505';
const FOREIGN_KEY_VIOLATION = '23503';
const CHECK_VIOLATION = '23514';

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  // Express only treats four-argument middleware as an error handler
  _next: NextFunction
) => {
  if (err instanceof AppError) {
    return ResponseHandler.error(res, err.message, err.statusCode, {
      code: err.code,
      details: err.details,
    });
  }

  if (err instanceof ZodError) {
    return ResponseHandler.validationError(res, err.errors);
  }

  // JWT errors
  if (err instanceof jwt.TokenExpiredError) {
    return ResponseHandler.unauthorized(res, 'Token has expired');
  }

  if (err instanceof jwt.JsonWebTokenError) {
    return ResponseHandler.unauthorized(res, 'Invalid token');
  }

  // Database errors
  if (err instanceof DatabaseError) {
    if (err.code === UNIQUE_VIOLATION) {
      return ResponseHandler.conflict(res, 'Resource already exists', { constraint: err.constraint });
    }

    if (err.code === FOREIGN_KEY_VIOLATION) {
      return ResponseHandler.error(res, 'Referenced resource is missing or still in use', 400, {
        code: 'FOREIGN_KEY_VIOLATION',
        details: { constraint: err.constraint },
      });
    }

    if (err.code === CHECK_VIOLATION) {
      return ResponseHandler.error(res, 'Value violates a data constraint', 400, {
        code: 'CHECK_VIOLATION',
        details: { constraint: err.constraint },
      });
    }
  }

  const error = err instanceof Error ? err : new Error(String(err));
  logger.error('[Error Handler]', {
    message: error.message,
    stack: error.stack,
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
  });

  return ResponseHandler.error(res, 'Internal server error', 500, {
    code: 'INTERNAL_ERROR',
    details: appConfig.nodeEnv === 'development' ? error.stack : undefined,
  });
};

export const notFoundHandler = (req: Request, res: Response) => {
  logger.warn('[Not Found]', {
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
  });

  ResponseHandler.notFound(res, 'Route not found');
};
