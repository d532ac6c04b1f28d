import type { Request, Response, NextFunction } from 'express';
import { appConfig } from '../connections/config/app.config';
import { logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';

export interface HttpError extends Error {
  status?: number;
  statusCode?: number;
  code?: string;
}

export const errorHandler = (
  err: HttpError,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  logger.error('[Error Handler]', {
    message: err.message,
    stack: err.stack,
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
    userAgent: req.get('user-agent'),
  });

  const statusCode = err.status || err.statusCode || 500;

  if (statusCode >= 500) {
    return ResponseHandler.internalError(res);
  }

  return ResponseHandler.error(res, err.message || 'Request failed', statusCode, {
    code: err.code || 'REQUEST_ERROR',
    details: appConfig.nodeEnv === 'development' ? err.stack : undefined,
  });
};

export const notFoundHandler = (
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  logger.warn('[Not Found]', {
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
  });

  ResponseHandler.notFound(res, 'Route not found');
};
