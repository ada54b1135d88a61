import type { NextFunction, Request, Response } from 'express';
import { ErrorBody, SidecarError, toErrorBody } from '../errors/SidecarError.js';
import { logger, errorMessage } from '../utils/logger.js';

export interface ErrorResponse {
  statusCode: number;
  body: ErrorBody;
}

function httpStatusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/**
 * Map anything thrown by a route to a status code and JSON body
 */
export function resolveErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof SidecarError) {
    return { statusCode: error.statusCode, body: toErrorBody(error) };
  }

  // body-parser and other http-errors carry their own 4xx status
  const status = httpStatusOf(error);
  if (status !== undefined && status >= 400 && status < 500) {
    return {
      statusCode: status,
      body: { error: { code: 'bad_request', message: errorMessage(error) } }
    };
  }

  return {
    statusCode: 500,
    body: { error: { code: 'internal_error', message: 'Internal server error' } }
  };
}

export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  const { statusCode, body } = resolveErrorResponse(error);
  if (statusCode >= 500) {
    logger.error(`${req.method} ${req.originalUrl} failed: ${errorMessage(error)}`, {
      stack: error instanceof Error ? error.stack : undefined
    });
  } else {
    logger.debug(`${req.method} ${req.originalUrl} -> ${statusCode} ${body.error.code}`);
  }
  res.status(statusCode).json(body);
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: { code: 'route_not_found', message: `No route for ${req.method} ${req.path}` }
  });
}
