import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AppError } from '../errors/appErrors';
import type { ErrorBody } from '../types/api.types';
import { logger } from '../utils/logger';
import { metrics } from '../utils/metrics';

interface BodyParserError extends Error {
  type: string;
  status?: number;
}

function isBodyParserError(error: unknown): error is BodyParserError {
  return error instanceof Error && 'type' in error && typeof error.type === 'string';
}

export const createErrorHandler = (options: { verbose: boolean }) => {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    let status: number;
    let body: ErrorBody;

    if (err instanceof ZodError) {
      status = 400;
      body = {
        error: 'Validation Error',
        message: 'Invalid request data',
        details: err.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      };
    } else if (err instanceof AppError) {
      status = err.statusCode;
      body = { error: err.title, message: err.message };
      if (err.details !== undefined) {
        body.details = err.details;
      }
    } else if (isBodyParserError(err) && err.type === 'entity.parse.failed') {
      status = 400;
      body = { error: 'Validation Error', message: 'Malformed JSON body' };
    } else if (isBodyParserError(err) && err.type === 'entity.too.large') {
      status = 413;
      body = { error: 'Payload Too Large', message: 'Request body is too large' };
    } else {
      status = 500;
      body = {
        error: 'Internal Server Error',
        message: options.verbose && err instanceof Error
          ? err.message
          : 'An unexpected error occurred. Please try again later.',
      };
    }

    const context = {
      method: req.method,
      path: req.path,
      status,
      error: err instanceof Error ? err.message : String(err),
    };
    if (status >= 500) {
      logger.error('Request failed', { ...context, stack: err instanceof Error ? err.stack : undefined });
    } else {
      logger.warn('Request rejected', context);
    }

    metrics.recordError(err instanceof Error ? err.name : 'UnknownError');
    res.status(status).json(body);
  };
};

export const notFoundHandler = (req: Request, res: Response) => {
  const body: ErrorBody = { error: 'Not Found', message: `No route for ${req.method} ${req.path}` };
  res.status(404).json(body);
};
