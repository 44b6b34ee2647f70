import { RequestHandler } from 'express';
import rateLimit from 'express-rate-limit';
import type { ErrorBody } from '../types/api.types';

export interface RateLimiters {
  general: RequestHandler;
  auth: RequestHandler;
  api: RequestHandler;
}

const limited = (message: string): ErrorBody => ({ error: 'Too Many Requests', message });

const passThrough: RequestHandler = (req, res, next) => next();

export const createRateLimiters = (enabled: boolean): RateLimiters => {
  if (!enabled) {
    return { general: passThrough, auth: passThrough, api: passThrough };
  }

  return {
    general: rateLimit({
      windowMs: 15 * 60 * 1000,
      limit: 300,
      message: limited('Too many requests from this IP, please try again later.'),
      standardHeaders: true,
      legacyHeaders: false,
    }),
    auth: rateLimit({
      windowMs: 15 * 60 * 1000,
      limit: 10,
      message: limited('Too many authentication attempts, please try again later.'),
      skipSuccessfulRequests: true,
    }),
    api: rateLimit({
      windowMs: 1 * 60 * 1000,
      limit: 60,
      message: limited('Too many API requests, please slow down.'),
    }),
  };
};
