import { Request, Response, NextFunction, RequestHandler } from 'express';
import { AuthError } from '../errors/appErrors';
import type { AuthUser, TokenVerifier } from '../services/auth.service';

export interface AuthRequest extends Request {
  user?: AuthUser;
}

export const createAuthMiddleware = (verifier: TokenVerifier): RequestHandler => {
  return async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const authHeader = req.headers.authorization;

      if (!authHeader || !authHeader.startsWith('Bearer ')) {
        throw new AuthError('No authorization token provided');
      }

      const token = authHeader.substring(7).trim();
      if (!token) {
        throw new AuthError('No authorization token provided');
      }

      req.user = await verifier.verifyToken(token);
      next();
    } catch (error) {
      next(error);
    }
  };
};

/** The authenticated user; only valid behind `createAuthMiddleware`. */
export function requireUser(req: AuthRequest): AuthUser {
  if (!req.user) {
    throw new AuthError();
  }
  return req.user;
}
