import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { AppConfig } from '../config/env.js';
import { verifyToken, getUser } from '../services/auth.js';
import type { PublicUser } from '../types.js';
import { AppError } from './errorHandler.js';

// Extend Express Request to include user
declare global {
  namespace Express {
    interface Request {
      user?: PublicUser;
    }
  }
}

export function readBearerToken(req: Request): string | null {
  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    return null;
  }
  return authHeader.substring(7);
}

/**
 * Authentication middleware - requires a valid JWT in multi-user mode and
 * attaches the user to the request. Single-user deployments pass through.
 */
export function requireAuth(config: AppConfig): RequestHandler {
  return async (req: Request, _res: Response, next: NextFunction) => {
    if (config.mode === 'single') {
      next();
      return;
    }

    try {
      const token = readBearerToken(req);
      if (!token) {
        throw new AppError(401, 'Authentication required', { code: 'AUTH_REQUIRED' });
      }

      const { username } = verifyToken(token);
      const user = await getUser(config, username);
      if (!user) {
        throw new AppError(401, 'User not found', { code: 'USER_NOT_FOUND' });
      }

      req.user = user;
      next();
    } catch (error) {
      next(error);
    }
  };
}

export function getAuthUser(req: Request): PublicUser {
  if (!req.user) {
    throw new AppError(401, 'Authentication required', { code: 'AUTH_REQUIRED' });
  }
  return req.user;
}
