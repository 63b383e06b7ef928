import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { AppConfig } from '../config/env.js';
import { sessionFor } from '../services/auth.js';
import type { LedgerSession } from '../types.js';
import { AppError } from './errorHandler.js';

// Extend Express Request to include the ledger session
declare global {
  namespace Express {
    interface Request {
      ledger?: LedgerSession;
    }
  }
}

/**
 * Ledger context middleware - use after requireAuth.
 * Picks the document this request works on: the authenticated user's file,
 * or the shared file in single-user mode.
 */
export function requireLedger(config: AppConfig): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (config.mode === 'single') {
      req.ledger = sessionFor(config, null);
      next();
      return;
    }

    if (!req.user) {
      next(new AppError(401, 'Authentication required', { code: 'AUTH_REQUIRED' }));
      return;
    }

    req.ledger = sessionFor(config, req.user.username);
    next();
  };
}

export function getLedgerSession(req: Request): LedgerSession {
  if (!req.ledger) {
    throw new AppError(500, 'Ledger context missing', { code: 'LEDGER_CONTEXT_MISSING', isOperational: false });
  }
  return req.ledger;
}
