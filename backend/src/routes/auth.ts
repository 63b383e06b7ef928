import { Router, type Router as RouterType } from 'express';
import type { AppConfig } from '../config/env.js';
import logger from '../logger.js';
import { getAuthUser, requireAuth } from '../middleware/auth.js';
import { AppError, asyncHandler } from '../middleware/errorHandler.js';
import { changePassword, login, signup } from '../services/auth.js';

function requireString(value: unknown, message: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new AppError(400, message);
  }
  return value;
}

export default function authRoutes(config: AppConfig): RouterType {
  const router: RouterType = Router();

  // Mode (no auth required) - lets a client decide whether to show the login screen
  router.get('/mode', (_req, res) => {
    res.json({ mode: config.mode });
  });

  router.use((_req, _res, next) => {
    if (config.mode === 'single') {
      next(new AppError(404, 'Accounts are disabled in single-user mode', { code: 'MULTI_USER_DISABLED' }));
      return;
    }
    next();
  });

  // Sign up
  router.post(
    '/signup',
    asyncHandler(async (req, res) => {
      const username = requireString(req.body?.username, 'Username and password are required');
      const password = requireString(req.body?.password, 'Username and password are required');
      const email: unknown = req.body?.email;

      const result = await signup(config, username, password, typeof email === 'string' ? email : null);
      res.status(201).json(result);
    })
  );

  // Login
  router.post(
    '/login',
    asyncHandler(async (req, res) => {
      const username = requireString(req.body?.username, 'Username and password are required');
      const password = requireString(req.body?.password, 'Username and password are required');

      const result = await login(config, username, password);
      logger.info({ username: result.user.username }, 'User logged in');
      res.json(result);
    })
  );

  // Current user
  router.get(
    '/me',
    requireAuth(config),
    asyncHandler(async (req, res) => {
      res.json({ user: getAuthUser(req) });
    })
  );

  // Change password
  router.post(
    '/change-password',
    requireAuth(config),
    asyncHandler(async (req, res) => {
      const user = getAuthUser(req);
      const currentPassword = requireString(req.body?.currentPassword, 'Current password and new password are required');
      const newPassword = requireString(req.body?.newPassword, 'Current password and new password are required');

      await changePassword(config, user.username, currentPassword, newPassword);
      res.json({ success: true });
    })
  );

  return router;
}
