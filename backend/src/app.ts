import cors from 'cors';
import express, { type Express } from 'express';
import type { AppConfig } from './config/env.js';
import { requireAuth } from './middleware/auth.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { requireLedger } from './middleware/ledger.js';
import authRoutes from './routes/auth.js';
import backupRoutes from './routes/backup.js';
import categoryRoutes from './routes/categories.js';
import insightRoutes from './routes/insights.js';
import ledgerRoutes from './routes/ledger.js';

export function createApp(config: AppConfig): Express {
  const app = express();

  // CORS configuration
  const corsOptions = {
    origin: config.corsOrigin,
    credentials: true,
  };

  // Middleware
  app.use(cors(corsOptions));
  app.use(express.json({ limit: '1mb' }));

  // Public routes (no auth required)
  app.use('/api/auth', authRoutes(config));

  // Ledger routes (auth required in multi-user mode)
  const auth = requireAuth(config);
  const ledger = requireLedger(config);
  app.use('/api/ledger', auth, ledger, ledgerRoutes());
  app.use('/api/categories', auth, ledger, categoryRoutes());
  app.use('/api/insights', auth, ledger, insightRoutes(config));
  app.use('/api/backup', auth, ledger, backupRoutes);

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', mode: config.mode, timestamp: new Date().toISOString() });
  });

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
