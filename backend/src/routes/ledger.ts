import { Router, type Router as RouterType } from 'express';
import { asyncHandler } from '../middleware/errorHandler.js';
import { getLedgerSession } from '../middleware/ledger.js';
import { categoryBreakdown, monthMetrics } from '../services/insights.js';
import * as ledger from '../services/ledger.js';

export default function ledgerRoutes(): RouterType {
  const router: RouterType = Router();

  // GET /api/ledger - Whole document (categories + months)
  router.get(
    '/',
    asyncHandler(async (req, res) => {
      res.json(await ledger.load(getLedgerSession(req)));
    })
  );

  // GET /api/ledger/months - Month picker entries, newest first
  router.get(
    '/months',
    asyncHandler(async (req, res) => {
      const months = await ledger.listMonths(getLedgerSession(req));
      res.json({ months });
    })
  );

  // GET /api/ledger/months/:month - Stored record, or an unsaved default one
  router.get(
    '/months/:month',
    asyncHandler(async (req, res) => {
      res.json(await ledger.getMonth(getLedgerSession(req), req.params.month));
    })
  );

  // PUT /api/ledger/months/:month - Replace the month's record
  router.put(
    '/months/:month',
    asyncHandler(async (req, res) => {
      const record = await ledger.saveMonth(getLedgerSession(req), req.params.month, req.body);
      res.json({ month: req.params.month, record });
    })
  );

  // POST /api/ledger/months/:month/expenses - Quick add or one-time expense
  router.post(
    '/months/:month/expenses',
    asyncHandler(async (req, res) => {
      const { category, amount } = req.body ?? {};
      const record = await ledger.addExpense(getLedgerSession(req), req.params.month, category, amount);
      res.status(201).json({ month: req.params.month, record });
    })
  );

  // GET /api/ledger/months/:month/summary - Metrics and category breakdown
  router.get(
    '/months/:month/summary',
    asyncHandler(async (req, res) => {
      const view = await ledger.getMonth(getLedgerSession(req), req.params.month);
      res.json({
        month: view.month,
        exists: view.exists,
        metrics: monthMetrics(view.month, view.record),
        breakdown: categoryBreakdown(view.record),
      });
    })
  );

  return router;
}
