import { Router, type Router as RouterType } from 'express';
import type { AppConfig } from '../config/env.js';
import { AppError, asyncHandler } from '../middleware/errorHandler.js';
import { getLedgerSession } from '../middleware/ledger.js';
import { buildInsightReport, monthlyComparison, trendSeries } from '../services/insights.js';
import * as ledger from '../services/ledger.js';
import type { TrendMetric } from '../types.js';

const TREND_METRICS: readonly TrendMetric[] = ['savings', 'expenses', 'debt'];

function isTrendMetric(value: string): value is TrendMetric {
  return TREND_METRICS.some((metric) => metric === value);
}

export default function insightRoutes(config: AppConfig): RouterType {
  const router: RouterType = Router();

  // GET /api/insights?month=YYYY-MM - Metrics, trends and advice (latest month by default)
  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const rawMonth = req.query.month;
      if (rawMonth !== undefined && typeof rawMonth !== 'string') {
        throw new AppError(400, 'month must be a single YYYY-MM value', { code: 'INVALID_MONTH' });
      }
      const month = rawMonth === undefined ? null : ledger.assertMonthKey(rawMonth);

      const document = await ledger.load(getLedgerSession(req));
      if (month !== null && !(month in document.months)) {
        throw new AppError(404, 'No data for this month', { code: 'MONTH_NOT_FOUND', params: { month } });
      }

      res.json(buildInsightReport(document.months, month, config.thresholds));
    })
  );

  // GET /api/insights/trends/:metric - Chart series
  router.get(
    '/trends/:metric',
    asyncHandler(async (req, res) => {
      const { metric } = req.params;
      if (!isTrendMetric(metric)) {
        throw new AppError(400, `Unknown metric. Supported: ${TREND_METRICS.join(', ')}`, {
          code: 'INVALID_METRIC',
        });
      }
      const document = await ledger.load(getLedgerSession(req));
      res.json({ metric, series: trendSeries(document.months, metric) });
    })
  );

  // GET /api/insights/comparison - Month-by-month table, newest first
  router.get(
    '/comparison',
    asyncHandler(async (req, res) => {
      const document = await ledger.load(getLedgerSession(req));
      res.json({ rows: monthlyComparison(document.months) });
    })
  );

  return router;
}
