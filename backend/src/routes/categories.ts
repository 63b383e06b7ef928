import { Router, type Router as RouterType } from 'express';
import { asyncHandler } from '../middleware/errorHandler.js';
import { getLedgerSession } from '../middleware/ledger.js';
import * as ledger from '../services/ledger.js';

export default function categoryRoutes(): RouterType {
  const router: RouterType = Router();

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      res.json({ categories: await ledger.listCategories(getLedgerSession(req)) });
    })
  );

  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const categories = await ledger.addCategory(getLedgerSession(req), req.body?.name);
      res.status(201).json({ categories });
    })
  );

  // DELETE /api/categories/:name - Also clears the category from every month
  router.delete(
    '/:name',
    asyncHandler(async (req, res) => {
      const categories = await ledger.removeCategory(getLedgerSession(req), req.params.name);
      res.json({ categories });
    })
  );

  return router;
}
