import { Router, type Router as RouterType } from 'express';
import multer from 'multer';
import { AppError, asyncHandler } from '../middleware/errorHandler.js';
import { getLedgerSession } from '../middleware/ledger.js';
import * as ledger from '../services/ledger.js';

const router: RouterType = Router();

// Configure multer for memory storage
const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: 1024 * 1024, // 1MB limit
  },
  fileFilter: (_req, file, cb) => {
    if (file.mimetype === 'application/json' || file.originalname.toLowerCase().endsWith('.json')) {
      cb(null, true);
    } else {
      cb(new AppError(400, 'Only JSON files are allowed', { code: 'INVALID_FILE_TYPE' }));
    }
  },
});

function exportFileName(username: string | null, now: Date): string {
  const stamp = now.toISOString().slice(0, 10).replace(/-/g, '');
  return username === null ? `budget_data_${stamp}.json` : `budget_data_${username}_${stamp}.json`;
}

// GET /api/backup/export - The stored document, byte for byte
router.get(
  '/export',
  asyncHandler(async (req, res) => {
    const session = getLedgerSession(req);
    const content = await ledger.exportDocument(session);

    res.attachment(exportFileName(session.username, new Date()));
    res.type('application/json').send(content);
  })
);

// POST /api/backup/import - Replace the whole document with an uploaded one
router.post(
  '/import',
  upload.single('file'),
  asyncHandler(async (req, res) => {
    if (!req.file) {
      throw new AppError(400, 'No file uploaded');
    }

    let payload: unknown;
    try {
      payload = JSON.parse(req.file.buffer.toString('utf8'));
    } catch {
      throw new AppError(400, 'Uploaded file is not valid JSON', { code: 'INVALID_JSON' });
    }

    const result = await ledger.importDocument(getLedgerSession(req), payload);
    res.status(201).json(result);
  })
);

export default router;
