/**
 * Data Routes — Snapshot saving, CSV grade import and report exports
 *
 * Every route needs a teacher session. Imports arrive as a multipart upload
 * in the `file` field and are parsed in memory; exports are written into the
 * DataStore's data directory. Mounted at /api/data.
 */
import { Router, type Response } from 'express';
import multer from 'multer';
import type { AppContext } from '../context.js';
import { requireRole } from '../middleware/auth.js';
import type { OperationResult } from '../models/errors.js';

const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: 5 * 1024 * 1024 } // 5MB limit
});

export function createDataRoutes({ gradebook, dataStore, auth }: AppContext): Router {
  const router = Router();
  router.use(requireRole(auth, 'teacher'));

  const sendResult = (res: Response, result: OperationResult) => {
    res.status(result.success ? 200 : 500).json(result);
  };

  router.post('/save', (req, res) => {
    console.log('[DATA] POST /save');
    sendResult(res, dataStore.saveGradebook(gradebook));
  });

  router.post('/import/grades', upload.single('file'), (req, res) => {
    console.log('[DATA] POST /import/grades');
    if (!req.file) {
      return res.status(400).json({ error: 'No file uploaded' });
    }
    const result = dataStore.importGradesFromCsvText(gradebook, req.file.buffer.toString('utf-8'));
    res.json(result);
  });

  router.post('/export/report', (req, res) => {
    console.log('[DATA] POST /export/report');
    sendResult(res, dataStore.exportGradesReport(gradebook));
  });

  router.post('/export/grades', (req, res) => {
    console.log('[DATA] POST /export/grades');
    sendResult(res, dataStore.exportGradesToCsv(gradebook));
  });

  router.post('/export/roster/:code', (req, res) => {
    console.log(`[DATA] POST /export/roster/${req.params.code}`);
    const result = dataStore.exportClassRoster(gradebook, req.params.code);
    if (!result.success && gradebook.getClassRoster(req.params.code).length === 0) {
      return res.status(404).json(result);
    }
    sendResult(res, result);
  });

  return router;
}
