import { Router, Request, Response, NextFunction } from 'express';
import { CriticalEventsError, parseEventFilter } from '@critical-events/parser';
import { getConfig } from '../config.js';
import { httpStatusFor, loadEventReport } from '../services/event-report.js';
import { eventLogStore } from '../store.js';

const router = Router();

/**
 * GET /api/events/:id
 * Decode an uploaded log and render its events.
 * Query params:
 *   ?types=anr,java_crash (optional kind filter)
 */
router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
  const id = String(req.params.id);
  const types = req.query.types ? parseEventFilter(String(req.query.types)) : [];

  try {
    const report = await loadEventReport(id, types, {
      uploadDir: getConfig().uploadDir,
      store: eventLogStore,
    });
    res.json(report);
  } catch (err) {
    if (err instanceof CriticalEventsError) {
      console.error(`[critical-events] ${id}: ${err.message}`);
      res.status(httpStatusFor(err)).json({ error: err.message, code: err.code });
      return;
    }
    next(err);
  }
});

export default router;
