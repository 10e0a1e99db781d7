import { Router, type Router as RouterType } from 'express';
import { describeError } from '../errors.js';
import type { JobTracker } from '../services/job-tracker.js';

export function createHistoryRouter(tracker: JobTracker): RouterType {
  const router: RouterType = Router();

  router.get('/', (_req, res) => {
    res.json(tracker.history());
  });

  router.delete('/:jobId', async (req, res) => {
    const { jobId } = req.params;
    try {
      const deleted = await tracker.forget(jobId);
      res.json({ deleted });
    } catch (err) {
      console.error(`Failed to delete job ${jobId}:`, describeError(err));
      res.status(500).json({ error: describeError(err) });
    }
  });

  return router;
}
