import { Router, type Router as RouterType } from 'express';
import type { JobTracker } from '../services/job-tracker.js';
import type { GenerationStatus } from '../types.js';

function isTerminal(status: GenerationStatus): boolean {
  return status.state === 'completed' || status.state === 'failed';
}

export function createStatusRouter(tracker: JobTracker): RouterType {
  const router: RouterType = Router();

  router.get('/:jobId', (req, res) => {
    const status = tracker.getStatus(req.params.jobId);
    if (!status) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }
    res.json(status);
  });

  router.get('/:jobId/events', (req, res) => {
    const { jobId } = req.params;
    if (!tracker.getStatus(jobId)) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }

    // Set up SSE
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.flushHeaders();

    let eventId = 0;
    let closed = false;
    const send = (status: GenerationStatus) => {
      if (closed) return;
      res.write(`id: ${eventId++}\n`);
      res.write(`data: ${JSON.stringify(status)}\n\n`);
      if (isTerminal(status)) {
        closed = true;
        res.end();
      }
    };

    // The current snapshot arrives during subscribe, so a finished job closes right away.
    const unsubscribe = tracker.subscribe(jobId, send);
    if (closed) unsubscribe?.();

    // Clean up on client disconnect
    req.on('close', () => {
      closed = true;
      unsubscribe?.();
    });
  });

  return router;
}
