import { Router, type Router as RouterType } from 'express';
import type { VoiceOption } from '../services/elevenlabs.js';

export interface VoiceCatalog {
  listVoices(): Promise<VoiceOption[]>;
}

export function createVoicesRouter(catalog: VoiceCatalog): RouterType {
  const router: RouterType = Router();

  router.get('/', async (_req, res) => {
    res.json(await catalog.listVoices());
  });

  return router;
}
