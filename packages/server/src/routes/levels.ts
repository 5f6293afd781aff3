import { Router } from 'express';
import type { LevelStore } from '../levels/level-store.js';

const STAGE_PATTERN = /^\d+$/;

// GET /level/:stageNumber → {success, data} | {success: false, error}
export function createLevelRouter(store: LevelStore, maxStage: number): Router {
  const router = Router();

  router.get('/level/:stageNumber', (req, res) => {
    const raw = req.params.stageNumber;
    if (!STAGE_PATTERN.test(raw)) {
      res.status(400).json({ success: false, error: 'Invalid stage_number format' });
      return;
    }

    const stageNumber = parseInt(raw, 10);
    if (stageNumber < 1 || stageNumber > maxStage) {
      res.status(400).json({ success: false, error: `Stage number must be between 1 and ${maxStage}` });
      return;
    }

    const record = store.get(stageNumber);
    if (!record) {
      console.warn(`[Levels] Stage ${stageNumber} not found`);
      res.status(404).json({ success: false, error: `Stage ${stageNumber} not found` });
      return;
    }

    res.json({ success: true, data: record });
  });

  return router;
}
