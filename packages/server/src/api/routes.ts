// ============================================================================
// Radar API Routes
// ============================================================================

import { Router } from 'express';
import type { RadarEngine } from '../radar/engine.js';
import type { ScanCoordinator } from '../scanner/coordinator.js';
import type { RealDataCollector } from '../collector/service.js';
import { CommandError, parseCommand } from './commands.js';

export interface RadarRouterDeps {
  engine: RadarEngine;
  coordinator: ScanCoordinator;
  collector: RealDataCollector;
}

export function createRadarRouter({ engine, coordinator, collector }: RadarRouterDeps): Router {
  const router = Router();

  // Current frame
  router.get('/radar', (_req, res) => {
    res.json(engine.frame());
  });

  // Scanner health and collector state
  router.get('/radar/scanners', (_req, res) => {
    res.json({
      ...coordinator.getStatus(),
      collector: { source: collector.getLastSource(), generation: collector.getGeneration() },
    });
  });

  router.post('/radar/commands', (req, res) => {
    try {
      const command = parseCommand(req.body);
      engine.apply(command);
      res.json({ ok: true, command, frame: engine.frame() });
    } catch (e) {
      if (!(e instanceof CommandError)) throw e;
      res.status(400).json({ error: e.message });
    }
  });

  return router;
}
