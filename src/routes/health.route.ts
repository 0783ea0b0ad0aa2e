// src/routes/health.route.ts
import { Router } from 'express';
import { buildHealthController, type ReadinessProbe } from '../controllers/health.controller.js';
import type { StorageKind } from '../storage/StorageAdapter.storage.js';

export function buildHealthRouter(storage: StorageKind, ping: ReadinessProbe): Router {
  const router: Router = Router();
  const c = buildHealthController(storage, ping);

  router.get('/health', c.health);
  router.get('/ready', c.ready);

  return router;
}
