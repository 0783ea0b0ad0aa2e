// src/controllers/health.controller.ts
import type { Request, Response } from 'express';
import type { StorageKind } from '../storage/StorageAdapter.storage.js';

export type ReadinessProbe = () => Promise<{ ok: boolean; error?: string }>;

export function buildHealthController(storage: StorageKind, ping: ReadinessProbe) {
  async function health(_req: Request, res: Response): Promise<void> {
    res.json({ ok: true, ts: new Date().toISOString(), storage });
  }

  async function ready(_req: Request, res: Response): Promise<void> {
    const result = await ping();
    if (result.ok) {
      res.json({ ok: true, db: 'up', ts: new Date().toISOString() });
    } else {
      res.status(503).json({ ok: false, db: 'down', error: result.error, ts: new Date().toISOString() });
    }
  }

  return { health, ready };
}
