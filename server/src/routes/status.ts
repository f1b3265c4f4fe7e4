import { Router, Request, Response } from 'express';
import type { KnowledgeBase } from '../knowledgeBase';
import type { PricingClient } from '../services/pricingClient';
import { serverError } from './serverError';

function countVehicleEntries(table: Readonly<Record<string, Record<string, Record<string, unknown>>>>): number {
  let count = 0;
  for (const models of Object.values(table)) {
    for (const years of Object.values(models)) count += Object.keys(years).length;
  }
  return count;
}

export function createStatusRouter(kb: KnowledgeBase, pricing: PricingClient): Router {
  const router = Router();

  // ─── Health Check ───────────────────────────────────────
  router.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      knowledge_base: {
        engines: Object.keys(kb.engines).length,
        engine_part_sets: Object.keys(kb.engineParts).length,
        vehicle_part_sets: countVehicleEntries(kb.vehicleParts),
      },
    });
  });

  // ─── Pricing service status ─────────────────────────────
  router.get('/status', async (_req: Request, res: Response) => {
    try {
      const status = await pricing.status();
      res.json({
        pricing_available: status.authenticated,
        fallback_available: true,
        connection_details: {
          configured: status.configured,
          authentication_successful: status.authenticated,
          base_url: status.baseUrl,
        },
      });
    } catch (err) {
      serverError(res, 'Status', err);
    }
  });

  return router;
}
