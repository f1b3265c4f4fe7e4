import { Router, Request, Response } from 'express';
import { searchResultToJson, vehicleReportToJson } from '../serializers';
import type { LookupService } from '../services/searchRouter';
import { DecodeRequestSchema, SearchRequestSchema } from '../types';
import { serverError } from './serverError';

export function createSearchRouter(lookup: LookupService): Router {
  const router = Router();

  // ─── Universal Search (VIN or engine code) ──────────────
  router.post('/search', async (req: Request, res: Response) => {
    try {
      const parsed = SearchRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        res.json({ success: false, error: 'Search input is required' });
        return;
      }

      const result = await lookup.search(parsed.data.search_input);
      res.json(searchResultToJson(result));
    } catch (err) {
      serverError(res, 'Search', err);
    }
  });

  // ─── Legacy VIN-only decode ─────────────────────────────
  router.post('/decode', async (req: Request, res: Response) => {
    try {
      const parsed = DecodeRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        res.json({ success: false, error: 'VIN is required' });
        return;
      }

      const vin = parsed.data.vin;
      if (lookup.classify(vin) !== 'vin') {
        res.json({ success: false, error: `Could not decode VIN: ${vin}` });
        return;
      }

      const result = await lookup.vehicleReport(vin);
      if (!result.ok) {
        res.json({ success: false, error: lookup.describe(result.error, vin).error });
        return;
      }

      res.json({ success: true, vehicle_info: vehicleReportToJson(result.value) });
    } catch (err) {
      serverError(res, 'Decode', err);
    }
  });

  return router;
}
