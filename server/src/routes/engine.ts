import { Router, Request, Response } from 'express';
import { engineReportToJson } from '../serializers';
import type { LookupService } from '../services/searchRouter';
import { serverError } from './serverError';

export function createEngineRouter(lookup: LookupService): Router {
  const router = Router();

  router.get('/:code', (req: Request, res: Response) => {
    const code = req.params.code;
    try {
      const resolved = lookup.resolver.resolveEngine(code);
      if (!resolved.ok) {
        // Not found is a logical outcome, reported in the body with a 200.
        res.json({ success: false, error: `Engine code not found: ${code}` });
        return;
      }

      res.json({ success: true, engine_data: engineReportToJson(resolved.value) });
    } catch (err) {
      serverError(res, 'Engine lookup', err);
    }
  });

  return router;
}
