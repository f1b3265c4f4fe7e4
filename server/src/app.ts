import express, { ErrorRequestHandler, Express } from 'express';
import type { KnowledgeBase } from './knowledgeBase';
import { requestLogger } from './logger';
import { createEngineRouter } from './routes/engine';
import { createSearchRouter } from './routes/search';
import { serverError } from './routes/serverError';
import { createStatusRouter } from './routes/status';
import type { PricingClient } from './services/pricingClient';
import type { LookupService } from './services/searchRouter';

export interface AppDeps {
  lookup: LookupService;
  pricing: PricingClient;
  knowledgeBase: KnowledgeBase;
}

function isBodyParseError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}

const handleErrors: ErrorRequestHandler = (err, _req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }
  if (isBodyParseError(err)) {
    res.status(400).json({ success: false, error: 'Request body is not valid JSON' });
    return;
  }
  serverError(res, 'Unhandled', err);
};

export function createApp({ lookup, pricing, knowledgeBase }: AppDeps): Express {
  const app = express();

  // ─── CORS ────────────────────────────────────────────────
  // A known origin is reflected; anything else gets '*'. Preflight requests
  // are answered here and never reach the routers.
  app.use((req, res, next) => {
    const origin = req.headers.origin;
    res.setHeader('Access-Control-Allow-Origin', origin || '*');
    if (origin) res.setHeader('Vary', 'Origin');
    res.setHeader('Access-Control-Allow-Methods', 'GET,POST,OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type,X-Request-Id');

    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }
    next();
  });

  app.use(express.json());
  app.use(requestLogger);

  // ─── Routes ─────────────────────────────────────────────
  app.use(createSearchRouter(lookup));
  app.use('/api/engine', createEngineRouter(lookup));
  app.use('/api', createStatusRouter(knowledgeBase, pricing));

  // Never fall through to an HTML page for API paths
  app.use('/api', (req, res) => {
    res.status(404).json({ error: `API endpoint not found: ${req.method} ${req.originalUrl.split('?')[0]}` });
  });

  app.use(handleErrors);

  return app;
}
