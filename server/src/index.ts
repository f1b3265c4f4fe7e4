import { createApp } from './app';
import { loadConfig } from './config';
import { loadKnowledgeBase } from './knowledgeBase';
import { createLogger, setLogLevel } from './logger';
import { createPricingClient } from './services/pricingClient';
import { LookupService } from './services/searchRouter';
import { createVinDecodeClient } from './services/vinDecoder';

const bootLog = createLogger('Boot');

function start(): void {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const knowledgeBase = loadKnowledgeBase(config.dataDir);
  bootLog.info(`Knowledge base loaded from ${config.dataDir}`, {
    engines: Object.keys(knowledgeBase.engines).length,
  });

  const vinDecoder = createVinDecodeClient({ ...config.vinDecode, logger: createLogger('VinDecode') });
  const pricing = createPricingClient(config.pricing, createLogger('Pricing'));
  if (!config.pricing.credentials) {
    bootLog.warn('Pricing credentials not set; searches use static catalog data only');
  }

  const lookup = new LookupService({
    knowledgeBase,
    vinDecoder,
    pricing,
    logger: createLogger('Lookup'),
  });

  const app = createApp({ lookup, pricing, knowledgeBase });
  app.listen(config.port, () => {
    bootLog.info(`Server running on http://localhost:${config.port}`);
    bootLog.info(`Health check: http://localhost:${config.port}/api/health`);
  });
}

try {
  start();
} catch (err) {
  bootLog.error('Startup failed', { error: err });
  process.exitCode = 1;
}
