#!/usr/bin/env node
/**
 * Looks up a VIN or engine code from the terminal.
 *
 * Usage:
 *   tsx server/src/cli/lookup.ts D16W7
 *   tsx server/src/cli/lookup.ts 1HGCM82633A004352 --json
 */
import { Command } from 'commander';
import { loadConfig } from '../config';
import { loadKnowledgeBase } from '../knowledgeBase';
import { createLogger, setLogLevel } from '../logger';
import { searchResultToJson } from '../serializers';
import { createPricingClient } from '../services/pricingClient';
import { LookupService } from '../services/searchRouter';
import { createVinDecodeClient } from '../services/vinDecoder';
import { formatSearchResult } from './format';

const program = new Command();
program
  .name('lookup')
  .description('find parts for a VIN or engine code')
  .argument('<input>', '17-character VIN or engine code')
  .option('--json', 'print the JSON response instead of a report', false);

program.parse(process.argv);
const opts = program.opts<{ json: boolean }>();
const [input] = program.args;

(async () => {
  const config = loadConfig();
  // Keep stdout for the report; only problems are logged.
  setLogLevel(config.logLevel === 'debug' ? 'debug' : 'warn');

  const knowledgeBase = loadKnowledgeBase(config.dataDir);
  const lookup = new LookupService({
    knowledgeBase,
    vinDecoder: createVinDecodeClient({ ...config.vinDecode, logger: createLogger('VinDecode') }),
    pricing: createPricingClient(config.pricing, createLogger('Pricing')),
    logger: createLogger('Lookup'),
  });

  const result = await lookup.search(input);
  console.log(opts.json ? JSON.stringify(searchResultToJson(result), null, 2) : formatSearchResult(result));
  process.exitCode = result.success ? 0 : 1;
})().catch((err: unknown) => {
  console.error('[lookup] failed:', err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
