import { afterEach, describe, it, expect, vi } from 'vitest';
import { createApp } from '../app';
import { setLogLevel } from '../logger';
import type { PricingClient } from '../services/pricingClient';
import { LookupService } from '../services/searchRouter';
import type { VinDecodeClient } from '../services/vinDecoder';
import type { RunningApp } from './helpers';
import {
  CAMRY_VIN,
  fakeDecoder,
  fakePricing,
  livePart,
  listen,
  silentLogger,
  testKnowledgeBase,
} from './helpers';

// ─── helpers ──────────────────────────────────────────────────────────

let running: RunningApp | undefined;

async function start(vinDecoder: VinDecodeClient = fakeDecoder(), pricing: PricingClient = fakePricing()) {
  const knowledgeBase = testKnowledgeBase();
  const lookup = new LookupService({ knowledgeBase, vinDecoder, pricing, logger: silentLogger() });
  running = await listen(createApp({ lookup, pricing, knowledgeBase }));
  return running.baseUrl;
}

async function post(baseUrl: string, path: string, body: unknown) {
  const res = await fetch(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
  const json: unknown = await res.json();
  return { status: res.status, body: json };
}

async function get(baseUrl: string, path: string) {
  const res = await fetch(`${baseUrl}${path}`);
  const json: unknown = await res.json();
  return { status: res.status, body: json, headers: res.headers };
}

afterEach(async () => {
  await running?.close();
  running = undefined;
});

// ─── POST /search ─────────────────────────────────────────────────────

describe('POST /search', () => {
  it('finds parts for an engine number', async () => {
    const baseUrl = await start();
    const { status, body } = await post(baseUrl, '/search', { search_input: 'D16W73005025' });

    expect(status).toBe(200);
    expect(body).toMatchObject({
      success: true,
      search_type: 'engine_code',
      live_pricing_used: false,
      data: {
        engine_code: 'D16W7',
        total_parts: 9,
        parts_categories: ['engine_parts', 'brake_parts', 'maintenance_parts'],
        engine_info: {
          common_vehicles: [
            { make: 'Honda', model: 'Civic', years: '2001-2005' },
            { make: 'Honda', model: 'Civic Si', years: '2002-2005' },
          ],
        },
        parts_compatibility: {
          engine_parts: {
            air_filter: {
              name: 'Air Filter',
              part_number: '17220-P2A-000',
              brand: 'Honda OEM',
              price_range: '$12-22',
              compatibility_notes: 'Fits 2001-2005 Honda Civic with D16W7 engine',
              maintenance_interval: 'Every 12,000 miles',
              specifications: { filter_type: 'Paper', dimensions: '7.8" x 6.1" x 1.2"' },
              alternatives: ['Fram CA10467', 'K&N 33-2276', 'Mann C 2275'],
            },
          },
        },
      },
    });
  });

  it('explains an unrecognised input', async () => {
    const baseUrl = await start();
    const { status, body } = await post(baseUrl, '/search', { search_input: 'not-a-real-code' });

    expect(status).toBe(200);
    expect(body).toEqual({
      success: false,
      error: 'Engine code not found: not-a-real-code',
      suggestion: 'Enter a 17-character VIN or an engine code such as D16W7, D17A1, D16Y8, 1ZZ-FE, 2AZ-FE',
    });
  });

  it('requires a search input', async () => {
    const baseUrl = await start();
    expect((await post(baseUrl, '/search', { search_input: '   ' })).body).toEqual({
      success: false,
      error: 'Search input is required',
    });
    expect((await post(baseUrl, '/search', {})).body).toEqual({ success: false, error: 'Search input is required' });
  });

  it('returns the vehicle report for a VIN', async () => {
    const baseUrl = await start();
    const { body } = await post(baseUrl, '/search', { search_input: CAMRY_VIN });

    expect(body).toMatchObject({
      success: true,
      search_type: 'vin',
      data: {
        search_type: 'vin',
        vin: CAMRY_VIN,
        make: 'TOYOTA',
        model: 'Camry',
        year: '2005',
        engine: '1ZZ-FE',
        total_parts: 7,
        parts_categories: ['engine_parts', 'brake_parts', 'suspension_parts'],
        safety_features: ['ABS'],
        parts_compatibility: { engine_parts: { air_filter: { part_number: '17801-0P010' } } },
        specifications: { horsepower: '126 hp', oil_capacity: '4.2 quarts' },
        maintenance_schedule: { '5000_miles': { interval_miles: expect.any(String) } },
        common_issues: expect.arrayContaining(['Oil consumption in 1ZZ-FE engine']),
      },
    });
  });

  it('merges live pricing results', async () => {
    const baseUrl = await start(fakeDecoder(), fakePricing([livePart('Oil Filter', 'OF-1')]));
    const { body } = await post(baseUrl, '/search', { search_input: 'D16W7' });

    expect(body).toMatchObject({
      live_pricing_used: true,
      data: {
        total_parts: 10,
        parts_categories: ['engine_parts', 'brake_parts', 'maintenance_parts', 'live_parts'],
        parts_compatibility: { live_parts: { live_0: { name: 'Oil Filter', part_number: 'OF-1', price_range: '$10.5' } } },
      },
    });
  });

  it('answers 500 when a lookup throws', async () => {
    const broken: VinDecodeClient = {
      decode: async () => {
        throw new Error('decoder exploded');
      },
    };
    const baseUrl = await start(broken);
    const { status, body } = await post(baseUrl, '/search', { search_input: CAMRY_VIN });

    expect(status).toBe(500);
    expect(body).toEqual({ success: false, error: 'Server error: decoder exploded' });
  });

  it('rejects a body that is not JSON', async () => {
    const baseUrl = await start();
    const res = await fetch(`${baseUrl}/search`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"search_input":',
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ success: false, error: 'Request body is not valid JSON' });
  });
});

// ─── POST /decode ─────────────────────────────────────────────────────

describe('POST /decode', () => {
  it('returns vehicle_info for a VIN', async () => {
    const baseUrl = await start();
    const { body } = await post(baseUrl, '/decode', { vin: CAMRY_VIN });

    expect(body).toMatchObject({ success: true, vehicle_info: { make: 'TOYOTA', total_parts: 7 } });
  });

  it('refuses an engine code', async () => {
    const baseUrl = await start();
    expect((await post(baseUrl, '/decode', { vin: 'D16W7' })).body).toEqual({
      success: false,
      error: 'Could not decode VIN: D16W7',
    });
  });

  it('reports an invalid VIN', async () => {
    const baseUrl = await start();
    expect((await post(baseUrl, '/decode', { vin: '1HGCM8263OA004352' })).body).toEqual({
      success: false,
      error: 'Invalid VIN format: 1HGCM8263OA004352',
    });
  });
});

// ─── GET /api/* ───────────────────────────────────────────────────────

describe('GET /api/engine/:code', () => {
  it('returns engine data', async () => {
    const baseUrl = await start();
    const { status, body } = await get(baseUrl, '/api/engine/D16W7');

    expect(status).toBe(200);
    expect(body).toMatchObject({
      success: true,
      engine_data: { total_parts: 9, engine_info: { displacement: '1.6L (1590cc)' } },
    });
  });

  it('reports an unknown code with a 200', async () => {
    const baseUrl = await start();
    const { status, body } = await get(baseUrl, '/api/engine/ZZZ');

    expect(status).toBe(200);
    expect(body).toEqual({ success: false, error: 'Engine code not found: ZZZ' });
  });
});

describe('status endpoints', () => {
  it('reports health and knowledge base size', async () => {
    const baseUrl = await start();
    const { body } = await get(baseUrl, '/api/health');

    expect(body).toEqual({
      status: 'ok',
      timestamp: expect.any(String),
      knowledge_base: { engines: 5, engine_part_sets: 1, vehicle_part_sets: 2 },
    });
  });

  it('reports pricing availability', async () => {
    const baseUrl = await start(fakeDecoder(), fakePricing([], { configured: true, authenticated: true }));
    const { body } = await get(baseUrl, '/api/status');

    expect(body).toEqual({
      pricing_available: true,
      fallback_available: true,
      connection_details: { configured: true, authentication_successful: true, base_url: 'https://pricing.test' },
    });
  });

  it('answers unknown API paths with a JSON 404', async () => {
    const baseUrl = await start();
    const { status, body } = await get(baseUrl, '/api/nothing?x=1');

    expect(status).toBe(404);
    expect(body).toEqual({ error: 'API endpoint not found: GET /api/nothing' });
  });
});

describe('CORS', () => {
  it('reflects the origin and answers preflight requests', async () => {
    const baseUrl = await start();
    const res = await fetch(`${baseUrl}/search`, { method: 'OPTIONS', headers: { Origin: 'http://shop.test' } });

    expect(res.status).toBe(204);
    expect(res.headers.get('access-control-allow-origin')).toBe('http://shop.test');
  });

  it('falls back to * without an origin', async () => {
    const baseUrl = await start();
    const { headers } = await get(baseUrl, '/api/health');
    expect(headers.get('access-control-allow-origin')).toBe('*');
  });
});

describe('request logging', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('logs the full mounted path with the status', async () => {
    setLogLevel('info');
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const baseUrl = await start();
    await get(baseUrl, '/api/engine/ZZZ?verbose=1');

    await vi.waitFor(() => {
      expect(log).toHaveBeenCalledWith(expect.stringMatching(/ \[INFO\] \[API\] GET \/api\/engine\/ZZZ 200 \{/));
    });
    expect(log).not.toHaveBeenCalledWith(expect.stringMatching(/\[API\] GET \/ZZZ /));
  });

  it('echoes an incoming request id', async () => {
    const baseUrl = await start();
    const res = await fetch(`${baseUrl}/api/health`, { headers: { 'X-Request-Id': 'req-42' } });
    expect(res.headers.get('x-request-id')).toBe('req-42');
  });

  it('generates a uuid when no request id is sent', async () => {
    const baseUrl = await start();
    const { headers } = await get(baseUrl, '/api/health');
    expect(headers.get('x-request-id')).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });
});
