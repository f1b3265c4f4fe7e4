import path from 'path';
import type { Server } from 'http';
import type { Express } from 'express';
import { vi } from 'vitest';
import { loadKnowledgeBase } from '../knowledgeBase';
import type { KnowledgeBase } from '../knowledgeBase';
import { ok, err } from '../lib/result';
import type { Logger } from '../logger';
import type { PricingClient, PricingSearchParams, PricingStatus } from '../services/pricingClient';
import type { DecodedFields, VinDecodeClient } from '../services/vinDecoder';
import type { PartRecord } from '../types';

// ─── shared fixtures ─────────────────────────────────────────────────

export const DATA_DIR = path.resolve(__dirname, '..', '..', 'data');

let cached: KnowledgeBase | undefined;

export function testKnowledgeBase(): KnowledgeBase {
  cached ??= loadKnowledgeBase(DATA_DIR);
  return cached;
}

export function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export const CAMRY_VIN = '4T1BE32K25U123456';

export const CAMRY_FIELDS: DecodedFields = {
  Make: 'TOYOTA',
  Model: 'Camry',
  'Model Year': '2005',
  'Engine Model': '1ZZ-FE',
  'Engine Configuration': 'In-Line',
  'Transmission Style': 'Automatic',
  'Body Class': 'Sedan/Saloon',
  Trim: 'LE',
  'Fuel Type - Primary': 'Gasoline',
  Doors: '4',
  'Anti-lock Braking System (ABS)': 'Standard',
};

// ─── in-process stand-ins for the outbound services ──────────────────

/** Decoder that answers from a fixed table; unknown VINs decode to nothing. */
export function fakeDecoder(table: Record<string, DecodedFields> = { [CAMRY_VIN]: CAMRY_FIELDS }): VinDecodeClient {
  return {
    decode: vi.fn(async (vin: string) => ok(table[vin] ?? {})),
  };
}

export function unavailableDecoder(): VinDecodeClient {
  return {
    decode: vi.fn(async () => err('DecodeServiceUnavailable' as const)),
  };
}

export interface FakePricing extends PricingClient {
  calls: PricingSearchParams[];
}

export function fakePricing(parts: PartRecord[] = [], status?: Partial<PricingStatus>): FakePricing {
  const calls: PricingSearchParams[] = [];
  return {
    calls,
    async search(params) {
      calls.push(params);
      return parts;
    },
    async status() {
      return { configured: false, authenticated: false, baseUrl: 'https://pricing.test', ...status };
    },
  };
}

export function livePart(partName: string, partNumber: string): PartRecord {
  return {
    partName,
    partNumber,
    brand: 'Test Brand',
    priceRangeText: '$10.5',
    compatibilityNotes: '',
    specifications: {},
    alternatives: [],
    maintenanceIntervalText: '',
  };
}

// ─── HTTP harness ────────────────────────────────────────────────────

export interface RunningApp {
  baseUrl: string;
  close(): Promise<void>;
}

export function listen(app: Express): Promise<RunningApp> {
  return new Promise((resolve) => {
    const server: Server = app.listen(0, () => {
      const address = server.address();
      const port = typeof address === 'object' && address !== null ? address.port : 0;
      resolve({
        baseUrl: `http://127.0.0.1:${port}`,
        close: () => new Promise<void>((done, fail) => server.close((e) => (e ? fail(e) : done()))),
      });
    });
  });
}
