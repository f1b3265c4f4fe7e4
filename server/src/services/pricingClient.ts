/**
 * Parts Pricing Service
 *
 * Best-effort client for a third-party parts-pricing API. It authenticates
 * with username + API key for a bearer token, then sends a single vehicle
 * search. Any failure (missing credentials, rejected login, timeout,
 * unexpected payload) yields an empty list; callers keep their static data.
 */
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import type { PricingConfig } from '../config';
import type { Logger } from '../logger';
import type { PartRecord } from '../types';

export interface PricingSearchParams {
  year?: number;
  make: string;
  model: string;
  engine?: string;
  keyword?: string;
}

export interface PricingStatus {
  configured: boolean;
  authenticated: boolean;
  baseUrl: string;
}

export interface PricingClient {
  search(params: PricingSearchParams): Promise<PartRecord[]>;
  status(): Promise<PricingStatus>;
}

const AUTH_PATH = '/oauth/access';

const AuthResponseSchema = z.object({
  accessToken: z.string().min(1),
});

const LivePartSchema = z.object({
  partName: z.string(),
  partNumber: z.string().default(''),
  brand: z.string().default(''),
  price: z.number().optional(),
  listPrice: z.number().optional(),
  supplier: z.string().optional(),
  supplierLocation: z.string().optional(),
  availability: z.string().optional(),
  shippingTime: z.string().optional(),
  fitmentNotes: z.string().default(''),
  warranty: z.string().default(''),
});

const SearchResponseSchema = z.object({
  parts: z.array(LivePartSchema).default([]),
});

type LivePart = z.infer<typeof LivePartSchema>;

function priceText({ price, listPrice }: LivePart): string {
  if (price === undefined) return '';
  return listPrice === undefined ? `$${price}` : `$${price} (List: $${listPrice})`;
}

export function toPartRecord(part: LivePart): PartRecord {
  const specifications: Record<string, string> = {};
  if (part.supplier) specifications.supplier = part.supplier;
  if (part.supplierLocation) specifications.location = part.supplierLocation;
  if (part.shippingTime) specifications.shipping = part.shippingTime;
  if (part.availability) specifications.availability = part.availability;

  return {
    partName: part.partName,
    partNumber: part.partNumber,
    brand: part.brand,
    priceRangeText: priceText(part),
    compatibilityNotes: part.fitmentNotes,
    specifications,
    alternatives: [],
    maintenanceIntervalText: part.warranty,
  };
}

/** A token that carries an `exp` claim in the past is treated as a failed login. */
function isUsableToken(token: string): boolean {
  const decoded = jwt.decode(token);
  if (!decoded || typeof decoded === 'string' || decoded.exp === undefined) return true;
  return decoded.exp * 1000 > Date.now();
}

export function createPricingClient(config: PricingConfig, logger: Logger): PricingClient {
  const { baseUrl, searchPath, timeoutMs, credentials } = config;

  async function post(pathname: string, body: unknown, token?: string): Promise<Response> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
    };
    if (token) headers.Authorization = `Bearer ${token}`;

    return fetch(`${baseUrl}${pathname}`, {
      method: 'POST',
      headers,
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(timeoutMs),
    });
  }

  async function authenticate(): Promise<string | null> {
    if (!credentials) return null;
    try {
      const response = await post(AUTH_PATH, {
        accessType: 'user',
        credentials: { username: credentials.username, apiKey: credentials.apiKey },
      });
      if (response.status !== 200) {
        logger.warn(`Authentication rejected: ${response.status}`);
        await response.body?.cancel();
        return null;
      }
      const parsed = AuthResponseSchema.safeParse(await response.json());
      if (!parsed.success || !isUsableToken(parsed.data.accessToken)) {
        logger.warn('Authentication returned no usable access token');
        return null;
      }
      return parsed.data.accessToken;
    } catch (e) {
      logger.warn('Authentication failed', { error: e });
      return null;
    }
  }

  return {
    async search(params) {
      if (!credentials) {
        logger.debug('Pricing credentials not configured; skipping live search');
        return [];
      }

      const token = await authenticate();
      if (!token) return [];

      try {
        const response = await post(
          searchPath,
          {
            searchParams: {
              vehicleParams: { year: params.year, make: params.make, model: params.model },
              engineCode: params.engine,
              keyword: params.keyword,
            },
          },
          token,
        );
        if (response.status !== 200) {
          logger.warn(`Search failed: ${response.status}`);
          await response.body?.cancel();
          return [];
        }
        const parsed = SearchResponseSchema.safeParse(await response.json());
        if (!parsed.success) {
          logger.warn('Search response did not contain a parts list');
          return [];
        }
        logger.info(`Live search returned ${parsed.data.parts.length} part(s)`, {
          make: params.make,
          model: params.model,
        });
        return parsed.data.parts.map(toPartRecord);
      } catch (e) {
        logger.warn('Search failed', { error: e });
        return [];
      }
    },

    async status() {
      const token = await authenticate();
      return {
        configured: credentials !== undefined,
        authenticated: token !== null,
        baseUrl,
      };
    },
  };
}
