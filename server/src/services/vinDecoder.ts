/**
 * VIN Decoder Service
 *
 * Calls the NHTSA vPIC API (free, no key required) once per VIN and flattens
 * its `{ Count, Results: [{ Variable, Value }] }` payload into a
 * `Variable → Value` map.
 *
 * NHTSA API: https://vpic.nhtsa.dot.gov/api/
 */
import { z } from 'zod';
import { err, ok } from '../lib/result';
import type { Result } from '../lib/result';
import type { Logger } from '../logger';

export type DecodedFields = Record<string, string>;

export interface VinDecodeClient {
  decode(vin: string): Promise<Result<DecodedFields, 'DecodeServiceUnavailable'>>;
}

export interface VinDecodeClientOptions {
  baseUrl: string;
  timeoutMs: number;
  logger: Logger;
}

const DecodeVinResponseSchema = z.object({
  Count: z.number(),
  Results: z.array(
    z.object({
      Variable: z.string().nullable().optional(),
      Value: z.string().nullable().optional(),
    }),
  ),
});

export function flattenDecodeResponse(body: unknown): DecodedFields {
  const parsed = DecodeVinResponseSchema.safeParse(body);
  if (!parsed.success || parsed.data.Count === 0) return {};

  const fields: DecodedFields = {};
  for (const { Variable, Value } of parsed.data.Results) {
    if (!Variable || !Value || Value === 'null') continue;
    fields[Variable] = Value;
  }
  return fields;
}

export function createVinDecodeClient({ baseUrl, timeoutMs, logger }: VinDecodeClientOptions): VinDecodeClient {
  return {
    async decode(vin) {
      const url = `${baseUrl}/vehicles/DecodeVin/${encodeURIComponent(vin)}?format=json`;

      let text: string;
      try {
        const response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
        if (!response.ok) {
          logger.error(`VIN decode API error: ${response.status}`, { vin });
          await response.body?.cancel();
          return err('DecodeServiceUnavailable');
        }
        text = await response.text();
      } catch (e) {
        logger.error('VIN decode request failed', { vin, error: e });
        return err('DecodeServiceUnavailable');
      }

      // A body that is not JSON at all is not a shape we degrade from; let it surface.
      const body: unknown = JSON.parse(text);
      const fields = flattenDecodeResponse(body);
      logger.debug('VIN decoded', { vin, fieldCount: Object.keys(fields).length });
      return ok(fields);
    },
  };
}
