import type { KnowledgeBase } from '../knowledgeBase';
import { knownEngineCodes } from '../knowledgeBase';
import { err, ok } from '../lib/result';
import type { Result } from '../lib/result';
import type { Logger } from '../logger';
import type { DecodedVehicle, EngineReport } from '../types';
import { extractEngineCode } from './engineCode';
import type { DecodedFields, VinDecodeClient } from './vinDecoder';
import { isValidVin } from './vinValidator';

export type VinResolutionError = 'InvalidVin' | 'DecodeServiceUnavailable' | 'DecodeServiceEmpty';

// Provider variable → label, in the order they are reported.
const SAFETY_FEATURES: ReadonlyArray<[string, string]> = [
  ['Anti-lock Braking System (ABS)', 'ABS'],
  ['Electronic Stability Control (ESC)', 'ESC'],
  ['Traction Control', 'Traction Control'],
  ['Tire Pressure Monitoring System (TPMS) Type', 'TPMS'],
  ['Backup Camera', 'Backup Camera'],
  ['Lane Departure Warning (LDW)', 'Lane Departure Warning'],
  ['Forward Collision Warning (FCW)', 'Forward Collision Warning'],
  ['Blind Spot Warning (BSW)', 'Blind Spot Warning'],
  ['Adaptive Cruise Control (ACC)', 'Adaptive Cruise Control'],
];

const STANDARD_FEATURES: readonly string[] = [
  'Air Conditioning',
  'Power Windows',
  'Power Locks',
  'Power Mirrors',
  'Cruise Control',
  'CD Player',
  'AM/FM Radio',
  'Bluetooth',
];

export function toDecodedVehicle(vin: string, fields: DecodedFields): DecodedVehicle {
  const field = (name: string) => fields[name] ?? '';
  const safetyFeatures = [...new Set(SAFETY_FEATURES.filter(([name]) => field(name)).map(([, label]) => label))];

  return {
    vin,
    make: field('Make'),
    model: field('Model'),
    year: field('Model Year'),
    engine: field('Engine Model'),
    engineCode: field('Engine Configuration'),
    transmission: field('Transmission Style'),
    transmissionCode: field('Transmission'),
    bodyStyle: field('Body Class'),
    trim: field('Trim'),
    fuelType: field('Fuel Type - Primary'),
    driveType: field('Drive Type'),
    doors: field('Doors'),
    seats: field('Number of Seats'),
    safetyFeatures,
    standardFeatures: STANDARD_FEATURES.filter((name) => field(name)),
  };
}

/**
 * Turns VINs and engine codes into vehicle or engine data. Every expected
 * failure comes back as a `Result` error; only unexpected ones throw.
 */
export class Resolver {
  constructor(
    private readonly kb: KnowledgeBase,
    private readonly vinDecoder: VinDecodeClient,
    private readonly logger: Logger,
  ) {}

  async resolveVin(vin: string): Promise<Result<DecodedVehicle, VinResolutionError>> {
    if (!isValidVin(vin)) {
      this.logger.warn(`Invalid VIN format: ${vin}`);
      return err('InvalidVin');
    }

    const decoded = await this.vinDecoder.decode(vin);
    if (!decoded.ok) return decoded;

    if (Object.keys(decoded.value).length === 0) {
      this.logger.warn(`Could not decode VIN: ${vin}`);
      return err('DecodeServiceEmpty');
    }

    const vehicle = toDecodedVehicle(vin, decoded.value);
    if (vehicle.make && !this.kb.japaneseManufacturers.includes(vehicle.make.toUpperCase())) {
      this.logger.warn(`Vehicle make '${vehicle.make}' is not a Japanese manufacturer`, { vin });
    }
    return ok(vehicle);
  }

  resolveEngine(input: string): Result<EngineReport, 'UnknownEngineCode'> {
    const code = extractEngineCode(input, knownEngineCodes(this.kb));
    const profile = code ? this.kb.engines[code] : undefined;
    if (!code || !profile) {
      this.logger.warn(`Engine code not found: ${input}`, { extracted: code });
      return err('UnknownEngineCode');
    }

    return ok({
      profile,
      catalog: this.kb.engineParts[code] ?? {},
    });
  }
}
