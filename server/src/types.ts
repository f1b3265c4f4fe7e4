import { z } from 'zod';

// ─── Requests ───────────────────────────────────────────
export const SearchRequestSchema = z.object({
  search_input: z.string().trim().min(1),
});

export const DecodeRequestSchema = z.object({
  vin: z.string().trim().min(1),
});

// ─── Knowledge base records ─────────────────────────────
export const PartRecordSchema = z.object({
  partName: z.string(),
  partNumber: z.string().default(''),
  brand: z.string().default(''),
  priceRangeText: z.string().default(''),
  compatibilityNotes: z.string().default(''),
  specifications: z.record(z.string()).default({}),
  alternatives: z.array(z.string()).default([]),
  maintenanceIntervalText: z.string().default(''),
});

export const PartsCatalogSchema = z.record(z.record(PartRecordSchema));

export const EngineProfileSchema = z.object({
  engineCode: z.string(),
  displacement: z.string(),
  type: z.string(),
  fuelSystem: z.string(),
  valvesPerCylinder: z.number().int(),
  compressionRatio: z.string(),
  maxPower: z.string(),
  maxTorque: z.string(),
  fuelType: z.string(),
  commonVehicles: z.array(
    z.object({
      make: z.string(),
      model: z.string(),
      yearRange: z.string(),
    }),
  ),
});

export const MaintenanceIntervalSchema = z.object({
  intervalMiles: z.string(),
  intervalMonths: z.string(),
  services: z.array(z.string()),
  partsNeeded: z.array(z.string()),
  estimatedCost: z.string(),
});

export const VehicleSpecificationsSchema = z.object({
  engineDisplacement: z.string().default(''),
  horsepower: z.string().default(''),
  torque: z.string().default(''),
  fuelCapacity: z.string().default(''),
  oilCapacity: z.string().default(''),
  transmissionFluidCapacity: z.string().default(''),
  coolantCapacity: z.string().default(''),
  brakeFluidType: z.string().default(''),
  tireSize: z.string().default(''),
  wheelSize: z.string().default(''),
  weight: z.string().default(''),
  dimensions: z.record(z.string()).default({}),
  towingCapacity: z.string().default(''),
  payloadCapacity: z.string().default(''),
});

// ─── Types ──────────────────────────────────────────────
export type PartRecord = z.infer<typeof PartRecordSchema>;

/** category → part key → part record */
export type PartsCatalog = Record<string, Record<string, PartRecord>>;

export type EngineProfile = z.infer<typeof EngineProfileSchema>;

export type MaintenanceInterval = z.infer<typeof MaintenanceIntervalSchema>;

/** interval key (e.g. "5000_miles") → interval */
export type MaintenanceSchedule = Record<string, MaintenanceInterval>;

export type VehicleSpecifications = z.infer<typeof VehicleSpecificationsSchema>;

/** make → model → year → T, with make and model keys upper-cased */
export type VehicleTable<T> = Record<string, Record<string, Record<string, T>>>;

export type SearchType = 'vin' | 'engine_code';

export interface VehicleQuery {
  kind: SearchType;
  value: string;
}

export interface DecodedVehicle {
  vin: string;
  make: string;
  model: string;
  year: string;
  engine: string;
  engineCode: string;
  transmission: string;
  transmissionCode: string;
  bodyStyle: string;
  trim: string;
  fuelType: string;
  driveType: string;
  doors: string;
  seats: string;
  safetyFeatures: string[];
  standardFeatures: string[];
}

export interface VehicleReport {
  vehicle: DecodedVehicle;
  catalog: PartsCatalog;
  specifications: VehicleSpecifications;
  maintenanceSchedule: MaintenanceSchedule;
  commonIssues: readonly string[];
}

export interface EngineReport {
  profile: EngineProfile;
  catalog: PartsCatalog;
}

export type SearchResult =
  | { success: true; searchType: 'vin'; data: VehicleReport; livePricingUsed: boolean }
  | { success: true; searchType: 'engine_code'; data: EngineReport; livePricingUsed: boolean }
  | { success: false; searchType?: SearchType; error: string; suggestion?: string };
