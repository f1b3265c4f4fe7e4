import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import {
  EngineProfile,
  EngineProfileSchema,
  MaintenanceIntervalSchema,
  MaintenanceSchedule,
  PartsCatalog,
  PartsCatalogSchema,
  VehicleSpecifications,
  VehicleSpecificationsSchema,
  VehicleTable,
} from './types';

/**
 * Static reference data: engine profiles, parts catalogs and the supplementary
 * per-vehicle tables. Loaded once at boot, validated, then deep-frozen and
 * handed to the services that need it.
 */
export interface KnowledgeBase {
  /** keyed by upper-cased engine code, in file order */
  engines: Readonly<Record<string, EngineProfile>>;
  engineParts: Readonly<Record<string, PartsCatalog>>;
  vehicleParts: Readonly<VehicleTable<PartsCatalog>>;
  maintenanceSchedules: Readonly<VehicleTable<MaintenanceSchedule>>;
  /** make → model → year → engine → specifications */
  vehicleSpecifications: Readonly<VehicleTable<Record<string, VehicleSpecifications>>>;
  commonIssues: Readonly<VehicleTable<string[]>>;
  japaneseManufacturers: readonly string[];
}

const vehicleTable = <T extends z.ZodTypeAny>(leaf: T) => z.record(z.record(z.record(leaf)));

const KnowledgeBaseSchema = z.object({
  engines: z.record(EngineProfileSchema),
  engineParts: z.record(PartsCatalogSchema),
  vehicleParts: vehicleTable(PartsCatalogSchema),
  maintenanceSchedules: vehicleTable(z.record(MaintenanceIntervalSchema)),
  vehicleSpecifications: vehicleTable(z.record(VehicleSpecificationsSchema)),
  commonIssues: vehicleTable(z.array(z.string())),
  japaneseManufacturers: z.array(z.string()),
});

const FILES = {
  engines: 'engines.json',
  engineParts: 'engine-parts.json',
  vehicleParts: 'vehicle-parts.json',
  maintenanceSchedules: 'maintenance-schedules.json',
  vehicleSpecifications: 'vehicle-specifications.json',
  commonIssues: 'common-issues.json',
  manufacturers: 'manufacturers.json',
} as const;

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

function upperKeys<T>(table: Record<string, T>): Record<string, T> {
  return Object.fromEntries(Object.entries(table).map(([k, v]) => [k.toUpperCase(), v]));
}

function upperVehicleKeys<T>(table: VehicleTable<T>): VehicleTable<T> {
  const out: VehicleTable<T> = {};
  for (const [make, models] of Object.entries(table)) {
    out[make.toUpperCase()] = upperKeys(models);
  }
  return out;
}

/**
 * Validates raw tables and returns an immutable knowledge base. Engine codes,
 * makes and models are normalised to upper case so lookups never depend on
 * how the data file spelled them.
 */
export function buildKnowledgeBase(input: unknown): KnowledgeBase {
  const kb = KnowledgeBaseSchema.parse(input);
  return deepFreeze({
    engines: upperKeys(kb.engines),
    engineParts: upperKeys(kb.engineParts),
    vehicleParts: upperVehicleKeys(kb.vehicleParts),
    maintenanceSchedules: upperVehicleKeys(kb.maintenanceSchedules),
    vehicleSpecifications: upperVehicleKeys(kb.vehicleSpecifications),
    commonIssues: upperVehicleKeys(kb.commonIssues),
    japaneseManufacturers: kb.japaneseManufacturers.map((m) => m.toUpperCase()),
  });
}

function readJson(dataDir: string, file: string): unknown {
  const fullPath = path.join(dataDir, file);
  try {
    return JSON.parse(fs.readFileSync(fullPath, 'utf8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Could not load knowledge base file ${fullPath}: ${reason}`);
  }
}

const ManufacturersFileSchema = z.object({ japanese: z.array(z.string()) });

export function loadKnowledgeBase(dataDir: string): KnowledgeBase {
  const manufacturers = ManufacturersFileSchema.parse(readJson(dataDir, FILES.manufacturers));
  return buildKnowledgeBase({
    engines: readJson(dataDir, FILES.engines),
    engineParts: readJson(dataDir, FILES.engineParts),
    vehicleParts: readJson(dataDir, FILES.vehicleParts),
    maintenanceSchedules: readJson(dataDir, FILES.maintenanceSchedules),
    vehicleSpecifications: readJson(dataDir, FILES.vehicleSpecifications),
    commonIssues: readJson(dataDir, FILES.commonIssues),
    japaneseManufacturers: manufacturers.japanese,
  });
}

export function knownEngineCodes(kb: KnowledgeBase): string[] {
  return Object.keys(kb.engines);
}
