import type {
  EngineReport,
  MaintenanceSchedule,
  PartRecord,
  PartsCatalog,
  SearchResult,
  VehicleReport,
  VehicleSpecifications,
} from './types';

// JSON shapes on the wire are snake_case; these helpers are the only place
// that knows the mapping.

export interface PartJson {
  name: string;
  part_number: string;
  brand: string;
  price_range: string;
  compatibility_notes: string;
  maintenance_interval: string;
  specifications: Record<string, string>;
  alternatives: string[];
}

export type CatalogJson = Record<string, Record<string, PartJson>>;

export function partToJson(part: PartRecord): PartJson {
  return {
    name: part.partName,
    part_number: part.partNumber,
    brand: part.brand,
    price_range: part.priceRangeText,
    compatibility_notes: part.compatibilityNotes,
    maintenance_interval: part.maintenanceIntervalText,
    specifications: { ...part.specifications },
    alternatives: [...part.alternatives],
  };
}

export function catalogToJson(catalog: PartsCatalog): CatalogJson {
  const out: CatalogJson = {};
  for (const [category, parts] of Object.entries(catalog)) {
    out[category] = {};
    for (const [key, part] of Object.entries(parts)) {
      out[category][key] = partToJson(part);
    }
  }
  return out;
}

export function countParts(catalog: PartsCatalog): number {
  return Object.values(catalog).reduce((sum, parts) => sum + Object.keys(parts).length, 0);
}

function specificationsToJson(specs: VehicleSpecifications) {
  return {
    engine_displacement: specs.engineDisplacement,
    horsepower: specs.horsepower,
    torque: specs.torque,
    fuel_capacity: specs.fuelCapacity,
    oil_capacity: specs.oilCapacity,
    transmission_fluid_capacity: specs.transmissionFluidCapacity,
    coolant_capacity: specs.coolantCapacity,
    brake_fluid_type: specs.brakeFluidType,
    tire_size: specs.tireSize,
    wheel_size: specs.wheelSize,
    weight: specs.weight,
    dimensions: { ...specs.dimensions },
    towing_capacity: specs.towingCapacity,
    payload_capacity: specs.payloadCapacity,
  };
}

function maintenanceToJson(schedule: MaintenanceSchedule) {
  return Object.fromEntries(
    Object.entries(schedule).map(([key, interval]) => [
      key,
      {
        interval_miles: interval.intervalMiles,
        interval_months: interval.intervalMonths,
        services: [...interval.services],
        parts_needed: [...interval.partsNeeded],
        estimated_cost: interval.estimatedCost,
      },
    ]),
  );
}

export function engineReportToJson({ profile, catalog }: EngineReport) {
  return {
    search_type: 'engine_code' as const,
    engine_code: profile.engineCode,
    engine_info: {
      displacement: profile.displacement,
      type: profile.type,
      fuel_system: profile.fuelSystem,
      valves_per_cylinder: profile.valvesPerCylinder,
      compression_ratio: profile.compressionRatio,
      max_power: profile.maxPower,
      max_torque: profile.maxTorque,
      fuel_type: profile.fuelType,
      common_vehicles: profile.commonVehicles.map((v) => ({ make: v.make, model: v.model, years: v.yearRange })),
    },
    parts_compatibility: catalogToJson(catalog),
    total_parts: countParts(catalog),
    parts_categories: Object.keys(catalog),
  };
}

export function vehicleReportToJson({ vehicle, catalog, specifications, maintenanceSchedule, commonIssues }: VehicleReport) {
  return {
    search_type: 'vin' as const,
    vin: vehicle.vin,
    make: vehicle.make,
    model: vehicle.model,
    year: vehicle.year,
    engine: vehicle.engine,
    engine_code: vehicle.engineCode,
    transmission: vehicle.transmission,
    transmission_code: vehicle.transmissionCode,
    drive_type: vehicle.driveType,
    body_style: vehicle.bodyStyle,
    trim: vehicle.trim,
    fuel_type: vehicle.fuelType,
    doors: vehicle.doors,
    seats: vehicle.seats,
    safety_features: [...vehicle.safetyFeatures],
    standard_features: [...vehicle.standardFeatures],
    specifications: specificationsToJson(specifications),
    parts_compatibility: catalogToJson(catalog),
    total_parts: countParts(catalog),
    parts_categories: Object.keys(catalog),
    maintenance_schedule: maintenanceToJson(maintenanceSchedule),
    common_issues: [...commonIssues],
  };
}

export function searchResultToJson(result: SearchResult) {
  if (!result.success) {
    return {
      success: false,
      ...(result.searchType ? { search_type: result.searchType } : {}),
      error: result.error,
      ...(result.suggestion ? { suggestion: result.suggestion } : {}),
    };
  }
  return {
    success: true,
    search_type: result.searchType,
    data: result.searchType === 'vin' ? vehicleReportToJson(result.data) : engineReportToJson(result.data),
    live_pricing_used: result.livePricingUsed,
  };
}
