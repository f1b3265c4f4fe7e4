import type { KnowledgeBase } from '../knowledgeBase';
import type {
  DecodedVehicle,
  MaintenanceSchedule,
  PartRecord,
  PartsCatalog,
  VehicleSpecifications,
  VehicleTable,
} from '../types';

type VehicleKey = Pick<DecodedVehicle, 'make' | 'model' | 'year'>;

// Keys come from decoded text, so inherited names such as "constructor" must miss.
function own<T>(record: Readonly<Record<string, T>> | undefined, key: string): T | undefined {
  return record && Object.hasOwn(record, key) ? record[key] : undefined;
}

function lookupVehicle<T>(table: Readonly<VehicleTable<T>>, { make, model, year }: VehicleKey): T | undefined {
  return own(own(own(table, make.toUpperCase()), model.toUpperCase()), year);
}

function genericPart(
  partName: string,
  priceRangeText: string,
  maintenanceIntervalText: string,
  { make, model, year }: VehicleKey,
): PartRecord {
  return {
    partName,
    partNumber: 'Generic',
    brand: 'Various',
    priceRangeText,
    compatibilityNotes: `Fits ${year} ${make} ${model}`,
    specifications: {},
    alternatives: [],
    maintenanceIntervalText,
  };
}

/** Placeholder catalog for vehicles without a detailed entry. */
export function genericCatalog(vehicle: VehicleKey): PartsCatalog {
  return {
    engine: {
      air_filter: genericPart('Air Filter', '$10-30', 'Every 15,000 miles', vehicle),
      oil_filter: genericPart('Oil Filter', '$5-20', 'Every 5,000 miles', vehicle),
      spark_plugs: genericPart('Spark Plugs', '$5-15 each', 'Every 60,000 miles', vehicle),
    },
    brakes: {
      brake_pads: genericPart('Brake Pads', '$30-100', 'Every 30,000-50,000 miles', vehicle),
      brake_rotors: genericPart('Brake Rotors', '$50-150 each', 'Every 60,000-80,000 miles', vehicle),
    },
  };
}

const GENERIC_SPECIFICATIONS: VehicleSpecifications = Object.freeze({
  engineDisplacement: 'Varies by engine',
  horsepower: '',
  torque: '',
  fuelCapacity: 'Varies by model',
  oilCapacity: '4-6 quarts',
  transmissionFluidCapacity: '',
  coolantCapacity: '',
  brakeFluidType: 'DOT 3 or DOT 4',
  tireSize: '',
  wheelSize: '',
  weight: '',
  dimensions: Object.freeze({ length: 'Varies', width: 'Varies', height: 'Varies' }),
  towingCapacity: '',
  payloadCapacity: '',
});

/**
 * Catalog lookups for decoded vehicles. A miss at any level of
 * make → model → year degrades to generic data; nothing here throws.
 */
export class PartsEnrichment {
  constructor(private readonly kb: KnowledgeBase) {}

  enrich(vehicle: VehicleKey): PartsCatalog {
    return lookupVehicle(this.kb.vehicleParts, vehicle) ?? genericCatalog(vehicle);
  }

  maintenanceScheduleFor(vehicle: VehicleKey): MaintenanceSchedule {
    return lookupVehicle(this.kb.maintenanceSchedules, vehicle) ?? {};
  }

  specificationsFor(vehicle: VehicleKey & { engine: string }): VehicleSpecifications {
    return own(lookupVehicle(this.kb.vehicleSpecifications, vehicle), vehicle.engine) ?? GENERIC_SPECIFICATIONS;
  }

  commonIssuesFor(vehicle: VehicleKey): readonly string[] {
    return lookupVehicle(this.kb.commonIssues, vehicle) ?? [];
  }
}
