import { countParts } from '../serializers';
import type { PartsCatalog, SearchResult } from '../types';

const RULE = '='.repeat(60);
const MAX_ALTERNATIVES = 3;

function catalogLines(catalog: PartsCatalog): string[] {
  const lines: string[] = [];
  for (const [category, parts] of Object.entries(catalog)) {
    lines.push('', `${category.replace(/_/g, ' ').toUpperCase()}:`);
    for (const part of Object.values(parts)) {
      lines.push(`  ${part.partName}`);
      if (part.partNumber) lines.push(`    Part number: ${part.partNumber}`);
      if (part.brand) lines.push(`    Brand: ${part.brand}`);
      if (part.priceRangeText) lines.push(`    Price: ${part.priceRangeText}`);
      if (part.maintenanceIntervalText) lines.push(`    Maintenance: ${part.maintenanceIntervalText}`);
      if (part.alternatives.length) {
        lines.push(`    Alternatives: ${part.alternatives.slice(0, MAX_ALTERNATIVES).join(', ')}`);
      }
    }
  }
  return lines;
}

/** Plain-text report for terminal output. */
export function formatSearchResult(result: SearchResult): string {
  if (!result.success) {
    const lines = [`Lookup failed: ${result.error}`];
    if (result.suggestion) lines.push(`Suggestion: ${result.suggestion}`);
    return lines.join('\n');
  }

  const lines: string[] = [RULE];
  if (result.searchType === 'engine_code') {
    const { profile, catalog } = result.data;
    lines.push(
      `ENGINE ${profile.engineCode}`,
      RULE,
      `Displacement: ${profile.displacement}`,
      `Type: ${profile.type}`,
      `Fuel system: ${profile.fuelSystem}`,
      `Power: ${profile.maxPower}`,
      `Torque: ${profile.maxTorque}`,
    );
    for (const v of profile.commonVehicles) lines.push(`Fits: ${v.make} ${v.model} (${v.yearRange})`);
    lines.push(`Total parts: ${countParts(catalog)}`, ...catalogLines(catalog));
  } else {
    const { vehicle, catalog } = result.data;
    lines.push(
      `VIN ${vehicle.vin}`,
      RULE,
      `Vehicle: ${[vehicle.year, vehicle.make, vehicle.model].filter(Boolean).join(' ')}`,
      `Engine: ${vehicle.engine || 'Unknown'}`,
      `Transmission: ${vehicle.transmission || 'Unknown'}`,
      `Total parts: ${countParts(catalog)}`,
      ...catalogLines(catalog),
    );
  }

  if (result.livePricingUsed) lines.push('', 'Includes live pricing results.');
  return lines.join('\n');
}
