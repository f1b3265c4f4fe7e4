import { describeLookupError } from '../errors';
import type { LookupErrorKind } from '../errors';
import type { KnowledgeBase } from '../knowledgeBase';
import { knownEngineCodes } from '../knowledgeBase';
import { ok } from '../lib/result';
import type { Result } from '../lib/result';
import type { Logger } from '../logger';
import type {
  EngineReport,
  PartRecord,
  PartsCatalog,
  SearchResult,
  SearchType,
  VehicleQuery,
  VehicleReport,
} from '../types';
import { extractEngineCode } from './engineCode';
import { PartsEnrichment } from './partsEnrichment';
import type { PricingClient } from './pricingClient';
import { Resolver } from './resolution';
import type { VinResolutionError } from './resolution';
import type { VinDecodeClient } from './vinDecoder';
import { looksLikeVin } from './vinValidator';

export const LIVE_PARTS_CATEGORY = 'live_parts';

export interface LookupDeps {
  knowledgeBase: KnowledgeBase;
  vinDecoder: VinDecodeClient;
  pricing: PricingClient;
  logger: Logger;
}

/**
 * Decides what kind of search the input is. A 17-character input is a VIN
 * no matter what else it looks like; the length check runs first.
 */
export function classify(input: string, knownCodes: Iterable<string>): SearchType | null {
  const trimmed = input.trim();
  if (looksLikeVin(trimmed)) return 'vin';
  return extractEngineCode(trimmed, knownCodes) ? 'engine_code' : null;
}

/** Returns a new catalog with live records added under their own category. */
export function mergeLiveParts(catalog: PartsCatalog, liveParts: readonly PartRecord[]): PartsCatalog {
  if (liveParts.length === 0) return catalog;
  const live: Record<string, PartRecord> = {};
  liveParts.forEach((part, i) => {
    live[`live_${i}`] = part;
  });
  return { ...catalog, [LIVE_PARTS_CATEGORY]: live };
}

function firstYear(yearRange: string): number | undefined {
  const year = parseInt(yearRange, 10);
  return Number.isNaN(year) ? undefined : year;
}

export class LookupService {
  readonly resolver: Resolver;
  readonly enrichment: PartsEnrichment;
  private readonly knownCodes: string[];

  constructor(private readonly deps: LookupDeps) {
    this.resolver = new Resolver(deps.knowledgeBase, deps.vinDecoder, deps.logger);
    this.enrichment = new PartsEnrichment(deps.knowledgeBase);
    this.knownCodes = knownEngineCodes(deps.knowledgeBase);
  }

  classify(input: string): SearchType | null {
    return classify(input, this.knownCodes);
  }

  toQuery(rawInput: string): VehicleQuery | null {
    const value = rawInput.trim();
    const kind = this.classify(value);
    return kind ? { kind, value } : null;
  }

  async search(rawInput: string): Promise<SearchResult> {
    const query = this.toQuery(rawInput);
    if (!query) return this.failure('InvalidInputFormat', rawInput.trim());
    return query.kind === 'vin' ? this.searchVin(query.value) : this.searchEngine(query.value);
  }

  /** VIN lookup without the live pricing step. */
  async vehicleReport(input: string): Promise<Result<VehicleReport, VinResolutionError>> {
    const resolved = await this.resolver.resolveVin(input.trim().toUpperCase());
    if (!resolved.ok) return resolved;

    const vehicle = resolved.value;
    return ok({
      vehicle,
      catalog: this.enrichment.enrich(vehicle),
      specifications: this.enrichment.specificationsFor(vehicle),
      maintenanceSchedule: this.enrichment.maintenanceScheduleFor(vehicle),
      commonIssues: this.enrichment.commonIssuesFor(vehicle),
    });
  }

  describe(kind: LookupErrorKind, input: string): { error: string; suggestion: string } {
    return describeLookupError({ kind, input }, this.knownCodes);
  }

  private async searchVin(input: string): Promise<SearchResult> {
    const result = await this.vehicleReport(input);
    if (!result.ok) return this.failure(result.error, input, 'vin');

    const report = result.value;
    const { make, model, year, engine } = report.vehicle;
    const liveParts = await this.deps.pricing.search({
      year: firstYear(year),
      make,
      model,
      engine: engine || undefined,
    });

    return {
      success: true,
      searchType: 'vin',
      data: { ...report, catalog: mergeLiveParts(report.catalog, liveParts) },
      livePricingUsed: liveParts.length > 0,
    };
  }

  private async searchEngine(input: string): Promise<SearchResult> {
    const resolved = this.resolver.resolveEngine(input);
    if (!resolved.ok) return this.failure(resolved.error, input, 'engine_code');

    const report: EngineReport = resolved.value;
    const context = report.profile.commonVehicles[0];
    const liveParts = context
      ? await this.deps.pricing.search({
          year: firstYear(context.yearRange),
          make: context.make,
          model: context.model,
          engine: report.profile.engineCode,
          keyword: 'engine parts',
        })
      : [];

    return {
      success: true,
      searchType: 'engine_code',
      data: { ...report, catalog: mergeLiveParts(report.catalog, liveParts) },
      livePricingUsed: liveParts.length > 0,
    };
  }

  private failure(kind: LookupErrorKind, input: string, searchType?: SearchType): SearchResult {
    const { error, suggestion } = this.describe(kind, input);
    this.deps.logger.info(`Lookup failed (${kind})`, { input });
    return searchType ? { success: false, searchType, error, suggestion } : { success: false, error, suggestion };
  }
}
