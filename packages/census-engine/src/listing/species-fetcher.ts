import type { ObservationService, SpeciesCountEntry } from "../adapters/types";
import type { Logger } from "../logger";
import { silentLogger } from "../logger";

export interface SpeciesFetcherOptions {
  /**
   * Should already be gated; every page goes straight to it.
   */
  service: ObservationService;
  pageSize: number;
  maxPages: number;
  logger?: Logger;
}

export interface SpeciesListingRequest {
  placeId: number;
  qualityGrade: string;
  /**
   * Allow-list of taxon ids; empty or absent means keep everything.
   */
  filterIds?: ReadonlySet<number>;
  taxonId?: number;
}

export class SpeciesListingFetcher {
  private readonly service: ObservationService;
  private readonly pageSize: number;
  private readonly maxPages: number;
  private readonly logger: Logger;

  constructor(options: SpeciesFetcherOptions) {
    this.service = options.service;
    this.pageSize = options.pageSize;
    this.maxPages = options.maxPages;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Page errors propagate. Paging and termination look at the unfiltered
   * page, so a filter never changes how many pages are requested.
   */
  async fetchSpecies(request: SpeciesListingRequest): Promise<SpeciesCountEntry[]> {
    const filter = request.filterIds && request.filterIds.size > 0 ? request.filterIds : undefined;
    const collected: SpeciesCountEntry[] = [];

    for (let page = 1; ; page += 1) {
      const response = await this.service.listSpeciesCounts({
        placeId: request.placeId,
        qualityGrade: request.qualityGrade,
        perPage: this.pageSize,
        page,
        taxonId: request.taxonId
      });

      if (response.results.length === 0) {
        this.logger.info("No more results found.");
        break;
      }

      const kept = filter ? response.results.filter((entry) => filter.has(entry.taxon.id)) : response.results;
      collected.push(...kept);
      this.logger.info(
        filter
          ? `Fetched page ${page} with ${response.results.length} species (${kept.length} after filtering).`
          : `Fetched page ${page} with ${kept.length} species.`
      );

      if (page >= this.maxPages) {
        this.logger.info(`Reached the maximum page limit (${this.maxPages}).`);
        break;
      }
    }

    return collected;
  }
}

export const createSpeciesListingFetcher = (options: SpeciesFetcherOptions): SpeciesListingFetcher =>
  new SpeciesListingFetcher(options);
