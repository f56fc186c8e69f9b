import type { ObservationService } from "../adapters/types";
import type { Logger } from "../logger";
import { errorMessage, silentLogger } from "../logger";
import { PHYLUM_RANK_LEVEL } from "./kingdoms";

export interface PhylumCacheOptions {
  /**
   * Should already be gated; the cache issues its page requests directly.
   */
  service: ObservationService;
  maxPages: number;
  pageSize: number;
  logger?: Logger;
}

/**
 * Phylum id → name table, filled on first use from every rank-60 taxon the
 * service lists. Population runs at most once per instance; whatever it
 * collected (possibly nothing) is the table for the rest of the run.
 */
export class PhylumCache {
  private readonly entries = new Map<number, string>();
  private readonly service: ObservationService;
  private readonly maxPages: number;
  private readonly pageSize: number;
  private readonly logger: Logger;
  private population: Promise<ReadonlyMap<number, string>> | null = null;

  constructor(options: PhylumCacheOptions) {
    this.service = options.service;
    this.maxPages = options.maxPages;
    this.pageSize = options.pageSize;
    this.logger = options.logger ?? silentLogger;
  }

  lookup(taxonId: number): string | undefined {
    return this.entries.get(taxonId);
  }

  ensurePopulated(): Promise<ReadonlyMap<number, string>> {
    if (!this.population) {
      this.population = this.populate();
    }
    return this.population;
  }

  private async populate(): Promise<ReadonlyMap<number, string>> {
    let lastPageSize = 0;
    let page = 1;
    try {
      for (; page <= this.maxPages; page += 1) {
        const response = await this.service.listTaxa({
          rankLevel: PHYLUM_RANK_LEVEL,
          perPage: this.pageSize,
          page
        });
        lastPageSize = response.results.length;
        if (lastPageSize === 0) break;
        for (const taxon of response.results) {
          this.entries.set(taxon.id, taxon.name);
        }
      }
    } catch (error) {
      this.logger.error(
        `Phylum table fetch failed on page ${page}, keeping ${this.entries.size} phyla: ${errorMessage(error)}`
      );
      return this.entries;
    }

    // The server may cap a page below pageSize, so any non-empty last page at the ceiling counts.
    if (page > this.maxPages && lastPageSize > 0) {
      this.logger.warn(
        `Phylum table stopped at the ${this.maxPages}-page limit; phyla beyond ${this.entries.size} resolve to Unknown`
      );
    }
    this.logger.info(`Loaded ${this.entries.size} phyla`);
    return this.entries;
  }
}

export const createPhylumCache = (options: PhylumCacheOptions): PhylumCache => new PhylumCache(options);
