export interface SpeciesCountsQuery {
  placeId: number;
  qualityGrade: string;
  perPage: number;
  page: number;
  /**
   * Restrict the listing to descendants of this taxon.
   */
  taxonId?: number;
}

export interface TaxaQuery {
  rankLevel: number;
  perPage: number;
  page: number;
}

export interface HistogramQuery {
  taxonId: number;
  placeId: number;
  qualityGrade: string;
  dateField: "observed" | "created";
}

export interface ListingTaxon {
  id: number;
  name: string;
  preferredCommonName?: string;
  iconicTaxonName?: string;
  ancestorIds: number[];
}

export interface SpeciesCountEntry {
  count: number;
  taxon: ListingTaxon;
}

export interface TaxonSummary {
  id: number;
  name: string;
}

export interface Page<TItem> {
  totalResults?: number;
  page?: number;
  perPage?: number;
  results: TItem[];
}

/**
 * Sparse month-of-year counts keyed by 1-indexed month number ("1" = January).
 */
export type SparseMonthCounts = Record<string, number>;

/**
 * The three remote operations the census consumes.
 */
export interface ObservationService {
  listSpeciesCounts(query: SpeciesCountsQuery): Promise<Page<SpeciesCountEntry>>;
  listTaxa(query: TaxaQuery): Promise<Page<TaxonSummary>>;
  getHistogram(query: HistogramQuery): Promise<SparseMonthCounts>;
}
