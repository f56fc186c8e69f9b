import type { RateGate } from "../rate/rate-gate";
import type {
  HistogramQuery,
  ObservationService,
  Page,
  SparseMonthCounts,
  SpeciesCountEntry,
  SpeciesCountsQuery,
  TaxaQuery,
  TaxonSummary
} from "./types";

/**
 * Routes every call of the wrapped service through one gate, so listing,
 * phylum-table and histogram requests all draw from the same budget.
 */
export class RateLimitedObservationService implements ObservationService {
  constructor(
    private readonly inner: ObservationService,
    private readonly gate: RateGate
  ) {}

  listSpeciesCounts(query: SpeciesCountsQuery): Promise<Page<SpeciesCountEntry>> {
    return this.gate.invoke("get_observation_species_counts", query, () => this.inner.listSpeciesCounts(query));
  }

  listTaxa(query: TaxaQuery): Promise<Page<TaxonSummary>> {
    return this.gate.invoke("get_taxa", query, () => this.inner.listTaxa(query));
  }

  getHistogram(query: HistogramQuery): Promise<SparseMonthCounts> {
    return this.gate.invoke("get_observation_histogram", query, () => this.inner.getHistogram(query));
  }
}

export const withRateGate = (service: ObservationService, gate: RateGate): RateLimitedObservationService =>
  new RateLimitedObservationService(service, gate);
