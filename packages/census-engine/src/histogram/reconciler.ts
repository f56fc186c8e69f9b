import type { ObservationService, SparseMonthCounts } from "../adapters/types";
import type { Logger } from "../logger";
import { errorMessage, silentLogger } from "../logger";
import type { FinalizedSpeciesRecord, SpeciesRecord } from "../schema";
import { NO_DATA } from "../schema";
import { isEmptyHistogram, peakMonth, toMonthlyHistogram } from "./histogram";

export interface HistogramReconcilerOptions {
  /**
   * Should already be gated.
   */
  service: ObservationService;
  logger?: Logger;
}

export interface HistogramScope {
  placeId: number;
  qualityGrade: string;
}

export type HistogramFetchOutcome = "retrieved" | "empty" | "failed";

export interface ReconcileResult {
  records: FinalizedSpeciesRecord[];
  outcomes: Map<number, HistogramFetchOutcome>;
  /**
   * `<id> - <latin> (K: <kingdom>, P: <phylum>)` for every record left without data.
   */
  noData: string[];
}

export class HistogramReconciler {
  private readonly service: ObservationService;
  private readonly logger: Logger;

  constructor(options: HistogramReconcilerOptions) {
    this.service = options.service;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Backfills every record whose histogram is still all zero, one request per
   * species, then freezes all records with their peak month. Records are
   * returned in the order given.
   */
  async reconcile(records: readonly SpeciesRecord[], scope: HistogramScope): Promise<ReconcileResult> {
    const outcomes = new Map<number, HistogramFetchOutcome>();
    const pending = records.filter((record) => isEmptyHistogram(record.histogram));

    if (pending.length > 0) {
      this.logger.info(`Found ${pending.length} species with empty histograms. Fetching individually...`);
    }
    for (const record of pending) {
      outcomes.set(record.taxonId, await this.backfill(record, scope));
    }

    const finalized: FinalizedSpeciesRecord[] = [];
    const noData: string[] = [];
    for (const record of records) {
      const frozen = finalize(record);
      if (frozen.peakMonth === NO_DATA) {
        noData.push(`${frozen.taxonId} - ${frozen.latinName} (K: ${frozen.kingdom}, P: ${frozen.phylum})`);
      }
      finalized.push(frozen);
    }

    if (noData.length > 0) {
      this.logger.warn(
        [`${noData.length} species still have no histogram data:`, ...noData.map((line) => `  - ${line}`)].join("\n")
      );
    }

    return { records: finalized, outcomes, noData };
  }

  private async backfill(record: SpeciesRecord, scope: HistogramScope): Promise<HistogramFetchOutcome> {
    const label = `${record.latinName} (ID: ${record.taxonId})`;
    this.logger.debug(`Fetching histogram for ${label}...`);

    const counts = await this.fetchCounts(record.taxonId, scope);
    if (!counts) return "failed";

    record.histogram = toMonthlyHistogram(counts);
    if (isEmptyHistogram(record.histogram)) {
      this.logger.warn(`Still no histogram data for ${label}`);
      return "empty";
    }
    this.logger.info(`Successfully retrieved histogram for ${label}`);
    return "retrieved";
  }

  private async fetchCounts(taxonId: number, scope: HistogramScope): Promise<SparseMonthCounts | null> {
    try {
      return await this.service.getHistogram({
        taxonId,
        placeId: scope.placeId,
        qualityGrade: scope.qualityGrade,
        dateField: "observed"
      });
    } catch (error) {
      this.logger.error(`Error fetching histogram for taxon ${taxonId}: ${errorMessage(error)}`);
      return null;
    }
  }
}

const finalize = (record: SpeciesRecord): FinalizedSpeciesRecord =>
  Object.freeze({
    ...record,
    histogram: Object.freeze([...record.histogram]),
    peakMonth: peakMonth(record.histogram)
  });

export const createHistogramReconciler = (options: HistogramReconcilerOptions): HistogramReconciler =>
  new HistogramReconciler(options);
