import type { ObservationService, SpeciesCountEntry } from "../adapters/types";
import { withRateGate } from "../adapters/rate-limited";
import type { CensusConfig } from "../config";
import { HistogramReconciler } from "../histogram/reconciler";
import type { HistogramFetchOutcome } from "../histogram/reconciler";
import { emptyHistogram } from "../histogram/histogram";
import { loadFilterIds } from "../listing/filter-file";
import { SpeciesListingFetcher } from "../listing/species-fetcher";
import type { Logger } from "../logger";
import { silentLogger } from "../logger";
import type { Clock } from "../rate/clock";
import { RateGate } from "../rate/rate-gate";
import type { RateGateStats } from "../rate/rate-gate";
import { createCsvFileSink } from "../report/csv-file-sink";
import { sortByCount } from "../report/csv";
import type { ReportSink } from "../report/types";
import type { Classification, FinalizedSpeciesRecord, SpeciesRecord } from "../schema";
import { rankLabel } from "../schema";
import { PhylumCache } from "../taxonomy/phylum-cache";
import { TaxonomyClassifier } from "../taxonomy/classifier";

export interface CensusRunOptions {
  config: CensusConfig;
  /**
   * Raw client; the run wraps it in its own gate.
   */
  service: ObservationService;
  logger?: Logger;
  clock?: Clock;
  sink?: ReportSink;
  /**
   * Supply a gate to share one budget across several runs in a process.
   */
  gate?: RateGate;
}

export interface CensusDiagnostics {
  unknownKingdom: number[];
  noHistogram: string[];
  histogramOutcomes: Map<number, HistogramFetchOutcome>;
  gate: RateGateStats;
}

export interface CensusResult {
  /**
   * Sorted by count, descending.
   */
  records: FinalizedSpeciesRecord[];
  output: string;
  diagnostics: CensusDiagnostics;
}

export async function runCensus(options: CensusRunOptions): Promise<CensusResult> {
  const { config } = options;
  const logger = options.logger ?? silentLogger;
  const sink = options.sink ?? createCsvFileSink({ filePath: config.outputPath });
  const gate =
    options.gate ??
    new RateGate({
      callsPerPeriod: config.callsPerPeriod,
      periodSeconds: config.ratePeriodSeconds,
      clock: options.clock,
      logger
    });
  const service = withRateGate(options.service, gate);

  const filterIds = config.filterPath ? await loadFilterIds(config.filterPath, logger) : new Set<number>();

  const classifier = new TaxonomyClassifier({
    phyla: new PhylumCache({ service, maxPages: config.maxPages, pageSize: config.taxaPageSize, logger }),
    logger
  });
  const fetcher = new SpeciesListingFetcher({
    service,
    pageSize: config.pageSize,
    maxPages: config.maxPages,
    logger
  });

  logger.info(`Fetching species counts for place_id=${config.placeId}...`);
  const entries = await fetcher.fetchSpecies({
    placeId: config.placeId,
    qualityGrade: config.qualityGrade,
    filterIds,
    taxonId: config.taxonId
  });
  logger.info(`Total species fetched: ${entries.length}. Processing...`);

  const species = new Map<number, SpeciesRecord>();
  const unknownKingdom = new Set<number>();
  for (const entry of entries) {
    const classification = await classifier.classify(entry.taxon.ancestorIds);
    if (classification.kingdom.status === "unresolved") {
      unknownKingdom.add(entry.taxon.id);
    } else {
      unknownKingdom.delete(entry.taxon.id);
    }
    // Duplicate ids across pages: the later entry replaces the earlier one in place.
    species.set(entry.taxon.id, toRecord(entry, classification));
  }

  if (unknownKingdom.size > 0) {
    logger.warn(`${unknownKingdom.size} species have an unknown kingdom: ${[...unknownKingdom].join(", ")}`);
  }

  logger.info(`Fetching histograms for ${species.size} species...`);
  const reconciler = new HistogramReconciler({ service, logger });
  const reconciled = await reconciler.reconcile([...species.values()], {
    placeId: config.placeId,
    qualityGrade: config.qualityGrade
  });

  const records = sortByCount(reconciled.records);
  await sink.write({ records });

  const gateStats = gate.stats();
  logger.info(`Data collection complete! Results saved to ${sink.location}`);
  logger.info(`Total species: ${records.length} (${gateStats.calls} API calls)`);

  return {
    records,
    output: sink.location,
    diagnostics: {
      unknownKingdom: [...unknownKingdom],
      noHistogram: reconciled.noData,
      histogramOutcomes: reconciled.outcomes,
      gate: gateStats
    }
  };
}

const toRecord = (entry: SpeciesCountEntry, classification: Classification): SpeciesRecord => ({
  taxonId: entry.taxon.id,
  iconicTaxonName: entry.taxon.iconicTaxonName ?? "",
  kingdom: rankLabel(classification.kingdom),
  phylum: rankLabel(classification.phylum),
  commonName: entry.taxon.preferredCommonName ?? "",
  latinName: entry.taxon.name,
  count: entry.count,
  histogram: emptyHistogram()
});
