import type { FinalizedSpeciesRecord } from "../schema";

export const REPORT_COLUMNS = [
  "iconic_taxon_name",
  "kingdom",
  "phylum",
  "common_name",
  "latin_name",
  "taxon_id",
  "count",
  "histogram",
  "peak_month"
] as const;
export type ReportColumn = typeof REPORT_COLUMNS[number];

const LINE_END = "\r\n";

/**
 * Count descending; equal counts keep their incoming order.
 */
export const sortByCount = (records: readonly FinalizedSpeciesRecord[]): FinalizedSpeciesRecord[] =>
  records
    .map((record, index) => ({ record, index }))
    .sort((a, b) => b.record.count - a.record.count || a.index - b.index)
    .map(({ record }) => record);

export const formatHistogram = (histogram: readonly number[]): string => `[${histogram.join(", ")}]`;

export const escapeCsvField = (value: string): string =>
  /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;

const toRow = (record: FinalizedSpeciesRecord): Record<ReportColumn, string> => ({
  iconic_taxon_name: record.iconicTaxonName,
  kingdom: record.kingdom,
  phylum: record.phylum,
  common_name: record.commonName,
  latin_name: record.latinName,
  taxon_id: record.taxonId.toString(),
  count: record.count.toString(),
  histogram: formatHistogram(record.histogram),
  peak_month: record.peakMonth
});

export const renderCsv = (records: readonly FinalizedSpeciesRecord[]): string => {
  const lines = [REPORT_COLUMNS.join(",")];
  for (const record of records) {
    const row = toRow(record);
    lines.push(REPORT_COLUMNS.map((column) => escapeCsvField(row[column])).join(","));
  }
  return lines.join(LINE_END) + LINE_END;
};
