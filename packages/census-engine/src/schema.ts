/**
 * Core record shapes shared by the census pipeline. A species record is built
 * from one listing entry, enriched with taxonomy, and frozen once its peak
 * month has been derived.
 */

export const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December"
] as const;
export type MonthName = typeof MONTH_NAMES[number];

export const UNKNOWN_RANK = "Unknown";
export const NO_DATA = "No data";

export type PeakMonth = MonthName | typeof NO_DATA;

export const QUALITY_GRADES = ["research", "needs_id", "casual"] as const;
export type QualityGrade = typeof QUALITY_GRADES[number];

/**
 * Twelve monthly buckets, index 0 = January. Order is calendar order and is
 * never rearranged.
 */
export type MonthlyHistogram = number[];

export type RankResolution =
  | { status: "resolved"; name: string }
  | { status: "unresolved"; reason: "missing_ancestor" | "unknown_id" | "error" };

export interface Classification {
  kingdom: RankResolution;
  phylum: RankResolution;
}

export interface SpeciesRecord {
  taxonId: number;
  iconicTaxonName: string;
  kingdom: string;
  phylum: string;
  commonName: string;
  latinName: string;
  count: number;
  histogram: MonthlyHistogram;
}

export interface FinalizedSpeciesRecord extends Readonly<Omit<SpeciesRecord, "histogram">> {
  readonly histogram: readonly number[];
  readonly peakMonth: PeakMonth;
}

export const rankLabel = (resolution: RankResolution): string =>
  resolution.status === "resolved" ? resolution.name : UNKNOWN_RANK;
