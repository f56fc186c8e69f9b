import { z } from "zod";
import { ConfigError } from "./errors";
import { QUALITY_GRADES } from "./schema";

export const DEFAULT_INAT_BASE_URL = "https://api.inaturalist.org/v1";

// Priority: explicit overrides (CLI flags) → CENSUS_* env vars → defaults.

const positiveInt = z.coerce.number().int().positive();

export const censusConfigSchema = z.object({
  callsPerPeriod: positiveInt.default(60),
  ratePeriodSeconds: z.coerce.number().positive().default(60),
  pageSize: positiveInt.default(5),
  taxaPageSize: positiveInt.default(100),
  maxPages: positiveInt.default(2),
  placeId: positiveInt.default(51347),
  qualityGrade: z.enum(QUALITY_GRADES).default("research"),
  outputPath: z.string().min(1).default("inat_species_summary.csv"),
  filterPath: z.string().min(1).optional(),
  taxonId: positiveInt.optional(),
  baseUrl: z.string().url().default(DEFAULT_INAT_BASE_URL)
});

export type CensusConfig = z.output<typeof censusConfigSchema>;
export type CensusConfigInput = z.input<typeof censusConfigSchema>;

const ENV_KEYS: Record<keyof CensusConfig, string> = {
  callsPerPeriod: "CENSUS_CALLS",
  ratePeriodSeconds: "CENSUS_RATE_PERIOD",
  pageSize: "CENSUS_PAGE_SIZE",
  taxaPageSize: "CENSUS_TAXA_PAGE_SIZE",
  maxPages: "CENSUS_MAX_PAGES",
  placeId: "CENSUS_PLACE_ID",
  qualityGrade: "CENSUS_QUALITY_GRADE",
  outputPath: "CENSUS_OUTPUT",
  filterPath: "CENSUS_FILTER_FILE",
  taxonId: "CENSUS_TAXON_ID",
  baseUrl: "CENSUS_INAT_BASE_URL"
};

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<Record<keyof CensusConfig, string | number | undefined>>;
}

export function loadConfig(options: LoadConfigOptions = {}): CensusConfig {
  const env = options.env ?? process.env;
  const raw: Record<string, string | number> = {};

  for (const [key, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey]?.trim();
    if (value) raw[key] = value;
  }
  for (const [key, value] of Object.entries(options.overrides ?? {})) {
    if (value !== undefined && value !== "") raw[key] = value;
  }

  const parsed = censusConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
    );
  }
  return parsed.data;
}
