import { z } from "zod";
import { DEFAULT_INAT_BASE_URL } from "../config";
import { InatRequestError } from "../errors";
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

const DEFAULT_USER_AGENT = "SpeciesCensus/0.1.0";

export interface InatClientOptions {
  baseUrl?: string;
  userAgent?: string;
  fetchImpl?: typeof fetch;
  signal?: AbortSignal;
}

const pageEnvelope = {
  total_results: z.number().int().nonnegative().optional(),
  page: z.number().int().optional(),
  per_page: z.number().int().optional()
};

const speciesCountsSchema = z.object({
  ...pageEnvelope,
  results: z.array(
    z.object({
      count: z.number().int().nonnegative(),
      taxon: z.object({
        id: z.number().int(),
        name: z.string().min(1),
        preferred_common_name: z.string().nullish(),
        iconic_taxon_name: z.string().nullish(),
        ancestor_ids: z.array(z.number().int()).nullish()
      })
    })
  )
});

const taxaSchema = z.object({
  ...pageEnvelope,
  results: z.array(
    z.object({
      id: z.number().int(),
      name: z.string()
    })
  )
});

const histogramSchema = z.object({
  results: z.object({
    month_of_year: z.record(z.number().int().nonnegative()).default({})
  })
});

export class InatObservationClient implements ObservationService {
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly fetchImpl: typeof fetch;
  private readonly signal?: AbortSignal;

  constructor(options: InatClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_INAT_BASE_URL).replace(/\/+$/, "");
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.fetchImpl = options.fetchImpl ?? globalFetch();
    this.signal = options.signal;
  }

  async listSpeciesCounts(query: SpeciesCountsQuery): Promise<Page<SpeciesCountEntry>> {
    const url = this.buildUrl("/observations/species_counts", {
      place_id: query.placeId,
      quality_grade: query.qualityGrade,
      per_page: query.perPage,
      page: query.page,
      taxon_id: query.taxonId
    });
    const body = await this.getJson(url, speciesCountsSchema);
    return {
      totalResults: body.total_results,
      page: body.page,
      perPage: body.per_page,
      results: body.results.map((entry) => ({
        count: entry.count,
        taxon: {
          id: entry.taxon.id,
          name: entry.taxon.name,
          preferredCommonName: entry.taxon.preferred_common_name ?? undefined,
          iconicTaxonName: entry.taxon.iconic_taxon_name ?? undefined,
          ancestorIds: entry.taxon.ancestor_ids ?? []
        }
      }))
    };
  }

  async listTaxa(query: TaxaQuery): Promise<Page<TaxonSummary>> {
    const url = this.buildUrl("/taxa", {
      rank_level: query.rankLevel,
      per_page: query.perPage,
      page: query.page
    });
    const body = await this.getJson(url, taxaSchema);
    return {
      totalResults: body.total_results,
      page: body.page,
      perPage: body.per_page,
      results: body.results.map((taxon) => ({ id: taxon.id, name: taxon.name }))
    };
  }

  async getHistogram(query: HistogramQuery): Promise<SparseMonthCounts> {
    const url = this.buildUrl("/observations/histogram", {
      taxon_id: query.taxonId,
      place_id: query.placeId,
      quality_grade: query.qualityGrade,
      date_field: query.dateField,
      interval: "month_of_year"
    });
    const body = await this.getJson(url, histogramSchema);
    return body.results.month_of_year;
  }

  private async getJson<TSchema extends z.ZodTypeAny>(url: string, schema: TSchema): Promise<z.output<TSchema>> {
    const response = await this.fetchImpl(url, {
      signal: this.signal,
      headers: {
        Accept: "application/json",
        "User-Agent": this.userAgent
      }
    });
    if (!response.ok) {
      throw new InatRequestError(
        `iNaturalist request failed: ${response.status} ${response.statusText}`,
        url,
        response.status
      );
    }

    const parsed = schema.safeParse(await response.json());
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown issue";
      throw new InatRequestError(`iNaturalist response did not match the expected shape (${where})`, url, response.status);
    }
    return parsed.data;
  }

  private buildUrl(path: string, params: Record<string, string | number | undefined>): string {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        url.searchParams.set(key, value.toString());
      }
    }
    return url.toString();
  }
}

function globalFetch(): typeof fetch {
  if (typeof fetch !== "function") {
    throw new Error("Global fetch is not available; pass fetchImpl explicitly");
  }
  return fetch.bind(globalThis);
}

export const createInatClient = (options?: InatClientOptions): InatObservationClient => new InatObservationClient(options);
