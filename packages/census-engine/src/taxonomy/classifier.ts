import type { Logger } from "../logger";
import { errorMessage, silentLogger } from "../logger";
import type { Classification, RankResolution } from "../schema";
import { KINGDOMS, KINGDOM_ANCESTOR_INDEX, PHYLUM_ANCESTOR_INDEX } from "./kingdoms";
import type { PhylumCache } from "./phylum-cache";

export interface TaxonomyClassifierOptions {
  phyla: PhylumCache;
  kingdoms?: ReadonlyMap<number, string>;
  logger?: Logger;
}

const UNRESOLVED_BY_ERROR: Classification = {
  kingdom: { status: "unresolved", reason: "error" },
  phylum: { status: "unresolved", reason: "error" }
};

export class TaxonomyClassifier {
  private readonly phyla: PhylumCache;
  private readonly kingdoms: ReadonlyMap<number, string>;
  private readonly logger: Logger;

  constructor(options: TaxonomyClassifierOptions) {
    this.phyla = options.phyla;
    this.kingdoms = options.kingdoms ?? KINGDOMS;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Never rejects: any failure degrades both ranks to unresolved.
   */
  async classify(ancestorIds: readonly number[]): Promise<Classification> {
    try {
      const kingdom = this.resolve(ancestorIds, KINGDOM_ANCESTOR_INDEX, (id) => this.kingdoms.get(id));

      let phylum: RankResolution = { status: "unresolved", reason: "missing_ancestor" };
      if (ancestorIds.length > PHYLUM_ANCESTOR_INDEX) {
        await this.phyla.ensurePopulated();
        phylum = this.resolve(ancestorIds, PHYLUM_ANCESTOR_INDEX, (id) => this.phyla.lookup(id));
      }

      return { kingdom, phylum };
    } catch (error) {
      this.logger.error(`Error extracting taxonomy: ${errorMessage(error)}`);
      return UNRESOLVED_BY_ERROR;
    }
  }

  private resolve(
    ancestorIds: readonly number[],
    index: number,
    lookup: (id: number) => string | undefined
  ): RankResolution {
    if (ancestorIds.length <= index) {
      return { status: "unresolved", reason: "missing_ancestor" };
    }
    const id = ancestorIds[index];
    if (typeof id !== "number" || !Number.isInteger(id)) {
      throw new Error(`ancestor id at position ${index} is not an integer: ${String(id)}`);
    }
    const name = lookup(id);
    return name ? { status: "resolved", name } : { status: "unresolved", reason: "unknown_id" };
  }
}

export const createTaxonomyClassifier = (options: TaxonomyClassifierOptions): TaxonomyClassifier =>
  new TaxonomyClassifier(options);
