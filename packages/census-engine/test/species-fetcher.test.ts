import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadFilterIds, parseFilterIds } from "../src/listing/filter-file";
import { SpeciesListingFetcher } from "../src/listing/species-fetcher";
import { FakeObservationService, createRecordingLogger, makeEntry, messagesOf } from "./helpers/fakes";

const request = { placeId: 51347, qualityGrade: "research" };

const idsOf = (entries: { taxon: { id: number } }[]): number[] => entries.map((entry) => entry.taxon.id);

describe("SpeciesListingFetcher", () => {
  it("pages until an empty page and keeps service order", async () => {
    const service = new FakeObservationService();
    service.speciesPages = [
      [makeEntry(3, 10, "C"), makeEntry(1, 8, "A")],
      [makeEntry(2, 4, "B")]
    ];
    const fetcher = new SpeciesListingFetcher({ service, pageSize: 2, maxPages: 10 });

    const entries = await fetcher.fetchSpecies({ ...request, taxonId: 47115 });

    expect(idsOf(entries)).toEqual([3, 1, 2]);
    expect(service.callsTo("listSpeciesCounts").map((call) => call.query)).toEqual([
      { placeId: 51347, qualityGrade: "research", perPage: 2, page: 1, taxonId: 47115 },
      { placeId: 51347, qualityGrade: "research", perPage: 2, page: 2, taxonId: 47115 },
      { placeId: 51347, qualityGrade: "research", perPage: 2, page: 3, taxonId: 47115 }
    ]);
  });

  it("stops at the page ceiling", async () => {
    const service = new FakeObservationService();
    service.speciesPages = [[makeEntry(1, 1, "A")], [makeEntry(2, 1, "B")], [makeEntry(3, 1, "C")]];
    const logger = createRecordingLogger();
    const fetcher = new SpeciesListingFetcher({ service, pageSize: 1, maxPages: 2, logger });

    const entries = await fetcher.fetchSpecies(request);

    expect(idsOf(entries)).toEqual([1, 2]);
    expect(service.callsTo("listSpeciesCounts")).toHaveLength(2);
    expect(messagesOf(logger.info)).toContain("Reached the maximum page limit (2).");
  });

  it("keeps only allow-listed taxa without changing how many pages are read", async () => {
    const service = new FakeObservationService();
    service.speciesPages = [
      [makeEntry(11, 5, "A"), makeEntry(12, 4, "B"), makeEntry(13, 3, "C"), makeEntry(14, 2, "D"), makeEntry(15, 1, "E")],
      [makeEntry(16, 1, "F")],
      []
    ];
    const logger = createRecordingLogger();
    const fetcher = new SpeciesListingFetcher({ service, pageSize: 5, maxPages: 5, logger });

    const entries = await fetcher.fetchSpecies({ ...request, filterIds: new Set([12, 14]) });

    expect(idsOf(entries)).toEqual([12, 14]);
    expect(service.callsTo("listSpeciesCounts")).toHaveLength(3);
    expect(messagesOf(logger.info)).toContain("Fetched page 2 with 1 species (0 after filtering).");
  });

  it("treats an empty filter set as no filter", async () => {
    const service = new FakeObservationService();
    service.speciesPages = [[makeEntry(1, 1, "A"), makeEntry(2, 1, "B")]];
    const fetcher = new SpeciesListingFetcher({ service, pageSize: 5, maxPages: 5 });

    const entries = await fetcher.fetchSpecies({ ...request, filterIds: new Set() });

    expect(idsOf(entries)).toEqual([1, 2]);
  });

  it("propagates a failed page", async () => {
    const service = new FakeObservationService();
    service.speciesPages = [[makeEntry(1, 1, "A")]];
    service.speciesErrors.set(2, new Error("iNaturalist request failed: 429 Too Many Requests"));
    const fetcher = new SpeciesListingFetcher({ service, pageSize: 1, maxPages: 5 });

    await expect(fetcher.fetchSpecies(request)).rejects.toThrow("429 Too Many Requests");
  });
});

describe("filter ids", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "census-filter-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("collects integer cells and skips the rest", () => {
    expect(parseFilterIds(["12a", "45", "", "45"].join("\n"))).toEqual(new Set([45]));
  });

  it("reads ids from a tabular file", async () => {
    const filePath = path.join(dir, "ids.csv");
    await fs.writeFile(filePath, 'taxon_id,label\n47115,Mollusca\n"52742",chiton\n4.5, 7 \n', "utf8");

    await expect(loadFilterIds(filePath)).resolves.toEqual(new Set([47115, 52742, 7]));
  });

  it("falls back to no filtering when the file is missing", async () => {
    const logger = createRecordingLogger();
    const filePath = path.join(dir, "missing.csv");

    const ids = await loadFilterIds(filePath, logger);

    expect(ids.size).toBe(0);
    expect(messagesOf(logger.warn)).toEqual([`Filter file ${filePath} not found; no taxon filtering applied`]);
  });
});
