import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CsvFileSink } from "../src/report/csv-file-sink";
import { escapeCsvField, renderCsv, sortByCount } from "../src/report/csv";
import { makeFinalized } from "./helpers/fakes";

const HEADER = "iconic_taxon_name,kingdom,phylum,common_name,latin_name,taxon_id,count,histogram,peak_month";

const chiton = makeFinalized({
  taxonId: 1001,
  iconicTaxonName: "Mollusca",
  commonName: "Black leather chiton",
  latinName: "Katharina tunicata",
  count: 12,
  histogram: [0, 0, 5, 5, 0, 0, 0, 0, 0, 0, 0, 2],
  peakMonth: "March"
});

describe("sortByCount", () => {
  it("orders by count descending and keeps listing order on ties", () => {
    const records = [
      makeFinalized({ taxonId: 1, latinName: "A", count: 3 }),
      makeFinalized({ taxonId: 2, latinName: "B", count: 7 }),
      makeFinalized({ taxonId: 3, latinName: "C", count: 7 }),
      makeFinalized({ taxonId: 4, latinName: "D", count: 1 })
    ];

    expect(sortByCount(records).map((record) => record.latinName)).toEqual(["B", "C", "A", "D"]);
  });
});

describe("renderCsv", () => {
  it("writes the header and one row per record with the histogram in calendar order", () => {
    expect(renderCsv([chiton])).toBe(
      `${HEADER}\r\n` +
        'Mollusca,Animalia,Mollusca,Black leather chiton,Katharina tunicata,1001,12,"[0, 0, 5, 5, 0, 0, 0, 0, 0, 0, 0, 2]",March\r\n'
    );
  });

  it("writes just the header when there are no records", () => {
    expect(renderCsv([])).toBe(`${HEADER}\r\n`);
  });

  it("quotes fields containing separators or quotes", () => {
    expect(escapeCsvField('Sea "star", ochre')).toBe('"Sea ""star"", ochre"');
    expect(escapeCsvField("Ochre sea star")).toBe("Ochre sea star");
  });
});

describe("CsvFileSink", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "census-report-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("creates missing directories and writes the rendered report", async () => {
    const filePath = path.join(dir, "reports", "summary.csv");
    const sink = new CsvFileSink({ filePath });

    await sink.write({ records: [chiton] });

    await expect(fs.readFile(filePath, "utf8")).resolves.toBe(renderCsv([chiton]));
    expect(sink.location).toBe(filePath);
  });
});
