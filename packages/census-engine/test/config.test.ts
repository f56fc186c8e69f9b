import { describe, expect, it } from "vitest";
import { DEFAULT_INAT_BASE_URL, loadConfig } from "../src/config";
import { ConfigError } from "../src/errors";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({ env: {} })).toEqual({
      callsPerPeriod: 60,
      ratePeriodSeconds: 60,
      pageSize: 5,
      taxaPageSize: 100,
      maxPages: 2,
      placeId: 51347,
      qualityGrade: "research",
      outputPath: "inat_species_summary.csv",
      baseUrl: DEFAULT_INAT_BASE_URL
    });
  });

  it("reads CENSUS_* variables and lets overrides win", () => {
    const config = loadConfig({
      env: { CENSUS_MAX_PAGES: "4", CENSUS_PLACE_ID: "97394", CENSUS_FILTER_FILE: "ids.csv", CENSUS_CALLS: " " },
      overrides: { maxPages: "7", outputPath: undefined }
    });

    expect(config.maxPages).toBe(7);
    expect(config.placeId).toBe(97394);
    expect(config.filterPath).toBe("ids.csv");
    expect(config.callsPerPeriod).toBe(60);
    expect(config.outputPath).toBe("inat_species_summary.csv");
  });

  it("reports every invalid option", () => {
    let caught: unknown;
    try {
      loadConfig({ env: { CENSUS_MAX_PAGES: "0" }, overrides: { qualityGrade: "best" } });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    const issues = caught instanceof ConfigError ? caught.issues : [];
    expect(issues).toHaveLength(2);
    expect(issues[0]).toMatch(/^maxPages: /);
    expect(issues[1]).toMatch(/^qualityGrade: /);
  });
});
