import { parseArgs } from "node:util";
import { createInatClient } from "../adapters/inat.js";
import { loadConfig } from "../config.js";
import type { CensusConfig } from "../config.js";
import { ConfigError } from "../errors.js";
import { createConsoleLogger, errorMessage } from "../logger.js";
import { runCensus } from "../pipeline/census-run.js";

type RunnerOutput =
  | {
      ok: true;
      output: string;
      species: number;
      noHistogram: number;
      unknownKingdom: number;
    }
  | {
      ok: false;
      error: string;
      issues?: string[];
    };

const USAGE = `Usage: census [options]

  --output <path>           CSV report path (default inat_species_summary.csv)
  --max-pages <n>           page ceiling for listing and phylum table (default 2)
  --page-size <n>           species per listing page (default 5)
  --taxa-page-size <n>      taxa per phylum-table page (default 100)
  --place-id <id>           iNaturalist place id (default 51347)
  --quality-grade <grade>   research | needs_id | casual (default research)
  --taxon-id <id>           restrict the listing to one taxon's descendants
  --filter-file <path>      file of taxon ids to keep
  --calls <n>               calls allowed per rate period (default 60)
  --rate-period <seconds>   rate window length (default 60)
  --base-url <url>          API base URL
  --verbose                 log debug output
  --help                    show this text
`;

function writeOutput(payload: RunnerOutput): void {
  const stream = payload.ok ? process.stdout : process.stderr;
  stream.write(`${JSON.stringify(payload)}\n`);
}

function parseCliConfig(argv: string[]): { config: CensusConfig; verbose: boolean } | null {
  const { values } = parseArgs({
    args: argv,
    options: {
      output: { type: "string" },
      "max-pages": { type: "string" },
      "page-size": { type: "string" },
      "taxa-page-size": { type: "string" },
      "place-id": { type: "string" },
      "quality-grade": { type: "string" },
      "taxon-id": { type: "string" },
      "filter-file": { type: "string" },
      calls: { type: "string" },
      "rate-period": { type: "string" },
      "base-url": { type: "string" },
      verbose: { type: "boolean", default: false },
      help: { type: "boolean", default: false }
    },
    strict: true
  });

  if (values.help) {
    process.stdout.write(USAGE);
    return null;
  }

  const config = loadConfig({
    overrides: {
      outputPath: values.output,
      maxPages: values["max-pages"],
      pageSize: values["page-size"],
      taxaPageSize: values["taxa-page-size"],
      placeId: values["place-id"],
      qualityGrade: values["quality-grade"],
      taxonId: values["taxon-id"],
      filterPath: values["filter-file"],
      callsPerPeriod: values.calls,
      ratePeriodSeconds: values["rate-period"],
      baseUrl: values["base-url"]
    }
  });
  return { config, verbose: values.verbose === true };
}

async function main(): Promise<void> {
  let parsed: ReturnType<typeof parseCliConfig>;
  try {
    parsed = parseCliConfig(process.argv.slice(2));
  } catch (error) {
    writeOutput({
      ok: false,
      error: errorMessage(error),
      issues: error instanceof ConfigError ? error.issues : undefined
    });
    process.exitCode = 1;
    return;
  }
  if (!parsed) return;

  const { config, verbose } = parsed;
  const logger = createConsoleLogger({ level: verbose ? "debug" : "info", stderrOnly: true });
  const result = await runCensus({
    config,
    service: createInatClient({ baseUrl: config.baseUrl }),
    logger
  });

  writeOutput({
    ok: true,
    output: result.output,
    species: result.records.length,
    noHistogram: result.diagnostics.noHistogram.length,
    unknownKingdom: result.diagnostics.unknownKingdom.length
  });
}

main().catch((error: unknown) => {
  writeOutput({ ok: false, error: errorMessage(error) });
  process.exitCode = 1;
});
