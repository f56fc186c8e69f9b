import { promises as fs } from "fs";
import path from "path";
import { renderCsv } from "./csv";
import type { ReportContext, ReportSink } from "./types";

export interface CsvFileSinkOptions {
  filePath: string;
}

export class CsvFileSink implements ReportSink {
  readonly location: string;

  constructor(options: CsvFileSinkOptions) {
    this.location = options.filePath;
  }

  async write({ records }: ReportContext): Promise<void> {
    await fs.mkdir(path.dirname(path.resolve(this.location)), { recursive: true });
    await fs.writeFile(this.location, renderCsv(records), "utf8");
  }
}

export const createCsvFileSink = (options: CsvFileSinkOptions): CsvFileSink => new CsvFileSink(options);
