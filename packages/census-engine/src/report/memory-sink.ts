import { renderCsv } from "./csv";
import type { ReportContext, ReportSink } from "./types";

export class MemoryReportSink implements ReportSink {
  readonly location = "memory";
  private readonly writes: ReportContext[] = [];

  async write(context: ReportContext): Promise<void> {
    this.writes.push(context);
  }

  get last(): ReportContext | undefined {
    return this.writes[this.writes.length - 1];
  }

  get csv(): string | undefined {
    const last = this.last;
    return last ? renderCsv(last.records) : undefined;
  }
}

export const createMemoryReportSink = (): MemoryReportSink => new MemoryReportSink();
