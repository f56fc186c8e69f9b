import type { FinalizedSpeciesRecord } from "../schema";

export interface ReportContext {
  /**
   * Already sorted for output.
   */
  records: readonly FinalizedSpeciesRecord[];
}

export interface ReportSink {
  /**
   * Where the report ends up, for logging.
   */
  readonly location: string;
  write(context: ReportContext): Promise<void>;
}
