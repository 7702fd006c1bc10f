/**
 * Reporting boundary.
 *
 * Rendering documents or sending results is the job of whatever Reporter a
 * caller plugs in. The shipped one writes a text summary to the logger.
 */

import { summarizeComparison, type ComparisonResult } from "../comparison/index.js";
import type { Logger } from "../logging/index.js";

/** Labelled image paths, e.g. `{ "Energy Spectrum": "/tmp/spectrum.png" }` */
export type ReportImages = Readonly<Record<string, string>>;

export interface Reporter {
  report(result: ComparisonResult, images: ReportImages): Promise<void>;
}

export class LogReporter implements Reporter {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child("report");
  }

  async report(result: ComparisonResult, images: ReportImages): Promise<void> {
    for (const line of summarizeComparison(result).split("\n")) {
      this.logger.info(line);
    }
    for (const [label, path] of Object.entries(images)) {
      this.logger.info(`Image ${label}: ${path}`);
    }
  }
}
