import type { BatchReport } from "@portwarden/core";
import type { IOutputService } from "../interfaces";

/**
 * Print the success/failure tally of a batch and return the exit code.
 */
export function printBatchSummary<T>(output: IOutputService, report: BatchReport<T>, noun = "VM"): number {
  output.section("Summary");
  for (const result of report.results) {
    if (result.ok) {
      output.success(result.label);
    } else {
      output.error(`${result.label}: ${result.reason}`);
    }
  }
  output.newline();
  output.info(`${report.succeeded} ${noun}(s) succeeded, ${report.failed} failed`);
  return report.failed > 0 ? 1 : 0;
}
