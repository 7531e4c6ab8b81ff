import type { ReportState, ReportSummary } from "../../../shared/src/contracts";
import type { SmokeOutput } from "./output";

export const REPORT_SEPARATOR = "=".repeat(40);

export function summarize(state: ReportState): ReportSummary {
  const total = state.ok_count + state.fail_count;
  if (state.fail_count === 0) {
    return { ...state, total, exit_code: 0, line: `OK (${state.ok_count}/${total})` };
  }
  return {
    ...state,
    total,
    exit_code: 1,
    line: `FAILED (${state.fail_count} failed of ${total})`
  };
}

export function printReport(output: SmokeOutput, summary: ReportSummary): void {
  output.line(REPORT_SEPARATOR);
  output.line(summary.line);
}
