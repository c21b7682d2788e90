/**
 * Load report rendering.
 */

import type { Logger } from "@todo-probe/client"
import type { LoadReport } from "./load-runner"

export type LoadReportRow = Record<string, string | number>

const ms = (value: number): string => `${value.toFixed(2)} ms`

/**
 * Turn a report into one table row of labelled, formatted values.
 */
export function formatLoadReport(report: LoadReport): LoadReportRow {
  const { responseTimes } = report
  return {
    Requests: report.totalRequests,
    Successful: report.successfulRequests,
    Failed: report.failedRequests,
    "Success rate": `${report.successRate.toFixed(2)}%`,
    Mean: ms(responseTimes.mean),
    Max: ms(responseTimes.max),
    P50: ms(responseTimes.p50),
    P75: ms(responseTimes.p75),
    P99: ms(responseTimes.p99),
    Duration: ms(report.totalDurationMs),
    Throughput: `${report.throughput.toFixed(2)} req/s`,
  }
}

/**
 * One row per operation, keyed by operation name.
 */
export function formatLoadSummary(
  reports: ReadonlyArray<LoadReport>
): Record<string, LoadReportRow> {
  const table: Record<string, LoadReportRow> = {}
  for (const report of reports) {
    table[report.operation] = formatLoadReport(report)
  }
  return table
}

/**
 * Print reports as a table on the console, or line by line on any other
 * logger.
 */
export function printLoadSummary(
  reports: ReadonlyArray<LoadReport>,
  logger: Logger = console
): void {
  const table = formatLoadSummary(reports)

  if (logger === console) {
    console.table(table)
    return
  }

  for (const [operation, row] of Object.entries(table)) {
    const cells = Object.entries(row).map(([label, value]) => `${label}=${value}`)
    logger.info(`[LoadReport] ${operation}: ${cells.join(` `)}`)
  }
}

export function printLoadReport(
  report: LoadReport,
  logger: Logger = console
): void {
  printLoadSummary([report], logger)
}
