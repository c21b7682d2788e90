/**
 * Summary statistics over response times.
 */

export interface Stats {
  min: number
  max: number
  mean: number
  p50: number
  p75: number
  p99: number
}

/**
 * Nearest-rank statistics. Empty input yields all zeros.
 */
export function calculateStats(values: ReadonlyArray<number>): Stats {
  if (values.length === 0) {
    return { min: 0, max: 0, mean: 0, p50: 0, p75: 0, p99: 0 }
  }

  const sorted = [...values].sort((a, b) => a - b)
  const at = (quantile: number): number =>
    sorted[Math.min(sorted.length - 1, Math.floor(sorted.length * quantile))] ??
    0

  return {
    min: sorted[0] ?? 0,
    max: sorted[sorted.length - 1] ?? 0,
    mean: values.reduce((a, b) => a + b, 0) / values.length,
    p50: at(0.5),
    p75: at(0.75),
    p99: at(0.99),
  }
}
