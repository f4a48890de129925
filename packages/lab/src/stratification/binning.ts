/**
 * Quantile binning of continuous values into strata
 */

/**
 * Linear-interpolated quantile of an ascending array
 */
export function quantile(sorted: readonly number[], q: number): number {
  if (sorted.length === 0) {
    return Number.NaN;
  }
  const position = q * (sorted.length - 1);
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const lowValue = sorted[lower] ?? Number.NaN;
  const highValue = sorted[upper] ?? Number.NaN;
  return lowValue + (highValue - lowValue) * (position - lower);
}

/**
 * Interior bin edges (binCount - 1 of them, duplicates dropped)
 */
export function quantileEdges(values: readonly number[], binCount: number): number[] {
  const sorted = values.filter((value) => Number.isFinite(value)).sort((a, b) => a - b);
  const edges: number[] = [];
  for (let i = 1; i < binCount; i++) {
    const edge = quantile(sorted, i / binCount);
    if (Number.isFinite(edge) && edges[edges.length - 1] !== edge) {
      edges.push(edge);
    }
  }
  return edges;
}

/**
 * Bin index for each value: number of edges strictly below it.
 * Missing or non-finite values land in their own `null` stratum.
 */
export function valuesToBins(values: readonly (number | null)[], binCount: number): Array<number | null> {
  const present = values.filter((value): value is number => value !== null);
  const edges = quantileEdges(present, binCount);
  return values.map((value) => {
    if (value === null || !Number.isFinite(value)) {
      return null;
    }
    return edges.filter((edge) => value > edge).length;
  });
}
