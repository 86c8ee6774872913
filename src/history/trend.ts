export interface TrendPoint {
  /** Epoch ms */
  t: number;
  value: number;
}

/**
 * Ordinary least-squares slope of value over time, in units per hour.
 * Needs at least two points spread over a non-zero time span.
 */
export function slopePerHour(points: readonly TrendPoint[]): number | null {
  if (points.length < 2) return null;

  const t0 = points[0].t;
  const xs = points.map((p) => (p.t - t0) / 3_600_000);
  const ys = points.map((p) => p.value);
  const n = points.length;
  const meanX = xs.reduce((a, b) => a + b, 0) / n;
  const meanY = ys.reduce((a, b) => a + b, 0) / n;

  let num = 0;
  let den = 0;
  for (let i = 0; i < n; i++) {
    num += (xs[i] - meanX) * (ys[i] - meanY);
    den += (xs[i] - meanX) ** 2;
  }
  if (den === 0) return null;
  return num / den;
}
