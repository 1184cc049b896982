/** 0.9467 -> "94.7%" */
export function formatPercent(score: number): string {
  return `${(score * 100).toFixed(1)}%`;
}
