/**
 * Display helpers for cell counts
 */

export function toMillions(cells: number): number {
  return cells / 1e6;
}

export function formatMillions(cells: number, digits = 1): string {
  return toMillions(cells).toFixed(digits);
}
