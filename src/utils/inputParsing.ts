/**
 * Input parsing utilities - consistent handling of numeric settings
 */

/**
 * Parse a float, falling back when the input is missing, NaN or Infinity
 */
export function parseNumberOr(input: string | undefined, fallback: number): number {
  if (input === undefined || input.trim() === '') return fallback;
  const value = parseFloat(input.trim());
  return Number.isFinite(value) ? value : fallback;
}

/**
 * Parse an integer, falling back when the input is missing or not finite
 */
export function parseIntOr(input: string | undefined, fallback: number): number {
  if (input === undefined || input.trim() === '') return fallback;
  const value = parseInt(input.trim(), 10);
  return Number.isFinite(value) ? value : fallback;
}

/**
 * Clamp a value into [min, max]
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Value of an edited text field once committed: parsed and clamped, or the
 * current value when the text is not a number
 */
export function commitNumberText(text: string, current: number, range: readonly [min: number, max: number]): number {
  return clamp(parseNumberOr(text, current), range[0], range[1]);
}

/**
 * Evenly spaced values from start to stop inclusive
 */
export function linspace(start: number, stop: number, count: number): number[] {
  if (count <= 1) return [start];
  const step = (stop - start) / (count - 1);
  return Array.from({ length: count }, (_, i) => (i === count - 1 ? stop : start + i * step));
}
