/**
 * Clamp a value to a range [min, max]
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(value, max));
}

export function clamp01(value: number): number {
  return clamp(value, 0, 1);
}

/**
 * Linear interpolation from a (t = 0) to b (t = 1)
 */
export function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}
