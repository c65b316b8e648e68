// lib/util/math.ts

export function clamp(x: number, min: number, max: number): number {
  if (Number.isNaN(x)) return min;
  return x < min ? min : x > max ? max : x;
}

export function clamp01(x: number): number {
  if (!Number.isFinite(x)) return x === Infinity ? 1 : 0;
  return Math.max(0, Math.min(1, x));
}

export function clampSigned(x: number): number {
  return clamp(x, -1, 1);
}

/** Population-weighted mean; 0 when the total weight is not positive. */
export function weightedMean(values: readonly number[], weights: readonly number[]): number {
  let num = 0;
  let den = 0;
  for (let i = 0; i < values.length; i++) {
    const w = weights[i] ?? 0;
    num += values[i] * w;
    den += w;
  }
  return den > 0 ? num / den : 0;
}

export function sum(xs: readonly number[]): number {
  let s = 0;
  for (const x of xs) s += x;
  return s;
}
