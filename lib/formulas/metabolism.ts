// lib/formulas/metabolism.ts

/** Sentinel overshoot when there is no regenerative capacity left. */
export const OVERSHOOT_SENTINEL = 999;

/**
 * regeneration * max (nothing once at max) minus extraction * current * entropy.
 * The caller clamps the result into [0, max].
 */
export function biocapacityDelta(
  regenerationRate: number,
  maxBiocapacity: number,
  current: number,
  extractionIntensity: number,
  entropyFactor: number,
): number {
  const regeneration = current >= maxBiocapacity ? 0 : regenerationRate * maxBiocapacity;
  const extraction = extractionIntensity * current * entropyFactor;
  return regeneration - extraction;
}

export function overshootRatio(consumption: number, biocapacity: number): number {
  if (!(biocapacity > 0)) return OVERSHOOT_SENTINEL;
  return Math.max(0, consumption) / biocapacity;
}
