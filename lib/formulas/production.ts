// lib/formulas/production.ts

/** Value a block of workers adds in one tick; nothing grows on dead land. */
export function producedValue(
  laborPowerPerYear: number,
  ticksPerYear: number,
  population: number,
  biocapacity: number,
  maxBiocapacity: number,
): number {
  if (!(maxBiocapacity > 0) || !(ticksPerYear > 0)) return 0;
  return (laborPowerPerYear / ticksPerYear) * population * (biocapacity / maxBiocapacity);
}

/** Share of a territory's capacity worked this tick, capped at 1. */
export function extractionIntensity(production: number, maxBiocapacity: number): number {
  if (!(maxBiocapacity > 0)) return 0;
  return Math.min(1, Math.max(0, production) / maxBiocapacity);
}
