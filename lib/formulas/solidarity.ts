// lib/formulas/solidarity.ts

/**
 * Consciousness carried from source to target along a solidarity edge.
 * Flows only downhill, from a source above the activation threshold.
 */
export function solidarityTransmission(
  sourceConsciousness: number,
  targetConsciousness: number,
  strength: number,
  activationThreshold: number,
): number {
  if (!(strength > 0)) return 0;
  if (sourceConsciousness <= activationThreshold) return 0;
  const gap = sourceConsciousness - targetConsciousness;
  return gap > 0 ? strength * gap : 0;
}

export function decayEdge(strength: number, rate: number): number {
  return strength * (1 - rate);
}

export function shouldPrune(strength: number, threshold: number): boolean {
  return strength <= threshold;
}
