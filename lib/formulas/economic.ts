// lib/formulas/economic.ts
// Value-transfer calculus: imperial rent, exchange ratios, labor aristocracy.

import { clamp01 } from '../util/math';

/** Returned by guarded divisions whose denominator is not positive. */
export const DIVISION_SENTINEL = 0;

/**
 * Imperial rent extracted from a periphery class.
 * Only positive (liberation-leaning) consciousness resists extraction.
 * Domain: alpha in [0,1], wages >= 0. Range: [0, alpha * wages].
 */
export function imperialRent(alpha: number, wages: number, consciousness: number): number {
  const a = clamp01(alpha);
  const w = Math.max(0, wages);
  const resistance = clamp01(consciousness);
  return a * w * (1 - resistance);
}

/** Wc / Vc: wages received per unit of value produced. */
export function laborAristocracyRatio(coreWages: number, valueProduced: number): number {
  if (!(valueProduced > 0)) return DIVISION_SENTINEL;
  return Math.max(0, coreWages) / valueProduced;
}

export function isLaborAristocracy(coreWages: number, valueProduced: number): boolean {
  return laborAristocracyRatio(coreWages, valueProduced) > 1;
}

/** (Lp / Lc) * (Wc / Wp): hours of periphery labor per hour of core labor in trade. */
export function exchangeRatio(
  peripheryLabor: number,
  coreLabor: number,
  coreWage: number,
  peripheryWage: number,
): number {
  if (!(coreLabor > 0) || !(peripheryWage > 0)) return DIVISION_SENTINEL;
  return (peripheryLabor / coreLabor) * (coreWage / peripheryWage);
}

/** Value leaking out of production at exchange ratio epsilon. */
export function valueTransfer(production: number, epsilon: number): number {
  if (!(epsilon > 0)) return 0;
  return production * (1 - 1 / epsilon);
}

/** Fraction of the payer's wealth paid out at the given rate, never more than held. */
export function proportionalPayment(wealth: number, rate: number): number {
  if (!(wealth > 0)) return 0;
  return wealth * clamp01(rate);
}
