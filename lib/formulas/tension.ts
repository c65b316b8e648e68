// lib/formulas/tension.ts
// Contradiction intensity and the ruling-class policy response.

import { PolicyDecision } from '../../enums';
import { clamp01 } from '../util/math';

/** |a - b| / (a + b), 0 when both sides hold nothing. */
export function wealthGap(thesisWealth: number, antithesisWealth: number): number {
  const a = Math.max(0, thesisWealth);
  const b = Math.max(0, antithesisWealth);
  const total = a + b;
  if (!(total > 0)) return 0;
  return Math.abs(a - b) / total;
}

/** Pressure from overshoot: 0 while consumption fits within capacity, 1 at double capacity. */
export function metabolicPressure(overshoot: number): number {
  return clamp01(overshoot - 1);
}

/** Intensity relaxes towards the measured pressure at the given rate. */
export function nextIntensity(intensity: number, pressure: number, rate: number): number {
  return clamp01(intensity + clamp01(rate) * (clamp01(pressure) - intensity));
}

export interface PolicyThresholds {
  high: number;
  low: number;
  critical: number;
  lowTension: number;
  highTension: number;
}

export interface PolicyDeltas {
  briberyWageIncrease: number;
  austerityWageCut: number;
  ironFistRepression: number;
  crisisWageSlash: number;
  crisisRepression: number;
}

export interface PolicyResponse {
  decision: PolicyDecision;
  wageDelta: number;
  repressionDelta: number;
}

/**
 * Crisis first, then by pool level:
 * pool < critical -> CRISIS; pool >= high with calm -> BRIBERY;
 * pool < low with unrest -> IRON_FIST; pool < low otherwise -> AUSTERITY.
 */
export function bourgeoisieDecision(
  poolRatio: number,
  tension: number,
  t: PolicyThresholds,
  d: PolicyDeltas,
): PolicyResponse {
  if (poolRatio < t.critical) {
    return { decision: PolicyDecision.Crisis, wageDelta: -d.crisisWageSlash, repressionDelta: d.crisisRepression };
  }
  if (poolRatio >= t.high && tension < t.lowTension) {
    return { decision: PolicyDecision.Bribery, wageDelta: d.briberyWageIncrease, repressionDelta: 0 };
  }
  if (poolRatio < t.low) {
    if (tension > t.highTension) {
      return { decision: PolicyDecision.IronFist, wageDelta: 0, repressionDelta: d.ironFistRepression };
    }
    return { decision: PolicyDecision.Austerity, wageDelta: -d.austerityWageCut, repressionDelta: 0 };
  }
  return { decision: PolicyDecision.NoChange, wageDelta: 0, repressionDelta: 0 };
}
