// lib/formulas/survival.ts
// Survival calculus: acquiescence vs. revolt.

import { clamp01 } from '../util/math';

export const REVOLUTION_EPSILON = 1e-6;
export const DEFAULT_LOSS_AVERSION = 2.25;

/**
 * P(S|A) = 1 / (1 + exp(-k (wealth - subsistence))).
 * Exponent clamped to +-500 so extreme inputs stay finite.
 */
export function acquiescenceProbability(wealth: number, subsistence: number, steepness: number): number {
  const x = Math.max(-500, Math.min(500, -steepness * (wealth - subsistence)));
  return clamp01(1 / (1 + Math.exp(x)));
}

/** P(S|R) = cohesion / repression, discounted by repression risk and capped at 1. */
export function revolutionProbability(cohesion: number, repression: number): number {
  if (!(cohesion > 0)) return 0;
  return clamp01(cohesion / (Math.max(0, repression) + REVOLUTION_EPSILON));
}

/**
 * Wealth at which P(S|A) equals P(S|R). Below it revolt is the better bet.
 * With P(S|R) at 0 or 1 there is no finite crossover and the subsistence line is returned.
 */
export function crossoverThreshold(
  cohesion: number,
  repression: number,
  subsistence: number,
  steepness: number,
): number {
  const p = revolutionProbability(cohesion, repression);
  if (p <= 0 || p >= 1 || !(steepness > 0)) return subsistence;
  return subsistence + Math.log(p / (1 - p)) / steepness;
}

/** Losses weigh lambda times more than equal gains. */
export function applyLossAversion(value: number, lambda: number = DEFAULT_LOSS_AVERSION): number {
  return value < 0 ? value * lambda : value;
}

/** Wealth as perceived after a change from `baseline`, with losses amplified. */
export function perceivedWealth(baseline: number, current: number, lambda: number): number {
  return Math.max(0, baseline + applyLossAversion(current - baseline, lambda));
}
