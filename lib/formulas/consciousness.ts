// lib/formulas/consciousness.ts
// Agitation, drift and bistable routing of consciousness.

import { Attractor } from '../../enums';
import { clamp, clamp01 } from '../util/math';

const LOSS_FLOOR = 1e-9;

/** Relative loss since the last tick, amplified by loss aversion. Gains produce no agitation. */
export function agitationSignal(previousWealth: number, currentWealth: number, lossAversion: number): number {
  const loss = Math.max(0, previousWealth - currentWealth);
  if (loss === 0) return 0;
  return (lossAversion * loss) / Math.max(previousWealth, LOSS_FLOOR);
}

export function accumulateAgitation(agitation: number, signal: number, decay: number): number {
  return clamp01(agitation * (1 - clamp01(decay)) + Math.max(0, signal));
}

/** 1 + gain * min(1, routedTicks / horizon): grows while a class stays in its attractor. */
export function pathMultiplier(routedTicks: number, gain: number, horizon: number): number {
  if (!(horizon > 0) || routedTicks <= 0) return 1;
  return 1 + Math.max(0, gain) * Math.min(1, routedTicks / horizon);
}

export interface DriftInput {
  consciousness: number;
  agitation: number;
  /** 0..1 share of agitation routed towards class solidarity. */
  liberationShare: number;
  sensitivity: number;
  decay: number;
  ceiling: number;
  attractor: Attractor;
  routedTicks: number;
  pathGain: number;
  pathHorizon: number;
}

/**
 * sensitivity * agitation * (2 * liberationShare - 1) - decay * consciousness,
 * amplified when it points the way the class is already routed, magnitude capped at ceiling.
 */
export function consciousnessDrift(input: DriftInput): number {
  const share = clamp01(input.liberationShare);
  let drift = input.sensitivity * input.agitation * (2 * share - 1) - input.decay * input.consciousness;
  const aligned =
    (input.attractor === Attractor.Liberation && drift > 0) ||
    (input.attractor === Attractor.Repression && drift < 0);
  if (aligned) drift *= pathMultiplier(input.routedTicks, input.pathGain, input.pathHorizon);
  const cap = Math.max(0, input.ceiling);
  return clamp(drift, -cap, cap);
}

/**
 * Hysteresis routing. An unrouted class enters an attractor once |consciousness| reaches
 * enterBand; a routed class keeps it until it falls back inside releaseBand, or flips when
 * it crosses enterBand on the other side.
 */
export function routeAttractor(current: Attractor, consciousness: number, enterBand: number, releaseBand: number): Attractor {
  const psi = consciousness;
  if (current === Attractor.Liberation) {
    if (psi >= releaseBand) return Attractor.Liberation;
    return psi <= -enterBand ? Attractor.Repression : Attractor.None;
  }
  if (current === Attractor.Repression) {
    if (psi <= -releaseBand) return Attractor.Repression;
    return psi >= enterBand ? Attractor.Liberation : Attractor.None;
  }
  if (psi >= enterBand) return Attractor.Liberation;
  if (psi <= -enterBand) return Attractor.Repression;
  return Attractor.None;
}
