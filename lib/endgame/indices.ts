// lib/endgame/indices.ts
// Population-weighted indices the endgame conditions are stated in.

import { Attractor } from '../../enums';
import type { SocialClass, WorldState } from '../../types';
import { weightedMean } from '../util/math';

function classes(w: WorldState): SocialClass[] {
  return Object.keys(w.entities)
    .sort()
    .map(id => w.entities[id]);
}

/** Positive consciousness of liberation-routed classes, weighted over the whole population. */
export function liberationIndex(w: WorldState): number {
  const all = classes(w);
  return weightedMean(
    all.map(e => (e.ideology.attractor === Attractor.Liberation ? Math.max(0, e.ideology.consciousness) : 0)),
    all.map(e => e.population),
  );
}

export function repressionIndex(w: WorldState): number {
  const all = classes(w);
  return weightedMean(
    all.map(e => e.repressionFaced),
    all.map(e => e.population),
  );
}

export function resistanceIndex(w: WorldState): number {
  const all = classes(w);
  return weightedMean(
    all.map(e => e.organization),
    all.map(e => e.population),
  );
}
