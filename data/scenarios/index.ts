// data/scenarios/index.ts
// Bundled world snapshots, hydrated on load.

import type { WorldState } from '../../types';
import { hydrateWorld } from '../../lib/model/snapshot';
import carceral from './carceral.json';
import imperialCircuit from './imperial-circuit.json';
import twoNode from './two-node.json';

export const SCENARIOS = {
  'two-node': twoNode,
  'imperial-circuit': imperialCircuit,
  carceral,
} as const;

export type ScenarioName = keyof typeof SCENARIOS;

export function scenarioNames(): ScenarioName[] {
  return ['two-node', 'imperial-circuit', 'carceral'];
}

/** Fresh, mutable world for the named scenario; each call hydrates again. */
export function loadScenario(name: ScenarioName): WorldState {
  return hydrateWorld(structuredClone(SCENARIOS[name]));
}
