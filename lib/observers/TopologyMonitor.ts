// lib/observers/TopologyMonitor.ts
// Solidarity percolation: components, largest-component ratio, liquidity, phase, purge resilience.

import { RelationshipKind } from '../../enums';
import type { EntityId, WorldState } from '../../types';
import type { RandomStream } from '../core/noise';
import type { SimLogger } from '../diagnostics/logger';
import { edgesOfKind } from '../model/graph';
import { sortedIds } from '../model/world';
import type { SimulationObserver } from './types';

export const GASEOUS_THRESHOLD = 0.1;
export const CONDENSATION_THRESHOLD = 0.5;
export const BRITTLE_MULTIPLIER = 2;
export const POTENTIAL_MIN_STRENGTH = 0.1;
export const ACTUAL_MIN_STRENGTH = 0.5;
export const SURVIVAL_THRESHOLD = 0.4;

export type TopologyPhase = 'gaseous' | 'transitional' | 'condensed';

export interface ResilienceResult {
  resilient: boolean;
  originalMax: number;
  postPurgeMax: number;
  removed: EntityId[];
}

export interface TopologySnapshot {
  tick: number;
  totalNodes: number;
  components: number;
  maxComponentSize: number;
  /** L_max / N */
  percolation: number;
  potentialLiquidity: number;
  actualLiquidity: number;
  phase: TopologyPhase;
  /** Many sympathizers, few cadre. */
  brittle: boolean;
  resilience: ResilienceResult | null;
}

export interface SolidarityGraph {
  nodes: EntityId[];
  links: Array<[EntityId, EntityId]>;
}

export function solidarityGraph(w: WorldState): SolidarityGraph {
  const links: Array<[EntityId, EntityId]> = [];
  for (const edge of edgesOfKind(w, RelationshipKind.Solidarity)) {
    if (edge.strength <= 0 || !w.entities[edge.sourceId] || !w.entities[edge.targetId]) continue;
    links.push([edge.sourceId, edge.targetId]);
  }
  return { nodes: sortedIds(w.entities), links };
}

/** Sizes of the connected components, union-find over undirected links. */
export function componentSizes(g: SolidarityGraph, removed: ReadonlySet<EntityId> = new Set()): number[] {
  const parent = new Map<EntityId, EntityId>();
  for (const n of g.nodes) if (!removed.has(n)) parent.set(n, n);

  const find = (x: EntityId): EntityId => {
    let root = x;
    for (let p = parent.get(root); p !== undefined && p !== root; p = parent.get(root)) root = p;
    for (let cur = x; cur !== root; ) {
      const next = parent.get(cur) ?? root;
      parent.set(cur, root);
      cur = next;
    }
    return root;
  };

  for (const [a, b] of g.links) {
    if (!parent.has(a) || !parent.has(b)) continue;
    const ra = find(a);
    const rb = find(b);
    if (ra !== rb) parent.set(ra < rb ? rb : ra, ra < rb ? ra : rb);
  }

  const sizes = new Map<EntityId, number>();
  for (const n of parent.keys()) {
    const r = find(n);
    sizes.set(r, (sizes.get(r) ?? 0) + 1);
  }
  return [...sizes.values()].sort((x, y) => y - x);
}

export function liquidity(w: WorldState): { potential: number; actual: number } {
  let potential = 0;
  let actual = 0;
  for (const edge of edgesOfKind(w, RelationshipKind.Solidarity)) {
    if (edge.strength > POTENTIAL_MIN_STRENGTH) potential++;
    if (edge.strength > ACTUAL_MIN_STRENGTH) actual++;
  }
  return { potential, actual };
}

export function phaseOf(percolation: number): TopologyPhase {
  if (percolation < GASEOUS_THRESHOLD) return 'gaseous';
  if (percolation >= CONDENSATION_THRESHOLD) return 'condensed';
  return 'transitional';
}

/** Purge a share of nodes at random and check whether the giant component survives. */
export function testResilience(g: SolidarityGraph, removalRate: number, rng: RandomStream): ResilienceResult {
  if (g.nodes.length === 0) return { resilient: true, originalMax: 0, postPurgeMax: 0, removed: [] };
  const originalMax = componentSizes(g)[0] ?? 0;
  const count = Math.max(1, Math.floor(g.nodes.length * removalRate));
  const removed = rng.sample(g.nodes, count);
  const postPurgeMax = componentSizes(g, new Set(removed))[0] ?? 0;
  return { resilient: postPurgeMax >= originalMax * SURVIVAL_THRESHOLD, originalMax, postPurgeMax, removed };
}

export class TopologyMonitor implements SimulationObserver {
  readonly tag = 'topology';
  private history: TopologySnapshot[] = [];
  private previousPercolation = 0;

  constructor(
    private readonly opts: { resilienceInterval: number; removalRate: number; rng: RandomStream },
    private readonly logger: SimLogger,
  ) {}

  onStart(initial: WorldState): void {
    this.history = [];
    this.previousPercolation = 0;
    this.record(initial, true);
  }

  onTick(_before: WorldState, after: WorldState): void {
    this.record(after, false);
  }

  onEnd(): void {
    const last = this.latest();
    if (!last) return;
    const peak = this.history.reduce((m, s) => Math.max(m, s.percolation), 0);
    this.logger.info(`[observer:topology] ${this.history.length} snapshots, final phase ${last.phase}, peak percolation ${peak.toFixed(2)}`);
  }

  snapshots(): readonly TopologySnapshot[] {
    return this.history.slice();
  }

  latest(): TopologySnapshot | undefined {
    return this.history[this.history.length - 1];
  }

  private record(w: WorldState, isStart: boolean): void {
    const g = solidarityGraph(w);
    const sizes = componentSizes(g);
    const maxComponentSize = sizes[0] ?? 0;
    const percolation = g.nodes.length ? maxComponentSize / g.nodes.length : 0;
    const { potential, actual } = liquidity(w);
    const interval = this.opts.resilienceInterval;
    const due = interval > 0 && (isStart || (w.tick > 0 && w.tick % interval === 0));

    const snap: TopologySnapshot = {
      tick: w.tick,
      totalNodes: g.nodes.length,
      components: sizes.length,
      maxComponentSize,
      percolation,
      potentialLiquidity: potential,
      actualLiquidity: actual,
      phase: phaseOf(percolation),
      brittle: potential > actual * BRITTLE_MULTIPLIER,
      resilience: due ? testResilience(g, this.opts.removalRate, this.opts.rng.fork(`resilience:${w.tick}`)) : null,
    };

    if (this.previousPercolation < CONDENSATION_THRESHOLD && percolation >= CONDENSATION_THRESHOLD) {
      this.logger.info(`[observer:topology] condensation at tick ${w.tick} (percolation=${percolation.toFixed(2)}, L_max=${maxComponentSize})`);
    }
    if (snap.resilience && !snap.resilience.resilient) {
      this.logger.warn(`[observer:topology] purge would break the network at tick ${w.tick} (${snap.resilience.postPurgeMax}/${snap.resilience.originalMax})`);
    }

    this.previousPercolation = percolation;
    this.history.push(snap);
  }
}
