// lib/templates/evaluate.ts
// Pure evaluation of event templates against a world snapshot.

import { RelationshipKind } from '../../enums';
import type { SocialClass, Territory, WorldState } from '../../types';
import { buildAdjacency, incidentEdges } from '../model/graph';
import { sortedIds } from '../model/world';
import { sum } from '../util/math';
import type {
  EdgeCondition,
  EventTemplate,
  GraphCondition,
  GraphMetric,
  NodeCondition,
  NodeField,
  NodeFilter,
  Operator,
  PreconditionSet,
  Resolution,
  TemplateEffect,
} from './schema';

export type NodeRef =
  | { type: 'social_class'; id: string; node: SocialClass }
  | { type: 'territory'; id: string; node: Territory };

/** Classes first, then territories, each in id order. */
export function allNodes(w: WorldState): NodeRef[] {
  return [
    ...sortedIds(w.entities).map(id => ({ type: 'social_class' as const, id, node: w.entities[id] })),
    ...sortedIds(w.territories).map(id => ({ type: 'territory' as const, id, node: w.territories[id] })),
  ];
}

export function findNode(w: WorldState, id: string): NodeRef | null {
  if (Object.prototype.hasOwnProperty.call(w.entities, id)) return { type: 'social_class', id, node: w.entities[id] };
  if (Object.prototype.hasOwnProperty.call(w.territories, id)) return { type: 'territory', id, node: w.territories[id] };
  return null;
}

export function matchesFilter(ref: NodeRef, filter: NodeFilter | undefined): boolean {
  if (!filter) return true;
  if (filter.nodeType !== undefined && ref.type !== filter.nodeType) return false;
  if (filter.role !== undefined && (ref.type !== 'social_class' || !filter.role.includes(ref.node.role))) return false;
  if (filter.idPattern !== undefined && !new RegExp(`^(?:${filter.idPattern})`).test(ref.id)) return false;
  return true;
}

export function filterNodes(w: WorldState, filter: NodeFilter | undefined): NodeRef[] {
  return allNodes(w).filter(ref => matchesFilter(ref, filter));
}

/** null when the field does not exist on that kind of node. */
export function readField(ref: NodeRef, path: NodeField): number | null {
  if (ref.type === 'territory') {
    const t = ref.node;
    switch (path) {
      case 'heat':
        return t.heat;
      case 'rent':
        return t.rent;
      case 'population':
        return t.population;
      case 'biocapacity':
        return t.biocapacity;
      case 'extractionIntensity':
        return t.extractionIntensity;
      default:
        return null;
    }
  }
  const c = ref.node;
  switch (path) {
    case 'wealth':
      return c.wealth;
    case 'organization':
      return c.organization;
    case 'repressionFaced':
      return c.repressionFaced;
    case 'population':
      return c.population;
    case 'pAcquiescence':
      return c.pAcquiescence;
    case 'pRevolution':
      return c.pRevolution;
    case 'ideology.consciousness':
      return c.ideology.consciousness;
    case 'ideology.agitation':
      return c.ideology.agitation;
    default:
      return null;
  }
}

/** Returns false when the field does not exist on that kind of node. */
export function writeField(ref: NodeRef, path: NodeField, value: number): boolean {
  if (ref.type === 'territory') {
    const t = ref.node;
    switch (path) {
      case 'heat':
        t.heat = value;
        return true;
      case 'rent':
        t.rent = value;
        return true;
      case 'population':
        t.population = value;
        return true;
      case 'biocapacity':
        t.biocapacity = value;
        return true;
      case 'extractionIntensity':
        t.extractionIntensity = value;
        return true;
      default:
        return false;
    }
  }
  const c = ref.node;
  switch (path) {
    case 'wealth':
      c.wealth = value;
      return true;
    case 'organization':
      c.organization = value;
      return true;
    case 'repressionFaced':
      c.repressionFaced = value;
      return true;
    case 'population':
      c.population = value;
      return true;
    case 'pAcquiescence':
      c.pAcquiescence = value;
      return true;
    case 'pRevolution':
      c.pRevolution = value;
      return true;
    case 'ideology.consciousness':
      c.ideology.consciousness = value;
      return true;
    case 'ideology.agitation':
      c.ideology.agitation = value;
      return true;
    default:
      return false;
  }
}

export function compare(value: number, op: Operator, threshold: number): boolean {
  switch (op) {
    case '>=':
      return value >= threshold;
    case '<=':
      return value <= threshold;
    case '>':
      return value > threshold;
    case '<':
      return value < threshold;
    case '==':
      return value === threshold;
    case '!=':
      return value !== threshold;
  }
}

export function aggregateAndCompare(values: readonly number[], cond: Pick<NodeCondition, 'aggregation' | 'operator' | 'threshold'>): boolean {
  const { operator: op, threshold } = cond;
  switch (cond.aggregation) {
    case 'any':
      return values.some(v => compare(v, op, threshold));
    case 'all':
      return values.every(v => compare(v, op, threshold));
    case 'count':
      return compare(values.length, op, threshold);
    case 'sum':
      return compare(sum(values), op, threshold);
    case 'avg':
      return compare(sum(values) / values.length, op, threshold);
    case 'max':
      return compare(Math.max(...values), op, threshold);
    case 'min':
      return compare(Math.min(...values), op, threshold);
  }
}

function fieldValues(w: WorldState, cond: NodeCondition): number[] {
  const values: number[] = [];
  for (const ref of filterNodes(w, cond.nodeFilter)) {
    const v = readField(ref, cond.path);
    if (v !== null) values.push(v);
  }
  return values;
}

/** False when no filtered node carries the field. */
export function evaluateNodeCondition(w: WorldState, cond: NodeCondition): boolean {
  const values = fieldValues(w, cond);
  return values.length > 0 && aggregateAndCompare(values, cond);
}

/** Edges of the kind touching any filtered node, each counted once. */
export function evaluateEdgeCondition(w: WorldState, cond: EdgeCondition): boolean {
  const adj = buildAdjacency(w, cond.edgeKind);
  const seen = new Set<string>();
  const strengths: number[] = [];
  for (const ref of filterNodes(w, cond.nodeFilter)) {
    for (const edge of incidentEdges(adj, ref.id)) {
      if (seen.has(edge.id)) continue;
      seen.add(edge.id);
      strengths.push(edge.strength);
    }
  }
  return compare(edgeMetric(strengths, cond.metric), cond.operator, cond.threshold);
}

function edgeMetric(strengths: readonly number[], metric: EdgeCondition['metric']): number {
  switch (metric) {
    case 'count':
      return strengths.length;
    case 'sum_strength':
      return sum(strengths);
    case 'avg_strength':
      return strengths.length ? sum(strengths) / strengths.length : 0;
  }
}

function edgeDensity(w: WorldState, kind: RelationshipKind): number {
  const edges = Object.values(w.relationships).filter(r => r.kind === kind).length;
  const n = Object.keys(w.entities).length + Object.keys(w.territories).length;
  const possible = n * (n - 1);
  return possible > 0 ? edges / possible : 0;
}

/** Standard Gini over class wealth; 0 for an empty or penniless world. */
export function gini(wealth: readonly number[]): number {
  const total = sum(wealth);
  if (wealth.length === 0 || total <= 0) return 0;
  const sorted = [...wealth].sort((a, b) => a - b);
  const n = sorted.length;
  let weighted = 0;
  sorted.forEach((x, i) => {
    weighted += (2 * (i + 1) - n - 1) * x;
  });
  return weighted / (n * total);
}

export function graphMetric(w: WorldState, metric: GraphMetric): number {
  const classes = sortedIds(w.entities).map(id => w.entities[id]);
  const mean = (xs: number[]) => (xs.length ? sum(xs) / xs.length : 0);
  switch (metric) {
    case 'solidarity_density':
      return edgeDensity(w, RelationshipKind.Solidarity);
    case 'exploitation_density':
      return edgeDensity(w, RelationshipKind.Extraction);
    case 'average_agitation':
      return mean(classes.map(c => c.ideology.agitation));
    case 'average_consciousness':
      return mean(classes.map(c => c.ideology.consciousness));
    case 'total_wealth':
      return sum(classes.map(c => c.wealth));
    case 'gini_coefficient':
      return gini(classes.map(c => c.wealth));
  }
}

export function evaluateGraphCondition(w: WorldState, cond: GraphCondition): boolean {
  return compare(graphMetric(w, cond.metric), cond.operator, cond.threshold);
}

/** An empty set always passes. */
export function evaluatePreconditions(w: WorldState, set: PreconditionSet): boolean {
  const results = [
    ...set.nodeConditions.map(c => evaluateNodeCondition(w, c)),
    ...set.edgeConditions.map(c => evaluateEdgeCondition(w, c)),
    ...set.graphConditions.map(c => evaluateGraphCondition(w, c)),
  ];
  if (results.length === 0) return true;
  return set.logic === 'all' ? results.every(Boolean) : results.some(Boolean);
}

export function isOnCooldown(template: EventTemplate, lastTriggered: number | undefined, tick: number): boolean {
  return lastTriggered !== undefined && tick - lastTriggered < template.cooldownTicks;
}

/** First resolution whose own condition holds, once the template's preconditions pass. */
export function evaluateTemplate(
  template: EventTemplate,
  w: WorldState,
  tick: number,
  lastTriggered: number | undefined,
): Resolution | null {
  if (isOnCooldown(template, lastTriggered, tick)) return null;
  if (!evaluatePreconditions(w, template.preconditions)) return null;
  for (const resolution of template.resolutions) {
    if (!resolution.condition || evaluatePreconditions(w, resolution.condition)) return resolution;
  }
  return null;
}

/** Nodes satisfying at least one node condition on their own, in id order. */
export function matchingNodes(template: EventTemplate, w: WorldState): string[] {
  const ids = new Set<string>();
  for (const cond of template.preconditions.nodeConditions) {
    for (const ref of filterNodes(w, cond.nodeFilter)) {
      const v = readField(ref, cond.path);
      if (v !== null && compare(v, cond.operator, cond.threshold)) ids.add(ref.id);
    }
  }
  return [...ids].sort();
}

/** Templates in evaluation order: priority descending, then id. */
export function orderTemplates(templates: readonly EventTemplate[]): EventTemplate[] {
  return [...templates].sort((a, b) => b.priority - a.priority || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
}

export function applyOperation(operation: TemplateEffect['operation'], current: number, magnitude: number): number {
  switch (operation) {
    case 'increase':
      return current + magnitude;
    case 'decrease':
      return current - magnitude;
    case 'set':
      return magnitude;
    case 'multiply':
      return current * magnitude;
  }
}
