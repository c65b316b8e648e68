// lib/model/snapshot.ts
// Node/edge snapshot format: serialization for renderers and persistence, hydration for scenarios.

import { z } from 'zod';
import {
  Attractor,
  ContradictionKind,
  ContradictionState,
  RelationshipKind,
  ResolutionKind,
  SectorType,
  SocialRole,
  TerritoryProfile,
} from '../../enums';
import type { Relationship, WorldState } from '../../types';
import { ConfigurationError } from '../diagnostics/errors';
import { hashString32 } from '../core/noise';
import { createWorld, makeRelationship, makeSocialClass, makeTerritory, nodeExists } from './world';

const unit = z.number().min(0).max(1);
const nonNegative = z.number().min(0);

const ideologySchema = z
  .object({
    consciousness: z.number().min(-1).max(1).optional(),
    agitation: unit.optional(),
    attractor: z.nativeEnum(Attractor).optional(),
    routedTicks: z.number().int().min(0).optional(),
  })
  .strict();

const socialClassNode = z
  .object({
    type: z.literal('social_class'),
    id: z.string().min(1),
    name: z.string().optional(),
    role: z.nativeEnum(SocialRole),
    wealth: nonNegative.optional(),
    organization: unit.optional(),
    repressionFaced: unit.optional(),
    subsistenceThreshold: nonNegative.optional(),
    population: nonNegative.optional(),
    ideology: ideologySchema.optional(),
    pAcquiescence: unit.optional(),
    pRevolution: unit.optional(),
    territoryId: z.string().nullable().optional(),
  })
  .strict();

const territoryNode = z
  .object({
    type: z.literal('territory'),
    id: z.string().min(1),
    name: z.string().optional(),
    sector: z.nativeEnum(SectorType),
    profile: z.nativeEnum(TerritoryProfile).optional(),
    heat: unit.optional(),
    population: nonNegative.optional(),
    rent: nonNegative.optional(),
    evicting: z.boolean().optional(),
    biocapacity: nonNegative.optional(),
    maxBiocapacity: z.number().positive().optional(),
    regenerationRate: unit.optional(),
    extractionIntensity: unit.optional(),
  })
  .strict();

const edgeSchema = z
  .object({
    id: z.string().min(1).optional(),
    kind: z.nativeEnum(RelationshipKind),
    sourceId: z.string().min(1),
    targetId: z.string().min(1),
    strength: unit.optional(),
    flow: nonNegative.optional(),
  })
  .strict();

const contradictionSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().optional(),
    kind: z.nativeEnum(ContradictionKind),
    thesisId: z.string().min(1),
    antithesisId: z.string().min(1),
    intensity: unit.default(0),
    state: z.nativeEnum(ContradictionState).default(ContradictionState.Latent),
    ticksAboveCeiling: z.number().int().min(0).default(0),
    generation: z.number().int().min(0).default(0),
    parentId: z.string().nullable().default(null),
  })
  .strict();

const commandSchema = z
  .object({
    id: z.string().min(1),
    kind: z.literal('resolve_contradiction'),
    issuedAt: z.number().int().min(0),
    issuedBy: z.string(),
    contradictionId: z.string().min(1),
    resolution: z.nativeEnum(ResolutionKind),
  })
  .strict();

export const snapshotSchema = z
  .object({
    tick: z.number().int().min(0).default(0),
    nodes: z.array(z.discriminatedUnion('type', [socialClassNode, territoryNode])),
    edges: z.array(edgeSchema).default([]),
    contradictions: z.array(contradictionSchema).default([]),
    aggregates: z
      .object({
        imperialRentPool: nonNegative.optional(),
        wageRate: unit.optional(),
        globalTension: unit.optional(),
        overshootRatio: nonNegative.optional(),
        consumption: nonNegative.optional(),
      })
      .strict()
      .default({}),
    commands: z.array(commandSchema).default([]),
    terminal: z
      .object({
        tick: z.number().int().min(0),
        decision: z.enum(['revolution', 'genocide']),
        prisonerOrganization: unit,
      })
      .nullable()
      .default(null),
    templateTriggers: z.record(z.number().int().min(0)).default({}),
  })
  .strict();

export type SnapshotInput = z.input<typeof snapshotSchema>;

/**
 * Build a WorldState from an external node/edge snapshot.
 * Shape errors, duplicate ids and dangling references throw ConfigurationError.
 */
export function hydrateWorld(input: unknown): WorldState {
  const parsed = snapshotSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      'invalid world snapshot',
      parsed.error.issues.map(i => ({ path: i.path.join('.'), message: i.message })),
    );
  }
  const snap = parsed.data;
  let world: WorldState;
  try {
    world = createWorld({
      tick: snap.tick,
      entities: snap.nodes.flatMap(n => (n.type === 'social_class' ? [makeSocialClass(n)] : [])),
      territories: snap.nodes.flatMap(n => (n.type === 'territory' ? [makeTerritory(n)] : [])),
      relationships: snap.edges.map(e => makeRelationship(e)),
      contradictions: snap.contradictions.map(k => ({ ...k, name: k.name ?? k.id })),
      aggregates: snap.aggregates,
    });
  } catch (err) {
    throw new ConfigurationError('invalid world snapshot', [{ path: 'nodes', message: err instanceof Error ? err.message : String(err) }]);
  }
  world.commands = snap.commands;
  world.terminal = snap.terminal;
  world.templateTriggers = snap.templateTriggers;

  const issues: { path: string; message: string }[] = [];
  for (const id of Object.keys(world.entities)) {
    if (Object.prototype.hasOwnProperty.call(world.territories, id)) {
      issues.push({ path: `nodes.${id}`, message: 'id used by both a class and a territory' });
    }
    const t = world.entities[id].territoryId;
    if (t !== null && !Object.prototype.hasOwnProperty.call(world.territories, t)) {
      issues.push({ path: `nodes.${id}.territoryId`, message: `unknown territory "${t}"` });
    }
  }
  for (const r of Object.values(world.relationships)) {
    if (!nodeExists(world, r.sourceId)) issues.push({ path: `edges.${r.id}.sourceId`, message: `unknown node "${r.sourceId}"` });
    if (!nodeExists(world, r.targetId)) issues.push({ path: `edges.${r.id}.targetId`, message: `unknown node "${r.targetId}"` });
  }
  for (const k of Object.values(world.contradictions)) {
    if (!nodeExists(world, k.thesisId)) issues.push({ path: `contradictions.${k.id}.thesisId`, message: `unknown node "${k.thesisId}"` });
    if (!nodeExists(world, k.antithesisId)) issues.push({ path: `contradictions.${k.id}.antithesisId`, message: `unknown node "${k.antithesisId}"` });
  }
  if (issues.length) throw new ConfigurationError('invalid world snapshot', issues);
  return world;
}

export interface SerializedWorld {
  tick: number;
  nodes: Array<({ type: 'social_class' } & WorldState['entities'][string]) | ({ type: 'territory' } & WorldState['territories'][string])>;
  edges: Relationship[];
  contradictions: Array<WorldState['contradictions'][string]>;
  aggregates: WorldState['aggregates'];
  commands: WorldState['commands'];
  terminal: WorldState['terminal'];
  templateTriggers: WorldState['templateTriggers'];
}

/** Node/edge list with typed attributes, sorted by id. Round-trips through hydrateWorld. */
export function serializeWorld(w: WorldState): SerializedWorld {
  const sorted = <T>(m: Readonly<Record<string, T>>): T[] => Object.keys(m).sort().map(k => m[k]);
  return structuredClone({
    tick: w.tick,
    nodes: [
      ...sorted(w.entities).map(e => ({ type: 'social_class' as const, ...e })),
      ...sorted(w.territories).map(t => ({ type: 'territory' as const, ...t })),
    ],
    edges: sorted(w.relationships),
    contradictions: sorted(w.contradictions),
    aggregates: w.aggregates,
    commands: w.commands,
    terminal: w.terminal,
    templateTriggers: w.templateTriggers,
  });
}

/** JSON with object keys sorted at every level. */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) => {
    if (v === null || typeof v !== 'object' || Array.isArray(v)) return v;
    const out: Record<string, unknown> = {};
    for (const [k, child] of Object.entries(v).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) out[k] = child;
    return out;
  });
}

/** Short stable fingerprint of a snapshot, carried by terminal events. */
export function digestWorld(w: WorldState): string {
  const text = canonicalJson(serializeWorld(w));
  const a = hashString32(text);
  const b = hashString32(`${text.length}:${text}`);
  return a.toString(16).padStart(8, '0') + b.toString(16).padStart(8, '0');
}
