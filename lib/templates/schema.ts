// lib/templates/schema.ts
// Data-driven event templates: preconditions over the world, resolutions with effects.

import { z } from 'zod';
import { RelationshipKind, SocialRole } from '../../enums';
import { ConfigurationError } from '../diagnostics/errors';

export const CLASS_FIELDS = [
  'wealth',
  'organization',
  'repressionFaced',
  'population',
  'pAcquiescence',
  'pRevolution',
  'ideology.consciousness',
  'ideology.agitation',
] as const;

export const TERRITORY_FIELDS = [
  'heat',
  'rent',
  'population',
  'biocapacity',
  'extractionIntensity',
] as const;

export type ClassField = (typeof CLASS_FIELDS)[number];
export type TerritoryField = (typeof TERRITORY_FIELDS)[number];
export type NodeField = ClassField | TerritoryField;

const NODE_FIELDS = [...CLASS_FIELDS, ...TERRITORY_FIELDS] as const;

export const GRAPH_METRICS = [
  'solidarity_density',
  'exploitation_density',
  'average_agitation',
  'average_consciousness',
  'total_wealth',
  'gini_coefficient',
] as const;

export type GraphMetric = (typeof GRAPH_METRICS)[number];

const operator = z.enum(['>=', '<=', '>', '<', '==', '!=']);
export type Operator = z.infer<typeof operator>;

const pattern = z.string().refine(
  p => {
    try {
      new RegExp(p);
      return true;
    } catch {
      return false;
    }
  },
  { message: 'not a valid regular expression' },
);

export const nodeFilterSchema = z
  .object({
    nodeType: z.enum(['social_class', 'territory']).optional(),
    role: z.array(z.nativeEnum(SocialRole)).min(1).optional(),
    /** Matched from the start of the id. */
    idPattern: pattern.optional(),
  })
  .strict();

export const nodeConditionSchema = z
  .object({
    path: z.enum(NODE_FIELDS),
    operator,
    threshold: z.number(),
    nodeFilter: nodeFilterSchema.optional(),
    aggregation: z.enum(['any', 'all', 'count', 'sum', 'avg', 'max', 'min']).default('any'),
  })
  .strict();

export const edgeConditionSchema = z
  .object({
    edgeKind: z.nativeEnum(RelationshipKind),
    metric: z.enum(['count', 'sum_strength', 'avg_strength']).default('count'),
    operator,
    threshold: z.number(),
    nodeFilter: nodeFilterSchema.optional(),
  })
  .strict();

export const graphConditionSchema = z
  .object({
    metric: z.enum(GRAPH_METRICS),
    operator,
    threshold: z.number(),
  })
  .strict();

export const preconditionSetSchema = z
  .object({
    nodeConditions: z.array(nodeConditionSchema).default([]),
    edgeConditions: z.array(edgeConditionSchema).default([]),
    graphConditions: z.array(graphConditionSchema).default([]),
    logic: z.enum(['all', 'any']).default('all'),
  })
  .strict();

/** Placeholder target: every node that satisfied a node condition of the template. */
export const MATCHED_NODES = '${node_id}';

export const templateEffectSchema = z
  .object({
    targetId: z.string().min(1),
    attribute: z.enum(NODE_FIELDS),
    operation: z.enum(['increase', 'decrease', 'set', 'multiply']),
    magnitude: z.number(),
    description: z.string().default(''),
  })
  .strict();

export const emissionSchema = z
  .object({
    signal: z.string().min(1),
    payload: z.record(z.union([z.string(), z.number(), z.boolean()])).default({}),
  })
  .strict();

export const resolutionSchema = z
  .object({
    id: z.string().regex(/^[a-z][a-z0-9_]*$/),
    name: z.string().optional(),
    condition: preconditionSetSchema.optional(),
    effects: z.array(templateEffectSchema).default([]),
    emit: emissionSchema.optional(),
  })
  .strict()
  .refine(r => r.effects.length > 0 || r.emit !== undefined, {
    message: 'needs at least one effect or an emission',
  });

export const eventTemplateSchema = z
  .object({
    id: z.string().regex(/^EVT_[a-z][a-z0-9_]*$/),
    name: z.string().min(1),
    description: z.string().default(''),
    category: z.enum(['economic', 'consciousness', 'struggle', 'contradiction', 'territory']),
    preconditions: preconditionSetSchema,
    resolutions: z.array(resolutionSchema).min(1),
    cooldownTicks: z.number().int().min(0).default(0),
    /** Higher runs first. */
    priority: z.number().int().min(0).default(100),
  })
  .strict();

export const templateCatalogSchema = z.array(eventTemplateSchema).superRefine((templates, ctx) => {
  const seen = new Set<string>();
  templates.forEach((t, i) => {
    if (seen.has(t.id)) ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, 'id'], message: `duplicate template id "${t.id}"` });
    seen.add(t.id);
  });
});

export type NodeFilter = z.output<typeof nodeFilterSchema>;
export type NodeCondition = z.output<typeof nodeConditionSchema>;
export type EdgeCondition = z.output<typeof edgeConditionSchema>;
export type GraphCondition = z.output<typeof graphConditionSchema>;
export type PreconditionSet = z.output<typeof preconditionSetSchema>;
export type TemplateEffect = z.output<typeof templateEffectSchema>;
export type Resolution = z.output<typeof resolutionSchema>;
export type EventTemplate = z.output<typeof eventTemplateSchema>;
export type TemplateCategory = EventTemplate['category'];

/** Validate a catalog from outside. Throws ConfigurationError listing every offending path. */
export function parseTemplateCatalog(input: unknown): EventTemplate[] {
  const parsed = templateCatalogSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      'invalid template catalog',
      parsed.error.issues.map(i => ({ path: i.path.join('.'), message: i.message })),
    );
  }
  return parsed.data;
}
