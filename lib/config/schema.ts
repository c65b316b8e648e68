// lib/config/schema.ts
// Every tunable coefficient, grouped by subsystem, with declared bounds and defaults.

import { z } from 'zod';
import { templateCatalogSchema } from '../templates/schema';

const rate = (value: number) => z.number().min(0).max(1).default(value);
const nonNegative = (value: number) => z.number().min(0).default(value);
const count = (value: number, min = 1) => z.number().int().min(min).default(value);

export const productionSchema = z
  .object({
    /** Value one head of population produces per year on undepleted land. */
    baseLaborPower: nonNegative(1),
    ticksPerYear: count(52),
  })
  .strict()
  .default({});

export const economySchema = z
  .object({
    extractionEfficiency: rate(0.8),
    compradorCut: rate(0.15),
    minWageRate: rate(0.05),
    maxWageRate: rate(0.5),
    subsidyTriggerThreshold: z.number().min(0).max(10).default(0.8),
    subsidyConversionRate: rate(0.1),
    subsidyCap: nonNegative(10),
    initialRentPool: z.number().positive().default(100),
    poolHighThreshold: rate(0.7),
    poolLowThreshold: rate(0.3),
    poolCriticalThreshold: rate(0.1),
    lowTension: rate(0.3),
    highTension: rate(0.5),
    briberyWageIncrease: rate(0.05),
    austerityWageCut: rate(0.05),
    ironFistRepression: rate(0.1),
    crisisWageSlash: rate(0.15),
    crisisRepression: rate(0.2),
  })
  .strict()
  .default({});

export const survivalSchema = z
  .object({
    steepness: z.number().positive().default(10),
    lossAversion: z.number().min(1).max(10).default(2.25),
  })
  .strict()
  .default({});

export const solidaritySchema = z
  .object({
    activationThreshold: rate(0.3),
    decayRate: rate(0.05),
    pruneThreshold: rate(0.05),
    formationThreshold: rate(0.5),
    initialStrength: rate(0.3),
  })
  .strict()
  .default({});

export const consciousnessSchema = z
  .object({
    sensitivity: nonNegative(0.5),
    decayRate: rate(0.05),
    driftCeiling: rate(0.1),
    agitationDecay: rate(0.1),
    enterBand: rate(0.3),
    releaseBand: rate(0.1),
    pathGain: z.number().min(0).max(5).default(1),
    pathHorizon: count(10),
  })
  .strict()
  .default({});

export const contradictionSchema = z
  .object({
    tensionRate: rate(0.1),
    activeThreshold: rate(0.3),
    criticalThreshold: rate(0.6),
    ruptureCeiling: rate(0.9),
    ruptureWindow: count(3),
    reseedCount: count(1, 0),
    reseedIntensity: rate(0),
  })
  .strict()
  .default({});

export const territorySchema = z
  .object({
    highProfileHeatGain: rate(0.15),
    lowProfileHeatDecay: rate(0.1),
    evictionHeatThreshold: rate(0.8),
    evictionReleaseThreshold: rate(0.5),
    rentSpikeMultiplier: z.number().min(1).max(10).default(1.5),
    displacementRate: rate(0.1),
    spilloverRate: rate(0.05),
  })
  .strict()
  .default({});

export const metabolismSchema = z
  .object({
    entropyFactor: z.number().min(1).max(10).default(1.2),
    consumptionPerCapita: nonNegative(0.01),
    overshootAlertThreshold: nonNegative(1),
  })
  .strict()
  .default({});

export const decompositionSchema = z
  .object({
    crisisWageRate: rate(0.05),
    enforcerFraction: rate(0.3),
    prisonersPerGuard: count(20),
    revolutionOrganizationThreshold: rate(0.5),
  })
  .strict()
  .default({});

export const struggleSchema = z
  .object({
    sparkScale: rate(0.1),
    agitationThreshold: rate(0.1),
    wealthDestructionRate: rate(0.05),
    solidarityBoost: rate(0.2),
    consciousnessBoost: rate(0.1),
  })
  .strict()
  .default({});

export const templatesSchema = z
  .object({
    catalog: templateCatalogSchema.default([]),
  })
  .strict()
  .default({});

export const endgameSchema = z
  .object({
    victoryThreshold: rate(0.8),
    collapseThreshold: z.number().min(1).default(2),
    collapseWindow: count(5),
    fascismRatio: z.number().min(1).default(3),
    fascismWindow: count(10),
  })
  .strict()
  .default({});

export const engineSchema = z
  .object({
    seed: z.union([z.number().int(), z.string().min(1)]).default(42),
    maxTicks: count(1000),
    historyCapacity: count(256),
    logDiagnostics: z.boolean().default(false),
    metricsWindow: count(50),
    resilienceInterval: count(5, 0),
    resilienceRemovalRate: rate(0.2),
  })
  .strict()
  .default({});

export const configSchema = z
  .object({
    production: productionSchema,
    economy: economySchema,
    survival: survivalSchema,
    solidarity: solidaritySchema,
    consciousness: consciousnessSchema,
    contradiction: contradictionSchema,
    territory: territorySchema,
    metabolism: metabolismSchema,
    decomposition: decompositionSchema,
    struggle: struggleSchema,
    templates: templatesSchema,
    endgame: endgameSchema,
    engine: engineSchema,
  })
  .strict()
  .superRefine((cfg, ctx) => {
    const order = (path: string[], lo: number, hi: number, message: string) => {
      if (!(lo < hi)) ctx.addIssue({ code: z.ZodIssueCode.custom, path, message });
    };
    const e = cfg.economy;
    order(['economy', 'poolLowThreshold'], e.poolCriticalThreshold, e.poolLowThreshold, 'must exceed poolCriticalThreshold');
    order(['economy', 'poolHighThreshold'], e.poolLowThreshold, e.poolHighThreshold, 'must exceed poolLowThreshold');
    order(['economy', 'highTension'], e.lowTension, e.highTension, 'must exceed lowTension');
    if (e.minWageRate > e.maxWageRate) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['economy', 'maxWageRate'], message: 'must be at least minWageRate' });
    }
    const c = cfg.consciousness;
    order(['consciousness', 'enterBand'], c.releaseBand, c.enterBand, 'must exceed releaseBand');
    const k = cfg.contradiction;
    order(['contradiction', 'criticalThreshold'], k.activeThreshold, k.criticalThreshold, 'must exceed activeThreshold');
    if (k.ruptureCeiling < k.criticalThreshold) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['contradiction', 'ruptureCeiling'], message: 'must be at least criticalThreshold' });
    }
    const t = cfg.territory;
    order(['territory', 'evictionHeatThreshold'], t.evictionReleaseThreshold, t.evictionHeatThreshold, 'must exceed evictionReleaseThreshold');
  });

export type SimulationConfig = z.output<typeof configSchema>;
export type ConfigInput = z.input<typeof configSchema>;
