// lib/systems/pipeline.ts
// Fixed system order of one tick.

import { ConsciousnessSystem } from './ConsciousnessSystem';
import { ContradictionSystem } from './ContradictionSystem';
import { DecompositionSystem } from './DecompositionSystem';
import { EconomicSystem } from './EconomicSystem';
import { EventTemplateSystem } from './EventTemplateSystem';
import { MetabolismSystem } from './MetabolismSystem';
import { ProductionSystem } from './ProductionSystem';
import { SolidaritySystem } from './SolidaritySystem';
import { StruggleSystem } from './StruggleSystem';
import { SurvivalSystem } from './SurvivalSystem';
import { TerritorySystem } from './TerritorySystem';
import type { SimSystem } from './types';

export const PIPELINE: readonly SimSystem[] = Object.freeze([
  ProductionSystem,
  EconomicSystem,
  SolidaritySystem,
  ConsciousnessSystem,
  SurvivalSystem,
  ContradictionSystem,
  TerritorySystem,
  MetabolismSystem,
  DecompositionSystem,
  StruggleSystem,
  EventTemplateSystem,
]);
