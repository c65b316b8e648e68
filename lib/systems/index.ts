export * from './types';
export * from './pipeline';
export * from './ProductionSystem';
export * from './EconomicSystem';
export * from './SolidaritySystem';
export * from './ConsciousnessSystem';
export * from './SurvivalSystem';
export * from './ContradictionSystem';
export * from './TerritorySystem';
export * from './MetabolismSystem';
export * from './DecompositionSystem';
export * from './StruggleSystem';
export * from './EventTemplateSystem';
