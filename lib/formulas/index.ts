export * from './production';
export * from './economic';
export * from './survival';
export * from './consciousness';
export * from './solidarity';
export * from './metabolism';
export * from './tension';
export { FORMULA_REGISTRY, resolveFormula } from './registry';
export type { FormulaName } from './registry';
