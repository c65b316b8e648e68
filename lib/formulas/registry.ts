// lib/formulas/registry.ts
// Human-readable expressions of the formula library, for traces and narrative frames.

export const FORMULA_REGISTRY = {
  producedValue: '({laborPower} / {ticksPerYear}) * {population} * {biocapacity} / {maxBiocapacity}',
  extractionIntensity: 'min(1, {production} / {maxBiocapacity})',
  imperialRent: '{alpha} * {wages} * (1 - max(0, {consciousness}))',
  laborAristocracyRatio: '{coreWages} / {valueProduced}',
  exchangeRatio: '({peripheryLabor} / {coreLabor}) * ({coreWage} / {peripheryWage})',
  valueTransfer: '{production} * (1 - 1 / {epsilon})',
  acquiescenceProbability: '1 / (1 + exp(-{steepness} * ({wealth} - {subsistence})))',
  revolutionProbability: 'clamp01({cohesion} / ({repression} + 1e-6))',
  lossAversion: '{value} < 0 ? {value} * {lambda} : {value}',
  agitationSignal: '{lambda} * max(0, {previous} - {current}) / {previous}',
  consciousnessDrift: 'cap({sensitivity} * {agitation} * (2 * {share} - 1) - {decay} * {consciousness}, {ceiling})',
  pathMultiplier: '1 + {gain} * min(1, {routedTicks} / {horizon})',
  solidarityTransmission: '{strength} * ({source} - {target})',
  biocapacityDelta: '{regeneration} * {max} - {extraction} * {current} * {entropy}',
  overshootRatio: '{consumption} / {biocapacity}',
  wealthGap: '|{thesis} - {antithesis}| / ({thesis} + {antithesis})',
  nextIntensity: '{intensity} + {rate} * ({pressure} - {intensity})',
} as const;

export type FormulaName = keyof typeof FORMULA_REGISTRY;

/** Substitute `{name}` placeholders with values; unknown placeholders render as `?`. */
export function resolveFormula(name: FormulaName, values: Readonly<Record<string, number>>): string {
  return FORMULA_REGISTRY[name].replace(/\{([^}]+)\}/g, (_match, key: string) => {
    const v = values[key];
    if (v === undefined || !Number.isFinite(v)) return '?';
    return v.toFixed(3);
  });
}
