// index.ts
// Public entry point: world model, engine, systems, observers and bundled data.

export * from './enums';
export * from './types';
export * from './lib/config';
export * from './lib/core/noise';
export * from './lib/diagnostics/errors';
export * from './lib/diagnostics/logger';
export * from './lib/diagnostics/report';
export * from './lib/endgame';
export * from './lib/engine';
export * from './lib/events/bus';
export * from './lib/events/log';
export * from './lib/events/types';
export * from './lib/formulas';
export * from './lib/model';
export * from './lib/observers';
export * from './lib/systems';
export * from './lib/templates';
export * from './data/scenarios';
export * from './data/templates';
