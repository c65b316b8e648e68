export { loadConfig, DEFAULT_CONFIG } from './load';
export { configSchema } from './schema';
export type { SimulationConfig, ConfigInput } from './schema';
