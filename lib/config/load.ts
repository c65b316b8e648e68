// lib/config/load.ts

import { configSchema } from './schema';
import type { ConfigInput, SimulationConfig } from './schema';
import { ConfigurationError } from '../diagnostics/errors';
import { deepFreeze } from '../util/freeze';

/**
 * Validate overrides against declared bounds and fill defaults.
 * Throws ConfigurationError listing every offending path.
 */
export function loadConfig(input: ConfigInput = {}): SimulationConfig {
  const parsed = configSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      'invalid simulation config',
      parsed.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
    );
  }
  return deepFreeze(parsed.data);
}

export const DEFAULT_CONFIG: SimulationConfig = loadConfig();
