// lib/diagnostics/errors.ts
// Error taxonomy of the simulation core.

export type SimulationErrorCode =
  | 'CONFIGURATION'
  | 'INVARIANT_VIOLATION'
  | 'NUMERIC_DOMAIN'
  | 'OBSERVER'
  | 'SYSTEM_FAILURE';

export abstract class SimulationError extends Error {
  abstract readonly code: SimulationErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

/** Malformed or out-of-range configuration/hydration input. Fatal before the first tick. */
export class ConfigurationError extends SimulationError {
  readonly code = 'CONFIGURATION';
  readonly issues: ConfigIssue[];

  constructor(context: string, issues: ConfigIssue[]) {
    super(`${context}: ${issues.map(i => `${i.path || '<root>'} ${i.message}`).join('; ')}`);
    this.issues = issues;
  }
}

/** A system produced an impossible state, e.g. an edge pointing at a removed node. */
export class InvariantViolation extends SimulationError {
  readonly code = 'INVARIANT_VIOLATION';

  constructor(
    message: string,
    readonly subjectId: string,
  ) {
    super(message);
  }
}

/** A formula or field received a value outside its declared domain and was clamped. */
export class NumericDomainError extends SimulationError {
  readonly code = 'NUMERIC_DOMAIN';

  constructor(
    readonly field: string,
    readonly received: number,
    readonly clampedTo: number,
  ) {
    super(`${field} out of domain: ${received} -> ${clampedTo}`);
  }
}

/** Failure inside one observer's handler. Never propagated to the loop. */
export class ObserverError extends SimulationError {
  readonly code = 'OBSERVER';

  constructor(
    readonly observerTag: string,
    readonly tick: number,
    readonly failure: unknown,
  ) {
    super(`observer "${observerTag}" failed at tick ${tick}: ${describeError(failure)}`);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
