// lib/diagnostics/report.ts
// Turns contained per-tick errors into diagnostic events.

import type { EventDraft } from '../events/types';
import { InvariantViolation, NumericDomainError, SimulationError } from './errors';

export function diagnosticEvent(system: string, error: SimulationError): EventDraft {
  let subjectId: string | undefined;
  if (error instanceof InvariantViolation) subjectId = error.subjectId;
  else if (error instanceof NumericDomainError) subjectId = error.field;
  return {
    kind: 'diagnostic',
    payload: subjectId === undefined
      ? { code: error.code, system, message: error.message }
      : { code: error.code, system, message: error.message, subjectId },
  };
}

/**
 * Clamp a value into [min, max]. When it had to move, the violation is collected
 * so the caller can surface it as a diagnostic event.
 */
export function clampReported(
  field: string,
  value: number,
  min: number,
  max: number,
  sink: SimulationError[],
): number {
  const clamped = Number.isNaN(value) ? min : Math.min(max, Math.max(min, value));
  if (clamped !== value) sink.push(new NumericDomainError(field, value, clamped));
  return clamped;
}
