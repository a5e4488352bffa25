import { UnknownPhaseError } from '../../../common/errors.js';

export const PHASES = ['H30', 'H5', 'RESULT'] as const;

export type Phase = (typeof PHASES)[number];

export function isPhase(value: unknown): value is Phase {
  return typeof value === 'string' && PHASES.some((p) => p === value);
}

/** Accepts the exact phase names only; anything else is a typed error */
export function parsePhase(value: unknown): Phase {
  if (!isPhase(value)) throw new UnknownPhaseError(value);
  return value;
}

export function assertNever(value: never): never {
  throw new UnknownPhaseError(value);
}
