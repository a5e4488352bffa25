/**
 * COMMON — Error taxonomy
 *
 * Every fatal or fail-closed condition is an AppError with a stable code.
 * Guardrail rejections are NOT errors: they come back as verdicts.
 */

export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;

  constructor(code: string, message: string, statusCode = 500, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

/** Snapshot, enrichment, calibration or results missing or unusable. */
export class DataUnavailableError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('DATA_UNAVAILABLE', message, 503, details);
  }
}

export class ConfigInvalidError extends AppError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIG_INVALID', `Invalid GPI configuration: ${issues.join('; ')}`, 500, { issues });
    this.issues = issues;
  }
}

export class AllocationFailureError extends AppError {
  constructor(message: string) {
    super('ALLOCATION_FAILURE', message, 500);
  }
}

export class UnknownPhaseError extends AppError {
  constructor(value: unknown) {
    super('UNKNOWN_PHASE', `Unknown phase: ${String(value)}`, 400, { value: String(value) });
  }
}

export class PhaseLockedError extends AppError {
  constructor(key: string) {
    super('PHASE_LOCKED', `Another invocation is running ${key}`, 409, { key });
  }
}

export class PhaseTimeoutError extends AppError {
  constructor(key: string, timeoutMs: number) {
    super('PHASE_TIMEOUT', `${key} did not complete within ${timeoutMs}ms`, 504, { key, timeoutMs });
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', message, 400, details);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
