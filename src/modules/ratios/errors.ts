export type RatioErrorCode =
  | 'UNKNOWN_METRIC'
  | 'MISSING_INPUT'
  | 'INVALID_INPUT'
  | 'INVALID_REGISTRY'
  | 'INVALID_STATEMENT';

/**
 * Base class for every failure raised by the engine.
 *
 * All of them are deterministic functions of the call arguments, so
 * `retryable` is always false: repeating the same call fails the same way.
 */
export class RatioEngineError extends Error {
  readonly retryable = false;

  constructor(
    public readonly code: RatioErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'RatioEngineError';
  }
}

export class UnknownMetricError extends RatioEngineError {
  constructor(public readonly metricId: string) {
    super('UNKNOWN_METRIC', `Unknown metric: ${metricId}`);
    this.name = 'UnknownMetricError';
  }
}

export class MissingInputError extends RatioEngineError {
  constructor(
    public readonly metricId: string,
    public readonly missingInputs: readonly string[]
  ) {
    super('MISSING_INPUT', `Missing input for ${metricId}: ${missingInputs.join(', ')}`);
    this.name = 'MissingInputError';
  }
}

export class InvalidInputError extends RatioEngineError {
  constructor(
    public readonly metricId: string,
    public readonly inputName: string,
    public readonly received: number
  ) {
    super('INVALID_INPUT', `Input ${inputName} for ${metricId} must be a finite number, got ${received}`);
    this.name = 'InvalidInputError';
  }
}

export class RegistryError extends RatioEngineError {
  constructor(public readonly issues: readonly string[]) {
    super('INVALID_REGISTRY', `Invalid metric registry: ${issues.join('; ')}`);
    this.name = 'RegistryError';
  }
}

export class StatementValidationError extends RatioEngineError {
  constructor(public readonly issues: readonly string[]) {
    super('INVALID_STATEMENT', `Invalid financial statement: ${issues.join('; ')}`);
    this.name = 'StatementValidationError';
  }
}

export function isRatioEngineError(error: unknown): error is RatioEngineError {
  return error instanceof RatioEngineError;
}
