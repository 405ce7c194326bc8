/** A Fund or ProjectionParams value violates its invariants. */
export class ConstructionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConstructionError';
  }
}

/**
 * A single fund's projection could not be completed. Attributed to that fund
 * and reported without aborting the rest of a comparison.
 */
export class CalculationFailure extends Error {
  readonly reason: string;

  constructor(
    public readonly fundName: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Error calculating returns for ${fundName}: ${reason}`, { cause });
    this.name = 'CalculationFailure';
    this.reason = reason;
  }
}

/** Every fund in a comparison was excluded or failed. */
export class NoResultsFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NoResultsFailure';
  }
}
