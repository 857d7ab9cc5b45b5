/**
 * RATEKEEPER - Error Types
 *
 * Every failure raised by the ranking module extends RatingError so callers
 * can catch the whole family with one instanceof check.
 */

export class RatingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RatingError';
  }
}

/** An engine operation referenced a player id the engine does not hold. */
export class UnknownPlayerError extends RatingError {
  constructor(public readonly playerId: number) {
    super(`Unknown player: ${playerId}`);
    this.name = 'UnknownPlayerError';
  }
}

/**
 * The volatility root-finder hit its iteration cap before reaching tolerance,
 * or its objective stopped being finite (`reason` says which input).
 */
export class ConvergenceError extends RatingError {
  constructor(
    public readonly iterations: number,
    public readonly tolerance: number,
    public readonly reason?: string,
  ) {
    super(
      reason
        ? `Volatility iteration failed after ${iterations} iterations: ${reason}`
        : `Volatility iteration did not converge within ${iterations} iterations (tolerance ${tolerance})`,
    );
    this.name = 'ConvergenceError';
  }
}

export class InvalidSettingsError extends RatingError {
  constructor(public readonly issues: string[]) {
    super(`Invalid settings: ${issues.join('; ')}`);
    this.name = 'InvalidSettingsError';
  }
}

export class InvalidRatingError extends RatingError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRatingError';
  }
}

export class SelfMatchError extends RatingError {
  constructor(public readonly playerId: number) {
    super(`Player ${playerId} cannot play against themselves`);
    this.name = 'SelfMatchError';
  }
}

export class InvalidSnapshotError extends RatingError {
  constructor(public readonly issues: string[]) {
    super(`Invalid engine snapshot: ${issues.join('; ')}`);
    this.name = 'InvalidSnapshotError';
  }
}
