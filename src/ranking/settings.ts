/**
 * RATEKEEPER - Settings
 *
 * Tuning parameters are plain frozen objects handed to every computation.
 * Nothing here is global, so several pools with different tuning can run
 * side by side in one process.
 */

import { InvalidSettingsError } from './errors';
import { GlickoSettingsSchema, formatIssues, type GlickoSettings, type PublicRating } from './schemas';

/** Glickman's step 1 starting point for an unrated player. */
export const DEFAULT_START_RATING: PublicRating = Object.freeze({
  rating: 1500,
  deviation: 350,
  volatility: 0.06,
});

/** Middle of the 0.3 - 1.2 range from the paper; tune per application. */
export const DEFAULT_TAU = 0.75;

export const DEFAULT_CONVERGENCE_TOLERANCE = 0.000001;

/** Fail-safe for the volatility loop; a sane tolerance converges in a handful of steps. */
export const DEFAULT_MAX_ITERATIONS = 10_000;

export const DEFAULT_RATING_PERIOD_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_SETTINGS: GlickoSettings = Object.freeze({
  tau: DEFAULT_TAU,
  convergenceTolerance: DEFAULT_CONVERGENCE_TOLERANCE,
  maxIterations: DEFAULT_MAX_ITERATIONS,
  defaultRating: DEFAULT_START_RATING,
  ratingPeriodMs: DEFAULT_RATING_PERIOD_MS,
});

export type GlickoSettingsInput = Partial<GlickoSettings>;

/**
 * Merge overrides onto the defaults and validate the result.
 * Invalid values are rejected here rather than surfacing mid-computation.
 */
export function createSettings(overrides: GlickoSettingsInput = {}): GlickoSettings {
  return parseSettings({ ...DEFAULT_SETTINGS, ...overrides });
}

export function parseSettings(input: unknown): GlickoSettings {
  const parsed = GlickoSettingsSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidSettingsError(formatIssues(parsed.error));
  }
  return Object.freeze({
    ...parsed.data,
    defaultRating: Object.freeze(parsed.data.defaultRating),
  });
}
