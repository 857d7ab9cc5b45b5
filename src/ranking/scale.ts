/**
 * RATEKEEPER - Scale Conversion
 *
 * Glicko-2 does all of its arithmetic on an internal scale centred at 0 with
 * unit-order deviations. Ratings are shown to people on the original Glicko
 * scale centred at 1500. The two scales use different field names
 * (rating/deviation/volatility vs mu/phi/sigma), so a value's scale is always
 * visible at the call site and nothing converts implicitly.
 *
 * Reference: Glickman, "Example of the Glicko-2 system", steps 2 and 8.
 */

import { InvalidRatingError } from './errors';
import {
  PublicRatingSchema,
  formatIssues,
  type InternalRating,
  type PublicRating,
} from './schemas';

// ─── Constants ────────────────────────────────────────────────────────────────

/** Ratio between the public and the internal scale (400 / ln 10). */
export const RATING_SCALE = 173.7178;

/** Public rating that maps to mu = 0. */
export const RATING_ORIGIN = 1500;

/** Deviations below mu for the leaderboard estimate (~95% lower bound). */
export const CONSERVATIVE_FACTOR = 2;

// ─── Conversions ──────────────────────────────────────────────────────────────

export function toInternal(rating: PublicRating): InternalRating {
  return {
    mu: (rating.rating - RATING_ORIGIN) / RATING_SCALE,
    phi: rating.deviation / RATING_SCALE,
    sigma: rating.volatility,
  };
}

export function toPublic(rating: InternalRating): PublicRating {
  return {
    rating: rating.mu * RATING_SCALE + RATING_ORIGIN,
    deviation: rating.phi * RATING_SCALE,
    volatility: rating.sigma,
  };
}

// ─── Construction ─────────────────────────────────────────────────────────────

/**
 * Build a validated public rating. Throws InvalidRatingError for a negative
 * deviation, a non-positive volatility, or any non-finite field.
 */
export function publicRating(rating: number, deviation: number, volatility: number): PublicRating {
  return assertPublicRating({ rating, deviation, volatility });
}

export function assertPublicRating(value: PublicRating): PublicRating {
  const parsed = PublicRatingSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidRatingError(`Invalid rating: ${formatIssues(parsed.error).join('; ')}`);
  }
  return Object.freeze(parsed.data);
}

/**
 * Conservative skill estimate: rating - k * deviation.
 * A new player with a wide deviation starts low and climbs as the deviation shrinks.
 */
export function conservativeRating(rating: PublicRating, k: number = CONSERVATIVE_FACTOR): number {
  return rating.rating - k * rating.deviation;
}
