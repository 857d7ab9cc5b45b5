/**
 * RATEKEEPER - Ranking Module
 *
 * Glicko-2 ratings maintained in continuous time.
 *
 *   - Scale conversion between the public 1500-centred scale and the
 *     internal scale used for all arithmetic
 *   - A pure rating step that accepts fractional elapsed rating periods
 *   - A clock-driven engine that owns one pool of competitors
 *
 * The algorithm and conversions are usable on their own for callers that
 * keep track of time themselves.
 */

// Core Glicko-2 math
export {
  rate,
  ratePublic,
  closeRatingPeriod,
  solveVolatility,
  expectedScore,
  preRatingPeriodDeviation,
  outcomeScore,
  invertOutcome,
  g,
} from './glicko2';

export type { GameResult, PublicGameResult, MatchOutcome } from './glicko2';

// Scale conversion
export {
  toInternal,
  toPublic,
  publicRating,
  assertPublicRating,
  conservativeRating,
  RATING_SCALE,
  RATING_ORIGIN,
  CONSERVATIVE_FACTOR,
} from './scale';

// Settings
export {
  createSettings,
  parseSettings,
  DEFAULT_SETTINGS,
  DEFAULT_START_RATING,
  DEFAULT_TAU,
  DEFAULT_CONVERGENCE_TOLERANCE,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_RATING_PERIOD_MS,
} from './settings';

export type { GlickoSettingsInput } from './settings';

export type {
  PublicRating,
  InternalRating,
  GlickoSettings,
  CompetitorRecord,
  EngineSnapshot,
} from './schemas';

// Engine
export { RatingEngine, createEngine } from './engine';

export type {
  PlayerId,
  Clock,
  Logger,
  RatingEngineOptions,
  MatchRatings,
  LeaderboardOptions,
  LeaderboardEntry,
} from './engine';

// Errors
export {
  RatingError,
  UnknownPlayerError,
  ConvergenceError,
  InvalidSettingsError,
  InvalidRatingError,
  SelfMatchError,
  InvalidSnapshotError,
} from './errors';
