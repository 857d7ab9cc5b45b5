/**
 * RATEKEEPER - Glicko-2 Algorithm
 *
 * Pure TypeScript implementation of Mark Glickman's Glicko-2 rating system,
 * extended so that the number of elapsed rating periods may be any
 * non-negative real number instead of exactly one.
 *
 * Each player carries a rating (mu), a rating deviation (phi) and a volatility
 * (sigma). A rating step:
 *   1. computes the expected score against every opponent,
 *   2. estimates the variance v and improvement delta from the results,
 *   3. solves for the new volatility with the Illinois variant of regula falsi,
 *   4. grows phi for the elapsed time, then shrinks it with the new evidence,
 *   5. moves mu by the weighted sum of surprises.
 *
 * With no results only step 4's growth applies: idle players accumulate
 * uncertainty and nothing else changes.
 *
 * Reference: Glickman (2013) "Example of the Glicko-2 system"
 *            http://www.glicko.net/glicko/glicko2.pdf
 */

import { ConvergenceError } from './errors';
import { toInternal, toPublic } from './scale';
import type { GlickoSettings, InternalRating, PublicRating } from './schemas';

// ─── Result Types ─────────────────────────────────────────────────────────────

/** One game from the rated player's point of view, on the internal scale. */
export interface GameResult {
  opponent: InternalRating;
  /** 1 = win, 0.5 = draw, 0 = loss */
  score: number;
}

/** Same as GameResult, with the opponent on the public scale. */
export interface PublicGameResult {
  opponent: PublicRating;
  score: number;
}

/** Outcome of a match from the first player's point of view. */
export type MatchOutcome = 'win' | 'loss' | 'draw';

export function outcomeScore(outcome: MatchOutcome): number {
  switch (outcome) {
    case 'win':
      return 1;
    case 'draw':
      return 0.5;
    case 'loss':
      return 0;
  }
}

/** The same match seen from the opponent's side. */
export function invertOutcome(outcome: MatchOutcome): MatchOutcome {
  switch (outcome) {
    case 'win':
      return 'loss';
    case 'draw':
      return 'draw';
    case 'loss':
      return 'win';
  }
}

// ─── Glicko-2 Helpers ─────────────────────────────────────────────────────────

/**
 * g(phi): dampens the weight of a result against an uncertain opponent.
 */
export function g(phi: number): number {
  return 1 / Math.sqrt(1 + (3 * phi * phi) / (Math.PI * Math.PI));
}

/**
 * E(mu, mu_j, phi_j): expected score of a player against an opponent.
 */
export function expectedScore(player: InternalRating, opponent: InternalRating): number {
  return 1 / (1 + Math.exp(-g(opponent.phi) * (player.mu - opponent.mu)));
}

/**
 * Deviation after `elapsedPeriods` of idle time at the given volatility.
 * Called phi* ("pre-rating-period value") in the paper.
 */
export function preRatingPeriodDeviation(
  phi: number,
  volatility: number,
  elapsedPeriods: number,
): number {
  return Math.sqrt(phi * phi + volatility * volatility * elapsedPeriods);
}

interface ResultSums {
  /** Sum of g^2 * E * (1 - E); its inverse is v. */
  information: number;
  /** Sum of g * (s - E). */
  surprise: number;
}

function sumResults(player: InternalRating, results: readonly GameResult[]): ResultSums {
  let information = 0;
  let surprise = 0;

  for (const result of results) {
    const gPhi = g(result.opponent.phi);
    const e = expectedScore(player, result.opponent);
    information += gPhi * gPhi * e * (1 - e);
    surprise += gPhi * (result.score - e);
  }

  return { information, surprise };
}

// ─── Volatility (Step 5) ──────────────────────────────────────────────────────

/**
 * Solve step 5 of the paper for the new volatility.
 *
 * Works on x = ln(sigma^2). The initial bracket [A, B] starts at A = ln(sigma^2)
 * and either jumps straight to ln(delta^2 - phi^2 - v) or walks down in steps
 * of tau until f changes sign. Both the walk and the Illinois loop share
 * `settings.maxIterations`; running out throws ConvergenceError, as does any
 * non-finite value of f along the way.
 */
export function solveVolatility(
  delta: number,
  variance: number,
  player: InternalRating,
  settings: GlickoSettings,
): number {
  const { tau, convergenceTolerance, maxIterations } = settings;
  const phiSq = player.phi * player.phi;
  const deltaSq = delta * delta;
  const origin = Math.log(player.sigma * player.sigma);
  const tauSq = tau * tau;

  const f = (x: number): number => {
    const ex = Math.exp(x);
    const denom = phiSq + variance + ex;
    return (ex * (deltaSq - phiSq - variance - ex)) / (2 * denom * denom) - (x - origin) / tauSq;
  };

  let a = origin;
  let b: number;

  if (deltaSq > phiSq + variance) {
    b = Math.log(deltaSq - phiSq - variance);
  } else {
    let k = 1;
    for (;;) {
      const fK = f(origin - k * tau);
      if (!Number.isFinite(fK)) {
        throw new ConvergenceError(k, convergenceTolerance, `f(${origin - k * tau}) is ${fK}`);
      }
      if (fK >= 0) break;
      if (k >= maxIterations) {
        throw new ConvergenceError(maxIterations, convergenceTolerance, 'no sign change while widening the bracket');
      }
      k++;
    }
    b = origin - k * tau;
  }

  let fA = f(a);
  let fB = f(b);
  if (!Number.isFinite(fA) || !Number.isFinite(fB)) {
    throw new ConvergenceError(0, convergenceTolerance, `bracket [${a}, ${b}] gives f = [${fA}, ${fB}]`);
  }

  // A NaN bracket width must not read as converged.
  for (let iteration = 0; !(Math.abs(b - a) <= convergenceTolerance); iteration++) {
    if (iteration >= maxIterations) {
      throw new ConvergenceError(maxIterations, convergenceTolerance);
    }

    const c = a + ((a - b) * fA) / (fB - fA);
    const fC = f(c);
    if (!Number.isFinite(fC)) {
      throw new ConvergenceError(iteration + 1, convergenceTolerance, `f(${c}) is ${fC}`);
    }

    if (fC * fB <= 0) {
      a = b;
      fA = fB;
    } else {
      fA /= 2;
    }

    b = c;
    fB = fC;
  }

  return Math.exp(a / 2);
}

// ─── Rating Update ────────────────────────────────────────────────────────────

/**
 * Rate a player against a set of results after `elapsedPeriods` rating periods.
 *
 * `elapsedPeriods` may be fractional; 1 reproduces the classic period-based
 * update. Results may come in any order. Throws RangeError for a negative or
 * non-finite elapsed count and ConvergenceError if step 5 fails to converge or
 * the results carry no information (an expected score of exactly 0 or 1).
 */
export function rate(
  current: InternalRating,
  results: readonly GameResult[],
  elapsedPeriods: number,
  settings: GlickoSettings,
): InternalRating {
  if (!Number.isFinite(elapsedPeriods) || elapsedPeriods < 0) {
    throw new RangeError(`elapsedPeriods must be a finite number >= 0, got ${elapsedPeriods}`);
  }

  if (results.length === 0) {
    return {
      mu: current.mu,
      phi: preRatingPeriodDeviation(current.phi, current.sigma, elapsedPeriods),
      sigma: current.sigma,
    };
  }

  const { information, surprise } = sumResults(current, results);
  const variance = 1 / information;
  const delta = variance * surprise;
  if (!Number.isFinite(variance) || !Number.isFinite(delta)) {
    // E is exactly 0 or 1 in double precision: the results carry no information.
    throw new ConvergenceError(0, settings.convergenceTolerance, `variance is ${variance}, delta is ${delta}`);
  }

  const sigma = solveVolatility(delta, variance, current, settings);
  const phiStar = preRatingPeriodDeviation(current.phi, sigma, elapsedPeriods);
  const phi = 1 / Math.sqrt(1 / (phiStar * phiStar) + 1 / variance);
  const mu = current.mu + phi * phi * surprise;

  return { mu, phi, sigma };
}

/** Classic Glicko-2: close exactly one rating period. */
export function closeRatingPeriod(
  current: InternalRating,
  results: readonly GameResult[],
  settings: GlickoSettings,
): InternalRating {
  return rate(current, results, 1, settings);
}

/**
 * Untimed mode on the public scale, for callers that track time themselves.
 */
export function ratePublic(
  current: PublicRating,
  results: readonly PublicGameResult[],
  elapsedPeriods: number,
  settings: GlickoSettings,
): PublicRating {
  const internalResults = results.map((r) => ({
    opponent: toInternal(r.opponent),
    score: r.score,
  }));
  return toPublic(rate(toInternal(current), internalResults, elapsedPeriods, settings));
}
