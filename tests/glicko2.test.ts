#!/usr/bin/env tsx
/**
 * RATEKEEPER - Glicko-2 Algorithm Tests
 *
 * Validates:
 *   - Paper reference values (Glickman's worked example)
 *   - g() and expected score against the paper's intermediate values
 *   - Idle-time deviation growth and zero-result stability
 *   - Fractional elapsed periods
 *   - Volatility bracket branches and convergence failure surfacing
 *
 * Run: npx tsx tests/glicko2.test.ts
 */

import {
  rate,
  ratePublic,
  closeRatingPeriod,
  expectedScore,
  g,
  outcomeScore,
  invertOutcome,
  solveVolatility,
} from '../src/ranking/glicko2';
import { toInternal, toPublic, RATING_SCALE } from '../src/ranking/scale';
import { createSettings } from '../src/ranking/settings';
import { ConvergenceError } from '../src/ranking/errors';
import type { InternalRating, PublicRating } from '../src/ranking/schemas';

// ─── Test Utilities ──────────────────────────────────────────────────────────

let passed = 0;
let failed = 0;
const failures: string[] = [];

function assert(condition: boolean, message: string): void {
  if (!condition) {
    failed++;
    failures.push(message);
    console.log(`  FAIL: ${message}`);
  } else {
    passed++;
    console.log(`  PASS: ${message}`);
  }
}

function assertApprox(actual: number, expected: number, tolerance: number, message: string): void {
  assert(
    Math.abs(actual - expected) <= tolerance,
    `${message} (actual: ${actual}, expected: ${expected}, tolerance: ${tolerance})`,
  );
}

function assertThrows(
  fn: () => unknown,
  errorType: new (...args: never[]) => Error,
  message: string,
): unknown {
  try {
    fn();
  } catch (err) {
    assert(err instanceof errorType, `${message} (threw ${String(err)})`);
    return err;
  }
  assert(false, `${message} (did not throw)`);
  return undefined;
}

function section(name: string): void {
  console.log(`\n--- ${name} ---`);
}

// ─── Fixtures ────────────────────────────────────────────────────────────────

const paperSettings = createSettings({ tau: 0.5 });

const paperPlayer: PublicRating = { rating: 1500, deviation: 200, volatility: 0.06 };

const paperOpponents: PublicRating[] = [
  { rating: 1400, deviation: 30, volatility: 0.06 },
  { rating: 1550, deviation: 100, volatility: 0.06 },
  { rating: 1700, deviation: 300, volatility: 0.06 },
];

const paperScores = [1, 0, 0];

function paperResults() {
  return paperOpponents.map((opponent, i) => ({
    opponent: toInternal(opponent),
    score: paperScores[i],
  }));
}

// ═══════════════════════════════════════════════════════════════════════════════
// TEST SUITE: Paper Example
// ═══════════════════════════════════════════════════════════════════════════════

function testPaperIntermediates(): void {
  section('Paper Example: g() and E()');

  const player = toInternal(paperPlayer);
  const [o1, o2, o3] = paperOpponents.map(toInternal);

  assertApprox(g(o1.phi), 0.9955, 0.0001, 'g(phi_1) should be ~0.9955');
  assertApprox(g(o2.phi), 0.9531, 0.0001, 'g(phi_2) should be ~0.9531');
  assertApprox(g(o3.phi), 0.7242, 0.0001, 'g(phi_3) should be ~0.7242');

  assertApprox(expectedScore(player, o1), 0.639, 0.001, 'E vs opponent 1 should be ~0.639');
  assertApprox(expectedScore(player, o2), 0.432, 0.001, 'E vs opponent 2 should be ~0.432');
  assertApprox(expectedScore(player, o3), 0.303, 0.001, 'E vs opponent 3 should be ~0.303');
}

function testPaperReferenceValues(): void {
  section('Paper Example: Rating Step');

  const next = toPublic(rate(toInternal(paperPlayer), paperResults(), 1, paperSettings));

  assertApprox(next.rating, 1464.06, 0.01, 'Rating should be ~1464.06');
  assertApprox(next.deviation, 151.52, 0.01, 'Deviation should be ~151.52');
  assertApprox(next.volatility, 0.05999, 0.0001, 'Volatility should be ~0.05999');
}

function testResultOrderIndependence(): void {
  section('Paper Example: Result Order');

  const forward = rate(toInternal(paperPlayer), paperResults(), 1, paperSettings);
  const reversed = rate(toInternal(paperPlayer), [...paperResults()].reverse(), 1, paperSettings);

  assertApprox(reversed.mu, forward.mu, 1e-9, 'mu should not depend on result order');
  assertApprox(reversed.phi, forward.phi, 1e-9, 'phi should not depend on result order');
  assertApprox(reversed.sigma, forward.sigma, 1e-9, 'sigma should not depend on result order');
}

function testHelpersMatchRate(): void {
  section('Helpers: closeRatingPeriod / ratePublic');

  const viaRate = rate(toInternal(paperPlayer), paperResults(), 1, paperSettings);
  const viaClose = closeRatingPeriod(toInternal(paperPlayer), paperResults(), paperSettings);
  assert(
    viaClose.mu === viaRate.mu && viaClose.phi === viaRate.phi && viaClose.sigma === viaRate.sigma,
    'closeRatingPeriod should equal rate with one elapsed period',
  );

  const publicResults = paperOpponents.map((opponent, i) => ({ opponent, score: paperScores[i] }));
  const viaPublic = ratePublic(paperPlayer, publicResults, 1, paperSettings);
  const expected = toPublic(viaRate);
  assert(
    viaPublic.rating === expected.rating &&
      viaPublic.deviation === expected.deviation &&
      viaPublic.volatility === expected.volatility,
    'ratePublic should equal toPublic(rate(toInternal(...)))',
  );
}

// ═══════════════════════════════════════════════════════════════════════════════
// TEST SUITE: Idle Decay
// ═══════════════════════════════════════════════════════════════════════════════

function testZeroResultStability(): void {
  section('Idle: Zero Results, Zero Elapsed');

  const current: InternalRating = { mu: 0.37, phi: 1.1, sigma: 0.06 };
  const next = rate(current, [], 0, paperSettings);

  assert(next.mu === current.mu, 'mu should be unchanged');
  assertApprox(next.phi, current.phi, 1e-15, 'phi should be unchanged');
  assert(next.sigma === current.sigma, 'sigma should be unchanged');
}

function testIdleDecayValue(): void {
  section('Idle: One Period');

  const next = toPublic(rate(toInternal(paperPlayer), [], 1, paperSettings));
  const expected = Math.sqrt((200 / RATING_SCALE) ** 2 + 0.06 ** 2) * RATING_SCALE;

  assertApprox(next.deviation, expected, 1e-9, 'Deviation should grow by sigma^2 per period');
  assertApprox(next.rating, 1500, 1e-9, 'Rating should not move while idle');
  assert(next.volatility === 0.06, 'Volatility should not move while idle');
}

function testIdleDecayMonotonic(): void {
  section('Idle: Monotonic In Elapsed Time');

  const current = toInternal(paperPlayer);
  const elapsed = [0, 0.01, 0.25, 0.5, 1, 2.5, 10, 100];
  const phis = elapsed.map((e) => rate(current, [], e, paperSettings).phi);

  let monotonic = true;
  for (let i = 1; i < phis.length; i++) {
    if (phis[i] < phis[i - 1]) monotonic = false;
  }
  assert(monotonic, 'Deviation should be non-decreasing in elapsed periods');
  assert(phis[phis.length - 1] > phis[0], 'Deviation after 100 periods should exceed the start');
}

function testFractionalElapsed(): void {
  section('Fractional Periods');

  const current = toInternal(paperPlayer);
  const half = rate(current, [], 0.5, paperSettings);
  const expected = Math.sqrt(current.phi ** 2 + 0.5 * current.sigma ** 2);
  assertApprox(half.phi, expected, 1e-12, 'Half a period should add half of sigma^2');

  const results = paperResults();
  const instant = rate(current, results, 0, paperSettings);
  const full = rate(current, results, 1, paperSettings);
  assert(instant.phi < full.phi, 'Games with less elapsed time should leave a smaller deviation');
}

function testNegativeElapsedRejected(): void {
  section('Elapsed Validation');

  assertThrows(
    () => rate(toInternal(paperPlayer), [], -0.1, paperSettings),
    RangeError,
    'Negative elapsed periods should throw RangeError',
  );
  assertThrows(
    () => rate(toInternal(paperPlayer), [], Number.NaN, paperSettings),
    RangeError,
    'NaN elapsed periods should throw RangeError',
  );
}

// ═══════════════════════════════════════════════════════════════════════════════
// TEST SUITE: Single Games
// ═══════════════════════════════════════════════════════════════════════════════

function testWinLossDirection(): void {
  section('Single Game: Direction');

  const player = toInternal(paperPlayer);
  const opponent = toInternal({ rating: 1500, deviation: 200, volatility: 0.06 });

  const won = rate(player, [{ opponent, score: 1 }], 0, paperSettings);
  const lost = rate(player, [{ opponent, score: 0 }], 0, paperSettings);
  const drew = rate(player, [{ opponent, score: 0.5 }], 0, paperSettings);

  assert(won.mu > player.mu, 'A win against an equal should raise mu');
  assert(lost.mu < player.mu, 'A loss against an equal should lower mu');
  assertApprox(drew.mu, player.mu, 1e-12, 'A draw against an equal should leave mu in place');
  assertApprox(won.mu - player.mu, player.mu - lost.mu, 1e-12, 'Win and loss should move mu symmetrically');
  assert(won.phi < player.phi, 'A game should shrink the deviation');
}

function testOutcomeMapping(): void {
  section('Outcomes');

  assert(outcomeScore('win') === 1, 'win scores 1');
  assert(outcomeScore('draw') === 0.5, 'draw scores 0.5');
  assert(outcomeScore('loss') === 0, 'loss scores 0');
  assert(invertOutcome('win') === 'loss', 'win inverts to loss');
  assert(invertOutcome('loss') === 'win', 'loss inverts to win');
  assert(invertOutcome('draw') === 'draw', 'draw inverts to draw');
}

// ═══════════════════════════════════════════════════════════════════════════════
// TEST SUITE: Convergence
// ═══════════════════════════════════════════════════════════════════════════════

function testConvergenceFailure(): void {
  section('Convergence: Iteration Cap');

  const strict = createSettings({ tau: 0.5, maxIterations: 1, convergenceTolerance: 1e-12 });
  const err = assertThrows(
    () => rate(toInternal(paperPlayer), paperResults(), 1, strict),
    ConvergenceError,
    'Exceeding the iteration cap should throw ConvergenceError',
  );
  if (err instanceof ConvergenceError) {
    assert(err.iterations === 1, 'Error should report the iteration cap');
    assert(err.tolerance === 1e-12, 'Error should report the tolerance');
    assert(err.reason === undefined, 'The cap should trip in the Illinois loop, not the bracket walk');
  }
}

/** Glickman's step-5 objective, written out independently of the solver. */
function volatilityObjective(x: number, delta: number, variance: number, player: InternalRating, tau: number): number {
  const ex = Math.exp(x);
  const phiSq = player.phi ** 2;
  const num = ex * (delta ** 2 - phiSq - variance - ex);
  const den = 2 * (phiSq + variance + ex) ** 2;
  return num / den - (x - Math.log(player.sigma ** 2)) / tau ** 2;
}

function testDirectBracket(): void {
  section('Volatility: Direct Bracket (Big Upset)');

  const player = toInternal({ rating: 1500, deviation: 30, volatility: 0.06 });
  const favourite = toInternal({ rating: 2100, deviation: 30, volatility: 0.06 });
  const gPhi = g(favourite.phi);
  const e = expectedScore(player, favourite);
  const variance = 1 / (gPhi * gPhi * e * (1 - e));
  const delta = variance * (gPhi * (1 - e));

  assert(delta ** 2 > player.phi ** 2 + variance, 'Upset should satisfy delta^2 > phi^2 + v');

  const sigma = solveVolatility(delta, variance, player, paperSettings);
  const x = Math.log(sigma * sigma);
  assertApprox(volatilityObjective(x, delta, variance, player, 0.5), 0, 1e-5, 'Result should be a root of f');
  assert(volatilityObjective(x - 1e-4, delta, variance, player, 0.5) > 0, 'f should be positive just below the root');
  assert(volatilityObjective(x + 1e-4, delta, variance, player, 0.5) < 0, 'f should be negative just above the root');
  assert(sigma > player.sigma, 'A big upset should raise volatility');

  const next = rate(player, [{ opponent: favourite, score: 1 }], 1, paperSettings);
  assert(next.sigma === sigma, 'rate should use the same volatility');
}

function testBracketWalkCap(): void {
  section('Volatility: Bracket Walk Cap');

  // Huge volatility and a wide tau: f(ln sigma^2 - tau) is still negative, so the walk needs k = 2.
  const player = toInternal({ rating: 1500, deviation: 30, volatility: 100 });
  const opponent = toInternal({ rating: 1500, deviation: 30, volatility: 0.06 });
  const results = [{ opponent, score: 0.5 }];

  const capped = createSettings({ tau: 5, maxIterations: 1 });
  const err = assertThrows(
    () => rate(player, results, 1, capped),
    ConvergenceError,
    'Running out of walk steps should throw ConvergenceError',
  );
  if (err instanceof ConvergenceError) {
    assert(err.iterations === 1, 'Error should report the iteration cap');
    assert(err.reason === 'no sign change while widening the bracket', 'Error should name the bracket walk');
  }

  const next = rate(player, results, 1, createSettings({ tau: 5 }));
  assert(Number.isFinite(next.sigma) && next.sigma > 0, 'With the default cap the walk should find a bracket');
}

function testNonFiniteInputs(): void {
  section('Volatility: No Information');

  const giant = toInternal({ rating: 9000, deviation: 100, volatility: 0.06 });
  const rookie = toInternal({ rating: 1500, deviation: 100, volatility: 0.06 });
  assert(expectedScore(giant, rookie) === 1, 'Expected score should round to exactly 1');

  const direct = assertThrows(
    () => solveVolatility(Number.NaN, Number.POSITIVE_INFINITY, giant, paperSettings),
    ConvergenceError,
    'solveVolatility should reject NaN delta and infinite variance',
  );
  if (direct instanceof ConvergenceError) {
    assert(direct.reason !== undefined, 'Error should carry a reason');
  }

  assertThrows(
    () => rate(giant, [{ opponent: rookie, score: 1 }], 1, paperSettings),
    ConvergenceError,
    'An expected win should throw instead of keeping the old volatility',
  );
  const loss = assertThrows(
    () => rate(giant, [{ opponent: rookie, score: 0 }], 1, paperSettings),
    ConvergenceError,
    'An impossible loss should throw instead of keeping the old volatility',
  );
  if (loss instanceof ConvergenceError) {
    assert(loss.reason === 'variance is Infinity, delta is -Infinity', 'Error should name the variance');
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Runner
// ═══════════════════════════════════════════════════════════════════════════════

function runAllTests(): void {
  console.log('RATEKEEPER - Glicko-2 Tests');
  console.log('===========================');

  testPaperIntermediates();
  testPaperReferenceValues();
  testResultOrderIndependence();
  testHelpersMatchRate();

  testZeroResultStability();
  testIdleDecayValue();
  testIdleDecayMonotonic();
  testFractionalElapsed();
  testNegativeElapsedRejected();

  testWinLossDirection();
  testOutcomeMapping();

  testConvergenceFailure();
  testDirectBracket();
  testBracketWalkCap();
  testNonFiniteInputs();

  console.log('\n===========================');
  console.log(`RESULTS: ${passed} passed, ${failed} failed`);

  if (failures.length > 0) {
    console.log('\nFAILURES:');
    for (const f of failures) {
      console.log(`  - ${f}`);
    }
    process.exit(1);
  } else {
    console.log('All tests passed!');
  }
}

runAllTests();
