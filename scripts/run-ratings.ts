#!/usr/bin/env tsx
/**
 * RATEKEEPER - CLI Ladder Simulation
 *
 * Simulates a small ladder in the terminal: players with hidden true skill
 * play random matches over a few simulated weeks, and the engine's view of
 * them is printed as it converges.
 *
 * Usage:
 *   npx tsx scripts/run-ratings.ts
 *   npm run simulate
 *
 * Environment variables (optional, also read from .env):
 *   GLICKO_TAU, GLICKO_RATING_PERIOD_MS, ... - see src/config.ts
 *   SIM_MATCHES=200 - Number of matches to play, a positive integer (default: 120)
 *   SIM_SEED=7      - Seed for the match generator, an integer >= 0 (default: 42)
 */

import 'dotenv/config';

import { loadSettingsFromEnv, loadSimulationOptions } from '../src/config';
import { RatingEngine, type MatchOutcome, type PlayerId, type PublicRating } from '../src/ranking';

// ═══════════════════════════════════════════════════════════════════════════════
// ANSI Color Utilities
// ═══════════════════════════════════════════════════════════════════════════════

const C = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

function c(color: keyof typeof C, text: string): string {
  return `${C[color]}${text}${C.reset}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Deterministic Randomness
// ═══════════════════════════════════════════════════════════════════════════════

/** mulberry32: small seeded PRNG so runs are reproducible. */
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Simulation
// ═══════════════════════════════════════════════════════════════════════════════

interface SimPlayer {
  id: PlayerId;
  name: string;
  trueSkill: number;
}

const ROSTER: Array<{ name: string; trueSkill: number }> = [
  { name: 'Ada', trueSkill: 1850 },
  { name: 'Bram', trueSkill: 1700 },
  { name: 'Cleo', trueSkill: 1580 },
  { name: 'Dario', trueSkill: 1500 },
  { name: 'Esme', trueSkill: 1420 },
  { name: 'Finn', trueSkill: 1250 },
];

function playMatch(a: SimPlayer, b: SimPlayer, random: () => number): MatchOutcome {
  const pWin = 1 / (1 + Math.pow(10, (b.trueSkill - a.trueSkill) / 400));
  const roll = random();
  if (Math.abs(roll - pWin) < 0.04) return 'draw';
  return roll < pWin ? 'win' : 'loss';
}

function formatRating(r: PublicRating): string {
  return `${r.rating.toFixed(1).padStart(7)} ±${r.deviation.toFixed(1).padStart(6)}  σ=${r.volatility.toFixed(4)}`;
}

function printStandings(engine: RatingEngine, players: SimPlayer[], title: string): void {
  console.log(`\n${c('bold', title)}`);
  const byId = new Map(players.map((p) => [p.id, p]));

  engine.leaderboard().forEach((entry, idx) => {
    const player = byId.get(entry.playerId);
    const name = player ? player.name : `#${entry.playerId}`;
    const truth = player ? c('gray', `(true ${player.trueSkill})`) : '';
    console.log(
      `  ${String(idx + 1).padStart(2)}. ${c('cyan', name.padEnd(6))} ${formatRating(entry.rating)}  ` +
        `${c('dim', `games=${entry.gamesPlayed}`)} ${truth}`,
    );
  });
}

function main(): void {
  const settings = loadSettingsFromEnv();
  const { matches, seed } = loadSimulationOptions();
  const random = seededRandom(seed);

  let now = Date.UTC(2024, 0, 1);
  const engine = new RatingEngine(settings, {
    clock: () => now,
    logger: { debug: () => {}, warn: console.warn },
  });

  console.log(c('bold', '═══ RATEKEEPER - Ladder Simulation ═══'));
  console.log(
    c('gray', `tau=${settings.tau}  period=${settings.ratingPeriodMs}ms  matches=${matches}`),
  );

  const players: SimPlayer[] = ROSTER.map((p) => ({ ...p, id: engine.registerPlayer() }));

  for (let m = 1; m <= matches; m++) {
    // Matches arrive at irregular intervals, from minutes to a couple of days.
    now += Math.floor(random() * 2 * settings.ratingPeriodMs);

    const a = players[Math.floor(random() * players.length)];
    let b = players[Math.floor(random() * players.length)];
    while (b.id === a.id) b = players[Math.floor(random() * players.length)];

    const outcome = playMatch(a, b, random);
    const { playerA, playerB } = engine.registerResult(a.id, b.id, outcome);

    if (m % Math.max(1, Math.floor(matches / 8)) === 0) {
      const color = outcome === 'win' ? 'green' : outcome === 'loss' ? 'red' : 'yellow';
      console.log(
        `  ${c('gray', `#${String(m).padStart(3)}`)} ${a.name} vs ${b.name}: ${c(color, outcome.toUpperCase())}` +
          `  ${playerA.rating.toFixed(0)} / ${playerB.rating.toFixed(0)}`,
      );
    }
  }

  printStandings(engine, players, 'Standings after the last match');

  // A month of inactivity: ratings hold, deviations widen.
  now += 30 * settings.ratingPeriodMs;
  printStandings(engine, players, 'Standings after 30 idle periods');
}

main();
