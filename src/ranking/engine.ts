/**
 * RATEKEEPER - Rating Engine
 *
 * Owns the competitor map for one rating pool and applies Glicko-2 in
 * continuous time. Every record remembers when it was last updated; each
 * interaction converts the time since then into a fractional number of rating
 * periods and hands it to the algorithm.
 *
 *   - Queries derive idle-time deviation growth on the fly and never write it
 *     back, so repeated queries are free of side effects.
 *   - A recorded result is its own minimal rating period for both players,
 *     each rated against the other's rating as decayed to the match instant.
 *
 * All operations are synchronous. JavaScript runs each call to completion, so
 * two calls touching the same competitor can never interleave.
 */

import { InvalidSnapshotError, SelfMatchError, UnknownPlayerError } from './errors';
import { invertOutcome, outcomeScore, rate, type MatchOutcome } from './glicko2';
import { assertPublicRating, conservativeRating, toInternal, toPublic } from './scale';
import {
  EngineSnapshotSchema,
  formatIssues,
  type CompetitorRecord,
  type EngineSnapshot,
  type GlickoSettings,
  type InternalRating,
  type PublicRating,
} from './schemas';
import { createSettings, parseSettings, type GlickoSettingsInput } from './settings';

// ─── Types ────────────────────────────────────────────────────────────────────

export type PlayerId = number;

/** Milliseconds since the Unix epoch. */
export type Clock = () => number;

export type Logger = Pick<Console, 'debug' | 'warn'>;

export interface RatingEngineOptions {
  /** Time source; defaults to Date.now. Inject a manual clock for deterministic tests. */
  clock?: Clock;
  logger?: Logger;
}

export interface MatchRatings {
  playerA: PublicRating;
  playerB: PublicRating;
}

export interface LeaderboardOptions {
  /** Maximum entries to return; negative or NaN throws RangeError. */
  limit?: number;
  /** Hide players with fewer recorded games. */
  minGames?: number;
}

export interface LeaderboardEntry {
  playerId: PlayerId;
  rating: PublicRating;
  conservative: number;
  gamesPlayed: number;
}

// ─── Rating Engine ────────────────────────────────────────────────────────────

export class RatingEngine {
  private readonly players = new Map<PlayerId, CompetitorRecord>();
  private nextId: PlayerId = 1;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(
    private readonly config: GlickoSettings,
    options: RatingEngineOptions = {},
  ) {
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? console;
  }

  get settings(): GlickoSettings {
    return this.config;
  }

  get size(): number {
    return this.players.size;
  }

  hasPlayer(id: PlayerId): boolean {
    return this.players.has(id);
  }

  playerIds(): PlayerId[] {
    return [...this.players.keys()];
  }

  // ─── Registration ─────────────────────────────────────────────────────────

  /**
   * Add a player starting from `starting` (or the settings' default rating).
   * Ids are handed out in increasing order and never reused.
   */
  registerPlayer(starting?: PublicRating): PlayerId {
    return this.registerPlayerAt(starting, this.clock());
  }

  registerPlayerAt(starting: PublicRating | undefined, at: number): PlayerId {
    const rating = assertPublicRating(starting ?? this.config.defaultRating);
    const id = this.nextId++;

    this.players.set(id, {
      id,
      rating: toInternal(rating),
      lastUpdatedAt: at,
      gamesPlayed: 0,
    });

    this.logger.debug(
      `[RatingEngine] Registered player ${id} at ${rating.rating.toFixed(1)} ±${rating.deviation.toFixed(1)}`,
    );
    return id;
  }

  // ─── Queries ──────────────────────────────────────────────────────────────

  /**
   * Current rating including deviation growth since the last update.
   * Does not modify stored state.
   */
  playerRating(id: PlayerId): PublicRating {
    return this.playerRatingAt(id, this.clock());
  }

  playerRatingAt(id: PlayerId, at: number): PublicRating {
    return toPublic(this.decayedRating(this.getRecord(id), at));
  }

  /** Rating as of the last recorded game or registration, without idle decay. */
  storedRating(id: PlayerId): PublicRating {
    return toPublic(this.getRecord(id).rating);
  }

  gamesPlayed(id: PlayerId): number {
    return this.getRecord(id).gamesPlayed;
  }

  /**
   * Players ranked by conservative rating (rating - 2 * deviation) of their
   * current decayed rating, best first. Ties go to the lower id.
   */
  leaderboard(options: LeaderboardOptions = {}): LeaderboardEntry[] {
    return this.leaderboardAt(options, this.clock());
  }

  leaderboardAt(options: LeaderboardOptions, at: number): LeaderboardEntry[] {
    const { limit = Infinity, minGames = 0 } = options;
    if (Number.isNaN(limit) || limit < 0) {
      throw new RangeError(`limit must be >= 0, got ${limit}`);
    }
    const entries: LeaderboardEntry[] = [];

    for (const record of this.players.values()) {
      if (record.gamesPlayed < minGames) continue;
      const rating = toPublic(this.decayedRating(record, at));
      entries.push({
        playerId: record.id,
        rating,
        conservative: conservativeRating(rating),
        gamesPlayed: record.gamesPlayed,
      });
    }

    entries.sort((x, y) => y.conservative - x.conservative || x.playerId - y.playerId);
    return entries.slice(0, limit);
  }

  // ─── Results ──────────────────────────────────────────────────────────────

  /**
   * Record a game between two players. `outcome` is from playerA's side.
   *
   * Both updates are computed from the pre-match state and only then
   * committed (A first, B second), so neither side's new rating feeds into
   * the other's. If either computation throws, nothing is written.
   */
  registerResult(playerA: PlayerId, playerB: PlayerId, outcome: MatchOutcome): MatchRatings {
    return this.registerResultAt(playerA, playerB, outcome, this.clock());
  }

  registerResultAt(
    playerA: PlayerId,
    playerB: PlayerId,
    outcome: MatchOutcome,
    at: number,
  ): MatchRatings {
    const recordA = this.getRecord(playerA);
    const recordB = this.getRecord(playerB);
    if (playerA === playerB) throw new SelfMatchError(playerA);

    const elapsedA = this.elapsedPeriods(recordA, at);
    const elapsedB = this.elapsedPeriods(recordB, at);

    // Each side sees the other as decayed to the match instant (read only).
    const opponentOfA = rate(recordB.rating, [], elapsedB, this.config);
    const opponentOfB = rate(recordA.rating, [], elapsedA, this.config);

    const nextA = rate(
      recordA.rating,
      [{ opponent: opponentOfA, score: outcomeScore(outcome) }],
      elapsedA,
      this.config,
    );
    const nextB = rate(
      recordB.rating,
      [{ opponent: opponentOfB, score: outcomeScore(invertOutcome(outcome)) }],
      elapsedB,
      this.config,
    );

    this.commit(recordA, nextA, at);
    this.commit(recordB, nextB, at);

    const ratings = { playerA: toPublic(nextA), playerB: toPublic(nextB) };
    this.logger.debug(
      `[RatingEngine] ${playerA} vs ${playerB} (${outcome}): ` +
        `${ratings.playerA.rating.toFixed(1)} / ${ratings.playerB.rating.toFixed(1)}`,
    );
    return ratings;
  }

  // ─── Snapshots ────────────────────────────────────────────────────────────

  /** JSON-safe copy of the full engine state. */
  snapshot(): EngineSnapshot {
    return {
      version: 1,
      settings: {
        ...this.config,
        defaultRating: { ...this.config.defaultRating },
      },
      nextId: this.nextId,
      players: [...this.players.values()].map((record) => ({
        ...record,
        rating: { ...record.rating },
      })),
    };
  }

  /**
   * Rebuild an engine from `snapshot()` output (or its JSON round-trip).
   * Throws InvalidSnapshotError when the input does not validate.
   */
  static restore(snapshot: unknown, options: RatingEngineOptions = {}): RatingEngine {
    const parsed = EngineSnapshotSchema.safeParse(snapshot);
    if (!parsed.success) {
      throw new InvalidSnapshotError(formatIssues(parsed.error));
    }

    const engine = new RatingEngine(parseSettings(parsed.data.settings), options);
    for (const record of parsed.data.players) {
      engine.players.set(record.id, record);
    }
    engine.nextId = parsed.data.nextId;
    return engine;
  }

  // ─── Internals ────────────────────────────────────────────────────────────

  private getRecord(id: PlayerId): CompetitorRecord {
    const record = this.players.get(id);
    if (!record) throw new UnknownPlayerError(id);
    return record;
  }

  private elapsedPeriods(record: CompetitorRecord, at: number): number {
    const elapsedMs = at - record.lastUpdatedAt;
    if (elapsedMs < 0) {
      this.logger.warn(
        `[RatingEngine] Clock is ${-elapsedMs}ms behind player ${record.id}'s last update, treating as no elapsed time`,
      );
      return 0;
    }
    return elapsedMs / this.config.ratingPeriodMs;
  }

  private decayedRating(record: CompetitorRecord, at: number): InternalRating {
    return rate(record.rating, [], this.elapsedPeriods(record, at), this.config);
  }

  private commit(record: CompetitorRecord, rating: InternalRating, at: number): void {
    record.rating = rating;
    // Never move a record's timestamp backwards.
    record.lastUpdatedAt = Math.max(record.lastUpdatedAt, at);
    record.gamesPlayed += 1;
  }
}

/** Build an engine from settings overrides merged onto the defaults. */
export function createEngine(
  overrides: GlickoSettingsInput = {},
  options: RatingEngineOptions = {},
): RatingEngine {
  return new RatingEngine(createSettings(overrides), options);
}
