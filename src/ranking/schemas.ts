/**
 * RATEKEEPER - Zod Schemas
 *
 * Runtime validation for every value that crosses into the ranking module:
 * caller-supplied ratings, settings, and restored engine snapshots.
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Ratings
// ---------------------------------------------------------------------------

export const PublicRatingSchema = z.object({
  rating: z.number().finite(),
  /** ~95% confidence half-width on the public scale */
  deviation: z.number().finite().nonnegative(),
  volatility: z.number().finite().positive(),
});
export type PublicRating = Readonly<z.infer<typeof PublicRatingSchema>>;

export const InternalRatingSchema = z.object({
  mu: z.number().finite(),
  phi: z.number().finite().nonnegative(),
  sigma: z.number().finite().positive(),
});
export type InternalRating = Readonly<z.infer<typeof InternalRatingSchema>>;

// ---------------------------------------------------------------------------
// Settings
// ---------------------------------------------------------------------------

export const GlickoSettingsSchema = z.object({
  /** System constant constraining volatility change (Glickman suggests 0.3 - 1.2) */
  tau: z.number().finite().positive(),
  convergenceTolerance: z.number().finite().positive(),
  /** Cap for both the bracket search and the Illinois loop */
  maxIterations: z.number().int().positive(),
  defaultRating: PublicRatingSchema,
  /** Length of one rating period in milliseconds */
  ratingPeriodMs: z.number().finite().positive(),
});
export type GlickoSettings = Readonly<z.infer<typeof GlickoSettingsSchema>>;

// ---------------------------------------------------------------------------
// Engine Snapshot
// ---------------------------------------------------------------------------

export const CompetitorRecordSchema = z.object({
  id: z.number().int().positive(),
  rating: InternalRatingSchema,
  /** Epoch milliseconds of the last committed update */
  lastUpdatedAt: z.number().finite(),
  gamesPlayed: z.number().int().nonnegative(),
});
export type CompetitorRecord = z.infer<typeof CompetitorRecordSchema>;

export const EngineSnapshotSchema = z
  .object({
    version: z.literal(1),
    settings: GlickoSettingsSchema,
    nextId: z.number().int().positive(),
    players: z.array(CompetitorRecordSchema),
  })
  .superRefine((snapshot, ctx) => {
    const seen = new Set<number>();
    for (const player of snapshot.players) {
      if (seen.has(player.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate player id ${player.id}`,
          path: ['players'],
        });
      }
      if (player.id >= snapshot.nextId) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `player id ${player.id} is not below nextId ${snapshot.nextId}`,
          path: ['nextId'],
        });
      }
      seen.add(player.id);
    }
  });
export type EngineSnapshot = z.infer<typeof EngineSnapshotSchema>;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Flatten zod issues into "path: message" strings for error payloads. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}
