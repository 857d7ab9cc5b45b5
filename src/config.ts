/**
 * RATEKEEPER - Environment Configuration
 *
 * Maps GLICKO_* environment variables onto GlickoSettings for scripts and
 * host applications. The ranking module itself never reads the environment.
 *
 * Every variable is optional; unset ones fall back to DEFAULT_SETTINGS.
 * SIM_* variables drive scripts/run-ratings.ts only.
 */

import { z } from 'zod';
import { InvalidSettingsError } from './ranking/errors';
import { formatIssues, type GlickoSettings } from './ranking/schemas';
import { DEFAULT_SETTINGS, createSettings } from './ranking/settings';

export const EnvSchema = z.object({
  GLICKO_TAU: z.coerce.number().optional(),
  GLICKO_CONVERGENCE_TOLERANCE: z.coerce.number().optional(),
  GLICKO_MAX_ITERATIONS: z.coerce.number().int().optional(),
  GLICKO_DEFAULT_RATING: z.coerce.number().optional(),
  GLICKO_DEFAULT_DEVIATION: z.coerce.number().optional(),
  GLICKO_DEFAULT_VOLATILITY: z.coerce.number().optional(),
  GLICKO_RATING_PERIOD_MS: z.coerce.number().optional(),
});
export type Env = z.infer<typeof EnvSchema>;

export function loadSettingsFromEnv(
  env: Record<string, string | undefined> = process.env,
): GlickoSettings {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new InvalidSettingsError(formatIssues(parsed.error));
  }

  const vars = parsed.data;
  const start = DEFAULT_SETTINGS.defaultRating;

  return createSettings({
    tau: vars.GLICKO_TAU ?? DEFAULT_SETTINGS.tau,
    convergenceTolerance: vars.GLICKO_CONVERGENCE_TOLERANCE ?? DEFAULT_SETTINGS.convergenceTolerance,
    maxIterations: vars.GLICKO_MAX_ITERATIONS ?? DEFAULT_SETTINGS.maxIterations,
    ratingPeriodMs: vars.GLICKO_RATING_PERIOD_MS ?? DEFAULT_SETTINGS.ratingPeriodMs,
    defaultRating: {
      rating: vars.GLICKO_DEFAULT_RATING ?? start.rating,
      deviation: vars.GLICKO_DEFAULT_DEVIATION ?? start.deviation,
      volatility: vars.GLICKO_DEFAULT_VOLATILITY ?? start.volatility,
    },
  });
}

// ─── Simulation ───────────────────────────────────────────────────────────────

export const SimulationEnvSchema = z.object({
  SIM_MATCHES: z.coerce.number().int().positive().default(120),
  SIM_SEED: z.coerce.number().int().nonnegative().default(42),
});

export interface SimulationOptions {
  matches: number;
  seed: number;
}

export function loadSimulationOptions(
  env: Record<string, string | undefined> = process.env,
): SimulationOptions {
  const parsed = SimulationEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new InvalidSettingsError(formatIssues(parsed.error));
  }
  return { matches: parsed.data.SIM_MATCHES, seed: parsed.data.SIM_SEED };
}
