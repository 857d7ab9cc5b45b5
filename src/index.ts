/**
 * RATEKEEPER
 *
 * Continuous-time Glicko-2 ratings.
 */

export * from './ranking';
export { EnvSchema, loadSettingsFromEnv, SimulationEnvSchema, loadSimulationOptions } from './config';
export type { Env, SimulationOptions } from './config';
