/**
 * Optimizer configuration.
 *
 * Library callers pass a `CutlistConfig` (or part of one) to the optimizer.
 * Scripts build it from the environment with `loadCutlistConfig`:
 *
 *   CUTLIST_KERF_MM                    blade kerf in mm (default 3)
 *   CUTLIST_MAX_CANDIDATE_EVALUATIONS  cap on placement checks per run (default: none)
 *   CUTLIST_DEBUG                      'true' / '1' to log each run
 */

import { z } from 'zod';

import { toInputError, DEFAULT_KERF_MM } from './validation';

export interface CutlistConfig {
  /** Blade kerf applied when a sheet template does not set its own */
  kerfWidth: number;
  /** Maximum feasibility checks per run; unlimited when undefined */
  maxCandidateEvaluations?: number;
  /** Log a line per optimizer run */
  debug: boolean;
}

export const DEFAULT_CUTLIST_CONFIG: CutlistConfig = {
  kerfWidth: DEFAULT_KERF_MM,
  maxCandidateEvaluations: undefined,
  debug: false,
};

const envSchema = z.object({
  CUTLIST_KERF_MM: z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.coerce.number().finite().nonnegative().default(DEFAULT_KERF_MM)
  ),
  CUTLIST_MAX_CANDIDATE_EVALUATIONS: z
    .string()
    .optional()
    .transform((value) => (value ? Number(value) : undefined))
    .pipe(z.number().int().positive().optional()),
  CUTLIST_DEBUG: z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => value === 'true' || value === '1'),
});

export type CutlistEnv = Record<string, string | undefined>;

export function loadCutlistConfig(env: CutlistEnv = process.env): CutlistConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw toInputError(parsed.error, env);
  }

  const { CUTLIST_KERF_MM, CUTLIST_MAX_CANDIDATE_EVALUATIONS, CUTLIST_DEBUG } = parsed.data;
  return {
    kerfWidth: CUTLIST_KERF_MM,
    maxCandidateEvaluations: CUTLIST_MAX_CANDIDATE_EVALUATIONS,
    debug: CUTLIST_DEBUG,
  };
}
