/**
 * Run settings. Defaults can be overridden through PAGERANK_* environment
 * variables; every estimator call still receives them as explicit arguments.
 */

import { z } from 'zod';
import { PreconditionError } from './errors.js';
import { DEFAULT_SAMPLES } from './pagerank.js';
import { DEFAULT_TOLERANCE } from './iterate.js';

export interface PagerankConfig {
  damping: number;
  samples: number;
  tolerance: number;
  /** Unset: derived per call from damping and tolerance. */
  maxIterations?: number;
}

export const DEFAULTS: Readonly<PagerankConfig> = Object.freeze({
  damping: 0.85,
  samples: DEFAULT_SAMPLES,
  tolerance: DEFAULT_TOLERANCE,
});

export const DampingSchema = z.number().gt(0).lt(1);
export const SamplesSchema = z.number().int().positive();
export const ToleranceSchema = z.number().positive();
export const MaxIterationsSchema = z.number().int().positive();
export const SeedSchema = z.number().int().min(0).max(0xffffffff);

function readVar(env: NodeJS.ProcessEnv, name: string, schema: z.ZodNumber): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;

  const parsed = schema.safeParse(Number(raw));
  if (!parsed.success) {
    throw new PreconditionError(`Invalid ${name}="${raw}": ${parsed.error.issues[0]?.message ?? 'invalid value'}`);
  }
  return parsed.data;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): PagerankConfig {
  return {
    damping: readVar(env, 'PAGERANK_DAMPING', DampingSchema) ?? DEFAULTS.damping,
    samples: readVar(env, 'PAGERANK_SAMPLES', SamplesSchema) ?? DEFAULTS.samples,
    tolerance: readVar(env, 'PAGERANK_TOLERANCE', ToleranceSchema) ?? DEFAULTS.tolerance,
    maxIterations: readVar(env, 'PAGERANK_MAX_ITERATIONS', MaxIterationsSchema),
  };
}
