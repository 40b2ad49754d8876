// ---------------------------------------------------------------------------
// Configuration & parameter validation
// ---------------------------------------------------------------------------
// zod schemas for every constructor parameter, plus the one process-level
// setting (log level) read from the environment.
// ---------------------------------------------------------------------------

import { z } from 'zod';
import { PreconditionError } from './errors.js';
import type { PRNG } from './types.js';

// ─── Parameter schemas ──────────────────────────────────────────────────────

const positiveCount = z.number().int().positive().safe();

/** Explicit Bloom filter shape. */
export const bloomShapeSchema = z.object({
  numBuckets: positiveCount,
  numHashes: positiveCount,
});

/** Bloom filter sizing from a capacity and a target error bound. */
export const bloomSizingSchema = z.object({
  maxElements: positiveCount,
  falsePositiveRate: z.number().gt(0).lt(1),
});

/** A count of recorded elements (zero allowed). */
export const elementCountSchema = z.number().int().nonnegative().safe();

export const reservoirOptionsSchema = z
  .object({
    capacity: positiveCount,
    seed: z.number().int().safe().optional(),
    random: z.custom<PRNG>((value) => typeof value === 'function', 'random must be a function').optional(),
  })
  .refine((options) => options.random === undefined || options.seed === undefined, {
    message: 'pass either random or seed, not both',
    path: ['seed'],
  });

export type BloomShape = z.infer<typeof bloomShapeSchema>;
export type BloomSizing = z.infer<typeof bloomSizingSchema>;
export type ReservoirOptionsInput = z.infer<typeof reservoirOptionsSchema>;

/**
 * Validate `input` against `schema`, returning the parsed value.
 *
 * @throws PreconditionError with code `INVALID_PARAMETER` listing every issue
 */
export function parseParameters<T>(schema: z.ZodType<T>, input: unknown, subject: string): T {
  const result = schema.safeParse(input);
  if (result.success) return result.data;

  const issues = result.error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
  throw new PreconditionError(`Invalid ${subject}: ${issues.join('; ')}`, 'INVALID_PARAMETER', {
    issues,
  });
}

// ─── Environment ────────────────────────────────────────────────────────────

export const LOG_LEVEL_ENV = 'PROBKIT_LOG_LEVEL';

export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']);

export type LogLevel = z.infer<typeof logLevelSchema>;

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

/** Resolve the log level from an environment record; unknown values fall back to the default. */
export function resolveLogLevel(env: Readonly<Record<string, string | undefined>>): LogLevel {
  const raw = env[LOG_LEVEL_ENV];
  if (raw === undefined) return DEFAULT_LOG_LEVEL;
  const parsed = logLevelSchema.safeParse(raw.trim().toLowerCase());
  return parsed.success ? parsed.data : DEFAULT_LOG_LEVEL;
}

/** Read the log level from `process.env` when running under Node. */
export function readLogLevel(): LogLevel {
  if (typeof process !== 'undefined' && process.env) {
    return resolveLogLevel(process.env);
  }
  return DEFAULT_LOG_LEVEL;
}
