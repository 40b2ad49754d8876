// ---------------------------------------------------------------------------
// @probkit/stream-core: Probabilistic stream primitives
// ---------------------------------------------------------------------------
// Barrel re-export. The Bloom filter and the reservoir sampler are
// independent; both consume the shared hash and PRNG capabilities.
// ---------------------------------------------------------------------------

// Infrastructure: PRNG, hash utilities, errors, configuration, logging
export * from './types.js';
export * from './errors.js';
export {
  bloomShapeSchema,
  bloomSizingSchema,
  elementCountSchema,
  reservoirOptionsSchema,
  parseParameters,
  logLevelSchema,
  resolveLogLevel,
  readLogLevel,
  LOG_LEVEL_ENV,
  DEFAULT_LOG_LEVEL,
  type BloomShape,
  type BloomSizing,
  type ReservoirOptionsInput,
} from './config.js';
export { logger, setLogLevel, getLogLevel, setLogSink } from './logger.js';
export type { LogLevel, LogSink, LogFn, EmittingLevel } from './logger.js';

// Approximate membership
export * from './bloom/index.js';

// Stream sampling
export * from './sampling/index.js';
