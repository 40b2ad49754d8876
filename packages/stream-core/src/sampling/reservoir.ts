// ---------------------------------------------------------------------------
// Streaming Algorithms: Reservoir Sampling
// ---------------------------------------------------------------------------
// Uniform fixed-size sample of a stream of unknown length (Algorithm R).
// After N items every item is retained with probability capacity / N.
// ---------------------------------------------------------------------------

import { parseParameters, reservoirOptionsSchema } from '../config.js';
import { logger } from '../logger.js';
import { createPRNG, uniformInt } from '../types.js';
import type { PRNG } from '../types.js';

/** Where a sampler's randomness comes from. At most one may be given. */
export interface ReservoirSamplerOptions {
  /** Random source owned by the sampler from here on. */
  readonly random?: PRNG;
  /** Seed for a mulberry32 PRNG. */
  readonly seed?: number;
}

export class ReservoirSampler<T> {
  private readonly capacity: number;
  private readonly rng: PRNG;
  private readonly reservoir: T[] = [];
  private processedCount = 0;

  /**
   * @param capacity Number of items to keep.
   * @throws PreconditionError if `capacity` is not a positive integer, or if
   *   both `random` and `seed` are supplied.
   */
  constructor(capacity: number, options: ReservoirSamplerOptions = {}) {
    const parsed = parseParameters(
      reservoirOptionsSchema,
      { capacity, seed: options.seed, random: options.random },
      'reservoir sampler options',
    );
    this.capacity = parsed.capacity;

    if (parsed.random) {
      this.rng = parsed.random;
    } else if (parsed.seed !== undefined) {
      this.rng = createPRNG(parsed.seed);
    } else {
      const seed = Date.now() | 0;
      // Logged so an unseeded run can be replayed.
      logger.debug('Reservoir sampler seeded from clock', { capacity: this.capacity, seed });
      this.rng = createPRNG(seed);
    }
  }

  /**
   * Offer `value` to the reservoir.
   *
   * Draws j from [0, numProcessed()] before counting this value. Values with
   * j < capacity are kept: appended while the reservoir fills, afterwards
   * written over slot j.
   *
   * @returns whether `value` was kept
   */
  process(value: T): boolean {
    const j = uniformInt(this.rng, this.processedCount);
    const accepted = j < this.capacity;

    if (accepted) {
      if (this.reservoir.length < this.capacity) {
        this.reservoir.push(value);
      } else {
        this.reservoir[j] = value;
      }
    }

    this.processedCount += 1;
    return accepted;
  }

  /** Process values in order; returns how many were kept. */
  processAll(values: Iterable<T>): number {
    let accepted = 0;
    for (const value of values) {
      if (this.process(value)) accepted++;
    }
    return accepted;
  }

  numToSample(): number {
    return this.capacity;
  }

  numProcessed(): number {
    return this.processedCount;
  }

  /** Current reservoir, ordered by slot rather than arrival. */
  samples(): readonly T[] {
    return this.reservoir;
  }
}
