import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fc from 'fast-check';

import { ReservoirSampler } from '../sampling/index.js';
import { PreconditionError, isPreconditionError } from '../errors.js';
import { setLogLevel, setLogSink } from '../logger.js';
import type { PRNG } from '../types.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** PRNG replaying a fixed script of draws. */
function scripted(draws: number[]): PRNG {
  let i = 0;
  return () => {
    const draw = draws[i++];
    if (draw === undefined) throw new Error('script exhausted');
    return draw;
  };
}

const range = (n: number): number[] => Array.from({ length: n }, (_, i) => i);

let logLines: string[] = [];

beforeEach(() => {
  logLines = [];
  setLogSink((_level, line) => logLines.push(line));
});

afterEach(() => {
  setLogSink();
  setLogLevel('warn');
  vi.restoreAllMocks();
});

// ===================================================================
// Construction
// ===================================================================

describe('ReservoirSampler construction', () => {
  it('reports its capacity', () => {
    const sampler = new ReservoirSampler<number>(3, { seed: 1 });
    expect(sampler.numToSample()).toBe(3);
    expect(sampler.numProcessed()).toBe(0);
    expect(sampler.samples()).toEqual([]);
  });

  it('rejects a capacity that is not a positive integer', () => {
    expect(() => new ReservoirSampler(0)).toThrow(PreconditionError);
    expect(() => new ReservoirSampler(-2)).toThrow(PreconditionError);
    expect(() => new ReservoirSampler(2.5)).toThrow(PreconditionError);
  });

  it('rejects both a random source and a seed', () => {
    try {
      new ReservoirSampler(3, { seed: 7, random: Math.random });
      expect.unreachable('constructor should throw');
    } catch (error) {
      expect(isPreconditionError(error)).toBe(true);
      if (!isPreconditionError(error)) return;
      expect(error.code).toBe('INVALID_PARAMETER');
      expect(error.message).toBe(
        'Invalid reservoir sampler options: seed: pass either random or seed, not both',
      );
    }
  });

  it('logs the clock-derived seed when none is given', () => {
    setLogLevel('debug');
    vi.spyOn(Date, 'now').mockReturnValue(1234);

    new ReservoirSampler<string>(2);
    expect(logLines).toEqual(['[DEBUG] Reservoir sampler seeded from clock capacity=2 seed=1234']);
  });

  it('does not log when seeded explicitly', () => {
    setLogLevel('debug');
    new ReservoirSampler<string>(2, { seed: 5 });
    new ReservoirSampler<string>(2, { random: scripted([]) });
    expect(logLines).toEqual([]);
  });
});

// ===================================================================
// Processing
// ===================================================================

describe('ReservoirSampler.process', () => {
  it('counts every processed value', () => {
    const sampler = new ReservoirSampler<number>(3, { seed: 42 });
    for (let i = 0; i < 10; i++) {
      expect(sampler.numProcessed()).toBe(i);
      sampler.process(i);
    }
    expect(sampler.numProcessed()).toBe(10);
  });

  it('keeps everything until the reservoir is full', () => {
    const sampler = new ReservoirSampler<number>(3, { seed: 9 });

    expect(sampler.process(4)).toBe(true);
    expect(sampler.samples()).toEqual([4]);
    expect(sampler.numProcessed()).toBe(1);

    expect(sampler.process(5)).toBe(true);
    expect(sampler.samples()).toEqual([4, 5]);
    expect(sampler.numProcessed()).toBe(2);

    expect(sampler.process(12)).toBe(true);
    expect(sampler.samples()).toEqual([4, 5, 12]);
    expect(sampler.numProcessed()).toBe(3);
  });

  it('holds exactly capacity samples once full', () => {
    const sampler = new ReservoirSampler<number>(4, { seed: 3 });
    sampler.processAll([3, 4, 5, 8]);
    expect(sampler.numProcessed()).toBe(4);

    for (let i = 0; i < 100; i++) {
      sampler.process(i);
      expect(sampler.samples()).toHaveLength(4);
      expect(sampler.numToSample()).toBe(4);
    }
  });

  it('overwrites the drawn slot', () => {
    // Draws map to j = floor(r * (processed + 1)).
    const sampler = new ReservoirSampler<string>(2, { random: scripted([0, 0, 0.99, 0.3, 0]) });

    expect(sampler.process('a')).toBe(true); // j = 0
    expect(sampler.process('b')).toBe(true); // j = 0, appended
    expect(sampler.process('c')).toBe(false); // j = 2
    expect(sampler.samples()).toEqual(['a', 'b']);
    expect(sampler.process('d')).toBe(true); // j = 1
    expect(sampler.samples()).toEqual(['a', 'd']);
    expect(sampler.process('e')).toBe(true); // j = 0
    expect(sampler.samples()).toEqual(['e', 'd']);
    expect(sampler.numProcessed()).toBe(5);
  });

  it('draws from [0, numProcessed] before counting the new value', () => {
    // With one value seen the draw ranges over {0, 1}.
    const accepts = new ReservoirSampler<string>(1, { random: scripted([0, 0.49]) });
    accepts.process('a');
    expect(accepts.process('b')).toBe(true);
    expect(accepts.samples()).toEqual(['b']);

    const rejects = new ReservoirSampler<string>(1, { random: scripted([0, 0.5]) });
    rejects.process('a');
    expect(rejects.process('b')).toBe(false);
    expect(rejects.samples()).toEqual(['a']);
    expect(rejects.numProcessed()).toBe(2);
  });

  it('processAll returns the number of kept values', () => {
    const sampler = new ReservoirSampler<number>(3, { random: scripted([0, 0, 0, 0.9, 0.1]) });
    // Fourth draw: floor(0.9 * 4) = 3, rejected. Fifth: floor(0.1 * 5) = 0, kept.
    expect(sampler.processAll([10, 20, 30, 40, 50])).toBe(4);
    expect(sampler.samples()).toEqual([50, 20, 30]);
  });

  it('replays identically from the same seed', () => {
    const a = new ReservoirSampler<number>(5, { seed: 2024 });
    const b = new ReservoirSampler<number>(5, { seed: 2024 });
    a.processAll(range(500));
    b.processAll(range(500));
    expect(a.samples()).toEqual(b.samples());
  });

  it('keeps min(processed, capacity) values drawn from the stream (property-based)', () => {
    fc.assert(fc.property(
      fc.integer({ min: 1, max: 20 }),
      fc.array(fc.integer(), { maxLength: 100 }),
      fc.integer(),
      (capacity, stream, seed) => {
        const sampler = new ReservoirSampler<number>(capacity, { seed });
        sampler.processAll(stream);

        const samples = sampler.samples();
        if (sampler.numProcessed() !== stream.length) return false;
        if (samples.length !== Math.min(stream.length, capacity)) return false;
        if (stream.length <= capacity) {
          return samples.every((value, i) => value === stream[i]);
        }
        return samples.every((value) => stream.includes(value));
      },
    ));
  });
});

// ===================================================================
// Statistical properties
// ===================================================================

describe('ReservoirSampler uniformity', () => {
  const capacity = 4;
  const streamLength = 10;
  const trials = 30000;

  function runTrials(): number[][] {
    const runs: number[][] = [];
    for (let trial = 0; trial < trials; trial++) {
      const sampler = new ReservoirSampler<number>(capacity, { seed: trial });
      sampler.processAll(range(streamLength));
      runs.push([...sampler.samples()]);
    }
    return runs;
  }

  const runs = runTrials();

  it('retains each value with probability capacity / N', () => {
    const counts = new Array<number>(streamLength).fill(0);
    for (const run of runs) {
      for (const value of run) counts[value] = (counts[value] ?? 0) + 1;
    }

    const p = capacity / streamLength;
    const expected = trials * p;
    const sd = Math.sqrt(trials * p * (1 - p));

    for (const count of counts) {
      expect(count).toBeGreaterThanOrEqual(expected - 4 * sd);
      expect(count).toBeLessThanOrEqual(expected + 4 * sd);
    }
  });

  it('retains every subset of size capacity about equally often', () => {
    const subsets = new Map<string, number>();
    for (const run of runs) {
      const key = [...run].sort((a, b) => a - b).join(',');
      subsets.set(key, (subsets.get(key) ?? 0) + 1);
    }

    // C(10, 4) = 210 subsets
    expect(subsets.size).toBe(210);

    const p = 1 / 210;
    const expected = trials * p;
    const sd = Math.sqrt(trials * p * (1 - p));
    for (const count of subsets.values()) {
      expect(count).toBeGreaterThanOrEqual(expected - 5 * sd);
      expect(count).toBeLessThanOrEqual(expected + 5 * sd);
    }
  });
});
