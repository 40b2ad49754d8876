// ---------------------------------------------------------------------------
// Streaming Algorithms: Bloom Filter
// ---------------------------------------------------------------------------
// Probabilistic set membership test. False positives possible, false negatives
// are not. Buckets only ever go from unset to set.
// ---------------------------------------------------------------------------

import {
  bloomShapeSchema,
  bloomSizingSchema,
  elementCountSchema,
  parseParameters,
} from '../config.js';
import { PreconditionError } from '../errors.js';
import { logger } from '../logger.js';
import { splitDigest } from '../types.js';
import type { HashFunction } from '../types.js';

// ---------------------------------------------------------------------------
// Bit helpers
// ---------------------------------------------------------------------------

function setBit(bits: Uint8Array, pos: number): void {
  const byteIdx = pos >>> 3;
  bits[byteIdx] = ((bits[byteIdx] ?? 0) | (1 << (pos & 7))) & 0xff;
}

function testBit(bits: Uint8Array, pos: number): boolean {
  return ((bits[pos >>> 3] ?? 0) & (1 << (pos & 7))) !== 0;
}

/** Count set bits in a byte. */
function popCount(n: number): number {
  n = n - ((n >> 1) & 0x55);
  n = (n & 0x33) + ((n >> 2) & 0x33);
  return (n + (n >> 4)) & 0x0f;
}

// ---------------------------------------------------------------------------
// Filter
// ---------------------------------------------------------------------------

export class BloomFilter<T> {
  private readonly bits: Uint8Array;
  private readonly bucketCount: number;
  private readonly hashCount: number;
  private readonly hash: HashFunction<T>;

  /**
   * Create an empty filter with an explicit shape.
   *
   * @param numBuckets Length of the bucket sequence.
   * @param numHashes  Probes per `record` / `contains`.
   * @param hash       Digest function; filters are only combinable when they share it.
   * @throws PreconditionError if either count is not a positive integer.
   */
  constructor(numBuckets: number, numHashes: number, hash: HashFunction<T>) {
    const shape = parseParameters(bloomShapeSchema, { numBuckets, numHashes }, 'Bloom filter shape');
    this.bucketCount = shape.numBuckets;
    this.hashCount = shape.numHashes;
    this.hash = hash;
    this.bits = new Uint8Array(Math.ceil(this.bucketCount / 8));
  }

  /**
   * Size a filter for `maxElements` insertions at a target false positive rate.
   *
   * Hash count:  k = ceil(log2(1 / p))
   * Bucket count: m = ceil(n * k / ln2)
   */
  static make<T>(maxElements: number, falsePositiveRate: number, hash: HashFunction<T>): BloomFilter<T> {
    const sizing = parseParameters(
      bloomSizingSchema,
      { maxElements, falsePositiveRate },
      'Bloom filter sizing',
    );

    const numHashes = Math.ceil(Math.log2(1 / sizing.falsePositiveRate));
    const numBuckets = Math.ceil(sizing.maxElements * (numHashes / Math.LN2));

    logger.debug('Sized Bloom filter', { ...sizing, numHashes, numBuckets });
    return new BloomFilter(numBuckets, numHashes, hash);
  }

  /** Bucket-wise OR of two equally shaped filters. */
  static filterUnion<T>(lhs: BloomFilter<T>, rhs: BloomFilter<T>): BloomFilter<T> {
    return BloomFilter.combine(lhs, rhs, 'union', (a, b) => a | b);
  }

  /**
   * Bucket-wise AND of two equally shaped filters.
   *
   * The result can report values that are in neither input's true
   * intersection: a bucket set by different values on each side survives.
   */
  static filterIntersection<T>(lhs: BloomFilter<T>, rhs: BloomFilter<T>): BloomFilter<T> {
    return BloomFilter.combine(lhs, rhs, 'intersection', (a, b) => a & b);
  }

  private static combine<T>(
    lhs: BloomFilter<T>,
    rhs: BloomFilter<T>,
    operation: 'union' | 'intersection',
    merge: (a: number, b: number) => number,
  ): BloomFilter<T> {
    if (lhs.hashCount !== rhs.hashCount || lhs.bucketCount !== rhs.bucketCount) {
      const details = {
        operation,
        lhs: { numBuckets: lhs.bucketCount, numHashes: lhs.hashCount },
        rhs: { numBuckets: rhs.bucketCount, numHashes: rhs.hashCount },
      };
      logger.warn('Rejected Bloom filter set operation on mismatched shapes', details);
      throw new PreconditionError(
        `Cannot compute ${operation} of Bloom filters with different shapes: ` +
          `${lhs.bucketCount}x${lhs.hashCount} vs ${rhs.bucketCount}x${rhs.hashCount}`,
        'SHAPE_MISMATCH',
        details,
      );
    }
    if (lhs.hash !== rhs.hash) {
      logger.warn('Rejected Bloom filter set operation on different hash functions', { operation });
      throw new PreconditionError(
        `Cannot compute ${operation} of Bloom filters built with different hash functions`,
        'HASH_MISMATCH',
        { operation },
      );
    }

    const result = new BloomFilter(lhs.bucketCount, lhs.hashCount, lhs.hash);
    for (let i = 0; i < result.bits.length; i++) {
      result.bits[i] = merge(lhs.bits[i] ?? 0, rhs.bits[i] ?? 0) & 0xff;
    }
    return result;
  }

  // -------------------------------------------------------------------------
  // Membership
  // -------------------------------------------------------------------------

  /**
   * Mark every probed bucket for `value`. One digest is computed; probe `n`
   * lands on `(hashA + n * hashB) mod numBuckets`, where hashA and hashB are
   * the digest's high and low 32-bit words.
   */
  record(value: T): void {
    const m = this.bucketCount;
    const [hashA, hashB] = splitDigest(this.hash(value));
    const step = hashB % m;

    let pos = hashA % m;
    for (let n = 0; n < this.hashCount; n++) {
      setBit(this.bits, pos);
      pos = (pos + step) % m;
    }
  }

  recordAll(values: Iterable<T>): void {
    for (const value of values) this.record(value);
  }

  /**
   * Test whether `value` might have been recorded.
   *
   * - `false`: definitely never recorded.
   * - `true`: probably recorded (may be a false positive).
   */
  contains(value: T): boolean {
    const m = this.bucketCount;
    const [hashA, hashB] = splitDigest(this.hash(value));
    const step = hashB % m;

    let pos = hashA % m;
    for (let n = 0; n < this.hashCount; n++) {
      if (!testBit(this.bits, pos)) return false;
      pos = (pos + step) % m;
    }
    return true;
  }

  // -------------------------------------------------------------------------
  // Accessors
  // -------------------------------------------------------------------------

  numBuckets(): number {
    return this.bucketCount;
  }

  numHashes(): number {
    return this.hashCount;
  }

  numBucketsPopulated(): number {
    let populated = 0;
    for (let i = 0; i < this.bits.length; i++) {
      populated += popCount(this.bits[i] ?? 0);
    }
    return populated;
  }

  fillRatio(): number {
    return this.numBucketsPopulated() / this.bucketCount;
  }

  /**
   * Estimated false positive rate after `numElements` distinct insertions.
   *
   * Formula: (1 - e^(-k * n / m))^k
   */
  expectedFalsePositiveRate(numElements: number): number {
    const n = parseParameters(elementCountSchema, numElements, 'element count');
    const k = this.hashCount;
    return Math.pow(1 - Math.exp((-k * n) / this.bucketCount), k);
  }

  /**
   * Same hash count and identical bucket sequence. Two filters fed different
   * values can still compare equal; the hash function is not compared.
   */
  equals(other: BloomFilter<T>): boolean {
    if (this.hashCount !== other.hashCount || this.bucketCount !== other.bucketCount) {
      return false;
    }
    for (let i = 0; i < this.bits.length; i++) {
      if (this.bits[i] !== other.bits[i]) return false;
    }
    return true;
  }

  clone(): BloomFilter<T> {
    const copy = new BloomFilter(this.bucketCount, this.hashCount, this.hash);
    copy.bits.set(this.bits);
    return copy;
  }
}

// ---------------------------------------------------------------------------
// Set operations
// ---------------------------------------------------------------------------

/**
 * Union of two filters with the same shape and hash function.
 *
 * @throws PreconditionError (`SHAPE_MISMATCH` or `HASH_MISMATCH`)
 */
export function filterUnion<T>(lhs: BloomFilter<T>, rhs: BloomFilter<T>): BloomFilter<T> {
  return BloomFilter.filterUnion(lhs, rhs);
}

/**
 * Intersection of two filters with the same shape and hash function.
 *
 * @throws PreconditionError (`SHAPE_MISMATCH` or `HASH_MISMATCH`)
 */
export function filterIntersection<T>(lhs: BloomFilter<T>, rhs: BloomFilter<T>): BloomFilter<T> {
  return BloomFilter.filterIntersection(lhs, rhs);
}
