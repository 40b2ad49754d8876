// ---------------------------------------------------------------------------
// @probkit/stream-core: Probabilistic stream primitives
// ---------------------------------------------------------------------------
// Shared capabilities consumed by the Bloom filter and the reservoir sampler:
// seedable randomness and 64-bit hashing.
// ---------------------------------------------------------------------------

// ---------------------------------------------------------------------------
// Random number generation
// ---------------------------------------------------------------------------

/** Seedable PRNG function returning values in [0, 1). */
export type PRNG = () => number;

/**
 * Creates a seedable mulberry32 PRNG returning values in [0, 1).
 * Deterministic: identical seeds produce identical sequences.
 */
export function createPRNG(seed: number): PRNG {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Draw an integer uniformly from `[0, maxInclusive]`.
 *
 * The range holds `maxInclusive + 1` values. A PRNG that ever returns 1.0
 * would overshoot, so the result is clamped to the upper bound.
 */
export function uniformInt(rng: PRNG, maxInclusive: number): number {
  const draw = Math.floor(rng() * (maxInclusive + 1));
  return draw > maxInclusive ? maxInclusive : draw;
}

// ---------------------------------------------------------------------------
// Hash utilities
// ---------------------------------------------------------------------------

/**
 * A deterministic hash over `T` producing a 64-bit digest.
 * Digests are read modulo 2^64, so negative or oversized bigints are allowed.
 */
export type HashFunction<T> = (value: T) => bigint;

/** Primitive keys the default {@link hashKey} understands. */
export type HashableKey = string | number | bigint | boolean;

const MASK_64 = 0xffffffffffffffffn;
const FNV64_OFFSET = 0xcbf29ce484222325n;
const FNV64_PRIME = 0x100000001b3n;

const encoder = new TextEncoder();

/**
 * FNV-1a hash (64-bit) over raw bytes.
 */
export function fnv1a64(data: Uint8Array): bigint {
  let hash = FNV64_OFFSET;
  for (let i = 0; i < data.length; i++) {
    hash ^= BigInt(data[i] ?? 0);
    hash = (hash * FNV64_PRIME) & MASK_64;
  }
  return hash;
}

/**
 * MurmurHash3 64-bit finalisation mix.
 * FNV leaves its high word weakly dependent on the last bytes; this spreads
 * every input bit across both halves of the digest.
 */
export function fmix64(value: bigint): bigint {
  let h = BigInt.asUintN(64, value);
  h ^= h >> 33n;
  h = (h * 0xff51afd7ed558ccdn) & MASK_64;
  h ^= h >> 33n;
  h = (h * 0xc4ceb9fe1a85ec53n) & MASK_64;
  h ^= h >> 33n;
  return h;
}

/**
 * Default hash for primitive keys.
 *
 * The key is tagged with its type before hashing, so `1`, `1n`, `'1'` and
 * `true` are encoded as distinct byte strings.
 */
export const hashKey: HashFunction<HashableKey> = (value) =>
  fmix64(fnv1a64(encoder.encode(`${typeof value}:${String(value)}`)));

/** Split a digest into its high and low 32-bit words. */
export function splitDigest(digest: bigint): readonly [high: number, low: number] {
  const h = BigInt.asUintN(64, digest);
  return [Number(h >> 32n), Number(h & 0xffffffffn)];
}
