// ---------------------------------------------------------------------------
// Bloom filter: barrel export
// ---------------------------------------------------------------------------

export { BloomFilter, filterUnion, filterIntersection } from './bloom-filter.js';
