// ---------------------------------------------------------------------------
// Reservoir sampling: barrel export
// ---------------------------------------------------------------------------

export { ReservoirSampler } from './reservoir.js';
export type { ReservoirSamplerOptions } from './reservoir.js';
