// ---------------------------------------------------------------------------
// @pointdex/kdtree — Exact nearest-neighbor index over 3D points
// ---------------------------------------------------------------------------

export * from './types.js';
export { InvalidInputError } from './errors.js';

export * from './points/index.js';
export * from './tree/index.js';
export * from './query/index.js';
export * from './scheduling/index.js';
export * from './logging/index.js';
