// ---------------------------------------------------------------------------
// Scheduling — Barrel Export
// ---------------------------------------------------------------------------

export type { LanePool } from './lane-pool.js';
export {
  createLanePool,
  claimLane,
  returnLane,
  splitBudget,
  forkJoin,
  runChunked,
} from './lane-pool.js';
