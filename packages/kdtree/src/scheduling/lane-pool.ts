// ---------------------------------------------------------------------------
// Scheduling — Lane Pool
// ---------------------------------------------------------------------------
// Fixed-size pool of execution lanes. Builds fork subtree tasks onto free
// lanes and join them; batch queries split their index range across lanes.
// Tasks run to completion on the calling isolate; lanes bound how work is
// split, never what it computes. Callers size the pool by the work on hand,
// not only by the requested thread count.
// ---------------------------------------------------------------------------

/** Lane occupancy. Lane 0 belongs to the caller and is never released. */
export interface LanePool {
  readonly size: number;
  /** `busy[i] === 1` while lane `i` holds a task. */
  readonly busy: Uint8Array;
  idle: number;
  /** Number of tasks started on a lane other than the caller's. */
  forked: number;
}

export function createLanePool(size: number): LanePool {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError('Pool size must be an integer of at least 1');
  }
  const busy = new Uint8Array(size);
  busy[0] = 1;
  return { size, busy, idle: size - 1, forked: 0 };
}

/** Lowest idle lane, marked busy, or null when every lane is taken. */
export function claimLane(pool: LanePool): number | null {
  if (pool.idle === 0) return null;
  const lane = pool.busy.indexOf(0);
  if (lane < 0) return null;
  pool.busy[lane] = 1;
  pool.idle--;
  return lane;
}

/** Hand a lane back. Returning lane 0 or an idle lane changes nothing. */
export function returnLane(pool: LanePool, lane: number): void {
  if (!Number.isInteger(lane) || lane < 0 || lane >= pool.size) {
    throw new RangeError(`Lane ${lane} does not exist in pool`);
  }
  if (lane === 0 || pool.busy[lane] === 0) return;
  pool.busy[lane] = 0;
  pool.idle++;
}

/** Thread budget for two child tasks; the first gets the larger half. */
export function splitBudget(budget: number): [number, number] {
  const first = Math.ceil(budget / 2);
  return [first, budget - first];
}

/**
 * Run `first` on the current lane and `second` on a claimed lane, holding
 * that lane from fork to join. With no lane free both run on the current
 * lane and nothing counts as forked.
 */
export function forkJoin<A, B>(pool: LanePool, first: () => A, second: () => B): [A, B] {
  const lane = claimLane(pool);
  if (lane !== null) pool.forked++;
  try {
    const a = first();
    const b = second();
    return [a, b];
  } finally {
    if (lane !== null) returnLane(pool, lane);
  }
}

/**
 * Split `[0, dataLength)` into at most `pool.size` contiguous chunks, the
 * first `dataLength % chunks` one item longer, and run `task` on each in
 * order. Chunks past the first hold a lane until all have joined.
 *
 * @returns the number of chunks dispatched
 */
export function runChunked(
  pool: LanePool,
  dataLength: number,
  task: (offset: number, length: number) => void,
): number {
  if (dataLength <= 0) return 0;

  const chunkCount = Math.min(pool.size, dataLength);
  const base = Math.floor(dataLength / chunkCount);
  const extra = dataLength % chunkCount;
  const held: number[] = [];

  try {
    while (held.length < chunkCount - 1) {
      const lane = claimLane(pool);
      if (lane === null) break;
      held.push(lane);
      pool.forked++;
    }
    let offset = 0;
    for (let c = 0; c < chunkCount; c++) {
      const length = base + (c < extra ? 1 : 0);
      task(offset, length);
      offset += length;
    }
  } finally {
    for (const lane of held) returnLane(pool, lane);
  }
  return chunkCount;
}
