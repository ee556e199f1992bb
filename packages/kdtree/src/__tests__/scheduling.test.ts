import { describe, it, expect } from 'vitest';

import {
  createLanePool,
  claimLane,
  returnLane,
  splitBudget,
  forkJoin,
  runChunked,
} from '../scheduling/index.js';

// ---------------------------------------------------------------------------
// Lane pool
// ---------------------------------------------------------------------------

describe('createLanePool', () => {
  it('reserves lane 0 for the caller', () => {
    const pool = createLanePool(3);
    expect(pool.size).toBe(3);
    expect(Array.from(pool.busy)).toEqual([1, 0, 0]);
    expect(pool.idle).toBe(2);
    expect(pool.forked).toBe(0);
  });

  it('throws for a size below 1', () => {
    expect(() => createLanePool(0)).toThrow(RangeError);
  });
});

describe('claimLane / returnLane', () => {
  it('hands out idle lanes in id order until none remain', () => {
    const pool = createLanePool(3);
    expect(claimLane(pool)).toBe(1);
    expect(claimLane(pool)).toBe(2);
    expect(claimLane(pool)).toBeNull();
    expect(pool.idle).toBe(0);
  });

  it('makes a returned lane available again', () => {
    const pool = createLanePool(3);
    claimLane(pool);
    claimLane(pool);
    returnLane(pool, 1);
    expect(pool.idle).toBe(1);
    expect(claimLane(pool)).toBe(1);
  });

  it('ignores returning an idle lane or the caller lane', () => {
    const pool = createLanePool(2);
    returnLane(pool, 1);
    returnLane(pool, 0);
    expect(pool.idle).toBe(1);
    expect(pool.busy[0]).toBe(1);
  });

  it('throws for an unknown lane', () => {
    const pool = createLanePool(2);
    expect(() => returnLane(pool, 5)).toThrow('Lane 5 does not exist in pool');
  });
});

// ---------------------------------------------------------------------------
// Fork / join
// ---------------------------------------------------------------------------

describe('splitBudget', () => {
  it('gives the first child the larger half', () => {
    expect(splitBudget(8)).toEqual([4, 4]);
    expect(splitBudget(5)).toEqual([3, 2]);
    expect(splitBudget(2)).toEqual([1, 1]);
  });
});

describe('forkJoin', () => {
  it('holds a lane while both tasks run and returns results in order', () => {
    const pool = createLanePool(2);
    const idleDuring: number[] = [];
    const result = forkJoin(
      pool,
      () => {
        idleDuring.push(pool.idle);
        return 'left';
      },
      () => {
        idleDuring.push(pool.idle);
        return 42;
      },
    );

    expect(result).toEqual(['left', 42]);
    expect(idleDuring).toEqual([0, 0]);
    expect(pool.forked).toBe(1);
    expect(pool.idle).toBe(1);
  });

  it('runs both tasks without forking when the pool is exhausted', () => {
    const pool = createLanePool(1);
    expect(forkJoin(pool, () => 0, () => 1)).toEqual([0, 1]);
    expect(pool.forked).toBe(0);
  });

  it('returns the lane when a task throws', () => {
    const pool = createLanePool(2);
    expect(() =>
      forkJoin(
        pool,
        () => {
          throw new Error('boom');
        },
        () => 1,
      ),
    ).toThrow('boom');
    expect(pool.idle).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// Chunked dispatch
// ---------------------------------------------------------------------------

describe('runChunked', () => {
  it('spreads the remainder over the first chunks and returns lanes at the join', () => {
    const pool = createLanePool(3);
    const calls: Array<[number, number]> = [];
    const count = runChunked(pool, 10, (offset, length) => {
      calls.push([offset, length]);
    });

    expect(count).toBe(3);
    expect(calls).toEqual([
      [0, 4],
      [4, 3],
      [7, 3],
    ]);
    expect(pool.forked).toBe(2);
    expect(pool.idle).toBe(2);
  });

  it('uses fewer chunks than lanes for short ranges', () => {
    const pool = createLanePool(4);
    const calls: Array<[number, number]> = [];
    expect(runChunked(pool, 2, (offset, length) => calls.push([offset, length]))).toBe(2);
    expect(calls).toEqual([
      [0, 1],
      [1, 1],
    ]);
    expect(pool.forked).toBe(1);
  });

  it('holds every extra lane until the last chunk finishes', () => {
    const pool = createLanePool(3);
    const idleDuring: number[] = [];
    runChunked(pool, 3, () => idleDuring.push(pool.idle));
    expect(idleDuring).toEqual([0, 0, 0]);
    expect(pool.idle).toBe(2);
  });

  it('dispatches nothing for an empty range', () => {
    const pool = createLanePool(4);
    expect(runChunked(pool, 0, () => undefined)).toBe(0);
    expect(pool.forked).toBe(0);
  });
});
