// ---------------------------------------------------------------------------
// Query — Batch Wrappers
// ---------------------------------------------------------------------------
// Every query of a batch is validated before any search starts. Work is then
// split into contiguous index chunks, one per lane; row i of the output always
// answers query i. Rows without a result carry NO_INDEX / NO_DISTANCE.
// ---------------------------------------------------------------------------

import { logger } from '../logging/logger.js';
import { parseNeighborCount, parseThreadCount, toQueryMatrix } from '../points/validate.js';
import { createLanePool, runChunked } from '../scheduling/lane-pool.js';
import {
  NO_DISTANCE,
  NO_INDEX,
  POINT_STRIDE,
  type BatchKnnResult,
  type BatchNearestResult,
  type KdTree,
  type PointLike,
} from '../types.js';
import { fillKnn, searchKnn, searchNearest } from './search.js';

/**
 * Nearest neighbor of every query point.
 *
 * @throws InvalidInputError when `numThreads` is not a positive integer or
 *         any query does not have 3 or 4 finite components. Nothing is
 *         searched in that case.
 */
export function batchNearestNeighborSearch(
  tree: KdTree,
  queries: readonly PointLike[],
  numThreads = 1,
): BatchNearestResult {
  const threads = parseThreadCount(numThreads);
  const matrix = toQueryMatrix(queries);
  const n = queries.length;

  const indices = new Array<number>(n).fill(NO_INDEX);
  const sqDists = new Array<number>(n).fill(NO_DISTANCE);

  // One lane per query at most.
  const pool = createLanePool(Math.min(threads, Math.max(1, n)));
  const chunks = runChunked(pool, n, (offset, length) => {
    for (let i = offset; i < offset + length; i++) {
      const result = searchNearest(tree, matrix, i * POINT_STRIDE, NO_DISTANCE);
      if (result.found) {
        indices[i] = result.index;
        sqDists[i] = result.sqDist;
      }
    }
  });

  logger.debug('batch nearest search', { queries: n, numThreads: threads, chunks });
  return { indices, sqDists };
}

/**
 * The `k` nearest neighbors of every query point as n × k rows.
 *
 * @throws InvalidInputError on a bad `k`, `numThreads`, or query shape,
 *         before any search starts.
 */
export function batchKnnSearch(
  tree: KdTree,
  queries: readonly PointLike[],
  k: number,
  numThreads = 1,
): BatchKnnResult {
  const count = parseNeighborCount(k);
  const threads = parseThreadCount(numThreads);
  const matrix = toQueryMatrix(queries);
  const n = queries.length;

  const indices: number[][] = [];
  const sqDists: number[][] = [];
  for (let i = 0; i < n; i++) {
    indices.push(new Array<number>(count).fill(NO_INDEX));
    sqDists.push(new Array<number>(count).fill(NO_DISTANCE));
  }

  const pool = createLanePool(Math.min(threads, Math.max(1, n)));
  const chunks = runChunked(pool, n, (offset, length) => {
    for (let i = offset; i < offset + length; i++) {
      const neighbors = searchKnn(tree, matrix, i * POINT_STRIDE, count, NO_DISTANCE);
      fillKnn(neighbors, indices[i]!, sqDists[i]!);
    }
  });

  logger.debug('batch knn search', { queries: n, k: count, numThreads: threads, chunks });
  return { indices, sqDists };
}
