// ---------------------------------------------------------------------------
// Query — Nearest and k-Nearest Neighbor Search
// ---------------------------------------------------------------------------
// Branch-and-bound descent over the node arena: near child first, far child
// only when the squared distance to the splitting plane does not exceed the
// current bound. Candidates are ranked by (sqDist, index), so equidistant
// points resolve to the lowest index.
// ---------------------------------------------------------------------------

import {
  parseKnnSetting,
  parseNeighborCount,
  toQueryVector,
} from '../points/validate.js';
import {
  NO_DISTANCE,
  NO_INDEX,
  POINT_STRIDE,
  type KdTree,
  type KnnResult,
  type KnnSetting,
  type NearestResult,
  type Neighbor,
  type PointLike,
} from '../types.js';
import { heapBound, heapCreate, heapDrain, heapOffer, type NeighborHeap } from './knn-heap.js';

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Find the point nearest to `pt`.
 *
 * `found` is false only for an empty tree, or when no point lies within
 * `setting.maxSqDist`.
 */
export function nearestNeighborSearch(
  tree: KdTree,
  pt: PointLike,
  setting?: KnnSetting,
): NearestResult {
  const query = toQueryVector(pt);
  return searchNearest(tree, query, 0, parseKnnSetting(setting));
}

/**
 * Find up to `k` nearest points to `pt`, closest first.
 * Shorter than `k` when the tree holds fewer qualifying points.
 */
export function knnNeighbors(
  tree: KdTree,
  pt: PointLike,
  k: number,
  setting?: KnnSetting,
): Neighbor[] {
  const count = parseNeighborCount(k);
  const query = toQueryVector(pt);
  return searchKnn(tree, query, 0, count, parseKnnSetting(setting));
}

/**
 * Find the `k` nearest points to `pt` as fixed-length arrays, padding
 * unfilled slots with `NO_INDEX` / `NO_DISTANCE`.
 */
export function knnSearch(
  tree: KdTree,
  pt: PointLike,
  k: number,
  setting?: KnnSetting,
): KnnResult {
  const count = parseNeighborCount(k);
  const query = toQueryVector(pt);
  const indices = new Array<number>(count).fill(NO_INDEX);
  const sqDists = new Array<number>(count).fill(NO_DISTANCE);
  fillKnn(searchKnn(tree, query, 0, count, parseKnnSetting(setting)), indices, sqDists);
  return { indices, sqDists };
}

// ---------------------------------------------------------------------------
// Vector-level search (validated input)
// ---------------------------------------------------------------------------

interface Best {
  index: number;
  sqDist: number;
}

/**
 * Nearest search for the homogeneous query stored at `queries[offset..]`.
 */
export function searchNearest(
  tree: KdTree,
  queries: Float64Array,
  offset: number,
  maxSqDist: number,
): NearestResult {
  if (tree.root < 0) return { found: false, index: NO_INDEX, sqDist: NO_DISTANCE };

  const best: Best = { index: NO_INDEX, sqDist: maxSqDist };
  const qx = queries[offset]!;
  const qy = queries[offset + 1]!;
  const qz = queries[offset + 2]!;
  nearestRecursive(tree, tree.root, qx, qy, qz, best);

  return best.index === NO_INDEX
    ? { found: false, index: NO_INDEX, sqDist: NO_DISTANCE }
    : { found: true, index: best.index, sqDist: best.sqDist };
}

function nearestRecursive(
  tree: KdTree,
  nodeIndex: number,
  qx: number,
  qy: number,
  qz: number,
  best: Best,
): void {
  const node = tree.nodes[nodeIndex]!;

  if (node.kind === 'leaf') {
    const { points, order } = tree;
    for (let i = node.first; i < node.last; i++) {
      const index = order[i]!;
      const base = index * POINT_STRIDE;
      const dx = points[base]! - qx;
      const dy = points[base + 1]! - qy;
      const dz = points[base + 2]! - qz;
      const sqDist = dx * dx + dy * dy + dz * dz;
      if (
        sqDist < best.sqDist ||
        (sqDist === best.sqDist && (best.index === NO_INDEX || index < best.index))
      ) {
        best.index = index;
        best.sqDist = sqDist;
      }
    }
    return;
  }

  const diff = (node.axis === 0 ? qx : node.axis === 1 ? qy : qz) - node.split;
  const near = diff < 0 ? node.left : node.right;
  const far = diff < 0 ? node.right : node.left;

  nearestRecursive(tree, near, qx, qy, qz, best);

  if (diff * diff <= best.sqDist) {
    nearestRecursive(tree, far, qx, qy, qz, best);
  }
}

/**
 * k-NN search for the homogeneous query stored at `queries[offset..]`.
 * Returns at most `k` neighbors in ascending (sqDist, index) order.
 */
export function searchKnn(
  tree: KdTree,
  queries: Float64Array,
  offset: number,
  k: number,
  maxSqDist: number,
): Neighbor[] {
  if (tree.root < 0) return [];

  const heap = heapCreate(k);
  knnRecursive(
    tree,
    tree.root,
    queries[offset]!,
    queries[offset + 1]!,
    queries[offset + 2]!,
    heap,
    maxSqDist,
  );
  return heapDrain(heap);
}

function knnRecursive(
  tree: KdTree,
  nodeIndex: number,
  qx: number,
  qy: number,
  qz: number,
  heap: NeighborHeap,
  maxSqDist: number,
): void {
  const node = tree.nodes[nodeIndex]!;

  if (node.kind === 'leaf') {
    const { points, order } = tree;
    for (let i = node.first; i < node.last; i++) {
      const index = order[i]!;
      const base = index * POINT_STRIDE;
      const dx = points[base]! - qx;
      const dy = points[base + 1]! - qy;
      const dz = points[base + 2]! - qz;
      const sqDist = dx * dx + dy * dy + dz * dz;
      if (sqDist <= maxSqDist) heapOffer(heap, index, sqDist);
    }
    return;
  }

  const diff = (node.axis === 0 ? qx : node.axis === 1 ? qy : qz) - node.split;
  const near = diff < 0 ? node.left : node.right;
  const far = diff < 0 ? node.right : node.left;

  knnRecursive(tree, near, qx, qy, qz, heap, maxSqDist);

  if (diff * diff <= Math.min(heapBound(heap), maxSqDist)) {
    knnRecursive(tree, far, qx, qy, qz, heap, maxSqDist);
  }
}

/** Copy neighbors into pre-padded output rows. */
export function fillKnn(neighbors: readonly Neighbor[], indices: number[], sqDists: number[]): void {
  for (let j = 0; j < neighbors.length; j++) {
    const n = neighbors[j]!;
    indices[j] = n.index;
    sqDists[j] = n.sqDist;
  }
}
