// ---------------------------------------------------------------------------
// Spatial Indexing — k-d Tree Builder
// ---------------------------------------------------------------------------
// Median split on the axis of largest extent, with leaves holding contiguous
// ranges of a point-index permutation. Subtrees above the parallel grain are
// forked onto lanes with a halved thread budget and joined in preorder, so
// the arena is identical for every thread count.
// ---------------------------------------------------------------------------

import { settings } from '@pointdex/config';

import { InvalidInputError, fromZodError } from '../errors.js';
import { logger as defaultLogger } from '../logging/logger.js';
import { buildOptionsSchema, writePoint } from '../points/validate.js';
import { createLanePool, forkJoin, splitBudget, type LanePool } from '../scheduling/lane-pool.js';
import {
  POINT_STRIDE,
  type Axis,
  type BuildOptions,
  type BuildReport,
  type KdNode,
  type KdTree,
  type PointSource,
} from '../types.js';

interface BuildContext {
  readonly points: Float64Array;
  readonly order: Int32Array;
  readonly maxLeafSize: number;
  readonly parallelGrain: number;
  readonly axisScanCount: number;
  readonly pool: LanePool;
}

interface SubtreeShape {
  depth: number;
  leaves: number;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Build a k-d tree over `source`.
 *
 * A numeric second argument is shorthand for `{ numThreads }`. An empty
 * source yields an empty tree (`root === -1`) whose queries find nothing.
 *
 * @throws InvalidInputError on a bad option or a malformed source point.
 */
export function buildKdTree(source: PointSource, options?: BuildOptions | number): KdTree {
  return buildKdTreeWithReport(source, options).tree;
}

/**
 * Build a k-d tree and return construction diagnostics alongside it.
 */
export function buildKdTreeWithReport(
  source: PointSource,
  options: BuildOptions | number = {},
): { tree: KdTree; report: BuildReport } {
  const opts: BuildOptions = typeof options === 'number' ? { numThreads: options } : options;
  const parsed = buildOptionsSchema.safeParse({
    numThreads: opts.numThreads,
    maxLeafSize: opts.maxLeafSize,
    parallelGrain: opts.parallelGrain,
    axisScanCount: opts.axisScanCount,
  });
  if (!parsed.success) throw fromZodError(parsed.error, 'options');

  const numThreads = parsed.data.numThreads ?? 1;
  const log = opts.logger ?? defaultLogger;
  const startedAt = performance.now();

  const points = copyPoints(source);
  const size = points.length / POINT_STRIDE;
  const order = new Int32Array(size);
  for (let i = 0; i < size; i++) order[i] = i;

  const parallelGrain = parsed.data.parallelGrain ?? settings.parallelGrain;
  // Only ranges above the grain fork, so the source bounds the lanes needed.
  const pool = createLanePool(Math.min(numThreads, Math.max(1, Math.ceil(size / parallelGrain))));
  const nodes: KdNode[] = [];
  let shape: SubtreeShape = { depth: 0, leaves: 0 };

  if (size > 0) {
    const ctx: BuildContext = {
      points,
      order,
      maxLeafSize: parsed.data.maxLeafSize ?? settings.maxLeafSize,
      parallelGrain,
      axisScanCount: parsed.data.axisScanCount ?? settings.axisScanCount,
      pool,
    };
    shape = buildRange(ctx, nodes, 0, size, numThreads);
  }

  const tree: KdTree = Object.freeze({
    points,
    order,
    nodes: Object.freeze(nodes),
    root: size > 0 ? 0 : -1,
    size,
  });

  const report: BuildReport = {
    points: size,
    nodes: nodes.length,
    leaves: shape.leaves,
    depth: shape.depth,
    forkedTasks: pool.forked,
    numThreads,
  };

  log.debug('kd-tree built', {
    ...report,
    ms: Number((performance.now() - startedAt).toFixed(1)),
  });

  return { tree, report };
}

// ---------------------------------------------------------------------------
// Source copy
// ---------------------------------------------------------------------------

function copyPoints(source: PointSource): Float64Array {
  if (source === null || typeof source !== 'object' || typeof source.size !== 'function') {
    throw new InvalidInputError('points: expected a point source', 'points');
  }
  const count = source.size();
  if (!Number.isInteger(count) || count < 0) {
    throw new InvalidInputError(`points: size() returned ${count}`, 'points');
  }
  const out = new Float64Array(count * POINT_STRIDE);
  for (let i = 0; i < count; i++) {
    writePoint(source.point(i), out, i * POINT_STRIDE, 'points', i);
  }
  return out;
}

// ---------------------------------------------------------------------------
// Recursive build
// ---------------------------------------------------------------------------

/**
 * Append the subtree over `order[lo, hi)` to `out` in preorder.
 * The subtree root lands at the arena index `out.length` had on entry.
 */
function buildRange(
  ctx: BuildContext,
  out: KdNode[],
  lo: number,
  hi: number,
  budget: number,
): SubtreeShape {
  const count = hi - lo;
  const self = out.length;

  if (count <= ctx.maxLeafSize) {
    out.push(Object.freeze({ kind: 'leaf', first: lo, last: hi }));
    return { depth: 1, leaves: 1 };
  }

  const axis = widestAxis(ctx, lo, hi);
  const mid = lo + (count >> 1);
  selectNth(ctx.points, ctx.order, lo, hi, mid, axis);
  const split = ctx.points[ctx.order[mid]! * POINT_STRIDE + axis]!;

  // Placeholder keeps preorder numbering; replaced once children are known.
  out.push(Object.freeze({ kind: 'leaf', first: lo, last: hi }));

  let left: SubtreeShape;
  let right: SubtreeShape;
  let rightRoot: number;

  if (budget > 1 && count > ctx.parallelGrain) {
    const [leftBudget, rightBudget] = splitBudget(budget);
    const local: KdNode[] = [];
    [left, right] = forkJoin(
      ctx.pool,
      () => buildRange(ctx, out, lo, mid, leftBudget),
      () => buildRange(ctx, local, mid, hi, rightBudget),
    );
    rightRoot = appendRelocated(out, local);
  } else {
    left = buildRange(ctx, out, lo, mid, 1);
    rightRoot = out.length;
    right = buildRange(ctx, out, mid, hi, 1);
  }

  out[self] = Object.freeze({ kind: 'internal', axis, split, left: self + 1, right: rightRoot });

  return {
    depth: 1 + Math.max(left.depth, right.depth),
    leaves: left.leaves + right.leaves,
  };
}

/** Join a lane-local arena into `out`, shifting its child indices. */
function appendRelocated(out: KdNode[], nodes: readonly KdNode[]): number {
  const offset = out.length;
  for (const node of nodes) {
    out.push(
      node.kind === 'leaf'
        ? node
        : Object.freeze({ ...node, left: node.left + offset, right: node.right + offset }),
    );
  }
  return offset;
}

/**
 * Axis with the largest coordinate extent over an evenly strided sample of
 * roughly `axisScanCount` points. Ties resolve to the lower axis.
 */
function widestAxis(ctx: BuildContext, lo: number, hi: number): Axis {
  const step = Math.max(1, Math.floor((hi - lo) / ctx.axisScanCount));
  const min = [Infinity, Infinity, Infinity];
  const max = [-Infinity, -Infinity, -Infinity];

  for (let i = lo; i < hi; i += step) {
    const base = ctx.order[i]! * POINT_STRIDE;
    for (let d = 0; d < 3; d++) {
      const v = ctx.points[base + d]!;
      if (v < min[d]!) min[d] = v;
      if (v > max[d]!) max[d] = v;
    }
  }

  let axis: Axis = 0;
  let widest = max[0]! - min[0]!;
  const extentY = max[1]! - min[1]!;
  const extentZ = max[2]! - min[2]!;
  if (extentY > widest) {
    axis = 1;
    widest = extentY;
  }
  if (extentZ > widest) axis = 2;
  return axis;
}

// ---------------------------------------------------------------------------
// Selection
// ---------------------------------------------------------------------------

/** Total order on point indices: coordinate along `axis`, then index. */
function precedes(points: Float64Array, a: number, b: number, axis: Axis): boolean {
  const va = points[a * POINT_STRIDE + axis]!;
  const vb = points[b * POINT_STRIDE + axis]!;
  return va < vb || (va === vb && a < b);
}

/**
 * In-place quickselect so that `order[nth]` holds the element of that rank
 * within `order[lo, hi)`, smaller elements before it and larger after it.
 * Pivot is chosen by median-of-three.
 */
function selectNth(
  points: Float64Array,
  order: Int32Array,
  lo: number,
  hi: number,
  nth: number,
  axis: Axis,
): void {
  let left = lo;
  let right = hi - 1;

  while (right > left) {
    const mid = (left + right) >> 1;
    if (precedes(points, order[mid]!, order[left]!, axis)) swap(order, left, mid);
    if (precedes(points, order[right]!, order[left]!, axis)) swap(order, left, right);
    if (precedes(points, order[mid]!, order[right]!, axis)) swap(order, mid, right);
    const pivot = order[right]!;

    let store = left;
    for (let i = left; i < right; i++) {
      if (precedes(points, order[i]!, pivot, axis)) {
        swap(order, i, store);
        store++;
      }
    }
    swap(order, store, right);

    if (store === nth) return;
    if (store < nth) left = store + 1;
    else right = store - 1;
  }
}

function swap(arr: Int32Array, i: number, j: number): void {
  const tmp = arr[i]!;
  arr[i] = arr[j]!;
  arr[j] = tmp;
}
