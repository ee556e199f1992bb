// ---------------------------------------------------------------------------
// @pointdex/kdtree — Shared types
// ---------------------------------------------------------------------------
// Point sources, the flat node arena, and query result shapes.
// ---------------------------------------------------------------------------

import type { Logger } from './logging/logger.js';

// ---------------------------------------------------------------------------
// Sentinels
// ---------------------------------------------------------------------------

/** Index reported for an unfilled result slot. */
export const NO_INDEX = -1;

/** Squared distance reported for an unfilled result slot. */
export const NO_DISTANCE = Number.POSITIVE_INFINITY;

/** Components per stored point: homogeneous (x, y, z, 1). */
export const POINT_STRIDE = 4;

// ---------------------------------------------------------------------------
// Points
// ---------------------------------------------------------------------------

/** Axis identifier: 0 = x, 1 = y, 2 = z. */
export type Axis = 0 | 1 | 2;

/**
 * A 3D point as 3 components, or 4 in homogeneous form. The 4th component is
 * accepted and ignored.
 */
export type PointLike = ArrayLike<number>;

/**
 * Read-only collection of 3D points addressed by index.
 * The tree copies every point at build time.
 */
export interface PointSource {
  size(): number;
  point(index: number): PointLike;
}

// ---------------------------------------------------------------------------
// Tree
// ---------------------------------------------------------------------------

/** Leaf covering `order[first, last)`. */
export interface LeafNode {
  readonly kind: 'leaf';
  readonly first: number;
  readonly last: number;
}

/** Splitting node; children are arena indices. */
export interface InternalNode {
  readonly kind: 'internal';
  readonly axis: Axis;
  readonly split: number;
  readonly left: number;
  readonly right: number;
}

export type KdNode = LeafNode | InternalNode;

/**
 * Immutable k-d tree over a private copy of the source points.
 *
 * The record and its nodes are frozen. Typed arrays cannot be frozen, so
 * `points` and `order` are exposed through read-only views only; writing to
 * the underlying buffers by other means invalidates every later query.
 *
 * `root` is -1 for a tree built from an empty source.
 */
export interface KdTree {
  /** Homogeneous coordinates, `POINT_STRIDE` per point. */
  readonly points: ArrayLike<number>;
  /** Permutation of point indices; leaves cover contiguous ranges of it. */
  readonly order: ArrayLike<number>;
  readonly nodes: readonly KdNode[];
  readonly root: number;
  readonly size: number;
}

// ---------------------------------------------------------------------------
// Build
// ---------------------------------------------------------------------------

export interface BuildOptions {
  /** Thread budget for subtree construction. Default 1. */
  readonly numThreads?: number;
  /** Largest number of points stored in a leaf. */
  readonly maxLeafSize?: number;
  /** Smallest range size that may be forked onto another lane. */
  readonly parallelGrain?: number;
  /** Points sampled per range when estimating axis extents. */
  readonly axisScanCount?: number;
  readonly logger?: Logger;
}

/** Diagnostics gathered during construction. */
export interface BuildReport {
  readonly points: number;
  readonly nodes: number;
  readonly leaves: number;
  readonly depth: number;
  readonly forkedTasks: number;
  readonly numThreads: number;
}

export interface TreeStats {
  readonly points: number;
  readonly nodes: number;
  readonly leaves: number;
  readonly depth: number;
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

/** Per-query search settings. */
export interface KnnSetting {
  /** Candidates with a squared distance above this are ignored. */
  readonly maxSqDist?: number;
}

export interface NearestResult {
  readonly found: boolean;
  readonly index: number;
  readonly sqDist: number;
}

export interface Neighbor {
  readonly index: number;
  readonly sqDist: number;
}

/** Fixed-length k-NN result; unfilled slots hold `NO_INDEX` / `NO_DISTANCE`. */
export interface KnnResult {
  readonly indices: number[];
  readonly sqDists: number[];
}

export interface BatchNearestResult {
  readonly indices: number[];
  readonly sqDists: number[];
}

export interface BatchKnnResult {
  readonly indices: number[][];
  readonly sqDists: number[][];
}
