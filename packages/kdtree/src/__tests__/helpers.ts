import type { Neighbor, PointSource } from '../types.js';

export type Vec3 = [number, number, number];

/** Seedable mulberry32 PRNG returning values in [0, 1). */
export function createPRNG(seed: number): () => number {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomPoints(count: number, seed: number, scale = 100): Vec3[] {
  const rand = createPRNG(seed);
  const pts: Vec3[] = [];
  for (let i = 0; i < count; i++) {
    pts.push([rand() * scale, rand() * scale, rand() * scale]);
  }
  return pts;
}

/** Plain point source over mutable rows. */
export class ArraySource implements PointSource {
  constructor(public readonly rows: number[][]) {}

  size(): number {
    return this.rows.length;
  }

  point(index: number): number[] {
    return this.rows[index]!;
  }
}

export function sqDistance(a: ArrayLike<number>, b: ArrayLike<number>): number {
  const dx = a[0]! - b[0]!;
  const dy = a[1]! - b[1]!;
  const dz = a[2]! - b[2]!;
  return dx * dx + dy * dy + dz * dz;
}

/** All points ranked by (sqDist, index). */
export function bruteRanking(points: readonly ArrayLike<number>[], q: ArrayLike<number>): Neighbor[] {
  return points
    .map((p, index) => ({ index, sqDist: sqDistance(p, q) }))
    .sort((a, b) => a.sqDist - b.sqDist || a.index - b.index);
}

export function bruteKnn(points: readonly ArrayLike<number>[], q: ArrayLike<number>, k: number): Neighbor[] {
  return bruteRanking(points, q).slice(0, k);
}
