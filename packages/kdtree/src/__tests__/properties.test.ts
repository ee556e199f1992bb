/**
 * Property-based tests: tree answers agree with a brute-force ranking.
 */

import { describe, test, expect } from 'vitest';
import fc from 'fast-check';

import {
  batchNearestNeighborSearch,
  buildKdTree,
  knnNeighbors,
  nearestNeighborSearch,
  PointCloud,
} from '../index.js';
import { bruteKnn, bruteRanking } from './helpers.js';

// ─── Arbitrary Generators ──────────────────────────────────────────────────

/** Small integer coordinates so that distance ties are common. */
const arbitraryPoint = fc.tuple(
  fc.integer({ min: -20, max: 20 }),
  fc.integer({ min: -20, max: 20 }),
  fc.integer({ min: -20, max: 20 }),
);

const arbitraryCloud = fc.array(arbitraryPoint, { minLength: 1, maxLength: 120 });

const arbitraryLeafSize = fc.integer({ min: 1, max: 10 });

// ─── Property Tests ────────────────────────────────────────────────────────

describe('Property: nearest neighbor', () => {
  test('matches the brute-force minimum and lowest tied index', () => {
    fc.assert(
      fc.property(arbitraryCloud, arbitraryPoint, arbitraryLeafSize, (pts, q, maxLeafSize) => {
        const tree = buildKdTree(PointCloud.fromPoints(pts), { maxLeafSize });
        const best = bruteRanking(pts, q)[0]!;
        expect(nearestNeighborSearch(tree, q)).toEqual({
          found: true,
          index: best.index,
          sqDist: best.sqDist,
        });
      }),
      { numRuns: 200 },
    );
  });
});

describe('Property: k nearest neighbors', () => {
  test('equals the first k entries of the brute-force ranking', () => {
    fc.assert(
      fc.property(
        arbitraryCloud,
        arbitraryPoint,
        fc.integer({ min: 1, max: 12 }),
        arbitraryLeafSize,
        (pts, q, k, maxLeafSize) => {
          const tree = buildKdTree(PointCloud.fromPoints(pts), { maxLeafSize });
          const neighbors = knnNeighbors(tree, q, k);

          expect(neighbors).toEqual(bruteKnn(pts, q, k));
          expect(neighbors).toHaveLength(Math.min(k, pts.length));
          expect(new Set(neighbors.map((n) => n.index)).size).toBe(neighbors.length);
        },
      ),
      { numRuns: 200 },
    );
  });
});

describe('Property: build determinism', () => {
  test('1 and 8 threads build identical trees', () => {
    fc.assert(
      fc.property(arbitraryCloud, arbitraryLeafSize, (pts, maxLeafSize) => {
        const cloud = PointCloud.fromPoints(pts);
        const single = buildKdTree(cloud, { numThreads: 1, maxLeafSize, parallelGrain: 2 });
        const multi = buildKdTree(cloud, { numThreads: 8, maxLeafSize, parallelGrain: 2 });

        expect(multi.nodes).toEqual(single.nodes);
        expect(Array.from(multi.order)).toEqual(Array.from(single.order));
      }),
      { numRuns: 100 },
    );
  });
});

describe('Property: batch consistency', () => {
  test('batch rows equal single queries for any thread count', () => {
    fc.assert(
      fc.property(
        arbitraryCloud,
        fc.array(arbitraryPoint, { minLength: 0, maxLength: 40 }),
        fc.integer({ min: 1, max: 8 }),
        (pts, queries, numThreads) => {
          const tree = buildKdTree(PointCloud.fromPoints(pts), { maxLeafSize: 4 });
          const batch = batchNearestNeighborSearch(tree, queries, numThreads);

          expect(batch.indices).toHaveLength(queries.length);
          queries.forEach((q, i) => {
            const single = nearestNeighborSearch(tree, q);
            expect(batch.indices[i]).toBe(single.index);
            expect(batch.sqDists[i]).toBe(single.sqDist);
          });
        },
      ),
      { numRuns: 100 },
    );
  });
});
