// ---------------------------------------------------------------------------
// Input validation
// ---------------------------------------------------------------------------
// Scalar arguments and option objects go through zod schemas. Coordinates are
// checked inline since they are validated once per point on the build and
// batch paths.
// ---------------------------------------------------------------------------

import { z } from 'zod';

import { InvalidInputError, fromZodError } from '../errors.js';
import { POINT_STRIDE, type PointLike } from '../types.js';

export const threadCountSchema = z
  .number({ invalid_type_error: 'must be a number' })
  .int('must be an integer')
  .min(1, 'must be at least 1');

export const neighborCountSchema = z
  .number({ invalid_type_error: 'must be a number' })
  .int('must be an integer')
  .min(1, 'must be at least 1');

export const knnSettingSchema = z
  .object({
    maxSqDist: z.number().nonnegative('must be non-negative').optional(),
  })
  .strict();

export const buildOptionsSchema = z.object({
  numThreads: threadCountSchema.optional(),
  maxLeafSize: z.number().int('must be an integer').min(1, 'must be at least 1').optional(),
  parallelGrain: z.number().int('must be an integer').min(1, 'must be at least 1').optional(),
  axisScanCount: z.number().int('must be an integer').min(1, 'must be at least 1').optional(),
});

export function parseThreadCount(value: number, field = 'numThreads'): number {
  const result = threadCountSchema.safeParse(value);
  if (!result.success) throw fromZodError(result.error, field);
  return result.data;
}

export function parseNeighborCount(value: number): number {
  const result = neighborCountSchema.safeParse(value);
  if (!result.success) throw fromZodError(result.error, 'k');
  return result.data;
}

/** Returns the squared-distance cap, `Infinity` when unset. */
export function parseKnnSetting(setting: unknown): number {
  if (setting === undefined) return Number.POSITIVE_INFINITY;
  const result = knnSettingSchema.safeParse(setting);
  if (!result.success) throw fromZodError(result.error, 'setting');
  return result.data.maxSqDist ?? Number.POSITIVE_INFINITY;
}

/**
 * Validate one point and write its homogeneous form into `out` at `offset`.
 *
 * @throws InvalidInputError unless `pt` has 3 or 4 finite components.
 */
export function writePoint(
  pt: PointLike,
  out: Float64Array,
  offset: number,
  field: string,
  row?: number,
): void {
  if (pt === null || typeof pt !== 'object' || typeof pt.length !== 'number') {
    throw new InvalidInputError(`${field}: expected an array of 3 or 4 numbers`, field, row);
  }
  if (pt.length !== 3 && pt.length !== 4) {
    throw new InvalidInputError(
      `${field}: point must have 3 or 4 components, got ${pt.length}`,
      field,
      row,
    );
  }
  for (let d = 0; d < 3; d++) {
    const v = pt[d];
    if (typeof v !== 'number' || !Number.isFinite(v)) {
      throw new InvalidInputError(`${field}[${d}]: coordinate must be a finite number`, field, row);
    }
    out[offset + d] = v;
  }
  out[offset + 3] = 1.0;
}

/** Validate a single query point into a fresh homogeneous vector. */
export function toQueryVector(pt: PointLike, field = 'pt'): Float64Array {
  const out = new Float64Array(POINT_STRIDE);
  writePoint(pt, out, 0, field);
  return out;
}

/**
 * Validate every query of a batch up front.
 * Returns a flat homogeneous buffer with `POINT_STRIDE` values per query.
 */
export function toQueryMatrix(queries: readonly PointLike[], field = 'queries'): Float64Array {
  const out = new Float64Array(queries.length * POINT_STRIDE);
  for (let i = 0; i < queries.length; i++) {
    writePoint(queries[i]!, out, i * POINT_STRIDE, field, i);
  }
  return out;
}
