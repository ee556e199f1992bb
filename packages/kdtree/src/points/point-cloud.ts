/**
 * In-memory point container implementing {@link PointSource}.
 *
 * Points are stored in homogeneous form, four doubles per point.
 */

import { InvalidInputError } from '../errors.js';
import { POINT_STRIDE, type PointLike, type PointSource } from '../types.js';
import { writePoint } from './validate.js';

export class PointCloud implements PointSource {
  private constructor(private readonly data: Float64Array) {}

  /** Build from rows of 3 or 4 components. */
  static fromPoints(rows: readonly PointLike[]): PointCloud {
    const data = new Float64Array(rows.length * POINT_STRIDE);
    for (let i = 0; i < rows.length; i++) {
      writePoint(rows[i]!, data, i * POINT_STRIDE, 'points', i);
    }
    return new PointCloud(data);
  }

  /** Build from a flat buffer holding `stride` (3 or 4) values per point. */
  static fromFlat(values: ArrayLike<number>, stride: 3 | 4 = 3): PointCloud {
    if (stride !== 3 && stride !== 4) {
      throw new InvalidInputError(`stride must be 3 or 4, got ${String(stride)}`, 'stride');
    }
    if (values.length % stride !== 0) {
      throw new InvalidInputError(
        `flat buffer length ${values.length} is not a multiple of ${stride}`,
        'values',
      );
    }
    const count = values.length / stride;
    const data = new Float64Array(count * POINT_STRIDE);
    const row = new Float64Array(stride);
    for (let i = 0; i < count; i++) {
      for (let d = 0; d < stride; d++) row[d] = values[i * stride + d]!;
      writePoint(row, data, i * POINT_STRIDE, 'values', i);
    }
    return new PointCloud(data);
  }

  size(): number {
    return this.data.length / POINT_STRIDE;
  }

  /** Homogeneous view of point `index`; shares storage with the cloud. */
  point(index: number): Float64Array {
    if (!Number.isInteger(index) || index < 0 || index >= this.size()) {
      throw new RangeError(`Point ${index} is out of range [0, ${this.size()})`);
    }
    const start = index * POINT_STRIDE;
    return this.data.subarray(start, start + POINT_STRIDE);
  }
}
