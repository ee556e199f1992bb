export { PointCloud } from './point-cloud.js';
export {
  writePoint,
  toQueryVector,
  toQueryMatrix,
  parseThreadCount,
  parseNeighborCount,
  parseKnnSetting,
  buildOptionsSchema,
  threadCountSchema,
  neighborCountSchema,
  knnSettingSchema,
} from './validate.js';
