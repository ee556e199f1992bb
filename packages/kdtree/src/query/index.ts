export {
  nearestNeighborSearch,
  knnNeighbors,
  knnSearch,
  searchNearest,
  searchKnn,
} from './search.js';
export { batchNearestNeighborSearch, batchKnnSearch } from './batch.js';
