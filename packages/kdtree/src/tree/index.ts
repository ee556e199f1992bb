export { buildKdTree, buildKdTreeWithReport } from './builder.js';
export { kdTreeStats } from './stats.js';
