export * from './csv.js';
export { DEFAULT_DETECTION_THRESHOLD, normalizeHeader, scorePlugin, type DetectOptions } from './detect.js';
export * from './engine.js';
export * from './grouping.js';
export * from './merge.js';
export * from './model.js';
export * from './normalize.js';
export { resolveClusters, toReviewCluster, type ResolvedClusters } from './resolve.js';
export * from './search.js';
export * from './timestamp.js';
