export * from './record.js';
export * from './provider.js';
export * from './detection.js';
export * from './dedup.js';
