export * from './audit-log.js';
export * from './config.js';
export * from './query.js';
export * from './tags.js';
export * from './tracking.js';
export * from './types.js';
export * from './usage-stats.js';
