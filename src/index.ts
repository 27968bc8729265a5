// Usage tracking and analytics for MCP servers
export * from './schema/index.js';
export * from './storage/index.js';
export * from './stats/index.js';
export * from './server/stats-tools.js';
export * from './server/stats-prompt.js';
