export * from './types.js';
export * from './base-agent.js';
