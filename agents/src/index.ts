/**
 * @bidsignal/agents - Agent implementations
 *
 * - awards/  : award winner / agency / reason extraction and aggregation
 * - intel/   : competitor ranking and market landscape
 * - shared/  : BaseAgent and common types
 */

export * from './shared/index.js';
export * from './awards/index.js';
export * from './intel/index.js';
