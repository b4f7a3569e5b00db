/**
 * Awards - winner / agency / amount / reason extraction over procurement pages
 *
 * - text-normalizer      : cleanup, truncation, markup stripping
 * - validators           : company-name normalization and rejection rules
 * - candidate-extractor  : pattern + score extraction (no model)
 * - llm-extractor        : chunked model extraction with fallback
 * - fallback             : merge precedence between the two paths
 * - aggregator           : cross-page ranking
 * - award-snapshot       : end-to-end snapshot builder
 */

export * from './config.js';
export * from './text-normalizer.js';
export * from './validators.js';
export * from './candidate-extractor.js';
export * from './frequency-counter.js';
export * from './fallback.js';
export * from './llm-extractor.js';
export * from './aggregator.js';
export * from './award-snapshot.js';
export * from './awards-miner-agent.js';
