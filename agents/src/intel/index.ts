/**
 * Intel - competitor ranking and market landscape from award pages
 */

export * from './competitor-intel-agent.js';
