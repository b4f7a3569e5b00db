/**
 * @bidsignal/schemas - payload shapes shared by the extraction pipelines
 */

export * from './page.js';
export * from './award.js';
export * from './intel.js';
