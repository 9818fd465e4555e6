/**
 * compliance-csv — library entry point.
 *
 * Usage:
 *   import { loadFramework, loadFindings, WellArchitectedOutput } from 'compliance-csv';
 *   import type { Finding, WellArchitectedRow } from 'compliance-csv';
 */

export * from './types/index.js';
export * from './compliance/index.js';
export * from './output/index.js';
export * from './loader/index.js';
export { resolveConfig, reportPath, loadProjectConfig, DEFAULT_CONFIG, type OutputConfig } from './config/index.js';
