/**
 * compliance-csv Loader — exports.
 */

export { loadFramework, loadFindings, InputError } from './load.js';
export type { LoadFindingsOptions } from './load.js';
export { frameworkSchema, findingSchema, findingsFileSchema } from './schemas.js';
