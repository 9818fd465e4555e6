/**
 * compliance-csv Compliance — exports.
 *
 * Transforms are pure; file writes go through the output session.
 */

export { ComplianceOutput, complianceName, type ComplianceOutputOptions } from './output.js';
export {
  WellArchitectedOutput, transformWellArchitected, appendWellArchitectedRows,
  WELL_ARCHITECTED_COLUMNS, MANUAL_STATUS, type TransformOptions,
} from './well-architected.js';
export { summarizeRows, type RowSummary, type SectionSummary, type StatusCounts } from './summary.js';
