/**
 * compliance-csv Output — exports.
 */

export { writeRows, formatRows, formatRow, formatHeader, formatCell, DELIMITER, LINE_TERMINATOR } from './csv.js';
export type { FlatRow, WriteOptions } from './csv.js';
export { FileDestination, type ReportDestination, type FileMode } from './destination.js';
export { createConsoleLogger, silentLogger, describeError, formatFailure } from './logger.js';
export type { Logger, ConsoleLoggerOptions } from './logger.js';
