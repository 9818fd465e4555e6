/**
 * compliance-csv — Delimited report writer.
 *
 * Header and data lines are both driven by an explicit column list, so
 * a row can never be written under the wrong header.
 */

import type { CellValue, WriteResult } from '../types/index.js';
import type { ReportDestination } from './destination.js';
import { describeError, formatFailure, type Logger } from './logger.js';

export const DELIMITER = ';';
export const LINE_TERMINATOR = '\r\n';

/** A flat record whose every field renders to one cell */
export type FlatRow<Row> = { readonly [K in keyof Row]: CellValue };

export interface WriteOptions<Row> {
  /** Ordered columns to write; headers are their upper-cased names */
  columns: readonly (keyof Row & string)[];
  logger: Logger;
}

// ─── Formatting ──────────────────────────────────────────────────────

export function formatCell(value: CellValue): string {
  const text = String(value);
  if (text.includes(DELIMITER) || text.includes('"') || text.includes('\n') || text.includes('\r')) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function formatHeader(columns: readonly string[]): string {
  return columns.map(col => formatCell(col.toUpperCase())).join(DELIMITER);
}

export function formatRow<Row extends FlatRow<Row>>(row: Row, columns: readonly (keyof Row & string)[]): string {
  return columns.map(col => formatCell(row[col])).join(DELIMITER);
}

/** Render header plus rows as report text, without touching any destination. */
export function formatRows<Row extends FlatRow<Row>>(rows: readonly Row[], columns: readonly (keyof Row & string)[]): string {
  if (rows.length === 0) return '';
  const lines = [formatHeader(columns), ...rows.map(row => formatRow(row, columns))];
  return lines.join(LINE_TERMINATOR) + LINE_TERMINATOR;
}

// ─── Writer ──────────────────────────────────────────────────────────

/**
 * Write rows to a destination and close it.
 *
 * Skips without side effects when there is no destination, it is already
 * closed, or there are no rows. Once writing starts the destination is
 * closed on every path; a failure is logged as `Name[line]: message` and
 * returned rather than thrown.
 */
export function writeRows<Row extends FlatRow<Row>>(
  rows: readonly Row[],
  destination: ReportDestination | null | undefined,
  options: WriteOptions<Row>,
): WriteResult {
  if (!destination) return { status: 'skipped', reason: 'no-destination' };
  if (destination.closed) return { status: 'skipped', reason: 'destination-closed' };
  if (rows.length === 0) return { status: 'skipped', reason: 'no-rows' };

  const { columns, logger } = options;
  try {
    destination.write(formatHeader(columns) + LINE_TERMINATOR);
    for (const row of rows) {
      destination.write(formatRow(row, columns) + LINE_TERMINATOR);
    }
    return { status: 'written', rows: rows.length };
  } catch (err) {
    const error = describeError(err);
    logger.error(formatFailure(error));
    return { status: 'failed', error };
  } finally {
    closeQuietly(destination, logger);
  }
}

function closeQuietly(destination: ReportDestination, logger: Logger): void {
  try {
    destination.close();
  } catch (err) {
    logger.error(formatFailure(describeError(err)));
  }
}
