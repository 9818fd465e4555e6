import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { formatCell, formatHeader, formatRows, writeRows } from '../src/output/csv.js';
import { FileDestination, type ReportDestination } from '../src/output/destination.js';
import { describeError, formatFailure, silentLogger, type Logger } from '../src/output/logger.js';
import { transformWellArchitected, WELL_ARCHITECTED_COLUMNS } from '../src/compliance/well-architected.js';
import { FRAMEWORK_NAME, attribute, finding, framework, requirement } from './fixtures/well-architected.js';

interface Pair {
  readonly Name: string;
  readonly Enabled: boolean;
}

const PAIR_COLUMNS = ['Name', 'Enabled'] as const;

class MemoryDestination implements ReportDestination {
  lines: string[] = [];
  closed = false;
  closeCalls = 0;
  constructor(private readonly failOnWrite = Infinity, private readonly failOnClose = false) {}
  write(text: string) {
    if (this.lines.length >= this.failOnWrite) throw new RangeError('disk full');
    this.lines.push(text);
  }
  close() {
    this.closeCalls++;
    if (this.failOnClose) throw new TypeError('flush failed');
    this.closed = true;
  }
}

function captureLogger(): Logger & { errors: string[] } {
  const errors: string[] = [];
  return { errors, info() {}, warn() {}, error(message) { errors.push(message); } };
}

// ─── Formatting ──────────────────────────────────────────────────────

describe('formatCell', () => {
  it('renders scalars with their default text form', () => {
    expect(formatCell('plain')).toBe('plain');
    expect(formatCell(false)).toBe('false');
    expect(formatCell(3)).toBe('3');
  });

  it('quotes values containing the delimiter, quotes or line breaks', () => {
    expect(formatCell('a;b')).toBe('"a;b"');
    expect(formatCell('say "hi"')).toBe('"say ""hi"""');
    expect(formatCell('two\nlines')).toBe('"two\nlines"');
  });
});

describe('formatHeader', () => {
  it('upper-cases column names and joins them with ;', () => {
    expect(formatHeader(['Provider', 'Requirements_Id', 'Muted'])).toBe('PROVIDER;REQUIREMENTS_ID;MUTED');
  });
});

describe('formatRows', () => {
  it('renders header and rows with CRLF line endings', () => {
    const rows: Pair[] = [{ Name: 'one', Enabled: true }, { Name: 'two;2', Enabled: false }];
    expect(formatRows(rows, PAIR_COLUMNS)).toBe('NAME;ENABLED\r\none;true\r\n"two;2";false\r\n');
  });

  it('renders nothing for no rows', () => {
    expect(formatRows([], PAIR_COLUMNS)).toBe('');
  });
});

// ─── Writer ──────────────────────────────────────────────────────────

describe('writeRows', () => {
  const rows: Pair[] = [{ Name: 'one', Enabled: true }];

  it('writes the header then one line per row and closes the destination', () => {
    const destination = new MemoryDestination();
    const result = writeRows(rows, destination, { columns: PAIR_COLUMNS, logger: silentLogger });

    expect(result).toEqual({ status: 'written', rows: 1 });
    expect(destination.lines).toEqual(['NAME;ENABLED\r\n', 'one;true\r\n']);
    expect(destination.closed).toBe(true);
  });

  it('skips when there is no destination', () => {
    expect(writeRows(rows, null, { columns: PAIR_COLUMNS, logger: silentLogger }))
      .toEqual({ status: 'skipped', reason: 'no-destination' });
  });

  it('skips a closed destination without touching it', () => {
    const destination = new MemoryDestination();
    destination.closed = true;
    expect(writeRows(rows, destination, { columns: PAIR_COLUMNS, logger: silentLogger }))
      .toEqual({ status: 'skipped', reason: 'destination-closed' });
    expect(destination.lines).toEqual([]);
    expect(destination.closeCalls).toBe(0);
  });

  it('skips empty row lists and leaves the destination open', () => {
    const destination = new MemoryDestination();
    expect(writeRows([], destination, { columns: PAIR_COLUMNS, logger: silentLogger }))
      .toEqual({ status: 'skipped', reason: 'no-rows' });
    expect(destination.lines).toEqual([]);
    expect(destination.closed).toBe(false);
  });

  it('logs and returns a failure, still closing the destination', () => {
    const destination = new MemoryDestination(1);
    const logger = captureLogger();
    const result = writeRows(rows, destination, { columns: PAIR_COLUMNS, logger });

    expect(result.status).toBe('failed');
    if (result.status !== 'failed') return;
    expect(result.error.name).toBe('RangeError');
    expect(result.error.message).toBe('disk full');
    expect(result.error.line).toBeGreaterThan(0);
    expect(logger.errors).toEqual([`RangeError[${result.error.line}]: disk full`]);
    expect(destination.lines).toEqual(['NAME;ENABLED\r\n']);
    expect(destination.closed).toBe(true);
  });

  it('closes the destination when the header write fails', () => {
    const destination = new MemoryDestination(0);
    const logger = captureLogger();
    const result = writeRows(rows, destination, { columns: PAIR_COLUMNS, logger });

    expect(result.status).toBe('failed');
    expect(destination.lines).toEqual([]);
    expect(destination.closeCalls).toBe(1);
    expect(destination.closed).toBe(true);
    expect(logger.errors).toHaveLength(1);
  });

  it('keeps the written result when only closing fails', () => {
    const destination = new MemoryDestination(Infinity, true);
    const logger = captureLogger();
    const result = writeRows(rows, destination, { columns: PAIR_COLUMNS, logger });

    expect(result).toEqual({ status: 'written', rows: 1 });
    expect(destination.lines).toEqual(['NAME;ENABLED\r\n', 'one;true\r\n']);
    expect(destination.closeCalls).toBe(1);
    expect(logger.errors).toHaveLength(1);
    expect(logger.errors[0]).toMatch(/^TypeError\[[1-9]\d*\]: flush failed$/);
  });

  it('logs both failures when writing and closing fail', () => {
    const destination = new MemoryDestination(1, true);
    const logger = captureLogger();
    const result = writeRows(rows, destination, { columns: PAIR_COLUMNS, logger });

    expect(result.status).toBe('failed');
    if (result.status !== 'failed') return;
    expect(result.error.name).toBe('RangeError');
    expect(destination.closeCalls).toBe(1);
    expect(logger.errors).toHaveLength(2);
    expect(logger.errors[0]).toBe(`RangeError[${result.error.line}]: disk full`);
    expect(logger.errors[1]).toMatch(/^TypeError\[[1-9]\d*\]: flush failed$/);
  });

  it('keeps every line aligned with the header for Well-Architected rows', () => {
    const fw = framework([
      requirement('R1', [attribute('A1'), attribute('A2', { Description: 'uses; semicolons' })]),
      requirement('M1', [attribute('X1')], []),
    ]);
    const data = transformWellArchitected([finding(['R1'])], fw, FRAMEWORK_NAME);
    const destination = new MemoryDestination();
    writeRows(data, destination, { columns: WELL_ARCHITECTED_COLUMNS, logger: silentLogger });

    const [header, ...lines] = destination.lines;
    expect(header.startsWith('PROVIDER;DESCRIPTION;ACCOUNTID;REGION;ASSESSMENTDATE;REQUIREMENTS_ID;')).toBe(true);
    expect(header.endsWith(';CHECKID;MUTED\r\n')).toBe(true);
    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe(
      'aws;Security pillar checks;;;2024-05-01T10:00:00.000Z;M1;M1 description;X1;securely-operate;sec_x1;'
      + 'Security foundations;;High;Automated;X1 practice;https://example.test/guidance;'
      + 'MANUAL;Manual check;manual_check;Manual check;manual;false\r\n',
    );
    expect(lines[1]).toContain(';"uses; semicolons";');
  });
});

// ─── File destination ────────────────────────────────────────────────

describe('FileDestination', () => {
  let dir = '';

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = '';
  });

  it('creates parent directories and writes the report file', () => {
    dir = mkdtempSync(join(tmpdir(), 'compliance-csv-'));
    const path = join(dir, 'compliance', 'report.csv');
    const destination = new FileDestination(path);

    const result = writeRows([{ Name: 'one', Enabled: false }], destination, { columns: PAIR_COLUMNS, logger: silentLogger });

    expect(result).toEqual({ status: 'written', rows: 1 });
    expect(destination.closed).toBe(true);
    expect(readFileSync(path, 'utf-8')).toBe('NAME;ENABLED\r\none;false\r\n');
  });

  it('rejects writes after close and closes idempotently', () => {
    dir = mkdtempSync(join(tmpdir(), 'compliance-csv-'));
    const destination = new FileDestination(join(dir, 'out.csv'));
    destination.close();
    destination.close();
    expect(() => destination.write('x')).toThrow('is closed');
  });
});

// ─── Error description ───────────────────────────────────────────────

describe('describeError', () => {
  it('uses the error class name and message', () => {
    class ReportIOError extends Error {}
    const info = describeError(new ReportIOError('permission denied'));
    expect(info.name).toBe('ReportIOError');
    expect(info.message).toBe('permission denied');
    expect(info.line).toBeGreaterThan(0);
  });

  it('handles thrown non-errors', () => {
    expect(describeError('boom')).toEqual({ name: 'Error', line: 0, message: 'boom' });
  });

  it('formats failures as Name[line]: message', () => {
    expect(formatFailure({ name: 'TypeError', line: 12, message: 'bad row' })).toBe('TypeError[12]: bad row');
  });
});
